import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';

// Trust list used by the Austrian greencheck app
export const CERTS_URL_AT = 'https://greencheck.gv.at/api/masterdata';

// Trust list used by the German Digitaler-Impfnachweis app
export const CERTS_URL_DE = 'https://de.dscg.ubirch.com/trustList/DSC/';
export const PUBKEY_URL_DE =
  'https://github.com/Digitaler-Impfnachweis/covpass-ios/raw/main/Certificates/PROD_RKI/CA/pubkey.pem';

export const DhcConfigSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  fetchTimeoutMs: z.number().int().min(1).default(30_000),
  defaultSources: z.array(z.string()).default(['DE', 'AT']),
  sources: z.object({
    AT: z.object({
      certsUrl: z.string().url().default(CERTS_URL_AT),
    }).default({}),
    DE: z.object({
      certsUrl: z.string().url().default(CERTS_URL_DE),
      pubkeyUrl: z.string().url().default(PUBKEY_URL_DE),
    }).default({}),
  }).default({}),
});

export type DhcConfig = z.infer<typeof DhcConfigSchema>;

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }
  return JSON.parse(readFileSync(path, 'utf-8'));
}

export function parseSourceList(value: string): string[] {
  return value.split(',').map(item => item.trim().toUpperCase()).filter(Boolean);
}

/**
 * Config from an optional JSON file (DHC_CONFIG_PATH), then environment overrides
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DhcConfig {
  const base = env.DHC_CONFIG_PATH ? readConfigFile(env.DHC_CONFIG_PATH) : {};
  const fileConfig = DhcConfigSchema.parse(base);

  const timeout = env.DHC_FETCH_TIMEOUT_MS ? parseInt(env.DHC_FETCH_TIMEOUT_MS, 10) : undefined;

  return DhcConfigSchema.parse({
    logLevel: env.LOG_LEVEL || fileConfig.logLevel,
    fetchTimeoutMs: timeout ?? fileConfig.fetchTimeoutMs,
    defaultSources: env.DHC_CERTS_FROM ? parseSourceList(env.DHC_CERTS_FROM) : fileConfig.defaultSources,
    sources: {
      AT: {
        certsUrl: env.DHC_CERTS_URL_AT || fileConfig.sources.AT.certsUrl,
      },
      DE: {
        certsUrl: env.DHC_CERTS_URL_DE || fileConfig.sources.DE.certsUrl,
        pubkeyUrl: env.DHC_PUBKEY_URL_DE || fileConfig.sources.DE.pubkeyUrl,
      },
    },
  });
}

