#!/usr/bin/env node
/**
 * Health Certificate Verifier CLI
 *
 * Usage:
 *   npx ts-node src/cli.ts 'HC1:...'
 *   npx ts-node src/cli.ts --certs-file trust-list.cbor --json 'HC1:...'
 */

import * as fs from 'fs';
import * as path from 'path';
import { DhcConfig, loadConfig, parseSourceList } from './config';
import { DhcError } from './errors';
import { createLogger, setLogLevel } from './logger';
import { processCode } from './pipeline';
import { formatCertificate, formatReport, renderCertificateText, renderReportText } from './report';
import { downloadTrustLists, loadTrustListFile } from './sources';
import { TrustStore } from './trustStore';
import { summarizeCertificate } from './verifier';

const logger = createLogger('cli');

interface CLIOptions {
  codes: string[];
  certsFile?: string;
  certsFrom?: string[];
  noVerify: boolean;
  listCerts: boolean;
  jsonOutput: boolean;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  printHelp();
  process.exit(1);
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  const options: CLIOptions = {
    codes: [],
    noVerify: false,
    listCerts: false,
    jsonOutput: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--json' || arg === '-j') {
      options.jsonOutput = true;
    } else if (arg === '--no-verify') {
      options.noVerify = true;
    } else if (arg === '--list-certs') {
      options.listCerts = true;
    } else if (arg === '--certs-file') {
      if (i + 1 >= args.length) fail('--certs-file needs a value');
      options.certsFile = args[++i];
    } else if (arg === '--certs-from') {
      if (i + 1 >= args.length) fail('--certs-from needs a value');
      options.certsFrom = parseSourceList(args[++i]);
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (arg === '--') {
      options.codes.push(...args.slice(i + 1));
      break;
    } else if (!arg.startsWith('-')) {
      options.codes.push(arg);
    } else {
      fail(`Unknown option: ${arg}`);
    }
  }

  if (options.certsFile && options.certsFrom) {
    fail('--certs-file and --certs-from are mutually exclusive');
  }
  if (options.noVerify && options.listCerts) {
    fail('--no-verify and --list-certs are mutually exclusive');
  }
  if (options.codes.length === 0 && !options.listCerts) {
    fail('No health certificate code specified');
  }

  return options;
}

function printHelp(): void {
  console.log(`
Health Certificate Verifier CLI

Usage:
  dhc-verify [options] <HC1:...> [<HC1:...> ...]

Options:
  --certs-file FILE   Trust list in CBOR format. If not given it is downloaded.
  --certs-from LIST   Download trust lists from the given countries' services.
                      Entries from later countries override earlier ones.
                      Supported: DE, AT (comma separated, default: DE,AT)
  --no-verify         Skip signature verification
  --list-certs        List certificates from the trust list
  -j, --json          Output as JSON
  -h, --help          Show this help

Examples:
  dhc-verify 'HC1:...'
  dhc-verify --certs-from AT --json 'HC1:...'
  dhc-verify --certs-file trust-list.cbor --list-certs
`);
}

async function loadTrustStore(options: CLIOptions, config: DhcConfig): Promise<TrustStore | undefined> {
  if (options.noVerify) {
    return undefined;
  }
  if (options.certsFile) {
    const absolutePath = path.resolve(options.certsFile);
    if (!fs.existsSync(absolutePath)) {
      fail(`File not found: ${absolutePath}`);
    }
    return loadTrustListFile(absolutePath);
  }
  return downloadTrustLists(options.certsFrom ?? config.defaultSources, config);
}

function listCertificates(trustStore: TrustStore, jsonOutput: boolean): void {
  const summaries = trustStore.list().map(summarizeCertificate);

  if (jsonOutput) {
    console.log(JSON.stringify(summaries.map(formatCertificate), null, 2));
    return;
  }

  for (const summary of summaries) {
    console.log(renderCertificateText(summary).join('\n'));
    console.log();
  }
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const trustStore = await loadTrustStore(options, config);
  if (trustStore) {
    logger.info({ count: trustStore.size }, 'Trust store ready');
  }

  if (options.listCerts && trustStore) {
    listCertificates(trustStore, options.jsonOutput);
  }

  const outputs: Record<string, unknown>[] = [];

  for (const code of options.codes) {
    const report = processCode(code, { trustStore });

    if (options.jsonOutput) {
      outputs.push(formatReport(report));
    } else {
      console.log(renderReportText(report).join('\n'));
      console.log();
    }
  }

  if (options.jsonOutput && options.codes.length > 0) {
    console.log(JSON.stringify(outputs, null, 2));
  }
}

main().catch(error => {
  if (error instanceof DhcError) {
    console.error(`${error.code}: ${error.message}`);
    if (error.cause) {
      console.error('Cause:', error.cause);
    }
  } else {
    console.error('Unexpected error:', error);
  }
  process.exit(1);
});
