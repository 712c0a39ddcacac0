import { renderJson } from './claims';
import { getAlgorithmName } from './message';
import { CodeReport } from './pipeline';
import { CertificateSummary, ClaimValue } from './types';

function isoOrNA(date: Date | undefined): string {
  return date ? date.toISOString() : 'N/A';
}

function formatVersion(version: number | undefined): string {
  return version === undefined ? 'N/A' : `v${version}`;
}

export function formatCertificate(cert: CertificateSummary): Record<string, unknown> {
  const info: Record<string, unknown> = {
    keyId: cert.keyId,
    serialNumber: cert.serialNumber,
    version: cert.version,
    issuer: cert.issuer,
    subject: cert.subject,
    keyType: cert.keyType,
    signatureAlgorithm: cert.signatureAlgorithm,
  };

  if (cert.curve) {
    info.curve = cert.curve;
  }
  if (cert.notBefore) {
    info.notBefore = cert.notBefore.toISOString();
  }
  if (cert.notAfter) {
    info.notAfter = cert.notAfter.toISOString();
  }

  return info;
}

/**
 * JSON view of one processed code
 */
export function formatReport(report: CodeReport): Record<string, unknown> {
  const claims: Record<string, ClaimValue> = {};
  for (const claim of report.claims.claims) {
    claims[claim.name] = claim.value instanceof Date ? claim.value.toISOString() : claim.value;
  }

  const output: Record<string, unknown> = {
    claims,
    algorithm: getAlgorithmName(report.message.algorithm),
  };

  if (report.keyIdHex !== undefined) {
    output.keyId = report.keyIdHex;
    output.keyIdBase64 = report.keyIdBase64;
  }

  if (report.claimsExpired !== undefined) {
    output.expired = report.claimsExpired;
  }

  if (report.verification) {
    const { verification } = report;
    output.verification = {
      keyId: verification.keyIdHex,
      keyIdBase64: verification.keyIdBase64,
      certificate: formatCertificate(verification.certificate),
      certificateExpired: verification.certificateExpired,
      signatureValid: verification.signatureValid,
      debugKey: verification.debugKey,
      valid: verification.valid,
    };
  }

  if (report.verificationError) {
    const { code, message, certificate } = report.verificationError;
    output.verificationError = certificate
      ? { code, message, certificate: formatCertificate(certificate) }
      : { code, message };
  }

  if (report.claims.healthClaims !== undefined) {
    output.payload = JSON.parse(renderJson(report.claims.healthClaims));
  }

  return output;
}

/**
 * Human readable lines for one processed code
 */
export function renderReportText(report: CodeReport): string[] {
  const lines: string[] = [];
  const label = (name: string) => name.padEnd(15);

  for (const claim of report.claims.claims) {
    const value =
      typeof claim.value === 'string'
        ? claim.value
        : claim.value instanceof Date
          ? claim.value.toISOString()
          : JSON.stringify(claim.value);
    lines.push(`${label(claim.name)}: ${value}`);
  }

  if (report.claimsExpired !== undefined) {
    lines.push(`${label('Is Expired')}: ${report.claimsExpired}`);
  }

  if (report.keyIdHex !== undefined) {
    lines.push(`${label('Key ID')}: ${report.keyIdHex} / ${report.keyIdBase64}`);
  }

  const cert = report.verification?.certificate ?? report.verificationError?.certificate;
  if (cert) {
    lines.push(`${label('Key Type')}: ${cert.keyType}`);
    lines.push(`${label('Cert Version')}: ${formatVersion(cert.version)}`);
    lines.push(`${label('Cert Serial')}: ${cert.serialNumber}`);
    lines.push(`${label('Cert Issuer')}: ${cert.issuer}`);
    lines.push(`${label('Cert Subject')}: ${cert.subject}`);
    lines.push(`${label('Cert Valid In')}: ${isoOrNA(cert.notBefore)} - ${isoOrNA(cert.notAfter)}`);
    lines.push(`${label('Signature Algo.')}: ${cert.signatureAlgorithm}`);
    if (cert.curve) {
      lines.push(`${label('Curve')}: ${cert.curve}`);
    }
  }

  if (report.verification) {
    const { verification } = report;
    lines.push(`${label('Cert Expired')}: ${verification.certificateExpired}`);
    if (verification.debugKey) {
      lines.push(`${label('Debug Key')}: true`);
    }
    lines.push(`${label('Signature Valid')}: ${verification.signatureValid}`);
  }

  if (report.verificationError) {
    lines.push(`${label('Verify Error')}: ${report.verificationError.message}`);
  }

  if (report.claims.healthClaims !== undefined) {
    lines.push(`${label('Payload')}:`);
    lines.push(renderJson(report.claims.healthClaims));
  }

  return lines;
}

/**
 * Human readable lines for a trust list entry (--list-certs)
 */
export function renderCertificateText(cert: CertificateSummary): string[] {
  const label = (name: string) => name.padEnd(16);
  const lines = [
    `${label('Key ID')}: ${cert.keyId.padStart(16, '0')}`,
    `${label('Version')}: ${formatVersion(cert.version)}`,
    `${label('Serial')}: ${cert.serialNumber}`,
    `${label('Issuer')}: ${cert.issuer}`,
    `${label('Subject')}: ${cert.subject}`,
    `${label('Valid Date Range')}: ${isoOrNA(cert.notBefore)} - ${isoOrNA(cert.notAfter)}`,
    `${label('Key Type')}: ${cert.keyType}`,
  ];
  if (cert.curve) {
    lines.push(`${label('Curve')}: ${cert.curve}`);
  }
  lines.push(`${label('Signature Algo.')}: ${cert.signatureAlgorithm}`);
  return lines;
}
