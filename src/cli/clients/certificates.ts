/**
 * CA bundle loading for the TLS client
 */

import { X509Certificate } from 'crypto';
import { promises as fs } from 'fs';
import { CertificateAuthorityError, errorMessage } from '../../core/errors';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Extract the parseable certificates of a PEM bundle.
 * Blocks that fail to parse are dropped.
 */
export function parseCertificates(pem: string): string[] {
  const certificates: string[] = [];

  for (const match of pem.matchAll(PEM_CERTIFICATE)) {
    try {
      new X509Certificate(match[0]);
      certificates.push(`${match[0]}\n`);
    } catch {
      continue;
    }
  }

  return certificates;
}

/**
 * Read the CA bundle at caFile; at least one certificate must parse
 */
export async function loadCertificateAuthority(caFile: string): Promise<string[]> {
  let pem: string;
  try {
    pem = await fs.readFile(caFile, 'utf-8');
  } catch (error) {
    throw new CertificateAuthorityError(errorMessage(error));
  }

  const certificates = parseCertificates(pem);
  if (certificates.length === 0) {
    throw new CertificateAuthorityError('bad CA cert');
  }

  return certificates;
}
