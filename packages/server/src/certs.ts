/**
 * Self-signed certificate material for the TLS listener.
 *
 * The client trusts exactly this certificate, so a single self-signed
 * cert/key pair is all the PKI the local setup needs.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import selfsigned from 'selfsigned';
import { IOError, errorMessage } from '@fileconv/shared';

export interface CertificatePair {
  cert: string;
  key: string;
}

export interface GenerateCertificateOptions {
  commonName?: string;
  /** Validity in days (default: 365) */
  days?: number;
  keySize?: number;
}

/**
 * Generate a self-signed RSA certificate for localhost.
 */
export function generateCertificate(options: GenerateCertificateOptions = {}): CertificatePair {
  const commonName = options.commonName ?? 'localhost';
  const attrs = [
    { name: 'commonName', value: commonName },
    { name: 'countryName', value: 'US' },
    { name: 'organizationName', value: 'fileconv' },
  ];

  const pems = selfsigned.generate(attrs, {
    keySize: options.keySize ?? 2048,
    days: options.days ?? 365,
    algorithm: 'sha256',
    extensions: [
      { name: 'basicConstraints', cA: true },
      { name: 'keyUsage', keyCertSign: true, digitalSignature: true, keyEncipherment: true },
      { name: 'extKeyUsage', serverAuth: true },
      {
        name: 'subjectAltName',
        altNames: [
          { type: 2, value: commonName },
          { type: 7, ip: '127.0.0.1' },
        ],
      },
    ],
  });

  return { cert: pems.cert, key: pems.private };
}

/**
 * Create the cert/key pair unless both files already exist.
 */
export async function ensureCertificates(
  certPath: string,
  keyPath: string,
  options: { force?: boolean } = {},
): Promise<{ created: boolean }> {
  if (!options.force && existsSync(certPath) && existsSync(keyPath)) {
    return { created: false };
  }

  console.log('[certs] Generating self-signed certificate...');
  const pair = generateCertificate();

  try {
    await mkdir(dirname(certPath), { recursive: true });
    await mkdir(dirname(keyPath), { recursive: true });
    await writeFile(certPath, pair.cert);
    await writeFile(keyPath, pair.key, { mode: 0o600 });
  } catch (err) {
    throw new IOError(`Cannot write certificate files: ${errorMessage(err)}`, { cause: err });
  }

  console.log(`[certs] Wrote ${certPath} and ${keyPath}`);
  return { created: true };
}

export async function loadCertificates(certPath: string, keyPath: string): Promise<CertificatePair> {
  if (!existsSync(certPath) || !existsSync(keyPath)) {
    throw new IOError(`Certificate files not found: ${certPath}, ${keyPath}`);
  }

  try {
    const [cert, key] = await Promise.all([readFile(certPath, 'utf-8'), readFile(keyPath, 'utf-8')]);
    return { cert, key };
  } catch (err) {
    throw new IOError(`Cannot read certificate files: ${errorMessage(err)}`, { cause: err });
  }
}
