/**
 * Build a ConversionClient from configuration.
 */

import { readFile } from 'fs/promises';
import { IOError, errorMessage } from '@fileconv/shared';
import { ConversionClient, type ConversionClientOptions } from './conversion-client.js';
import { CERT_PATH, HOST, MAX_FRAME_BYTES, PORT, TIMEOUT_MS, getOutputDir } from './config.js';

export type ClientConfig = Partial<Omit<ConversionClientOptions, 'ca'>> & {
  certPath?: string;
};

/**
 * Read the server certificate to trust.
 *
 * @throws IOError when the certificate cannot be read
 */
export async function readTrustedCertificate(certPath: string = CERT_PATH): Promise<Buffer> {
  try {
    return await readFile(certPath);
  } catch (err) {
    throw new IOError(`Cannot read server certificate ${certPath}: ${errorMessage(err)}`, { cause: err });
  }
}

export async function createClientFromConfig(config: ClientConfig = {}): Promise<ConversionClient> {
  const ca = await readTrustedCertificate(config.certPath ?? CERT_PATH);
  return new ConversionClient({
    host: config.host ?? HOST,
    port: config.port ?? PORT,
    ca,
    outputDir: config.outputDir ?? getOutputDir(),
    timeoutMs: config.timeoutMs ?? TIMEOUT_MS,
    maxFrameBytes: config.maxFrameBytes ?? MAX_FRAME_BYTES,
  });
}
