/**
 * Server lifecycle - certificates, listening, shutdown.
 */

import { mkdir } from 'fs/promises';
import { IOError, errorMessage } from '@fileconv/shared';
import { ensureCertificates, loadCertificates } from './certs.js';
import {
  CERT_PATH,
  HOST,
  KEY_PATH,
  MAX_CONCURRENT,
  MAX_FRAME_BYTES,
  PORT,
  QUEUE_TIMEOUT_MS,
  READ_TIMEOUT_MS,
  SERVER_OUTPUT_DIR,
} from './config.js';
import { ConversionServer, type ConversionServerOptions } from './conversion-server.js';

export type StartOptions = Partial<Omit<ConversionServerOptions, 'cert' | 'key'>> & {
  certPath?: string;
  keyPath?: string;
  /** Generate a self-signed pair when the files are missing (default: true). */
  generateCerts?: boolean;
};

/**
 * Build a ConversionServer from configuration and start listening.
 * Explicit options override the environment.
 */
export async function startConversionServer(options: StartOptions = {}): Promise<ConversionServer> {
  const certPath = options.certPath ?? CERT_PATH;
  const keyPath = options.keyPath ?? KEY_PATH;

  if (options.generateCerts ?? true) {
    await ensureCertificates(certPath, keyPath);
  }
  const { cert, key } = await loadCertificates(certPath, keyPath);

  const outputDir = options.outputDir ?? SERVER_OUTPUT_DIR;
  if (outputDir) {
    try {
      await mkdir(outputDir, { recursive: true });
    } catch (err) {
      throw new IOError(`Cannot create output directory ${outputDir}: ${errorMessage(err)}`, { cause: err });
    }
  }

  const server = new ConversionServer({
    cert,
    key,
    host: options.host ?? HOST,
    port: options.port ?? PORT,
    outputDir,
    maxConcurrent: options.maxConcurrent ?? MAX_CONCURRENT,
    readTimeoutMs: options.readTimeoutMs ?? READ_TIMEOUT_MS,
    queueTimeoutMs: options.queueTimeoutMs ?? QUEUE_TIMEOUT_MS,
    maxFrameBytes: options.maxFrameBytes ?? MAX_FRAME_BYTES,
    dispatcher: options.dispatcher,
  });

  await server.start();
  return server;
}

/**
 * Stop the server on SIGINT/SIGTERM.
 */
export function installShutdownHandlers(server: ConversionServer): void {
  const handleShutdown = () => {
    console.log('\nShutting down...');
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Shutdown error:', err);
        process.exit(1);
      });
    // Force exit after 2 seconds if graceful shutdown hangs
    setTimeout(() => process.exit(0), 2000).unref();
  };

  process.once('SIGINT', handleShutdown);
  process.once('SIGTERM', handleShutdown);
}
