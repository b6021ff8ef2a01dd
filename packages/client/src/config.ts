/**
 * Client configuration - server address, trust anchor, output directory.
 */

import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_MAX_FRAME_BYTES, DEFAULT_PORT } from '@fileconv/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Project root directory (packages/client/src → project root).
 */
export const PROJECT_ROOT = join(__dirname, '..', '..', '..');

export const HOST = process.env.CONVERT_HOST ?? '127.0.0.1';

export const PORT = parseInt(process.env.CONVERT_PORT ?? String(DEFAULT_PORT), 10);

/** The server's self-signed certificate, trusted as the only CA. */
export const CERT_PATH = process.env.CONVERT_CERT ?? join(PROJECT_ROOT, 'certs', 'cert.pem');

/**
 * Get the directory converted files are saved to.
 * - Environment variable override
 * - Otherwise: PROJECT_ROOT/converted_files/
 */
export function getOutputDir(): string {
  if (process.env.CONVERT_OUTPUT_DIR) {
    return process.env.CONVERT_OUTPUT_DIR;
  }
  return join(PROJECT_ROOT, 'converted_files');
}

/** Whole round trip, connect to last response byte. */
export const TIMEOUT_MS = parseInt(process.env.CONVERT_TIMEOUT_MS ?? '60000', 10);

export const MAX_FRAME_BYTES = parseInt(
  process.env.CONVERT_MAX_FRAME_BYTES ?? String(DEFAULT_MAX_FRAME_BYTES),
  10,
);

export const UI_HOST = process.env.UI_HOST ?? '127.0.0.1';
export const UI_PORT = parseInt(process.env.UI_PORT ?? '8501', 10);

/** Largest upload the UI bridge accepts. */
export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024; // 50MB
