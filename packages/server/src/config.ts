/**
 * Server configuration - constants, paths, limits.
 */

import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_MAX_FRAME_BYTES, DEFAULT_PORT } from '@fileconv/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Project root directory (packages/server/src → project root).
 */
export const PROJECT_ROOT = join(__dirname, '..', '..', '..');

export const HOST = process.env.CONVERT_HOST ?? '127.0.0.1';

export const PORT = parseInt(process.env.CONVERT_PORT ?? String(DEFAULT_PORT), 10);

/**
 * Get the certificate directory path.
 * - Environment variable override
 * - Otherwise: PROJECT_ROOT/certs/
 */
export function getCertDir(): string {
  if (process.env.CONVERT_CERT_DIR) {
    return process.env.CONVERT_CERT_DIR;
  }
  return join(PROJECT_ROOT, 'certs');
}

export const CERT_PATH = process.env.CONVERT_CERT ?? join(getCertDir(), 'cert.pem');
export const KEY_PATH = process.env.CONVERT_KEY ?? join(getCertDir(), 'key.pem');

/**
 * Server-side copy of every result. Disabled unless configured.
 */
export const SERVER_OUTPUT_DIR: string | undefined = process.env.CONVERT_SERVER_OUTPUT_DIR || undefined;

/** Conversions allowed to run at once; further connections wait for a slot. */
export const MAX_CONCURRENT = parseInt(process.env.CONVERT_MAX_CONCURRENT ?? '4', 10);

/** How long a decoded request may wait for a conversion slot (0 waits indefinitely). */
export const QUEUE_TIMEOUT_MS = parseInt(process.env.CONVERT_QUEUE_TIMEOUT_MS ?? '30000', 10);

/** How long a connection may take to deliver its request frame. */
export const READ_TIMEOUT_MS = parseInt(process.env.CONVERT_READ_TIMEOUT_MS ?? '30000', 10);

export const MAX_FRAME_BYTES = parseInt(
  process.env.CONVERT_MAX_FRAME_BYTES ?? String(DEFAULT_MAX_FRAME_BYTES),
  10,
);

/** PDF render scale (1.0 = 72 DPI). */
export const PDF_RENDER_SCALE = parseFloat(process.env.CONVERT_PDF_SCALE ?? '3.0');
