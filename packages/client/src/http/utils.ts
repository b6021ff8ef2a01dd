/**
 * Shared HTTP helpers - JSON responses, error responses, path validation, bodies.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { isAbsolute, join, normalize, relative } from 'path';

export function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

export function sendError(res: ServerResponse, error: string, status = 500): void {
  sendJson(res, { error }, status);
}

/**
 * Validate and resolve a file path within a base directory.
 * Returns the resolved absolute path, or null if the path escapes the base.
 */
export function safePath(baseDir: string, filePath: string): string | null {
  const normalizedPath = normalize(join(baseDir, filePath));
  const rel = relative(baseDir, normalizedPath);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return normalizedPath;
}

export class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body too large (max ${limit} bytes)`);
    this.name = 'BodyTooLargeError';
  }
}

/**
 * Collect the full request body, enforcing a size limit.
 *
 * @throws BodyTooLargeError as soon as the declared or received size passes `maxSize`
 */
export async function collectBody(req: IncomingMessage, maxSize: number): Promise<Buffer> {
  const declared = Number(req.headers['content-length'] ?? 0);
  if (declared > maxSize) {
    throw new BodyTooLargeError(maxSize);
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += data.length;
    if (size > maxSize) {
      throw new BodyTooLargeError(maxSize);
    }
    chunks.push(data);
  }
  return Buffer.concat(chunks);
}
