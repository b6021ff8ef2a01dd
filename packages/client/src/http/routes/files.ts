/**
 * File-serving route - converted files from the client output directory.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { safePath, sendError } from '../utils.js';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

export async function handleFileRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  outputDir: string,
): Promise<boolean> {
  const match = url.pathname.match(/^\/api\/files\/(.+)$/);
  if (!match || req.method !== 'GET') return false;

  let name: string;
  try {
    name = decodeURIComponent(match[1]);
  } catch {
    sendError(res, 'Malformed file name', 400);
    return true;
  }

  const filePath = safePath(outputDir, name);
  if (!filePath) {
    sendError(res, 'Access denied', 403);
    return true;
  }

  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch {
    sendError(res, 'File not found', 404);
    return true;
  }

  const contentType = MIME_TYPES[extname(filePath).toLowerCase()] || 'application/octet-stream';
  res.writeHead(200, { 'Content-Type': contentType, 'Content-Length': content.length });
  res.end(content);
  return true;
}
