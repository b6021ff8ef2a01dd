/**
 * REST API routes - health, server status, operation list, conversion.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { DEFAULT_FILE_NAME, OPERATION_CONTRACTS, OPERATION_NAMES, type ErrorKind, type RawParams } from '@fileconv/shared';
import type { ConversionClient } from '../../conversion-client.js';
import { BodyTooLargeError, collectBody, sendError, sendJson } from '../utils.js';

export interface ApiContext {
  client: Pick<ConversionClient, 'submit' | 'checkServer'>;
  maxUploadBytes: number;
}

/** HTTP status for each failure kind reported by `submit`. */
export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  UnsupportedOperationError: 400,
  InvalidParameterError: 400,
  DecodeError: 400,
  ConnectionError: 502,
  FramingError: 502,
  TimeoutError: 504,
  IOError: 500,
};

/**
 * Query parameters become operation parameters; dimensions only for resize.
 */
function paramsFromQuery(operation: string, query: URLSearchParams): RawParams {
  const params: RawParams = {};
  if (operation !== 'resize') return params;
  for (const name of ['width', 'height']) {
    const value = query.get(name);
    if (value !== null) params[name] = value;
  }
  return params;
}

export async function handleApiRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  context: ApiContext,
): Promise<boolean> {
  // Health check
  if (url.pathname === '/health' && req.method === 'GET') {
    sendJson(res, { status: 'ok' });
    return true;
  }

  if (url.pathname === '/api/server-status' && req.method === 'GET') {
    sendJson(res, { running: await context.client.checkServer() });
    return true;
  }

  if (url.pathname === '/api/operations' && req.method === 'GET') {
    sendJson(res, { operations: OPERATION_NAMES.map((name) => OPERATION_CONTRACTS[name]) });
    return true;
  }

  if (url.pathname === '/api/convert' && req.method === 'POST') {
    let body: Buffer;
    try {
      body = await collectBody(req, context.maxUploadBytes);
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        res.setHeader('Connection', 'close');
        sendError(res, err.message, 413);
        return true;
      }
      throw err;
    }

    const operation = url.searchParams.get('operation') ?? '';
    const fileName = url.searchParams.get('fileName') || DEFAULT_FILE_NAME;
    const result = await context.client.submit(body, fileName, operation, paramsFromQuery(operation, url.searchParams));

    if (result.success) {
      sendJson(res, result);
    } else {
      console.warn(`[http] convert ${operation} ${fileName}: ${result.error.kind}: ${result.error.message}`);
      sendJson(res, result, STATUS_BY_KIND[result.error.kind]);
    }
    return true;
  }

  return false;
}
