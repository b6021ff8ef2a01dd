/**
 * HTTP server factory for the UI bridge - route dispatch and startup.
 */

import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import { errorMessage } from '@fileconv/shared';
import type { ConversionClient } from '../conversion-client.js';
import { MAX_UPLOAD_BYTES } from '../config.js';
import { sendJson } from './utils.js';
import { handleApiRoutes, handleFileRoutes } from './routes/index.js';

export interface UiServerOptions {
  client: Pick<ConversionClient, 'submit' | 'checkServer'>;
  /** Directory served under /api/files; normally the client's output directory. */
  outputDir: string;
  maxUploadBytes?: number;
}

export function createUiServer(options: UiServerOptions): Server {
  const context = {
    client: options.client,
    maxUploadBytes: options.maxUploadBytes ?? MAX_UPLOAD_BYTES,
  };

  return createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    const route = async () => {
      // Route dispatch - short-circuit on first match
      if (await handleApiRoutes(req, res, url, context)) return;
      if (await handleFileRoutes(req, res, url, options.outputDir)) return;

      // 404 for unknown routes
      sendJson(res, { error: 'Not found' }, 404);
    };

    route().catch((err) => {
      console.error(`[http] ${req.method} ${url.pathname} failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, { error: 'Internal server error' }, 500);
      } else {
        res.destroy();
      }
    });
  });
}

/**
 * Create the UI server and start listening.
 */
export async function startUiServer(options: UiServerOptions & { host: string; port: number }): Promise<Server> {
  const server = createUiServer(options);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address: AddressInfo | string | null = server.address();
  const port = address && typeof address !== 'string' ? address.port : options.port;
  console.log(`[http] UI bridge running at http://${options.host}:${port}`);
  return server;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
