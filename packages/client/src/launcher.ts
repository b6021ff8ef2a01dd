/**
 * Launcher - certificates, conversion server, then the UI bridge.
 *
 * The UI bridge starts only after the server has signalled readiness.
 */

import { errorMessage } from '@fileconv/shared';
import { startConversionServer, type ConversionServer } from '@fileconv/server';
import type { Server } from 'http';
import { createClientFromConfig } from './client-factory.js';
import { CERT_PATH, UI_HOST, UI_PORT } from './config.js';
import { closeServer, startUiServer } from './http/server.js';

async function shutdown(conversionServer: ConversionServer, uiServer: Server): Promise<void> {
  console.log('\n[launcher] Shutting down...');
  await closeServer(uiServer);
  await conversionServer.stop();
}

async function main(): Promise<void> {
  const conversionServer = await startConversionServer({ certPath: CERT_PATH });
  const address = await conversionServer.ready;
  console.log(`[launcher] Conversion server ready on port ${address.port}`);

  const client = await createClientFromConfig({ host: address.address, port: address.port });
  const uiServer = await startUiServer({ client, outputDir: client.outputDir, host: UI_HOST, port: UI_PORT });
  console.log(`[launcher] Converted files are saved to ${client.outputDir}`);

  const handleShutdown = () => {
    shutdown(conversionServer, uiServer)
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

main().catch((err) => {
  console.error(`[launcher] Failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
