/**
 * UI bridge entry point. Expects a conversion server to be running already.
 */

import { errorMessage } from '@fileconv/shared';
import { createClientFromConfig } from '../client-factory.js';
import { UI_HOST, UI_PORT } from '../config.js';
import { closeServer, startUiServer } from './server.js';

async function main(): Promise<void> {
  const client = await createClientFromConfig();
  const server = await startUiServer({ client, outputDir: client.outputDir, host: UI_HOST, port: UI_PORT });

  const handleShutdown = () => {
    console.log('\nShutting down...');
    closeServer(server)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Shutdown error:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', handleShutdown);
  process.once('SIGTERM', handleShutdown);
}

main().catch((err) => {
  console.error(`[http] Failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
