/**
 * Conversion server entry point.
 */

import { errorMessage } from '@fileconv/shared';
import { installShutdownHandlers, startConversionServer } from './lifecycle.js';

async function main(): Promise<void> {
  const server = await startConversionServer();
  installShutdownHandlers(server);
}

main().catch((err) => {
  console.error(`[server] Failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
