/**
 * `certs` - create the self-signed certificate pair used by the server.
 */

import { Command } from 'commander';
import { errorMessage } from '@fileconv/shared';
import { ensureCertificates } from './certs.js';
import { CERT_PATH, KEY_PATH } from './config.js';

const program = new Command()
  .name('certs')
  .description('Generate the self-signed TLS certificate for the conversion server')
  .option('--cert <path>', 'certificate output path', CERT_PATH)
  .option('--key <path>', 'private key output path', KEY_PATH)
  .option('-f, --force', 'overwrite existing files', false)
  .action(async (opts: { cert: string; key: string; force: boolean }) => {
    const { created } = await ensureCertificates(opts.cert, opts.key, { force: opts.force });
    if (!created) {
      console.log(`[certs] ${opts.cert} and ${opts.key} already exist (use --force to replace)`);
    }
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(`[certs] ${errorMessage(err)}`);
  process.exit(1);
});
