/**
 * `convert` CLI entry point.
 */

import { runConvert } from './convert-command.js';

runConvert(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(err);
    process.exitCode = 1;
  },
);
