/**
 * `convert <path> <operation>` - convert one file through the conversion server.
 *
 * Prints each output path on success (exit 0); prints `<kind>: <message>`
 * to stderr on any failure (exit 1).
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { OPERATION_NAMES, toConversionError, type RawParams } from '@fileconv/shared';
import { createClientFromConfig, type ClientConfig } from './client-factory.js';
import type { ConversionClient } from './conversion-client.js';
import { CERT_PATH, HOST, PORT, TIMEOUT_MS, getOutputDir } from './config.js';

interface ConvertOptions {
  width?: string;
  height?: string;
  outputDir: string;
  host: string;
  port: number;
  cert: string;
  timeout: number;
}

export interface ConvertCommandIO {
  stdout(line: string): void;
  stderr(line: string): void;
  createClient(config: ClientConfig): Promise<Pick<ConversionClient, 'convertFile'>>;
}

const defaultIO: ConvertCommandIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  createClient: createClientFromConfig,
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

/**
 * Dimensions are passed through as given; the operation contract validates them.
 */
function paramsFor(operation: string, options: ConvertOptions): RawParams {
  const params: RawParams = {};
  if (operation !== 'resize') return params;
  if (options.width !== undefined) params.width = options.width;
  if (options.height !== undefined) params.height = options.height;
  return params;
}

async function convert(path: string, operation: string, options: ConvertOptions, io: ConvertCommandIO): Promise<number> {
  try {
    const client = await io.createClient({
      certPath: options.cert,
      host: options.host,
      port: options.port,
      outputDir: options.outputDir,
      timeoutMs: options.timeout,
    });
    const { outputPaths } = await client.convertFile(path, operation, paramsFor(operation, options));
    for (const outputPath of outputPaths) {
      io.stdout(outputPath);
    }
    return 0;
  } catch (err) {
    const error = toConversionError(err, 'IOError');
    io.stderr(`${error.kind}: ${error.message}`);
    return 1;
  }
}

export function createProgram(io: ConvertCommandIO, onExit: (code: number) => void): Command {
  return new Command()
    .name('convert')
    .description('Convert a file through the local conversion server')
    .argument('<path>', 'file to convert')
    .argument('<operation>', `one of: ${OPERATION_NAMES.join(', ')}`)
    .option('--width <n>', 'target width in pixels (resize)')
    .option('--height <n>', 'target height in pixels (resize)')
    .option('-o, --output-dir <dir>', 'directory for converted files', getOutputDir())
    .option('--host <host>', 'conversion server host', HOST)
    .option('--port <port>', 'conversion server port', parsePositiveInt, PORT)
    .option('--cert <path>', 'server certificate to trust', CERT_PATH)
    .option('--timeout <ms>', 'round-trip timeout in milliseconds', parsePositiveInt, TIMEOUT_MS)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action(async (path: string, operation: string, options: ConvertOptions) => {
      onExit(await convert(path, operation, options, io));
    });
}

/**
 * Run the command against `argv` (arguments only, no node/script prefix).
 * Resolves with the process exit code.
 */
export async function runConvert(argv: readonly string[], io: ConvertCommandIO = defaultIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 1;
    }
    throw err;
  }
  return exitCode;
}
