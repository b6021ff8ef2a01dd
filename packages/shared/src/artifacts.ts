/**
 * Artifact persistence - writing converted outputs to an output directory.
 *
 * Every file name carries the request id, so concurrent requests never share
 * a path. Files are created exclusively; an existing file is never replaced.
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { randomUUID } from 'crypto';
import { IOError, errorMessage } from './errors.js';
import type { ConversionOutput } from './protocol.js';

export function createRequestId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 12);
}

/**
 * File stem (no directory, no extension), restricted to safe characters.
 */
export function fileStem(fileName: string): string {
  const base = basename(fileName.replace(/\\/g, '/'));
  const stem = base.slice(0, base.length - extname(base).length);
  const safe = stem.replace(/[^a-zA-Z0-9._-]/g, '_');
  return safe.length > 0 ? safe : 'output';
}

/**
 * `photo_resized.png` + `a1b2c3` → `photo_resized_a1b2c3.png`
 */
export function artifactFileName(outputName: string, requestId: string): string {
  const ext = extname(basename(outputName)).toLowerCase().replace(/[^a-z0-9.]/g, '');
  return `${fileStem(outputName)}_${requestId}${ext}`;
}

/**
 * Write outputs to `dir` and return their absolute paths, in output order.
 *
 * Either every output is written or none is: files written before a failed
 * write are removed again.
 *
 * @throws IOError if the directory cannot be created or a file cannot be written
 */
export async function saveArtifacts(
  dir: string,
  outputs: readonly ConversionOutput[],
  requestId: string,
): Promise<string[]> {
  const outputDir = resolve(dir);
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new IOError(`Cannot create output directory ${outputDir}: ${errorMessage(err)}`, { cause: err });
  }

  const paths: string[] = [];
  for (const output of outputs) {
    const target = join(outputDir, artifactFileName(output.name, requestId));
    try {
      await writeFile(target, output.data, { flag: 'wx' });
    } catch (err) {
      await Promise.all(paths.map((path) => rm(path, { force: true })));
      throw new IOError(`Cannot write ${target}: ${errorMessage(err)}`, { cause: err });
    }
    paths.push(target);
  }
  return paths;
}
