/**
 * Transport codec - framing of one request and one response.
 *
 * All length and count fields are 8-byte unsigned big-endian integers.
 *
 * Request:
 *   u64 headerLength | header JSON {operation, params, fileName}
 *   u64 sourceLength | source bytes
 *
 * Response:
 *   u64 headerLength | header JSON {status, outputs[] | error}
 *   u64 payloadCount | payloadCount × (u64 length | bytes)
 *
 * Explicit length prefixes let payloads carry any byte value.
 */

import { z } from 'zod';
import { ERROR_KINDS, FramingError } from './errors.js';
import { LENGTH_FIELD_BYTES, type FrameReader } from './frame-reader.js';
import { isOperationName } from './operations.js';
import {
  DEFAULT_FILE_NAME,
  type ConversionOutput,
  type ConversionRequest,
  type ConversionResponse,
} from './protocol.js';

const paramValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const requestHeaderSchema = z.object({
  operation: z.string(),
  params: z.record(paramValueSchema).default({}),
  fileName: z.string().min(1).default(DEFAULT_FILE_NAME),
});

const responseHeaderSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    outputs: z.array(z.object({ name: z.string() })),
  }),
  z.object({
    status: z.literal('failure'),
    error: z.object({ kind: z.enum(ERROR_KINDS), message: z.string() }),
  }),
]);

export function encodeUInt64(value: number): Buffer {
  const field = Buffer.alloc(LENGTH_FIELD_BYTES);
  field.writeBigUInt64BE(BigInt(value));
  return field;
}

function lengthPrefixed(data: Uint8Array): Buffer[] {
  return [encodeUInt64(data.length), Buffer.from(data.buffer, data.byteOffset, data.byteLength)];
}

function encodeHeader(header: object): Buffer[] {
  return lengthPrefixed(Buffer.from(JSON.stringify(header), 'utf8'));
}

async function readHeader<T extends z.ZodTypeAny>(reader: FrameReader, schema: T): Promise<z.output<T>> {
  const length = await reader.readLength();
  const text = (await reader.readExact(length)).toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new FramingError('Frame header is not valid JSON');
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new FramingError(`Frame header rejected: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

export function encodeRequest(request: ConversionRequest): Buffer {
  return Buffer.concat([
    ...encodeHeader({
      operation: request.operationName,
      params: request.params,
      fileName: request.fileName,
    }),
    ...lengthPrefixed(request.sourceBytes),
  ]);
}

/**
 * Read one request frame.
 *
 * @throws FramingError on truncation, an oversized segment, a malformed
 * header, or an operation name outside the known set
 */
export async function decodeRequest(reader: FrameReader): Promise<ConversionRequest> {
  const header = await readHeader(reader, requestHeaderSchema);
  if (!isOperationName(header.operation)) {
    throw new FramingError(`Unknown operation "${header.operation}" in request header`);
  }

  const sourceLength = await reader.readLength();
  const sourceBytes = await reader.readExact(sourceLength);

  return {
    operationName: header.operation,
    params: header.params,
    sourceBytes,
    fileName: header.fileName,
  };
}

export function encodeResponse(response: ConversionResponse): Buffer {
  if (response.status === 'failure') {
    return Buffer.concat([
      ...encodeHeader({ status: 'failure', error: response.error }),
      encodeUInt64(0),
    ]);
  }

  return Buffer.concat([
    ...encodeHeader({
      status: 'success',
      outputs: response.outputs.map((output) => ({ name: output.name })),
    }),
    encodeUInt64(response.outputs.length),
    ...response.outputs.flatMap((output) => lengthPrefixed(output.data)),
  ]);
}

/**
 * Read one response frame.
 *
 * @throws FramingError on truncation, an oversized segment, a malformed
 * header, or a payload count that disagrees with the header
 */
export async function decodeResponse(reader: FrameReader): Promise<ConversionResponse> {
  const header = await readHeader(reader, responseHeaderSchema);
  const count = await reader.readUInt64();

  if (header.status === 'failure') {
    if (count !== 0) {
      throw new FramingError(`Failure response carries ${count} payload(s)`);
    }
    return { status: 'failure', error: header.error };
  }

  if (count !== header.outputs.length) {
    throw new FramingError(`Response header lists ${header.outputs.length} output(s) but ${count} payload(s) follow`);
  }

  const outputs: ConversionOutput[] = [];
  for (const { name } of header.outputs) {
    const length = await reader.readLength();
    outputs.push({ name, data: await reader.readExact(length) });
  }
  return { status: 'success', outputs };
}
