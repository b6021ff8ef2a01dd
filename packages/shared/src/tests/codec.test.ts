import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { FrameReader } from '../frame-reader.js';
import {
  decodeRequest,
  decodeResponse,
  encodeRequest,
  encodeResponse,
  encodeUInt64,
} from '../codec.js';
import { FramingError } from '../errors.js';
import type { ConversionRequest, ConversionResponse } from '../protocol.js';

function readerOf(frame: Buffer, maxFrameBytes?: number): FrameReader {
  // Wrapped in an array: Readable.from(buffer) would iterate byte by byte.
  return new FrameReader(Readable.from([frame]), { maxFrameBytes });
}

function frameWithHeader(header: unknown, ...rest: Buffer[]): Buffer {
  const json = Buffer.from(JSON.stringify(header), 'utf8');
  return Buffer.concat([encodeUInt64(json.length), json, ...rest]);
}

const resizeRequest: ConversionRequest = {
  operationName: 'resize',
  params: { width: 2, height: 3 },
  sourceBytes: new Uint8Array([1, 2, 3]),
  fileName: 'a.png',
};

describe('encodeRequest', () => {
  it('lays out header and source with 8-byte big-endian length prefixes', () => {
    const frame = encodeRequest(resizeRequest);
    const headerJson = '{"operation":"resize","params":{"width":2,"height":3},"fileName":"a.png"}';
    const headerLength = Buffer.byteLength(headerJson);

    expect(frame.readBigUInt64BE(0)).toBe(BigInt(headerLength));
    expect(frame.subarray(8, 8 + headerLength).toString('utf8')).toBe(headerJson);
    expect(frame.readBigUInt64BE(8 + headerLength)).toBe(3n);
    expect([...frame.subarray(16 + headerLength)]).toEqual([1, 2, 3]);
    expect(frame.length).toBe(16 + headerLength + 3);
  });

  it('round-trips through decodeRequest', async () => {
    const decoded = await decodeRequest(readerOf(encodeRequest(resizeRequest)));
    expect(decoded.operationName).toBe('resize');
    expect(decoded.params).toEqual({ width: 2, height: 3 });
    expect(decoded.fileName).toBe('a.png');
    expect([...decoded.sourceBytes]).toEqual([1, 2, 3]);
  });

  it('carries arbitrary binary payloads', async () => {
    const everyByte = new Uint8Array(256).map((_, i) => i);
    const decoded = await decodeRequest(
      readerOf(encodeRequest({ ...resizeRequest, sourceBytes: everyByte })),
    );
    expect(Buffer.compare(Buffer.from(decoded.sourceBytes), Buffer.from(everyByte))).toBe(0);
  });
});

describe('decodeRequest', () => {
  it('defaults params and fileName when the header omits them', async () => {
    const frame = frameWithHeader({ operation: 'to_grayscale' }, encodeUInt64(0));
    const decoded = await decodeRequest(readerOf(frame));
    expect(decoded.params).toEqual({});
    expect(decoded.fileName).toBe('input');
    expect(decoded.sourceBytes.length).toBe(0);
  });

  it('rejects a frame truncated inside the source bytes', async () => {
    const frame = encodeRequest(resizeRequest);
    const pending = decodeRequest(readerOf(frame.subarray(0, frame.length - 1)));
    await expect(pending).rejects.toThrow(FramingError);
    await expect(pending).rejects.toThrow('Stream closed after 2 of 3 expected bytes');
  });

  it('rejects an empty stream', async () => {
    await expect(decodeRequest(new FrameReader(Readable.from([])))).rejects.toThrow(
      'Stream closed after 0 of 8 expected bytes',
    );
  });

  it('rejects an unknown operation name', async () => {
    const frame = encodeRequest({ ...resizeRequest, operationName: 'sharpen' });
    await expect(decodeRequest(readerOf(frame))).rejects.toThrow(
      'Unknown operation "sharpen" in request header',
    );
  });

  it('rejects a header that is not JSON', async () => {
    const frame = Buffer.concat([encodeUInt64(3), Buffer.from('{x]'), encodeUInt64(0)]);
    await expect(decodeRequest(readerOf(frame))).rejects.toThrow('Frame header is not valid JSON');
  });

  it('rejects a header with non-primitive params', async () => {
    const frame = frameWithHeader({ operation: 'resize', params: { width: [1] } }, encodeUInt64(0));
    await expect(decodeRequest(readerOf(frame))).rejects.toThrow(FramingError);
  });

  it('rejects a declared length above the frame limit', async () => {
    await expect(decodeRequest(readerOf(encodeRequest(resizeRequest), 16))).rejects.toThrow(
      /exceeds limit of 16 bytes$/,
    );
  });

  it('rejects a length field beyond the safe integer range', async () => {
    const frame = Buffer.alloc(8, 0xff);
    await expect(decodeRequest(readerOf(frame))).rejects.toThrow(
      'Length field out of range: 18446744073709551615',
    );
  });
});

describe('encodeResponse / decodeResponse', () => {
  it('round-trips a multi-output success in order', async () => {
    const response: ConversionResponse = {
      status: 'success',
      outputs: [
        { name: 'doc_page_1.png', data: new Uint8Array([1]) },
        { name: 'doc_page_2.png', data: new Uint8Array([2, 2]) },
      ],
    };
    const decoded = await decodeResponse(readerOf(encodeResponse(response)));
    expect(decoded.status).toBe('success');
    if (decoded.status !== 'success') return;
    expect(decoded.outputs.map((o) => o.name)).toEqual(['doc_page_1.png', 'doc_page_2.png']);
    expect(decoded.outputs.map((o) => [...o.data])).toEqual([[1], [2, 2]]);
  });

  it('encodes a failure with a zero payload count', async () => {
    const response: ConversionResponse = {
      status: 'failure',
      error: { kind: 'DecodeError', message: 'not a PNG' },
    };
    const frame = encodeResponse(response);
    expect(frame.readBigUInt64BE(frame.length - 8)).toBe(0n);
    expect(await decodeResponse(readerOf(frame))).toEqual(response);
  });

  it('round-trips a success with no outputs', async () => {
    const decoded = await decodeResponse(readerOf(encodeResponse({ status: 'success', outputs: [] })));
    expect(decoded).toEqual({ status: 'success', outputs: [] });
  });

  it('rejects a payload count that disagrees with the header', async () => {
    const frame = frameWithHeader(
      { status: 'success', outputs: [{ name: 'a.png' }, { name: 'b.png' }] },
      encodeUInt64(1),
      encodeUInt64(1),
      Buffer.from([9]),
    );
    await expect(decodeResponse(readerOf(frame))).rejects.toThrow(
      'Response header lists 2 output(s) but 1 payload(s) follow',
    );
  });

  it('rejects a failure that carries payloads', async () => {
    const frame = frameWithHeader(
      { status: 'failure', error: { kind: 'IOError', message: 'disk full' } },
      encodeUInt64(1),
    );
    await expect(decodeResponse(readerOf(frame))).rejects.toThrow('Failure response carries 1 payload(s)');
  });

  it('rejects an unknown error kind', async () => {
    const frame = frameWithHeader(
      { status: 'failure', error: { kind: 'PanicError', message: '?' } },
      encodeUInt64(0),
    );
    await expect(decodeResponse(readerOf(frame))).rejects.toThrow(FramingError);
  });

  it('rejects a response truncated inside a payload', async () => {
    const frame = encodeResponse({
      status: 'success',
      outputs: [{ name: 'a.jpg', data: new Uint8Array(10) }],
    });
    await expect(decodeResponse(readerOf(frame.subarray(0, frame.length - 4)))).rejects.toThrow(
      'Stream closed after 6 of 10 expected bytes',
    );
  });
});
