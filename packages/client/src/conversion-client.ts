/**
 * ConversionClient - one TLS connection per conversion.
 *
 * Flow:
 *   read file → validate operation locally → connect → write request frame
 *   → read response frame → save outputs (or raise the server's error)
 */

import { connect } from 'tls';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import {
  ConnectionError,
  DEFAULT_PORT,
  FrameReader,
  IOError,
  TimeoutError,
  createConversionError,
  createRequestId,
  decodeResponse,
  encodeRequest,
  errorMessage,
  operationParams,
  resolveOperation,
  saveArtifacts,
  toConversionError,
  type ConversionFailure,
  type ConversionRequest,
  type ConversionResponse,
  type RawParams,
} from '@fileconv/shared';

export interface ConversionClientOptions {
  host?: string;
  port?: number;
  /** PEM of the server certificate; the only certificate trusted. */
  ca: string | Buffer;
  outputDir: string;
  timeoutMs?: number;
  maxFrameBytes?: number;
}

export interface ConvertResult {
  outputPaths: string[];
}

export type SubmitResult =
  | { success: true; outputPaths: string[] }
  | { success: false; error: ConversionFailure };

export class ConversionClient {
  readonly host: string;
  readonly port: number;
  readonly outputDir: string;
  private readonly ca: string | Buffer;
  private readonly timeoutMs: number;
  private readonly maxFrameBytes?: number;

  constructor(options: ConversionClientOptions) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? DEFAULT_PORT;
    this.ca = options.ca;
    this.outputDir = options.outputDir;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.maxFrameBytes = options.maxFrameBytes;
  }

  /**
   * Perform one request/response exchange. Single attempt, no retry.
   *
   * @throws ConnectionError when the server cannot be reached
   * @throws TimeoutError when the exchange does not finish within `timeoutMs`
   * @throws FramingError when the response is malformed or missing
   */
  send(request: ConversionRequest): Promise<ConversionResponse> {
    return new Promise<ConversionResponse>((resolve, reject) => {
      let settled = false;
      let connected = false;

      const socket = connect({
        host: this.host,
        port: this.port,
        ca: this.ca,
        minVersion: 'TLSv1.3',
        // The certificate is pinned as the sole CA; the name it carries is not checked.
        checkServerIdentity: () => undefined,
      });

      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        outcome();
      };

      const timer = setTimeout(() => {
        settle(() =>
          reject(new TimeoutError(`No response from ${this.host}:${this.port} within ${this.timeoutMs}ms`)),
        );
      }, this.timeoutMs);

      socket.on('error', (err) => {
        if (connected) return; // surfaced through the frame reader
        settle(() =>
          reject(
            new ConnectionError(`Cannot connect to ${this.host}:${this.port}: ${errorMessage(err)}`, { cause: err }),
          ),
        );
      });

      socket.once('secureConnect', () => {
        connected = true;
        const reader = new FrameReader(socket, { maxFrameBytes: this.maxFrameBytes });
        socket.write(encodeRequest(request));
        decodeResponse(reader).then(
          (response) => settle(() => resolve(response)),
          (err: unknown) => settle(() => reject(toConversionError(err, 'FramingError'))),
        );
      });
    });
  }

  /**
   * Whether a server completes a TLS handshake at the configured address.
   * Resolves false on any connection failure or after `timeoutMs`.
   */
  checkServer(timeoutMs = 2000): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const socket = connect({
        host: this.host,
        port: this.port,
        ca: this.ca,
        minVersion: 'TLSv1.3',
        checkServerIdentity: () => undefined,
      });

      const finish = (running: boolean) => {
        clearTimeout(timer);
        socket.destroy();
        resolve(running);
      };

      const timer = setTimeout(() => finish(false), timeoutMs);
      socket.on('error', () => finish(false));
      socket.once('secureConnect', () => finish(true));
    });
  }

  /**
   * Convert a file on disk and save the results to the output directory.
   *
   * @throws the server's reported error, rebuilt with the same kind and message
   */
  async convertFile(path: string, operationName: string, params: RawParams = {}): Promise<ConvertResult> {
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (err) {
      throw new IOError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
    }
    return this.convertBytes(data, basename(path), operationName, params);
  }

  /**
   * UI boundary. Never rejects; failures come back as `{ success: false }`.
   */
  async submit(
    fileBytes: Uint8Array,
    fileName: string,
    operationName: string,
    params: RawParams = {},
  ): Promise<SubmitResult> {
    try {
      const { outputPaths } = await this.convertBytes(fileBytes, fileName, operationName, params);
      return { success: true, outputPaths };
    } catch (err) {
      const error = toConversionError(err, 'IOError');
      return { success: false, error: { kind: error.kind, message: error.message } };
    }
  }

  private async convertBytes(
    sourceBytes: Uint8Array,
    fileName: string,
    operationName: string,
    params: RawParams,
  ): Promise<ConvertResult> {
    const operation = resolveOperation(operationName, params);
    const startTime = Date.now();

    console.log(`[client] ${operation.kind} ${fileName} → ${this.host}:${this.port}`);
    const response = await this.send({
      operationName: operation.kind,
      params: operationParams(operation),
      sourceBytes,
      fileName,
    });

    if (response.status === 'failure') {
      console.error(`[client] ${operation.kind} ${fileName} failed: ${response.error.kind}: ${response.error.message}`);
      throw createConversionError(response.error.kind, response.error.message);
    }

    const outputPaths = await saveArtifacts(this.outputDir, response.outputs, createRequestId());
    console.log(`[client] ${operation.kind} ${fileName}: ${outputPaths.length} file(s) in ${Date.now() - startTime}ms`);
    return { outputPaths };
  }
}
