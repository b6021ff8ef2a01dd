/**
 * ConversionServer - TLS listener serving one request per connection.
 *
 * Per connection:
 *   decode one request frame → wait for a conversion slot → dispatch
 *   → (optionally) persist outputs → write one response frame → close
 *
 * A connection whose request cannot be decoded is abandoned: the socket is
 * destroyed and nothing is written back.
 */

import { createServer, type Server as TlsServer, type TLSSocket } from 'tls';
import type { AddressInfo } from 'net';
import {
  DEFAULT_PORT,
  FrameReader,
  TimeoutError,
  createRequestId,
  decodeRequest,
  encodeResponse,
  errorMessage,
  failureResponse,
  saveArtifacts,
  toConversionError,
  type ConversionRequest,
  type ConversionResponse,
} from '@fileconv/shared';
import { ConversionDispatcher } from './dispatcher.js';
import { ConversionLimiter, type LimiterStats } from './limiter.js';

export interface ConversionServerOptions {
  cert: string | Buffer;
  key: string | Buffer;
  host?: string;
  /** 0 picks a free port; see {@link ConversionServer.address}. */
  port?: number;
  /** When set, every successful result is also written here. */
  outputDir?: string;
  maxConcurrent?: number;
  /** Time allowed for a client to deliver its complete request frame. */
  readTimeoutMs?: number;
  /** Longest wait for a conversion slot; 0 waits indefinitely. */
  queueTimeoutMs?: number;
  maxFrameBytes?: number;
  dispatcher?: ConversionDispatcher;
}

export interface ConversionServerStats {
  activeConnections: number;
  handled: number;
  failed: number;
  abandoned: number;
  limiter: LimiterStats;
}

export class ConversionServer {
  /** Resolves with the bound address once the listener accepts connections. */
  readonly ready: Promise<AddressInfo>;

  private readonly server: TlsServer;
  private readonly dispatcher: ConversionDispatcher;
  private readonly limiter: ConversionLimiter;
  private readonly sockets = new Set<TLSSocket>();
  private readonly host: string;
  private readonly port: number;
  private readonly outputDir?: string;
  private readonly readTimeoutMs: number;
  private readonly queueTimeoutMs: number;
  private readonly maxFrameBytes?: number;
  private readonly markReady: (address: AddressInfo) => void;
  private listening = false;
  private handled = 0;
  private failed = 0;
  private abandoned = 0;

  constructor(options: ConversionServerOptions) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? DEFAULT_PORT;
    this.outputDir = options.outputDir;
    this.readTimeoutMs = options.readTimeoutMs ?? 30000;
    this.queueTimeoutMs = options.queueTimeoutMs ?? 30000;
    this.maxFrameBytes = options.maxFrameBytes;
    this.dispatcher = options.dispatcher ?? new ConversionDispatcher();
    this.limiter = new ConversionLimiter(options.maxConcurrent ?? 4);

    let markReady: (address: AddressInfo) => void = () => {};
    this.ready = new Promise<AddressInfo>((resolve) => {
      markReady = resolve;
    });
    this.markReady = markReady;

    this.server = createServer(
      { cert: options.cert, key: options.key, minVersion: 'TLSv1.3' },
      (socket) => {
        this.handleConnection(socket).catch((err) => {
          console.error('[server] Unexpected connection failure:', err);
          socket.destroy();
        });
      },
    );

    this.server.on('tlsClientError', (err) => {
      console.warn(`[server] TLS handshake failed: ${errorMessage(err)}`);
    });
  }

  get isListening(): boolean {
    return this.listening;
  }

  /**
   * Bind the listener. Resolves once connections are accepted.
   */
  async start(): Promise<AddressInfo> {
    if (this.listening) {
      return this.address();
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        this.server.off('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        this.server.off('error', onError);
        resolve();
      };
      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.port, this.host);
    });

    this.listening = true;
    const address = this.address();
    console.log(`[server] Listening on tls://${address.address}:${address.port}`);
    this.markReady(address);
    return address;
  }

  /**
   * Close the listener, drop open connections and reject queued work.
   */
  async stop(): Promise<void> {
    if (!this.listening) return;
    this.listening = false;

    this.limiter.clearWaiting(new Error('ConversionServer stopping'));
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
    console.log('[server] Stopped');
  }

  address(): AddressInfo {
    const address = this.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('ConversionServer is not listening');
    }
    return address;
  }

  getStats(): ConversionServerStats {
    return {
      activeConnections: this.sockets.size,
      handled: this.handled,
      failed: this.failed,
      abandoned: this.abandoned,
      limiter: this.limiter.getStats(),
    };
  }

  private async handleConnection(socket: TLSSocket): Promise<void> {
    const requestId = createRequestId();
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
    socket.on('error', (err) => {
      console.warn(`[server] ${requestId} socket error: ${errorMessage(err)}`);
    });

    const request = await this.readRequest(socket, requestId);
    if (!request) return;

    console.log(
      `[server] ${requestId} ${request.operationName} ${request.fileName} (${request.sourceBytes.length} bytes)`,
    );

    let response: ConversionResponse;
    try {
      response = await this.limiter.run(() => this.convert(request, requestId, socket), this.queueTimeoutMs);
    } catch (err) {
      if (!(err instanceof TimeoutError)) {
        // The wait queue was cleared by stop().
        console.warn(`[server] ${requestId} dropped: ${errorMessage(err)}`);
        socket.destroy();
        return;
      }
      console.warn(`[server] ${requestId} ${err.message}`);
      response = failureResponse(err);
    }

    if (socket.destroyed) {
      this.abandoned++;
      console.warn(`[server] ${requestId} client went away; discarding result`);
      return;
    }

    if (response.status === 'success') {
      this.handled++;
    } else {
      this.failed++;
    }
    socket.end(encodeResponse(response));
  }

  /**
   * Decode the request frame, or abandon the connection.
   */
  private async readRequest(socket: TLSSocket, requestId: string): Promise<ConversionRequest | null> {
    const reader = new FrameReader(socket, { maxFrameBytes: this.maxFrameBytes });
    socket.setTimeout(this.readTimeoutMs, () => {
      socket.destroy(new TimeoutError(`Request not received within ${this.readTimeoutMs}ms`));
    });

    try {
      return await decodeRequest(reader);
    } catch (err) {
      this.abandoned++;
      console.warn(`[server] ${requestId} abandoned: ${errorMessage(err)}`);
      socket.destroy();
      return null;
    } finally {
      socket.setTimeout(0);
      reader.detach();
    }
  }

  private async convert(
    request: ConversionRequest,
    requestId: string,
    socket: TLSSocket,
  ): Promise<ConversionResponse> {
    const response = await this.dispatcher.dispatch(request);
    if (response.status !== 'success' || !this.outputDir || socket.destroyed) {
      return response;
    }

    try {
      const paths = await saveArtifacts(this.outputDir, response.outputs, requestId);
      console.log(`[server] ${requestId} wrote ${paths.join(', ')}`);
      return response;
    } catch (err) {
      const error = toConversionError(err, 'IOError');
      console.error(`[server] ${requestId} ${error.message}`);
      return failureResponse(error);
    }
  }
}
