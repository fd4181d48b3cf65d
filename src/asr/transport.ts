import WebSocket from 'ws';
import type { RawData } from 'ws';
import { AsrError } from './errors.js';
import { logger } from '../logger.js';

export interface TransportHandlers {
  message(text: string): void;
  /** Connection closed by either side after it was open. */
  close(code: number, reason: string): void;
  error(err: Error): void;
}

/**
 * Bidirectional message channel to the service. One instance per session; it
 * is never reconnected.
 */
export interface Transport {
  /** Resolves once open. Handlers are attached before any message can arrive. */
  connect(handlers: TransportHandlers): Promise<void>;
  /**
   * Queue a text frame. Resolves once the frame is accepted and the bytes in
   * flight are back under the transport's buffer budget; rejects if the
   * connection fails first.
   */
  send(frame: string): Promise<void>;
  close(code?: number, reason?: string): void;
  readonly open: boolean;
}

export interface WsTransportOptions {
  url: string;
  apiKey: string;
  /** Bytes allowed in flight before send() starts waiting. */
  maxBufferedBytes: number;
  connectTimeoutMs: number;
}

/**
 * Transport over a `ws` client socket. Authenticates with a bearer token in
 * the upgrade request and speaks the realtime beta protocol.
 *
 * Backpressure: every frame is counted as in flight until its write callback
 * fires. Once the in-flight total exceeds the budget, send() waits for it to
 * come back down, which stalls the caller's input loop.
 */
export class WsTransport implements Transport {
  private socket: WebSocket | null = null;
  private inFlightBytes = 0;
  private waiters: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];
  private closedError: Error | null = null;

  constructor(private readonly options: WsTransportOptions) {}

  get open(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /** Bytes sent but not yet written to the socket. */
  get pendingBytes(): number {
    return this.inFlightBytes;
  }

  connect(handlers: TransportHandlers): Promise<void> {
    if (this.socket) {
      return Promise.reject(new AsrError('ConnectFailure', 'transport already used; create a new one per session'));
    }

    const socket = new WebSocket(this.options.url, {
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'OpenAI-Beta': 'realtime=v1',
      },
      handshakeTimeout: this.options.connectTimeoutMs,
    });
    this.socket = socket;

    return new Promise<void>((resolve, reject) => {
      let opened = false;

      socket.once('unexpected-response', (_req, res) => {
        const status = `${res.statusCode ?? 'unknown'} ${res.statusMessage ?? ''}`.trim();
        reject(new AsrError('ConnectFailure', `service rejected the connection: HTTP ${status}`));
        socket.terminate();
      });

      socket.once('open', () => {
        opened = true;
        logger.debug(`transport: connected to ${this.options.url}`);
        resolve();
      });

      socket.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          logger.debug(`transport: ignoring ${rawLength(data)}-byte binary frame`);
          return;
        }
        handlers.message(rawToString(data));
      });

      socket.on('error', (err: Error) => {
        if (!opened) {
          reject(new AsrError('ConnectFailure', `cannot connect to ${this.options.url}: ${err.message}`, { cause: err }));
          return;
        }
        this.failWaiters(err);
        handlers.error(err);
      });

      socket.on('close', (code: number, reason: Buffer) => {
        const text = reason.toString('utf-8');
        this.failWaiters(new Error(`connection closed (${code}${text ? ` ${text}` : ''})`));
        if (!opened) {
          reject(new AsrError('ConnectFailure', `connection closed during handshake (${code})`));
          return;
        }
        handlers.close(code, text);
      });
    });
  }

  send(frame: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(this.closedError ?? new Error('transport is not open'));
    }

    const size = Buffer.byteLength(frame);
    this.inFlightBytes += size;
    socket.send(frame, (err?: Error) => {
      this.inFlightBytes -= size;
      if (err) {
        this.failWaiters(err);
        return;
      }
      this.releaseWaiters();
    });

    if (this.inFlightBytes <= this.options.maxBufferedBytes) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(code = 1000, reason = 'client closing'): void {
    const socket = this.socket;
    if (!socket) return;
    this.failWaiters(new Error('transport closed by client'));
    if (socket.readyState === WebSocket.OPEN) {
      socket.close(code, reason);
    } else if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    }
  }

  private releaseWaiters(): void {
    if (this.inFlightBytes > this.options.maxBufferedBytes) return;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  private failWaiters(err: Error): void {
    this.closedError ??= err;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(err);
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

function rawLength(data: RawData): number {
  if (Array.isArray(data)) return data.reduce((n, b) => n + b.length, 0);
  return data.byteLength;
}

export function describeClose(code: number, reason: string): string {
  return reason ? `${code} ${reason}` : String(code);
}
