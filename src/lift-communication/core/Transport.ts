import WebSocket from 'ws';
import type { RawData } from 'ws';

import { consoleLogger, type ILogger } from './Logger';

export interface ITransport {
  connect(url: string): void;
  disconnect(): Promise<void>;
  onConnected: (() => void) | null;
  onDisconnected: ((reason: string) => void) | null;
  onError: ((error: Error) => void) | null;
  onMessage: ((buffer: Uint8Array) => void) | null;
  send(buffer: Uint8Array): void;
}

export interface ITransportOptions {
  handshakeTimeoutMs: number;
  closeTimeoutMs: number;
  pingIntervalMs: number;
  pingTimeoutMs: number;
}

const DEFAULT_TRANSPORT_OPTIONS: ITransportOptions = {
  handshakeTimeoutMs: 5000,
  closeTimeoutMs: 5000,
  pingIntervalMs: 20000,
  pingTimeoutMs: 60000,
};

const toUint8Array = (data: RawData): Uint8Array => {
  if (Array.isArray(data)) {
    const joined = Buffer.concat(data);
    return new Uint8Array(joined.buffer, joined.byteOffset, joined.byteLength);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
};

/** Raw WebSocket link: binary frames in and out, nothing else. */
export class Transport implements ITransport {
  private websocket: null | WebSocket = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private lastActivityAt = 0;
  private readonly options: ITransportOptions;

  public onConnected: (() => void) | null = null;

  public onDisconnected: ((reason: string) => void) | null = null;

  public onError: ((error: Error) => void) | null = null;

  public onMessage: ((buffer: Uint8Array) => void) | null = null;

  constructor(options: Partial<ITransportOptions> = {}, private readonly logger: ILogger = consoleLogger) {
    this.options = { ...DEFAULT_TRANSPORT_OPTIONS, ...options };
  }

  private onWsClosed(code: number, reason: Buffer): void {
    this.logger.info(`Transport: connection closed (code ${code})`);
    this.stopHeartbeat();
    this.websocket = null;
    this.onDisconnected?.(reason.length > 0 ? `code ${code}: ${reason.toString()}` : `code ${code}`);
  }

  private onWsError(error: Error): void {
    this.logger.warn(`Transport: connection error: ${error.message}`);
    this.onError?.(error);
  }

  private onWsOpened(): void {
    this.startHeartbeat();
    this.onConnected?.();
  }

  private onWsReceived(data: RawData, isBinary: boolean): void {
    this.lastActivityAt = Date.now();
    if (!isBinary) {
      this.logger.debug(`Transport: ignoring text frame: ${data.toString().slice(0, 50)}...`);
      return;
    }
    this.onMessage?.(toUint8Array(data));
  }

  public connect(url: string): void {
    if (this.websocket) {
      this.abandon(this.websocket);
    }
    const websocket = new WebSocket(url, { handshakeTimeout: this.options.handshakeTimeoutMs });
    websocket.binaryType = 'nodebuffer';
    websocket.on('open', () => this.onWsOpened());
    websocket.on('error', (error: Error) => this.onWsError(error));
    websocket.on('close', (code: number, reason: Buffer) => this.onWsClosed(code, reason));
    websocket.on('message', (data: RawData, isBinary: boolean) => this.onWsReceived(data, isBinary));
    websocket.on('pong', () => {
      this.lastActivityAt = Date.now();
    });
    this.websocket = websocket;
  }

  /** Closes gracefully; a peer that does not finish the close handshake in time is cut off. */
  public disconnect(): Promise<void> {
    const websocket = this.websocket;
    this.websocket = null;
    this.stopHeartbeat();
    if (!websocket) {
      return Promise.resolve();
    }
    this.silence(websocket);
    if (websocket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const forceCloseTimer = setTimeout(() => websocket.terminate(), this.options.closeTimeoutMs);
      websocket.once('close', () => {
        clearTimeout(forceCloseTimer);
        resolve();
      });
      if (websocket.readyState === WebSocket.CONNECTING) {
        websocket.terminate();
      } else {
        websocket.close(1000, 'client closing');
      }
    });
  }

  public send(buffer: Uint8Array): void {
    if (this.websocket?.readyState === WebSocket.OPEN) {
      this.websocket.send(buffer, (error?: Error) => {
        if (error) {
          this.onWsError(error);
        }
      });
    } else {
      throw new Error('WebSocket not connected');
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.lastActivityAt = Date.now();
    this.heartbeatTimer = setInterval(() => {
      const websocket = this.websocket;
      if (!websocket) {
        return;
      }
      if (Date.now() - this.lastActivityAt > this.options.pingTimeoutMs) {
        this.logger.warn(`Transport: no traffic for ${this.options.pingTimeoutMs}ms, dropping connection`);
        websocket.terminate();
        return;
      }
      websocket.ping();
    }, this.options.pingIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // Listeners are dropped so a socket we let go of can no longer reach the callbacks.
  private silence(websocket: WebSocket): void {
    websocket.removeAllListeners();
    websocket.on('error', (error: Error) => this.logger.debug(`Transport: error on released socket: ${error.message}`));
  }

  private abandon(websocket: WebSocket): void {
    this.stopHeartbeat();
    this.silence(websocket);
    websocket.terminate();
    this.websocket = null;
  }
}
