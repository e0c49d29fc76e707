import type { ITransport } from './Transport';

import { ConnectionError, InvalidStateError, TransportError, describeError } from './Errors';
import { consoleLogger, type ILogger } from './Logger';

export enum SessionState {
  CONNECTED = 'CONNECTED',
  CONNECTING = 'CONNECTING',
  CLOSING = 'CLOSING',
  DISCONNECTED = 'DISCONNECTED',
}

const ALLOWED_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  [SessionState.DISCONNECTED]: [SessionState.CONNECTING],
  [SessionState.CONNECTING]: [SessionState.CONNECTED, SessionState.DISCONNECTED],
  [SessionState.CONNECTED]: [SessionState.CLOSING, SessionState.DISCONNECTED],
  [SessionState.CLOSING]: [SessionState.DISCONNECTED],
};

export interface ISessionConfig {
  url: string;
  connectTimeoutMs: number;
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  maxQueuedFrames: number;
}

export interface ISession {
  readonly state: SessionState;
  readonly droppedFrames: number;
  connect(): Promise<void>;
  reconnect(): Promise<void>;
  send(buffer: Uint8Array): void;
  receive(): Uint8Array | null;
  close(): Promise<void>;
  onStateChanged: ((state: SessionState, previous: SessionState) => void) | null;
}

interface IPendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface IBackoff {
  resolve: () => void;
  timer: NodeJS.Timeout;
}

/**
 * Owns the lifecycle of one WebSocket session on top of an {@link ITransport}:
 * the session state, bounded connect and reconnect, and the buffer of inbound
 * frames waiting for the control loop.
 */
export class Session implements ISession {
  private sessionState = SessionState.DISCONNECTED;
  private inbox: Uint8Array[] = [];
  private dropped = 0;
  private pendingConnect: IPendingConnect | null = null;
  private connectPromise: Promise<void> | null = null;
  private closingPromise: Promise<void> | null = null;
  private releasePromise: Promise<void> = Promise.resolve();
  private backoff: IBackoff | null = null;
  private closeRequested = false;

  public onStateChanged: ((state: SessionState, previous: SessionState) => void) | null = null;

  constructor(
    private readonly transport: ITransport,
    private readonly config: ISessionConfig,
    private readonly logger: ILogger = consoleLogger,
  ) {
    this.transport.onConnected = this.onTlConnected;
    this.transport.onDisconnected = this.onTlDisconnected;
    this.transport.onError = this.onTlError;
    this.transport.onMessage = this.onTlMessage;
  }

  public get state(): SessionState {
    return this.sessionState;
  }

  public get droppedFrames(): number {
    return this.dropped;
  }

  public connect = (): Promise<void> => {
    this.closeRequested = false;
    return this.open();
  };

  public reconnect = async (): Promise<void> => {
    if (this.sessionState === SessionState.CONNECTED || this.sessionState === SessionState.CLOSING) {
      await this.closeLink();
    }

    const { maxReconnectAttempts, reconnectBaseDelayMs } = this.config;
    for (let attempt = 1; attempt <= maxReconnectAttempts && !this.closeRequested; attempt++) {
      try {
        await this.open();
        this.logger.info(`Session: reconnected after ${attempt} attempt(s)`);
        return;
      } catch (error) {
        if (attempt === maxReconnectAttempts || this.closeRequested) {
          this.logger.warn(`Session: reconnect attempt ${attempt}/${maxReconnectAttempts} failed: ${describeError(error)}`);
          break;
        }
        const delayMs = reconnectBaseDelayMs * 2 ** (attempt - 1);
        this.logger.warn(
          `Session: reconnect attempt ${attempt}/${maxReconnectAttempts} failed: ${describeError(error)}, retrying in ${delayMs}ms`,
        );
        await this.sleep(delayMs);
      }
    }

    if (this.closeRequested) {
      throw new ConnectionError('Reconnect aborted: session closed');
    }
    throw new ConnectionError(`Maximum reconnect attempts (${maxReconnectAttempts}) exceeded`);
  };

  public send = (buffer: Uint8Array): void => {
    if (this.sessionState !== SessionState.CONNECTED) {
      throw new TransportError(`Cannot send: session is ${this.sessionState}`);
    }
    try {
      this.transport.send(buffer);
    } catch (error) {
      throw new TransportError(`Send failed: ${describeError(error)}`, { cause: error });
    }
  };

  public receive = (): Uint8Array | null => {
    return this.inbox.shift() ?? null;
  };

  /** Releases the socket; resolves once the session is DISCONNECTED. Safe to call at any time. */
  public close = async (): Promise<void> => {
    this.closeRequested = true;
    this.cancelBackoff();
    if (this.pendingConnect) {
      this.failConnect(new ConnectionError('Connect aborted: session closed'));
    }
    if (this.sessionState === SessionState.CONNECTED || this.sessionState === SessionState.CLOSING) {
      await this.closeLink();
    }
    await this.releasePromise;
    this.inbox = [];
  };

  private open(): Promise<void> {
    if (this.sessionState === SessionState.CONNECTED) {
      return Promise.resolve();
    }
    if (this.connectPromise) {
      return this.connectPromise;
    }
    if (this.sessionState !== SessionState.DISCONNECTED) {
      return Promise.reject(new ConnectionError(`Cannot connect: session is ${this.sessionState}`));
    }

    this.updateState(SessionState.CONNECTING);
    const promise = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.failConnect(new ConnectionError(`Connecting to ${this.config.url} timed out after ${this.config.connectTimeoutMs}ms`));
      }, this.config.connectTimeoutMs);
      this.pendingConnect = { resolve, reject, timer };
    });
    this.connectPromise = promise;

    try {
      this.transport.connect(this.config.url);
    } catch (error) {
      this.failConnect(new ConnectionError(`Failed to open ${this.config.url}: ${describeError(error)}`, { cause: error }));
    }
    return promise;
  }

  private failConnect(error: ConnectionError): void {
    const pending = this.pendingConnect;
    if (!pending) {
      return;
    }
    this.pendingConnect = null;
    this.connectPromise = null;
    clearTimeout(pending.timer);
    this.releasePromise = this.transport.disconnect().catch((releaseError: unknown) => {
      this.logger.warn(`Session: releasing transport failed: ${describeError(releaseError)}`);
    });
    this.updateState(SessionState.DISCONNECTED);
    pending.reject(error);
  }

  private closeLink(): Promise<void> {
    if (!this.closingPromise) {
      this.updateState(SessionState.CLOSING);
      this.closingPromise = this.transport
        .disconnect()
        .finally(() => {
          this.inbox = [];
          this.closingPromise = null;
          this.updateState(SessionState.DISCONNECTED);
        });
    }
    return this.closingPromise;
  }

  private sleep(delayMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.backoff = null;
        resolve();
      }, delayMs);
      this.backoff = { resolve, timer };
    });
  }

  private cancelBackoff(): void {
    const backoff = this.backoff;
    if (backoff) {
      this.backoff = null;
      clearTimeout(backoff.timer);
      backoff.resolve();
    }
  }

  onTlConnected = (): void => {
    const pending = this.pendingConnect;
    if (!pending) {
      this.logger.warn('Session: transport connected without a pending connect, ignoring');
      return;
    }
    this.pendingConnect = null;
    this.connectPromise = null;
    clearTimeout(pending.timer);
    this.inbox = [];
    this.updateState(SessionState.CONNECTED);
    this.logger.info(`Session: connected to ${this.config.url}`);
    pending.resolve();
  };

  onTlDisconnected = (reason: string): void => {
    if (this.pendingConnect) {
      this.failConnect(new ConnectionError(`Connection to ${this.config.url} closed during handshake (${reason})`));
      return;
    }
    if (this.sessionState === SessionState.CONNECTED) {
      this.logger.warn(`Session: connection lost (${reason})`);
      this.inbox = [];
      this.updateState(SessionState.DISCONNECTED);
    }
  };

  onTlError = (error: Error): void => {
    if (this.pendingConnect) {
      this.failConnect(new ConnectionError(`Failed to connect to ${this.config.url}: ${error.message}`, { cause: error }));
      return;
    }
    this.logger.warn(`Session: transport error: ${error.message}`);
  };

  onTlMessage = (buffer: Uint8Array): void => {
    if (this.sessionState !== SessionState.CONNECTED) {
      return;
    }
    if (this.inbox.length >= this.config.maxQueuedFrames) {
      this.inbox.shift();
      this.dropped++;
    }
    this.inbox.push(buffer);
  };

  private updateState(next: SessionState): void {
    const previous = this.sessionState;
    if (next === previous) {
      return;
    }
    if (!ALLOWED_TRANSITIONS[previous].includes(next)) {
      throw new InvalidStateError(`Illegal session transition ${previous} -> ${next}`);
    }
    this.sessionState = next;
    this.logger.debug(`Session: state ${previous} -> ${next}`);
    try {
      this.onStateChanged?.(next, previous);
    } catch (error) {
      this.logger.error(`Session: state change handler threw: ${describeError(error)}`);
    }
  }
}
