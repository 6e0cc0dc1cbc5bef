// src/sockets/realtimeSession.ts
import { SessionTokenManager } from '../services/token.service';
import { AppError, ProtocolError, errorMessage } from '../utils/errors';
import { InboundMessage, RealtimeConnection, SessionState } from '../types/realtime.types';
import { ConnectionRegistry } from './connectionRegistry';
import { BroadcastDispatcher, toIdentity } from './broadcastDispatcher';
import { decodeInbound, serverMessage, stampMessage } from './messages';
import { startNotifier } from './notifier';

export interface SessionDependencies {
  tokens: SessionTokenManager;
  registry: ConnectionRegistry;
  dispatcher: BroadcastDispatcher;
  /** 0 disables the periodic notifier. */
  notificationIntervalMs?: number;
  /** 0 waits for the handshake indefinitely. */
  handshakeTimeoutMs?: number;
}

/**
 * Drives one connection from the authorization handshake to teardown:
 * AwaitingHandshake -> Authenticated -> Active -> Closed.
 */
export class RealtimeSession {
  private current = SessionState.AwaitingHandshake;
  private owner?: string;
  private token?: string;
  private handshakeTimer?: NodeJS.Timeout;

  constructor(
    private readonly connection: RealtimeConnection,
    private readonly deps: SessionDependencies
  ) {
    const timeout = deps.handshakeTimeoutMs ?? 0;
    if (timeout > 0) {
      this.handshakeTimer = setTimeout(() => {
        if (this.current === SessionState.AwaitingHandshake) {
          this.reject(new ProtocolError('UnexpectedFirstMessage', 'Authentication timeout'), 'Authentication timeout');
        }
      }, timeout);
    }
  }

  get state(): SessionState {
    return this.current;
  }

  get identity(): string | undefined {
    return this.owner;
  }

  async receive(raw: unknown): Promise<void> {
    if (this.current === SessionState.AwaitingHandshake) {
      this.handshake(raw);
    } else if (this.current === SessionState.Active) {
      await this.dispatch(raw);
    }
  }

  /**
   * The transport went away (peer closed or read failed).
   */
  disconnected(reason: string): void {
    if (this.current === SessionState.Closed) {
      return;
    }

    console.log(`[WS] Connection ${this.connection.id} disconnected: ${reason}`);
    this.terminate();
  }

  private handshake(raw: unknown): void {
    let message: InboundMessage;
    try {
      message = decodeInbound(raw);
    } catch (err) {
      this.reject(err, 'Invalid message format');
      return;
    }

    if (message.type !== 'authorization' || typeof message.payload !== 'string') {
      this.reject(new ProtocolError('UnexpectedFirstMessage', `Invalid message type: ${message.type}`), 'Invalid message type');
      return;
    }

    let identity: string;
    try {
      identity = this.deps.tokens.validate(message.payload);
    } catch (err) {
      this.reject(err, 'Invalid token');
      return;
    }

    this.clearHandshakeTimer();
    this.current = SessionState.Authenticated;
    this.owner = identity;
    this.token = message.payload;

    const { registry } = this.deps;
    registry.admit(this.connection, identity);

    const interval = this.deps.notificationIntervalMs ?? 0;
    if (interval > 0) {
      const controller = new AbortController();
      registry.bindTask(this.connection, controller);
      startNotifier(this.connection, identity, interval, controller.signal, err => {
        console.error(`[WS] Error sending notification to ${identity}:`, errorMessage(err));
        this.terminate();
      });
    }

    this.current = SessionState.Active;
  }

  private async dispatch(raw: unknown): Promise<void> {
    const identity = this.owner;
    if (identity === undefined) {
      return;
    }

    let message: InboundMessage;
    try {
      message = decodeInbound(raw);
    } catch (err) {
      this.reject(err, 'Invalid message format');
      return;
    }

    if (message.type === 'logout') {
      this.current = SessionState.Closed;
      if (this.token) {
        this.deps.tokens.revoke(this.token);
      }
      await this.deps.registry.retireByIdentity(identity);
      return;
    }

    if (message.type === 'authorization') {
      this.sendBestEffort('Already authorized');
      return;
    }

    this.deps.dispatcher.broadcast(toIdentity(identity), stampMessage(message, identity));
  }

  /**
   * Ends the session after a protocol or auth failure: error notice first,
   * best effort, then close.
   */
  private reject(err: unknown, notice: string): void {
    const kind = err instanceof AppError ? `${err.category}:${err.kind}` : 'unknown';
    console.error(`[WS] Closing ${this.connection.id} (${kind}): ${errorMessage(err)}`);

    this.sendBestEffort(notice);
    this.terminate();
  }

  private sendBestEffort(notice: string): void {
    try {
      this.connection.send(serverMessage('error', notice));
    } catch (err) {
      console.error(`[WS] Error sending notice to ${this.connection.id}:`, errorMessage(err));
    }
  }

  private terminate(): void {
    this.clearHandshakeTimer();
    this.current = SessionState.Closed;
    if (!this.deps.registry.retire(this.connection)) {
      try {
        this.connection.close();
      } catch (err) {
        console.error(`[WS] Error closing connection ${this.connection.id}:`, errorMessage(err));
      }
    }
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = undefined;
    }
  }
}
