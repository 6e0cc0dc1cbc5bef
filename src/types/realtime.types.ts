// src/types/realtime.types.ts
import { FieldValue } from './store.types';

export type DomainPayload = { [key: string]: FieldValue };

export type ItemEventType = 'item-created' | 'item-updated' | 'item-deleted';

export const SERVER_SENDER = 'server';

/**
 * Any other client kind, forwarded as is.
 */
export type RelayedMessage = { type: string; payload: FieldValue };

/**
 * Messages a client may send. Anything that does not decode into one of
 * these is a protocol error.
 */
export type InboundMessage =
  | { type: 'authorization'; payload: string }
  | { type: 'logout' }
  | { type: 'chat'; payload: string }
  | { type: ItemEventType; payload: DomainPayload | string }
  | RelayedMessage;

export type ForwardableMessage = Exclude<InboundMessage, { type: 'authorization' } | { type: 'logout' }>;

export type OutboundMessage =
  | { type: 'notification'; payload: string; sender: typeof SERVER_SENDER; timestamp: string }
  | { type: 'error'; payload: string; sender: typeof SERVER_SENDER; timestamp: string }
  | { type: 'logout'; payload: string; sender: typeof SERVER_SENDER; timestamp: string }
  | (ForwardableMessage & { sender: string; timestamp: string });

/**
 * One live bidirectional channel as the registry and dispatcher see it.
 * `send` throws a TransportError when the peer cannot be written to.
 */
export interface RealtimeConnection {
  readonly id: string;
  send(message: OutboundMessage): void;
  /** Protocol-level notice that the server is about to close. */
  notifyClose(reason: string): void;
  close(): void;
}

export type BroadcastPredicate = (identity: string, connection: RealtimeConnection) => boolean;

export enum SessionState {
  AwaitingHandshake = 'awaiting-handshake',
  Authenticated = 'authenticated',
  Active = 'active',
  Closed = 'closed'
}
