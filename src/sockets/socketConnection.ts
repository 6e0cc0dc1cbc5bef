// src/sockets/socketConnection.ts
import { Socket } from 'socket.io';
import { TransportError } from '../utils/errors';
import { OutboundMessage, RealtimeConnection } from '../types/realtime.types';
import {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData
} from '../types/socket.types';
import { serverMessage } from './messages';

export type GatewaySocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

/**
 * RealtimeConnection over a Socket.IO socket.
 */
export class SocketConnection implements RealtimeConnection {
  constructor(private readonly socket: GatewaySocket) {}

  get id(): string {
    return this.socket.id;
  }

  send(message: OutboundMessage): void {
    if (!this.socket.connected) {
      throw new TransportError('WriteFailed', `Socket ${this.socket.id} is not connected`);
    }

    try {
      this.socket.emit('message', message);
    } catch (err) {
      throw new TransportError('WriteFailed', `Write to socket ${this.socket.id} failed`, { cause: err });
    }
  }

  notifyClose(reason: string): void {
    this.send(serverMessage('logout', reason));
  }

  close(): void {
    if (this.socket.connected) {
      this.socket.disconnect(true);
    }
  }
}
