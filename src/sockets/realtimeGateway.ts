// src/sockets/realtimeGateway.ts
import { Server } from 'socket.io';
import { errorMessage } from '../utils/errors';
import {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData
} from '../types/socket.types';
import { RealtimeSession, SessionDependencies } from './realtimeSession';
import { GatewaySocket, SocketConnection } from './socketConnection';

export type GatewayServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

/**
 * Accepts Socket.IO connections and runs one RealtimeSession per socket.
 */
export class RealtimeGateway {
  private readonly sessions = new Map<string, RealtimeSession>();

  constructor(private readonly deps: SessionDependencies) {}

  attach(io: GatewayServer): void {
    io.on('connection', socket => this.accept(socket));
    console.log('[WS] Realtime gateway initialized');
  }

  accept(socket: GatewaySocket): RealtimeSession {
    const session = new RealtimeSession(new SocketConnection(socket), this.deps);
    this.sessions.set(socket.id, session);

    socket.on('message', raw => {
      session.receive(raw).catch(err => {
        console.error(`[WS] Error handling message on ${socket.id}:`, errorMessage(err));
        session.disconnected('handler failure');
      });
    });

    socket.on('disconnect', reason => {
      this.sessions.delete(socket.id);
      session.disconnected(reason);
    });

    return session;
  }

  sessionOf(socketId: string): RealtimeSession | undefined {
    return this.sessions.get(socketId);
  }

  /**
   * Closes every registered connection, cancelling their background work.
   */
  shutdown(): number {
    const retired = this.deps.registry.retireAll();
    this.sessions.clear();
    return retired;
  }
}
