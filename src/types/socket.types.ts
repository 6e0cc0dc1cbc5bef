// src/types/socket.types.ts
import { OutboundMessage } from './realtime.types';

// Every envelope, in both directions, travels on the 'message' event.
export interface ServerToClientEvents {
  message: (message: OutboundMessage) => void;
}

export interface ClientToServerEvents {
  message: (raw: unknown) => void;
}

export interface InterServerEvents {}

export interface SocketData {}
