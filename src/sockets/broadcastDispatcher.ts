// src/sockets/broadcastDispatcher.ts
import { errorMessage } from '../utils/errors';
import { BroadcastPredicate, OutboundMessage, RealtimeConnection } from '../types/realtime.types';
import { ConnectionRegistry } from './connectionRegistry';

export interface BroadcastReport {
  delivered: number;
  evicted: RealtimeConnection[];
}

export const toIdentity = (identity: string): BroadcastPredicate => owner => owner === identity;

export const everyone: BroadcastPredicate = () => true;

export class BroadcastDispatcher {
  constructor(private readonly registry: ConnectionRegistry) {}

  /**
   * Writes the message to every selected connection. A connection whose
   * write fails is treated as a dead peer and retired; the others still get
   * the message.
   */
  broadcast(predicate: BroadcastPredicate, message: OutboundMessage): BroadcastReport {
    const report: BroadcastReport = { delivered: 0, evicted: [] };

    for (const [connection, identity] of this.registry.select(predicate)) {
      try {
        connection.send(message);
        report.delivered++;
      } catch (err) {
        console.error(`[WS] Error broadcasting to ${identity}:`, errorMessage(err));
        this.registry.retire(connection);
        report.evicted.push(connection);
      }
    }

    return report;
  }
}
