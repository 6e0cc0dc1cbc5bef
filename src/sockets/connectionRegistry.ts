// src/sockets/connectionRegistry.ts
import { setTimeout as sleep } from 'timers/promises';
import { errorMessage } from '../utils/errors';
import { BroadcastPredicate, RealtimeConnection } from '../types/realtime.types';

export interface ConnectionRegistryOptions {
  /** How long retireByIdentity waits after the close notice before closing. */
  closeGraceMs?: number;
}

/**
 * Owns every live real-time connection: who it belongs to and the
 * background work bound to it. Both maps are only changed together inside
 * synchronous sections, so no reader sees a connection in one and not the
 * other.
 */
export class ConnectionRegistry {
  private readonly owners = new Map<RealtimeConnection, string>();
  private readonly tasks = new Map<RealtimeConnection, AbortController>();
  private readonly closeGraceMs: number;

  constructor({ closeGraceMs = 1000 }: ConnectionRegistryOptions = {}) {
    this.closeGraceMs = closeGraceMs;
  }

  admit(connection: RealtimeConnection, identity: string): void {
    this.owners.set(connection, identity);
    console.log(`[WS] User '${identity}' connected (${connection.id})`);
  }

  /**
   * Binds a cancellable task to an admitted connection. A connection that is
   * not (or no longer) registered gets its task cancelled straight away.
   */
  bindTask(connection: RealtimeConnection, controller: AbortController): void {
    if (!this.owners.has(connection)) {
      controller.abort();
      return;
    }

    this.tasks.get(connection)?.abort();
    this.tasks.set(connection, controller);
  }

  /**
   * Closes the connection and forgets it. Returns false when it was already
   * retired, in which case nothing happens.
   */
  retire(connection: RealtimeConnection): boolean {
    const identity = this.detach(connection);
    if (identity === undefined) {
      return false;
    }

    this.closeQuietly(connection);
    console.log(`[WS] Connection ${connection.id} of '${identity}' retired`);
    return true;
  }

  /**
   * Disconnects every device of a user. Each connection is removed at once,
   * gets a close notice, and its transport is released after the grace period.
   */
  async retireByIdentity(identity: string, reason = 'User logged out'): Promise<number> {
    const connections = this.connectionsOf(identity);
    for (const connection of connections) {
      this.detach(connection);
      try {
        console.log(`[WS] Sending close message to ${identity}`);
        connection.notifyClose(reason);
      } catch (err) {
        console.error(`[WS] Error sending close message to ${identity}:`, errorMessage(err));
      }
    }

    if (connections.length > 0 && this.closeGraceMs > 0) {
      await sleep(this.closeGraceMs);
    }

    for (const connection of connections) {
      this.closeQuietly(connection);
    }
    return connections.length;
  }

  /**
   * Retires everything, e.g. on process shutdown.
   */
  retireAll(reason = 'Server shutting down'): number {
    const connections = [...this.owners.keys()];
    for (const connection of connections) {
      this.detach(connection);
      try {
        connection.notifyClose(reason);
      } catch (err) {
        console.error(`[WS] Error sending close message to ${connection.id}:`, errorMessage(err));
      }
      this.closeQuietly(connection);
    }
    return connections.length;
  }

  /**
   * Snapshot of the registered connections the predicate selects.
   */
  select(predicate: BroadcastPredicate): Array<[RealtimeConnection, string]> {
    const selected: Array<[RealtimeConnection, string]> = [];
    for (const [connection, identity] of this.owners) {
      if (predicate(identity, connection)) {
        selected.push([connection, identity]);
      }
    }
    return selected;
  }

  identityOf(connection: RealtimeConnection): string | undefined {
    return this.owners.get(connection);
  }

  connectionsOf(identity: string): RealtimeConnection[] {
    return this.select(owner => owner === identity).map(([connection]) => connection);
  }

  hasTask(connection: RealtimeConnection): boolean {
    return this.tasks.has(connection);
  }

  get size(): number {
    return this.owners.size;
  }

  private detach(connection: RealtimeConnection): string | undefined {
    const identity = this.owners.get(connection);
    if (identity === undefined) {
      return undefined;
    }

    this.owners.delete(connection);
    const task = this.tasks.get(connection);
    this.tasks.delete(connection);
    task?.abort();
    return identity;
  }

  private closeQuietly(connection: RealtimeConnection): void {
    try {
      connection.close();
    } catch (err) {
      console.error(`[WS] Error closing connection ${connection.id}:`, errorMessage(err));
    }
  }
}
