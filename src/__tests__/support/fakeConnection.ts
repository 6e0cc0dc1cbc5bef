// src/__tests__/support/fakeConnection.ts
import { TransportError } from '../../utils/errors';
import { OutboundMessage, RealtimeConnection } from '../../types/realtime.types';

let nextId = 1;

export class FakeConnection implements RealtimeConnection {
  readonly id: string;
  readonly sent: OutboundMessage[] = [];
  readonly closeNotices: string[] = [];
  attempts = 0;
  closed = 0;
  failWrites = false;

  constructor(id?: string) {
    this.id = id ?? `fake-${nextId++}`;
  }

  send(message: OutboundMessage): void {
    this.attempts++;
    if (this.failWrites) {
      throw new TransportError('WriteFailed', `write to ${this.id} failed`);
    }
    this.sent.push(message);
  }

  notifyClose(reason: string): void {
    if (this.failWrites) {
      throw new TransportError('WriteFailed', `close notice to ${this.id} failed`);
    }
    this.closeNotices.push(reason);
  }

  close(): void {
    this.closed++;
  }

  ofType(type: OutboundMessage['type']): OutboundMessage[] {
    return this.sent.filter(message => message.type === type);
  }
}
