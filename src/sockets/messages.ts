// src/sockets/messages.ts
import { ProtocolError } from '../utils/errors';
import { FieldValue } from '../types/store.types';
import {
  DomainPayload,
  ForwardableMessage,
  InboundMessage,
  OutboundMessage,
  SERVER_SENDER
} from '../types/realtime.types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFieldValue = (value: unknown): value is FieldValue => {
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isFieldValue);
  }
  return isRecord(value) && Object.values(value).every(isFieldValue);
};

const isDomainPayload = (value: unknown): value is DomainPayload =>
  isRecord(value) && Object.values(value).every(isFieldValue);

const malformed = (reason: string): ProtocolError => new ProtocolError('MalformedMessage', reason);

/**
 * Decodes a raw frame into an inbound message. Socket.IO hands over parsed
 * JSON, but plain strings are accepted too. Kinds without a fixed payload
 * shape are relayed with any JSON payload. Any `sender` the client supplied
 * is dropped here.
 */
export const decodeInbound = (raw: unknown): InboundMessage => {
  let data = raw;
  if (typeof raw === 'string') {
    try {
      data = JSON.parse(raw);
    } catch {
      throw malformed('Invalid message format');
    }
  }

  if (!isRecord(data) || typeof data.type !== 'string' || data.type === '') {
    throw malformed('Invalid message format');
  }

  const { type, payload } = data;
  switch (type) {
    case 'authorization':
      if (typeof payload !== 'string' || payload.length === 0) {
        throw malformed('Authorization payload must be a token');
      }
      return { type, payload };
    case 'logout':
      return { type };
    case 'chat':
      if (typeof payload !== 'string') {
        throw malformed('Chat payload must be text');
      }
      return { type, payload };
    case 'item-created':
    case 'item-updated':
    case 'item-deleted':
      if (typeof payload !== 'string' && !isDomainPayload(payload)) {
        throw malformed(`${type} payload must be an object or an id`);
      }
      return { type, payload };
    default: {
      const value = payload === undefined ? null : payload;
      if (!isFieldValue(value)) {
        throw malformed(`${type} payload must be JSON data`);
      }
      return { type, payload: value };
    }
  }
};

const now = (): string => new Date().toISOString();

export const serverMessage = (
  type: 'notification' | 'error' | 'logout',
  payload: string
): OutboundMessage => ({ type, payload, sender: SERVER_SENDER, timestamp: now() });

export const stampMessage = (message: ForwardableMessage, sender: string): OutboundMessage => ({
  ...message,
  sender,
  timestamp: now()
});
