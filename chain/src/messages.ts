import type { PeerMessage } from './types.js';
import {
  isRecord,
  validateBlock,
  validateChainResponse,
  validateTransaction,
  ValidationError,
} from './validation.js';

/** Upper bound on one framed message; a full chain travels in a single frame. */
export const MAX_MESSAGE_BYTES = 16 * 1024 * 1024;

export function encodeMessage(message: PeerMessage): Uint8Array {
  if (message.type === 'UNKNOWN') {
    throw new ValidationError(`Refusing to encode message of unknown type '${message.rawType}'`);
  }
  return new TextEncoder().encode(JSON.stringify(message));
}

/**
 * Decodes one wire message into the {@link PeerMessage} union. Unrecognized
 * `type` values decode to `UNKNOWN` rather than failing.
 * @throws ValidationError on malformed JSON or a payload of the wrong shape
 */
export function decodeMessage(bytes: Uint8Array): PeerMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    throw new ValidationError(`Malformed message JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(raw)) {
    throw new ValidationError('Message is not an object');
  }

  const { type, payload, senderHost, senderPort, relayed } = raw;
  if (typeof type !== 'string') {
    throw new ValidationError('Message missing type');
  }

  const envelope = {
    ...(typeof senderHost === 'string' && senderHost ? { senderHost } : {}),
    ...(typeof senderPort === 'number' && Number.isInteger(senderPort) ? { senderPort } : {}),
    ...(relayed === true ? { relayed } : {}),
  };

  switch (type) {
    case 'NEW_BLOCK':
      validateBlock(payload);
      return { ...envelope, type: 'NEW_BLOCK', payload };
    case 'NEW_TRANSACTION':
      validateTransaction(payload);
      return { ...envelope, type: 'NEW_TRANSACTION', payload };
    case 'REQUEST_CHAIN':
      if (envelope.senderHost === undefined || envelope.senderPort === undefined) {
        throw new ValidationError('REQUEST_CHAIN missing senderHost/senderPort');
      }
      return { ...envelope, type: 'REQUEST_CHAIN', senderHost: envelope.senderHost, senderPort: envelope.senderPort };
    case 'RESPOND_CHAIN':
      validateChainResponse(payload);
      return { ...envelope, type: 'RESPOND_CHAIN', payload };
    default:
      return { ...envelope, type: 'UNKNOWN', rawType: type };
  }
}
