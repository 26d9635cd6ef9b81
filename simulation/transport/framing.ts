import type { WireMessage } from '../types/pipeline.js';
import { TransportError } from '../types/errors.js';
import { isWireMessage } from './guards.js';

export const LENGTH_PREFIX_BYTES = 4;

export const MAX_LENGTH_PREFIX = 0xffffffff;

export function encodeFrame(message: WireMessage): Buffer {
  const payload = Buffer.from(JSON.stringify(message), 'utf8');
  if (payload.length > MAX_LENGTH_PREFIX) {
    throw new TransportError(`Payload of ${payload.length} bytes does not fit the length prefix`);
  }
  const prefix = Buffer.alloc(LENGTH_PREFIX_BYTES);
  prefix.writeUInt32BE(payload.length, 0);
  return Buffer.concat([prefix, payload]);
}

export function decodePayload(payload: Buffer): WireMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString('utf8'));
  } catch (err) {
    throw new TransportError('Frame payload is not valid JSON', { cause: err });
  }
  if (!isWireMessage(parsed)) {
    throw new TransportError('Frame payload is not a recognised message');
  }
  return parsed;
}

/**
 * Reassembles length-prefixed frames from arbitrarily chunked stream data.
 * `push` returns every payload completed by the chunk, in arrival order.
 */
export class FrameDecoder {
  private buffered: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number) {}

  push(chunk: Buffer): Buffer[] {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    const payloads: Buffer[] = [];

    while (this.buffered.length >= LENGTH_PREFIX_BYTES) {
      const length = this.buffered.readUInt32BE(0);
      if (length > this.maxFrameBytes) {
        throw new TransportError(`Declared frame length ${length} exceeds limit ${this.maxFrameBytes}`);
      }
      const end = LENGTH_PREFIX_BYTES + length;
      if (this.buffered.length < end) {
        break;
      }
      payloads.push(this.buffered.subarray(LENGTH_PREFIX_BYTES, end));
      this.buffered = this.buffered.subarray(end);
    }

    return payloads;
  }

  get pendingBytes(): number {
    return this.buffered.length;
  }
}
