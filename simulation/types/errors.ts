export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class CapacityExceededError extends Error {
  readonly owner: string;

  readonly capacity: number | undefined;

  constructor(owner: string, capacity: number | undefined, detail?: string) {
    super(`${owner} queue is at capacity${capacity === undefined ? '' : ` (${capacity})`}${detail ? `: ${detail}` : ''}`);
    this.name = 'CapacityExceededError';
    this.owner = owner;
    this.capacity = capacity;
  }
}

export type UnavailableReason = 'unreachable' | 'rejected' | 'no_ack' | 'unknown_address';

export class UnavailablePeerError extends Error {
  readonly peerId: string;

  readonly reason: UnavailableReason;

  constructor(peerId: string, reason: UnavailableReason, options?: { cause?: unknown }) {
    super(`Peer ${peerId} unavailable (${reason})`, options);
    this.name = 'UnavailablePeerError';
    this.peerId = peerId;
    this.reason = reason;
  }
}
