import type { NodeKind, NodeSnapshot, SystemSnapshot } from '../simulation/types/pipeline.js';

export type { NodeKind, NodeSnapshot, SystemSnapshot };

export interface FailureInjectionPayload {
  durationMs: number;
}

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function isFailureInjectionPayload(value: unknown): value is FailureInjectionPayload {
  if (!value || typeof value !== 'object' || !('durationMs' in value)) return false;
  const { durationMs } = value;
  return typeof durationMs === 'number' && Number.isFinite(durationMs) && durationMs > 0;
}
