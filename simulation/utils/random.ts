export type RandomSource = () => number;

export type Clock = () => number;

export function uniformBetween(minMs: number, maxMs: number, random: RandomSource = Math.random): number {
  if (maxMs <= minMs) {
    return minMs;
  }
  return minMs + random() * (maxMs - minMs);
}

export function createRequestId(clientId: string, sequence: number, now: number): string {
  return `${clientId}_${sequence}_${now}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
