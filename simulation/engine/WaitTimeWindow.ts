/** Fixed-capacity ring of the most recent wait-time samples. */
export class WaitTimeWindow {
  private readonly buffer: number[];

  private start = 0;

  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError('Window capacity must be a positive integer');
    }
    this.buffer = new Array<number>(capacity).fill(0);
  }

  push(sampleMs: number): void {
    if (this.count < this.capacity) {
      this.buffer[(this.start + this.count) % this.capacity] = sampleMs;
      this.count += 1;
      return;
    }
    this.buffer[this.start] = sampleMs;
    this.start = (this.start + 1) % this.capacity;
  }

  pushAll(samplesMs: readonly number[]): void {
    for (const sample of samplesMs) {
      this.push(sample);
    }
  }

  samples(): number[] {
    const ordered: number[] = [];
    for (let i = 0; i < this.count; i += 1) {
      ordered.push(this.buffer[(this.start + i) % this.capacity] ?? 0);
    }
    return ordered;
  }

  average(): number {
    if (this.count === 0) {
      return 0;
    }
    return this.samples().reduce((sum, sample) => sum + sample, 0) / this.count;
  }

  get size(): number {
    return this.count;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }
}
