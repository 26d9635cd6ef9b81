import type { PipelineRequest } from '../types/pipeline.js';
import { CapacityExceededError } from '../types/errors.js';
import type { Clock } from '../utils/random.js';

export interface QueueEntry {
  request: PipelineRequest;
  enqueuedAt: number;
}

export class BoundedFifo<T> {
  private items: T[] = [];

  constructor(
    readonly owner: string,
    readonly capacity: number,
  ) {
    if (capacity <= 0) {
      throw new Error('Queue capacity must be positive');
    }
  }

  push(item: T): void {
    if (this.isFull()) {
      throw new CapacityExceededError(this.owner, this.capacity);
    }
    this.items.push(item);
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  get length(): number {
    return this.items.length;
  }
}

/**
 * One FIFO per priority level. `dequeueNext` scans levels from highest to lowest
 * and takes the oldest entry of the first non-empty one, so a lower priority never
 * leaves while a higher one waits.
 */
export class PriorityQueueEngine {
  private readonly levels = new Map<number, BoundedFifo<QueueEntry>>();

  private readonly scanOrder: number[];

  constructor(
    owner: string,
    maxLengthPerLevel: number,
    priorities: readonly number[] = [1, 2, 3],
    private readonly now: Clock = Date.now,
  ) {
    this.scanOrder = [...new Set(priorities)].sort((a, b) => b - a);
    for (const priority of this.scanOrder) {
      this.levels.set(priority, new BoundedFifo<QueueEntry>(`${owner}/p${priority}`, maxLengthPerLevel));
    }
  }

  enqueue(request: PipelineRequest): QueueEntry {
    const level = this.levels.get(request.priority);
    if (!level) {
      throw new RangeError(`No queue for priority ${request.priority}`);
    }
    const entry: QueueEntry = { request, enqueuedAt: this.now() };
    level.push(entry);
    return entry;
  }

  dequeueNext(): QueueEntry | null {
    for (const priority of this.scanOrder) {
      const entry = this.levels.get(priority)?.shift();
      if (entry) {
        return entry;
      }
    }
    return null;
  }

  size(): number {
    let total = 0;
    for (const level of this.levels.values()) {
      total += level.length;
    }
    return total;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  sizeByPriority(): Record<string, number> {
    const sizes: Record<string, number> = {};
    for (const priority of this.scanOrder) {
      sizes[String(priority)] = this.levels.get(priority)?.length ?? 0;
    }
    return sizes;
  }
}
