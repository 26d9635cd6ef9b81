import { Mutex } from './Mutex.js';

export interface RouteTarget {
  nodeId: string;
  role: string;
}

export interface Dispatch {
  position: number;
  target: RouteTarget;
}

/**
 * Round-robin over a routing table that may grow at runtime. The rotation index and
 * the table sit behind one mutex, shared by dispatch and by `addTarget`.
 */
export class CyclicDistributor {
  private index = 0;

  private readonly targets: RouteTarget[];

  private readonly lock = new Mutex();

  constructor(initialTargets: readonly RouteTarget[]) {
    if (initialTargets.length === 0) {
      throw new Error('CyclicDistributor needs at least one target');
    }
    this.targets = [...initialTargets];
  }

  distributeNext(): Promise<Dispatch> {
    return this.lock.runExclusive(() => {
      const position = (this.index % this.targets.length) + 1;
      this.index = position;
      const target = this.targets[position - 1];
      if (!target) {
        throw new Error(`Routing table has no entry at position ${position}`);
      }
      return { position, target };
    });
  }

  addTarget(target: RouteTarget): Promise<number> {
    return this.lock.runExclusive(() => {
      this.targets.push(target);
      return this.targets.length;
    });
  }

  get size(): number {
    return this.targets.length;
  }

  get rotationIndex(): number {
    return this.index;
  }

  snapshot(): RouteTarget[] {
    return this.targets.map((target) => ({ ...target }));
  }
}
