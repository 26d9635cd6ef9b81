import type { NodeAddress } from '../types/pipeline.js';
import type { ScalingConfig } from '../types/config.js';
import { createLogger, type Logger } from '../utils/log.js';
import { describeError, type Clock } from '../utils/random.js';
import type { CyclicDistributor } from './CyclicDistributor.js';
import { Mutex } from './Mutex.js';
import { WaitTimeWindow } from './WaitTimeWindow.js';

export interface InstanceSpawner {
  spawn(role: string, instanceId: string, ordinal: number): Promise<NodeAddress>;
}

export interface ScaleEvent {
  role: string;
  instanceId: string;
  triggeredBy: string;
  averageWaitMs: number;
  instanceCount: number;
  at: number;
}

interface RoleState {
  role: string;
  lock: Mutex;
  windows: Map<string, WaitTimeWindow>;
}

export function instanceIdFor(role: string, ordinal: number): string {
  return ordinal === 1 ? role : `${role}#${ordinal}`;
}

/**
 * Scale-up loop for first-tier roles. Each instance keeps its own rolling window,
 * so one overloaded instance is not averaged away by idle newcomers. A tick adds at
 * most one instance per role.
 */
export class ScalingController {
  private readonly roles = new Map<string, RoleState>();

  private readonly roleByInstance = new Map<string, string>();

  private readonly events: ScaleEvent[] = [];

  private timer: ReturnType<typeof setInterval> | undefined;

  private inFlight: Promise<ScaleEvent[]> | null = null;

  private stopped = false;

  private readonly log: Logger;

  constructor(
    private readonly config: ScalingConfig,
    private readonly distributor: CyclicDistributor,
    private readonly spawner: InstanceSpawner,
    private readonly now: Clock = Date.now,
    scope = 'scaling',
  ) {
    this.log = createLogger(scope);
  }

  get threshold(): number {
    return this.config.waitThresholdMs * this.config.scaleUpFactor;
  }

  registerRole(role: string, initialInstanceId: string = role): void {
    if (this.roles.has(role)) {
      return;
    }
    const windows = new Map<string, WaitTimeWindow>();
    windows.set(initialInstanceId, new WaitTimeWindow(this.config.windowSize));
    this.roles.set(role, { role, lock: new Mutex(), windows });
    this.roleByInstance.set(initialInstanceId, role);
  }

  async recordSamples(instanceId: string, samplesMs: readonly number[]): Promise<boolean> {
    const role = this.roleByInstance.get(instanceId);
    const state = role ? this.roles.get(role) : undefined;
    if (!state) {
      return false;
    }
    await state.lock.runExclusive(() => {
      state.windows.get(instanceId)?.pushAll(samplesMs);
    });
    return true;
  }

  tick(): Promise<ScaleEvent[]> {
    if (this.inFlight || this.stopped) {
      return Promise.resolve([]);
    }
    const run = this.evaluateRoles().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => this.log.error(`tick failed: ${describeError(err)}`));
    }, this.config.intervalMs);
  }

  // Resolves once a tick already under way has finished; no spawn starts after this is called.
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight.catch((err: unknown) => this.log.error(`tick failed during stop: ${describeError(err)}`));
    }
  }

  instanceCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [role, state] of this.roles) {
      counts[role] = state.windows.size;
    }
    return counts;
  }

  averages(role: string): Record<string, number> {
    const result: Record<string, number> = {};
    const windows = this.roles.get(role)?.windows;
    if (!windows) {
      return result;
    }
    for (const [instanceId, window] of windows) {
      result[instanceId] = window.average();
    }
    return result;
  }

  history(): readonly ScaleEvent[] {
    return this.events;
  }

  private async evaluateRoles(): Promise<ScaleEvent[]> {
    const added: ScaleEvent[] = [];
    for (const state of this.roles.values()) {
      const event = await state.lock.runExclusive(() => this.evaluateRole(state));
      if (event) added.push(event);
    }
    return added;
  }

  private async evaluateRole(state: RoleState): Promise<ScaleEvent | null> {
    let worstInstance: string | null = null;
    let worstAverage = 0;
    for (const [instanceId, window] of state.windows) {
      const average = window.average();
      if (window.size > 0 && average > worstAverage) {
        worstAverage = average;
        worstInstance = instanceId;
      }
    }

    if (this.stopped || worstInstance === null || worstAverage <= this.threshold) {
      return null;
    }
    if (state.windows.size >= this.config.maxInstances) {
      this.log.warn(`${state.role} at max capacity (${state.windows.size} instances), avg wait ${worstAverage.toFixed(0)}ms`);
      return null;
    }

    const ordinal = state.windows.size + 1;
    const instanceId = instanceIdFor(state.role, ordinal);
    this.log.warn(`scaling up ${state.role}: ${worstInstance} avg wait ${worstAverage.toFixed(0)}ms, starting ${instanceId}`);

    try {
      const address = await this.spawner.spawn(state.role, instanceId, ordinal);
      state.windows.set(instanceId, new WaitTimeWindow(this.config.windowSize));
      this.roleByInstance.set(instanceId, state.role);
      const tableSize = await this.distributor.addTarget({ nodeId: instanceId, role: state.role });
      this.log.info(`${instanceId} online at ${address.host}:${address.port}, routing table size ${tableSize}`);
    } catch (err) {
      this.log.error(`failed to scale up ${state.role}: ${describeError(err)}`);
      return null;
    }

    const event: ScaleEvent = {
      role: state.role,
      instanceId,
      triggeredBy: worstInstance,
      averageWaitMs: worstAverage,
      instanceCount: state.windows.size,
      at: this.now(),
    };
    this.events.push(event);
    return event;
  }
}
