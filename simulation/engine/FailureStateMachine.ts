import type { Availability } from '../types/pipeline.js';
import type { FailureConfig } from '../types/config.js';
import { uniformBetween, type Clock, type RandomSource } from '../utils/random.js';

export interface FailureWindow {
  failedAt: number;
  recoverAt: number;
  injected: boolean;
}

export type AvailabilityTransition = 'failed' | 'recovered' | null;

/**
 * AVAILABLE/FAILED model owned by a single second-tier node. Recovery is
 * autonomous: every read of the state first retires an expired failure window.
 */
export class FailureStateMachine {
  private state: Availability = 'AVAILABLE';

  private current: FailureWindow | null = null;

  private readonly windows: FailureWindow[] = [];

  constructor(
    private readonly config: FailureConfig,
    private readonly random: RandomSource = Math.random,
    private readonly now: Clock = Date.now,
  ) {
    if (config.recoveryMinMs > config.recoveryMaxMs) {
      throw new RangeError('recoveryMinMs must not exceed recoveryMaxMs');
    }
  }

  // Periodic self-check. A FAILED node never re-rolls, so windows cannot overlap.
  check(at: number = this.now()): AvailabilityTransition {
    if (this.recoverIfDue(at)) {
      return 'recovered';
    }
    if (this.state === 'FAILED') {
      return null;
    }
    if (this.random() < this.config.probability) {
      const duration = uniformBetween(this.config.recoveryMinMs, this.config.recoveryMaxMs, this.random);
      this.enterFailure(at, at + duration, false);
      return 'failed';
    }
    return null;
  }

  isAvailable(at: number = this.now()): boolean {
    this.recoverIfDue(at);
    return this.state === 'AVAILABLE';
  }

  // Fault injection. While already FAILED the open window is extended instead of a second one opening.
  forceFailure(durationMs: number, at: number = this.now()): FailureWindow {
    this.recoverIfDue(at);
    if (this.current) {
      this.current.recoverAt = Math.max(this.current.recoverAt, at + durationMs);
      return { ...this.current };
    }
    return { ...this.enterFailure(at, at + durationMs, true) };
  }

  availability(at: number = this.now()): Availability {
    this.recoverIfDue(at);
    return this.state;
  }

  get recoveryDeadline(): number | null {
    return this.current?.recoverAt ?? null;
  }

  get history(): readonly FailureWindow[] {
    return this.windows;
  }

  private enterFailure(failedAt: number, recoverAt: number, injected: boolean): FailureWindow {
    const window: FailureWindow = { failedAt, recoverAt, injected };
    this.state = 'FAILED';
    this.current = window;
    this.windows.push(window);
    return window;
  }

  private recoverIfDue(at: number): boolean {
    if (this.state === 'FAILED' && this.current && at >= this.current.recoverAt) {
      this.state = 'AVAILABLE';
      this.current = null;
      return true;
    }
    return false;
  }
}
