/**
 * ScheduledDisruption - runs an invasive maintenance action on a cron schedule
 *
 * Subclasses supply runDisruption(). Each fire asks the optional slot guard
 * whether this node owns the tick, so that at most one cluster member runs
 * the action per scheduled time; without a guard every node runs it.
 *
 * States: idle → scheduled → running → scheduled ... ; cancelled is terminal.
 */

import { parseExpression } from 'cron-parser';
import { ScheduleValidationError } from '../errors';
import { TimerRegistry } from '../utils/TimerRegistry';
import { logger as defaultLogger, type Logger } from '../utils/logger';

/** Largest delay setTimeout accepts; longer waits are split. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type DisruptionState = 'idle' | 'scheduled' | 'running' | 'cancelled';

/**
 * Cross-process exclusion for one scheduled tick.
 * Resolves true on exactly one cluster member per tick.
 */
export interface DisruptionSlotGuard {
  tryAcquireSlot(tick: number): Promise<boolean>;
}

export interface ScheduledDisruptionConfig {
  /** Identifies the disruption in logs and timer IDs */
  name: string;
  /** Five fields, or six with leading seconds */
  cronExpression: string;
  /** IANA zone the expression is evaluated in. Default: local time */
  timezone?: string;
  slotGuard?: DisruptionSlotGuard;
  logger?: Logger;
  timers?: TimerRegistry;
  clock?: () => number;
}

export interface DisruptionStats {
  /** Ticks that fired while active */
  fired: number;
  /** Ticks the hook ran to completion */
  completed: number;
  /** Ticks another node owned */
  skipped: number;
  /** Ticks where the guard or the hook threw */
  failed: number;
}

export abstract class ScheduledDisruption {
  readonly name: string;
  readonly cronExpression: string;

  private readonly timezone?: string;
  private readonly slotGuard?: DisruptionSlotGuard;
  private readonly timers: TimerRegistry;
  private readonly clock: () => number;
  private readonly timerId: string;
  protected readonly logger: Logger;

  private state: DisruptionState = 'idle';
  private cancelRequested = false;
  private nextTick?: number;
  private inFlight?: Promise<void>;
  private stats: DisruptionStats = { fired: 0, completed: 0, skipped: 0, failed: 0 };

  /**
   * @throws ScheduleValidationError if the expression does not parse or never fires
   */
  constructor(config: ScheduledDisruptionConfig) {
    this.name = config.name;
    this.cronExpression = config.cronExpression;
    this.timezone = config.timezone;
    this.slotGuard = config.slotGuard;
    this.timers = config.timers ?? new TimerRegistry();
    this.clock = config.clock ?? (() => Date.now());
    this.timerId = `disruption-${config.name}`;
    this.logger = config.logger ?? defaultLogger.child({ component: 'ScheduledDisruption', disruption: config.name });

    try {
      this.computeNextFireTime(this.clock());
    } catch (err) {
      throw new ScheduleValidationError(config.cronExpression, err instanceof Error ? err.message : String(err));
    }
  }

  /**
   * The disruptive action itself.
   */
  protected abstract runDisruption(): void | Promise<void>;

  getState(): DisruptionState {
    return this.state;
  }

  /**
   * Epoch millis of the next fire, while scheduled.
   */
  getNextFireTime(): number | undefined {
    return this.state === 'scheduled' ? this.nextTick : undefined;
  }

  getStats(): DisruptionStats {
    return { ...this.stats };
  }

  /**
   * Arms the timer for the next fire time. Calling it again while active does nothing.
   */
  start(): void {
    if (this.state === 'cancelled') {
      throw new Error(`Disruption ${this.name} was cancelled and cannot be restarted`);
    }
    if (this.state !== 'idle') return;

    this.scheduleAfter(this.clock());
    this.logger.info({ cron: this.cronExpression, nextFireTime: this.nextTick }, 'Disruption scheduled');
  }

  /**
   * Stops scheduling. A run already in progress completes; the returned
   * promise resolves once it has.
   */
  async cancel(): Promise<void> {
    this.cancelRequested = true;
    this.timers.clearTimeout(this.timerId);
    if (this.state !== 'running') {
      this.state = 'cancelled';
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.state = 'cancelled';
    this.nextTick = undefined;
  }

  private computeNextFireTime(after: number): number {
    return parseExpression(this.cronExpression, {
      currentDate: new Date(after),
      tz: this.timezone,
    }).next().toDate().getTime();
  }

  private scheduleAfter(after: number): void {
    let tick: number;
    try {
      tick = this.computeNextFireTime(after);
    } catch (err) {
      this.logger.error({ err, cron: this.cronExpression }, 'No further fire time, disruption stopped');
      this.state = 'cancelled';
      return;
    }

    this.nextTick = tick;
    this.state = 'scheduled';
    this.arm(tick);
  }

  private arm(tick: number): void {
    const delay = Math.max(0, tick - this.clock());
    if (delay > MAX_TIMER_DELAY_MS) {
      this.timers.setTimeout(() => this.arm(tick), MAX_TIMER_DELAY_MS, this.timerId);
      return;
    }

    this.timers.setTimeout(() => {
      this.fire(tick).catch((err) => {
        this.logger.error({ err, tick }, 'Disruption fire failed');
      });
    }, delay, this.timerId);
  }

  private async fire(tick: number): Promise<void> {
    if (this.state !== 'scheduled' || this.cancelRequested) return;

    this.state = 'running';
    this.stats.fired++;
    const run = this.execute(tick);
    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = undefined;
    }

    if (this.cancelRequested) {
      this.state = 'cancelled';
      return;
    }
    // A timer that fires a little early must not land on the same tick again
    this.scheduleAfter(Math.max(this.clock(), tick));
  }

  private async execute(tick: number): Promise<void> {
    try {
      if (this.slotGuard && !(await this.slotGuard.tryAcquireSlot(tick))) {
        this.stats.skipped++;
        this.logger.debug({ tick }, 'Disruption slot owned by another node');
        return;
      }
      if (this.cancelRequested) return;

      this.logger.info({ tick }, 'Running scheduled disruption');
      await this.runDisruption();
      this.stats.completed++;
    } catch (err) {
      this.stats.failed++;
      this.logger.error({ err, tick }, 'Scheduled disruption failed');
    }
  }
}
