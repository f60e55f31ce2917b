import { describeError } from './errors';
import { logErrorDedup } from './logger';
import { withTimeout } from './wait';

/**
 * What a tick may ask of the scheduler. `delayMs` replaces the regular interval
 * for the next tick only.
 */
export type TickResult = { delayMs: number } | void;

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  /** Delay before the next tick when `run` throws. Defaults to `intervalMs`. */
  errorDelayMs?: number;
  run: () => Promise<TickResult> | TickResult;
  onError?: (error: unknown) => void;
}

/**
 * Self-rescheduling timer. A tick never overlaps the previous one: the next timeout is
 * only armed after the current `run` settles.
 */
export class PeriodicTask {
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private running = false;

  constructor(private readonly options: PeriodicTaskOptions) {}

  get isRunning(): boolean {
    return this.running;
  }

  start({ immediate = true }: { immediate?: boolean } = {}) {
    if (this.running) return;
    this.running = true;
    this.schedule(immediate ? 0 : this.options.intervalMs);
  }

  /**
   * Stop scheduling new ticks and wait up to `graceMs` for one already running.
   */
  async stop(graceMs = 500): Promise<void> {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    if (this.inFlight) await withTimeout(this.inFlight, graceMs, undefined);
  }

  private schedule(delayMs: number) {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = undefined;
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let nextDelay = this.options.intervalMs;
    try {
      const result = await this.options.run();
      if (result) nextDelay = result.delayMs;
    } catch (error) {
      nextDelay = this.options.errorDelayMs ?? this.options.intervalMs;
      if (this.options.onError) {
        this.options.onError(error);
      } else {
        logErrorDedup(`task:${this.options.name}`, 10_000, `[${this.options.name}] Tick failed: ${describeError(error)}`);
      }
    }
    this.schedule(nextDelay);
  }
}
