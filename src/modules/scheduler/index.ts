import type { Clock, TimerHandle } from './clock';

export { type Clock, createSystemClock, ManualClock, type TimerHandle } from './clock';

export const DEFAULT_DEBOUNCE_MS = 500;

export type SchedulerState =
  | { phase: 'idle' }
  | { phase: 'scheduled'; deadline: number }
  | { phase: 'firing' };

export interface WriteSchedulerConfig {
  clock: Clock;
  /** Quiet period before a deferred write fires. Defaults to 500 ms. */
  debounceMs?: number;
  /** The durable write. Runs when the timer elapses uncancelled. */
  onFire: () => Promise<void>;
  /** Receives a rejection from `onFire`. */
  onError: (error: unknown) => void;
}

/**
 * Debounce state machine for deferred writes: `idle → scheduled → firing → idle`.
 *
 * Every transition happens synchronously on the event loop, so a `schedule()`
 * or `cancel()` either sees the timer still armed or already fired, never an
 * in-between state. A write that has started firing is not cancellable.
 */
export class WriteScheduler {
  private readonly clock: Clock;
  private readonly onFire: () => Promise<void>;
  private readonly onError: (error: unknown) => void;
  readonly debounceMs: number;

  private _state: SchedulerState = { phase: 'idle' };
  private timer: TimerHandle | null = null;
  private stopped = false;

  constructor(config: WriteSchedulerConfig) {
    this.clock = config.clock;
    this.onFire = config.onFire;
    this.onError = config.onError;
    this.debounceMs = config.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  get state(): SchedulerState {
    return { ...this._state };
  }

  /**
   * Arms the timer, or pushes an armed timer's deadline to now + debounce.
   * Only the state at fire time gets written.
   */
  schedule(): void {
    if (this.stopped) return;
    if (this.timer) this.clock.clearTimeout(this.timer);
    const deadline = this.clock.now() + this.debounceMs;
    this.timer = this.clock.setTimeout(() => this.fire(), this.debounceMs);
    this._state = { phase: 'scheduled', deadline };
  }

  /** Drops a scheduled write. Returns whether one was pending. */
  cancel(): boolean {
    if (!this.timer) return false;
    this.clock.clearTimeout(this.timer);
    this.timer = null;
    if (this._state.phase === 'scheduled') this._state = { phase: 'idle' };
    return true;
  }

  /** Cancels any pending write and refuses new ones. */
  stop(): void {
    this.cancel();
    this.stopped = true;
  }

  private fire(): void {
    this.timer = null;
    this._state = { phase: 'firing' };
    const settle = (): void => {
      // A schedule() during the write has already moved the state on.
      if (this._state.phase === 'firing') this._state = { phase: 'idle' };
    };
    void this.onFire().then(settle, (error: unknown) => {
      settle();
      this.onError(error);
    });
  }
}
