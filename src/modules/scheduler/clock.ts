export type TimerHandle = { readonly id: number };

/**
 * Time source for the write scheduler. Swap in a manual clock to drive the
 * debounce window from tests without real delays.
 */
export interface Clock {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

/**
 * Clock backed by Node's timers. Timers are unref'd so a pending deferred write
 * never keeps the process alive; call `flush()` on shutdown instead.
 */
export function createSystemClock(): Clock {
  const timers = new Map<number, NodeJS.Timeout>();
  let nextId = 1;

  return {
    now: () => Date.now(),
    setTimeout(callback, delayMs) {
      const handle = { id: nextId++ };
      const timer = setTimeout(() => {
        timers.delete(handle.id);
        callback();
      }, delayMs);
      timer.unref();
      timers.set(handle.id, timer);
      return handle;
    },
    clearTimeout(handle) {
      const timer = timers.get(handle.id);
      if (timer) {
        clearTimeout(timer);
        timers.delete(handle.id);
      }
    },
  };
}

/**
 * Clock that only moves when told to. `advance()` fires every timer whose
 * deadline falls inside the advanced window, in deadline order.
 */
export class ManualClock implements Clock {
  private current: number;
  private nextId = 1;
  private timers = new Map<number, { deadline: number; callback: () => void }>();

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimeout(callback: () => void, delayMs: number): TimerHandle {
    const handle = { id: this.nextId++ };
    this.timers.set(handle.id, { deadline: this.current + delayMs, callback });
    return handle;
  }

  clearTimeout(handle: TimerHandle): void {
    this.timers.delete(handle.id);
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.nextDue(target);
      if (!due) break;
      this.timers.delete(due.id);
      this.current = due.deadline;
      due.callback();
    }
    this.current = target;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  private nextDue(limit: number): { id: number; deadline: number; callback: () => void } | null {
    let found: { id: number; deadline: number; callback: () => void } | null = null;
    for (const [id, timer] of this.timers) {
      if (timer.deadline > limit) continue;
      if (!found || timer.deadline < found.deadline) found = { id, ...timer };
    }
    return found;
  }
}
