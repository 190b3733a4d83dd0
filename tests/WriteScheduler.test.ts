import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { ManualClock, WriteScheduler } from '../src/modules/scheduler';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('WriteScheduler', () => {
  let clock: ManualClock;
  let onFire: Mock<() => Promise<void>>;
  let onError: Mock<(error: unknown) => void>;
  let scheduler: WriteScheduler;

  beforeEach(() => {
    clock = new ManualClock(1_000);
    onFire = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    onError = vi.fn<(error: unknown) => void>();
    scheduler = new WriteScheduler({ clock, debounceMs: 500, onFire, onError });
  });

  it('starts idle', () => {
    expect(scheduler.state).toEqual({ phase: 'idle' });
    expect(scheduler.debounceMs).toBe(500);
  });

  it('schedule arms the timer with a deadline', () => {
    scheduler.schedule();
    expect(scheduler.state).toEqual({ phase: 'scheduled', deadline: 1_500 });
    expect(clock.pendingTimers).toBe(1);
  });

  it('fires once the debounce window elapses', async () => {
    scheduler.schedule();
    clock.advance(499);
    expect(onFire).not.toHaveBeenCalled();

    clock.advance(1);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(scheduler.state).toEqual({ phase: 'firing' });

    await tick();
    expect(scheduler.state).toEqual({ phase: 'idle' });
  });

  it('a new schedule pushes the deadline back', () => {
    scheduler.schedule();
    clock.advance(400);
    scheduler.schedule();
    expect(scheduler.state).toEqual({ phase: 'scheduled', deadline: 1_900 });
    expect(clock.pendingTimers).toBe(1);

    clock.advance(400);
    expect(onFire).not.toHaveBeenCalled();
    clock.advance(100);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('coalesces a burst of schedules into one fire', () => {
    for (let i = 0; i < 10; i++) {
      scheduler.schedule();
      clock.advance(50);
    }
    clock.advance(1_000);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('cancel drops a pending write', () => {
    scheduler.schedule();
    expect(scheduler.cancel()).toBe(true);
    expect(scheduler.state).toEqual({ phase: 'idle' });

    clock.advance(1_000);
    expect(onFire).not.toHaveBeenCalled();
  });

  it('cancel with nothing pending returns false', () => {
    expect(scheduler.cancel()).toBe(false);
  });

  it('a schedule during firing survives the end of that write', async () => {
    let finish: () => void = () => {};
    onFire.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );

    scheduler.schedule();
    clock.advance(500);
    expect(scheduler.state).toEqual({ phase: 'firing' });

    scheduler.schedule();
    finish();
    await tick();

    expect(scheduler.state).toEqual({ phase: 'scheduled', deadline: 2_000 });
    clock.advance(500);
    expect(onFire).toHaveBeenCalledTimes(2);
  });

  it('reports a rejected write and returns to idle', async () => {
    const failure = new Error('disk gone');
    onFire.mockRejectedValueOnce(failure);

    scheduler.schedule();
    clock.advance(500);
    await tick();

    expect(onError).toHaveBeenCalledWith(failure);
    expect(scheduler.state).toEqual({ phase: 'idle' });
  });

  it('stop cancels and ignores later schedules', () => {
    scheduler.schedule();
    scheduler.stop();
    scheduler.schedule();

    expect(scheduler.state).toEqual({ phase: 'idle' });
    expect(clock.pendingTimers).toBe(0);
    clock.advance(1_000);
    expect(onFire).not.toHaveBeenCalled();
  });
});

describe('ManualClock', () => {
  it('fires due timers in deadline order and leaves later ones pending', () => {
    const clock = new ManualClock();
    const fired: string[] = [];
    clock.setTimeout(() => fired.push('b'), 200);
    clock.setTimeout(() => fired.push('a'), 100);
    clock.setTimeout(() => fired.push('c'), 300);

    clock.advance(250);

    expect(fired).toEqual(['a', 'b']);
    expect(clock.now()).toBe(250);
    expect(clock.pendingTimers).toBe(1);
  });

  it('fires timers armed by a callback inside the same window', () => {
    const clock = new ManualClock();
    const fired: number[] = [];
    clock.setTimeout(() => {
      fired.push(clock.now());
      clock.setTimeout(() => fired.push(clock.now()), 50);
    }, 100);

    clock.advance(200);

    expect(fired).toEqual([100, 150]);
  });
});
