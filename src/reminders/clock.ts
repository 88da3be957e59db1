export type TimerHandle = { cancel(): void };

export interface SchedulerClock {
  now(): number;
  setTimer(delayMs: number, fn: () => void): TimerHandle;
}

// setTimeout overflows above 2^31-1 ms (about 24.8 days) and fires at once.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const systemClock: SchedulerClock = {
  now: () => Date.now(),
  setTimer(delayMs, fn) {
    let timer: NodeJS.Timeout | undefined;
    const dueAt = Date.now() + Math.max(0, delayMs);
    const arm = () => {
      const remaining = dueAt - Date.now();
      if (remaining > MAX_TIMEOUT_MS) {
        timer = setTimeout(arm, MAX_TIMEOUT_MS);
        return;
      }
      timer = setTimeout(fn, Math.max(0, remaining));
    };
    arm();
    return {
      cancel() {
        if (timer) clearTimeout(timer);
        timer = undefined;
      }
    };
  }
};

type PendingTimer = { id: number; dueAt: number; fn: () => void };

/** Clock whose time only moves when `advance` is called; due timers run in due order. */
export class ManualClock implements SchedulerClock {
  private current: number;
  private seq = 0;
  private timers = new Map<number, PendingTimer>();

  constructor(startMs: number) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  setTimer(delayMs: number, fn: () => void): TimerHandle {
    const id = ++this.seq;
    this.timers.set(id, { id, dueAt: this.current + Math.max(0, delayMs), fn });
    return { cancel: () => void this.timers.delete(id) };
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const next = [...this.timers.values()]
        .filter((t) => t.dueAt <= target)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!next) break;
      this.timers.delete(next.id);
      this.current = next.dueAt;
      next.fn();
    }
    this.current = target;
  }
}
