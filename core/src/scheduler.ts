/**
 * Scheduler: timer handles with explicit cancellation.
 *
 * The session controller never calls setInterval/setTimeout directly;
 * it asks a Scheduler and keeps the returned handle so a restart or a
 * submit can cancel whatever is pending.
 */

export interface CancelHandle {
  cancel(): void;
  readonly cancelled: boolean;
}

export interface Scheduler {
  /** Run `callback` every `intervalMs` until cancelled */
  every(intervalMs: number, callback: () => void): CancelHandle;
  /** Run `callback` once after `delayMs` unless cancelled first */
  after(delayMs: number, callback: () => void): CancelHandle;
}

class TimerHandle implements CancelHandle {
  private _cancelled = false;

  constructor(private readonly clear: () => void) {}

  get cancelled(): boolean {
    return this._cancelled;
  }

  cancel(): void {
    if (this._cancelled) return;
    this._cancelled = true;
    this.clear();
  }
}

/** Scheduler backed by the runtime's timers */
export const timerScheduler: Scheduler = {
  every(intervalMs, callback) {
    let handle: TimerHandle | null = null;
    const interval = setInterval(() => {
      if (!handle?.cancelled) callback();
    }, intervalMs);
    handle = new TimerHandle(() => clearInterval(interval));
    return handle;
  },

  after(delayMs, callback) {
    let handle: TimerHandle | null = null;
    const timeout = setTimeout(() => {
      if (handle?.cancelled) return;
      handle?.cancel();
      callback();
    }, delayMs);
    handle = new TimerHandle(() => clearTimeout(timeout));
    return handle;
  },
};
