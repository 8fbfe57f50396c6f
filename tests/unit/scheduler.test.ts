import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { timerScheduler } from "../../core/src/scheduler.js";

describe("timerScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("every", () => {
    it("repeats until cancelled", () => {
      const callback = vi.fn();
      const handle = timerScheduler.every(1000, callback);

      vi.advanceTimersByTime(3500);
      expect(callback).toHaveBeenCalledTimes(3);

      handle.cancel();
      expect(handle.cancelled).toBe(true);
      vi.advanceTimersByTime(5000);
      expect(callback).toHaveBeenCalledTimes(3);
    });

    it("stops when cancelled from inside the callback", () => {
      let calls = 0;
      const handle = timerScheduler.every(100, () => {
        calls++;
        handle.cancel();
      });

      vi.advanceTimersByTime(1000);
      expect(calls).toBe(1);
    });
  });

  describe("after", () => {
    it("runs once after the delay", () => {
      const callback = vi.fn();
      const handle = timerScheduler.after(1000, callback);

      vi.advanceTimersByTime(999);
      expect(callback).not.toHaveBeenCalled();
      expect(handle.cancelled).toBe(false);

      vi.advanceTimersByTime(1);
      expect(callback).toHaveBeenCalledTimes(1);
      expect(handle.cancelled).toBe(true);
    });

    it("never runs when cancelled first", () => {
      const callback = vi.fn();
      const handle = timerScheduler.after(1000, callback);

      handle.cancel();
      handle.cancel();
      vi.advanceTimersByTime(2000);

      expect(callback).not.toHaveBeenCalled();
    });
  });
});
