import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { KeepAliveTimer } from "../keepalive.js";

describe("KeepAliveTimer", () => {
  let lastSent: number | null;
  let suppressed: boolean;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval", "setTimeout", "clearTimeout", "performance"] });
    lastSent = null;
    suppressed = false;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createTimer(send = vi.fn(() => { lastSent = performance.now(); })) {
    const timer = new KeepAliveTimer({
      intervalMs: 7000,
      send,
      lastSentAt: () => lastSent,
      isSuppressed: () => suppressed,
    });
    return { timer, send };
  }

  it("sends once the connection has been idle for the interval", () => {
    const { timer, send } = createTimer();
    timer.start();

    vi.advanceTimersByTime(6000);
    expect(send).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1000);
    expect(send).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(7000);
    expect(send).toHaveBeenCalledTimes(2);
    expect(timer.count).toBe(2);
    timer.stop();
  });

  it("waits a full interval after any other client message", () => {
    const { timer, send } = createTimer();
    timer.start();

    vi.advanceTimersByTime(5000);
    lastSent = performance.now();
    vi.advanceTimersByTime(5000);
    expect(send).not.toHaveBeenCalled();

    vi.advanceTimersByTime(2000);
    expect(send).toHaveBeenCalledTimes(1);
    timer.stop();
  });

  it("never fires while suppressed", () => {
    const { timer, send } = createTimer();
    timer.start();
    suppressed = true;

    vi.advanceTimersByTime(30_000);
    expect(send).not.toHaveBeenCalled();

    suppressed = false;
    vi.advanceTimersByTime(1000);
    expect(send).toHaveBeenCalledTimes(1);
    timer.stop();
  });

  it("stops and reports when sending fails", () => {
    const onError = vi.fn();
    const timer = new KeepAliveTimer({
      intervalMs: 7000,
      send: () => {
        throw new Error("socket closed");
      },
      lastSentAt: () => null,
      isSuppressed: () => false,
      onError,
    });
    timer.start();

    vi.advanceTimersByTime(7000);
    expect(timer.running).toBe(false);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(timer.count).toBe(0);
  });

  it("stop() cancels further checks", () => {
    const { timer, send } = createTimer();
    timer.start();
    timer.stop();
    vi.advanceTimersByTime(20_000);
    expect(send).not.toHaveBeenCalled();
  });
});
