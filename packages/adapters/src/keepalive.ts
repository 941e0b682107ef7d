/**
 * Liveness signal for an idle agent connection.
 *
 * Checks on a fixed tick and sends once nothing has gone out for
 * `intervalMs`. Never fires while `isSuppressed()` is true, so it cannot
 * land inside a turn's response window.
 */

export interface KeepAliveOptions {
  intervalMs: number;
  /** How often to check; defaults to min(1000, intervalMs) */
  tickMs?: number;
  send: () => void;
  /** performance.now() of the last frame sent on the channel */
  lastSentAt: () => number | null;
  isSuppressed: () => boolean;
  onError?: (err: unknown) => void;
}

export class KeepAliveTimer {
  private timer: ReturnType<typeof setInterval> | null = null;
  private sentCount = 0;
  private opts: KeepAliveOptions;
  private startedAt = 0;

  constructor(opts: KeepAliveOptions) {
    this.opts = opts;
  }

  get count(): number {
    return this.sentCount;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.startedAt = performance.now();
    const tickMs = this.opts.tickMs ?? Math.min(1000, this.opts.intervalMs);
    this.timer = setInterval(() => this.tick(), tickMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private tick(): void {
    if (this.opts.isSuppressed()) return;

    const last = this.opts.lastSentAt() ?? this.startedAt;
    if (performance.now() - last < this.opts.intervalMs) return;

    try {
      this.opts.send();
      this.sentCount++;
    } catch (err) {
      // Socket is gone; the session's disconnect handling takes it from here
      this.stop();
      this.opts.onError?.(err);
    }
  }
}
