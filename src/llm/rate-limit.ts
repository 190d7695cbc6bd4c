/**
 * 模型调用限流：一分钟滑动窗口（进程内）
 */

import { RateLimitError } from "../errors.js";

const WINDOW_MS = 60_000;

export class SlidingWindowRateLimiter {
  private calls: number[] = [];

  constructor(
    private readonly limitPerMinute: number,
    private readonly now: () => number = Date.now
  ) {}

  /** 记录一次调用；超限抛 RateLimitError。limit 为 0 时不限流 */
  acquire(): void {
    if (this.limitPerMinute <= 0) return;
    const now = this.now();
    this.calls = this.calls.filter((t) => now - t < WINDOW_MS);
    if (this.calls.length >= this.limitPerMinute) {
      throw new RateLimitError(this.limitPerMinute, WINDOW_MS - (now - this.calls[0]));
    }
    this.calls.push(now);
  }
}
