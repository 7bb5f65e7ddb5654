/**
 * Timer Lifecycle Guard
 *
 * Holds at most one pending timeout; set() always clears the previous one.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('send-timeout');
 * guard.set(() => socket.destroy(), timeoutMs);
 * // Later...
 * guard.clear();
 * ```
 */

export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;

  constructor(name = 'anonymous') {
    this.name = name;
  }

  /**
   * Set a new timer, clearing any existing one first.
   */
  set(callback: () => void, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
    this.timer.unref();
  }

  /**
   * Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }
}
