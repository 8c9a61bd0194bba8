import { Wakeup } from "../util/wakeup.js";

/**
 * Pluggable idle policy for the acquisition loop. `suspend` may hold the loop,
 * `resume` must release a pending `suspend` from any caller, and `reset` is
 * called after a cycle that acquired work.
 */
export interface ClientBackoffStrategy {
  suspend(): Promise<void> | void;
  resume(): void;
  reset(): void;
}

export interface ExponentialBackoffOptions {
  initTime?: number;
  factor?: number;
  maxTime?: number;
}

export class ExponentialBackoffStrategy implements ClientBackoffStrategy {
  readonly initTime: number;
  readonly factor: number;
  readonly maxTime: number;
  private level = 0;
  private readonly wakeup = new Wakeup();

  constructor(options: ExponentialBackoffOptions = {}) {
    this.initTime = Math.max(0, options.initTime ?? 500);
    this.factor = Math.max(1, options.factor ?? 2);
    this.maxTime = Math.max(this.initTime, options.maxTime ?? 60_000);
  }

  /** Delay the next `suspend()` will wait for. */
  calculateBackoffTime(level = this.level): number {
    if (level <= 0) return 0;
    return Math.min(this.initTime * this.factor ** (level - 1), this.maxTime);
  }

  async suspend(): Promise<void> {
    this.level++;
    const waitMs = this.calculateBackoffTime();
    if (waitMs > 0) await this.wakeup.wait(waitMs);
  }

  resume(): void {
    this.wakeup.notify();
  }

  reset(): void {
    this.level = 0;
  }

  get currentLevel(): number {
    return this.level;
  }
}
