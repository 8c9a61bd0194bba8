import type { Logger } from "../logger.js";
import { isolate, isolateSync } from "../util/isolate.js";
import type { ClientBackoffStrategy } from "./exponential-backoff.js";

/**
 * Drives the installed backoff strategy from the acquisition loop. Every call into
 * the strategy is isolated: a failing strategy is logged and treated as a no-op.
 *
 * A resume that arrives while no suspend is pending is remembered until the end of
 * the cycle, and the next empty result then skips its suspend.
 */
export class BackoffController {
  private strategy: ClientBackoffStrategy | null = null;
  private suspending = false;
  private resumeRequested = false;

  constructor(private readonly logger: Logger) {}

  setStrategy(strategy: ClientBackoffStrategy | null): void {
    this.strategy = strategy;
  }

  get installed(): boolean {
    return this.strategy !== null;
  }

  /** Called before a cycle takes its subscription snapshot. */
  beginCycle(): void {
    this.resumeRequested = false;
  }

  async onEmptyResult(): Promise<void> {
    const strategy = this.strategy;
    if (!strategy) return;
    if (this.resumeRequested) {
      this.resumeRequested = false;
      return;
    }
    this.suspending = true;
    try {
      await isolate(() => strategy.suspend(), undefined, (err) => this.report("suspend", err));
    } finally {
      this.suspending = false;
    }
  }

  onNonEmptyResult(): void {
    const strategy = this.strategy;
    if (!strategy) return;
    isolateSync(() => strategy.reset(), undefined, (err) => this.report("reset", err));
  }

  resumeNow(): void {
    const strategy = this.strategy;
    if (!strategy) return;
    if (!this.suspending) this.resumeRequested = true;
    isolateSync(() => strategy.resume(), undefined, (err) => this.report("resume", err));
  }

  private report(method: string, err: unknown): void {
    this.logger.error({ err, method }, "exception while executing backoff strategy method");
  }
}
