import { AsyncLocalStorage } from "node:async_hooks";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { TopicRequest } from "../contracts.js";
import type { Logger } from "../logger.js";
import { BackoffController } from "../backoff/backoff-controller.js";
import type { ClientBackoffStrategy } from "../backoff/exponential-backoff.js";
import { ExternalTaskClientError } from "../errors.js";
import type { ExternalTask } from "../task/external-task.js";
import type { ExternalTaskService } from "../task/external-task-service.js";
import { isolate } from "../util/isolate.js";
import { Wakeup } from "../util/wakeup.js";
import { SubscriptionRegistry } from "./subscription-registry.js";
import {
  toTopicRequest,
  type ExternalTaskHandler,
  type TopicSubscription,
} from "./topic-subscription.js";

export type WorkerState = "STOPPED" | "RUNNING";

export interface FetchAndLockClient {
  fetchAndLock(topics: TopicRequest[]): Promise<ExternalTask[]>;
}

export interface TopicSubscriptionManagerOptions {
  engine: FetchAndLockClient;
  service: ExternalTaskService;
  clientLockDuration: number;
  logger: Logger;
}

export interface AcquisitionResult {
  /** Topics in this cycle's fetch-and-lock batch. */
  requested: number;
  acquired: number;
  dispatched: number;
  skipped: number;
}

interface AcquisitionPlan {
  requests: TopicRequest[];
  index: Map<string, TopicSubscription>;
}

// Marks code running inside the acquisition loop, so a handler calling stop()
// does not wait on the loop it is running in.
const loopContext = new AsyncLocalStorage<TopicSubscriptionManager>();

export class TopicSubscriptionManager {
  private state: WorkerState = "STOPPED";
  private loop: Promise<void> | null = null;
  private looping = false;
  private inFlightIndex: Map<string, TopicSubscription> | null = null;
  private monitor: Promise<void> = Promise.resolve();
  private readonly idle = new Wakeup();
  private readonly registry: SubscriptionRegistry;
  private readonly backoff: BackoffController;
  private readonly engine: FetchAndLockClient;
  private readonly service: ExternalTaskService;
  private readonly clientLockDuration: number;
  private readonly logger: Logger;

  constructor(options: TopicSubscriptionManagerOptions) {
    this.engine = options.engine;
    this.service = options.service;
    this.clientLockDuration = options.clientLockDuration;
    this.logger = options.logger;
    this.backoff = new BackoffController(options.logger);
    this.registry = new SubscriptionRegistry(() => {
      this.backoff.resumeNow();
      this.idle.notify();
    });
  }

  // ── Subscriptions ───────────────────────────────────────────────────────

  subscribe(subscription: TopicSubscription): void {
    this.registry.subscribe(subscription);
    this.logger.debug({ topicName: subscription.topicName }, "topic subscribed");
  }

  unsubscribe(subscription: TopicSubscription): void {
    this.registry.unsubscribe(subscription);
    if (this.inFlightIndex?.get(subscription.topicName) === subscription) {
      this.inFlightIndex.delete(subscription.topicName);
    }
    this.logger.debug({ topicName: subscription.topicName }, "topic unsubscribed");
  }

  getSubscriptions(): readonly TopicSubscription[] {
    return this.registry.snapshot();
  }

  setBackoffStrategy(strategy: ClientBackoffStrategy | null): void {
    this.backoff.setStrategy(strategy);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  isRunning(): boolean {
    return this.state === "RUNNING";
  }

  start(): Promise<void> {
    // A handler that stopped its own worker restarts it; the loop it runs in
    // has not exited, so it simply keeps going.
    if (loopContext.getStore() === this && this.looping) {
      if (this.state !== "RUNNING") {
        this.state = "RUNNING";
        this.logger.info({ subscriptions: this.registry.size }, "worker started");
      }
      return Promise.resolve();
    }

    return this.synchronized(async () => {
      if (this.state === "RUNNING") return;

      // A stop() that was interrupted may have left the previous loop winding down.
      if (this.loop) await this.loop;

      this.state = "RUNNING";
      this.loop = loopContext.run(this, () => this.run());
      this.logger.info({ subscriptions: this.registry.size }, "worker started");
    });
  }

  /**
   * Stops the loop and resolves once it has exited. An in-flight fetch or handler
   * finishes first. If `signal` aborts while waiting, the interruption is logged
   * and stop() resolves without waiting further.
   */
  stop(options: { signal?: AbortSignal } = {}): Promise<void> {
    if (loopContext.getStore() === this) {
      this.requestStop();
      return Promise.resolve();
    }

    return this.synchronized(async () => {
      if (this.state === "STOPPED") return;
      this.requestStop();
      if (this.loop) await this.join(this.loop, options.signal);
      this.logger.info("worker stopped");
    });
  }

  private requestStop(): void {
    this.state = "STOPPED";
    this.backoff.resumeNow();
    this.idle.notify();
  }

  private synchronized(fn: () => Promise<void>): Promise<void> {
    const next = this.monitor.then(fn);
    this.monitor = next.catch(() => undefined);
    return next;
  }

  private async join(loop: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
    if (!signal) return loop;

    let onAbort: (() => void) | undefined;
    const interrupted = new Promise<"interrupted">((resolve) => {
      onAbort = () => resolve("interrupted");
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      const outcome = await Promise.race([loop.then(() => "exited" as const), interrupted]);
      if (outcome === "interrupted") {
        this.logger.warn({ err: signal.reason }, "interrupted while waiting for worker shutdown");
      }
    } finally {
      if (onAbort) signal.removeEventListener("abort", onAbort);
    }
  }

  private async run(): Promise<void> {
    this.looping = true;
    try {
      while (this.isRunning()) {
        await isolate(
          () => this.acquire(),
          null,
          (err) => this.logger.error({ err }, "exception while acquiring tasks")
        );

        if (!this.isRunning()) break;
        if (this.registry.size === 0) {
          await this.idle.wait();
        } else {
          await yieldToEventLoop();
        }
      }
    } finally {
      this.looping = false;
    }
  }

  // ── Acquisition cycle ───────────────────────────────────────────────────

  /** Runs one acquisition cycle against the current subscription snapshot. */
  async acquire(): Promise<AcquisitionResult> {
    this.backoff.beginCycle();
    const { requests, index } = this.prepareAcquisition(this.registry.snapshot());
    const result: AcquisitionResult = {
      requested: requests.length,
      acquired: 0,
      dispatched: 0,
      skipped: 0,
    };
    if (requests.length === 0) return result;

    // Unsubscribing while the fetch is in flight drops the topic from this index;
    // once the response is in, the index is frozen for the rest of the cycle.
    this.inFlightIndex = index;
    let tasks: ExternalTask[];
    try {
      tasks = await this.fetchAndLock(requests);
    } finally {
      this.inFlightIndex = null;
    }
    result.acquired = tasks.length;

    for (const task of tasks) {
      const subscription = index.get(task.topicName);
      if (!subscription) {
        this.logger.warn(
          { topicName: task.topicName, taskId: task.id },
          "no handler for topic, task skipped"
        );
        result.skipped++;
        continue;
      }
      if (await this.handleExternalTask(task, subscription.handler)) {
        result.dispatched++;
      } else {
        result.skipped++;
      }
    }

    if (this.backoff.installed) {
      if (tasks.length === 0) {
        await this.backoff.onEmptyResult();
      } else {
        this.backoff.onNonEmptyResult();
      }
    }

    return result;
  }

  private prepareAcquisition(subscriptions: readonly TopicSubscription[]): AcquisitionPlan {
    const requests: TopicRequest[] = [];
    const index = new Map<string, TopicSubscription>();
    for (const subscription of subscriptions) {
      requests.push(toTopicRequest(subscription, this.clientLockDuration));
      index.set(subscription.topicName, subscription);
    }
    return { requests, index };
  }

  private fetchAndLock(requests: TopicRequest[]): Promise<ExternalTask[]> {
    return isolate(
      () => this.engine.fetchAndLock(requests),
      [],
      (err) => this.logger.error({ err }, "exception while performing fetch and lock")
    );
  }

  /** Returns false when the task never reached its handler. */
  private async handleExternalTask(
    task: ExternalTask,
    handler: ExternalTaskHandler
  ): Promise<boolean> {
    const context = { topicName: task.topicName, taskId: task.id };

    const decoded = await isolate(
      () => {
        task.decodeVariables();
        return true;
      },
      false,
      (err) => this.logger.error({ err, ...context }, "exception while decoding task variables")
    );
    if (!decoded) return false;

    await isolate(
      () => handler(task, this.service),
      undefined,
      (err) => {
        if (err instanceof ExternalTaskClientError) {
          this.logger.error(
            { err, ...context },
            "exception on external task service method invocation"
          );
        } else {
          this.logger.error({ err, ...context }, "exception while executing external task handler");
        }
      }
    );
    return true;
  }
}
