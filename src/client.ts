import {
  ExponentialBackoffStrategy,
  type ClientBackoffStrategy,
} from "./backoff/exponential-backoff.js";
import { generateWorkerId } from "./config.js";
import { EngineClient, type FetchLike } from "./engine/engine-client.js";
import { ExternalTaskClientError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { createExternalTaskService } from "./task/external-task-service.js";
import { TopicSubscriptionBuilder } from "./topic/topic-subscription-builder.js";
import type { TopicSubscription } from "./topic/topic-subscription.js";
import { TopicSubscriptionManager } from "./topic/topic-subscription-manager.js";

const DEFAULT_MAX_TASKS = 10;
const DEFAULT_LOCK_DURATION_MS = 20_000;

export interface ExternalTaskClientOptions {
  baseUrl: string;
  workerId?: string;
  maxTasks?: number;
  /** Lock duration for subscriptions that set none of their own. */
  lockDuration?: number;
  asyncResponseTimeout?: number;
  usePriority?: boolean;
  /** Start fetching as soon as the client is created. Defaults to true. */
  autoFetching?: boolean;
  backoffStrategy?: ClientBackoffStrategy;
  disableBackoffStrategy?: boolean;
  basicAuth?: { username: string; password: string };
  headers?: Record<string, string>;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

function requirePositive(name: string, value: number | undefined, integer: boolean): void {
  if (value === undefined) return;
  const valid = Number.isFinite(value) && value > 0 && (!integer || Number.isInteger(value));
  if (!valid) throw new ExternalTaskClientError(`option_invalid:${name}:${value}`);
}

function validateOptions(options: ExternalTaskClientOptions): void {
  if (!options.baseUrl?.trim()) {
    throw new ExternalTaskClientError("option_invalid:baseUrl:required");
  }
  if (options.workerId !== undefined && !options.workerId.trim()) {
    throw new ExternalTaskClientError("option_invalid:workerId:empty");
  }
  requirePositive("maxTasks", options.maxTasks, true);
  requirePositive("lockDuration", options.lockDuration, false);
  requirePositive("asyncResponseTimeout", options.asyncResponseTimeout, false);
  requirePositive("requestTimeoutMs", options.requestTimeoutMs, false);
}

export class ExternalTaskClient {
  readonly workerId: string;
  private readonly manager: TopicSubscriptionManager;

  constructor(options: ExternalTaskClientOptions) {
    validateOptions(options);
    const logger = options.logger ?? createLogger();
    this.workerId = options.workerId ?? generateWorkerId();

    const engine = new EngineClient({
      baseUrl: options.baseUrl,
      workerId: this.workerId,
      maxTasks: options.maxTasks ?? DEFAULT_MAX_TASKS,
      usePriority: options.usePriority ?? true,
      asyncResponseTimeout: options.asyncResponseTimeout,
      basicAuth: options.basicAuth,
      headers: options.headers,
      requestTimeoutMs: options.requestTimeoutMs,
      fetch: options.fetch,
    });

    this.manager = new TopicSubscriptionManager({
      engine,
      service: createExternalTaskService(engine),
      clientLockDuration: options.lockDuration ?? DEFAULT_LOCK_DURATION_MS,
      logger: logger.child({ workerId: this.workerId }),
    });

    if (!options.disableBackoffStrategy) {
      this.manager.setBackoffStrategy(options.backoffStrategy ?? new ExponentialBackoffStrategy());
    }
  }

  /** Starts building a subscription; nothing is registered until `open()`. */
  subscribe(topicName: string): TopicSubscriptionBuilder {
    return new TopicSubscriptionBuilder(this.manager, topicName);
  }

  start(): Promise<void> {
    return this.manager.start();
  }

  stop(options: { signal?: AbortSignal } = {}): Promise<void> {
    return this.manager.stop(options);
  }

  isActive(): boolean {
    return this.manager.isRunning();
  }

  getTopicSubscriptions(): readonly TopicSubscription[] {
    return this.manager.getSubscriptions();
  }
}

export function createExternalTaskClient(options: ExternalTaskClientOptions): ExternalTaskClient {
  const logger = options.logger ?? createLogger();
  const client = new ExternalTaskClient({ ...options, logger });
  if (options.autoFetching ?? true) {
    client.start().catch((err) => logger.error({ err }, "failed to start worker"));
  }
  return client;
}
