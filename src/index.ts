export {
  ExternalTaskClient,
  createExternalTaskClient,
  type ExternalTaskClientOptions,
} from "./client.js";
export { loadConfig, generateWorkerId, type WorkerConfig } from "./config.js";
export * from "./errors.js";
export { createLogger, parseLogLevel, type LogLevel, type Logger } from "./logger.js";
export {
  ExponentialBackoffStrategy,
  type ClientBackoffStrategy,
  type ExponentialBackoffOptions,
} from "./backoff/exponential-backoff.js";
export {
  EngineClient,
  type EngineClientOptions,
  type FetchLike,
  type HttpRequestInit,
} from "./engine/engine-client.js";
export { ExternalTask } from "./task/external-task.js";
export {
  createExternalTaskService,
  type ExternalTaskService,
  type HandleFailureOptions,
} from "./task/external-task-service.js";
export { TypedValue, type VariableInput } from "./task/variables.js";
export type { ExternalTaskHandler, TopicSubscription } from "./topic/topic-subscription.js";
export {
  TopicSubscriptionBuilder,
  type OpenTopicSubscription,
} from "./topic/topic-subscription-builder.js";
export {
  TopicSubscriptionManager,
  type AcquisitionResult,
  type WorkerState,
} from "./topic/topic-subscription-manager.js";
export type * from "./contracts.js";
