#!/usr/bin/env node
import {
  createExternalTaskClient,
  type ExternalTaskClient,
  type ExternalTaskClientOptions,
} from "./client.js";
import { loadConfig, type WorkerConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import type { ExternalTaskHandler } from "./topic/topic-subscription.js";

/** Completes every task it is given, recording which worker handled it. */
export function completingHandler(workerId: string, logger: Logger): ExternalTaskHandler {
  return async (task, service) => {
    await service.complete(task, { handledBy: workerId });
    logger.info({ topicName: task.topicName, taskId: task.id }, "task completed");
  };
}

export function startWorker(
  config: WorkerConfig = loadConfig(),
  logger: Logger = createLogger({ level: config.logLevel }),
  overrides: Partial<ExternalTaskClientOptions> = {}
): ExternalTaskClient {
  const client = createExternalTaskClient({
    baseUrl: config.baseUrl,
    workerId: config.workerId,
    maxTasks: config.maxTasks,
    lockDuration: config.lockDuration,
    asyncResponseTimeout: config.asyncResponseTimeout,
    usePriority: config.usePriority,
    disableBackoffStrategy: !config.backoff,
    basicAuth: config.basicAuth,
    logger,
    ...overrides,
  });

  if (config.topics.length === 0) {
    logger.warn("no topics configured; set EXTERNAL_TASK_TOPICS");
  }
  for (const topicName of config.topics) {
    client.subscribe(topicName).handler(completingHandler(client.workerId, logger)).open();
  }

  logger.info(
    { baseUrl: config.baseUrl, workerId: client.workerId, topics: config.topics },
    "external task worker running"
  );
  return client;
}

function shutdownOnSignals(client: ExternalTaskClient, logger: Logger): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    client.stop().catch((err) => {
      logger.error({ err }, "shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    const config = loadConfig();
    const logger = createLogger({ level: config.logLevel });
    shutdownOnSignals(startWorker(config, logger), logger);
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
}
