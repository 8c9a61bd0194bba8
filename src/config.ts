import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import { ExternalTaskClientError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

export interface WorkerConfig {
  baseUrl: string;
  workerId: string;
  maxTasks: number;
  lockDuration: number;
  asyncResponseTimeout?: number;
  usePriority: boolean;
  backoff: boolean;
  basicAuth?: { username: string; password: string };
  topics: string[];
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const DEFAULT_BASE_URL = "http://localhost:8080/engine-rest";

export function generateWorkerId(): string {
  return `${hostname()}-${randomUUID()}`;
}

function positiveInt(env: Env, name: string, fallback: number): number;
function positiveInt(env: Env, name: string, fallback: undefined): number | undefined;
function positiveInt(env: Env, name: string, fallback: number | undefined): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ExternalTaskClientError(`config_invalid:${name}:${raw}`);
  }
  return value;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ExternalTaskClientError(`config_invalid:${name}:${raw}`);
}

export function loadConfig(env: Env = process.env): WorkerConfig {
  const config: WorkerConfig = {
    baseUrl: env.EXTERNAL_TASK_BASE_URL?.trim() || DEFAULT_BASE_URL,
    workerId: env.EXTERNAL_TASK_WORKER_ID?.trim() || generateWorkerId(),
    maxTasks: positiveInt(env, "EXTERNAL_TASK_MAX_TASKS", 10),
    lockDuration: positiveInt(env, "EXTERNAL_TASK_LOCK_DURATION_MS", 20_000),
    usePriority: flag(env, "EXTERNAL_TASK_USE_PRIORITY", true),
    backoff: flag(env, "EXTERNAL_TASK_BACKOFF", true),
    topics: (env.EXTERNAL_TASK_TOPICS ?? "")
      .split(",")
      .map((topic) => topic.trim())
      .filter((topic) => topic.length > 0),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };

  const asyncResponseTimeout = positiveInt(env, "EXTERNAL_TASK_ASYNC_RESPONSE_TIMEOUT_MS", undefined);
  if (asyncResponseTimeout !== undefined) config.asyncResponseTimeout = asyncResponseTimeout;

  const username = env.EXTERNAL_TASK_USERNAME;
  const password = env.EXTERNAL_TASK_PASSWORD;
  if (username !== undefined || password !== undefined) {
    if (!username || password === undefined) {
      throw new ExternalTaskClientError("config_invalid:EXTERNAL_TASK_USERNAME_and_PASSWORD_required");
    }
    config.basicAuth = { username, password };
  }

  return config;
}
