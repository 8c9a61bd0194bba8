import type {
  BpmnErrorRequest,
  CompleteRequest,
  ExtendLockRequest,
  FailureRequest,
  FetchAndLockRequest,
  LockedExternalTask,
  TopicRequest,
  TypedValueField,
  VariableMap,
} from "../contracts.js";
import {
  ConnectionLostError,
  EngineClientError,
  engineErrorFor,
  errorMessage,
  type EngineErrorBody,
} from "../errors.js";
import { ExternalTask } from "../task/external-task.js";
import { isRecord, numberOrNull, stringOrNull } from "../util/guards.js";

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export interface HttpRequestInit {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<Response>;

export interface EngineClientOptions {
  baseUrl: string;
  workerId: string;
  maxTasks: number;
  usePriority: boolean;
  /** Long-polling window the engine may hold a fetch-and-lock request open for. */
  asyncResponseTimeout?: number;
  basicAuth?: { username: string; password: string };
  headers?: Record<string, string>;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
}

export interface FailureOptions {
  errorMessage: string;
  errorDetails?: string;
  retries: number;
  retryTimeout: number;
}

export class EngineClient {
  readonly baseUrl: string;
  readonly workerId: string;
  private readonly maxTasks: number;
  private readonly usePriority: boolean;
  private readonly asyncResponseTimeout: number | undefined;
  private readonly requestTimeoutMs: number;
  private readonly requestHeaders: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: EngineClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.workerId = options.workerId;
    this.maxTasks = options.maxTasks;
    this.usePriority = options.usePriority;
    this.asyncResponseTimeout = options.asyncResponseTimeout;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));

    this.requestHeaders = {
      "content-type": "application/json",
      accept: "application/json",
      ...(options.headers ?? {}),
    };
    if (options.basicAuth) {
      const { username, password } = options.basicAuth;
      const encoded = Buffer.from(`${username}:${password}`, "utf8").toString("base64");
      this.requestHeaders.authorization = `Basic ${encoded}`;
    }
  }

  async fetchAndLock(topics: TopicRequest[]): Promise<ExternalTask[]> {
    const body: FetchAndLockRequest = {
      workerId: this.workerId,
      maxTasks: this.maxTasks,
      usePriority: this.usePriority,
      topics,
    };
    if (this.asyncResponseTimeout !== undefined) {
      body.asyncResponseTimeout = this.asyncResponseTimeout;
    }

    const timeoutMs = (this.asyncResponseTimeout ?? 0) + this.requestTimeoutMs;
    const payload = await this.post("fetch_and_lock", "/external-task/fetchAndLock", body, timeoutMs);
    return parseLockedTasks(payload).map((dto) => new ExternalTask(dto));
  }

  async complete(taskId: string, variables?: VariableMap, localVariables?: VariableMap) {
    const body: CompleteRequest = { workerId: this.workerId };
    if (variables) body.variables = variables;
    if (localVariables) body.localVariables = localVariables;
    await this.post("complete", taskPath(taskId, "complete"), body);
  }

  async failure(taskId: string, options: FailureOptions) {
    const body: FailureRequest = { workerId: this.workerId, ...options };
    await this.post("failure", taskPath(taskId, "failure"), body);
  }

  async bpmnError(
    taskId: string,
    errorCode: string,
    errorMessage?: string,
    variables?: VariableMap
  ) {
    const body: BpmnErrorRequest = { workerId: this.workerId, errorCode };
    if (errorMessage !== undefined) body.errorMessage = errorMessage;
    if (variables) body.variables = variables;
    await this.post("bpmn_error", taskPath(taskId, "bpmnError"), body);
  }

  async extendLock(taskId: string, newDuration: number) {
    const body: ExtendLockRequest = { workerId: this.workerId, newDuration };
    await this.post("extend_lock", taskPath(taskId, "extendLock"), body);
  }

  async unlock(taskId: string) {
    await this.post("unlock", taskPath(taskId, "unlock"), {});
  }

  private async post(
    operation: string,
    path: string,
    body: object,
    timeoutMs = this.requestTimeoutMs
  ): Promise<unknown> {
    const { status, ok, text } = await this.send(operation, path, body, timeoutMs);
    if (!ok) throw engineErrorFor(operation, status, parseErrorBody(text));
    if (!text) return undefined;

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new EngineClientError(`${operation}_failed:invalid_json`, status, {}, { cause: err });
    }
  }

  private async send(operation: string, path: string, body: object, timeoutMs: number) {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: this.requestHeaders,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
      return { status: res.status, ok: res.ok, text: await res.text() };
    } catch (err) {
      throw new ConnectionLostError(`${operation}_failed:${errorMessage(err)}`, null, {}, {
        cause: err,
      });
    }
  }
}

function taskPath(taskId: string, action: string): string {
  return `/external-task/${encodeURIComponent(taskId)}/${action}`;
}

function parseErrorBody(text: string): EngineErrorBody {
  try {
    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed)) return {};
    return {
      type: stringOrNull(parsed.type) ?? undefined,
      message: stringOrNull(parsed.message) ?? undefined,
      code: numberOrNull(parsed.code) ?? undefined,
    };
  } catch {
    return { message: text.slice(0, 500) || undefined };
  }
}

function parseVariableMap(raw: unknown, taskId: string): VariableMap {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new EngineClientError(`fetch_and_lock_failed:variables_malformed:${taskId}`, 200);
  }

  const variables: VariableMap = {};
  for (const [name, field] of Object.entries(raw)) {
    if (!isRecord(field) || typeof field.type !== "string") {
      throw new EngineClientError(`fetch_and_lock_failed:variable_malformed:${taskId}:${name}`, 200);
    }
    const typed: TypedValueField = { type: field.type, value: field.value ?? null };
    if (isRecord(field.valueInfo)) typed.valueInfo = field.valueInfo;
    variables[name] = typed;
  }
  return variables;
}

export function parseLockedTasks(payload: unknown): LockedExternalTask[] {
  if (!Array.isArray(payload)) {
    throw new EngineClientError("fetch_and_lock_failed:response_not_array", 200);
  }

  return payload.map((raw: unknown, index) => {
    if (!isRecord(raw) || typeof raw.id !== "string" || typeof raw.topicName !== "string") {
      throw new EngineClientError(`fetch_and_lock_failed:task_malformed:${index}`, 200);
    }
    return {
      id: raw.id,
      topicName: raw.topicName,
      workerId: stringOrNull(raw.workerId),
      activityId: stringOrNull(raw.activityId),
      activityInstanceId: stringOrNull(raw.activityInstanceId),
      processInstanceId: stringOrNull(raw.processInstanceId),
      processDefinitionId: stringOrNull(raw.processDefinitionId),
      processDefinitionKey: stringOrNull(raw.processDefinitionKey),
      executionId: stringOrNull(raw.executionId),
      businessKey: stringOrNull(raw.businessKey),
      tenantId: stringOrNull(raw.tenantId),
      retries: numberOrNull(raw.retries),
      errorMessage: stringOrNull(raw.errorMessage),
      errorDetails: stringOrNull(raw.errorDetails),
      priority: numberOrNull(raw.priority) ?? 0,
      lockExpirationTime: stringOrNull(raw.lockExpirationTime),
      variables: parseVariableMap(raw.variables, raw.id),
    };
  });
}
