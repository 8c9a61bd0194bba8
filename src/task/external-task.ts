import type { LockedExternalTask, VariableMap } from "../contracts.js";
import { decodeVariables, type TypedValue } from "./variables.js";

export class ExternalTask {
  readonly id: string;
  readonly topicName: string;
  readonly workerId: string | null;
  readonly activityId: string | null;
  readonly activityInstanceId: string | null;
  readonly processInstanceId: string | null;
  readonly processDefinitionId: string | null;
  readonly processDefinitionKey: string | null;
  readonly executionId: string | null;
  readonly businessKey: string | null;
  readonly tenantId: string | null;
  readonly retries: number | null;
  readonly errorMessage: string | null;
  readonly errorDetails: string | null;
  readonly priority: number;
  readonly lockExpirationTime: Date | null;

  private readonly rawVariables: VariableMap;
  private decoded: Map<string, TypedValue> | null = null;

  constructor(dto: LockedExternalTask) {
    this.id = dto.id;
    this.topicName = dto.topicName;
    this.workerId = dto.workerId;
    this.activityId = dto.activityId;
    this.activityInstanceId = dto.activityInstanceId;
    this.processInstanceId = dto.processInstanceId;
    this.processDefinitionId = dto.processDefinitionId;
    this.processDefinitionKey = dto.processDefinitionKey;
    this.executionId = dto.executionId;
    this.businessKey = dto.businessKey;
    this.tenantId = dto.tenantId;
    this.retries = dto.retries;
    this.errorMessage = dto.errorMessage;
    this.errorDetails = dto.errorDetails;
    this.priority = dto.priority;
    this.lockExpirationTime = dto.lockExpirationTime ? new Date(dto.lockExpirationTime) : null;
    this.rawVariables = dto.variables;
  }

  /** Decodes the raw variable payload. Throws ValueMapperError on a malformed value. */
  decodeVariables(): void {
    this.decoded ??= decodeVariables(this.rawVariables);
  }

  getVariable(name: string): unknown {
    return this.getVariableTyped(name)?.value;
  }

  getVariableTyped(name: string): TypedValue | undefined {
    this.decodeVariables();
    return this.decoded?.get(name);
  }

  getAllVariables(): Record<string, unknown> {
    this.decodeVariables();
    const all: Record<string, unknown> = {};
    for (const [name, typed] of this.decoded ?? []) {
      all[name] = typed.value;
    }
    return all;
  }
}
