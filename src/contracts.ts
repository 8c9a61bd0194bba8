// Wire shapes of the engine's external-task REST API.

export interface TypedValueField {
  type: string;
  value: unknown;
  valueInfo?: Record<string, unknown>;
}

export type VariableMap = Record<string, TypedValueField>;

export interface TopicRequest {
  topicName: string;
  lockDuration: number;
  variables?: string[];
  localVariables: boolean;
  businessKey?: string;
  processDefinitionId?: string;
  processDefinitionKey?: string;
  processVariables?: Record<string, unknown>;
  tenantIdIn?: string[];
  withoutTenantId: boolean;
}

export interface FetchAndLockRequest {
  workerId: string;
  maxTasks: number;
  usePriority: boolean;
  asyncResponseTimeout?: number;
  topics: TopicRequest[];
}

export interface LockedExternalTask {
  id: string;
  topicName: string;
  workerId: string | null;
  activityId: string | null;
  activityInstanceId: string | null;
  processInstanceId: string | null;
  processDefinitionId: string | null;
  processDefinitionKey: string | null;
  executionId: string | null;
  businessKey: string | null;
  tenantId: string | null;
  retries: number | null;
  errorMessage: string | null;
  errorDetails: string | null;
  priority: number;
  lockExpirationTime: string | null;
  variables: VariableMap;
}

export interface CompleteRequest {
  workerId: string;
  variables?: VariableMap;
  localVariables?: VariableMap;
}

export interface FailureRequest {
  workerId: string;
  errorMessage: string;
  errorDetails?: string;
  retries: number;
  retryTimeout: number;
}

export interface BpmnErrorRequest {
  workerId: string;
  errorCode: string;
  errorMessage?: string;
  variables?: VariableMap;
}

export interface ExtendLockRequest {
  workerId: string;
  newDuration: number;
}
