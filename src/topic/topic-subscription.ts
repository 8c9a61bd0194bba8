import type { TopicRequest } from "../contracts.js";
import type { ExternalTask } from "../task/external-task.js";
import type { ExternalTaskService } from "../task/external-task-service.js";

export type ExternalTaskHandler = (
  task: ExternalTask,
  service: ExternalTaskService
) => void | Promise<void>;

export interface TopicSubscription {
  readonly topicName: string;
  /** Falls back to the client's lock duration when unset. */
  readonly lockDuration?: number;
  readonly handler: ExternalTaskHandler;
  /** Variable names to fetch; all variables when unset. */
  readonly variableNames?: readonly string[];
  readonly localVariables?: boolean;
  readonly businessKey?: string;
  readonly processDefinitionId?: string;
  readonly processDefinitionKey?: string;
  readonly processVariables?: Readonly<Record<string, unknown>>;
  readonly tenantIdIn?: readonly string[];
  readonly withoutTenantId?: boolean;
}

export function toTopicRequest(
  subscription: TopicSubscription,
  clientLockDuration: number
): TopicRequest {
  const request: TopicRequest = {
    topicName: subscription.topicName,
    lockDuration: subscription.lockDuration ?? clientLockDuration,
    localVariables: subscription.localVariables ?? false,
    withoutTenantId: subscription.withoutTenantId ?? false,
  };
  if (subscription.variableNames) request.variables = [...subscription.variableNames];
  if (subscription.businessKey !== undefined) request.businessKey = subscription.businessKey;
  if (subscription.processDefinitionId !== undefined) {
    request.processDefinitionId = subscription.processDefinitionId;
  }
  if (subscription.processDefinitionKey !== undefined) {
    request.processDefinitionKey = subscription.processDefinitionKey;
  }
  if (subscription.processVariables) request.processVariables = { ...subscription.processVariables };
  if (subscription.tenantIdIn) request.tenantIdIn = [...subscription.tenantIdIn];
  return request;
}
