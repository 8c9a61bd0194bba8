import { ExternalTaskClientError } from "../errors.js";
import type { ExternalTaskHandler, TopicSubscription } from "./topic-subscription.js";

export interface SubscriptionTarget {
  subscribe(subscription: TopicSubscription): void;
  unsubscribe(subscription: TopicSubscription): void;
}

/** A registered subscription. `close()` removes it from the worker. */
export interface OpenTopicSubscription extends TopicSubscription {
  close(): void;
}

export class TopicSubscriptionBuilder {
  private lockDurationMs: number | undefined;
  private externalTaskHandler: ExternalTaskHandler | undefined;
  private variableNames: string[] | undefined;
  private local = false;
  private key: string | undefined;
  private definitionId: string | undefined;
  private definitionKey: string | undefined;
  private processVariables: Record<string, unknown> | undefined;
  private tenantIds: string[] | undefined;
  private noTenant = false;

  constructor(
    private readonly target: SubscriptionTarget,
    private readonly topicName: string
  ) {}

  lockDuration(ms: number): this {
    this.lockDurationMs = ms;
    return this;
  }

  handler(handler: ExternalTaskHandler): this {
    this.externalTaskHandler = handler;
    return this;
  }

  variables(...names: string[]): this {
    this.variableNames = names;
    return this;
  }

  localVariables(local: boolean): this {
    this.local = local;
    return this;
  }

  businessKey(businessKey: string): this {
    this.key = businessKey;
    return this;
  }

  processDefinitionId(id: string): this {
    this.definitionId = id;
    return this;
  }

  processDefinitionKey(key: string): this {
    this.definitionKey = key;
    return this;
  }

  /** Only fetch tasks whose process instance has `name` set to `value`. Repeatable. */
  processVariableEquals(name: string, value: unknown): this {
    this.processVariables = { ...(this.processVariables ?? {}), [name]: value };
    return this;
  }

  tenantIdIn(...tenantIds: string[]): this {
    this.tenantIds = tenantIds;
    return this;
  }

  withoutTenantId(): this {
    this.noTenant = true;
    return this;
  }

  /**
   * Validates and registers the subscription. Throws DuplicateTopicError when the
   * topic is already subscribed and ExternalTaskClientError for invalid settings.
   */
  open(): OpenTopicSubscription {
    const topicName = this.topicName.trim();
    if (!topicName) {
      throw new ExternalTaskClientError("topic_name_required");
    }
    const handler = this.externalTaskHandler;
    if (!handler) {
      throw new ExternalTaskClientError(`handler_required:${topicName}`);
    }
    const lockDuration = this.lockDurationMs;
    if (lockDuration !== undefined && !(Number.isFinite(lockDuration) && lockDuration > 0)) {
      throw new ExternalTaskClientError(`lock_duration_invalid:${topicName}:${lockDuration}`);
    }

    const target = this.target;
    const subscription: OpenTopicSubscription = {
      topicName,
      lockDuration,
      handler,
      variableNames: this.variableNames,
      localVariables: this.local,
      businessKey: this.key,
      processDefinitionId: this.definitionId,
      processDefinitionKey: this.definitionKey,
      processVariables: this.processVariables,
      tenantIdIn: this.tenantIds,
      withoutTenantId: this.noTenant,
      close() {
        target.unsubscribe(subscription);
      },
    };
    target.subscribe(subscription);
    return subscription;
  }
}
