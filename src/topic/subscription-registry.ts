import { DuplicateTopicError } from "../errors.js";
import type { TopicSubscription } from "./topic-subscription.js";

/**
 * Live set of topic subscriptions. Writes swap in a new frozen array, so a
 * snapshot taken by a running cycle never changes underneath it while callers
 * keep subscribing and unsubscribing.
 */
export class SubscriptionRegistry {
  private subscriptions: readonly TopicSubscription[] = Object.freeze([]);

  constructor(private readonly onSubscribed: () => void = () => {}) {}

  subscribe(subscription: TopicSubscription): void {
    if (this.subscriptions.some((s) => s.topicName === subscription.topicName)) {
      throw new DuplicateTopicError(subscription.topicName);
    }
    this.subscriptions = Object.freeze([...this.subscriptions, subscription]);
    this.onSubscribed();
  }

  unsubscribe(subscription: TopicSubscription): void {
    if (!this.subscriptions.includes(subscription)) return;
    this.subscriptions = Object.freeze(this.subscriptions.filter((s) => s !== subscription));
  }

  snapshot(): readonly TopicSubscription[] {
    return this.subscriptions;
  }

  get size(): number {
    return this.subscriptions.length;
  }
}
