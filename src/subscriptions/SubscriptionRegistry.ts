import { PROJECT_PROPERTY_NAMES } from '../config/constants.js';
import type { AggregateProjectContext } from '../core/AggregateProjectContext.js';
import { orderByPrecedence } from '../core/precedence.js';
import type {
  CrossTargetSubscriber,
  CrossTargetSubscriptionsHost,
  ProjectChangeFeed,
  ProjectSubscriptionService,
  ProjectUpdateHandler,
  SubscriberChangedEvent,
} from '../core/types.js';
import { disposeAll, type Disposable, type Listener } from '../utils/events.js';
import { log } from '../utils/logger.js';

export interface SubscriptionRegistryOptions {
  subscribers: readonly CrossTargetSubscriber[];
  /** Receives "project configuration changed" batches from every configured project */
  onConfigurationChanged: ProjectUpdateHandler;
  ruleNames?: readonly string[];
}

/**
 * Live change-feed links and subscriber registrations for the current context.
 *
 * All bookkeeping here is synchronous, which keeps each operation exclusive
 * on the event loop without holding anything across a suspension.
 */
export class SubscriptionRegistry {
  private readonly subscribers: CrossTargetSubscriber[];
  private readonly onConfigurationChanged: ProjectUpdateHandler;
  private readonly ruleNames: readonly string[];
  private readonly links: Disposable[] = [];
  private readonly subscriberListeners: Disposable[] = [];
  private attached: AggregateProjectContext | null = null;
  private subscribersInitialized = false;

  constructor(options: SubscriptionRegistryOptions) {
    this.subscribers = orderByPrecedence(options.subscribers);
    this.onConfigurationChanged = options.onConfigurationChanged;
    this.ruleNames = options.ruleNames ?? [PROJECT_PROPERTY_NAMES.CONFIGURATION_GENERAL_RULE];
  }

  get linkCount(): number {
    return this.links.length;
  }

  get attachedContext(): AggregateProjectContext | null {
    return this.attached;
  }

  /**
   * Hook every subscriber up to the host once: change listeners first, then
   * the subscriber's own initialization.
   */
  initializeSubscribers(
    host: CrossTargetSubscriptionsHost,
    subscriptionService: ProjectSubscriptionService,
    onDependenciesChanged: Listener<SubscriberChangedEvent>
  ): void {
    if (this.subscribersInitialized) return;
    this.subscribersInitialized = true;

    for (const subscriber of this.subscribers) {
      this.subscriberListeners.push(subscriber.onDependenciesChanged(onDependenciesChanged));
      subscriber.initializeSubscriber(host, subscriptionService);
    }
  }

  /**
   * Hold a link from `feed` to `handler` until the next `releaseAll`.
   */
  linkToFeed(feed: ProjectChangeFeed, handler: ProjectUpdateHandler): void {
    this.links.push(feed.link(handler, { ruleNames: this.ruleNames }));
  }

  addSubscriptions(context: AggregateProjectContext): void {
    if (this.attached === context) {
      return;
    }
    if (this.attached) {
      this.releaseAll();
    }

    for (const configuredProject of context.innerConfiguredProjects) {
      this.linkToFeed(configuredProject.subscription.projectRuleSource, this.onConfigurationChanged);
    }

    for (const subscriber of this.subscribers) {
      subscriber.addSubscriptions(context);
    }

    this.attached = context;
    log.debug('Added subscriptions', { links: this.links.length, subscribers: this.subscribers.length });
  }

  releaseAll(): void {
    if (!this.attached && this.links.length === 0) {
      return;
    }

    for (const subscriber of this.subscribers) {
      subscriber.releaseSubscriptions();
    }

    disposeAll(this.links);
    this.attached = null;
    log.debug('Released subscriptions');
  }

  /** Stop listening to subscriber change notifications. */
  detachSubscribers(): void {
    disposeAll(this.subscriberListeners);
  }
}
