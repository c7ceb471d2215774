/**
 * Hub: owner of one registry and the endpoints declared on it. Handlers join
 * through {@link Hub.subscribe}, which either commits the whole subscription
 * or leaves nothing behind.
 *
 * @module broker/hub
 */
import type { BrokerConfig, BrokerConfigInput } from '@hubwire/shared/config-schema';
import type { GraphSnapshot } from '@hubwire/shared/graph-schemas';
import { resolveBrokerConfig } from './config.js';
import { processContextStack } from './context-stack.js';
import { NotSubscribedError } from './errors.js';
import { ExclusivityCell } from './exclusivity-cell.js';
import { Feed, type FeedOptions } from './feed.js';
import { toDot, type DotOptions } from './graphviz.js';
import { initLogger, logger } from './logger.js';
import { Registry, type SubscriptionRecord } from './registry.js';
import { Signal } from './signal.js';
import { Single } from './single.js';
import { handlerIdentity, type HandlerIdentity } from './types.js';

export interface HubOptions {
  /** Partial config; omitted fields take their defaults. */
  config?: BrokerConfigInput;
}

/**
 * How to build one handler.
 *
 * The steps run in order: `emits` collects the endpoints the handler sends
 * into, `create` builds the handler from them, and `listens` registers the
 * handler's cell on the endpoints it receives from.
 */
export interface SubscriberDefinition<T, E> {
  /** Display name, or a full identity when several names share one kind. */
  identity: string | HandlerIdentity;
  emits: (hub: Hub) => E;
  create: (emitters: E) => T;
  listens: (hub: Hub, cell: ExclusivityCell<T>) => void;
}

/** Handle for a committed subscription. */
export class Subscription<T> {
  /** @internal */
  constructor(
    readonly id: number,
    readonly identity: HandlerIdentity,
    /** Graph node the handler is recorded under. */
    readonly node: string,
    readonly cell: ExclusivityCell<T>,
    private readonly hub: Hub,
  ) {}

  get active(): boolean {
    return this.hub.isSubscribed(this);
  }
}

export class Hub {
  readonly config: BrokerConfig;
  readonly registry: Registry;
  /** Shared with every other hub so suspends see dispatches across hubs. */
  readonly stack = processContextStack;
  private readonly records = new WeakMap<Subscription<unknown>, SubscriptionRecord>();
  private nextSubscriptionId = 1;

  /**
   * A `logging` section in `options.config` reconfigures the shared broker
   * logger.
   *
   * @throws ConfigError if `options.config` is invalid
   */
  constructor(options: HubOptions = {}) {
    this.config = resolveBrokerConfig(options.config);
    if (options.config?.logging) {
      initLogger({ level: this.config.logging.level });
    }
    this.registry = new Registry({ policy: this.config.subscriptionPolicy });
  }

  // --- Endpoints ---

  /** @throws DuplicateChannelNameError */
  signal<T>(name: string): Signal<T> {
    return new Signal<T>(name, this.registry);
  }

  /** @throws DuplicateChannelNameError */
  single<T>(name: string): Single<T> {
    return new Single<T>(name, this.registry);
  }

  /**
   * Declare a feed. `capacity` falls back to `feed.capacity` from the hub config.
   *
   * @throws DuplicateChannelNameError
   */
  feed<T>(name: string, options: FeedOptions = {}): Feed<T> {
    return new Feed<T>(name, this.registry, {
      capacity: options.capacity === undefined ? this.config.feed.capacity : options.capacity,
    });
  }

  // --- Subscriptions ---

  /**
   * Build a handler and join it to its endpoints.
   *
   * If any step throws, including the cycle check, the construction frame is
   * discarded and the handler joins nothing.
   *
   * @throws RecursionDetectedError if the handler would close a cycle
   * @throws DuplicateDeclarationError if it declares the same endpoint twice
   * @throws SlotOccupiedError if it registers on an occupied single
   */
  subscribe<T, E>(definition: SubscriberDefinition<T, E>): Subscription<T> {
    const identity =
      typeof definition.identity === 'string' ? handlerIdentity(definition.identity) : definition.identity;
    const node = this.registry.beginSubscription(identity);
    const cell = this.construct(definition, node);
    // endSubscription pops its own frame, also when it throws
    const record = this.registry.endSubscription();

    const subscription = new Subscription(this.nextSubscriptionId++, identity, node, cell, this);
    this.records.set(subscription, record);
    return subscription;
  }

  /**
   * Remove a handler from every endpoint it joined and release its
   * membership records. Reachability edges stay.
   *
   * @throws NotSubscribedError if the subscription is not active on this hub
   */
  unsubscribe(subscription: Subscription<unknown>): void {
    const record = this.records.get(subscription);
    if (!record) {
      throw new NotSubscribedError(subscription.node);
    }
    this.records.delete(subscription);
    for (const detach of record.detach) {
      detach();
    }
    this.registry.releaseSubscription(record);
    logger.debug(`Hub: unsubscribed ${record.node}`);
  }

  isSubscribed(subscription: Subscription<unknown>): boolean {
    return this.records.has(subscription);
  }

  private construct<T, E>(definition: SubscriberDefinition<T, E>, node: string): ExclusivityCell<T> {
    try {
      const emitters = definition.emits(this);
      const cell = new ExclusivityCell(definition.create(emitters), this.stack, node);
      definition.listens(this, cell);
      return cell;
    } catch (err) {
      this.registry.abortSubscription();
      throw err;
    }
  }

  // --- Diagnostics ---

  /** @see Registry.isChained */
  isChained(names: readonly string[]): { from: string; to: string } | null {
    return this.registry.isChained(names);
  }

  snapshot(): GraphSnapshot {
    return this.registry.snapshot();
  }

  toDot(options: DotOptions = {}): string {
    return toDot(this.snapshot(), options);
  }
}
