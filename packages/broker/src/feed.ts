/**
 * Backward delivery: a named FIFO fan-out that handlers push items into
 * instead of calling each other.
 *
 * A feeder appends to the queue of every attached feedee; the owner of a
 * feedee drains it whenever convenient, outside any dispatch. Since delivery
 * never re-enters a handler, feeds add no reachability edges. They still show
 * up in the registry's membership records.
 *
 * @module broker/feed
 */
import { BrokerConfigSchema } from '@hubwire/shared/config-schema';
import { ConfigError } from './config.js';
import { FeedOverflowError } from './errors.js';
import { logger } from './logger.js';
import type { Registry } from './registry.js';
import type { ChannelId } from './types.js';

export interface FeedOptions {
  /** Maximum items a feedee may hold. `null` (the default) means unbounded. */
  capacity?: number | null;
}

/** Receiving end of a feed with its own FIFO queue. */
export class Feedee<T> {
  private readonly queue: T[] = [];
  private attached = false;

  /** @internal */
  constructor(private readonly source: Feed<T>) {}

  get size(): number {
    return this.queue.length;
  }

  get isAttached(): boolean {
    return this.attached;
  }

  /** Oldest queued item, or undefined when empty. */
  pop(): T | undefined {
    return this.queue.shift();
  }

  /** Remove and return every queued item, oldest first. */
  drain(): T[] {
    return this.queue.splice(0, this.queue.length);
  }

  /** Stop receiving items. Queued items stay until drained. */
  close(): void {
    this.source.detach(this);
  }

  /** @internal */
  enqueue(item: T): void {
    this.queue.push(item);
  }

  /** @internal */
  setAttached(attached: boolean): void {
    this.attached = attached;
  }
}

/** Sending end of a feed. */
export class Feeder<T> {
  /** @internal */
  constructor(private readonly target: Feed<T>) {}

  get name(): string {
    return this.target.name;
  }

  /**
   * Append `item` to every attached feedee.
   *
   * Feedees all receive the same reference, not copies. Treat fed items as
   * immutable: a consumer that mutates one changes what every other feedee
   * pops.
   *
   * @throws FeedOverflowError if any feedee is at capacity; no queue is changed
   */
  feed(item: T): void {
    this.target.deliver(item);
  }
}

export class Feed<T> {
  readonly id: ChannelId;
  readonly capacity: number | null;
  private feedees: Feedee<T>[] = [];

  /**
   * @throws ConfigError if `capacity` is not a positive integer or null
   * @throws DuplicateChannelNameError if the registry already has `name`
   */
  constructor(
    readonly name: string,
    private readonly registry: Registry,
    options: FeedOptions = {},
  ) {
    const parsed = BrokerConfigSchema.shape.feed.safeParse({ capacity: options.capacity ?? null });
    if (!parsed.success) {
      throw new ConfigError('feed options', parsed.error);
    }
    this.id = registry.declareChannel(name, 'feed');
    this.capacity = parsed.data.capacity;
  }

  /** Number of attached feedees. */
  get size(): number {
    return this.feedees.length;
  }

  /**
   * Obtain a feeder. Only valid while a subscription is being built.
   *
   * @throws NoActiveSubscriptionError outside a subscription
   */
  feeder(): Feeder<T> {
    this.registry.recordEmit(this.id);
    return new Feeder(this);
  }

  /**
   * Obtain a feedee. Only valid while a subscription is being built; its queue
   * starts receiving once the subscription is accepted.
   *
   * @throws NoActiveSubscriptionError outside a subscription
   */
  feedee(): Feedee<T> {
    this.registry.recordListen(this.id);
    const feedee = new Feedee(this);
    this.registry.stageJoin(this.id, {
      commit: () => {
        this.feedees.push(feedee);
        feedee.setAttached(true);
        return () => this.detach(feedee);
      },
    });
    return feedee;
  }

  /** @internal */
  deliver(item: T): void {
    if (this.capacity !== null) {
      const capacity = this.capacity;
      if (this.feedees.some((f) => f.size >= capacity)) {
        throw new FeedOverflowError(this.name, capacity);
      }
    }
    for (const feedee of this.feedees) {
      feedee.enqueue(item);
    }
    logger.trace(`Feed: delivered to ${this.feedees.length} feedee(s) on "${this.name}"`);
  }

  /** @internal */
  detach(feedee: Feedee<T>): void {
    this.feedees = this.feedees.filter((f) => f !== feedee);
    feedee.setAttached(false);
  }
}
