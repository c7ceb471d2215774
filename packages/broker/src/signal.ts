/**
 * Named, registry-bound endpoint with many subscribers.
 *
 * A hub declares its signals by name. While a subscription is being built,
 * `register` adds the handler's cell as a listener and `emitter` hands out a
 * dispatch-only view for the handler to emit through; both are recorded in
 * the registry so the subscription can be checked for cycles before the cell
 * joins the underlying {@link Channel}.
 *
 * @module broker/signal
 */
import { Channel } from './channel.js';
import type { Access, ExclusivityCell } from './exclusivity-cell.js';
import type { Registry } from './registry.js';
import type { ChannelId } from './types.js';

/** Dispatch-only view of a signal, handed to handlers that emit into it. */
export class Emitter<T> {
  constructor(private readonly channel: Channel<T>) {}

  get name(): string {
    return this.channel.name;
  }

  dispatch(fn: (payload: T, access: Access<T>) => void): void {
    this.channel.dispatch(fn);
  }

  dispatchShared(fn: (payload: Readonly<T>, access: Access<T>) => void): void {
    this.channel.dispatchShared(fn);
  }
}

export class Signal<T> {
  readonly id: ChannelId;
  private readonly channel: Channel<T>;

  /** @throws DuplicateChannelNameError if the registry already has `name` */
  constructor(
    readonly name: string,
    private readonly registry: Registry,
  ) {
    this.id = registry.declareChannel(name, 'signal');
    this.channel = new Channel(name);
  }

  get size(): number {
    return this.channel.size;
  }

  cells(): ExclusivityCell<T>[] {
    return this.channel.cells();
  }

  /**
   * Listen on this signal. Only valid while a subscription is being built;
   * the cell joins once the subscription is accepted.
   *
   * @param key - Ordering key, see {@link Channel.insert}
   * @throws NoActiveSubscriptionError outside a subscription
   */
  register(cell: ExclusivityCell<T>, key = 0): void {
    this.registry.recordListen(this.id);
    this.registry.stageJoin(this.id, {
      commit: () => {
        this.channel.insert(cell, key);
        return () => {
          this.channel.remove(cell);
        };
      },
    });
  }

  /**
   * Obtain an emitter. Only valid while a subscription is being built.
   *
   * @throws NoActiveSubscriptionError outside a subscription
   */
  emitter(): Emitter<T> {
    this.registry.recordEmit(this.id);
    return new Emitter(this.channel);
  }

  dispatch(fn: (payload: T, access: Access<T>) => void): void {
    this.channel.dispatch(fn);
  }

  dispatchShared(fn: (payload: Readonly<T>, access: Access<T>) => void): void {
    this.channel.dispatchShared(fn);
  }

  /**
   * Drop members for which `predicate` returns true, e.g. for state
   * transitions. Only this signal is affected; the handlers stay subscribed
   * elsewhere until unsubscribed through the hub.
   */
  removeIf(predicate: (payload: T, access: Access<T>) => boolean): ExclusivityCell<T>[] {
    return this.channel.removeIf(predicate);
  }

  sortBy(compare: (a: Readonly<T>, b: Readonly<T>) => number): void {
    this.channel.sortBy(compare);
  }
}
