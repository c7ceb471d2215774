/**
 * Named, registry-bound endpoint that must hold exactly one subscriber.
 *
 * @module broker/single
 */
import type { Access, ExclusivityCell } from './exclusivity-cell.js';
import type { Registry } from './registry.js';
import { Slot } from './slot.js';
import { SlotOccupiedError } from './errors.js';
import type { ChannelId } from './types.js';

/** Dispatch-only view of a single, handed to handlers that emit into it. */
export class SingleEmitter<T> {
  constructor(private readonly slot: Slot<T>) {}

  get name(): string {
    return this.slot.name;
  }

  /** @throws EmptyRequiredSlotError if nothing is subscribed */
  dispatch<R>(fn: (payload: T, access: Access<T>) => R): R {
    return this.slot.dispatch(fn);
  }

  /** @throws EmptyRequiredSlotError if nothing is subscribed */
  dispatchShared<R>(fn: (payload: Readonly<T>, access: Access<T>) => R): R {
    return this.slot.dispatchShared(fn);
  }
}

export class Single<T> {
  readonly id: ChannelId;
  private readonly slot: Slot<T>;

  /** @throws DuplicateChannelNameError if the registry already has `name` */
  constructor(
    readonly name: string,
    private readonly registry: Registry,
  ) {
    this.id = registry.declareChannel(name, 'single');
    this.slot = new Slot(name);
  }

  get isEmpty(): boolean {
    return this.slot.isEmpty;
  }

  get current(): ExclusivityCell<T> | null {
    return this.slot.current;
  }

  /**
   * Become the subscriber of this single. Only valid while a subscription is
   * being built.
   *
   * @throws SlotOccupiedError if another handler already holds it
   * @throws NoActiveSubscriptionError outside a subscription
   */
  register(cell: ExclusivityCell<T>): void {
    if (!this.slot.isEmpty) {
      throw new SlotOccupiedError(this.name);
    }
    this.registry.recordListen(this.id);
    this.registry.stageJoin(this.id, {
      check: () => {
        if (!this.slot.isEmpty) throw new SlotOccupiedError(this.name);
      },
      commit: () => {
        this.slot.insert(cell);
        return () => {
          if (this.slot.current === cell) this.slot.remove();
        };
      },
    });
  }

  /**
   * Obtain an emitter. Only valid while a subscription is being built.
   *
   * @throws NoActiveSubscriptionError outside a subscription
   */
  emitter(): SingleEmitter<T> {
    this.registry.recordEmit(this.id);
    return new SingleEmitter(this.slot);
  }

  /** @throws EmptyRequiredSlotError if nothing is subscribed */
  dispatch<R>(fn: (payload: T, access: Access<T>) => R): R {
    return this.slot.dispatch(fn);
  }

  /** @throws EmptyRequiredSlotError if nothing is subscribed */
  dispatchShared<R>(fn: (payload: Readonly<T>, access: Access<T>) => R): R {
    return this.slot.dispatchShared(fn);
  }
}
