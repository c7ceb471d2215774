/**
 * Error taxonomy for the broker.
 *
 * Every error is a wiring error: the shape of a hub is fixed once all
 * subscriptions are made, so these surface at startup or in tests. Each class
 * carries a machine-readable `code` for programmatic handling.
 *
 * @module broker/errors
 */

export type BrokerErrorCode =
  | 'DUPLICATE_CHANNEL_NAME'
  | 'DUPLICATE_DECLARATION'
  | 'RECURSION_DETECTED'
  | 'ALREADY_BORROWED'
  | 'NOT_IN_CONTEXT'
  | 'UNEXPECTED_ITEM'
  | 'EMPTY_REQUIRED_SLOT'
  | 'SLOT_OCCUPIED'
  | 'NOT_SUBSCRIBED'
  | 'NO_ACTIVE_SUBSCRIPTION'
  | 'UNKNOWN_CHANNEL'
  | 'FEED_OVERFLOW';

/** Base class for all broker errors. */
export class BrokerError extends Error {
  constructor(
    message: string,
    public readonly code: BrokerErrorCode,
  ) {
    super(message);
    this.name = 'BrokerError';
  }
}

/**
 * Narrow an unknown value to a {@link BrokerError}, optionally of one code.
 *
 * @param err - Value caught from a `try` block
 * @param code - Restrict the match to this code
 */
export function isBrokerError(err: unknown, code?: BrokerErrorCode): err is BrokerError {
  return err instanceof BrokerError && (code === undefined || err.code === code);
}

export class DuplicateChannelNameError extends BrokerError {
  constructor(public readonly channel: string) {
    super(`channel name is already declared in this registry: "${channel}"`, 'DUPLICATE_CHANNEL_NAME');
    this.name = 'DuplicateChannelNameError';
  }
}

export class DuplicateDeclarationError extends BrokerError {
  constructor(
    public readonly handler: string,
    public readonly channel: string,
    public readonly direction: 'listen' | 'emit',
  ) {
    super(`${handler} declared ${direction} on "${channel}" more than once`, 'DUPLICATE_DECLARATION');
    this.name = 'DuplicateDeclarationError';
  }
}

/** One step of a detected cycle and the handlers that wired it. */
export interface RecursionHop {
  from: string;
  to: string;
  handlers: string[];
}

/**
 * Renders hops as `[H1,H2]a -> [H3]b -> a`.
 *
 * A hop without handlers is rendered bare.
 */
export function formatRecursionChain(hops: readonly RecursionHop[]): string {
  if (hops.length === 0) return '';
  const parts = hops.map((hop) =>
    hop.handlers.length > 0 ? `[${hop.handlers.join(',')}]${hop.from}` : hop.from,
  );
  parts.push(hops[hops.length - 1].to);
  return parts.join(' -> ');
}

export class RecursionDetectedError extends BrokerError {
  /**
   * @param chain - Channels on the cycle, starting at the first repeated one
   * @param hops - Every edge of the closed loop, including the one back to `chain[0]`
   */
  constructor(
    public readonly chain: string[],
    public readonly hops: RecursionHop[],
  ) {
    super(`found a recursion during subscription: ${formatRecursionChain(hops)}`, 'RECURSION_DETECTED');
    this.name = 'RecursionDetectedError';
  }
}

export class AlreadyBorrowedError extends BrokerError {
  constructor(
    public readonly cell: string,
    public readonly requested: 'exclusive' | 'shared',
  ) {
    super(`${requested} dispatch on ${cell}: item is already borrowed`, 'ALREADY_BORROWED');
    this.name = 'AlreadyBorrowedError';
  }
}

export class NotInContextError extends BrokerError {
  constructor(public readonly cell: string) {
    super(`suspend on ${cell} called outside of any dispatch`, 'NOT_IN_CONTEXT');
    this.name = 'NotInContextError';
  }
}

export class UnexpectedItemError extends BrokerError {
  constructor(
    public readonly cell: string,
    reason: string,
  ) {
    super(`suspend on ${cell}: ${reason}`, 'UNEXPECTED_ITEM');
    this.name = 'UnexpectedItemError';
  }
}

export class EmptyRequiredSlotError extends BrokerError {
  constructor(public readonly slot: string) {
    super(`no item in required slot "${slot}"`, 'EMPTY_REQUIRED_SLOT');
    this.name = 'EmptyRequiredSlotError';
  }
}

export class SlotOccupiedError extends BrokerError {
  constructor(public readonly slot: string) {
    super(`unable to register multiple items simultaneously: "${slot}"`, 'SLOT_OCCUPIED');
    this.name = 'SlotOccupiedError';
  }
}

export class NotSubscribedError extends BrokerError {
  constructor(public readonly handler: string) {
    super(`unable to unsubscribe non-subscribed item: ${handler}`, 'NOT_SUBSCRIBED');
    this.name = 'NotSubscribedError';
  }
}

export class NoActiveSubscriptionError extends BrokerError {
  constructor(public readonly channel: string) {
    super(`"${channel}" modified outside of a subscription`, 'NO_ACTIVE_SUBSCRIPTION');
    this.name = 'NoActiveSubscriptionError';
  }
}

export class UnknownChannelError extends BrokerError {
  constructor(public readonly channel: string) {
    super(`channel is not declared in this registry: ${channel}`, 'UNKNOWN_CHANNEL');
    this.name = 'UnknownChannelError';
  }
}

export class FeedOverflowError extends BrokerError {
  constructor(
    public readonly feed: string,
    public readonly capacity: number,
  ) {
    super(`feed "${feed}" has a full queue (capacity ${capacity})`, 'FEED_OVERFLOW');
    this.name = 'FeedOverflowError';
  }
}
