/**
 * @hubwire/broker -- In-process synchronous pub/sub with subscription-time
 * cycle detection.
 *
 * Provides named signals, singles and feeds on a hub, an exclusivity cell per
 * handler with a suspend escape hatch, and DOT export of the wiring.
 *
 * @module broker
 */

// Main entry point
export { Hub, Subscription } from './hub.js';
export type { HubOptions, SubscriberDefinition } from './hub.js';

// Endpoints
export { Signal, Emitter } from './signal.js';
export { Single, SingleEmitter } from './single.js';
export { Feed, Feeder, Feedee } from './feed.js';
export type { FeedOptions } from './feed.js';

// Sub-modules (for advanced usage)
export { Registry } from './registry.js';
export type { RegistryOptions, StagedJoin, Detach, SubscriptionRecord } from './registry.js';
export { ExclusivityCell, Access } from './exclusivity-cell.js';
export { ContextStack, processContextStack } from './context-stack.js';
export type { CellRef, StackEntry, StackFrameInfo } from './context-stack.js';
export { Channel } from './channel.js';
export { Slot } from './slot.js';

// Pure functions
export { findCycle, findChain, describeCycle, descendants } from './cycle-detector.js';
export type { Adjacency } from './cycle-detector.js';
export { toDot } from './graphviz.js';
export type { DotOptions } from './graphviz.js';

// Configuration and logging
export { resolveBrokerConfig, configFromEnv, ConfigError } from './config.js';
export { logger, initLogger } from './logger.js';

// Errors
export {
  BrokerError,
  isBrokerError,
  formatRecursionChain,
  DuplicateChannelNameError,
  DuplicateDeclarationError,
  RecursionDetectedError,
  AlreadyBorrowedError,
  NotInContextError,
  UnexpectedItemError,
  EmptyRequiredSlotError,
  SlotOccupiedError,
  NotSubscribedError,
  NoActiveSubscriptionError,
  UnknownChannelError,
  FeedOverflowError,
} from './errors.js';
export type { BrokerErrorCode, RecursionHop } from './errors.js';

// Types
export { handlerIdentity } from './types.js';
export type { ChannelId, ChannelKind, HandlerIdentity, AccessState, AccessMode } from './types.js';
