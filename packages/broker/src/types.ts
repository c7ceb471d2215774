/**
 * Shared type definitions for the @hubwire/broker package.
 *
 * @module broker/types
 */
import type { ChannelKind } from '@hubwire/shared/graph-schemas';

export type { ChannelKind };

/** Stable integer handle for a channel declared in a registry. */
export type ChannelId = number;

/**
 * Names a handler for diagnostics and for graph-node deduplication.
 *
 * `key` identifies the concrete handler kind; two identities with the same key
 * are the same kind even when their display names differ.
 */
export interface HandlerIdentity {
  name: string;
  key: string;
}

/**
 * Build a {@link HandlerIdentity}, defaulting the key to the name.
 *
 * @param name - Display name used in diagnostics
 * @param key - Uniqueness key for the handler kind
 */
export function handlerIdentity(name: string, key: string = name): HandlerIdentity {
  return { name, key };
}

/** Tagged access state of an exclusivity cell. */
export type AccessState =
  | { kind: 'free' }
  | { kind: 'exclusive' }
  | { kind: 'shared'; readers: number };

export type AccessMode = 'exclusive' | 'shared';
