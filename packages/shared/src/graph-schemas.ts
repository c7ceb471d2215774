/**
 * Zod schemas for broker graph diagnostics.
 *
 * A snapshot is the read-only projection of a registry: declared channels,
 * the handlers currently listening on and emitting into each, and the
 * reachability edges accumulated so far.
 *
 * @module shared/graph-schemas
 */
import { z } from 'zod';

// === Enums ===

export const ChannelKindSchema = z.enum(['signal', 'single', 'feed']);

export type ChannelKind = z.infer<typeof ChannelKindSchema>;

// === Snapshot ===

export const ChannelSnapshotSchema = z.object({
  name: z.string().min(1),
  kind: ChannelKindSchema,
  listeners: z.array(z.string()),
  emitters: z.array(z.string()),
});

export type ChannelSnapshot = z.infer<typeof ChannelSnapshotSchema>;

export const ReachabilityEdgeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  handlers: z.array(z.string()),
});

export type ReachabilityEdge = z.infer<typeof ReachabilityEdgeSchema>;

export const GraphSnapshotSchema = z.object({
  channels: z.array(ChannelSnapshotSchema),
  edges: z.array(ReachabilityEdgeSchema),
});

export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;
