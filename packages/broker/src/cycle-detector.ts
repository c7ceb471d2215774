/**
 * Cycle detection over the channel reachability graph.
 *
 * Pure functions: the registry hands in an adjacency map and lookups for
 * channel names and edge contributors. Traversal always visits channels in
 * name order so the reported cycle, and therefore the error text, is the
 * same on every run.
 *
 * @module broker/cycle-detector
 */
import type { ChannelId } from './types.js';
import type { RecursionHop } from './errors.js';

export type Adjacency = ReadonlyMap<ChannelId, ReadonlySet<ChannelId>>;

/** Compare strings by code unit, independent of locale. */
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

interface DfsFrame {
  node: ChannelId;
  /** Outgoing targets in name order. */
  children: ChannelId[];
  /** Index of the next child to visit. */
  next: number;
}

function sortedByName(ids: Iterable<ChannelId>, nameOf: (id: ChannelId) => string): ChannelId[] {
  return [...ids].sort((a, b) => compareNames(nameOf(a), nameOf(b)));
}

/**
 * Find the first cycle in `graph`.
 *
 * Depth-first from every channel in name order, following outgoing edges in
 * name order. Reaching a channel already on the current path closes a cycle;
 * the result is the path from that channel's first occurrence to the end.
 * Channels whose every descendant has been explored without a hit are not
 * entered again.
 *
 * @returns The channels on the cycle, or null when the graph is acyclic
 */
export function findCycle(graph: Adjacency, nameOf: (id: ChannelId) => string): ChannelId[] | null {
  const path: ChannelId[] = [];
  const onPath = new Set<ChannelId>();
  const finished = new Set<ChannelId>();
  // Explicit stack: a long acyclic chain must not exhaust the call stack.
  const frames: DfsFrame[] = [];

  const enter = (node: ChannelId): void => {
    path.push(node);
    onPath.add(node);
    frames.push({ node, children: sortedByName(graph.get(node) ?? [], nameOf), next: 0 });
  };

  for (const root of sortedByName(graph.keys(), nameOf)) {
    if (finished.has(root)) continue;
    enter(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.next === frame.children.length) {
        frames.pop();
        path.pop();
        onPath.delete(frame.node);
        finished.add(frame.node);
        continue;
      }
      const child = frame.children[frame.next++];
      if (onPath.has(child)) {
        return path.slice(path.indexOf(child));
      }
      if (!finished.has(child)) enter(child);
    }
  }
  return null;
}

/**
 * Describe every edge of a cycle, including the closing edge back to the start.
 *
 * @param chain - Result of {@link findCycle}
 * @param contributorsOf - Handler labels that wired the edge `from -> to`
 */
export function describeCycle(
  chain: readonly ChannelId[],
  nameOf: (id: ChannelId) => string,
  contributorsOf: (from: ChannelId, to: ChannelId) => Iterable<string>,
): RecursionHop[] {
  return chain.map((from, i) => {
    const to = chain[(i + 1) % chain.length];
    return {
      from: nameOf(from),
      to: nameOf(to),
      handlers: [...contributorsOf(from, to)].sort(compareNames),
    };
  });
}

/** Every channel reachable from `start` through one or more edges. */
export function descendants(graph: Adjacency, start: ChannelId): Set<ChannelId> {
  const seen = new Set<ChannelId>();
  const pending = [...(graph.get(start) ?? [])];
  while (pending.length > 0) {
    const next = pending.pop();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    for (const child of graph.get(next) ?? []) {
      if (!seen.has(child)) pending.push(child);
    }
  }
  return seen;
}

/**
 * Find two channels in `channels` where one reaches the other.
 *
 * A handler listening on both would be dispatched twice on one call path if
 * the first channel's handlers emit (directly or transitively) into the second.
 *
 * @returns The first such pair in argument order, or null
 */
export function findChain(
  graph: Adjacency,
  channels: readonly ChannelId[],
): { from: ChannelId; to: ChannelId } | null {
  for (const [i, from] of channels.entries()) {
    const reachable = descendants(graph, from);
    for (const [j, to] of channels.entries()) {
      if (i !== j && reachable.has(to)) {
        return { from, to };
      }
    }
  }
  return null;
}
