/**
 * Channel registry and subscription-time cycle check.
 *
 * The registry owns channel names, the append-only reachability graph
 * (channel → channels its listeners may emit into) and the diagnostic
 * membership records. A subscription opens a construction frame, records
 * which channels the new handler listens on and emits into, and stages the
 * container joins it needs. Closing the frame validates the whole graph on a
 * scratch copy and only then commits edges, records and joins, so a rejected
 * subscription leaves no trace.
 *
 * Dispatch never consults the registry.
 *
 * @module broker/registry
 */
import type { ChannelSnapshot, GraphSnapshot, ReachabilityEdge } from '@hubwire/shared/graph-schemas';
import type { SubscriptionPolicy } from '@hubwire/shared/config-schema';
import { describeCycle, findChain, findCycle, type Adjacency } from './cycle-detector.js';
import {
  DuplicateChannelNameError,
  DuplicateDeclarationError,
  NoActiveSubscriptionError,
  RecursionDetectedError,
  UnknownChannelError,
} from './errors.js';
import { logger } from './logger.js';
import type { ChannelId, ChannelKind, HandlerIdentity } from './types.js';

// === Types ===

export interface RegistryOptions {
  /** Graph-node granularity for repeated handler kinds. Defaults to `per-kind`. */
  policy?: SubscriptionPolicy;
}

/** Undo function returned by a committed join. */
export type Detach = () => void;

/** A container join that only takes effect once the subscription is accepted. */
export interface StagedJoin {
  /** Throws if the join can no longer happen. Runs before anything is committed. */
  check?: () => void;
  commit: () => Detach;
}

/** What a committed subscription declared, kept so it can be released later. */
export interface SubscriptionRecord {
  identity: HandlerIdentity;
  /** Graph node label: the kind name, or `name#n` under `per-instance`. */
  node: string;
  /** Every channel listened on, feeds included. */
  listens: ChannelId[];
  /** Every channel emitted into, feeds included. */
  emits: ChannelId[];
  /** Leave every container joined by this subscription. */
  detach: Detach[];
}

interface ChannelRecord {
  id: ChannelId;
  name: string;
  kind: ChannelKind;
  /** Handler label → number of live subscriptions under that label. */
  listeners: Map<string, number>;
  emitters: Map<string, number>;
}

interface ConstructionFrame {
  identity: HandlerIdentity;
  node: string;
  /** Edge-generating declarations. */
  listens: Set<ChannelId>;
  emits: Set<ChannelId>;
  /** Feed declarations: membership only, no reachability edges. */
  feedListens: Set<ChannelId>;
  feedEmits: Set<ChannelId>;
  joins: StagedJoin[];
}

interface KindDeclarations {
  listens: Set<ChannelId>;
  emits: Set<ChannelId>;
}

// === Helpers ===

function edgeKey(from: ChannelId, to: ChannelId): string {
  return `${from}:${to}`;
}

function cloneAdjacency(graph: Adjacency): Map<ChannelId, Set<ChannelId>> {
  const copy = new Map<ChannelId, Set<ChannelId>>();
  for (const [from, targets] of graph) {
    copy.set(from, new Set(targets));
  }
  return copy;
}

function increment(counts: Map<string, number>, label: string): void {
  counts.set(label, (counts.get(label) ?? 0) + 1);
}

function decrement(counts: Map<string, number>, label: string): void {
  const next = (counts.get(label) ?? 0) - 1;
  if (next > 0) {
    counts.set(label, next);
  } else {
    counts.delete(label);
  }
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// === Registry ===

export class Registry {
  readonly policy: SubscriptionPolicy;
  private readonly channelsById: ChannelRecord[] = [];
  private readonly idsByName = new Map<string, ChannelId>();
  private graph = new Map<ChannelId, Set<ChannelId>>();
  private readonly contributors = new Map<string, Set<string>>();
  private readonly frames: ConstructionFrame[] = [];
  private readonly kinds = new Map<string, KindDeclarations>();
  private readonly kindLabels = new Map<string, string>();
  /** Label → identity key that claimed it, under `per-kind`. */
  private readonly labelOwners = new Map<string, string>();
  /** Display name → instances numbered so far, under `per-instance`. */
  private readonly instanceCounts = new Map<string, number>();

  constructor(options?: RegistryOptions) {
    this.policy = options?.policy ?? 'per-kind';
  }

  // --- Channels ---

  /**
   * Declare a channel name.
   *
   * @returns A stable integer handle for the channel
   * @throws DuplicateChannelNameError if the name is already declared
   */
  declareChannel(name: string, kind: ChannelKind = 'signal'): ChannelId {
    if (this.idsByName.has(name)) {
      throw new DuplicateChannelNameError(name);
    }
    const id = this.channelsById.length;
    this.channelsById.push({ id, name, kind, listeners: new Map(), emitters: new Map() });
    this.idsByName.set(name, id);
    return id;
  }

  /** @throws UnknownChannelError for handles this registry never issued */
  channelName(id: ChannelId): string {
    return this.record(id).name;
  }

  channelKind(id: ChannelId): ChannelKind {
    return this.record(id).kind;
  }

  /** @throws UnknownChannelError if no channel has this name */
  channelId(name: string): ChannelId {
    const id = this.idsByName.get(name);
    if (id === undefined) {
      throw new UnknownChannelError(name);
    }
    return id;
  }

  /** Declared channel names in declaration order. */
  channelNames(): string[] {
    return this.channelsById.map((c) => c.name);
  }

  // --- Subscription frames ---

  /** True while at least one construction frame is open. */
  get inSubscription(): boolean {
    return this.frames.length > 0;
  }

  /**
   * Open a construction frame for a new handler.
   *
   * @returns The graph node label the handler is recorded under
   */
  beginSubscription(identity: HandlerIdentity): string {
    const node = this.nodeLabel(identity);
    this.frames.push({
      identity,
      node,
      listens: new Set(),
      emits: new Set(),
      feedListens: new Set(),
      feedEmits: new Set(),
      joins: [],
    });
    return node;
  }

  /**
   * Record that the handler under construction listens on a channel.
   * Listening on a feed is recorded for diagnostics only.
   *
   * @throws NoActiveSubscriptionError outside a construction frame
   * @throws DuplicateDeclarationError if already recorded in this frame
   */
  recordListen(id: ChannelId): void {
    const frame = this.activeFrame(id);
    const target = this.channelKind(id) === 'feed' ? frame.feedListens : frame.listens;
    if (target.has(id)) {
      throw new DuplicateDeclarationError(frame.node, this.channelName(id), 'listen');
    }
    target.add(id);
  }

  /**
   * Record that the handler under construction emits into a channel.
   * Emitting into a feed is recorded for diagnostics only.
   *
   * @throws NoActiveSubscriptionError outside a construction frame
   * @throws DuplicateDeclarationError if already recorded in this frame
   */
  recordEmit(id: ChannelId): void {
    const frame = this.activeFrame(id);
    const target = this.channelKind(id) === 'feed' ? frame.feedEmits : frame.emits;
    if (target.has(id)) {
      throw new DuplicateDeclarationError(frame.node, this.channelName(id), 'emit');
    }
    target.add(id);
  }

  /**
   * Queue a container join for the handler under construction.
   *
   * @param id - Channel the join belongs to, used for error reporting
   */
  stageJoin(id: ChannelId, join: StagedJoin): void {
    this.activeFrame(id).joins.push(join);
  }

  /**
   * Close the current frame.
   *
   * Adds every (listen, emit) edge to a scratch copy of the graph and checks
   * the whole copy for cycles. On success the copy replaces the graph, the
   * membership records are updated and the staged joins run.
   *
   * @throws RecursionDetectedError if the new edges close a cycle; nothing is committed
   * @throws NoActiveSubscriptionError if no frame is open
   */
  endSubscription(): SubscriptionRecord {
    const frame = this.frames.pop();
    if (!frame) {
      throw new NoActiveSubscriptionError('(end of subscription)');
    }

    const { listens, emits } = this.edgeSources(frame);
    const scratch = cloneAdjacency(this.graph);
    const staged = new Set<string>();
    for (const from of listens) {
      for (const to of emits) {
        let targets = scratch.get(from);
        if (!targets) {
          targets = new Set();
          scratch.set(from, targets);
        }
        targets.add(to);
        staged.add(edgeKey(from, to));
      }
    }

    const nameOf = (id: ChannelId): string => this.channelName(id);
    const cycle = findCycle(scratch, nameOf);
    if (cycle) {
      const hops = describeCycle(cycle, nameOf, (from, to) => {
        const key = edgeKey(from, to);
        const handlers = new Set(this.contributors.get(key));
        if (staged.has(key)) handlers.add(frame.node);
        return handlers;
      });
      const error = new RecursionDetectedError(cycle.map(nameOf), hops);
      logger.warn(`Registry: rejected ${frame.node}: ${error.message}`);
      throw error;
    }

    for (const join of frame.joins) {
      join.check?.();
    }

    this.graph = scratch;
    for (const key of staged) {
      let handlers = this.contributors.get(key);
      if (!handlers) {
        handlers = new Set();
        this.contributors.set(key, handlers);
      }
      handlers.add(frame.node);
    }
    const record: SubscriptionRecord = {
      identity: frame.identity,
      node: frame.node,
      listens: [...frame.listens, ...frame.feedListens],
      emits: [...frame.emits, ...frame.feedEmits],
      detach: [],
    };
    for (const id of record.listens) increment(this.record(id).listeners, frame.node);
    for (const id of record.emits) increment(this.record(id).emitters, frame.node);
    if (this.policy === 'per-kind') {
      this.kinds.set(frame.identity.key, { listens, emits });
    }
    for (const join of frame.joins) {
      record.detach.push(join.commit());
    }

    logger.debug(
      `Registry: subscribed ${frame.node} (listens: ${record.listens.map(nameOf).join(', ') || '-'}; ` +
        `emits: ${record.emits.map(nameOf).join(', ') || '-'})`,
    );
    return record;
  }

  /** Drop the current frame without committing anything. */
  abortSubscription(): void {
    const frame = this.frames.pop();
    if (frame) {
      logger.debug(`Registry: aborted subscription of ${frame.node}`);
    }
  }

  /**
   * Remove a handler's membership records. Reachability edges stay, so
   * cycle safety does not depend on subscribe/unsubscribe ordering.
   */
  releaseSubscription(record: SubscriptionRecord): void {
    for (const id of record.listens) decrement(this.record(id).listeners, record.node);
    for (const id of record.emits) decrement(this.record(id).emitters, record.node);
  }

  // --- Queries ---

  /** Reachability edges as channel-name pairs, sorted. */
  edges(): ReachabilityEdge[] {
    const edges: ReachabilityEdge[] = [];
    for (const [from, targets] of this.graph) {
      for (const to of targets) {
        edges.push({
          from: this.channelName(from),
          to: this.channelName(to),
          handlers: [...(this.contributors.get(edgeKey(from, to)) ?? [])].sort(byCodeUnit),
        });
      }
    }
    return edges.sort((a, b) => byCodeUnit(a.from, b.from) || byCodeUnit(a.to, b.to));
  }

  /**
   * Check whether one of the named channels reaches another.
   *
   * @returns The first reaching pair, or null if none reach each other
   * @throws UnknownChannelError for undeclared names
   */
  isChained(names: readonly string[]): { from: string; to: string } | null {
    const found = findChain(
      this.graph,
      names.map((n) => this.channelId(n)),
    );
    return found ? { from: this.channelName(found.from), to: this.channelName(found.to) } : null;
  }

  /** Read-only projection of channels, memberships and edges. */
  snapshot(): GraphSnapshot {
    const channels: ChannelSnapshot[] = [...this.channelsById]
      .sort((a, b) => byCodeUnit(a.name, b.name))
      .map((c) => ({
        name: c.name,
        kind: c.kind,
        listeners: [...c.listeners.keys()].sort(byCodeUnit),
        emitters: [...c.emitters.keys()].sort(byCodeUnit),
      }));
    return { channels, edges: this.edges() };
  }

  // --- Internals ---

  private record(id: ChannelId): ChannelRecord {
    const record = this.channelsById[id];
    if (!record) {
      throw new UnknownChannelError(`#${id}`);
    }
    return record;
  }

  private activeFrame(id: ChannelId): ConstructionFrame {
    const name = this.channelName(id);
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new NoActiveSubscriptionError(name);
    }
    return frame;
  }

  /**
   * Graph node label for a new subscription. Labels stay unique across kinds:
   * instances are numbered per display name, and under `per-kind` a name
   * already taken by another kind gets a `~n` suffix.
   */
  private nodeLabel(identity: HandlerIdentity): string {
    if (this.policy === 'per-instance') {
      const count = (this.instanceCounts.get(identity.name) ?? 0) + 1;
      this.instanceCounts.set(identity.name, count);
      return `${identity.name}#${count}`;
    }
    const existing = this.kindLabels.get(identity.key);
    if (existing !== undefined) return existing;

    let label = identity.name;
    for (let n = 2; this.labelOwners.has(label); n++) {
      label = `${identity.name}~${n}`;
    }
    this.kindLabels.set(identity.key, label);
    this.labelOwners.set(label, identity.key);
    return label;
  }

  /** Listen and emit sets that generate edges for this frame under the active policy. */
  private edgeSources(frame: ConstructionFrame): KindDeclarations {
    if (this.policy === 'per-instance') {
      return { listens: frame.listens, emits: frame.emits };
    }
    const previous = this.kinds.get(frame.identity.key);
    return {
      listens: new Set([...(previous?.listens ?? []), ...frame.listens]),
      emits: new Set([...(previous?.emits ?? []), ...frame.emits]),
    };
  }
}
