/**
 * Render a hub's wiring as a Graphviz DOT digraph.
 *
 * @module broker/graphviz
 */
import type { GraphSnapshot } from '@hubwire/shared/graph-schemas';

export interface DotOptions {
  /** Graph name. Defaults to `Hub`. */
  name?: string;
  /** Also draw dotted channel → channel reachability edges. */
  includeReachability?: boolean;
}

const BARE_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function graphId(name: string): string {
  return BARE_ID.test(name) ? name : quote(name);
}

const channelNode = (name: string): string => quote(`c:${name}`);
const handlerNode = (name: string): string => quote(`h:${name}`);

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Channels are ellipses (feeds dashed) and handlers boxes. A listen is drawn
 * `channel -> handler`, an emit `handler -> channel`.
 */
export function toDot(snapshot: GraphSnapshot, options: DotOptions = {}): string {
  const { name = 'Hub', includeReachability = false } = options;
  const channels = [...snapshot.channels].sort((a, b) => byCodeUnit(a.name, b.name));

  const handlers = new Set<string>();
  for (const channel of channels) {
    for (const h of channel.listeners) handlers.add(h);
    for (const h of channel.emitters) handlers.add(h);
  }

  const lines: string[] = [`digraph ${graphId(name)} {`];
  for (const channel of channels) {
    const style = channel.kind === 'feed' ? ', style=dashed' : '';
    lines.push(`\t${channelNode(channel.name)} [label=${quote(channel.name)}, shape=ellipse${style}];`);
  }
  for (const handler of [...handlers].sort(byCodeUnit)) {
    lines.push(`\t${handlerNode(handler)} [label=${quote(handler)}, shape=box];`);
  }
  for (const channel of channels) {
    for (const listener of [...channel.listeners].sort(byCodeUnit)) {
      lines.push(`\t${channelNode(channel.name)} -> ${handlerNode(listener)};`);
    }
  }
  for (const channel of channels) {
    for (const emitter of [...channel.emitters].sort(byCodeUnit)) {
      lines.push(`\t${handlerNode(emitter)} -> ${channelNode(channel.name)};`);
    }
  }
  if (includeReachability) {
    const edges = [...snapshot.edges].sort((a, b) => byCodeUnit(a.from, b.from) || byCodeUnit(a.to, b.to));
    for (const edge of edges) {
      lines.push(`\t${channelNode(edge.from)} -> ${channelNode(edge.to)} [style=dotted];`);
    }
  }
  lines.push('}');
  return lines.join('\n');
}
