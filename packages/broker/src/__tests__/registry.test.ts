import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Registry } from '../registry.js';
import {
  DuplicateChannelNameError,
  DuplicateDeclarationError,
  NoActiveSubscriptionError,
  RecursionDetectedError,
  UnknownChannelError,
} from '../errors.js';
import { handlerIdentity } from '../types.js';

/** Open a frame, declare listens and emits by name and close it. */
function subscribe(
  registry: Registry,
  name: string,
  listens: string[],
  emits: string[],
  key: string = name,
) {
  registry.beginSubscription(handlerIdentity(name, key));
  try {
    for (const channel of listens) registry.recordListen(registry.channelId(channel));
    for (const channel of emits) registry.recordEmit(registry.channelId(channel));
  } catch (err) {
    registry.abortSubscription();
    throw err;
  }
  return registry.endSubscription();
}

let registry: Registry;

beforeEach(() => {
  registry = new Registry();
  for (const name of ['a', 'b', 'c', 'd']) registry.declareChannel(name);
});

describe('Registry', () => {
  describe('channels', () => {
    it('issues sequential ids and resolves names both ways', () => {
      const fresh = new Registry();
      expect(fresh.declareChannel('first')).toBe(0);
      expect(fresh.declareChannel('second', 'single')).toBe(1);
      expect(fresh.channelName(1)).toBe('second');
      expect(fresh.channelKind(1)).toBe('single');
      expect(fresh.channelId('first')).toBe(0);
      expect(fresh.channelNames()).toEqual(['first', 'second']);
    });

    it('rejects a duplicate name', () => {
      expect(() => registry.declareChannel('a')).toThrow(DuplicateChannelNameError);
    });

    it('rejects unknown names and ids', () => {
      expect(() => registry.channelId('missing')).toThrow(UnknownChannelError);
      expect(() => registry.channelName(42)).toThrow('channel is not declared in this registry: #42');
    });
  });

  describe('subscription frames', () => {
    it('records outside a frame fail', () => {
      expect(() => registry.recordListen(0)).toThrow(NoActiveSubscriptionError);
      expect(() => registry.recordEmit(0)).toThrow('"a" modified outside of a subscription');
      expect(() => registry.endSubscription()).toThrow(NoActiveSubscriptionError);
    });

    it('rejects a repeated declaration in one frame', () => {
      registry.beginSubscription(handlerIdentity('X'));
      registry.recordListen(0);
      expect(() => registry.recordListen(0)).toThrow(DuplicateDeclarationError);
      expect(() => registry.recordListen(0)).toThrow('X declared listen on "a" more than once');
      registry.abortSubscription();
      expect(registry.inSubscription).toBe(false);
    });

    it('adds the cross product of listens and emits as edges', () => {
      subscribe(registry, 'X', ['a', 'b'], ['c', 'd']);
      expect(registry.edges()).toEqual([
        { from: 'a', to: 'c', handlers: ['X'] },
        { from: 'a', to: 'd', handlers: ['X'] },
        { from: 'b', to: 'c', handlers: ['X'] },
        { from: 'b', to: 'd', handlers: ['X'] },
      ]);
    });

    it('adds no edges for a handler that only listens', () => {
      const record = subscribe(registry, 'Sink', ['a'], []);
      expect(registry.edges()).toEqual([]);
      expect(record.listens).toEqual([0]);
      expect(record.emits).toEqual([]);
    });

    it('supports nested frames', () => {
      registry.beginSubscription(handlerIdentity('Outer'));
      registry.recordListen(0);
      const inner = subscribe(registry, 'Inner', ['c'], ['d']);
      registry.recordEmit(1);
      const outer = registry.endSubscription();

      expect(inner.node).toBe('Inner');
      expect(outer.listens).toEqual([0]);
      expect(outer.emits).toEqual([1]);
      expect(registry.edges().map((e) => `${e.from}->${e.to}`)).toEqual(['a->b', 'c->d']);
    });
  });

  describe('cycle detection', () => {
    it('rejects a handler that closes a cycle', () => {
      subscribe(registry, 'X', ['a'], ['b']);
      expect(() => subscribe(registry, 'Y', ['b'], ['a'])).toThrow(
        'found a recursion during subscription: [X]a -> [Y]b -> a',
      );
    });

    it('reports the chain without repeating the start', () => {
      subscribe(registry, 'X', ['a'], ['b']);
      try {
        subscribe(registry, 'Y', ['b'], ['a']);
        expect.unreachable('subscription should have been rejected');
      } catch (err) {
        expect(err).toBeInstanceOf(RecursionDetectedError);
        expect(err).toMatchObject({
          code: 'RECURSION_DETECTED',
          chain: ['a', 'b'],
          hops: [
            { from: 'a', to: 'b', handlers: ['X'] },
            { from: 'b', to: 'a', handlers: ['Y'] },
          ],
        });
      }
    });

    it('rejects a self-loop', () => {
      expect(() => subscribe(registry, 'X', ['a'], ['a'])).toThrow(
        'found a recursion during subscription: [X]a -> a',
      );
    });

    it('rejects a transitive cycle', () => {
      subscribe(registry, 'First', ['a'], ['b']);
      subscribe(registry, 'Second', ['b'], ['c']);
      expect(() => subscribe(registry, 'Third', ['c'], ['a'])).toThrow(
        'found a recursion during subscription: [First]a -> [Second]b -> [Third]c -> a',
      );
    });

    it('leaves no trace of a rejected subscription', () => {
      subscribe(registry, 'X', ['a'], ['b']);
      const before = registry.snapshot();
      const commit = vi.fn(() => () => undefined);

      registry.beginSubscription(handlerIdentity('Y'));
      registry.recordListen(1);
      registry.recordEmit(0);
      registry.stageJoin(1, { commit });
      expect(() => registry.endSubscription()).toThrow(RecursionDetectedError);

      expect(commit).not.toHaveBeenCalled();
      expect(registry.snapshot()).toEqual(before);
      expect(registry.inSubscription).toBe(false);
      // The graph still accepts a harmless handler afterwards
      expect(() => subscribe(registry, 'Z', ['b'], ['c'])).not.toThrow();
    });

    it('keeps edges after release so the same cycle stays rejected', () => {
      const x = subscribe(registry, 'X', ['a'], ['b']);
      registry.releaseSubscription(x);
      expect(() => subscribe(registry, 'Y', ['b'], ['a'])).toThrow(RecursionDetectedError);
    });
  });

  describe('staged joins', () => {
    it('runs checks before commits and collects detach functions', () => {
      const calls: string[] = [];
      registry.beginSubscription(handlerIdentity('X'));
      registry.recordListen(0);
      registry.stageJoin(0, {
        check: () => calls.push('check'),
        commit: () => {
          calls.push('commit');
          return () => calls.push('detach');
        },
      });
      const record = registry.endSubscription();
      for (const detach of record.detach) detach();

      expect(calls).toEqual(['check', 'commit', 'detach']);
    });

    it('commits nothing when a check fails', () => {
      const commit = vi.fn(() => () => undefined);
      registry.beginSubscription(handlerIdentity('X'));
      registry.recordListen(0);
      registry.recordEmit(1);
      registry.stageJoin(0, { commit });
      registry.stageJoin(0, {
        check: () => {
          throw new Error('occupied');
        },
        commit,
      });

      expect(() => registry.endSubscription()).toThrow('occupied');
      expect(commit).not.toHaveBeenCalled();
      expect(registry.edges()).toEqual([]);
    });
  });

  describe('per-kind policy', () => {
    it('shares one node per kind and accumulates its declarations', () => {
      subscribe(registry, 'Worker', ['a'], []);
      const second = subscribe(registry, 'Worker', [], ['b']);

      expect(second.node).toBe('Worker');
      expect(registry.edges()).toEqual([{ from: 'a', to: 'b', handlers: ['Worker'] }]);
    });

    it('detects a cycle formed only by the union of a kind', () => {
      subscribe(registry, 'Worker', ['a'], []);
      expect(() => subscribe(registry, 'Worker', [], ['a'])).toThrow(
        'found a recursion during subscription: [Worker]a -> a',
      );
    });

    it('keys kinds by identity key, not display name', () => {
      subscribe(registry, 'Left', ['a'], [], 'shared-kind');
      const record = subscribe(registry, 'Right', [], ['b'], 'shared-kind');
      expect(record.node).toBe('Left');
      expect(registry.edges()).toEqual([{ from: 'a', to: 'b', handlers: ['Left'] }]);
    });

    it('gives kinds that share a display name distinct labels', () => {
      const first = subscribe(registry, 'Worker', ['a'], ['b'], 'k1');
      const second = subscribe(registry, 'Worker', ['b'], ['c'], 'k2');
      const again = subscribe(registry, 'Worker', ['a'], [], 'k2');

      expect([first.node, second.node, again.node]).toEqual(['Worker', 'Worker~2', 'Worker~2']);
      expect(registry.edges()).toEqual([
        { from: 'a', to: 'b', handlers: ['Worker'] },
        { from: 'a', to: 'c', handlers: ['Worker~2'] },
        { from: 'b', to: 'c', handlers: ['Worker~2'] },
      ]);
    });

    it('names each kind separately in a rejected chain', () => {
      subscribe(registry, 'Worker', ['a'], ['b'], 'k1');
      expect(() => subscribe(registry, 'Worker', ['b'], ['a'], 'k2')).toThrow(
        'found a recursion during subscription: [Worker]a -> [Worker~2]b -> a',
      );
    });
  });

  describe('per-instance policy', () => {
    beforeEach(() => {
      registry = new Registry({ policy: 'per-instance' });
      for (const name of ['a', 'b']) registry.declareChannel(name);
    });

    it('numbers instances and keeps their declarations apart', () => {
      const first = subscribe(registry, 'Worker', ['a'], []);
      const second = subscribe(registry, 'Worker', [], ['a']);

      expect(first.node).toBe('Worker#1');
      expect(second.node).toBe('Worker#2');
      expect(registry.edges()).toEqual([]);
    });

    it('numbers instances per display name across kinds', () => {
      const first = subscribe(registry, 'Worker', ['a'], [], 'k1');
      const second = subscribe(registry, 'Worker', ['a'], [], 'k2');

      expect([first.node, second.node]).toEqual(['Worker#1', 'Worker#2']);
      expect(registry.snapshot().channels[0].listeners).toEqual(['Worker#1', 'Worker#2']);
    });

    it('still rejects a cycle within one instance', () => {
      expect(() => subscribe(registry, 'Worker', ['a'], ['a'])).toThrow(
        'found a recursion during subscription: [Worker#1]a -> a',
      );
    });
  });

  describe('memberships', () => {
    it('counts memberships and drops them on release', () => {
      const first = subscribe(registry, 'X', ['a'], ['b']);
      subscribe(registry, 'X', ['a'], []);

      expect(registry.snapshot().channels[0]).toEqual({
        name: 'a',
        kind: 'signal',
        listeners: ['X'],
        emitters: [],
      });

      registry.releaseSubscription(first);
      expect(registry.snapshot().channels[0].listeners).toEqual(['X']);
      expect(registry.snapshot().channels[1].emitters).toEqual([]);
    });

    it('records feed declarations without adding edges', () => {
      const feed = registry.declareChannel('events', 'feed');
      registry.beginSubscription(handlerIdentity('Producer'));
      registry.recordListen(0);
      registry.recordEmit(feed);
      const record = registry.endSubscription();

      expect(record.emits).toEqual([feed]);
      expect(registry.edges()).toEqual([]);
      const events = registry.snapshot().channels.find((c) => c.name === 'events');
      expect(events).toEqual({ name: 'events', kind: 'feed', listeners: [], emitters: ['Producer'] });
    });
  });

  describe('isChained', () => {
    it('reports the first reaching pair', () => {
      subscribe(registry, 'X', ['a'], ['b']);
      subscribe(registry, 'Y', ['b'], ['c']);

      expect(registry.isChained(['c', 'a'])).toEqual({ from: 'a', to: 'c' });
      expect(registry.isChained(['c', 'd'])).toBeNull();
    });
  });
});
