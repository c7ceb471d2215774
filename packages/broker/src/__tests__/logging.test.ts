import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Hub } from '../hub.js';
import type { Signal } from '../signal.js';
import { initLogger, logger } from '../logger.js';

vi.mock('../logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  },
  initLogger: vi.fn(),
}));

interface Handler {
  name: string;
}

describe('broker logging', () => {
  let hub: Hub;

  beforeEach(() => {
    vi.clearAllMocks();
    hub = new Hub();
  });

  function subscribe(identity: string, listens: Signal<Handler>[], emits: Signal<Handler>[]) {
    return hub.subscribe({
      identity,
      emits: () => emits.map((signal) => signal.emitter()),
      create: () => ({ name: identity }),
      listens: (_hub, cell) => {
        for (const signal of listens) signal.register(cell);
      },
    });
  }

  it('logs committed subscriptions at debug level', () => {
    const a = hub.signal<Handler>('a');
    const b = hub.signal<Handler>('b');
    subscribe('X', [a], [b]);

    expect(logger.debug).toHaveBeenCalledWith('Registry: subscribed X (listens: a; emits: b)');
  });

  it('logs rejected subscriptions at warn level', () => {
    const a = hub.signal<Handler>('a');
    expect(() => subscribe('X', [a], [a])).toThrow();

    expect(logger.warn).toHaveBeenCalledWith(
      'Registry: rejected X: found a recursion during subscription: [X]a -> a',
    );
  });

  it('logs unsubscribe at debug level', () => {
    const sub = subscribe('Idle', [], []);
    hub.unsubscribe(sub);

    expect(logger.debug).toHaveBeenCalledWith('Registry: subscribed Idle (listens: -; emits: -)');
    expect(logger.debug).toHaveBeenLastCalledWith('Hub: unsubscribed Idle');
  });

  it('logs feed delivery at trace level', () => {
    const jobs = hub.feed<string>('jobs');
    const sub = hub.subscribe({
      identity: 'Producer',
      emits: () => ({ out: jobs.feeder() }),
      create: ({ out }) => ({ out, inbox: jobs.feedee() }),
      listens: () => undefined,
    });
    sub.cell.dispatch(({ out }) => out.feed('job-1'));

    expect(logger.trace).toHaveBeenCalledWith('Feed: delivered to 1 feedee(s) on "jobs"');
  });

  it('configures the logger only when the hub config has a logging section', () => {
    expect(initLogger).not.toHaveBeenCalled();
    const configured = new Hub({ config: { logging: { level: 'debug' } } });

    expect(configured.config.logging.level).toBe('debug');
    expect(initLogger).toHaveBeenCalledWith({ level: 'debug' });
  });
});
