import { vi } from 'vitest';
import type { ConsolaReporter, LogObject } from 'consola';
import {
  Hub,
  handlerIdentity,
  type Emitter,
  type HandlerIdentity,
  type Signal,
  type Subscription,
} from '@hubwire/broker';
import type { BrokerConfigInput } from '@hubwire/shared/config-schema';

/** Create a hub with quiet logging unless the test asks otherwise. */
export function createTestHub(config: BrokerConfigInput = {}): Hub {
  return new Hub({ config: { logging: { level: 'error' }, ...config } });
}

/** Create a HandlerIdentity with sensible defaults. */
export function createTestIdentity(overrides: Partial<HandlerIdentity> = {}): HandlerIdentity {
  const name = overrides.name ?? 'TestHandler';
  return handlerIdentity(name, overrides.key ?? name);
}

/**
 * Handler payload that records what it receives and passes `value + 1` on to
 * every signal it emits into.
 */
export class Forwarder {
  readonly seen: number[] = [];
  readonly onReceive = vi.fn<(value: number) => void>();

  constructor(private readonly outputs: Emitter<Forwarder>[] = []) {}

  receive(value: number): void {
    this.seen.push(value);
    this.onReceive(value);
    for (const out of this.outputs) {
      out.dispatch((next) => next.receive(value + 1));
    }
  }
}

/**
 * Subscribe a {@link Forwarder} that listens on `listens` and emits into `emits`.
 */
export function subscribeForwarder(
  hub: Hub,
  identity: string | HandlerIdentity,
  listens: Signal<Forwarder>[],
  emits: Signal<Forwarder>[] = [],
): Subscription<Forwarder> {
  return hub.subscribe({
    identity,
    emits: () => emits.map((signal) => signal.emitter()),
    create: (outputs) => new Forwarder(outputs),
    listens: (_hub, cell) => {
      for (const signal of listens) signal.register(cell);
    },
  });
}

/** Consola reporter that keeps `type: message` lines for assertions. */
export function createCaptureReporter(): { reporter: ConsolaReporter; lines: string[] } {
  const lines: string[] = [];
  const reporter: ConsolaReporter = {
    log: (logObj: LogObject) => {
      lines.push(`${logObj.type}: ${logObj.args.map(String).join(' ')}`);
    },
  };
  return { reporter, lines };
}
