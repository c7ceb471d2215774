import { createConsola, type ConsolaReporter } from 'consola';
import { LOG_LEVEL_MAP, type LogLevelName } from '@hubwire/shared/config-schema';

/**
 * Central logger module for the broker.
 *
 * Provides a singleton logger backed by consola. Modules import the live
 * `logger` binding, so a call to `initLogger()` reconfigures every module at
 * once. Messages are prefixed with the emitting component (`Registry: ...`).
 *
 * @module broker/logger
 */

/** Default logger instance (info level until initLogger is called). */
export let logger = createConsola({
  level: LOG_LEVEL_MAP.info,
});

/**
 * Reconfigure the broker logger.
 *
 * @param options - Optional configuration
 * @param options.level - Level name or numeric consola level (0=fatal … 5=trace)
 * @param options.reporters - Replace the default console reporters, e.g. to capture logs in tests
 */
export function initLogger(options?: {
  level?: LogLevelName | number;
  reporters?: ConsolaReporter[];
}): void {
  const raw = options?.level ?? 'info';
  const level = typeof raw === 'number' ? raw : LOG_LEVEL_MAP[raw];

  logger = createConsola({
    level,
    ...(options?.reporters ? { reporters: options.reporters } : {}),
  });
}
