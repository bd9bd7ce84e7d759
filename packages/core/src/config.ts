/**
 * Process-wide configuration for ndstore
 *
 * @module config
 */

import { Logger, type LogLevel } from './logger';

/**
 * Maximum number of units allowed in a tensor
 * Default: Number.MAX_SAFE_INTEGER (2^53 - 1)
 */
export const MAX_TENSOR_SIZE = Number.MAX_SAFE_INTEGER;

/**
 * Configuration options accepted by {@link configure}
 */
export interface NdstoreConfig {
  /**
   * Verify on every slice access that the base tensor has not been
   * reallocated since the slice was created.
   *
   * - `true` (default): a stale slice throws `StaleViewError`.
   * - `false`: the access proceeds against the current buffer and a warning
   *   is logged. Callers are then responsible for not keeping slices across
   *   append/remove on their base.
   *
   * @default true
   */
  checkStaleViews?: boolean;

  /**
   * Minimum log level, forwarded to {@link Logger.setLevel}
   */
  logLevel?: LogLevel;
}

interface ResolvedConfig {
  checkStaleViews: boolean;
}

const DEFAULT_CONFIG: ResolvedConfig = {
  checkStaleViews: true,
};

let _config: ResolvedConfig = { ...DEFAULT_CONFIG };

/**
 * Update configuration. Unspecified options keep their current value.
 *
 * @example
 * ```ts
 * configure({ checkStaleViews: false, logLevel: 'debug' });
 * ```
 */
export function configure(options: NdstoreConfig): void {
  if (options.checkStaleViews !== undefined) {
    _config = { ..._config, checkStaleViews: options.checkStaleViews };
  }
  if (options.logLevel !== undefined) {
    Logger.setLevel(options.logLevel);
  }
}

export function getConfig(): Readonly<ResolvedConfig> {
  return _config;
}

/**
 * Restore defaults. Intended for tests.
 */
export function resetConfig(): void {
  _config = { ...DEFAULT_CONFIG };
  Logger.reset();
}
