/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { ConveyorConfig, PartialConveyorConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .conveyor/ directory (default: <cwd>/.conveyor) */
  projectConfigDir?: string
  /** Path to the global user-level .conveyor/ directory (default: ~/.conveyor) */
  globalConfigDir?: string
  /**
   * Values that override every other source. Typically populated from CLI flags.
   */
  cliOverrides?: PartialConveyorConfig
  /** Environment to read CONVEYOR_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * @throws {ConfigError} listing every validation issue
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): ConveyorConfig

  /**
   * Return a single value by dot-notation key (e.g. "queue.lease_ms").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown or the value invalid
   */
  set(key: string, value: unknown): Promise<void>

  /**
   * The merged config with credential fields masked. Safe to print.
   */
  getMasked(): Record<string, unknown>

  readonly isLoaded: boolean
}
