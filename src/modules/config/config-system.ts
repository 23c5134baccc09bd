/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { HookstageConfig, PartialHookstageConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Path to the project-level .hookstage/ directory (default: <cwd>/.hookstage) */
  projectConfigDir?: string
  /** Path to the global user-level .hookstage/ directory (default: ~/.hookstage) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialHookstageConfig
  /** Environment to read HOOKSTAGE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated hookstage configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): HookstageConfig

  /**
   * Return a single value by dot-notation key (e.g. "readiness.timeout_seconds").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
