/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get/getConfig operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.hookstage/config.yaml)
 *     → project config      (./.hookstage/config.yaml)
 *     → environment vars    (HOOKSTAGE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import {
  HookstageConfigSchema,
  PartialHookstageConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type HookstageConfig,
  type PartialHookstageConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into `base`. Nested objects merge recursively; arrays and
 * scalars replace; undefined values are ignored.
 */
function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Format version
// ---------------------------------------------------------------------------

/**
 * Throw ConfigIncompatibleFormatError when a file declares a
 * config_format_version this release cannot read. Files without one are
 * read as the current format.
 */
export function assertReadableFormat(declared: unknown, filePath: string): void {
  if (declared === undefined) return
  const version = typeof declared === 'number' ? String(declared) : declared
  if (typeof version === 'string' && SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) return

  throw new ConfigIncompatibleFormatError(
    `Config file ${filePath} declares config_format_version ${JSON.stringify(declared)}; ` +
      `this release of hookstage reads ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
    { filePath, version: declared }
  )
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of HOOKSTAGE_ environment variable names to config paths.
 * Only overrides scalar values, plus the comma-separated kind list.
 */
const ENV_VAR_MAP: Record<string, string> = {
  HOOKSTAGE_LOG_LEVEL: 'global.log_level',
  HOOKSTAGE_ANNOTATION_KEY: 'hooks.annotation_key',
  HOOKSTAGE_UNRECOGNIZED_PHASE_POLICY: 'hooks.unrecognized_phase_policy',
  HOOKSTAGE_RUN_TO_COMPLETION_KINDS: 'hooks.run_to_completion_kinds',
  HOOKSTAGE_TIMEOUT_SECONDS: 'readiness.timeout_seconds',
  HOOKSTAGE_POLL_INTERVAL_MS: 'readiness.poll_interval_ms',
  HOOKSTAGE_KUBECTL_BINARY: 'kubectl.binary',
  HOOKSTAGE_NAMESPACE: 'kubectl.namespace',
  HOOKSTAGE_KUBE_CONTEXT: 'kubectl.context',
}

/** Config paths whose env value is a comma-separated list */
const LIST_PATHS = new Set(['hooks.run_to_completion_kinds'])

function coerceEnvValue(configPath: string, rawValue: string): unknown {
  if (LIST_PATHS.has(configPath)) {
    return rawValue
      .split(',')
      .map((v) => v.trim())
      .filter((v) => v !== '')
  }
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid overrides are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialHookstageConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = setByPath(overrides, configPath, coerceEnvValue(configPath, rawValue))
  }

  const parsed = PartialHookstageConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return {
    ...obj,
    [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value),
  }
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: HookstageConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialHookstageConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.hookstage')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.hookstage')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, then 3. project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const fileConfig = await this._loadYamlFile(join(dir, 'config.yaml'))
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
      }
    }

    // 4. Environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = HookstageConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): HookstageConfig {
    if (this._config === null) {
      throw new ConfigError(
        'Configuration has not been loaded. Call load() before getConfig().',
        {}
      )
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialHookstageConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file is an empty overlay
    if (parsed === undefined || parsed === null) return {}

    // Before Zod runs, so the message names the version
    if (isPlainObject(parsed)) {
      const declared = parsed['config_format_version']
      assertReadableFormat(declared, filePath)
      if (typeof declared === 'number') parsed['config_format_version'] = String(declared)
    }

    const result = PartialHookstageConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }

    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
