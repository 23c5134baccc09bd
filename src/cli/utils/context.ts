/**
 * Shared setup for CLI commands: exit codes, configuration loading and
 * rendered-manifest discovery.
 */

import { existsSync, statSync } from 'fs'
import { join, resolve } from 'path'
import {
  ConfigError,
  ConfigIncompatibleFormatError,
  ManifestParseError,
  UnknownOperationError,
  UnrecognizedPhaseError,
} from '../../core/errors.js'
import type { Operation } from '../../core/types.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { HookstageConfig, PartialHookstageConfig } from '../../modules/config/config-schema.js'
import type { ExtractionOptions } from '../../modules/hooks/types.js'
import { isOperation } from '../../modules/hooks/phase-registry.js'
import { errorMessage } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE_ERROR = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options every command accepts for locating configuration */
export interface CliContextOptions {
  /** Directory holding the project's .hookstage/ folder */
  projectRoot: string
  /** Override for ~/.hookstage (tests) */
  globalConfigDir?: string
  /** Override for process.env (tests) */
  env?: NodeJS.ProcessEnv
  /** Values taken from command flags */
  cliOverrides?: PartialHookstageConfig
}

export type OutputFormat = 'human' | 'json'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Load the merged configuration for a command.
 *
 * @throws {ConfigError} when a config source is invalid
 */
export async function loadCliConfig(options: CliContextOptions): Promise<HookstageConfig> {
  const system = createConfigSystem({
    projectConfigDir: join(options.projectRoot, '.hookstage'),
    ...(options.globalConfigDir !== undefined ? { globalConfigDir: options.globalConfigDir } : {}),
    ...(options.env !== undefined ? { env: options.env } : {}),
    ...(options.cliOverrides !== undefined ? { cliOverrides: options.cliOverrides } : {}),
  })
  await system.load()
  return system.getConfig()
}

/** Annotation reading options taken from the hooks config section */
export function extractionOptionsFrom(config: HookstageConfig): ExtractionOptions {
  return {
    annotationKey: config.hooks.annotation_key,
    unrecognizedPolicy: config.hooks.unrecognized_phase_policy,
  }
}

/**
 * Resolve a manifest directory argument against the project root.
 * Returns null when it does not name an existing directory.
 */
export function resolveManifestDir(dir: string, projectRoot: string): string | null {
  const absolute = resolve(projectRoot, dir)
  if (!existsSync(absolute) || !statSync(absolute).isDirectory()) return null
  return absolute
}

/** Parse an operation argument, writing a usage error when it is not one of the four */
export function parseOperationArg(value: string): Operation | null {
  if (isOperation(value)) return value
  process.stderr.write(
    `Error: Unknown operation "${value}". Expected one of: install, upgrade, delete, rollback\n`
  )
  return null
}

/**
 * Map an error raised while preparing a command to an exit code.
 * Input problems (configuration, manifests, arguments) are usage errors.
 */
export function exitCodeForError(err: unknown): number {
  if (
    err instanceof ConfigError ||
    err instanceof ConfigIncompatibleFormatError ||
    err instanceof ManifestParseError ||
    err instanceof UnknownOperationError ||
    err instanceof UnrecognizedPhaseError
  ) {
    return EXIT_USAGE_ERROR
  }
  return EXIT_FAILURE
}

/** Write `Error: <message>` to stderr and return the matching exit code */
export function reportError(err: unknown): number {
  process.stderr.write(`Error: ${errorMessage(err)}\n`)
  return exitCodeForError(err)
}
