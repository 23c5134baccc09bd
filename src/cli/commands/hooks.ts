/**
 * `hookstage hooks` command
 *
 * Lists the hooks declared in a rendered manifest directory, grouped by
 * phase, followed by the ordinary release resources.
 *
 * Usage:
 *   hookstage hooks <dir>                       Human-readable listing
 *   hookstage hooks <dir> --output-format json  JSON output
 *
 * Exit codes:
 *   0 - Success
 *   1 - Unexpected error
 *   2 - Usage error (missing directory, unreadable manifests, invalid config)
 */

import type { Command } from 'commander'
import { loadRenderedManifests } from '../../modules/manifest-loader/manifest-loader.js'
import { assembleHookSet } from '../../modules/hooks/hook-set.js'
import { createLogger } from '../../utils/logger.js'
import { buildHookSetJson, formatHookSetForDisplay } from '../formatters/hook-set-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  extractionOptionsFrom,
  loadCliConfig,
  reportError,
  resolveManifestDir,
  type CliContextOptions,
  type OutputFormat,
} from '../utils/context.js'

const logger = createLogger('hooks-cmd')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HooksActionOptions extends CliContextOptions {
  dir: string
  outputFormat: OutputFormat
}

// ---------------------------------------------------------------------------
// runHooksAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the hooks command.
 *
 * Returns the exit code. Separated from Commander integration for testability.
 */
export async function runHooksAction(options: HooksActionOptions): Promise<number> {
  const dir = resolveManifestDir(options.dir, options.projectRoot)
  if (dir === null) {
    process.stderr.write(`Error: Manifest directory not found: ${options.dir}\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    const config = await loadCliConfig(options)
    const manifests = await loadRenderedManifests(dir)
    const assembly = assembleHookSet(manifests, extractionOptionsFrom(config))

    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(buildHookSetJson(assembly), null, 2) + '\n')
    } else {
      process.stdout.write(formatHookSetForDisplay(assembly) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    logger.debug({ err }, 'runHooksAction failed')
    return reportError(err)
  }
}

// ---------------------------------------------------------------------------
// registerHooksCommand
// ---------------------------------------------------------------------------

/**
 * Register the `hookstage hooks` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerHooksCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('hooks <dir>')
    .description('List hooks per phase and ordinary resources in a rendered manifest directory')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (dir: string, opts: { outputFormat: string }) => {
      process.exitCode = await runHooksAction({
        dir,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
        projectRoot,
      })
    })
}
