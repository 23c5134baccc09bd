/**
 * `hookstage plan` command
 *
 * Prints the pre → main → post sequence an operation would run for a
 * rendered manifest directory, without touching the cluster.
 *
 * Usage:
 *   hookstage plan <operation> <dir>
 *   hookstage plan <operation> <dir> --no-hooks
 *   hookstage plan <operation> <dir> --output-format json
 *
 * Exit codes:
 *   0 - Success
 *   1 - Unexpected error
 *   2 - Usage error (unknown operation, missing directory, parse or config error)
 */

import type { Command } from 'commander'
import { loadRenderedManifests } from '../../modules/manifest-loader/manifest-loader.js'
import { assembleHookSet } from '../../modules/hooks/hook-set.js'
import { createLogger } from '../../utils/logger.js'
import { buildPlanJson, formatPlanForDisplay } from '../formatters/hook-set-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  extractionOptionsFrom,
  loadCliConfig,
  parseOperationArg,
  reportError,
  resolveManifestDir,
  type CliContextOptions,
  type OutputFormat,
} from '../utils/context.js'

const logger = createLogger('plan-cmd')

export interface PlanActionOptions extends CliContextOptions {
  operation: string
  dir: string
  outputFormat: OutputFormat
  disableHooks: boolean
}

/**
 * Core action for the plan command. Returns the exit code.
 */
export async function runPlanAction(options: PlanActionOptions): Promise<number> {
  const operation = parseOperationArg(options.operation)
  if (operation === null) return EXIT_USAGE_ERROR

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
      const plan = buildPlanJson(operation, assembly, options.disableHooks)
      process.stdout.write(JSON.stringify(plan, null, 2) + '\n')
    } else {
      process.stdout.write(formatPlanForDisplay(operation, assembly, options.disableHooks) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    logger.debug({ err }, 'runPlanAction failed')
    return reportError(err)
  }
}

/**
 * Register the `hookstage plan` command with the CLI program.
 */
export function registerPlanCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('plan <operation> <dir>')
    .description('Show the hook phases and main step an operation would run')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--no-hooks', 'Show the plan with both hook phases skipped')
    .action(async (operation: string, dir: string, opts: { outputFormat: string; hooks: boolean }) => {
      process.exitCode = await runPlanAction({
        operation,
        dir,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
        disableHooks: !opts.hooks,
        projectRoot,
      })
    })
}
