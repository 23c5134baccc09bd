/**
 * `hookstage run` command
 *
 * Performs a release operation against the cluster through kubectl: the
 * operation's pre-phase hooks, then the main step on the ordinary resources,
 * then its post-phase hooks. Install, upgrade and rollback apply the
 * resources; delete removes them in reverse order.
 *
 * Usage:
 *   hookstage run <operation> <dir>
 *   hookstage run <operation> <dir> --timeout 600
 *   hookstage run <operation> <dir> --no-hooks
 *   hookstage run <operation> <dir> --namespace apps --context staging
 *
 * Ctrl-C cancels an in-flight readiness wait; the operation then fails.
 *
 * Exit codes:
 *   0 - Operation completed
 *   1 - Operation failed (hook failure, timeout, main step error)
 *   2 - Usage error (unknown operation, missing directory, parse or config error)
 */

import type { Command } from 'commander'
import { ApplyError } from '../../core/errors.js'
import { createEventBus } from '../../core/event-bus.js'
import type { Operation, RenderedManifest } from '../../core/types.js'
import type { PartialHookstageConfig } from '../../modules/config/config-schema.js'
import {
  createKubectlApplyMechanism,
  type KubectlApplyMechanism,
  type KubectlRunner,
} from '../../modules/apply/kubectl-apply.js'
import { createLifecycleCoordinator } from '../../modules/lifecycle/lifecycle-coordinator-impl.js'
import { loadRenderedManifests } from '../../modules/manifest-loader/manifest-loader.js'
import { createPhaseExecutor } from '../../modules/phase-executor/phase-executor-impl.js'
import { createLogger } from '../../utils/logger.js'
import { formatDuration } from '../../utils/helpers.js'
import { mainActionVerb, resourceLabel } from '../formatters/hook-set-formatter.js'
import { attachProgressReporter } from '../formatters/progress.js'
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  extractionOptionsFrom,
  loadCliConfig,
  parseOperationArg,
  reportError,
  resolveManifestDir,
  type CliContextOptions,
} from '../utils/context.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunActionOptions extends CliContextOptions {
  operation: string
  dir: string
  /** Skip both hook phases */
  disableHooks: boolean
  /** Per-hook deadline, overriding readiness.timeout_seconds */
  timeoutSeconds?: number
  namespace?: string
  context?: string
  /** kubectl process runner override (tests) */
  runner?: KubectlRunner
  /** External cancellation, in addition to SIGINT */
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildOverrides(options: RunActionOptions): PartialHookstageConfig {
  const overrides: PartialHookstageConfig = {}
  if (options.timeoutSeconds !== undefined) {
    overrides.readiness = { timeout_seconds: options.timeoutSeconds }
  }
  if (options.namespace !== undefined || options.context !== undefined) {
    overrides.kubectl = {
      ...(options.namespace !== undefined ? { namespace: options.namespace } : {}),
      ...(options.context !== undefined ? { context: options.context } : {}),
    }
  }
  return overrides
}

/**
 * Main step: apply every ordinary resource, or remove them for delete.
 * Resolves the number of resources handled.
 *
 * @throws {ApplyError} on the first resource kubectl rejects
 */
export async function runMainStep(
  apply: KubectlApplyMechanism,
  operation: Operation,
  resources: readonly RenderedManifest[]
): Promise<number> {
  if (operation === 'delete') {
    for (const resource of [...resources].reverse()) {
      await apply.remove(resource)
    }
    return resources.length
  }

  for (const resource of resources) {
    const submitted = await apply.submit(resource)
    if (!submitted.accepted) {
      throw new ApplyError(`${resourceLabel(resource)} was rejected: ${submitted.error}`, {
        source: resource.source,
      })
    }
  }
  return resources.length
}

// ---------------------------------------------------------------------------
// runRunAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the run command. Returns the exit code.
 */
export async function runRunAction(options: RunActionOptions): Promise<number> {
  const operation = parseOperationArg(options.operation)
  if (operation === null) return EXIT_USAGE_ERROR

  const dir = resolveManifestDir(options.dir, options.projectRoot)
  if (dir === null) {
    process.stderr.write(`Error: Manifest directory not found: ${options.dir}\n`)
    return EXIT_USAGE_ERROR
  }

  const controller = new AbortController()
  const onInterrupt = (): void => {
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)
  if (options.signal?.aborted === true) {
    controller.abort()
  } else {
    options.signal?.addEventListener('abort', onInterrupt, { once: true })
  }

  const eventBus = createEventBus()
  const detach = attachProgressReporter(eventBus)

  try {
    const config = await loadCliConfig({ ...options, cliOverrides: buildOverrides(options) })
    const manifests = await loadRenderedManifests(dir)
    const logger = createLogger('run', { level: config.global.log_level })

    const apply = createKubectlApplyMechanism({
      binary: config.kubectl.binary,
      ...(config.kubectl.namespace !== undefined ? { namespace: config.kubectl.namespace } : {}),
      ...(config.kubectl.context !== undefined ? { context: config.kubectl.context } : {}),
      ...(options.runner !== undefined ? { runner: options.runner } : {}),
    })
    const executor = createPhaseExecutor({
      apply,
      eventBus,
      runToCompletionKinds: config.hooks.run_to_completion_kinds,
      pollIntervalMs: config.readiness.poll_interval_ms,
      timeoutMs: config.readiness.timeout_seconds * 1000,
      logger,
    })
    const coordinator = createLifecycleCoordinator({
      executor,
      extraction: extractionOptionsFrom(config),
      eventBus,
      logger,
    })

    const startedAt = Date.now()
    const result = await coordinator.perform({
      operation,
      manifests,
      mainAction: (resources) => runMainStep(apply, operation, resources),
      signal: controller.signal,
      disableHooks: options.disableHooks,
    })

    if (!result.success) {
      process.stderr.write(`Error: ${result.error.message}\n`)
      return EXIT_FAILURE
    }

    const verb = mainActionVerb(operation) === 'apply' ? 'applied' : 'removed'
    process.stdout.write(
      `${operation} completed in ${formatDuration(Date.now() - startedAt)}: ` +
        `${String(result.mainResult)} resource(s) ${verb}\n`
    )
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  } finally {
    detach()
    process.off('SIGINT', onInterrupt)
    options.signal?.removeEventListener('abort', onInterrupt)
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

/**
 * Register the `hookstage run` command with the CLI program.
 */
export function registerRunCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('run <operation> <dir>')
    .description('Perform install, upgrade, delete or rollback with its lifecycle hooks')
    .option('--timeout <seconds>', 'Deadline for each run-to-completion hook', (value) => Number(value))
    .option('--no-hooks', 'Skip both hook phases; only the main step runs')
    .option('--namespace <namespace>', 'Namespace for resources that do not set one')
    .option('--context <context>', 'kubeconfig context to use')
    .action(
      async (
        operation: string,
        dir: string,
        opts: { timeout?: number; hooks: boolean; namespace?: string; context?: string }
      ) => {
        process.exitCode = await runRunAction({
          operation,
          dir,
          disableHooks: !opts.hooks,
          projectRoot,
          ...(opts.timeout !== undefined ? { timeoutSeconds: opts.timeout } : {}),
          ...(opts.namespace !== undefined ? { namespace: opts.namespace } : {}),
          ...(opts.context !== undefined ? { context: opts.context } : {}),
        })
      }
    )
}
