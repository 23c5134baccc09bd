/**
 * kubectl-apply.ts — ApplyMechanism backed by the kubectl binary.
 *
 * All cluster calls go through child_process.spawn. Manifests are piped to
 * kubectl as JSON on stdin, so nothing is written to disk.
 *
 * Functions:
 *  - spawnKubectl: Execute kubectl with given args and optional stdin
 *  - parseObservedState: Map a resource's `status` onto ObservedState
 *  - KubectlApplyMechanism: submit / poll / remove
 */

import { spawn } from 'node:child_process'
import { z } from 'zod'
import { ApplyError } from '../../core/errors.js'
import type { ObservedState, RenderedManifest } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { ApplyMechanism, ResourceHandle, SubmitResult } from './apply-mechanism.js'

const logger = createLogger('kubectl')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface KubectlSpawnResult {
  stdout: string
  stderr: string
  code: number
}

/** Runs kubectl; injectable so tests never touch a cluster */
export type KubectlRunner = (
  args: string[],
  stdin?: string,
  signal?: AbortSignal
) => Promise<KubectlSpawnResult>

export interface KubectlApplyOptions {
  /** kubectl binary name or path (default: kubectl) */
  binary?: string
  /** Namespace for resources that do not set one */
  namespace?: string
  /** kubeconfig context to use */
  context?: string
  /** Process runner override */
  runner?: KubectlRunner
}

// ---------------------------------------------------------------------------
// spawnKubectl
// ---------------------------------------------------------------------------

/**
 * Spawn a kubectl subprocess with the given args.
 *
 * @param binary - kubectl binary name or path
 * @param args   - Arguments to pass to kubectl
 * @param stdin  - Optional content written to the process's stdin
 * @param signal - Kills the process when aborted
 * @returns      - Object with stdout, stderr, and exit code
 */
export function spawnKubectl(
  binary: string,
  args: string[],
  stdin?: string,
  signal?: AbortSignal
): Promise<KubectlSpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ args }, 'spawnKubectl')

    const proc = spawn(binary, args, {
      env: process.env,
      stdio: [stdin !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      ...(signal !== undefined ? { signal } : {}),
    })

    let stdout = ''
    let stderr = ''

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err) => {
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })

    if (stdin !== undefined && proc.stdin !== null) {
      proc.stdin.end(stdin)
    }
  })
}

// ---------------------------------------------------------------------------
// Output schemas
// ---------------------------------------------------------------------------

const AppliedObjectSchema = z
  .object({
    kind: z.string(),
    metadata: z
      .object({
        name: z.string(),
        namespace: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough()

const ResourceStatusSchema = z
  .object({
    status: z
      .object({
        conditions: z
          .array(
            z
              .object({
                type: z.string(),
                status: z.string(),
                reason: z.string().optional(),
                message: z.string().optional(),
              })
              .passthrough()
          )
          .optional(),
        active: z.number().optional(),
        succeeded: z.number().optional(),
        failed: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Map the `status` block of a resource (as printed by `kubectl get -o json`)
 * onto ObservedState. Unknown fields are dropped.
 *
 * @throws {ApplyError} when the document is not valid resource JSON
 */
export function parseObservedState(json: string): ObservedState {
  const parsed = ResourceStatusSchema.safeParse(parseJson(json))
  if (!parsed.success) {
    throw new ApplyError('kubectl returned an unreadable resource status', {
      issues: parsed.error.issues,
    })
  }
  const status = parsed.data.status
  if (status === undefined) return {}

  const observed: ObservedState = {}
  if (status.conditions !== undefined) {
    observed.conditions = status.conditions.map((c) => ({
      type: c.type,
      status: c.status,
      ...(c.reason !== undefined ? { reason: c.reason } : {}),
      ...(c.message !== undefined ? { message: c.message } : {}),
    }))
  }
  if (status.active !== undefined) observed.active = status.active
  if (status.succeeded !== undefined) observed.succeeded = status.succeeded
  if (status.failed !== undefined) observed.failed = status.failed
  return observed
}

// ---------------------------------------------------------------------------
// KubectlApplyMechanism
// ---------------------------------------------------------------------------

export class KubectlApplyMechanism implements ApplyMechanism {
  private readonly _namespace: string | undefined
  private readonly _context: string | undefined
  private readonly _run: KubectlRunner

  constructor(options: KubectlApplyOptions = {}) {
    const binary = options.binary ?? 'kubectl'
    this._namespace = options.namespace
    this._context = options.context
    this._run = options.runner ?? ((args, stdin, signal) => spawnKubectl(binary, args, stdin, signal))
  }

  async submit(manifest: RenderedManifest): Promise<SubmitResult> {
    const result = await this._run(
      [...this._globalArgs(), 'apply', '-f', '-', '-o', 'json'],
      JSON.stringify(manifest.document)
    )
    if (result.code !== 0) {
      return { accepted: false, error: result.stderr || `kubectl exited with code ${String(result.code)}` }
    }

    const applied = AppliedObjectSchema.safeParse(parseJson(result.stdout))
    if (!applied.success) {
      return { accepted: false, error: 'kubectl apply returned no resource description' }
    }

    const namespace = applied.data.metadata.namespace ?? this._namespace
    const handle: ResourceHandle = {
      kind: applied.data.kind,
      name: applied.data.metadata.name,
      ...(namespace !== undefined ? { namespace } : {}),
    }
    logger.debug({ handle, source: manifest.source }, 'Resource applied')
    return { accepted: true, handle }
  }

  async poll(handle: ResourceHandle, signal?: AbortSignal): Promise<ObservedState> {
    const args = [...this._contextArgs(), 'get', handle.kind, handle.name, '-o', 'json']
    const namespace = handle.namespace ?? this._namespace
    if (namespace !== undefined) args.push('--namespace', namespace)

    const result = await this._run(args, undefined, signal)
    if (result.code !== 0) {
      throw new ApplyError(`Failed to read status of ${handle.kind}/${handle.name}: ${result.stderr}`, {
        handle,
        code: result.code,
      })
    }
    return parseObservedState(result.stdout)
  }

  /**
   * Delete the resource described by `manifest`. Missing resources are not an error.
   *
   * @throws {ApplyError} when kubectl rejects the deletion
   */
  async remove(manifest: RenderedManifest): Promise<void> {
    const result = await this._run(
      [...this._globalArgs(), 'delete', '--ignore-not-found', '-f', '-'],
      JSON.stringify(manifest.document)
    )
    if (result.code !== 0) {
      throw new ApplyError(`kubectl delete failed: ${result.stderr}`, {
        source: manifest.source,
        code: result.code,
      })
    }
  }

  private _contextArgs(): string[] {
    return this._context !== undefined ? ['--context', this._context] : []
  }

  private _globalArgs(): string[] {
    const args = this._contextArgs()
    if (this._namespace !== undefined) args.push('--namespace', this._namespace)
    return args
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a kubectl-backed ApplyMechanism.
 *
 * @example
 * const apply = createKubectlApplyMechanism({ namespace: 'staging' })
 */
export function createKubectlApplyMechanism(
  options: KubectlApplyOptions = {}
): KubectlApplyMechanism {
  return new KubectlApplyMechanism(options)
}
