/**
 * Unit tests for `src/cli/commands/run.ts`
 *
 * kubectl is replaced by an in-process runner that answers `apply` with the
 * applied object, `get` with a scripted Job status and `delete` with nothing.
 */

import { runRunAction, type RunActionOptions } from '../run.js'
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../../utils/context.js'
import type { KubectlRunner, KubectlSpawnResult } from '../../../modules/apply/kubectl-apply.js'
import {
  captureOutput,
  createCliProject,
  type CapturedOutput,
  type CliProject,
} from '../../../../test/helpers/cli-fixture.js'

// ---------------------------------------------------------------------------
// Fake kubectl
// ---------------------------------------------------------------------------

interface AppliedDocument {
  kind: string
  metadata: { name: string }
}

const COMPLETE_STATUS = JSON.stringify({
  status: { succeeded: 1, conditions: [{ type: 'Complete', status: 'True' }] },
})
const FAILED_STATUS = JSON.stringify({
  status: { failed: 1, conditions: [{ type: 'Failed', status: 'True', reason: 'BackoffLimitExceeded', message: 'boom' }] },
})

function fakeKubectl(jobStatus: string = COMPLETE_STATUS) {
  const calls: string[] = []
  const runner: KubectlRunner = async (args, stdin): Promise<KubectlSpawnResult> => {
    const verbIndex = args.findIndex((a) => a === 'apply' || a === 'get' || a === 'delete')
    const verb = args[verbIndex]
    if (verb === 'get') {
      calls.push(`get ${String(args[verbIndex + 1])}/${String(args[verbIndex + 2])}`)
      return { stdout: jobStatus, stderr: '', code: 0 }
    }
    const doc: AppliedDocument = JSON.parse(stdin ?? '{}')
    calls.push(`${String(verb)} ${doc.kind}/${doc.metadata.name}`)
    return { stdout: verb === 'apply' ? JSON.stringify(doc) : '', stderr: '', code: 0 }
  }
  return { calls, runner }
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let project: CliProject
let output: CapturedOutput

beforeEach(async () => {
  project = await createCliProject()
  output = captureOutput()
})

afterEach(async () => {
  vi.restoreAllMocks()
  await project.cleanup()
})

function options(runner: KubectlRunner, overrides: Partial<RunActionOptions> = {}): RunActionOptions {
  return {
    operation: 'install',
    dir: project.rendered,
    disableHooks: false,
    projectRoot: project.root,
    globalConfigDir: project.globalConfigDir,
    env: { HOOKSTAGE_LOG_LEVEL: 'fatal' },
    runner,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Success paths
// ---------------------------------------------------------------------------

describe('hookstage run', () => {
  it('installs with pre-install hooks, resources, then post-install hooks', async () => {
    const { calls, runner } = fakeKubectl()

    const exitCode = await runRunAction(options(runner))

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(calls).toEqual([
      'apply Job/migrate',
      'get Job/migrate',
      'apply Deployment/web',
      'apply ConfigMap/notes',
    ])
  })

  it('prints progress and a summary', async () => {
    const { runner } = fakeKubectl()

    await runRunAction(options(runner))

    const lines = output.stdout().split('\n')
    expect(lines[0]).toBe('▸ pre-install: 1 hook(s)')
    expect(lines[1]).toMatch(/^ {2}✓ Job\/migrate \(.+\)$/)
    expect(lines[2]).toBe('▸ post-install: 1 hook(s)')
    expect(lines[3]).toMatch(/^ {2}✓ ConfigMap\/notes \(.+\)$/)
    expect(lines[4]).toMatch(/^install completed in .+: 1 resource\(s\) applied$/)
  })

  it('removes resources for delete', async () => {
    const { calls, runner } = fakeKubectl()

    const exitCode = await runRunAction(options(runner, { operation: 'delete' }))

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(calls).toEqual(['delete Deployment/web'])
    expect(output.stdout()).toMatch(/delete completed in .+: 1 resource\(s\) removed\n$/)
  })

  it('runs only the main step with --no-hooks', async () => {
    const { calls, runner } = fakeKubectl()

    await runRunAction(options(runner, { disableHooks: true }))

    expect(calls).toEqual(['apply Deployment/web'])
  })

  it('passes --namespace and --context through to kubectl', async () => {
    const seen: string[][] = []
    const { runner } = fakeKubectl()
    const recording: KubectlRunner = (args, stdin) => {
      seen.push(args)
      return runner(args, stdin)
    }

    await runRunAction(options(recording, { disableHooks: true, namespace: 'apps', context: 'staging' }))

    expect(seen).toEqual([['--context', 'staging', '--namespace', 'apps', 'apply', '-f', '-', '-o', 'json']])
  })

  // -------------------------------------------------------------------------
  // Failures
  // -------------------------------------------------------------------------

  it('exits 1 and stops when a pre-install hook fails', async () => {
    const { calls, runner } = fakeKubectl(FAILED_STATUS)

    const exitCode = await runRunAction(options(runner))

    expect(exitCode).toBe(EXIT_FAILURE)
    expect(calls).toEqual(['apply Job/migrate', 'get Job/migrate'])
    expect(output.stderr()).toBe(
      'Error: install failed: Phase pre-install aborted: Hook Job/migrate failed: BackoffLimitExceeded: boom\n'
    )
  })

  it('exits 1 when kubectl rejects a resource in the main step', async () => {
    const { runner } = fakeKubectl()
    const rejecting: KubectlRunner = async (args, stdin) =>
      stdin?.includes('"Deployment"') === true
        ? { stdout: '', stderr: 'admission denied', code: 1 }
        : runner(args, stdin)

    const exitCode = await runRunAction(options(rejecting))

    expect(exitCode).toBe(EXIT_FAILURE)
    expect(output.stderr()).toBe(
      'Error: install failed: main action failed: apps/Deployment/web was rejected: admission denied\n'
    )
  })

  it('exits 1 when the readiness wait is cancelled', async () => {
    const { runner } = fakeKubectl(JSON.stringify({ status: { active: 1 } }))
    const controller = new AbortController()
    controller.abort()

    const exitCode = await runRunAction(options(runner, { signal: controller.signal }))

    expect(exitCode).toBe(EXIT_FAILURE)
    expect(output.stderr()).toBe(
      'Error: install failed: Phase pre-install aborted: Hook Job/migrate was cancelled before reaching a terminal state\n'
    )
  })

  it('exits 2 for an unknown operation without calling kubectl', async () => {
    const { calls, runner } = fakeKubectl()

    expect(await runRunAction(options(runner, { operation: 'scale' }))).toBe(EXIT_USAGE_ERROR)
    expect(calls).toEqual([])
  })

  it('exits 2 for an invalid --timeout', async () => {
    const { calls, runner } = fakeKubectl()

    const exitCode = await runRunAction(options(runner, { timeoutSeconds: Number.NaN }))

    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(output.stderr()).toMatch(/^Error: Configuration validation failed:/)
    expect(calls).toEqual([])
  })

  it("exits 2 under the 'reject' policy before any kubectl call", async () => {
    const { calls, runner } = fakeKubectl()

    const exitCode = await runRunAction(
      options(runner, { env: { HOOKSTAGE_UNRECOGNIZED_PHASE_POLICY: 'reject' } })
    )

    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(calls).toEqual([])
  })
})
