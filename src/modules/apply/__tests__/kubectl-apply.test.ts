/**
 * Unit tests for kubectl-apply.ts
 *
 * kubectl is never spawned: every test injects a runner that records the
 * arguments and answers with canned output.
 */

import { ApplyError } from '../../../core/errors.js'
import type { RenderedManifest } from '../../../core/types.js'
import {
  createKubectlApplyMechanism,
  parseObservedState,
  type KubectlApplyOptions,
  type KubectlRunner,
  type KubectlSpawnResult,
} from '../kubectl-apply.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface RecordedCall {
  args: string[]
  stdin?: string
}

function fakeRunner(respond: (args: string[]) => KubectlSpawnResult) {
  const calls: RecordedCall[] = []
  const runner: KubectlRunner = async (args, stdin) => {
    calls.push(stdin !== undefined ? { args, stdin } : { args })
    return respond(args)
  }
  return { calls, runner }
}

const ok = (stdout: string): KubectlSpawnResult => ({ stdout, stderr: '', code: 0 })

const job: RenderedManifest = {
  source: 'templates/migrate.yaml',
  document: {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: { name: 'migrate', annotations: { 'hookstage.dev/hook': 'pre-install' } },
    spec: { template: { spec: { restartPolicy: 'Never' } } },
  },
}

const applied = JSON.stringify({ kind: 'Job', metadata: { name: 'migrate', namespace: 'default' } })

function mechanism(respond: (args: string[]) => KubectlSpawnResult, options: KubectlApplyOptions = {}) {
  const { calls, runner } = fakeRunner(respond)
  return { calls, apply: createKubectlApplyMechanism({ ...options, runner }) }
}

// ---------------------------------------------------------------------------
// submit
// ---------------------------------------------------------------------------

describe('submit', () => {
  it('pipes the manifest as JSON to kubectl apply', async () => {
    const { calls, apply } = mechanism(() => ok(applied))

    await apply.submit(job)

    expect(calls).toEqual([
      { args: ['apply', '-f', '-', '-o', 'json'], stdin: JSON.stringify(job.document) },
    ])
  })

  it('returns a handle built from the applied object', async () => {
    const { apply } = mechanism(() => ok(applied))

    expect(await apply.submit(job)).toEqual({
      accepted: true,
      handle: { kind: 'Job', name: 'migrate', namespace: 'default' },
    })
  })

  it('falls back to the configured namespace for the handle', async () => {
    const { apply } = mechanism(
      () => ok(JSON.stringify({ kind: 'Job', metadata: { name: 'migrate' } })),
      { namespace: 'apps' }
    )

    expect(await apply.submit(job)).toEqual({
      accepted: true,
      handle: { kind: 'Job', name: 'migrate', namespace: 'apps' },
    })
  })

  it('passes context and namespace flags first', async () => {
    const { calls, apply } = mechanism(() => ok(applied), { context: 'staging', namespace: 'apps' })

    await apply.submit(job)

    expect(calls[0]?.args).toEqual([
      '--context', 'staging', '--namespace', 'apps', 'apply', '-f', '-', '-o', 'json',
    ])
  })

  it('reports a non-zero exit as a rejection carrying stderr', async () => {
    const { apply } = mechanism(() => ({ stdout: '', stderr: 'error: forbidden', code: 1 }))

    expect(await apply.submit(job)).toEqual({ accepted: false, error: 'error: forbidden' })
  })

  it('names the exit code when stderr is empty', async () => {
    const { apply } = mechanism(() => ({ stdout: '', stderr: '', code: 3 }))

    expect(await apply.submit(job)).toEqual({ accepted: false, error: 'kubectl exited with code 3' })
  })

  it('rejects output that does not describe a resource', async () => {
    const { apply } = mechanism(() => ok('configured'))

    expect(await apply.submit(job)).toEqual({
      accepted: false,
      error: 'kubectl apply returned no resource description',
    })
  })
})

// ---------------------------------------------------------------------------
// poll
// ---------------------------------------------------------------------------

describe('poll', () => {
  it('reads the resource with kubectl get and maps its status', async () => {
    const status = { status: { succeeded: 1, conditions: [{ type: 'Complete', status: 'True' }] } }
    const { calls, apply } = mechanism(() => ok(JSON.stringify(status)))

    const observed = await apply.poll({ kind: 'Job', name: 'migrate', namespace: 'default' })

    expect(calls[0]?.args).toEqual(['get', 'Job', 'migrate', '-o', 'json', '--namespace', 'default'])
    expect(observed).toEqual({ succeeded: 1, conditions: [{ type: 'Complete', status: 'True' }] })
  })

  it('uses the context but not the global namespace when the handle has one', async () => {
    const { calls, apply } = mechanism(() => ok('{}'), { context: 'prod', namespace: 'apps' })

    await apply.poll({ kind: 'Job', name: 'migrate', namespace: 'db' })

    expect(calls[0]?.args).toEqual([
      '--context', 'prod', 'get', 'Job', 'migrate', '-o', 'json', '--namespace', 'db',
    ])
  })

  it('hands the wait signal to the kubectl process', async () => {
    const signals: Array<AbortSignal | undefined> = []
    const runner: KubectlRunner = async (_args, _stdin, signal) => {
      signals.push(signal)
      return ok('{}')
    }
    const apply = createKubectlApplyMechanism({ runner })
    const controller = new AbortController()

    await apply.poll({ kind: 'Job', name: 'migrate' }, controller.signal)

    expect(signals).toEqual([controller.signal])
  })

  it('throws ApplyError when kubectl get fails', async () => {
    const { apply } = mechanism(() => ({ stdout: '', stderr: 'NotFound', code: 1 }))

    await expect(apply.poll({ kind: 'Job', name: 'gone' })).rejects.toThrow(
      'Failed to read status of Job/gone: NotFound'
    )
  })
})

// ---------------------------------------------------------------------------
// remove
// ---------------------------------------------------------------------------

describe('remove', () => {
  it('deletes the manifest with --ignore-not-found', async () => {
    const { calls, apply } = mechanism(() => ok(''))

    await apply.remove(job)

    expect(calls).toEqual([
      { args: ['delete', '--ignore-not-found', '-f', '-'], stdin: JSON.stringify(job.document) },
    ])
  })

  it('throws ApplyError when kubectl delete fails', async () => {
    const { apply } = mechanism(() => ({ stdout: '', stderr: 'forbidden', code: 1 }))

    await expect(apply.remove(job)).rejects.toBeInstanceOf(ApplyError)
  })
})

// ---------------------------------------------------------------------------
// parseObservedState
// ---------------------------------------------------------------------------

describe('parseObservedState', () => {
  it('returns an empty state when the resource has no status', () => {
    expect(parseObservedState('{"kind":"ConfigMap"}')).toEqual({})
  })

  it('keeps counters and condition details', () => {
    const json = JSON.stringify({
      status: {
        active: 0,
        failed: 2,
        startTime: '2024-01-01T00:00:00Z',
        conditions: [
          { type: 'Failed', status: 'True', reason: 'BackoffLimitExceeded', message: 'limit', lastProbeTime: null },
        ],
      },
    })

    expect(parseObservedState(json)).toEqual({
      active: 0,
      failed: 2,
      conditions: [{ type: 'Failed', status: 'True', reason: 'BackoffLimitExceeded', message: 'limit' }],
    })
  })

  it('throws ApplyError on output that is not JSON', () => {
    expect(() => parseObservedState('Error from server')).toThrow(ApplyError)
  })
})
