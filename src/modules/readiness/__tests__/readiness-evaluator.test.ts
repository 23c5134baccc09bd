/**
 * Unit tests for readiness-evaluator.ts
 */

import {
  evaluate,
  evaluateSubmission,
  failureReason,
  policyForKind,
  requiresPolling,
} from '../readiness-evaluator.js'

const job = policyForKind('Job')
const configMap = policyForKind('ConfigMap')

describe('policyForKind', () => {
  it('treats Job as run-to-completion by default', () => {
    expect(job).toEqual({ type: 'run-to-completion', kind: 'Job' })
    expect(configMap).toEqual({ type: 'immediate', kind: 'ConfigMap' })
  })

  it('honours a configured kind list', () => {
    expect(policyForKind('Pod', ['Job', 'Pod']).type).toBe('run-to-completion')
    expect(policyForKind('Job', []).type).toBe('immediate')
  })

  it('compares kinds case-sensitively', () => {
    expect(policyForKind('job').type).toBe('immediate')
  })
})

describe('requiresPolling', () => {
  it('is true only for run-to-completion', () => {
    expect(requiresPolling(job)).toBe(true)
    expect(requiresPolling(configMap)).toBe(false)
  })
})

describe('evaluateSubmission', () => {
  it('is Pending when accepted and Failed when rejected', () => {
    expect(evaluateSubmission(true)).toBe('Pending')
    expect(evaluateSubmission(false)).toBe('Failed')
  })
})

describe('evaluate', () => {
  it('is Ready for immediate kinds whatever is observed', () => {
    expect(evaluate(configMap)).toBe('Ready')
    expect(evaluate(configMap, { failed: 3 })).toBe('Ready')
  })

  it('is Pending for a job with no terminal status', () => {
    expect(evaluate(job)).toBe('Pending')
    expect(evaluate(job, { active: 1 })).toBe('Pending')
  })

  it('is Ready on a True Complete condition', () => {
    expect(evaluate(job, { conditions: [{ type: 'Complete', status: 'True' }] })).toBe('Ready')
  })

  it('ignores a Complete condition that is not True', () => {
    expect(evaluate(job, { conditions: [{ type: 'Complete', status: 'False' }] })).toBe('Pending')
  })

  it('stays Pending after some completions without a Complete condition', () => {
    expect(evaluate(job, { succeeded: 1, active: 1 })).toBe('Pending')
    expect(evaluate(job, { succeeded: 2 })).toBe('Pending')
  })

  it('is Failed on a True Failed condition', () => {
    expect(evaluate(job, { conditions: [{ type: 'Failed', status: 'True' }] })).toBe('Failed')
  })

  it('stays Pending while a job waits out its retry backoff', () => {
    expect(evaluate(job, { failed: 1, active: 0 })).toBe('Pending')
    expect(evaluate(job, { failed: 2 })).toBe('Pending')
  })

  it('stays Pending while a retry is still active', () => {
    expect(evaluate(job, { failed: 1, active: 1 })).toBe('Pending')
  })

  it('prefers failure when both are reported', () => {
    expect(
      evaluate(job, {
        conditions: [
          { type: 'Complete', status: 'True' },
          { type: 'Failed', status: 'True' },
        ],
      })
    ).toBe('Failed')
  })
})

describe('failureReason', () => {
  it('joins reason and message of the Failed condition', () => {
    expect(
      failureReason({
        conditions: [
          { type: 'Failed', status: 'True', reason: 'BackoffLimitExceeded', message: 'Job has reached the specified backoff limit' },
        ],
      })
    ).toBe('BackoffLimitExceeded: Job has reached the specified backoff limit')
  })

  it('uses whichever of reason and message is present', () => {
    expect(failureReason({ conditions: [{ type: 'Failed', status: 'True', reason: 'DeadlineExceeded' }] })).toBe(
      'DeadlineExceeded'
    )
  })

  it('falls back to the failed pod count', () => {
    expect(failureReason({ failed: 3 })).toBe('3 failed pod(s)')
  })

  it('falls back to a generic reason', () => {
    expect(failureReason({})).toBe('reported terminal failure')
  })
})
