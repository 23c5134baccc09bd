/**
 * Built-in default values for the hookstage configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { HookstageConfig } from './config-schema.js'

export const DEFAULT_CONFIG: HookstageConfig = {
  config_format_version: '1',
  global: {
    log_level: 'info',
  },
  hooks: {
    annotation_key: 'hookstage.dev/hook',
    unrecognized_phase_policy: 'ignore',
    run_to_completion_kinds: ['Job'],
  },
  readiness: {
    timeout_seconds: 300,
    poll_interval_ms: 2000,
  },
  kubectl: {
    binary: 'kubectl',
  },
}
