/**
 * progress.ts — Line-oriented progress output for `hookstage run`.
 *
 * Subscribes to the event bus and writes one line per phase or hook
 * transition. Returns a function that detaches every handler.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { HookRef, HookstageEvents } from '../../core/event-bus.types.js'
import { formatDuration } from '../../utils/helpers.js'

export type LineWriter = (line: string) => void

/** Kind/name label for an event hook, with the namespace when set */
export function formatHookRef(hook: HookRef): string {
  const base = `${hook.kind}/${hook.name}`
  return hook.namespace !== undefined ? `${hook.namespace}/${base}` : base
}

/**
 * Attach progress handlers to `eventBus`.
 *
 * @param write - Receives each line without its trailing newline
 */
export function attachProgressReporter(
  eventBus: TypedEventBus,
  write: LineWriter = (line) => {
    process.stdout.write(line + '\n')
  }
): () => void {
  const onPhaseStarted = ({ phase, hookCount }: HookstageEvents['phase:started']): void => {
    write(`▸ ${phase}: ${String(hookCount)} hook(s)`)
  }
  const onHookReady = ({ hook, durationMs }: HookstageEvents['hook:ready']): void => {
    write(`  ✓ ${formatHookRef(hook)} (${formatDuration(durationMs)})`)
  }
  const onHookFailed = ({ hook, error }: HookstageEvents['hook:failed']): void => {
    write(`  ✗ ${formatHookRef(hook)}: ${error.message}`)
  }
  const onHookSkipped = ({ hook }: HookstageEvents['hook:skipped']): void => {
    write(`  - ${formatHookRef(hook)} skipped`)
  }

  eventBus.on('phase:started', onPhaseStarted)
  eventBus.on('hook:ready', onHookReady)
  eventBus.on('hook:failed', onHookFailed)
  eventBus.on('hook:skipped', onHookSkipped)

  return () => {
    eventBus.off('phase:started', onPhaseStarted)
    eventBus.off('hook:ready', onHookReady)
    eventBus.off('hook:failed', onHookFailed)
    eventBus.off('hook:skipped', onHookSkipped)
  }
}
