/**
 * hook-set-formatter.ts — Human and JSON renderings of an assembled HookSet.
 *
 * Used by the `hookstage hooks` and `hookstage plan` commands.
 */

import type { Operation, RenderedManifest } from '../../core/types.js'
import { describeManifest, serializePhases } from '../../modules/hooks/annotation-extractor.js'
import { hookLabel, hooksFor } from '../../modules/hooks/hook-set.js'
import { ALL_PHASES, phasesFor } from '../../modules/hooks/phase-registry.js'
import type { HookSetAssembly } from '../../modules/hooks/types.js'

/** Label a non-hook manifest the same way hooks are labelled */
export function resourceLabel(manifest: RenderedManifest): string {
  const { kind, name, namespace } = describeManifest(manifest)
  return hookLabel({ resourceKind: kind, name, namespace })
}

/** What the main step does to ordinary resources for an operation */
export function mainActionVerb(operation: Operation): 'apply' | 'remove' {
  return operation === 'delete' ? 'remove' : 'apply'
}

// ---------------------------------------------------------------------------
// formatHookSetForDisplay
// ---------------------------------------------------------------------------

/**
 * Human-readable listing of hooks per phase, ordinary resources and any
 * ignored phase values.
 */
export function formatHookSetForDisplay(assembly: HookSetAssembly): string {
  const lines: string[] = []
  const phases = ALL_PHASES.filter((phase) => hooksFor(assembly.hookSet, phase).length > 0)

  if (phases.length === 0) {
    lines.push('No hooks found.')
  } else {
    lines.push('Hooks:')
    for (const phase of phases) {
      lines.push(`  ${phase}:`)
      for (const hook of hooksFor(assembly.hookSet, phase)) {
        lines.push(`    - ${hookLabel(hook)}`)
      }
    }
  }

  lines.push('')
  lines.push(`Resources (${String(assembly.resources.length)}):`)
  for (const resource of assembly.resources) {
    lines.push(`  - ${resourceLabel(resource)}`)
  }

  if (assembly.unrecognized.length > 0) {
    lines.push('')
    lines.push(`Ignored phase values (${String(assembly.unrecognized.length)}):`)
    for (const entry of assembly.unrecognized) {
      const { kind, name, namespace } = entry.manifest
      lines.push(`  - "${entry.value}" on ${hookLabel({ resourceKind: kind, name, namespace })}`)
    }
  }

  return lines.join('\n')
}

/** JSON shape of `hookstage hooks --output-format json` */
export function buildHookSetJson(assembly: HookSetAssembly): Record<string, unknown> {
  const phases: Record<string, unknown[]> = {}
  for (const phase of ALL_PHASES) {
    const hooks = hooksFor(assembly.hookSet, phase)
    if (hooks.length === 0) continue
    phases[phase] = hooks.map((hook) => ({
      kind: hook.resourceKind,
      name: hook.name,
      ...(hook.namespace !== undefined ? { namespace: hook.namespace } : {}),
      phases: serializePhases(hook.phases),
      ...(hook.source !== undefined ? { source: hook.source } : {}),
    }))
  }
  return {
    hooks: phases,
    resources: assembly.resources.map((resource) => describeManifest(resource)),
    unrecognized: assembly.unrecognized.map((entry) => ({
      value: entry.value,
      ...entry.manifest,
    })),
  }
}

// ---------------------------------------------------------------------------
// formatPlanForDisplay
// ---------------------------------------------------------------------------

/**
 * Human-readable pre → main → post plan for one operation.
 * With `disableHooks` the hook steps are shown as skipped.
 */
export function formatPlanForDisplay(
  operation: Operation,
  assembly: HookSetAssembly,
  disableHooks = false
): string {
  const { pre, post } = phasesFor(operation)
  const lines: string[] = [`Plan for ${operation}:`]

  const hookStep = (index: number, phase: typeof pre): void => {
    const hooks = hooksFor(assembly.hookSet, phase)
    if (disableHooks) {
      lines.push(`  ${String(index)}. ${phase} hooks (skipped)`)
      return
    }
    lines.push(`  ${String(index)}. ${phase} hooks (${String(hooks.length)})`)
    for (const hook of hooks) {
      lines.push(`       - ${hookLabel(hook)}`)
    }
  }

  hookStep(1, pre)
  lines.push(
    `  2. ${mainActionVerb(operation)} ${String(assembly.resources.length)} resource(s)`
  )
  for (const resource of assembly.resources) {
    lines.push(`       - ${resourceLabel(resource)}`)
  }
  hookStep(3, post)

  return lines.join('\n')
}

/** JSON shape of `hookstage plan --output-format json` */
export function buildPlanJson(
  operation: Operation,
  assembly: HookSetAssembly,
  disableHooks = false
): Record<string, unknown> {
  const { pre, post } = phasesFor(operation)
  const hookStep = (stage: 'pre' | 'post', phase: typeof pre): Record<string, unknown> => ({
    stage,
    phase,
    skipped: disableHooks,
    hooks: hooksFor(assembly.hookSet, phase).map(hookLabel),
  })
  return {
    operation,
    steps: [
      hookStep('pre', pre),
      {
        stage: 'main',
        action: mainActionVerb(operation),
        resources: assembly.resources.map(resourceLabel),
      },
      hookStep('post', post),
    ],
  }
}
