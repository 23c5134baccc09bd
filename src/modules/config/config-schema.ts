/**
 * Zod validation schemas for the hookstage configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - hook recognition
 *  - readiness waiting
 *  - kubectl access
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Hook recognition
// ---------------------------------------------------------------------------

export const UnrecognizedPhasePolicySchema = z.enum(['ignore', 'reject'])

export const HookSettingsSchema = z
  .object({
    /** Annotation key holding the comma-separated phase list */
    annotation_key: z.string().min(1),
    /** 'ignore' skips unknown phase names; 'reject' fails the operation */
    unrecognized_phase_policy: UnrecognizedPhasePolicySchema,
    /** Kinds whose readiness requires polling until completion */
    run_to_completion_kinds: z.array(z.string().min(1)),
  })
  .strict()

export type HookSettings = z.infer<typeof HookSettingsSchema>

// ---------------------------------------------------------------------------
// Readiness waiting
// ---------------------------------------------------------------------------

export const ReadinessSettingsSchema = z
  .object({
    /** Deadline for each run-to-completion hook */
    timeout_seconds: z.number().int().positive(),
    /** Delay between status polls */
    poll_interval_ms: z.number().int().min(10).max(60_000),
  })
  .strict()

export type ReadinessSettings = z.infer<typeof ReadinessSettingsSchema>

// ---------------------------------------------------------------------------
// kubectl access
// ---------------------------------------------------------------------------

export const KubectlSettingsSchema = z
  .object({
    binary: z.string().min(1),
    namespace: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
  })
  .strict()

export type KubectlSettings = z.infer<typeof KubectlSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this release can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const HookstageConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    hooks: HookSettingsSchema,
    readiness: ReadinessSettingsSchema,
    kubectl: KubectlSettingsSchema,
  })
  .strict()

export type HookstageConfig = z.infer<typeof HookstageConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialHookstageConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    hooks: HookSettingsSchema.partial().optional(),
    readiness: ReadinessSettingsSchema.partial().optional(),
    kubectl: KubectlSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialHookstageConfig = z.infer<typeof PartialHookstageConfigSchema>
