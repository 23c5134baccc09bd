#!/usr/bin/env node
/**
 * hookstage CLI - Main entry point
 * Provides the `hookstage` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { existsSync } from 'fs'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerHooksCommand } from './commands/hooks.js'
import { registerPlanCommand } from './commands/plan.js'
import { registerRunCommand } from './commands/run.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ version: z.string() })

/** Read the version from package.json, found from either src/ or dist/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    if (!existsSync(pkgPath)) continue
    const parsed = PackageJsonSchema.safeParse(JSON.parse(await readFile(pkgPath, 'utf-8')))
    if (parsed.success) return parsed.data.version
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('hookstage')
    .description('hookstage - lifecycle hooks for packaged Kubernetes releases')
    .version(version, '-v, --version', 'Output the current version')

  registerHooksCommand(program)
  registerPlanCommand(program)
  registerRunCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
