/**
 * Runtime configuration
 *
 * Environment overrides on top of the shared constants. Read once by the
 * entry points and passed down; nothing below reads process.env directly.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import type { ExecutionMode } from '@/types'
import { DATA_DIR_NAME, DEFAULT_EXECUTION_MODE } from './constants'

const envSchema = z.object({
  FRAMEFLOW_HOME: z.string().trim().min(1).optional(),
  FRAMEFLOW_EXECUTION_MODE: z.enum(['lazy', 'eager']).optional(),
})

export interface AppConfig {
  dataDir: string
  defaultExecutionMode: ExecutionMode
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new ConfigError(`Invalid environment configuration: ${details}`)
  }

  return {
    dataDir: parsed.data.FRAMEFLOW_HOME ?? join(homedir(), DATA_DIR_NAME),
    defaultExecutionMode: parsed.data.FRAMEFLOW_EXECUTION_MODE ?? DEFAULT_EXECUTION_MODE,
  }
}
