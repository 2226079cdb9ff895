import { readFileSync } from 'fs'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { errorMessage, type FleetConfig, type LogFn } from './types'

export const DEFAULT_CONCURRENCY = 10

const performanceSchema = z.object({
  max_concurrent_devices: z.number().int().positive().optional(),
  connection_timeout: z.number().positive().optional(),
}).passthrough()

const loggingSchema = z.object({
  enabled: z.boolean().default(false),
  level: z.string().default('INFO'),
  file: z.string().min(1).default('data/logs.txt'),
  max_size_mb: z.number().positive().default(10),
  backup_count: z.number().int().nonnegative().default(5),
  console: z.boolean().default(true),
}).passthrough()

export type PerformanceRules = z.infer<typeof performanceSchema>
export type LoggingRules = z.infer<typeof loggingSchema>

// Unknown top-level sections (validation rules, command lists...) are kept but unused
export const rulesSchema = z.object({
  performance: performanceSchema.nullish().transform((value): PerformanceRules => value ?? {}),
  logging: loggingSchema.nullish().transform((value): LoggingRules | null => value ?? null),
}).passthrough()

export type Rules = z.infer<typeof rulesSchema>

export function defaultRules(): Rules {
  return rulesSchema.parse({})
}

export function parseRules(document: unknown): Rules {
  const parsed = rulesSchema.safeParse(document ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new Error(`Invalid rules: ${issues.join('; ')}`)
  }
  return parsed.data
}

// Load the YAML rules; a load fault is logged and the defaults are used
export function loadRules(filePath: string, log?: LogFn): Rules {
  try {
    const rules = parseRules(parseYaml(readFileSync(filePath, 'utf-8')))
    if (log) log('info', `Loaded rules from ${filePath}`)
    return rules
  } catch (err) {
    if (log) log('error', `Failed to load rules from ${filePath}: ${errorMessage(err)}`)
    return defaultRules()
  }
}

export interface RunOverrides {
  fixMode: boolean
  maxConcurrent?: number  // CLI override, wins over the rules file
}

export function resolveFleetConfig(rules: Rules, overrides: RunOverrides): FleetConfig {
  return {
    concurrencyLimit: overrides.maxConcurrent ?? rules.performance.max_concurrent_devices ?? DEFAULT_CONCURRENCY,
    connectionTimeoutSeconds: rules.performance.connection_timeout ?? null,
    fixMode: overrides.fixMode,
  }
}
