import { z } from 'zod'
import dotenv from 'dotenv'

const configSchema = z.object({
  // Logging
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    filePath: z.string().optional(),
    maxSizeMB: z.number().positive().optional(),
    maxFiles: z.number().int().positive().optional(),
  }),

  // Contract violations (value() on an error, error() on a value, ...)
  trap: z.object({
    policy: z.enum(['abort', 'throw']).default('abort'),
  }),

  // Default allocator
  allocator: z.object({
    maxCells: z.number().int().positive().default(1_048_576),
  }),
})

export type Config = z.infer<typeof configSchema>

const parseEnvNumber = (value: string | undefined, defaultValue?: number): number | undefined => {
  if (value === undefined || value.trim() === '') return defaultValue
  const parsed = Number(value)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

let cached: Config | undefined

export const loadConfig = (): Config => {
  if (cached) return cached

  // Load environment variables
  dotenv.config()

  const rawConfig = {
    logging: {
      level: process.env['LOG_LEVEL'] || undefined,
      filePath: process.env['LOG_FILE_PATH'] || undefined,
      maxSizeMB: parseEnvNumber(process.env['LOG_MAX_SIZE_MB']),
      maxFiles: parseEnvNumber(process.env['LOG_MAX_FILES']),
    },
    trap: {
      policy: process.env['RESULT_TRAP_POLICY'] || undefined,
    },
    allocator: {
      maxCells: parseEnvNumber(process.env['ALLOCATOR_MAX_CELLS']),
    },
  }

  const parsed = configSchema.safeParse(rawConfig)
  if (!parsed.success) {
    console.error('Configuration validation error:', JSON.stringify(parsed.error.issues, null, 2))
    throw new Error('Configuration validation failed')
  }

  cached = parsed.data
  return cached
}

// Drops the memoized configuration so the next loadConfig() re-reads process.env.
export const resetConfig = (): void => {
  cached = undefined
}
