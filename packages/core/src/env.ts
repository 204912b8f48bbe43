import { z } from 'zod'
import { ConfigError } from './errors'
import { formatIssues } from './config'

const envSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  STRIDELY_USER_ID: z.string().min(1).default('default'),
  STRIDELY_TIME_ZONE: z.string().optional(),
  STRIDELY_PREFERENCES_FILE: z.string().optional(),
  STRIDELY_CALENDAR_FILE: z.string().optional(),
  STRIDELY_ACTIVITY_FILE: z.string().optional(),
  STRIDELY_AUTOPILOT_TRUST: z.enum(['fullAuto', 'confirmFirst', 'suggestOnly']).optional(),
})

export type Env = z.infer<typeof envSchema>

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source)
  if (!result.success) throw new ConfigError(`Invalid environment: ${formatIssues(result.error)}`, result.error.issues)
  return result.data
}
