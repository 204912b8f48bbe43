import { z } from 'zod'
import { MovementPreferences } from './planner/types'
import { AutopilotSettings } from './autopilot/types'
import { ConfigError } from './errors'

const clockTime = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
})

const timePreference = z.enum(['morning', 'afternoon', 'evening', 'no_preference'])

export const preferencesSchema: z.ZodType<MovementPreferences, z.ZodTypeDef, unknown> = z.object({
  dailyStepGoal: z.number().int().positive().default(10000),
  wakeTime: clockTime.default({ hour: 7, minute: 0 }),
  sleepTime: clockTime.default({ hour: 23, minute: 0 }),
  mealTimes: z.array(clockTime).default([
    { hour: 8, minute: 0 },
    { hour: 12, minute: 30 },
    { hour: 19, minute: 0 },
  ]),
  preferredWalkTime: timePreference.default('no_preference'),
  preferredGymTime: timePreference.default('no_preference'),
  workoutDurationMinutes: z.number().int().positive().default(45),
  gymFrequency: z.number().int().min(0).max(7).default(0),
  minSlotMinutes: z.number().int().positive().default(5),
  dayEndCeiling: clockTime.default({ hour: 21, minute: 0 }),
  timeZone: z
    .string()
    .default('UTC')
    .refine((zone) => isValidTimeZone(zone), { message: 'unknown IANA time zone' }),
})

export const autopilotSettingsSchema: z.ZodType<AutopilotSettings, z.ZodTypeDef, unknown> = z
  .object({
    isEnabled: z.boolean().default(true),
    trustLevel: z.enum(['fullAuto', 'confirmFirst', 'suggestOnly']).default('confirmFirst'),
    targetWalksPerDay: z.number().int().min(1).max(8).default(3),
    includeMicroWalks: z.boolean().default(true),
    minWalkDuration: z.number().int().positive().default(10),
    maxWalkDuration: z.number().int().positive().default(30),
    calendarTitle: z.string().min(1).default('Walk'),
  })
  .refine((s) => s.minWalkDuration <= s.maxWalkDuration, { message: 'minWalkDuration must not exceed maxWalkDuration' })

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone })
    return true
  } catch {
    return false
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

export function parsePreferences(input: unknown): MovementPreferences {
  const result = preferencesSchema.safeParse(input ?? {})
  if (!result.success) throw new ConfigError(`Invalid movement preferences: ${formatIssues(result.error)}`, result.error.issues)
  return result.data
}

export function parseAutopilotSettings(input: unknown): AutopilotSettings {
  const result = autopilotSettingsSchema.safeParse(input ?? {})
  if (!result.success) throw new ConfigError(`Invalid autopilot settings: ${formatIssues(result.error)}`, result.error.issues)
  return result.data
}

export const DEFAULT_PREFERENCES: MovementPreferences = parsePreferences({})
export const DEFAULT_AUTOPILOT_SETTINGS: AutopilotSettings = parseAutopilotSettings({})
