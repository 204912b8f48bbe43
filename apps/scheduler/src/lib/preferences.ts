import { promises as fs } from 'node:fs'
import { z } from 'zod'
import {
  AutopilotSettings,
  ConfigError,
  Env,
  formatIssues,
  MovementPreferences,
  parseAutopilotSettings,
  parsePreferences,
  ScheduledActivity,
} from '@stridely/core'

const routineSchema = z.object({
  id: z.string(),
  title: z.string(),
  kind: z.enum(['walk', 'workout']),
  startHour: z.number().int().min(0).max(23),
  startMinute: z.number().int().min(0).max(59).default(0),
  durationMinutes: z.number().int().positive(),
  recurrence: z.enum(['once', 'weekly', 'weekdays', 'biweekly', 'monthly']),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  isActive: z.boolean().default(true),
})

const settingsFileSchema = z.object({
  preferences: z.unknown().optional(),
  autopilot: z.unknown().optional(),
  routines: z.array(routineSchema).default([]),
})

export interface UserSettings {
  preferences: MovementPreferences
  autopilot: AutopilotSettings
  routines: ScheduledActivity[]
}

async function readSettingsFile(path: string): Promise<unknown> {
  let raw: string
  try {
    raw = await fs.readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read preferences file ${path}`, error)
  }
  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`Preferences file ${path} is not valid JSON`, error)
  }
}

/**
 * Preferences, autopilot settings and routines for the configured user.
 * Environment overrides (time zone, trust level) win over the file.
 */
export async function loadUserSettings(env: Env): Promise<UserSettings> {
  const input = env.STRIDELY_PREFERENCES_FILE ? await readSettingsFile(env.STRIDELY_PREFERENCES_FILE) : {}
  const file = settingsFileSchema.safeParse(input)
  if (!file.success) throw new ConfigError(`Invalid preferences file: ${formatIssues(file.error)}`, file.error.issues)

  const prefsInput = { ...asObject(file.data.preferences), ...(env.STRIDELY_TIME_ZONE ? { timeZone: env.STRIDELY_TIME_ZONE } : {}) }
  const autopilotInput = {
    ...asObject(file.data.autopilot),
    ...(env.STRIDELY_AUTOPILOT_TRUST ? { trustLevel: env.STRIDELY_AUTOPILOT_TRUST } : {}),
  }

  return {
    preferences: parsePreferences(prefsInput),
    autopilot: parseAutopilotSettings(autopilotInput),
    routines: file.data.routines,
  }
}

function asObject(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null) return {}
  if (typeof value !== 'object' || Array.isArray(value)) throw new ConfigError('Preferences sections must be JSON objects')
  return Object.fromEntries(Object.entries(value))
}
