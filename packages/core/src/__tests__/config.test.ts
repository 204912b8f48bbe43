import { DEFAULT_AUTOPILOT_SETTINGS, DEFAULT_PREFERENCES, parseAutopilotSettings, parsePreferences } from '../config'
import { loadEnv } from '../env'
import { ConfigError } from '../errors'
import { MemoryStore, readJson, storeKey, writeJson } from '../store/store'
import { planSchema, streakSchema } from '../store/schemas'
import { EMPTY_STREAK } from '../streak/types'
import { buildDailyPlan } from '../planner/plan'
import { DEFAULT_PATTERNS } from '../learning/patterns'
import { DEFAULT_ADHERENCE } from '../learning/adherence'
import { at, DAY, meeting, prefs } from './fixtures'

describe('preferences', () => {
  it('fills defaults', () => {
    expect(DEFAULT_PREFERENCES).toMatchObject({
      dailyStepGoal: 10000,
      wakeTime: { hour: 7, minute: 0 },
      sleepTime: { hour: 23, minute: 0 },
      dayEndCeiling: { hour: 21, minute: 0 },
      preferredWalkTime: 'no_preference',
      timeZone: 'UTC',
    })
    expect(parsePreferences(undefined)).toEqual(DEFAULT_PREFERENCES)
  })

  it('keeps supplied values', () => {
    const parsed = parsePreferences({ dailyStepGoal: 8000, timeZone: 'Europe/Berlin', preferredWalkTime: 'evening' })
    expect(parsed.dailyStepGoal).toBe(8000)
    expect(parsed.timeZone).toBe('Europe/Berlin')
    expect(parsed.preferredWalkTime).toBe('evening')
  })

  it('rejects unknown zones and bad clock times', () => {
    expect(() => parsePreferences({ timeZone: 'Mars/Olympus' })).toThrow('Invalid movement preferences: timeZone: unknown IANA time zone')
    expect(() => parsePreferences({ wakeTime: { hour: 25, minute: 0 } })).toThrow(ConfigError)
  })
})

describe('autopilot settings', () => {
  it('defaults to asking first', () => {
    expect(DEFAULT_AUTOPILOT_SETTINGS).toEqual({
      isEnabled: true,
      trustLevel: 'confirmFirst',
      targetWalksPerDay: 3,
      includeMicroWalks: true,
      minWalkDuration: 10,
      maxWalkDuration: 30,
      calendarTitle: 'Walk',
    })
  })

  it('rejects an inverted duration range', () => {
    expect(() => parseAutopilotSettings({ minWalkDuration: 40, maxWalkDuration: 30 })).toThrow(
      'Invalid autopilot settings: (root): minWalkDuration must not exceed maxWalkDuration',
    )
  })
})

describe('environment', () => {
  it('defaults the redis url and user', () => {
    expect(loadEnv({})).toEqual({ REDIS_URL: 'redis://localhost:6379', STRIDELY_USER_ID: 'default' })
  })

  it('rejects an unknown trust level', () => {
    expect(() => loadEnv({ STRIDELY_AUTOPILOT_TRUST: 'yolo' })).toThrow(ConfigError)
  })
})

describe('JSON store helpers', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('falls back when the store itself fails', async () => {
    const broken = new MemoryStore()
    jest.spyOn(broken, 'get').mockRejectedValue(new Error('connection reset'))
    expect(await readJson(broken, storeKey('u1', 'streak'), streakSchema, EMPTY_STREAK)).toBe(EMPTY_STREAK)
  })

  it('rejects a streak whose current run exceeds the record', async () => {
    const store = new MemoryStore()
    await writeJson(store, 'k', { currentStreak: 5, longestStreak: 2, lastGoalDate: DAY })
    expect(await readJson(store, 'k', streakSchema, EMPTY_STREAK)).toBe(EMPTY_STREAK)
  })

  it('round-trips a generated plan', async () => {
    const store = new MemoryStore()
    const plan = buildDailyPlan({
      date: DAY,
      now: at('20:00', '2025-03-10'),
      currentSteps: 2000,
      meetings: [meeting('10:00', '10:30', { title: '1:1 sync', attendeeCount: 2 }), meeting('13:00', '15:00')],
      patterns: DEFAULT_PATTERNS,
      adherence: DEFAULT_ADHERENCE,
      preferences: prefs,
    })
    const key = storeKey('u1', `plan:${DAY}`)
    await writeJson(store, key, plan)
    const loaded = await readJson(store, key, planSchema, { ...plan, activities: [] })
    expect(loaded).toEqual(plan)
    expect(loaded.generatedAt).toBeInstanceOf(Date)
  })
})
