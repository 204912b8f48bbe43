import { ActivityType, DateKey, TimeOfDay } from '../planner/types'
import { shiftDateKey } from '../planner/time'
import { KeyValueStore, readJson, storeKey, writeJson } from '../store/store'
import { adherenceSchema, patternsSchema } from '../store/schemas'
import { SerialQueue } from '../coordination/serial'
import { ActivityDataProvider, safeFetchHourlySteps, safeFetchSteps, safeFetchWorkouts } from '../providers'
import { ActivityKind, PlanAdherence, UserActivityPatterns } from './types'
import { DEFAULT_PATTERNS, updateFromHistory } from './patterns'
import { DEFAULT_ADHERENCE, recordOutcome, recordPlanGenerated } from './adherence'

export const HISTORY_WINDOW_DAYS = 30

/**
 * Persisted pattern and adherence statistics for one user.
 * Reads never fail: corrupt or missing records come back as the defaults.
 */
export class PatternLearner {
  private queue = new SerialQueue()

  constructor(
    private readonly store: KeyValueStore,
    private readonly userId: string,
  ) {}

  getPatterns(): Promise<UserActivityPatterns> {
    return readJson(this.store, storeKey(this.userId, 'patterns'), patternsSchema, DEFAULT_PATTERNS)
  }

  getAdherence(): Promise<PlanAdherence> {
    return readJson(this.store, storeKey(this.userId, 'adherence'), adherenceSchema, DEFAULT_ADHERENCE)
  }

  updateFromHistory(
    dailySteps: Record<DateKey, number>,
    dailyWorkouts: Record<DateKey, boolean>,
    options: { goal: number; hourlySteps?: Record<DateKey, number[]>; now?: Date },
  ): Promise<UserActivityPatterns> {
    return this.queue.run(async () => {
      const previous = await this.getPatterns()
      const next = updateFromHistory(dailySteps, dailyWorkouts, { ...options, previous })
      await writeJson(this.store, storeKey(this.userId, 'patterns'), next)
      return next
    })
  }

  recordOutcome(activityType: ActivityType | ActivityKind, timeOfDay: TimeOfDay, completed: boolean, now?: Date): Promise<PlanAdherence> {
    return this.queue.run(async () => {
      const next = recordOutcome(await this.getAdherence(), activityType, timeOfDay, completed, now)
      await writeJson(this.store, storeKey(this.userId, 'adherence'), next)
      return next
    })
  }

  recordPlanGenerated(now?: Date): Promise<PlanAdherence> {
    return this.queue.run(async () => {
      const next = recordPlanGenerated(await this.getAdherence(), now)
      await writeJson(this.store, storeKey(this.userId, 'adherence'), next)
      return next
    })
  }

  // Pull the trailing window (excluding today) from the activity provider and rebuild patterns
  async refreshFromProvider(provider: ActivityDataProvider, today: DateKey, goal: number, days = HISTORY_WINDOW_DAYS): Promise<UserActivityPatterns> {
    const dates = Array.from({ length: days }, (_, i) => shiftDateKey(today, -(i + 1)))
    const rows = await Promise.all(
      dates.map(async (date) => {
        const [steps, workouts, hourly] = await Promise.all([
          safeFetchSteps(provider, date),
          safeFetchWorkouts(provider, date),
          safeFetchHourlySteps(provider, date),
        ])
        return { date, steps, hadWorkout: workouts.length > 0, hourly }
      }),
    )

    const dailySteps: Record<DateKey, number> = {}
    const dailyWorkouts: Record<DateKey, boolean> = {}
    const hourlySteps: Record<DateKey, number[]> = {}
    for (const row of rows) {
      // Zero means no data for that day, not a sedentary day
      if (row.steps <= 0) continue
      dailySteps[row.date] = row.steps
      dailyWorkouts[row.date] = row.hadWorkout
      if (row.hourly.length > 0) hourlySteps[row.date] = row.hourly
    }

    console.log(`Pattern refresh for ${this.userId}: ${Object.keys(dailySteps).length}/${days} days with data`)
    return this.updateFromHistory(dailySteps, dailyWorkouts, {
      goal,
      hourlySteps: Object.keys(hourlySteps).length > 0 ? hourlySteps : undefined,
    })
  }
}
