import { DateKey } from '../planner/types'
import { KeyValueStore, readJson, storeKey, writeJson } from '../store/store'
import { streakSchema } from '../store/schemas'
import { SerialQueue } from '../coordination/serial'
import { EMPTY_STREAK, StreakState } from './types'
import { rebuildFromHistory, recordDailyTotal, recordGoalHit, validateStreak } from './streak'

export class StreakTracker {
  private queue = new SerialQueue()

  constructor(
    private readonly store: KeyValueStore,
    private readonly userId: string,
  ) {}

  private get key(): string {
    return storeKey(this.userId, 'streak')
  }

  get(): Promise<StreakState> {
    return readJson(this.store, this.key, streakSchema, EMPTY_STREAK)
  }

  private update(change: (state: StreakState) => StreakState): Promise<StreakState> {
    return this.queue.run(async () => {
      const before = await this.get()
      const after = change(before)
      if (after !== before) await writeJson(this.store, this.key, after)
      return after
    })
  }

  recordGoalHit(today: DateKey): Promise<StreakState> {
    return this.update((s) => recordGoalHit(s, today))
  }

  recordDailyTotal(today: DateKey, steps: number, goal: number): Promise<StreakState> {
    return this.update((s) => recordDailyTotal(s, today, steps, goal))
  }

  // Run at process start
  validate(today: DateKey): Promise<StreakState> {
    return this.update((s) => validateStreak(s, today))
  }

  rebuild(steps: Record<DateKey, number>, goal: number, today: DateKey): Promise<StreakState> {
    return this.update((s) => rebuildFromHistory(steps, goal, today, s))
  }
}
