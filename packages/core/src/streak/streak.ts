import { DateKey } from '../planner/types'
import { shiftDateKey } from '../planner/time'
import { StreakState } from './types'

export const MAX_REBUILD_DAYS = 365

/**
 * Count today as a goal day. Calling it twice on the same day changes nothing.
 */
export function recordGoalHit(state: StreakState, today: DateKey): StreakState {
  if (state.lastGoalDate === today) return state
  const continues = state.lastGoalDate === shiftDateKey(today, -1)
  const currentStreak = continues ? state.currentStreak + 1 : 1
  return {
    currentStreak,
    longestStreak: Math.max(state.longestStreak, currentStreak),
    lastGoalDate: today,
  }
}

// Drop a broken streak; the record is kept
export function validateStreak(state: StreakState, today: DateKey): StreakState {
  const { lastGoalDate } = state
  if (lastGoalDate === today || lastGoalDate === shiftDateKey(today, -1)) return state
  if (state.currentStreak === 0) return state
  return { ...state, currentStreak: 0 }
}

export function recordDailyTotal(state: StreakState, today: DateKey, steps: number, goal: number): StreakState {
  return steps >= goal ? recordGoalHit(state, today) : state
}

/**
 * Recompute the current streak from daily totals, walking back from today
 * (or from yesterday when today's goal is not met yet).
 */
export function rebuildFromHistory(steps: Record<DateKey, number>, goal: number, today: DateKey, previous?: StreakState): StreakState {
  const metToday = (steps[today] ?? 0) >= goal
  let cursor = metToday ? today : shiftDateKey(today, -1)
  let current = 0
  let lastGoalDate: DateKey | null = null

  for (let i = 0; i < MAX_REBUILD_DAYS; i++) {
    if ((steps[cursor] ?? 0) < goal) break
    if (lastGoalDate === null) lastGoalDate = cursor
    current++
    cursor = shiftDateKey(cursor, -1)
  }

  return {
    currentStreak: current,
    longestStreak: Math.max(previous?.longestStreak ?? 0, current),
    lastGoalDate: lastGoalDate ?? previous?.lastGoalDate ?? null,
  }
}
