import { DateKey } from '../planner/types'

export interface StreakState {
  currentStreak: number
  longestStreak: number
  lastGoalDate: DateKey | null
}

export const EMPTY_STREAK: StreakState = { currentStreak: 0, longestStreak: 0, lastGoalDate: null }
