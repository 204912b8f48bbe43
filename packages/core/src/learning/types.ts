import { TimeOfDay } from '../planner/types'

export type ActivityKind = 'walk' | 'workout'

export interface ConsistentWalkTime {
  hour: number
  frequency: number // 0..1 share of days active at this hour
}

export interface UserActivityPatterns {
  averageDailySteps: number
  weekdayAverage: number
  weekendAverage: number
  bestPerformingDays: number[] // ISO weekdays, 1 = Monday
  peakActivityHours: number[]
  typicalWalkDuration: number // minutes
  stepsPerMinuteWalking: number
  goalAchievementRate: number // 0..1
  workoutRate: number // 0..1
  consistentWalkTimes: ConsistentWalkTime[]
  lastUpdated: string | null // ISO timestamp
}

export type TimeOfDayRates = Partial<Record<TimeOfDay, number>>

export interface PlanAdherence {
  totalPlansGenerated: number
  activitiesCompleted: number
  activitiesSkipped: number
  averageCompletionRate: number // 0..1
  bestTimeSlots: TimeOfDayRates
  activityRates: Partial<Record<ActivityKind, TimeOfDayRates>>
  lastUpdated: string | null
}
