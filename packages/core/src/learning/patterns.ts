import { DateKey } from '../planner/types'
import { isoWeekday, isWeekend } from '../planner/time'
import { ConsistentWalkTime, UserActivityPatterns } from './types'

export const DEFAULT_PATTERNS: UserActivityPatterns = {
  averageDailySteps: 6000,
  weekdayAverage: 5500,
  weekendAverage: 7000,
  bestPerformingDays: [6, 7],
  peakActivityHours: [8, 12, 17],
  typicalWalkDuration: 20,
  stepsPerMinuteWalking: 100,
  goalAchievementRate: 0.3,
  workoutRate: 0,
  consistentWalkTimes: [
    { hour: 8, frequency: 0.4 },
    { hour: 12, frequency: 0.5 },
    { hour: 18, frequency: 0.3 },
  ],
  lastUpdated: null,
}

// Steps within an hour that count as "walked at this hour"
const ACTIVE_HOUR_STEPS = 1000
const TOP_N = 3

export interface HistoryOptions {
  goal: number
  hourlySteps?: Record<DateKey, number[]>
  previous?: UserActivityPatterns
  now?: Date
}

function mean(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((acc, v) => acc + v, 0) / values.length
}

// Highest mean first; ties go to the lower key
function topKeysByMean(groups: Map<number, number[]>, n: number): number[] {
  return [...groups.entries()]
    .map(([key, values]) => ({ key, avg: mean(values) }))
    .sort((a, b) => b.avg - a.avg || a.key - b.key)
    .slice(0, n)
    .map((e) => e.key)
}

function hourlyPeaks(hourly: Record<DateKey, number[]>): { peaks: number[]; consistent: ConsistentWalkTime[] } | null {
  const days = Object.values(hourly).filter((h) => h.length > 0)
  if (days.length === 0) return null

  const byHour = new Map<number, number[]>()
  for (const day of days) {
    day.slice(0, 24).forEach((steps, hour) => {
      const list = byHour.get(hour) ?? []
      list.push(steps)
      byHour.set(hour, list)
    })
  }

  const peaks = topKeysByMean(byHour, TOP_N).sort((a, b) => a - b)
  const consistent = peaks.map((hour) => ({
    hour,
    frequency: days.filter((d) => (d[hour] ?? 0) >= ACTIVE_HOUR_STEPS).length / days.length,
  }))
  return { peaks, consistent }
}

/**
 * Rebuild activity patterns from a window of daily step totals (typically the last 30 days).
 * An empty history leaves the previous patterns untouched.
 */
export function updateFromHistory(
  dailySteps: Record<DateKey, number>,
  dailyWorkouts: Record<DateKey, boolean>,
  options: HistoryOptions,
): UserActivityPatterns {
  const previous = options.previous ?? DEFAULT_PATTERNS
  const dates = Object.keys(dailySteps).sort()
  if (dates.length === 0) return previous

  const all: number[] = []
  const weekday: number[] = []
  const weekend: number[] = []
  const byWeekday = new Map<number, number[]>()

  for (const date of dates) {
    const steps = Math.max(0, dailySteps[date] ?? 0)
    all.push(steps)
    if (isWeekend(date)) weekend.push(steps)
    else weekday.push(steps)
    const dow = isoWeekday(date)
    const list = byWeekday.get(dow) ?? []
    list.push(steps)
    byWeekday.set(dow, list)
  }

  const overall = mean(all)
  const goalDays = all.filter((s) => s >= options.goal).length
  const workoutDays = dates.filter((d) => dailyWorkouts[d] === true).length
  const hourly = options.hourlySteps ? hourlyPeaks(options.hourlySteps) : null

  return {
    ...previous,
    averageDailySteps: Math.round(overall),
    weekdayAverage: Math.round(weekday.length > 0 ? mean(weekday) : overall),
    weekendAverage: Math.round(weekend.length > 0 ? mean(weekend) : overall),
    bestPerformingDays: topKeysByMean(byWeekday, TOP_N),
    peakActivityHours: hourly ? hourly.peaks : previous.peakActivityHours,
    consistentWalkTimes: hourly ? hourly.consistent : previous.consistentWalkTimes,
    goalAchievementRate: goalDays / all.length,
    workoutRate: workoutDays / dates.length,
    lastUpdated: (options.now ?? new Date()).toISOString(),
  }
}
