import { ActivityType, TimeOfDay } from '../planner/types'
import { ActivityKind, PlanAdherence, TimeOfDayRates } from './types'

export const ADHERENCE_ALPHA = 0.2
export const NEUTRAL_RATE = 0.5

export const DEFAULT_ADHERENCE: PlanAdherence = {
  totalPlansGenerated: 0,
  activitiesCompleted: 0,
  activitiesSkipped: 0,
  averageCompletionRate: NEUTRAL_RATE,
  bestTimeSlots: {},
  activityRates: {},
  lastUpdated: null,
}

export function activityKindOf(type: ActivityType | ActivityKind): ActivityKind {
  return type === 'workout' ? 'workout' : 'walk'
}

export function rateFor(rates: TimeOfDayRates | undefined, timeOfDay: TimeOfDay): number {
  return rates?.[timeOfDay] ?? NEUTRAL_RATE
}

export function ema(previous: number, outcome: number, alpha = ADHERENCE_ALPHA): number {
  return alpha * outcome + (1 - alpha) * previous
}

/**
 * Fold one completed/skipped outcome into the adherence stats.
 * Returns a new object; the input is left untouched.
 */
export function recordOutcome(
  adherence: PlanAdherence,
  activityType: ActivityType | ActivityKind,
  timeOfDay: TimeOfDay,
  completed: boolean,
  now: Date = new Date(),
): PlanAdherence {
  const outcome = completed ? 1 : 0
  const kind = activityKindOf(activityType)
  const activitiesCompleted = adherence.activitiesCompleted + (completed ? 1 : 0)
  const activitiesSkipped = adherence.activitiesSkipped + (completed ? 0 : 1)
  const kindRates = adherence.activityRates[kind] ?? {}

  return {
    ...adherence,
    activitiesCompleted,
    activitiesSkipped,
    averageCompletionRate: activitiesCompleted / (activitiesCompleted + activitiesSkipped),
    bestTimeSlots: {
      ...adherence.bestTimeSlots,
      [timeOfDay]: ema(rateFor(adherence.bestTimeSlots, timeOfDay), outcome),
    },
    activityRates: {
      ...adherence.activityRates,
      [kind]: { ...kindRates, [timeOfDay]: ema(rateFor(kindRates, timeOfDay), outcome) },
    },
    lastUpdated: now.toISOString(),
  }
}

export function recordPlanGenerated(adherence: PlanAdherence, now: Date = new Date()): PlanAdherence {
  return { ...adherence, totalPlansGenerated: adherence.totalPlansGenerated + 1, lastUpdated: now.toISOString() }
}
