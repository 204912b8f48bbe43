import { CalendarMeeting, DailyMovementPlan, DateKey, MovementPreferences, ScheduledActivity } from './types'
import { PlanAdherence, UserActivityPatterns } from '../learning/types'
import { activeWindow, toDateKey } from './time'
import { buildBusyIntervals, CommittedActivity } from './busy'
import { expandForDate } from './recurrence'
import { findFreeSlots } from './slots'
import { analyzeWalkableMeetings } from './walkability'
import { allocateActivities, paceOf, recommendedMeetingSteps } from './algorithm'
import { coverageOf, ON_TRACK_GAP_STEPS, planConfidence, planReasoning } from './confidence'
import { detectConflicts, meetingsAsScheduled } from './conflicts'

export interface BuildDailyPlanArgs {
  date: DateKey
  now: Date
  currentSteps: number
  meetings: CalendarMeeting[]
  committed?: CommittedActivity[]
  routines?: ScheduledActivity[]
  patterns: UserActivityPatterns
  adherence: PlanAdherence
  preferences: MovementPreferences
}

/**
 * One date, end to end: busy time, free slots, walkable meetings, allocation, confidence.
 * Pure given its arguments; `now` only moves the window start when planning today.
 */
export function buildDailyPlan(args: BuildDailyPlanArgs): DailyMovementPlan {
  const { date, now, meetings, patterns, adherence, preferences } = args
  const zone = preferences.timeZone
  const isToday = toDateKey(now, zone) === date

  const committed = [...(args.committed ?? []), ...expandForDate(args.routines ?? [], date, zone)]
  const busy = buildBusyIntervals(meetings, committed)
  const window = activeWindow(date, preferences, isToday ? now : undefined)
  const freeSlots = findFreeSlots(busy, window, { minDurationMinutes: preferences.minSlotMinutes, preferences })
  const walkableMeetings = analyzeWalkableMeetings(meetings, paceOf(patterns))

  const currentSteps = Math.max(0, args.currentSteps)
  const stepsNeeded = Math.max(0, preferences.dailyStepGoal - currentSteps)
  const activities =
    stepsNeeded > 0 ? allocateActivities({ stepsNeeded, freeSlots, walkableMeetings, patterns, adherence, preferences }) : []

  const totalPlannedSteps = activities.reduce((acc, a) => acc + a.estimatedSteps, 0) + recommendedMeetingSteps(walkableMeetings)
  const remainingGap = Math.max(0, stepsNeeded - totalPlannedSteps)

  return {
    date,
    targetSteps: preferences.dailyStepGoal,
    currentSteps,
    stepsNeeded,
    activities,
    walkableMeetings,
    freeSlots,
    totalPlannedSteps,
    remainingGap,
    isOnTrack: remainingGap < ON_TRACK_GAP_STEPS,
    confidence: planConfidence(coverageOf(stepsNeeded, totalPlannedSteps), patterns),
    reasoning: planReasoning({ stepsNeeded, plannedSteps: totalPlannedSteps, activities, walkableMeetings }),
    conflicts: detectConflicts(committed, meetingsAsScheduled(meetings)),
    generatedAt: new Date(now),
  }
}
