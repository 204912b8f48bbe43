import {
  ActivityPriority,
  ActivityType,
  FreeSlot,
  MovementPreferences,
  PlannedActivity,
  WalkableMeeting,
} from './types'
import { PlanAdherence, UserActivityPatterns } from '../learning/types'
import { addMinutes, compareAsc } from './time'
import { rankSlots, ScoredSlot } from './scoring'
import { stableId } from './ids'
import { DEFAULT_STEPS_PER_MINUTE } from './walkability'

export const MAX_WALK_MINUTES = 45
export const SLOT_BUFFER_MINUTES = 5
export const MIN_ACTIVITY_MINUTES = 5

export interface AllocateArgs {
  stepsNeeded: number
  freeSlots: FreeSlot[]
  walkableMeetings: WalkableMeeting[]
  patterns: UserActivityPatterns
  adherence: PlanAdherence
  preferences: Pick<MovementPreferences, 'timeZone'>
}

const ACTIVITY_TITLES: Record<ActivityType, string> = {
  micro_walk: 'Micro walk',
  short_walk: 'Short walk',
  standard_walk: 'Walk',
  morning_walk: 'Morning walk',
  lunch_walk: 'Lunch walk',
  evening_walk: 'Evening walk',
  workout: 'Workout',
}

export function activityTitle(type: ActivityType): string {
  return ACTIVITY_TITLES[type]
}

export function paceOf(patterns: UserActivityPatterns): number {
  return patterns.stepsPerMinuteWalking > 0 ? patterns.stepsPerMinuteWalking : DEFAULT_STEPS_PER_MINUTE
}

export function recommendedMeetingSteps(meetings: WalkableMeeting[]): number {
  return meetings.filter((m) => m.isRecommended).reduce((acc, m) => acc + m.estimatedSteps, 0)
}

export function activityTypeFor(slot: FreeSlot, hour: number): ActivityType {
  switch (slot.slotClass) {
    case 'micro':
      return 'micro_walk'
    case 'short':
    case 'standard':
      if (hour >= 11 && hour <= 13) return 'lunch_walk'
      if (hour < 10) return 'morning_walk'
      if (hour >= 17) return 'evening_walk'
      return slot.slotClass === 'short' ? 'short_walk' : 'standard_walk'
    case 'extended':
      if (hour < 10) return 'morning_walk'
      if (hour >= 17) return 'evening_walk'
      return 'standard_walk'
  }
}

export function priorityFor(estimatedSteps: number, remaining: number): ActivityPriority {
  const share = remaining > 0 ? estimatedSteps / remaining : 0
  if (share > 0.4) return 'critical'
  if (share > 0.2) return 'recommended'
  return 'optional'
}

function reasonFor(scored: ScoredSlot, duration: number): string {
  const parts: string[] = []
  if (scored.slot.isPreferredTime) parts.push('Matches your preferred walking time')
  if (scored.isPeakHour) parts.push("You're typically most active around this time")
  if (duration >= 30) parts.push(`${duration}-min slot covers significant steps`)
  else if (duration >= 15) parts.push('Quick walk to boost your step count')
  else parts.push('Micro-break to keep moving')
  return parts.join('. ')
}

/**
 * Greedy step-gap allocation: best-scoring slots first, one walk per slot, until the gap is closed.
 * Pure and deterministic for identical inputs. Returned activities are sorted by start.
 */
export function allocateActivities(args: AllocateArgs): PlannedActivity[] {
  const { freeSlots, walkableMeetings, patterns, adherence, preferences } = args
  const pace = paceOf(patterns)
  let remaining = args.stepsNeeded - recommendedMeetingSteps(walkableMeetings)
  if (remaining <= 0) return []

  const usable = freeSlots.filter((s) => !s.isDuringMeal)
  const ranked = rankSlots(usable, patterns, adherence, preferences.timeZone)
  const activities: PlannedActivity[] = []

  for (const scored of ranked) {
    if (remaining <= 0) break
    const minutesNeeded = Math.ceil(remaining / pace) + SLOT_BUFFER_MINUTES
    const duration = Math.min(scored.slot.durationMinutes - SLOT_BUFFER_MINUTES, minutesNeeded, MAX_WALK_MINUTES)
    if (duration < MIN_ACTIVITY_MINUTES) continue

    const estimatedSteps = duration * pace
    const type = activityTypeFor(scored.slot, scored.hour)
    const startTime = new Date(scored.slot.start)

    activities.push({
      id: stableId('act', type, startTime),
      type,
      title: activityTitle(type),
      startTime,
      endTime: addMinutes(startTime, duration),
      durationMinutes: duration,
      estimatedSteps,
      priority: priorityFor(estimatedSteps, remaining),
      status: 'planned',
      reason: reasonFor(scored, duration),
      isIdealTime: scored.slot.isPreferredTime,
    })
    remaining -= estimatedSteps
  }

  return activities.sort((a, b) => compareAsc(a.startTime, b.startTime))
}
