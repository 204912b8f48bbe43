import { FreeSlot, TimePreference } from './types'
import { PlanAdherence, UserActivityPatterns } from '../learning/types'
import { rateFor } from '../learning/adherence'
import { localHour, timeOfDayForHour } from './time'

export interface ScoredSlot {
  slot: FreeSlot
  score: number
  hour: number
  isPeakHour: boolean
}

// Heuristic slot score
// Score = f(peak hour, preferred band, length, learned completion rate for the time of day)
export function scoreSlot(slot: FreeSlot, patterns: UserActivityPatterns, adherence: PlanAdherence, zone: string): ScoredSlot {
  const hour = localHour(slot.start, zone)
  const isPeakHour = patterns.peakActivityHours.includes(hour)
  let score = 0

  if (isPeakHour) score += 0.3
  if (slot.isPreferredTime) score += 0.25

  // longer slots fit a full walk
  if (slot.durationMinutes >= 20) score += 0.2
  if (slot.durationMinutes >= 30) score += 0.15

  score += rateFor(adherence.bestTimeSlots, timeOfDayForHour(hour)) * 0.3

  return { slot, score, hour, isPeakHour }
}

// Descending by score; ties keep the earlier slot first
export function rankSlots(slots: FreeSlot[], patterns: UserActivityPatterns, adherence: PlanAdherence, zone: string): ScoredSlot[] {
  return slots
    .map((slot, index) => ({ scored: scoreSlot(slot, patterns, adherence, zone), index }))
    .sort((a, b) => b.scored.score - a.scored.score || a.scored.slot.start.getTime() - b.scored.slot.start.getTime() || a.index - b.index)
    .map((e) => e.scored)
}

/**
 * Workout time-of-day fit on a 0-3 scale.
 */
export function preferenceScore(hour: number, preference: TimePreference): number {
  switch (preference) {
    case 'morning':
      if (hour >= 5 && hour < 10) return 3
      if (hour >= 10 && hour < 12) return 1
      return 0
    case 'afternoon':
      return hour >= 12 && hour < 17 ? 3 : 0
    case 'evening':
      return hour >= 17 && hour < 21 ? 3 : 0
    case 'no_preference':
      if ((hour >= 6 && hour < 9) || (hour >= 17 && hour < 20)) return 2
      return 1
  }
}

// Same table for walks, except mornings start at 6 and no preference is flat
export function walkPreferenceScore(hour: number, preference: TimePreference): number {
  switch (preference) {
    case 'morning':
      if (hour >= 6 && hour < 10) return 3
      if (hour >= 10 && hour < 12) return 1
      return 0
    case 'afternoon':
    case 'evening':
      return preferenceScore(hour, preference)
    case 'no_preference':
      return 1
  }
}
