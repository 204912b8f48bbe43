import { FreeSlot } from '../planner/types'
import { compareAsc, localHour } from '../planner/time'
import { AutopilotSettings, AutopilotWalkType, SlotSelection } from './types'

export const WALK_SPACING_MINUTES = 60
export const MICRO_SPACING_MINUTES = 30
export const MICRO_GAP_MIN = 5
export const MICRO_GAP_MAX = 15
export const MICRO_WALK_MINUTES = 10

interface Category {
  name: string
  from: number
  to: number // exclusive
  priority: number // lower runs first
}

const CATEGORIES: Category[] = [
  { name: 'morning', from: 8, to: 11, priority: 2 },
  { name: 'midday', from: 11, to: 14, priority: 1 },
  { name: 'afternoon', from: 14, to: 17, priority: 3 },
  { name: 'evening', from: 17, to: 20, priority: 2 },
]

// Array.prototype.sort is stable, so equal priorities keep declaration order
const BY_PRIORITY = [...CATEGORIES].sort((a, b) => a.priority - b.priority)

export function autopilotWalkType(durationMinutes: number): AutopilotWalkType {
  if (durationMinutes <= 10) return 'micro'
  if (durationMinutes <= 20) return 'short'
  return 'standard'
}

export function walkDisplayName(type: AutopilotWalkType): string {
  switch (type) {
    case 'micro':
      return 'Quick Reset'
    case 'short':
      return 'Energy Boost'
    case 'standard':
      return 'Power Walk'
  }
}

function farFromAll(start: Date, chosen: SlotSelection[], spacing: number): boolean {
  return chosen.every((c) => Math.abs(c.startTime.getTime() - start.getTime()) >= spacing * 60000)
}

/**
 * Pick walk times for a day: at most one per time-of-day category in priority order,
 * spaced an hour apart, then short gaps for micro-walks if the target is still unmet.
 * `target` defaults to the configured walks per day.
 */
export function selectAutopilotSlots(
  freeSlots: FreeSlot[],
  settings: AutopilotSettings,
  zone: string,
  target = settings.targetWalksPerDay,
): SlotSelection[] {
  const slots = freeSlots.filter((s) => !s.isDuringMeal).sort((a, b) => compareAsc(a.start, b.start))
  const chosen: SlotSelection[] = []
  if (target <= 0) return chosen

  for (const category of BY_PRIORITY) {
    if (chosen.length >= target) break
    const slot = slots.find((s) => {
      const hour = localHour(s.start, zone)
      return (
        s.durationMinutes >= settings.minWalkDuration &&
        hour >= category.from &&
        hour < category.to &&
        farFromAll(s.start, chosen, WALK_SPACING_MINUTES)
      )
    })
    if (!slot) continue
    chosen.push({
      startTime: new Date(slot.start),
      durationMinutes: Math.min(settings.maxWalkDuration, Math.max(settings.minWalkDuration, slot.durationMinutes)),
      category: category.name,
    })
  }

  if (chosen.length < target && settings.includeMicroWalks) {
    for (const slot of slots) {
      if (chosen.length >= target) break
      if (slot.durationMinutes < MICRO_GAP_MIN || slot.durationMinutes > MICRO_GAP_MAX) continue
      if (!farFromAll(slot.start, chosen, MICRO_SPACING_MINUTES)) continue
      chosen.push({
        startTime: new Date(slot.start),
        durationMinutes: Math.min(slot.durationMinutes, MICRO_WALK_MINUTES),
        category: 'micro',
      })
    }
  }

  return chosen.sort((a, b) => compareAsc(a.startTime, b.startTime))
}
