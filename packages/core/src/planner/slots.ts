import { BusyInterval, FreeSlot, MovementPreferences, SlotClass, TimeInterval } from './types'
import { isDuringMeal, isInPreferredBand, localHour, minutesBetween } from './time'
import { sortByStart } from './intervals'

export const DEFAULT_MIN_SLOT_MINUTES = 5

export type SlotPreferences = Pick<MovementPreferences, 'mealTimes' | 'preferredWalkTime' | 'timeZone'>

export interface FindFreeSlotsOptions {
  minDurationMinutes?: number
  preferences: SlotPreferences
}

export function classifySlot(minutes: number): SlotClass {
  if (minutes <= 10) return 'micro'
  if (minutes <= 20) return 'short'
  if (minutes <= 40) return 'standard'
  return 'extended'
}

export function toFreeSlot(start: Date, end: Date, prefs: SlotPreferences): FreeSlot {
  const durationMinutes = minutesBetween(start, end)
  return {
    start: new Date(start),
    end: new Date(end),
    durationMinutes,
    slotClass: classifySlot(durationMinutes),
    isDuringMeal: isDuringMeal(start, prefs.mealTimes, prefs.timeZone),
    isPreferredTime: isInPreferredBand(localHour(start, prefs.timeZone), prefs.preferredWalkTime),
  }
}

/**
 * Complement of the busy intervals inside the window.
 * Meal-adjacent slots are flagged, not dropped; filtering on that flag is up to the caller.
 */
export function findFreeSlots(busy: BusyInterval[], window: TimeInterval, options: FindFreeSlotsOptions): FreeSlot[] {
  if (window.start >= window.end) return []
  const minDuration = options.minDurationMinutes ?? DEFAULT_MIN_SLOT_MINUTES
  const free: FreeSlot[] = []

  const emit = (start: Date, end: Date) => {
    if (minutesBetween(start, end) >= minDuration) free.push(toFreeSlot(start, end, options.preferences))
  }

  let cursor = new Date(window.start)
  for (const b of sortByStart(busy)) {
    if (b.end <= window.start || b.start >= window.end) continue
    if (cursor < b.start) emit(cursor, b.start)
    const end = b.end > window.end ? window.end : b.end
    if (end > cursor) cursor = new Date(end)
  }
  if (cursor < window.end) emit(cursor, window.end)
  return free
}
