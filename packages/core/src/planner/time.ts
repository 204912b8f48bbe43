// Local-clock helpers. Instants are plain JS Dates; every hour-of-day decision is made in the user's IANA zone via luxon.

import { DateTime } from 'luxon'
import { ClockTime, DateKey, MovementPreferences, TimeInterval, TimeOfDay, TimePreference } from './types'

export const MEAL_BUFFER_MINUTES = 30

export function minutesBetween(start: Date, end: Date): number {
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 60000))
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60000)
}

export function compareAsc(a: Date, b: Date): number {
  return a.getTime() - b.getTime()
}

export function toLocal(date: Date, zone: string): DateTime {
  return DateTime.fromJSDate(date, { zone })
}

export function toDateKey(date: Date, zone: string): DateKey {
  return toLocal(date, zone).toFormat('yyyy-MM-dd')
}

export function startOfDateKey(dateKey: DateKey, zone: string): DateTime {
  return DateTime.fromISO(dateKey, { zone }).startOf('day')
}

export function shiftDateKey(dateKey: DateKey, days: number): DateKey {
  return DateTime.fromISO(dateKey, { zone: 'UTC' }).plus({ days }).toFormat('yyyy-MM-dd')
}

// Whole days from a to b (positive when b is later)
export function daysBetweenKeys(a: DateKey, b: DateKey): number {
  const start = DateTime.fromISO(a, { zone: 'UTC' })
  const end = DateTime.fromISO(b, { zone: 'UTC' })
  return Math.round(end.diff(start, 'days').days)
}

// ISO weekday, 1 = Monday ... 7 = Sunday
export function isoWeekday(dateKey: DateKey): number {
  return DateTime.fromISO(dateKey, { zone: 'UTC' }).weekday
}

export function isWeekend(dateKey: DateKey): boolean {
  return isoWeekday(dateKey) >= 6
}

export function atClock(dateKey: DateKey, time: ClockTime, zone: string): Date {
  return startOfDateKey(dateKey, zone).set({ hour: time.hour, minute: time.minute }).toJSDate()
}

export function atHour(dateKey: DateKey, hour: number, zone: string): Date {
  return atClock(dateKey, { hour, minute: 0 }, zone)
}

export function localHour(date: Date, zone: string): number {
  return toLocal(date, zone).hour
}

export function minuteOfDay(date: Date, zone: string): number {
  const local = toLocal(date, zone)
  return local.hour * 60 + local.minute
}

export function clockMinutes(time: ClockTime): number {
  return time.hour * 60 + time.minute
}

export function timeOfDayForHour(hour: number): TimeOfDay {
  if (hour < 12) return 'morning'
  if (hour < 17) return 'afternoon'
  return 'evening'
}

export function timeOfDayFor(date: Date, zone: string): TimeOfDay {
  return timeOfDayForHour(localHour(date, zone))
}

export function isDuringMeal(date: Date, mealTimes: ClockTime[], zone: string): boolean {
  const minute = minuteOfDay(date, zone)
  return mealTimes.some((meal) => Math.abs(minute - clockMinutes(meal)) < MEAL_BUFFER_MINUTES)
}

// Walk preference bands: morning 6-11, afternoon 11-17, evening 17-21
export function isInPreferredBand(hour: number, preference: TimePreference): boolean {
  switch (preference) {
    case 'morning':
      return hour >= 6 && hour < 11
    case 'afternoon':
      return hour >= 11 && hour < 17
    case 'evening':
      return hour >= 17 && hour < 21
    case 'no_preference':
      return true
  }
}

/**
 * Buffered active window for a date: one hour after waking until one hour before sleep,
 * capped at the configured day-end ceiling. When `now` falls inside the window it becomes the start.
 * Returns a window with start >= end when wake/sleep are misconfigured; callers treat that as empty.
 */
export function activeWindow(dateKey: DateKey, prefs: MovementPreferences, now?: Date): TimeInterval {
  const zone = prefs.timeZone
  let start = addMinutes(atClock(dateKey, prefs.wakeTime, zone), 60)
  const sleepBound = addMinutes(atClock(dateKey, prefs.sleepTime, zone), -60)
  const ceiling = atClock(dateKey, prefs.dayEndCeiling, zone)
  const end = sleepBound < ceiling ? sleepBound : ceiling

  if (clockMinutes(prefs.sleepTime) <= clockMinutes(prefs.wakeTime)) {
    return { start, end: start }
  }
  if (now && now > start) start = now
  return { start, end }
}
