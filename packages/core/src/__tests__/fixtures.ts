import { BusyInterval, CalendarMeeting, FreeSlot, MovementPreferences } from '../planner/types'
import { toFreeSlot } from '../planner/slots'
import { DEFAULT_PREFERENCES } from '../config'

// Tuesday 2025-03-11, all times UTC unless a test says otherwise
export const DAY = '2025-03-11'

export function at(hhmm: string, day = DAY): Date {
  return new Date(`${day}T${hhmm}:00.000Z`)
}

export const prefs: MovementPreferences = { ...DEFAULT_PREFERENCES, timeZone: 'UTC' }

export function busy(from: string, to: string, source: BusyInterval['source'] = 'meeting'): BusyInterval {
  return { start: at(from), end: at(to), source }
}

export function slot(from: string, to: string, overrides: Partial<MovementPreferences> = {}): FreeSlot {
  return toFreeSlot(at(from), at(to), { ...prefs, ...overrides })
}

let meetingSeq = 0

export function meeting(from: string, to: string, overrides: Partial<CalendarMeeting> = {}): CalendarMeeting {
  meetingSeq++
  return {
    id: `m${meetingSeq}`,
    title: `Meeting ${meetingSeq}`,
    start: at(from),
    end: at(to),
    attendeeCount: 5,
    isOrganizer: false,
    isAllDay: false,
    isOutOfOffice: false,
    ...overrides,
  }
}
