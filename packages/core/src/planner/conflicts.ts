import { CalendarMeeting, PlannedActivity, ScheduleConflict, TimeInterval } from './types'
import { minutesBetween } from './time'
import { overlaps } from './intervals'
import { isRealMeeting } from './busy'

export const MIN_PROXIMITY_MINUTES = 30

interface Scheduled extends TimeInterval {
  id: string
  title: string
}

function proximityMinutes(a: TimeInterval, b: TimeInterval): number | null {
  if (a.end <= b.start) return minutesBetween(a.end, b.start)
  if (b.end <= a.start) return minutesBetween(b.end, a.start)
  return null
}

/**
 * Report (never resolve) clashes between scheduled activities and calendar events:
 * direct overlap, or less than 30 minutes between one ending and the other starting.
 */
export function detectConflicts(scheduled: Scheduled[], events: Scheduled[]): ScheduleConflict[] {
  const conflicts: ScheduleConflict[] = []
  for (const s of scheduled) {
    for (const e of events) {
      if (s.id === e.id) continue
      if (overlaps(s, e)) {
        conflicts.push({
          scheduledId: s.id,
          scheduledTitle: s.title,
          conflictingId: e.id,
          conflictingTitle: e.title,
          kind: 'overlap',
          description: `${s.title} overlaps with ${e.title}`,
        })
        continue
      }
      const gap = proximityMinutes(s, e)
      if (gap !== null && gap < MIN_PROXIMITY_MINUTES) {
        conflicts.push({
          scheduledId: s.id,
          scheduledTitle: s.title,
          conflictingId: e.id,
          conflictingTitle: e.title,
          kind: 'too_close',
          description: `${s.title} is only ${gap} min from ${e.title}`,
        })
      }
    }
  }
  return conflicts
}

export function activitiesAsScheduled(activities: PlannedActivity[]): Scheduled[] {
  return activities.map((a) => ({ id: a.id, title: a.title, start: a.startTime, end: a.endTime }))
}

export function meetingsAsScheduled(meetings: CalendarMeeting[]): Scheduled[] {
  return meetings.filter(isRealMeeting).map((m) => ({ id: m.id, title: m.title, start: m.start, end: m.end }))
}
