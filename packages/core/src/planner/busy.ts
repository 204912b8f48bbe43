import { BusyInterval, CalendarMeeting, PlannedActivity, TimeInterval } from './types'
import { sortByStart } from './intervals'

export function isRealMeeting(meeting: CalendarMeeting): boolean {
  return !meeting.isAllDay && !meeting.isOutOfOffice
}

export interface CommittedActivity extends TimeInterval {
  id: string
  title: string
}

export function activityToCommitted(activity: PlannedActivity): CommittedActivity {
  return { id: activity.id, title: activity.title, start: activity.startTime, end: activity.endTime }
}

/**
 * Union of real calendar meetings and already-committed activities, sorted by start.
 * Degenerate entries (end <= start) are dropped.
 */
export function buildBusyIntervals(meetings: CalendarMeeting[], committed: CommittedActivity[] = []): BusyInterval[] {
  const busy: BusyInterval[] = []
  for (const m of meetings) {
    if (!isRealMeeting(m) || m.end <= m.start) continue
    busy.push({ start: m.start, end: m.end, source: 'meeting', refId: m.id, title: m.title })
  }
  for (const a of committed) {
    if (a.end <= a.start) continue
    busy.push({ start: a.start, end: a.end, source: 'activity', refId: a.id, title: a.title })
  }
  return sortByStart(busy)
}
