import { CalendarMeeting, MovementPreferences } from '../planner/types'
import { compareAsc, isDuringMeal, minutesBetween } from '../planner/time'
import { isRealMeeting } from '../planner/busy'

export interface WalkOpportunity {
  start: Date
  durationMinutes: number
  reason: string
}

export const POST_MEETING_MIN_GAP = 10
export const POST_MEETING_MAX_WALK = 15
export const SITTING_BREAK_MINUTES = 5

/**
 * Right after a meeting ends: a short walk if there is room before the next one.
 */
export function checkPostMeetingOpportunity(
  meetingEnd: Date,
  meetings: CalendarMeeting[],
  prefs: Pick<MovementPreferences, 'mealTimes' | 'timeZone'>,
): WalkOpportunity | null {
  const next = meetings
    .filter((m) => isRealMeeting(m) && m.start >= meetingEnd)
    .sort((a, b) => compareAsc(a.start, b.start))[0]

  if (!next) {
    return { start: new Date(meetingEnd), durationMinutes: 10, reason: 'No more meetings, time for a quick walk' }
  }

  const gap = minutesBetween(meetingEnd, next.start)
  if (gap < POST_MEETING_MIN_GAP) return null
  if (isDuringMeal(meetingEnd, prefs.mealTimes, prefs.timeZone)) return null

  return {
    start: new Date(meetingEnd),
    durationMinutes: Math.min(gap - 5, POST_MEETING_MAX_WALK),
    reason: `${gap} min until ${next.title}`,
  }
}

export function suggestSittingBreak(now: Date): WalkOpportunity {
  return { start: new Date(now), durationMinutes: SITTING_BREAK_MINUTES, reason: "You've been sitting a while, stretch your legs" }
}
