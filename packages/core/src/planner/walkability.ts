import { CalendarMeeting, WalkableMeeting } from './types'
import { minutesBetween } from './time'
import { isRealMeeting } from './busy'

export const DEFAULT_STEPS_PER_MINUTE = 100

const WALK_FRIENDLY_KEYWORDS = ['1:1', 'one on one', 'sync', 'catch up', 'check in', 'chat', 'coffee']
const NOT_WALKABLE_KEYWORDS = ['presentation', 'demo', 'workshop', 'training', 'all hands', 'standup', 'review']
// Broader list for the background-listening filter
const NOT_LISTENABLE_KEYWORDS = [
  'interview',
  'presentation',
  'review',
  'demo',
  'standup',
  'stand-up',
  'all hands',
  'all-hands',
  'training',
  'workshop',
  'onsite',
  'on-site',
]

export interface MeetingClassification {
  isWalkable: boolean
  isOneOnOne: boolean
  score: number
  reason: string
  estimatedSteps: number
}

function titleHas(title: string, keywords: string[]): boolean {
  const lower = title.toLowerCase()
  return keywords.some((k) => lower.includes(k))
}

export function isOneOnOne(meeting: CalendarMeeting): boolean {
  return meeting.attendeeCount <= 2
}

export function meetingDuration(meeting: CalendarMeeting): number {
  return minutesBetween(meeting.start, meeting.end)
}

// Additive walkability score, clamped to [0,1]
export function walkabilityScore(meeting: CalendarMeeting): number {
  let score = 0
  const minutes = meetingDuration(meeting)

  if (meeting.attendeeCount <= 2) score += 0.4
  else if (meeting.attendeeCount <= 3) score += 0.2

  if (minutes >= 30 && minutes <= 60) score += 0.3
  else if (minutes >= 20 && minutes < 90) score += 0.2

  if (titleHas(meeting.title, WALK_FRIENDLY_KEYWORDS)) score += 0.3
  if (titleHas(meeting.title, NOT_WALKABLE_KEYWORDS)) score = Math.max(0, score - 0.5)

  return Math.min(1, Math.max(0, score))
}

/**
 * Walking 1:1: a real meeting that is one-on-one and scores at least 0.5.
 * Used by the smart planner to recommend taking a meeting on foot.
 */
export function isWalkingOneOnOne(meeting: CalendarMeeting, score = walkabilityScore(meeting)): boolean {
  return isRealMeeting(meeting) && score >= 0.5 && isOneOnOne(meeting)
}

/**
 * Background-listenable: a large meeting someone else runs, where the user can listen in while walking.
 * Used for general step-gap filling and the walk+workout allocator.
 */
export function isBackgroundListenable(meeting: CalendarMeeting): boolean {
  if (!isRealMeeting(meeting)) return false
  const minutes = meetingDuration(meeting)
  if (minutes < 20 || minutes > 120) return false
  if (meeting.attendeeCount < 4) return false
  if (meeting.isOrganizer) return false
  return !titleHas(meeting.title, NOT_LISTENABLE_KEYWORDS)
}

function reasonFor(meeting: CalendarMeeting, walkable: boolean): string {
  if (walkable) return 'Perfect for a walking 1:1'
  if (!isOneOnOne(meeting)) return 'Too many attendees for walking'
  return 'Meeting type not ideal for walking'
}

export function classifyMeeting(meeting: CalendarMeeting, stepsPerMinute = DEFAULT_STEPS_PER_MINUTE): MeetingClassification {
  const score = walkabilityScore(meeting)
  const isWalkable = isWalkingOneOnOne(meeting, score)
  return {
    isWalkable,
    isOneOnOne: isOneOnOne(meeting),
    score,
    reason: reasonFor(meeting, isWalkable),
    estimatedSteps: meetingDuration(meeting) * stepsPerMinute,
  }
}

export function analyzeWalkableMeetings(meetings: CalendarMeeting[], stepsPerMinute = DEFAULT_STEPS_PER_MINUTE): WalkableMeeting[] {
  return meetings.filter(isRealMeeting).map((m) => {
    const c = classifyMeeting(m, stepsPerMinute)
    return {
      meetingId: m.id,
      title: m.title,
      start: m.start,
      end: m.end,
      durationMinutes: meetingDuration(m),
      attendeeCount: m.attendeeCount,
      isOneOnOne: c.isOneOnOne,
      score: c.score,
      isRecommended: c.isWalkable,
      estimatedSteps: c.estimatedSteps,
      reason: c.reason,
    }
  })
}
