export type DateKey = string // YYYY-MM-DD in the user's time zone

export type TimePreference = 'morning' | 'afternoon' | 'evening' | 'no_preference'

export type TimeOfDay = 'morning' | 'afternoon' | 'evening'

export type SlotClass = 'micro' | 'short' | 'standard' | 'extended'

export type ActivityType =
  | 'micro_walk'
  | 'short_walk'
  | 'standard_walk'
  | 'morning_walk'
  | 'lunch_walk'
  | 'evening_walk'
  | 'workout'

export type ActivityPriority = 'critical' | 'recommended' | 'optional'

export type ActivityStatus = 'planned' | 'completed' | 'skipped' | 'rescheduled'

export type WorkoutType = 'push' | 'pull' | 'legs'

export interface ClockTime {
  hour: number // 0-23 local wall clock
  minute: number // 0-59
}

export interface TimeInterval {
  start: Date
  end: Date
}

export interface BusyInterval extends TimeInterval {
  source: 'meeting' | 'activity'
  refId?: string
  title?: string
}

export interface FreeSlot extends TimeInterval {
  durationMinutes: number
  slotClass: SlotClass
  isDuringMeal: boolean
  isPreferredTime: boolean
}

export interface MovementPreferences {
  dailyStepGoal: number
  wakeTime: ClockTime
  sleepTime: ClockTime
  mealTimes: ClockTime[] // breakfast, lunch, dinner by default
  preferredWalkTime: TimePreference
  preferredGymTime: TimePreference
  workoutDurationMinutes: number
  gymFrequency: number // target workouts per week, 0 = none
  minSlotMinutes: number
  dayEndCeiling: ClockTime // hard cap on the active window
  timeZone: string // IANA timezone, e.g. "Europe/Berlin"
}

export interface CalendarMeeting {
  id: string
  title: string
  start: Date
  end: Date
  attendeeCount: number
  isOrganizer: boolean
  isAllDay: boolean
  isOutOfOffice: boolean
  location?: string
  notes?: string
}

export interface WalkableMeeting {
  meetingId: string
  title: string
  start: Date
  end: Date
  durationMinutes: number
  attendeeCount: number
  isOneOnOne: boolean
  score: number // 0..1
  isRecommended: boolean
  estimatedSteps: number
  reason: string
}

export interface PlannedActivity {
  id: string
  type: ActivityType
  title: string
  startTime: Date
  endTime: Date
  durationMinutes: number
  estimatedSteps: number
  priority: ActivityPriority
  status: ActivityStatus
  reason: string
  isIdealTime: boolean
  calendarEventId?: string
  workoutType?: WorkoutType
}

export type Recurrence = 'once' | 'weekly' | 'weekdays' | 'biweekly' | 'monthly'

// A user-owned routine (e.g. "gym Mon 18:00 weekly"); expands into committed busy time
export interface ScheduledActivity {
  id: string
  title: string
  kind: 'walk' | 'workout'
  startHour: number
  startMinute: number
  durationMinutes: number
  recurrence: Recurrence
  startDate: DateKey
  endDate?: DateKey
  isActive: boolean
}

export interface ScheduleConflict {
  scheduledId: string
  scheduledTitle: string
  conflictingId: string
  conflictingTitle: string
  kind: 'overlap' | 'too_close'
  description: string
}

export interface DailyMovementPlan {
  date: DateKey
  targetSteps: number
  currentSteps: number
  stepsNeeded: number
  activities: PlannedActivity[]
  walkableMeetings: WalkableMeeting[]
  freeSlots: FreeSlot[]
  totalPlannedSteps: number
  remainingGap: number
  isOnTrack: boolean
  confidence: number // 0..1, capped below certainty
  reasoning: string
  conflicts: ScheduleConflict[]
  generatedAt: Date
}
