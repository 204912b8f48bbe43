import { CalendarMeeting, DateKey } from './planner/types'
import { AutopilotWalk } from './autopilot/types'
import { ProviderError } from './errors'

export interface NewCalendarEvent {
  title: string
  start: Date
  end: Date
  notes?: string
  alarmOffsetMinutes?: number
}

export interface CalendarProvider {
  fetchEvents(date: DateKey): Promise<CalendarMeeting[]>
  createEvent(event: NewCalendarEvent): Promise<string>
  deleteEvent(eventId: string): Promise<void>
}

export interface Workout {
  start: Date
  end: Date
  kind?: string
}

export interface ActivityDataProvider {
  fetchSteps(date: DateKey): Promise<number>
  fetchHourlySteps?(date: DateKey): Promise<number[]>
  fetchWorkouts(date: DateKey): Promise<Workout[]>
}

export interface NotificationDispatcher {
  scheduleApprovalPrompt(walk: AutopilotWalk): Promise<void>
  scheduleSummary(date: DateKey, walks: AutopilotWalk[]): Promise<void>
}

// Provider failures degrade to an empty result; planning continues with less information
async function orEmpty<T>(provider: string, operation: string, fallback: T, call: () => Promise<T>): Promise<T> {
  try {
    return await call()
  } catch (error) {
    console.warn(new ProviderError(provider, operation, error).message)
    return fallback
  }
}

export function safeFetchEvents(calendar: CalendarProvider, date: DateKey): Promise<CalendarMeeting[]> {
  return orEmpty('calendar', 'fetchEvents', [], () => calendar.fetchEvents(date))
}

export function safeFetchSteps(activity: ActivityDataProvider, date: DateKey): Promise<number> {
  return orEmpty('activity', 'fetchSteps', 0, () => activity.fetchSteps(date))
}

export function safeFetchHourlySteps(activity: ActivityDataProvider, date: DateKey): Promise<number[]> {
  const fetchHourly = activity.fetchHourlySteps
  if (!fetchHourly) return Promise.resolve([])
  return orEmpty('activity', 'fetchHourlySteps', [], () => fetchHourly.call(activity, date))
}

export function safeFetchWorkouts(activity: ActivityDataProvider, date: DateKey): Promise<Workout[]> {
  return orEmpty('activity', 'fetchWorkouts', [], () => activity.fetchWorkouts(date))
}

// Fire-and-forget: a failed notification is logged, never propagated
export function dispatchQuietly(what: string, send: () => Promise<void>): void {
  Promise.resolve()
    .then(send)
    .catch((error: unknown) => {
      console.warn(`Failed to send ${what} notification:`, error)
    })
}
