import {
  ActivityType,
  BusyInterval,
  CalendarMeeting,
  DateKey,
  FreeSlot,
  MovementPreferences,
  PlannedActivity,
  TimeInterval,
  TimePreference,
  WorkoutType,
} from './types'
import { addMinutes, atHour, compareAsc, isDuringMeal, localHour } from './time'
import { overlaps } from './intervals'
import { preferenceScore, walkPreferenceScore } from './scoring'
import { isBackgroundListenable } from './walkability'
import { nextWorkoutType, workoutTitle } from './workout'
import { stableId } from './ids'
import { MAX_WALK_MINUTES } from './algorithm'

export const MIN_CAPACITY_SLOT_MINUTES = 45
export const ONE_HOUR_SLOT_MINUTES = 60

export type CapacityTier = 'none' | 'single' | 'multiple'

export interface WalkWorkoutArgs {
  date: DateKey
  freeSlots: FreeSlot[]
  meetings: CalendarMeeting[]
  busy: BusyInterval[]
  window: TimeInterval
  preferences: MovementPreferences
  needsWorkout: boolean
  lastWorkoutType?: WorkoutType
  stepsPerMinute?: number
}

export interface WalkWorkoutPlan {
  tier: CapacityTier
  workout: PlannedActivity | null
  walk: PlannedActivity | null
  walkMeeting: CalendarMeeting | null // set when the walk is taken during a listen-only meeting
  otherWalks: PlannedActivity[]
}

interface HourRange {
  from: number
  to: number // exclusive
}

function walkLabel(hour: number): { type: ActivityType; title: string } {
  if (hour < 10) return { type: 'morning_walk', title: 'Morning walk' }
  if (hour < 14) return { type: 'lunch_walk', title: 'Midday walk' }
  if (hour < 17) return { type: 'standard_walk', title: 'Afternoon walk' }
  return { type: 'evening_walk', title: 'Evening walk' }
}

function makeWalk(start: Date, minutes: number, prefs: MovementPreferences, pace: number, reason: string): PlannedActivity {
  const hour = localHour(start, prefs.timeZone)
  const { type, title } = walkLabel(hour)
  const duration = Math.min(MAX_WALK_MINUTES, minutes)
  return {
    id: stableId('act', type, start),
    type,
    title,
    startTime: new Date(start),
    endTime: addMinutes(start, duration),
    durationMinutes: duration,
    estimatedSteps: duration * pace,
    priority: 'recommended',
    status: 'planned',
    reason,
    isIdealTime: walkPreferenceScore(hour, prefs.preferredWalkTime) >= 3 || prefs.preferredWalkTime === 'no_preference',
  }
}

function makeWorkout(start: Date, prefs: MovementPreferences, workoutType: WorkoutType, reason: string): PlannedActivity {
  const duration = prefs.workoutDurationMinutes
  return {
    id: stableId('act', 'workout', start),
    type: 'workout',
    title: workoutTitle(workoutType),
    startTime: new Date(start),
    endTime: addMinutes(start, duration),
    durationMinutes: duration,
    estimatedSteps: 0,
    priority: 'recommended',
    status: 'planned',
    reason,
    isIdealTime: preferenceScore(localHour(start, prefs.timeZone), prefs.preferredGymTime) >= 3,
    workoutType,
  }
}

// Highest score wins, earliest start breaks ties
function bestSlot(slots: FreeSlot[], score: (hour: number) => number, zone: string): FreeSlot | null {
  let best: FreeSlot | null = null
  let bestScore = -Infinity
  for (const slot of slots) {
    const s = score(localHour(slot.start, zone))
    if (s > bestScore || (s === bestScore && best && slot.start < best.start)) {
      best = slot
      bestScore = s
    }
  }
  return best
}

function walkIdealHour(prefs: MovementPreferences, needsWorkout: boolean): number {
  switch (prefs.preferredWalkTime) {
    case 'morning':
      return needsWorkout && prefs.preferredGymTime === 'morning' ? 8 : 7
    case 'afternoon':
      return 13
    case 'evening':
      return 18
    case 'no_preference':
      return 8
  }
}

function walkSearchRange(preference: TimePreference): HourRange {
  switch (preference) {
    case 'morning':
      return { from: 6, to: 11 }
    case 'afternoon':
      return { from: 12, to: 17 }
    case 'evening':
      return { from: 17, to: 21 }
    case 'no_preference':
      return { from: 7, to: 20 }
  }
}

function workoutIdealHour(preference: TimePreference): number {
  switch (preference) {
    case 'morning':
      return 7
    case 'afternoon':
      return 13
    case 'evening':
      return 18
    case 'no_preference':
      return 7
  }
}

function workoutSearchRange(preference: TimePreference): HourRange {
  switch (preference) {
    case 'morning':
      return { from: 5, to: 11 }
    case 'afternoon':
      return { from: 12, to: 17 }
    case 'evening':
      return { from: 17, to: 21 }
    case 'no_preference':
      return { from: 6, to: 21 }
  }
}

/**
 * Try the ideal hour, then every hour of the preference range, for a block of `minutes`
 * that sits in the active window, avoids meals, busy time and anything already placed.
 */
export function findPreferredTime(args: {
  date: DateKey
  idealHour: number
  range: HourRange
  minutes: number
  window: TimeInterval
  busy: TimeInterval[]
  taken: TimeInterval[]
  preferences: MovementPreferences
}): Date | null {
  const { date, idealHour, range, minutes, window, busy, taken, preferences } = args
  const hours = [idealHour]
  for (let h = range.from; h < range.to; h++) if (h !== idealHour) hours.push(h)

  for (const hour of hours) {
    const start = atHour(date, hour, preferences.timeZone)
    const candidate = { start, end: addMinutes(start, minutes) }
    if (candidate.start < window.start || candidate.end > window.end) continue
    if (isDuringMeal(start, preferences.mealTimes, preferences.timeZone)) continue
    if (busy.some((b) => overlaps(b, candidate))) continue
    if (taken.some((t) => overlaps(t, candidate))) continue
    return start
  }
  return null
}

function asInterval(activity: PlannedActivity): TimeInterval {
  return { start: activity.startTime, end: activity.endTime }
}

/**
 * Walk + workout allocation tiered on how many one-hour slots the day has.
 * Falls back to the preferred time of day when no usable slot exists.
 */
export function allocateWalkAndWorkout(args: WalkWorkoutArgs): WalkWorkoutPlan {
  const { date, preferences: prefs, needsWorkout } = args
  const zone = prefs.timeZone
  const pace = args.stepsPerMinute ?? 100
  const workoutType = nextWorkoutType(args.lastWorkoutType)

  const valid = args.freeSlots
    .filter((s) => s.durationMinutes >= MIN_CAPACITY_SLOT_MINUTES && !s.isDuringMeal)
    .sort((a, b) => compareAsc(a.start, b.start))
  const oneHour = valid.filter((s) => s.durationMinutes >= ONE_HOUR_SLOT_MINUTES)
  const shorter = valid.filter((s) => s.durationMinutes < ONE_HOUR_SLOT_MINUTES)
  const fitsWorkout = (s: FreeSlot) => s.durationMinutes >= prefs.workoutDurationMinutes
  const listenable = args.meetings.filter(isBackgroundListenable).sort((a, b) => compareAsc(a.start, b.start))

  const tier: CapacityTier = oneHour.length === 0 ? 'none' : oneHour.length === 1 ? 'single' : 'multiple'
  let workout: PlannedActivity | null = null
  let walk: PlannedActivity | null = null
  let walkMeeting: CalendarMeeting | null = null
  const otherWalks: PlannedActivity[] = []

  const walkFromSlot = (slot: FreeSlot, reason: string) => makeWalk(slot.start, slot.durationMinutes, prefs, pace, reason)
  const meetingOrShorter = (exclude: FreeSlot | null): Pick<WalkWorkoutPlan, 'walk' | 'walkMeeting'> => {
    const meeting = listenable.length > 0 ? listenable[0] : null
    if (meeting) return { walk: null, walkMeeting: meeting }
    const slot = shorter.find((s) => s !== exclude)
    return { walk: slot ? walkFromSlot(slot, 'Fits between your meetings') : null, walkMeeting: null }
  }

  switch (tier) {
    case 'none': {
      let used: FreeSlot | null = null
      if (needsWorkout) {
        const fits = shorter.filter(fitsWorkout)
        used = bestSlot(fits, (h) => preferenceScore(h, prefs.preferredGymTime), zone)
        if (used) workout = makeWorkout(used.start, prefs, workoutType, 'Best open block for your workout')
      }
      ;({ walk, walkMeeting } = meetingOrShorter(used))
      break
    }
    case 'single': {
      const [slot] = oneHour
      if (needsWorkout && fitsWorkout(slot)) {
        workout = makeWorkout(slot.start, prefs, workoutType, 'Your only hour-long opening today')
        ;({ walk, walkMeeting } = meetingOrShorter(null))
      } else {
        walk = walkFromSlot(slot, 'Your longest opening today')
      }
      break
    }
    case 'multiple': {
      let remaining = oneHour
      if (needsWorkout) {
        const best = bestSlot(oneHour.filter(fitsWorkout), (h) => preferenceScore(h, prefs.preferredGymTime), zone)
        if (best) {
          workout = makeWorkout(best.start, prefs, workoutType, 'Matches your preferred workout time')
          remaining = oneHour.filter((s) => s !== best)
        }
      }
      const walkSlot = bestSlot(remaining, (h) => walkPreferenceScore(h, prefs.preferredWalkTime), zone)
      if (walkSlot) {
        walk = walkFromSlot(walkSlot, 'Matches your preferred walking time')
        for (const extra of remaining.filter((s) => s !== walkSlot).slice(0, 2)) {
          otherWalks.push(walkFromSlot(extra, 'Extra opening for more steps'))
        }
      }
      break
    }
  }

  if (needsWorkout && !workout) {
    const start = findPreferredTime({
      date,
      idealHour: workoutIdealHour(prefs.preferredGymTime),
      range: workoutSearchRange(prefs.preferredGymTime),
      minutes: prefs.workoutDurationMinutes,
      window: args.window,
      busy: args.busy,
      taken: [walk, ...otherWalks].flatMap((a) => (a ? [asInterval(a)] : [])),
      preferences: prefs,
    })
    if (start) workout = makeWorkout(start, prefs, workoutType, 'Scheduled at your preferred workout time')
  }

  if (!walk && !walkMeeting) {
    const start = findPreferredTime({
      date,
      idealHour: walkIdealHour(prefs, needsWorkout),
      range: walkSearchRange(prefs.preferredWalkTime),
      minutes: MAX_WALK_MINUTES,
      window: args.window,
      busy: args.busy,
      taken: workout ? [asInterval(workout)] : [],
      preferences: prefs,
    })
    if (start) walk = makeWalk(start, MAX_WALK_MINUTES, prefs, pace, 'Scheduled at your preferred walking time')
  }

  return { tier, workout, walk, walkMeeting, otherWalks }
}
