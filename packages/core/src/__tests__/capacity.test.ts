import { allocateWalkAndWorkout, WalkWorkoutArgs } from '../planner/capacity'
import { activeWindow } from '../planner/time'
import { nextWorkoutType, parseWorkoutType, shouldSuggestWorkout } from '../planner/workout'
import { at, busy, DAY, meeting, prefs, slot } from './fixtures'

function args(overrides: Partial<WalkWorkoutArgs>): WalkWorkoutArgs {
  return {
    date: DAY,
    freeSlots: [],
    meetings: [],
    busy: [],
    window: activeWindow(DAY, prefs),
    preferences: prefs,
    needsWorkout: false,
    ...overrides,
  }
}

describe('allocateWalkAndWorkout', () => {
  it('splits several hour-long openings between a workout and walks', () => {
    const plan = allocateWalkAndWorkout(
      args({ needsWorkout: true, freeSlots: [slot('09:00', '10:00'), slot('14:00', '15:30'), slot('17:30', '18:30')] }),
    )
    expect(plan.tier).toBe('multiple')
    expect(plan.workout).toMatchObject({ startTime: at('17:30'), title: 'Push workout', workoutType: 'push', estimatedSteps: 0 })
    expect(plan.walk).toMatchObject({ startTime: at('09:00'), title: 'Morning walk', durationMinutes: 45, estimatedSteps: 4500 })
    expect(plan.otherWalks.map((w) => [w.startTime, w.title])).toEqual([[at('14:00'), 'Afternoon walk']])
    expect(plan.walkMeeting).toBeNull()
  })

  it('walks during a listen-only meeting when there is no hour-long opening', () => {
    const listenIn = meeting('13:00', '14:00', { id: 'allhands-listen', title: 'Quarterly planning', attendeeCount: 8 })
    const plan = allocateWalkAndWorkout(
      args({ needsWorkout: true, freeSlots: [slot('10:00', '10:50'), slot('15:00', '15:45')], meetings: [listenIn] }),
    )
    expect(plan.tier).toBe('none')
    expect(plan.workout?.startTime).toEqual(at('10:00'))
    expect(plan.walk).toBeNull()
    expect(plan.walkMeeting?.id).toBe('allhands-listen')
  })

  it('takes the other shorter opening when no meeting can be walked', () => {
    const plan = allocateWalkAndWorkout(args({ needsWorkout: true, freeSlots: [slot('10:00', '10:50'), slot('15:00', '15:45')] }))
    expect(plan.workout?.startTime).toEqual(at('10:00'))
    expect(plan.walk).toMatchObject({ startTime: at('15:00'), title: 'Afternoon walk', durationMinutes: 45 })
  })

  it('gives the only long opening to the walk on a rest day', () => {
    const plan = allocateWalkAndWorkout(args({ freeSlots: [slot('13:00', '14:30')] }))
    expect(plan.tier).toBe('single')
    expect(plan.workout).toBeNull()
    expect(plan.walk).toMatchObject({ startTime: at('13:00'), title: 'Midday walk', type: 'lunch_walk' })
  })

  it('falls back to preferred hours when no slot qualifies', () => {
    const morning = { ...prefs, preferredGymTime: 'morning' as const, preferredWalkTime: 'morning' as const }
    const plan = allocateWalkAndWorkout(args({ needsWorkout: true, preferences: morning }))
    expect(plan.tier).toBe('none')
    // 07:00 is before the window and 08:00 is breakfast
    expect(plan.workout?.startTime).toEqual(at('09:00'))
    expect(plan.walk?.startTime).toEqual(at('10:00'))
  })

  it('keeps a long workout out of an hour-long opening it would overrun', () => {
    const long = { ...prefs, workoutDurationMinutes: 90 }
    const plan = allocateWalkAndWorkout(
      args({
        needsWorkout: true,
        preferences: long,
        freeSlots: [slot('10:00', '11:00')],
        busy: [busy('08:00', '10:00'), busy('11:00', '21:00')],
      }),
    )
    expect(plan.tier).toBe('single')
    expect(plan.workout).toBeNull()
    expect(plan.walk).toMatchObject({ startTime: at('10:00'), durationMinutes: 45 })
  })

  it('picks the opening that holds the whole workout', () => {
    const long = { ...prefs, workoutDurationMinutes: 90 }
    const plan = allocateWalkAndWorkout(
      args({ needsWorkout: true, preferences: long, freeSlots: [slot('09:00', '10:00'), slot('14:00', '15:30'), slot('17:30', '18:30')] }),
    )
    expect(plan.tier).toBe('multiple')
    expect(plan.workout).toMatchObject({ startTime: at('14:00'), endTime: at('15:30') })
  })

  it('rotates the workout split from the last session', () => {
    const plan = allocateWalkAndWorkout(args({ needsWorkout: true, lastWorkoutType: 'pull', freeSlots: [slot('17:00', '18:30')] }))
    expect(plan.workout?.title).toBe('Leg workout')
  })
})

describe('workout rotation', () => {
  it('cycles push, pull, legs', () => {
    expect(nextWorkoutType()).toBe('push')
    expect(nextWorkoutType('push')).toBe('pull')
    expect(nextWorkoutType('pull')).toBe('legs')
    expect(nextWorkoutType('legs')).toBe('push')
  })

  it('reads the split from a health app workout label', () => {
    expect(parseWorkoutType('Push day')).toBe('push')
    expect(parseWorkoutType('Pull-ups')).toBe('pull')
    expect(parseWorkoutType('LEGS')).toBe('legs')
    expect(parseWorkoutType('Running')).toBeUndefined()
    expect(parseWorkoutType()).toBeUndefined()
  })

  it('suggests a workout until the weekly target is met', () => {
    expect(shouldSuggestWorkout(1, 3)).toBe(true)
    expect(shouldSuggestWorkout(3, 3)).toBe(false)
    expect(shouldSuggestWorkout(0, 0)).toBe(false)
  })
})
