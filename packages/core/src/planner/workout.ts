import { WorkoutType } from './types'

const ROTATION: Record<WorkoutType, WorkoutType> = { push: 'pull', pull: 'legs', legs: 'push' }

export function nextWorkoutType(last?: WorkoutType): WorkoutType {
  return last ? ROTATION[last] : 'push'
}

export function workoutTitle(type: WorkoutType): string {
  switch (type) {
    case 'push':
      return 'Push workout'
    case 'pull':
      return 'Pull workout'
    case 'legs':
      return 'Leg workout'
  }
}

export function shouldSuggestWorkout(gymDaysThisWeek: number, gymFrequency: number): boolean {
  return gymFrequency > 0 && gymDaysThisWeek < gymFrequency
}

// Health apps label strength sessions loosely ("Push day", "Legs", "pull-ups")
export function parseWorkoutType(kind?: string): WorkoutType | undefined {
  const label = kind?.toLowerCase() ?? ''
  if (label.includes('push')) return 'push'
  if (label.includes('pull')) return 'pull'
  if (label.includes('leg')) return 'legs'
  return undefined
}
