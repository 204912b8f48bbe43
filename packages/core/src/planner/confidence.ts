import { PlannedActivity, WalkableMeeting } from './types'
import { UserActivityPatterns } from '../learning/types'

export const MAX_CONFIDENCE = 0.95
export const ON_TRACK_GAP_STEPS = 500

export function coverageOf(stepsNeeded: number, plannedSteps: number): number {
  return stepsNeeded > 0 ? Math.min(1, plannedSteps / stepsNeeded) : 1
}

// Never report certainty
export function planConfidence(coverage: number, patterns: UserActivityPatterns): number {
  return Math.min(MAX_CONFIDENCE, 0.6 * coverage + 0.4 * patterns.goalAchievementRate)
}

export function planReasoning(args: {
  stepsNeeded: number
  plannedSteps: number
  activities: PlannedActivity[]
  walkableMeetings: WalkableMeeting[]
}): string {
  const { stepsNeeded, plannedSteps, activities, walkableMeetings } = args
  if (stepsNeeded <= 0) return "You've already hit your step goal! Great job!"

  const coverage = coverageOf(stepsNeeded, plannedSteps)
  let text: string
  if (coverage >= 0.9) {
    text = `This plan covers your step goal. ${activities.length} walks scheduled across the day.`
  } else if (coverage >= 0.7) {
    text = `Plan covers ${Math.round(coverage * 100)}% of steps needed. Consider walking meetings to close the gap.`
  } else {
    const gap = Math.max(0, stepsNeeded - plannedSteps)
    text = `Limited availability today. You'll need ~${gap} extra steps from walking meetings or longer walks.`
  }

  if (walkableMeetings.some((m) => m.isRecommended)) text += ' Walking meeting opportunities identified.'
  return text
}
