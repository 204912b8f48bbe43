import { z } from 'zod'
import { DailyMovementPlan } from '../planner/types'
import { PlanAdherence, UserActivityPatterns } from '../learning/types'
import { AutopilotState } from '../autopilot/types'
import { StreakState } from '../streak/types'

const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
const rate = z.number().min(0).max(1)
const instant = z.coerce.date()

const timeOfDayRates = z.object({
  morning: rate.optional(),
  afternoon: rate.optional(),
  evening: rate.optional(),
})

export const patternsSchema: z.ZodType<UserActivityPatterns, z.ZodTypeDef, unknown> = z.object({
  averageDailySteps: z.number().nonnegative(),
  weekdayAverage: z.number().nonnegative(),
  weekendAverage: z.number().nonnegative(),
  bestPerformingDays: z.array(z.number().int().min(1).max(7)),
  peakActivityHours: z.array(z.number().int().min(0).max(23)),
  typicalWalkDuration: z.number().positive(),
  stepsPerMinuteWalking: z.number().positive(),
  goalAchievementRate: rate,
  workoutRate: rate.default(0),
  consistentWalkTimes: z.array(z.object({ hour: z.number().int().min(0).max(23), frequency: rate })),
  lastUpdated: z.string().nullable(),
})

export const adherenceSchema: z.ZodType<PlanAdherence, z.ZodTypeDef, unknown> = z.object({
  totalPlansGenerated: z.number().int().nonnegative(),
  activitiesCompleted: z.number().int().nonnegative(),
  activitiesSkipped: z.number().int().nonnegative(),
  averageCompletionRate: rate,
  bestTimeSlots: timeOfDayRates,
  activityRates: z.object({ walk: timeOfDayRates.optional(), workout: timeOfDayRates.optional() }).default({}),
  lastUpdated: z.string().nullable(),
})

export const streakSchema: z.ZodType<StreakState, z.ZodTypeDef, unknown> = z
  .object({
    currentStreak: z.number().int().nonnegative(),
    longestStreak: z.number().int().nonnegative(),
    lastGoalDate: dateKey.nullable(),
  })
  .refine((s) => s.currentStreak <= s.longestStreak, 'current streak exceeds longest')

const trustLevel = z.enum(['fullAuto', 'confirmFirst', 'suggestOnly'])

export const autopilotWalkSchema = z.object({
  id: z.string(),
  date: dateKey,
  startTime: instant,
  durationMinutes: z.number().int().positive(),
  type: z.enum(['micro', 'short', 'standard']),
  origin: trustLevel,
  approvalState: z.enum(['pending', 'approved', 'rejected']),
  calendarEventId: z.string().optional(),
  lastError: z.string().optional(),
  createdAt: instant,
})

export const autopilotStateSchema: z.ZodType<AutopilotState, z.ZodTypeDef, unknown> = z.object({
  lastScheduledDate: dateKey.nullable(),
  walks: z.array(autopilotWalkSchema),
})

const plannedActivitySchema = z.object({
  id: z.string(),
  type: z.enum(['micro_walk', 'short_walk', 'standard_walk', 'morning_walk', 'lunch_walk', 'evening_walk', 'workout']),
  title: z.string(),
  startTime: instant,
  endTime: instant,
  durationMinutes: z.number().int().positive(),
  estimatedSteps: z.number().nonnegative(),
  priority: z.enum(['critical', 'recommended', 'optional']),
  status: z.enum(['planned', 'completed', 'skipped', 'rescheduled']),
  reason: z.string(),
  isIdealTime: z.boolean(),
  calendarEventId: z.string().optional(),
  workoutType: z.enum(['push', 'pull', 'legs']).optional(),
})

const walkableMeetingSchema = z.object({
  meetingId: z.string(),
  title: z.string(),
  start: instant,
  end: instant,
  durationMinutes: z.number(),
  attendeeCount: z.number(),
  isOneOnOne: z.boolean(),
  score: rate,
  isRecommended: z.boolean(),
  estimatedSteps: z.number(),
  reason: z.string(),
})

const freeSlotSchema = z.object({
  start: instant,
  end: instant,
  durationMinutes: z.number(),
  slotClass: z.enum(['micro', 'short', 'standard', 'extended']),
  isDuringMeal: z.boolean(),
  isPreferredTime: z.boolean(),
})

const conflictSchema = z.object({
  scheduledId: z.string(),
  scheduledTitle: z.string(),
  conflictingId: z.string(),
  conflictingTitle: z.string(),
  kind: z.enum(['overlap', 'too_close']),
  description: z.string(),
})

export const planSchema: z.ZodType<DailyMovementPlan, z.ZodTypeDef, unknown> = z.object({
  date: dateKey,
  targetSteps: z.number(),
  currentSteps: z.number(),
  stepsNeeded: z.number(),
  activities: z.array(plannedActivitySchema),
  walkableMeetings: z.array(walkableMeetingSchema),
  freeSlots: z.array(freeSlotSchema),
  totalPlannedSteps: z.number(),
  remainingGap: z.number(),
  isOnTrack: z.boolean(),
  confidence: rate,
  reasoning: z.string(),
  conflicts: z.array(conflictSchema),
  generatedAt: instant,
})
