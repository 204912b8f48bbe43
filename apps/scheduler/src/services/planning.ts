import {
  activeWindow,
  ActivityDataProvider,
  addMinutes,
  allocateWalkAndWorkout,
  AutopilotScheduler,
  buildBusyIntervals,
  buildDailyPlan,
  CalendarProvider,
  CommittedActivity,
  compareAsc,
  DailyMovementPlan,
  DateKey,
  expandForDate,
  findFreeSlots,
  GenerationResult,
  isoWeekday,
  KeyValueStore,
  MovementPreferences,
  NotFoundError,
  paceOf,
  parseWorkoutType,
  PatternLearner,
  PlanCoordinator,
  planSchema,
  readJson,
  safeFetchEvents,
  safeFetchSteps,
  safeFetchWorkouts,
  ScheduledActivity,
  shiftDateKey,
  shouldSuggestWorkout,
  storeKey,
  StreakState,
  StreakTracker,
  StridelyError,
  timeOfDayFor,
  toDateKey,
  WalkWorkoutPlan,
  WorkoutType,
  writeJson,
} from '@stridely/core'

export interface PlanningDeps {
  store: KeyValueStore
  userId: string
  calendar: CalendarProvider
  activity: ActivityDataProvider
  learner: PatternLearner
  streak: StreakTracker
  autopilot?: AutopilotScheduler
  preferences: MovementPreferences
  routines: ScheduledActivity[]
  coordinator?: PlanCoordinator<DailyMovementPlan>
  now?: () => Date
}

export type ActivityOutcome = 'completed' | 'skipped'

/**
 * Daily planning for one user: builds and persists plans through the coordinator,
 * and feeds completed or skipped activities back into the learner.
 */
export class PlanningService {
  readonly coordinator: PlanCoordinator<DailyMovementPlan>

  constructor(private readonly deps: PlanningDeps) {
    this.coordinator = deps.coordinator ?? new PlanCoordinator<DailyMovementPlan>()
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date()
  }

  private get zone(): string {
    return this.deps.preferences.timeZone
  }

  today(): DateKey {
    return toDateKey(this.now(), this.zone)
  }

  private planKey(date: DateKey): string {
    return storeKey(this.deps.userId, `plan:${date}`)
  }

  getPlan(date: DateKey): Promise<DailyMovementPlan | null> {
    return readJson(this.deps.store, this.planKey(date), planSchema.nullable(), null)
  }

  // Routines plus autopilot walks the user has accepted
  private async committedFor(date: DateKey): Promise<CommittedActivity[]> {
    const committed = expandForDate(this.deps.routines, date, this.zone)
    if (!this.deps.autopilot) return committed
    const walks = await this.deps.autopilot.walksFor(date)
    for (const walk of walks) {
      if (walk.approvalState !== 'approved') continue
      committed.push({ id: walk.id, title: 'Autopilot walk', start: walk.startTime, end: addMinutes(walk.startTime, walk.durationMinutes) })
    }
    return committed
  }

  /**
   * Regenerate the plan for a date. Concurrent calls for the same date are allowed;
   * only the most recently started one is stored.
   */
  generatePlan(date: DateKey = this.today()): Promise<GenerationResult<DailyMovementPlan>> {
    const now = this.now()
    return this.coordinator.generate(
      date,
      async () => {
        const [meetings, committed, patterns, adherence] = await Promise.all([
          safeFetchEvents(this.deps.calendar, date),
          this.committedFor(date),
          this.deps.learner.getPatterns(),
          this.deps.learner.getAdherence(),
        ])
        const currentSteps = date === toDateKey(now, this.zone) ? await safeFetchSteps(this.deps.activity, date) : 0
        // Routines are already expanded into committed time
        return buildDailyPlan({ date, now, currentSteps, meetings, committed, patterns, adherence, preferences: this.deps.preferences })
      },
      async (plan) => {
        await writeJson(this.deps.store, this.planKey(date), plan)
        await this.deps.learner.recordPlanGenerated(now)
        console.log(`Plan for ${date}: ${plan.activities.length} activities, ${plan.totalPlannedSteps} steps planned`)
      },
    )
  }

  /**
   * Mark a planned activity completed or skipped and feed the outcome to the learner.
   * Runs on the plan's date queue so a regeneration cannot be overwritten by a stale copy.
   * Repeating the same outcome is a no-op; an outcome, once recorded, is final.
   */
  markActivity(date: DateKey, activityId: string, outcome: ActivityOutcome): Promise<DailyMovementPlan> {
    return this.coordinator.update(date, async () => {
      const plan = await this.getPlan(date)
      if (!plan) throw new NotFoundError(`No plan stored for ${date}`)
      const activity = plan.activities.find((a) => a.id === activityId)
      if (!activity) throw new NotFoundError(`Unknown activity ${activityId} on ${date}`)
      if (activity.status === outcome) return plan
      if (activity.status === 'completed' || activity.status === 'skipped') {
        throw new StridelyError('OUTCOME_RECORDED', `Activity ${activityId} on ${date} is already ${activity.status}`)
      }

      const updated: DailyMovementPlan = {
        ...plan,
        activities: plan.activities.map((a) => (a.id === activityId ? { ...a, status: outcome } : a)),
      }
      await writeJson(this.deps.store, this.planKey(date), updated)
      await this.deps.learner.recordOutcome(activity.type, timeOfDayFor(activity.startTime, this.zone), outcome === 'completed', this.now())
      return updated
    })
  }

  // Close out a day's step total against the goal
  recordDailySteps(date: DateKey, steps: number): Promise<StreakState> {
    return this.deps.streak.recordDailyTotal(date, steps, this.deps.preferences.dailyStepGoal)
  }

  /**
   * Walk + workout split for a date. Workouts are suggested until the weekly gym target is met;
   * the split continues from the last workout found in the past week.
   */
  async planWalkAndWorkout(date: DateKey): Promise<WalkWorkoutPlan> {
    const prefs = this.deps.preferences
    const now = this.now()
    const [meetings, committed, patterns, recent] = await Promise.all([
      safeFetchEvents(this.deps.calendar, date),
      this.committedFor(date),
      this.deps.learner.getPatterns(),
      this.workoutsThisWeek(date),
    ])

    const busy = buildBusyIntervals(meetings, committed)
    const window = activeWindow(date, prefs, toDateKey(now, this.zone) === date ? now : undefined)
    const freeSlots = findFreeSlots(busy, window, { minDurationMinutes: prefs.minSlotMinutes, preferences: prefs })

    return allocateWalkAndWorkout({
      date,
      freeSlots,
      meetings,
      busy,
      window,
      preferences: prefs,
      needsWorkout: shouldSuggestWorkout(recent.count, prefs.gymFrequency),
      lastWorkoutType: recent.lastType,
      stepsPerMinute: paceOf(patterns),
    })
  }

  // Gym days so far this ISO week, and the split of the most recent workout in the past 7 days
  private async workoutsThisWeek(date: DateKey): Promise<{ count: number; lastType?: WorkoutType }> {
    const daysIntoWeek = isoWeekday(date) - 1
    const days = Array.from({ length: 7 }, (_, i) => shiftDateKey(date, -(i + 1)))
    const results = await Promise.all(days.map((d) => safeFetchWorkouts(this.deps.activity, d)))
    const count = results.slice(0, daysIntoWeek).filter((w) => w.length > 0).length

    let lastType: WorkoutType | undefined
    for (const workouts of results) {
      const latestFirst = [...workouts].sort((a, b) => compareAsc(b.start, a.start))
      lastType = latestFirst.map((w) => parseWorkoutType(w.kind)).find((t) => t !== undefined)
      if (lastType) break
    }
    return { count, lastType }
  }
}
