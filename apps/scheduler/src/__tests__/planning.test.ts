import {
  ActivityDataProvider,
  CalendarMeeting,
  CalendarProvider,
  DEFAULT_PREFERENCES,
  MemoryStore,
  MovementPreferences,
  NotFoundError,
  PatternLearner,
  StreakTracker,
  Workout,
} from '@stridely/core'
import { PlanningService } from '@/services/planning'

const DAY = '2025-03-11'
const at = (hhmm: string, day = DAY) => new Date(`${day}T${hhmm}:00.000Z`)

const offsite: CalendarMeeting = {
  id: 'offsite',
  title: 'Offsite',
  start: at('09:00'),
  end: at('17:00'),
  attendeeCount: 10,
  isOrganizer: false,
  isAllDay: false,
  isOutOfOffice: false,
}

class StaticCalendar implements CalendarProvider {
  async fetchEvents(date: string): Promise<CalendarMeeting[]> {
    return date === DAY ? [offsite] : []
  }

  async createEvent(): Promise<string> {
    return 'evt'
  }

  async deleteEvent(): Promise<void> {}
}

class StaticActivity implements ActivityDataProvider {
  constructor(private readonly workouts: Record<string, Workout[]> = {}) {}

  async fetchSteps(date: string): Promise<number> {
    return date === DAY ? 4000 : 0
  }

  async fetchWorkouts(date: string): Promise<Workout[]> {
    return this.workouts[date] ?? []
  }
}

// Holds the next read of the day's plan until the test lets it through
class GatedStore extends MemoryStore {
  gate: Promise<void> | null = null

  async get(key: string): Promise<string | null> {
    const gate = this.gate
    if (gate && key.endsWith(`plan:${DAY}`)) {
      this.gate = null
      await gate
    }
    return super.get(key)
  }
}

const prefs: MovementPreferences = { ...DEFAULT_PREFERENCES, timeZone: 'UTC' }
const flush = () => new Promise((resolve) => setImmediate(resolve))

function setup(options: { preferences?: MovementPreferences; activity?: ActivityDataProvider } = {}) {
  const store = new GatedStore()
  const clock = { now: at('07:30') }
  const learner = new PatternLearner(store, 'u1')
  const planning = new PlanningService({
    store,
    userId: 'u1',
    calendar: new StaticCalendar(),
    activity: options.activity ?? new StaticActivity(),
    learner,
    streak: new StreakTracker(store, 'u1'),
    preferences: options.preferences ?? prefs,
    routines: [],
    now: () => clock.now,
  })
  return { store, clock, learner, planning }
}

describe('PlanningService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('builds, stores and counts a plan for today', async () => {
    const { planning, learner } = setup()
    const result = await planning.generatePlan()

    expect(result.committed).toBe(true)
    expect(result.value.currentSteps).toBe(4000)
    expect(result.value.activities.map((a) => [a.type, a.startTime, a.durationMinutes])).toEqual([['evening_walk', at('17:00'), 45]])
    expect(await planning.getPlan(DAY)).toEqual(result.value)
    expect((await learner.getAdherence()).totalPlansGenerated).toBe(1)
  })

  it('stores only the latest of two overlapping generations', async () => {
    const { planning, learner } = setup()
    const [first, second] = await Promise.all([planning.generatePlan(DAY), planning.generatePlan(DAY)])
    expect(first.committed).toBe(false)
    expect(second.committed).toBe(true)
    expect((await learner.getAdherence()).totalPlansGenerated).toBe(1)
  })

  it('feeds completed activities back into adherence once', async () => {
    const { planning, learner } = setup()
    const { value } = await planning.generatePlan(DAY)
    const [walk] = value.activities

    const updated = await planning.markActivity(DAY, walk.id, 'completed')
    expect(updated.activities[0].status).toBe('completed')
    await planning.markActivity(DAY, walk.id, 'completed')

    const adherence = await learner.getAdherence()
    expect(adherence.activitiesCompleted).toBe(1)
    expect(adherence.bestTimeSlots.evening).toBeCloseTo(0.6)
  })

  it('treats a recorded outcome as final', async () => {
    const { planning, learner } = setup()
    const { value } = await planning.generatePlan(DAY)
    const [walk] = value.activities

    await planning.markActivity(DAY, walk.id, 'completed')
    await expect(planning.markActivity(DAY, walk.id, 'skipped')).rejects.toThrow(`Activity ${walk.id} on ${DAY} is already completed`)

    const adherence = await learner.getAdherence()
    expect([adherence.activitiesCompleted, adherence.activitiesSkipped]).toEqual([1, 0])
    expect((await planning.getPlan(DAY))?.activities[0].status).toBe('completed')
  })

  it('never lets an activity update overwrite a newer plan', async () => {
    const { planning, store, clock } = setup()
    const { value } = await planning.generatePlan(DAY)
    let release: () => void = () => undefined
    store.gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const marking = planning.markActivity(DAY, value.activities[0].id, 'completed')
    clock.now = at('17:30')
    const regenerated = planning.generatePlan(DAY)
    await flush()
    release()

    expect((await marking).activities[0].status).toBe('completed')
    expect((await regenerated).committed).toBe(true)
    expect((await planning.getPlan(DAY))?.generatedAt).toEqual(at('17:30'))
  })

  it('reports unknown plans and activities', async () => {
    const { planning } = setup()
    await expect(planning.markActivity('2025-03-12', 'x', 'skipped')).rejects.toThrow(NotFoundError)
    await planning.generatePlan(DAY)
    await expect(planning.markActivity(DAY, 'x', 'skipped')).rejects.toThrow('Unknown activity x on 2025-03-11')
  })

  it('records the daily total against the step goal', async () => {
    const { planning } = setup()
    expect((await planning.recordDailySteps('2025-03-10', 10500)).currentStreak).toBe(1)
    expect((await planning.recordDailySteps(DAY, 9000)).currentStreak).toBe(1)
  })

  it('puts the walk in the one long opening on a rest day', async () => {
    const { planning } = setup()
    const split = await planning.planWalkAndWorkout(DAY)
    expect(split.tier).toBe('single')
    expect(split.workout).toBeNull()
    expect(split.walk).toMatchObject({ startTime: at('17:00'), title: 'Evening walk' })
  })

  it('continues the workout split from the latest logged session', async () => {
    const activity = new StaticActivity({
      '2025-03-07': [{ start: at('18:00', '2025-03-07'), end: at('19:00', '2025-03-07'), kind: 'Legs' }],
      '2025-03-10': [
        { start: at('07:00', '2025-03-10'), end: at('07:30', '2025-03-10'), kind: 'Running' },
        { start: at('18:00', '2025-03-10'), end: at('19:00', '2025-03-10'), kind: 'Push day' },
      ],
    })
    const { planning } = setup({ activity, preferences: { ...prefs, gymFrequency: 3 } })
    const split = await planning.planWalkAndWorkout(DAY)
    expect(split.workout).toMatchObject({ title: 'Pull workout', workoutType: 'pull' })
  })

  it('stops suggesting workouts once the weekly target is met', async () => {
    const activity = new StaticActivity({ '2025-03-10': [{ start: at('18:00', '2025-03-10'), end: at('19:00', '2025-03-10'), kind: 'Push day' }] })
    const { planning } = setup({ activity, preferences: { ...prefs, gymFrequency: 1 } })
    expect((await planning.planWalkAndWorkout(DAY)).workout).toBeNull()
  })
})
