import {
  ActivityDataProvider,
  AutopilotScheduler,
  CalendarProvider,
  Env,
  expandForDate,
  KeyValueStore,
  loadEnv,
  NotificationDispatcher,
  PatternLearner,
  StreakTracker,
  toDateKey,
} from '@stridely/core'
import { createStore, disconnectRedis } from '@/lib/redis'
import { JsonFileCalendar } from '@/lib/clients/calendar'
import { JsonFileActivity } from '@/lib/clients/activity'
import { ConsoleNotifications } from '@/lib/notifications'
import { loadUserSettings, UserSettings } from '@/lib/preferences'
import { PlanningService } from './planning'

export interface Container {
  env: Env
  userId: string
  settings: UserSettings
  store: KeyValueStore
  calendar: CalendarProvider
  activity: ActivityDataProvider
  notifications: NotificationDispatcher
  learner: PatternLearner
  streak: StreakTracker
  autopilot: AutopilotScheduler
  planning: PlanningService
  close(): Promise<void>
}

export interface ContainerOverrides {
  store?: KeyValueStore
  calendar?: CalendarProvider
  activity?: ActivityDataProvider
  notifications?: NotificationDispatcher
  now?: () => Date
}

/**
 * Wire every service once at start-up. Collaborators can be swapped for tests or other backends.
 * The streak is validated here so a missed day is reflected before anything reads it.
 */
export async function createContainer(source: NodeJS.ProcessEnv = process.env, overrides: ContainerOverrides = {}): Promise<Container> {
  const env = loadEnv(source)
  const settings = await loadUserSettings(env)
  const zone = settings.preferences.timeZone
  const userId = env.STRIDELY_USER_ID
  const now = overrides.now

  const store = overrides.store ?? (await createStore(env.REDIS_URL))
  const calendar = overrides.calendar ?? new JsonFileCalendar(env.STRIDELY_CALENDAR_FILE, zone)
  const activity = overrides.activity ?? new JsonFileActivity(env.STRIDELY_ACTIVITY_FILE)
  const notifications = overrides.notifications ?? new ConsoleNotifications(zone)

  const learner = new PatternLearner(store, userId)
  const streak = new StreakTracker(store, userId)
  const autopilot = new AutopilotScheduler({
    store,
    userId,
    calendar,
    notifications,
    settings: settings.autopilot,
    preferences: settings.preferences,
    committedFor: async (date) => expandForDate(settings.routines, date, zone),
    now,
  })
  const planning = new PlanningService({
    store,
    userId,
    calendar,
    activity,
    learner,
    streak,
    autopilot,
    preferences: settings.preferences,
    routines: settings.routines,
    now,
  })

  await streak.validate(toDateKey(now ? now() : new Date(), zone))

  return {
    env,
    userId,
    settings,
    store,
    calendar,
    activity,
    notifications,
    learner,
    streak,
    autopilot,
    planning,
    close: disconnectRedis,
  }
}
