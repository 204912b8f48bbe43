import { DateKey, MovementPreferences } from '../planner/types'
import { activeWindow, addMinutes, compareAsc, daysBetweenKeys, shiftDateKey, toDateKey } from '../planner/time'
import { buildBusyIntervals, CommittedActivity } from '../planner/busy'
import { findFreeSlots } from '../planner/slots'
import { stableId } from '../planner/ids'
import { KeyValueStore, readJson, storeKey, writeJson } from '../store/store'
import { autopilotStateSchema } from '../store/schemas'
import { SerialQueue } from '../coordination/serial'
import { CalendarProvider, dispatchQuietly, NotificationDispatcher, safeFetchEvents } from '../providers'
import { AutopilotStateError, CalendarWriteError, describeError } from '../errors'
import { AutopilotSettings, AutopilotState, AutopilotWalk, ScheduleResult } from './types'
import { autopilotWalkType, selectAutopilotSlots, walkDisplayName } from './slots'
import { assertResolvable, decideAutopilotAction } from './policy'

export const WALK_RETENTION_DAYS = 7
export const ALARM_OFFSET_MINUTES = 5

const EMPTY_STATE: AutopilotState = { lastScheduledDate: null, walks: [] }

export interface AutopilotDeps {
  store: KeyValueStore
  userId: string
  calendar: CalendarProvider
  notifications: NotificationDispatcher
  settings: AutopilotSettings
  preferences: MovementPreferences
  committedFor?: (date: DateKey) => Promise<CommittedActivity[]>
  now?: () => Date
}

export interface ApprovalResult {
  walk: AutopilotWalk
  error?: CalendarWriteError
}

function isActive(walk: AutopilotWalk): boolean {
  return walk.approvalState !== 'rejected'
}

// Rejected walks linger until GC, so a slot can be reused; the sequence keeps ids unique
function nextWalkId(walks: AutopilotWalk[], date: DateKey, start: Date): string {
  const taken = new Set(walks.map((w) => w.id))
  let sequence = 0
  let id = stableId('walk', date, start, sequence)
  while (taken.has(id)) id = stableId('walk', date, start, ++sequence)
  return id
}

/**
 * Schedules the next day's walks ahead of time and owns their approval state.
 * State changes are serialized; scheduling is single-flight per target date.
 */
export class AutopilotScheduler {
  private queue = new SerialQueue()
  private inFlight = new Map<DateKey, Promise<ScheduleResult>>()
  private settings: AutopilotSettings

  constructor(private readonly deps: AutopilotDeps) {
    this.settings = deps.settings
  }

  get currentSettings(): AutopilotSettings {
    return this.settings
  }

  updateSettings(settings: AutopilotSettings) {
    this.settings = settings
  }

  private get key(): string {
    return storeKey(this.deps.userId, 'autopilot')
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date()
  }

  getState(): Promise<AutopilotState> {
    return readJson(this.deps.store, this.key, autopilotStateSchema, EMPTY_STATE)
  }

  async walksFor(date: DateKey): Promise<AutopilotWalk[]> {
    const state = await this.getState()
    return state.walks.filter((w) => w.date === date).sort((a, b) => compareAsc(a.startTime, b.startTime))
  }

  async pendingWalks(): Promise<AutopilotWalk[]> {
    const state = await this.getState()
    return state.walks.filter((w) => w.approvalState === 'pending' && w.origin === 'confirmFirst')
  }

  // Nightly entry point: schedule tomorrow in the user's zone
  runNightly(options: { force?: boolean } = {}): Promise<ScheduleResult> {
    const today = toDateKey(this.now(), this.deps.preferences.timeZone)
    return this.scheduleForDate(shiftDateKey(today, 1), options)
  }

  scheduleForDate(date: DateKey, options: { force?: boolean } = {}): Promise<ScheduleResult> {
    const running = this.inFlight.get(date)
    if (running) return running

    const run = this.queue.run(() => this.schedule(date, options.force ?? false)).finally(() => {
      this.inFlight.delete(date)
    })
    this.inFlight.set(date, run)
    return run
  }

  private async schedule(date: DateKey, force: boolean): Promise<ScheduleResult> {
    const settings = this.settings
    if (!settings.isEnabled) return { status: 'skipped', date, walks: [], errors: [], reason: 'autopilot disabled' }

    const state = await this.getState()
    if (state.lastScheduledDate === date && !force) {
      return { status: 'skipped', date, walks: state.walks.filter((w) => w.date === date), errors: [], reason: 'already scheduled' }
    }

    let walks = state.walks
    if (force) walks = await this.clearDate(walks, date)

    const prefs = this.deps.preferences
    const now = this.now()
    const meetings = await safeFetchEvents(this.deps.calendar, date)
    const committed = this.deps.committedFor ? await this.deps.committedFor(date) : []
    const existing = walks.filter((w) => w.date === date && isActive(w))
    const busy = buildBusyIntervals(meetings, [
      ...committed,
      ...existing.map((w) => ({ id: w.id, title: 'Autopilot walk', start: w.startTime, end: addMinutes(w.startTime, w.durationMinutes) })),
    ])
    const window = activeWindow(date, prefs, toDateKey(now, prefs.timeZone) === date ? now : undefined)
    const freeSlots = findFreeSlots(busy, window, { minDurationMinutes: 5, preferences: prefs })
    const selections = selectAutopilotSlots(freeSlots, settings, prefs.timeZone, settings.targetWalksPerDay - existing.length)

    const action = decideAutopilotAction(settings.trustLevel)
    const created: AutopilotWalk[] = []
    const errors: CalendarWriteError[] = []

    for (const selection of selections) {
      const duplicate = walks.some((w) => isActive(w) && w.date === date && w.startTime.getTime() === selection.startTime.getTime())
      if (duplicate) continue

      const durationMinutes = selection.durationMinutes
      let walk: AutopilotWalk = {
        id: nextWalkId([...walks, ...created], date, selection.startTime),
        date,
        startTime: selection.startTime,
        durationMinutes,
        type: autopilotWalkType(durationMinutes),
        origin: settings.trustLevel,
        approvalState: 'pending',
        createdAt: now,
      }

      switch (action) {
        case 'commit': {
          const outcome = await this.commit(walk)
          walk = outcome.walk
          if (outcome.error) errors.push(outcome.error)
          break
        }
        case 'requestApproval': {
          const pending = walk
          dispatchQuietly('approval', () => this.deps.notifications.scheduleApprovalPrompt(pending))
          break
        }
        case 'suggest':
          break
      }
      created.push(walk)
    }

    if (action === 'commit' && created.length > 0) {
      dispatchQuietly('summary', () => this.deps.notifications.scheduleSummary(date, created))
    }

    const today = toDateKey(now, prefs.timeZone)
    const next: AutopilotState = {
      lastScheduledDate: date,
      walks: this.collectGarbage([...walks, ...created], today),
    }
    await writeJson(this.deps.store, this.key, next)

    console.log(`Autopilot scheduled ${created.length} walk(s) for ${date} (${settings.trustLevel}), ${errors.length} calendar error(s)`)
    return { status: 'scheduled', date, walks: next.walks.filter((w) => w.date === date), errors }
  }

  // Remove a date's walks and any calendar events they created
  private async clearDate(walks: AutopilotWalk[], date: DateKey): Promise<AutopilotWalk[]> {
    for (const walk of walks) {
      if (walk.date !== date || !walk.calendarEventId) continue
      try {
        await this.deps.calendar.deleteEvent(walk.calendarEventId)
      } catch (error) {
        console.warn(`Failed to delete calendar event ${walk.calendarEventId}:`, error)
      }
    }
    return walks.filter((w) => w.date !== date)
  }

  private collectGarbage(walks: AutopilotWalk[], today: DateKey): AutopilotWalk[] {
    return walks.filter((w) => daysBetweenKeys(w.date, today) <= WALK_RETENTION_DAYS)
  }

  private async commit(walk: AutopilotWalk): Promise<ApprovalResult> {
    const title = this.settings.calendarTitle
    const name = walkDisplayName(walk.type)
    try {
      const calendarEventId = await this.deps.calendar.createEvent({
        title,
        start: walk.startTime,
        end: addMinutes(walk.startTime, walk.durationMinutes),
        notes: `${name}: ${walk.durationMinutes} min walk scheduled by autopilot`,
        alarmOffsetMinutes: ALARM_OFFSET_MINUTES,
      })
      return { walk: { ...walk, approvalState: 'approved', calendarEventId, lastError: undefined } }
    } catch (cause) {
      const error = new CalendarWriteError(walk.id, cause)
      console.warn(error.message)
      return { walk: { ...walk, approvalState: 'pending', lastError: describeError(cause) }, error }
    }
  }

  private mutate<T>(change: (state: AutopilotState) => Promise<{ state: AutopilotState; result: T }>): Promise<T> {
    return this.queue.run(async () => {
      const { state, result } = await change(await this.getState())
      await writeJson(this.deps.store, this.key, state)
      return result
    })
  }

  private static find(state: AutopilotState, id: string): AutopilotWalk {
    const walk = state.walks.find((w) => w.id === id)
    if (!walk) throw new AutopilotStateError(`Unknown autopilot walk ${id}`)
    return walk
  }

  private static replace(state: AutopilotState, walk: AutopilotWalk, id = walk.id): AutopilotState {
    return { ...state, walks: state.walks.map((w) => (w.id === id ? walk : w)) }
  }

  /**
   * Approve a pending walk and put it on the calendar.
   * If the calendar write fails the walk stays pending and the error is returned.
   */
  approve(id: string): Promise<ApprovalResult> {
    return this.mutate(async (state) => {
      const walk = AutopilotScheduler.find(state, id)
      assertResolvable(walk, 'approve')
      const outcome = await this.commit(walk)
      return { state: AutopilotScheduler.replace(state, outcome.walk), result: outcome }
    })
  }

  reject(id: string): Promise<AutopilotWalk> {
    return this.mutate(async (state) => {
      const walk = AutopilotScheduler.find(state, id)
      assertResolvable(walk, 'reject')
      const rejected: AutopilotWalk = { ...walk, approvalState: 'rejected' }
      return { state: AutopilotScheduler.replace(state, rejected), result: rejected }
    })
  }

  // Move a pending walk, then approve it at the new time
  adjustTime(id: string, newStart: Date): Promise<ApprovalResult> {
    return this.mutate(async (state) => {
      const walk = AutopilotScheduler.find(state, id)
      assertResolvable(walk, 'adjust')
      const date = toDateKey(newStart, this.deps.preferences.timeZone)
      const clash = state.walks.some(
        (w) => w.id !== id && isActive(w) && w.date === date && w.startTime.getTime() === newStart.getTime(),
      )
      if (clash) throw new AutopilotStateError(`Another walk already starts at ${newStart.toISOString()}`)

      const moved: AutopilotWalk = { ...walk, id: nextWalkId(state.walks, date, newStart), date, startTime: new Date(newStart) }
      const outcome = await this.commit(moved)
      return { state: AutopilotScheduler.replace(state, outcome.walk, id), result: outcome }
    })
  }

  // Retry calendar writes for full-auto walks that failed to commit
  retryFailedCommits(): Promise<{ committed: AutopilotWalk[]; errors: CalendarWriteError[] }> {
    return this.mutate(async (state) => {
      const committed: AutopilotWalk[] = []
      const errors: CalendarWriteError[] = []
      let next = state
      for (const walk of state.walks) {
        if (walk.origin !== 'fullAuto' || walk.approvalState !== 'pending') continue
        const outcome = await this.commit(walk)
        next = AutopilotScheduler.replace(next, outcome.walk)
        if (outcome.error) errors.push(outcome.error)
        else committed.push(outcome.walk)
      }
      return { state: next, result: { committed, errors } }
    })
  }
}
