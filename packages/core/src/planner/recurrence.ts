import { Options, RRule } from 'rrule'
import { DateTime } from 'luxon'
import { DateKey, ScheduledActivity } from './types'
import { addMinutes, atClock } from './time'
import { CommittedActivity } from './busy'

// rrule works on floating dates: each local calendar day is represented as UTC midnight
function floating(dateKey: DateKey): DateTime {
  return DateTime.fromISO(dateKey, { zone: 'UTC' }).startOf('day')
}

export function buildRule(activity: ScheduledActivity): RRule {
  const dtstart = floating(activity.startDate).toJSDate()
  const until = activity.endDate ? floating(activity.endDate).endOf('day').toJSDate() : null
  const base: Partial<Options> = { dtstart, until }

  switch (activity.recurrence) {
    case 'once':
      return new RRule({ ...base, freq: RRule.DAILY, count: 1 })
    case 'weekly':
      return new RRule({ ...base, freq: RRule.WEEKLY, interval: 1 })
    case 'weekdays':
      return new RRule({ ...base, freq: RRule.WEEKLY, byweekday: [RRule.MO, RRule.TU, RRule.WE, RRule.TH, RRule.FR] })
    case 'biweekly':
      return new RRule({ ...base, freq: RRule.WEEKLY, interval: 2 })
    case 'monthly':
      return new RRule({ ...base, freq: RRule.MONTHLY })
  }
}

export function occursOn(activity: ScheduledActivity, dateKey: DateKey): boolean {
  if (!activity.isActive) return false
  const day = floating(dateKey)
  return buildRule(activity).between(day.toJSDate(), day.endOf('day').toJSDate(), true).length > 0
}

export function expandOccurrences(activity: ScheduledActivity, from: DateKey, to: DateKey, maxCount = 50): DateKey[] {
  if (!activity.isActive) return []
  return buildRule(activity)
    .between(floating(from).toJSDate(), floating(to).endOf('day').toJSDate(), true)
    .slice(0, maxCount)
    .map((d) => DateTime.fromJSDate(d, { zone: 'UTC' }).toFormat('yyyy-MM-dd'))
}

/**
 * Routines that fall on `dateKey`, placed at their wall-clock start in the user's zone.
 */
export function expandForDate(activities: ScheduledActivity[], dateKey: DateKey, zone: string): CommittedActivity[] {
  return activities
    .filter((a) => a.durationMinutes > 0 && occursOn(a, dateKey))
    .map((a) => {
      const start = atClock(dateKey, { hour: a.startHour, minute: a.startMinute }, zone)
      return { id: a.id, title: a.title, start, end: addMinutes(start, a.durationMinutes) }
    })
}
