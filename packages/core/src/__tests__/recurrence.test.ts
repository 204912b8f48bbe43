import { expandForDate, expandOccurrences, occursOn } from '../planner/recurrence'
import { ScheduledActivity } from '../planner/types'

function routine(overrides: Partial<ScheduledActivity>): ScheduledActivity {
  return {
    id: 'gym',
    title: 'Gym',
    kind: 'workout',
    startHour: 16,
    startMinute: 30,
    durationMinutes: 45,
    recurrence: 'weekly',
    startDate: '2025-03-11',
    isActive: true,
    ...overrides,
  }
}

describe('recurring routines', () => {
  it('repeats weekly on the start weekday', () => {
    const gym = routine({})
    expect(occursOn(gym, '2025-03-18')).toBe(true)
    expect(occursOn(gym, '2025-03-12')).toBe(false)
    expect(occursOn(gym, '2025-03-04')).toBe(false)
  })

  it('skips weekends for weekday routines', () => {
    const commute = routine({ recurrence: 'weekdays', startDate: '2025-03-10' })
    expect(occursOn(commute, '2025-03-14')).toBe(true)
    expect(occursOn(commute, '2025-03-15')).toBe(false)
  })

  it('skips alternate weeks for biweekly routines', () => {
    const swim = routine({ recurrence: 'biweekly' })
    expect(expandOccurrences(swim, '2025-03-11', '2025-04-01')).toEqual(['2025-03-11', '2025-03-25'])
  })

  it('stops at the end date', () => {
    const gym = routine({ endDate: '2025-03-18' })
    expect(expandOccurrences(gym, '2025-03-01', '2025-04-30')).toEqual(['2025-03-11', '2025-03-18'])
  })

  it('runs a one-off routine only once', () => {
    const once = routine({ recurrence: 'once' })
    expect(occursOn(once, '2025-03-11')).toBe(true)
    expect(occursOn(once, '2025-03-18')).toBe(false)
  })

  it('ignores inactive routines', () => {
    expect(occursOn(routine({ isActive: false }), '2025-03-11')).toBe(false)
    expect(expandOccurrences(routine({ isActive: false }), '2025-03-01', '2025-03-31')).toEqual([])
  })

  it('caps expansion at the requested count', () => {
    expect(expandOccurrences(routine({}), '2025-03-11', '2025-12-31', 3)).toEqual(['2025-03-11', '2025-03-18', '2025-03-25'])
  })

  it('places occurrences at the wall-clock start in the user zone', () => {
    // New York is on daylight time from 2025-03-09
    const [gym] = expandForDate([routine({})], '2025-03-11', 'America/New_York')
    expect(gym.start).toEqual(new Date('2025-03-11T20:30:00.000Z'))
    expect(gym.end).toEqual(new Date('2025-03-11T21:15:00.000Z'))
  })
})
