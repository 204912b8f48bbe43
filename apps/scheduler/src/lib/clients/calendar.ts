import { promises as fs } from 'node:fs'
import crypto from 'node:crypto'
import { z } from 'zod'
import { CalendarMeeting, CalendarProvider, DateKey, NewCalendarEvent, overlaps, startOfDateKey } from '@stridely/core'

const meetingSchema = z.object({
  id: z.string(),
  title: z.string().default('(no title)'),
  start: z.coerce.date(),
  end: z.coerce.date(),
  attendeeCount: z.number().int().nonnegative().default(1),
  isOrganizer: z.boolean().default(false),
  isAllDay: z.boolean().default(false),
  isOutOfOffice: z.boolean().default(false),
  location: z.string().optional(),
  notes: z.string().optional(),
})

const createdSchema = z.object({
  id: z.string(),
  title: z.string(),
  start: z.coerce.date(),
  end: z.coerce.date(),
  notes: z.string().optional(),
  alarmOffsetMinutes: z.number().optional(),
})

const calendarFileSchema = z.object({
  events: z.array(meetingSchema).default([]),
  created: z.array(createdSchema).default([]),
})

type CalendarFile = z.infer<typeof calendarFileSchema>

/**
 * Calendar backed by a JSON file. Events the planner creates are appended under `created`
 * and count as meetings on later reads. Without a path everything stays in memory.
 */
export class JsonFileCalendar implements CalendarProvider {
  private cache: CalendarFile | null = null

  constructor(
    private readonly path: string | undefined,
    private readonly timeZone: string,
  ) {}

  private async load(): Promise<CalendarFile> {
    if (this.cache) return this.cache
    if (!this.path) {
      this.cache = { events: [], created: [] }
      return this.cache
    }
    const raw = await fs.readFile(this.path, 'utf8')
    const parsed = calendarFileSchema.safeParse(JSON.parse(raw))
    if (!parsed.success) {
      throw new Error(`Invalid calendar file ${this.path}: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
    }
    this.cache = parsed.data
    return this.cache
  }

  private async save(data: CalendarFile) {
    this.cache = data
    if (this.path) await fs.writeFile(this.path, JSON.stringify(data, null, 2))
  }

  async fetchEvents(date: DateKey): Promise<CalendarMeeting[]> {
    const data = await this.load()
    const day = startOfDateKey(date, this.timeZone)
    const bounds = { start: day.toJSDate(), end: day.plus({ days: 1 }).toJSDate() }
    const created: CalendarMeeting[] = data.created.map((e) => ({
      id: e.id,
      title: e.title,
      start: e.start,
      end: e.end,
      attendeeCount: 1,
      isOrganizer: true,
      isAllDay: false,
      isOutOfOffice: false,
    }))
    return [...data.events, ...created].filter((m) => overlaps(m, bounds))
  }

  async createEvent(event: NewCalendarEvent): Promise<string> {
    const data = await this.load()
    const id = crypto.randomUUID()
    await this.save({ ...data, created: [...data.created, { id, ...event }] })
    return id
  }

  async deleteEvent(eventId: string): Promise<void> {
    const data = await this.load()
    await this.save({ ...data, created: data.created.filter((e) => e.id !== eventId) })
  }
}
