import { promises as fs } from 'node:fs'
import { z } from 'zod'
import { ActivityDataProvider, DateKey, Workout } from '@stridely/core'

const daySchema = z.object({
  steps: z.number().nonnegative().default(0),
  hourly: z.array(z.number().nonnegative()).max(24).optional(),
  workouts: z
    .array(z.object({ start: z.coerce.date(), end: z.coerce.date(), kind: z.string().optional() }))
    .default([]),
})

const activityFileSchema = z.object({ days: z.record(z.string(), daySchema).default({}) })

type ActivityFile = z.infer<typeof activityFileSchema>

// Daily step totals and workouts exported from a health app, keyed by local date
export class JsonFileActivity implements ActivityDataProvider {
  private cache: ActivityFile | null = null

  constructor(private readonly path: string | undefined) {}

  private async load(): Promise<ActivityFile> {
    if (this.cache) return this.cache
    if (!this.path) {
      this.cache = { days: {} }
      return this.cache
    }
    const parsed = activityFileSchema.safeParse(JSON.parse(await fs.readFile(this.path, 'utf8')))
    if (!parsed.success) {
      throw new Error(`Invalid activity file ${this.path}: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
    }
    this.cache = parsed.data
    return this.cache
  }

  async fetchSteps(date: DateKey): Promise<number> {
    const data = await this.load()
    return data.days[date]?.steps ?? 0
  }

  async fetchHourlySteps(date: DateKey): Promise<number[]> {
    const data = await this.load()
    return data.days[date]?.hourly ?? []
  }

  async fetchWorkouts(date: DateKey): Promise<Workout[]> {
    const data = await this.load()
    return data.days[date]?.workouts ?? []
  }
}
