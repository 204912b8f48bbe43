import { DateKey } from '../planner/types'
import { SerialQueue } from './serial'

export interface GenerationResult<T> {
  committed: boolean // false when a newer generation for the same date superseded this one
  epoch: number
  value: T
}

export type CommitListener<T> = (date: DateKey, value: T, epoch: number) => void

/**
 * Single-flight plan generation per date.
 * Every request gets an increasing epoch; only the newest epoch for a date may commit,
 * and commits for one date never interleave.
 */
export class PlanCoordinator<T> {
  private counter = 0
  private latest = new Map<DateKey, number>()
  private queues = new Map<DateKey, SerialQueue>()
  private active = new Map<DateKey, number>()
  private listeners = new Set<CommitListener<T>>()

  generate(date: DateKey, compute: () => Promise<T> | T, commit: (value: T) => Promise<void>): Promise<GenerationResult<T>> {
    const epoch = ++this.counter
    this.latest.set(date, epoch)
    return this.track(date, async () => {
      const value = await compute()
      return this.queueFor(date).run(async () => {
        if (this.latest.get(date) !== epoch) {
          console.log(`Discarding stale plan for ${date} (epoch ${epoch})`)
          return { committed: false, epoch, value }
        }
        await commit(value)
        this.notify(date, value, epoch)
        return { committed: true, epoch, value }
      })
    })
  }

  /**
   * Read-modify-write against a date's committed value. Runs on the same queue as commits,
   * so it sees the newest committed plan and cannot be overwritten by one committed mid-update.
   */
  update<R>(date: DateKey, change: () => Promise<R>): Promise<R> {
    return this.track(date, () => this.queueFor(date).run(change))
  }

  // Undefined once the date has no work left
  latestEpoch(date: DateKey): number | undefined {
    return this.latest.get(date)
  }

  onCommit(listener: CommitListener<T>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private queueFor(date: DateKey): SerialQueue {
    let queue = this.queues.get(date)
    if (!queue) {
      queue = new SerialQueue()
      this.queues.set(date, queue)
    }
    return queue
  }

  // Forget a date once nothing for it is computing or queued
  private async track<R>(date: DateKey, work: () => Promise<R>): Promise<R> {
    this.active.set(date, (this.active.get(date) ?? 0) + 1)
    try {
      return await work()
    } finally {
      const left = (this.active.get(date) ?? 1) - 1
      if (left > 0) {
        this.active.set(date, left)
      } else {
        this.active.delete(date)
        this.latest.delete(date)
        this.queues.delete(date)
      }
    }
  }

  private notify(date: DateKey, value: T, epoch: number) {
    for (const listener of this.listeners) {
      try {
        listener(date, value, epoch)
      } catch (error) {
        console.warn('Plan commit listener failed:', error)
      }
    }
  }
}
