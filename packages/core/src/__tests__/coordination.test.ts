import { PlanCoordinator } from '../coordination/planCoordinator'
import { SerialQueue } from '../coordination/serial'

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue()
    const gate = deferred<void>()
    const order: string[] = []
    const first = queue.run(async () => {
      await gate.promise
      order.push('first')
    })
    const second = queue.run(async () => {
      order.push('second')
    })
    gate.resolve()
    await Promise.all([first, second])
    expect(order).toEqual(['first', 'second'])
  })

  it('keeps going after a failed task', async () => {
    const queue = new SerialQueue()
    const failed = queue.run(async () => {
      throw new Error('boom')
    })
    await expect(failed).rejects.toThrow('boom')
    await expect(queue.run(async () => 'ok')).resolves.toBe('ok')
  })
})

describe('PlanCoordinator', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('lets the later-started generation win', async () => {
    const coordinator = new PlanCoordinator<string>()
    const committed: string[] = []
    const commit = async (value: string) => {
      committed.push(value)
    }
    const slow = deferred<string>()

    const first = coordinator.generate('2025-03-11', () => slow.promise, commit)
    const second = coordinator.generate('2025-03-11', () => 'fresh', commit)
    expect(await second).toEqual({ committed: true, epoch: 2, value: 'fresh' })
    expect(coordinator.latestEpoch('2025-03-11')).toBe(2)

    slow.resolve('stale')
    expect(await first).toEqual({ committed: false, epoch: 1, value: 'stale' })
    expect(committed).toEqual(['fresh'])
  })

  it('forgets a date once its work drains and keeps epochs increasing', async () => {
    const coordinator = new PlanCoordinator<string>()
    const commit = async () => undefined
    await coordinator.generate('2025-03-11', () => 'a', commit)
    expect(coordinator.latestEpoch('2025-03-11')).toBeUndefined()

    const failed = coordinator.generate('2025-03-12', () => Promise.reject(new Error('calendar down')), commit)
    await expect(failed).rejects.toThrow('calendar down')
    expect(coordinator.latestEpoch('2025-03-12')).toBeUndefined()

    expect((await coordinator.generate('2025-03-11', () => 'b', commit)).epoch).toBe(3)
  })

  it('runs updates between commits, never across one', async () => {
    const coordinator = new PlanCoordinator<string>()
    let stored = 'v1'
    const commit = async (value: string) => {
      stored = value
    }
    const gate = deferred<void>()

    const update = coordinator.update('2025-03-11', async () => {
      const read = stored
      await gate.promise
      stored = `${read}+done`
    })
    const regenerated = coordinator.generate('2025-03-11', () => 'v2', commit)
    gate.resolve()

    await update
    expect((await regenerated).committed).toBe(true)
    expect(stored).toBe('v2')
  })

  it('keeps dates independent', async () => {
    const coordinator = new PlanCoordinator<number>()
    const commit = async () => undefined
    const [a, b] = await Promise.all([coordinator.generate('2025-03-11', () => 1, commit), coordinator.generate('2025-03-12', () => 2, commit)])
    expect(a.committed && b.committed).toBe(true)
  })

  it('notifies commit listeners until they unsubscribe', async () => {
    const coordinator = new PlanCoordinator<string>()
    const seen: Array<[string, string, number]> = []
    const unsubscribe = coordinator.onCommit((date, value, epoch) => {
      seen.push([date, value, epoch])
    })
    const commit = async () => undefined

    await coordinator.generate('2025-03-11', () => 'a', commit)
    unsubscribe()
    await coordinator.generate('2025-03-11', () => 'b', commit)
    expect(seen).toEqual([['2025-03-11', 'a', 1]])
  })

  it('does not commit when the commit step fails', async () => {
    const coordinator = new PlanCoordinator<string>()
    const seen: string[] = []
    coordinator.onCommit((_date, value) => {
      seen.push(value)
    })
    await expect(
      coordinator.generate('2025-03-11', () => 'a', async () => {
        throw new Error('store down')
      }),
    ).rejects.toThrow('store down')
    expect(seen).toEqual([])
  })
})
