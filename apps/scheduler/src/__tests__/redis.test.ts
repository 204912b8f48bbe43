import { MemoryStore } from '@stridely/core'
import { createStore, disconnectRedis, RedisStore } from '@/lib/redis'

const mockData = new Map<string, string>()
const mockClient = {
  on: jest.fn(),
  connect: jest.fn(async () => undefined),
  disconnect: jest.fn(async () => undefined),
  get: jest.fn(async (key: string) => mockData.get(key) ?? null),
  set: jest.fn(async (key: string, value: string) => {
    mockData.set(key, value)
    return 'OK'
  }),
  del: jest.fn(async (key: string) => (mockData.delete(key) ? 1 : 0)),
}

jest.mock('redis', () => ({ createClient: jest.fn(() => mockClient) }))

describe('createStore', () => {
  const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
  const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)

  beforeEach(() => {
    mockData.clear()
  })

  afterEach(async () => {
    await disconnectRedis()
  })

  afterAll(() => {
    log.mockRestore()
    warn.mockRestore()
  })

  it('stores values in redis when it connects', async () => {
    const store = await createStore('redis://localhost:6379')
    expect(store).toBeInstanceOf(RedisStore)

    await store.put('stridely:u1:streak', '{"currentStreak":1}')
    expect(mockData.get('stridely:u1:streak')).toBe('{"currentStreak":1}')
    expect(await store.get('stridely:u1:streak')).toBe('{"currentStreak":1}')

    await store.delete('stridely:u1:streak')
    expect(await store.get('stridely:u1:streak')).toBeNull()
  })

  it('falls back to memory when redis is down', async () => {
    mockClient.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'))
    const store = await createStore('redis://localhost:6379')
    expect(store).toBeInstanceOf(MemoryStore)
  })

  it('disconnects the shared client once', async () => {
    await createStore('redis://localhost:6379')
    mockClient.disconnect.mockClear()
    await disconnectRedis()
    await disconnectRedis()
    expect(mockClient.disconnect).toHaveBeenCalledTimes(1)
  })
})
