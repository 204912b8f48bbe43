import { createClient } from 'redis'
import { KeyValueStore, MemoryStore } from '@stridely/core'

type RedisClient = ReturnType<typeof createClient>

// Redis client for persisted planner state
let redis: RedisClient | null = null

export async function getRedis(url: string): Promise<RedisClient> {
  if (!redis) {
    const client = createClient({ url })

    client.on('error', (err: Error) => {
      console.log('Redis Client Error:', err.message)
    })

    client.on('connect', () => {
      console.log('Connected to Redis')
    })

    client.on('end', () => {
      console.log('Disconnected from Redis')
    })

    try {
      await client.connect()
    } catch (error) {
      console.log('Redis not available')
      throw error
    }
    redis = client
  }

  return redis
}

export class RedisStore implements KeyValueStore {
  constructor(private readonly client: RedisClient) {}

  get(key: string): Promise<string | null> {
    return this.client.get(key)
  }

  async put(key: string, value: string): Promise<void> {
    await this.client.set(key, value)
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key)
  }
}

/**
 * Redis-backed store, or an in-process one when Redis cannot be reached.
 * The fallback keeps a run working but nothing survives the process.
 */
export async function createStore(url: string): Promise<KeyValueStore> {
  try {
    return new RedisStore(await getRedis(url))
  } catch (error) {
    console.warn('Redis unavailable, using memory fallback:', error instanceof Error ? error.message : error)
    return new MemoryStore()
  }
}

export async function disconnectRedis() {
  if (redis) {
    await redis.disconnect()
    redis = null
  }
}
