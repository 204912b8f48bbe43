import { z } from 'zod'

/**
 * Narrow persistence seam. Values are opaque strings; JSON encoding lives in readJson/writeJson.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>
  put(key: string, value: string): Promise<void>
  delete(key: string): Promise<void>
}

export class MemoryStore implements KeyValueStore {
  private data = new Map<string, string>()

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null
  }

  async put(key: string, value: string): Promise<void> {
    this.data.set(key, value)
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key)
  }

  keys(): string[] {
    return [...this.data.keys()]
  }
}

export type StoreSection = 'patterns' | 'adherence' | 'streak' | 'autopilot' | `plan:${string}`

export function storeKey(userId: string, section: StoreSection): string {
  return `stridely:${userId}:${section}`
}

/**
 * Read and validate a JSON value. Missing, unparsable or invalid data yields the fallback.
 */
export async function readJson<T>(
  store: KeyValueStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): Promise<T> {
  let raw: string | null
  try {
    raw = await store.get(key)
  } catch (error) {
    console.warn(`Failed to read ${key}, using defaults:`, error)
    return fallback
  }
  if (raw === null) return fallback

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    console.warn(`Stored value for ${key} is not valid JSON, using defaults:`, error)
    return fallback
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    console.warn(`Stored value for ${key} failed validation, using defaults:`, result.error.issues.map((i) => i.message).join('; '))
    return fallback
  }
  return result.data
}

export async function writeJson(store: KeyValueStore, key: string, value: unknown): Promise<void> {
  await store.put(key, JSON.stringify(value))
}
