import { createHash } from 'node:crypto'

export function cacheKeyFor(prompt: string): string {
  return createHash('sha256').update(prompt, 'utf8').digest('hex')
}

interface CacheEntry {
  content: string
  storedAt: number
}

/** Last valid content per prompt. Entries never expire unless a TTL is set. */
export class ResponseCache {
  private entries: Map<string, CacheEntry> = new Map()
  private readonly ttlMs: number | null
  private readonly now: () => number

  constructor(options: { ttlMs?: number | null; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? null
    this.now = options.now ?? Date.now
  }

  get(key: string): string | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (this.ttlMs !== null && this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key)
      return undefined
    }
    return entry.content
  }

  set(key: string, content: string): void {
    this.entries.set(key, { content, storedAt: this.now() })
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }
}
