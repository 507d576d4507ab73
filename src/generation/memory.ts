import { nanoid } from 'nanoid'
import { clamp01 } from '../util/math.js'
import { RingBuffer } from '../util/ring-buffer.js'
import { emotionalKeywordWeight, hasSignificanceKeyword } from '../profile/lexicon.js'
import type { ContextType, MemoryEntry } from './types.js'

export const MEMORY_CAPACITY = 10
export const RELEVANCE_THRESHOLD = 0.7
export const IMPACT_THRESHOLD = 0.7
const SIGNIFICANT_LENGTH = 100

export function isSignificant(content: string): boolean {
  return content.length > SIGNIFICANT_LENGTH || hasSignificanceKeyword(content.toLowerCase())
}

export function scoreRelevance(content: string): number {
  const text = content.toLowerCase()
  let score = 0.5
  if (content.length > 200) score += 0.2
  if (text.includes('psychological')) score += 0.1
  if (text.includes('horror')) score += 0.1
  return clamp01(score)
}

export function scoreEmotionalImpact(content: string): number {
  return clamp01(0.5 + emotionalKeywordWeight(content.toLowerCase()))
}

/**
 * The last few significant generations, folded back into later prompts. An
 * entry qualifies by sharing the context type or by scoring above either
 * threshold.
 */
export class ContextualMemory {
  private entries: RingBuffer<MemoryEntry>

  constructor(capacity: number = MEMORY_CAPACITY) {
    this.entries = new RingBuffer<MemoryEntry>(capacity)
  }

  /** Stores the content if it is significant. Returns the stored entry, if any. */
  remember(contextType: ContextType, content: string, timestamp: Date = new Date()): MemoryEntry | null {
    if (!isSignificant(content)) return null

    const entry: MemoryEntry = {
      id: nanoid(),
      contextType,
      content,
      relevance: scoreRelevance(content),
      emotionalImpact: scoreEmotionalImpact(content),
      timestamp
    }
    this.entries.push(entry)
    return entry
  }

  selectRelevant(contextType: ContextType, limit: number): MemoryEntry[] {
    if (limit <= 0) return []
    return this.entries
      .filter(e => e.contextType === contextType ||
        e.relevance > RELEVANCE_THRESHOLD ||
        e.emotionalImpact > IMPACT_THRESHOLD)
      .sort((a, b) => {
        const score = (b.relevance + b.emotionalImpact) - (a.relevance + a.emotionalImpact)
        return score !== 0 ? score : b.timestamp.getTime() - a.timestamp.getTime()
      })
      .slice(0, limit)
  }

  all(): MemoryEntry[] {
    return this.entries.toArray()
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }
}
