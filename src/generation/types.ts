export type KnownContextType =
  | 'event_generation'
  | 'manifestation'
  | 'pattern_recognition'
  | 'emotional_filter'
  | 'style_generation'
  | 'room_description'
  | 'character_dialogue'
  | 'analysis'
  | 'parameter_generation'
  | 'psychological_impact'
  | 'validation'
  | 'coherence_check'
  | 'image_prompt'

// Any other string is accepted and falls back to the default temperature
export type ContextType = KnownContextType | (string & {})

export type GenerationKind = 'text' | 'image'

export interface GenerationRequest {
  id: string
  kind: GenerationKind
  prompt: string
  contextType: ContextType
  requiredElements: string[]
  temperature: number
  maxTokens: number
  model: string
  cacheKey: string
  enqueuedAt: number
}

export interface GenerationSuccess {
  ok: true
  content: string
  cached: boolean
  attempts: number
}

export interface GenerationValidationFailure {
  ok: false
  reason: 'validation'
  missing: string[]
  attempts: number
  content: string
}

export type GenerationResult = GenerationSuccess | GenerationValidationFailure

export interface ImageResult {
  base64: string
  mediaType: string
}

export interface MemoryEntry {
  id: string
  contextType: ContextType
  content: string
  relevance: number
  emotionalImpact: number
  timestamp: Date
}

export interface GenerationOutcome {
  requestId: string
  kind: GenerationKind
  contextType: ContextType
  status: 'ok' | 'cached' | 'validation_failed' | 'backend_error' | 'cancelled'
  attempts: number
  durationMs: number
  error?: string
}

export interface OrchestratorStats {
  queueDepth: number
  inFlight: boolean
  backendCalls: number
  cacheHits: number
  cacheSize: number
  memorySize: number
}

/** Live profile and tension readings folded into every outgoing prompt. */
export interface PromptContextSource {
  profileSummary(): string
  tensionValue(): number
}
