import { nanoid } from 'nanoid'
import { GenerationBackendError, GenerationCancelledError, isNetworkError } from '../errors.js'
import { cacheKeyFor, ResponseCache } from './cache.js'
import { ContextualMemory } from './memory.js'
import { buildRetryPrompt, enhancePrompt, findMissingElements } from './prompts.js'
import type { PromptContext } from './prompts.js'
import { maxTokensFor, MAX_TOKENS_CAP, modelRoleFor, retryTemperature, temperatureFor } from './temperature.js'
import type { GenerationBackend } from './backend.js'
import type {
  ContextType,
  GenerationOutcome,
  GenerationRequest,
  GenerationResult,
  ImageResult,
  OrchestratorStats,
  PromptContextSource
} from './types.js'

// One original call plus one retry, shared by backend and validation failures
export const MAX_ATTEMPTS = 2

export interface GenerationModels {
  creative: string
  analysis: string
  image: string
}

export interface GenerationOrchestratorConfig {
  backend: GenerationBackend
  models: GenerationModels
  context?: PromptContextSource
  memoryContextLimit?: number
  cacheTtlMs?: number | null
  maxTokensCap?: number
  onOutcome?: (outcome: GenerationOutcome) => void
  now?: () => number
}

type Job =
  | { kind: 'text'; request: GenerationRequest; resolve: (result: GenerationResult) => void; reject: (e: unknown) => void }
  | { kind: 'image'; request: GenerationRequest; resolve: (result: ImageResult) => void; reject: (e: unknown) => void }

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/**
 * Single-flight gateway to the model service. Requests are served in FIFO
 * order by one worker, so at most one backend call is in flight.
 */
export class GenerationOrchestrator {
  private backend: GenerationBackend
  private models: GenerationModels
  private context: PromptContextSource | null
  private memoryContextLimit: number
  private maxTokensCap: number
  private onOutcome: ((outcome: GenerationOutcome) => void) | null
  private now: () => number

  private cache: ResponseCache
  private memory = new ContextualMemory()
  private queue: Job[] = []
  private draining: boolean = false
  private inFlight: boolean = false
  private backendCalls: number = 0
  private cacheHits: number = 0

  constructor(config: GenerationOrchestratorConfig) {
    this.backend = config.backend
    this.models = config.models
    this.context = config.context ?? null
    this.memoryContextLimit = config.memoryContextLimit ?? 3
    this.maxTokensCap = config.maxTokensCap ?? MAX_TOKENS_CAP
    this.onOutcome = config.onOutcome ?? null
    this.now = config.now ?? Date.now
    this.cache = new ResponseCache({ ttlMs: config.cacheTtlMs ?? null, now: this.now })
  }

  generate(prompt: string, contextType: ContextType = 'default', requiredElements: string[] = []): Promise<GenerationResult> {
    const request = this.buildRequest('text', prompt, contextType, requiredElements)

    const cached = this.lookupCache(request)
    if (cached !== undefined) {
      this.cacheHits++
      this.recordOutcome(request, 'cached', 0)
      return Promise.resolve({ ok: true, content: cached, cached: true, attempts: 0 })
    }

    return new Promise<GenerationResult>((resolve, reject) => {
      this.enqueue({ kind: 'text', request, resolve, reject })
    })
  }

  generateImage(prompt: string, contextType: ContextType = 'image_prompt'): Promise<ImageResult> {
    const request = this.buildRequest('image', prompt, contextType, [])
    return new Promise<ImageResult>((resolve, reject) => {
      this.enqueue({ kind: 'image', request, resolve, reject })
    })
  }

  /** Drop every request that has not started. Returns how many were dropped. */
  clearQueue(): number {
    const dropped = this.queue.splice(0)
    for (const job of dropped) {
      this.recordOutcome(job.request, 'cancelled', 0)
      job.reject(new GenerationCancelledError(job.request.id))
    }
    if (dropped.length > 0) {
      console.log(`[generation] Dropped ${dropped.length} queued request(s)`)
    }
    return dropped.length
  }

  clearCache(): void {
    this.cache.clear()
  }

  clearMemory(): void {
    this.memory.clear()
  }

  getMemory(): ContextualMemory {
    return this.memory
  }

  stats(): OrchestratorStats {
    return {
      queueDepth: this.queue.length,
      inFlight: this.inFlight,
      backendCalls: this.backendCalls,
      cacheHits: this.cacheHits,
      cacheSize: this.cache.size,
      memorySize: this.memory.size
    }
  }

  private buildRequest(kind: GenerationRequest['kind'], prompt: string, contextType: ContextType, requiredElements: string[]): GenerationRequest {
    const model = kind === 'image'
      ? this.models.image
      : modelRoleFor(contextType) === 'creative' ? this.models.creative : this.models.analysis

    return {
      id: nanoid(),
      kind,
      prompt,
      contextType,
      requiredElements: [...requiredElements],
      temperature: temperatureFor(contextType),
      maxTokens: maxTokensFor(prompt, this.maxTokensCap),
      model,
      cacheKey: cacheKeyFor(prompt),
      enqueuedAt: this.now()
    }
  }

  private lookupCache(request: GenerationRequest): string | undefined {
    const content = this.cache.get(request.cacheKey)
    if (content === undefined) return undefined
    // A cached answer to the same prompt may not cover a different requirement set
    return findMissingElements(content, request.requiredElements).length === 0 ? content : undefined
  }

  // --- Worker ---

  private enqueue(job: Job): void {
    this.queue.push(job)
    void this.drain()
  }

  private async drain(): Promise<void> {
    if (this.draining) return
    this.draining = true

    try {
      let job: Job | undefined
      while ((job = this.queue.shift())) {
        this.inFlight = true
        try {
          if (job.kind === 'text') {
            job.resolve(await this.runText(job.request))
          } else {
            job.resolve(await this.runImage(job.request))
          }
        } catch (e) {
          job.reject(e)
        } finally {
          this.inFlight = false
        }
      }
    } finally {
      this.draining = false
    }
  }

  private promptContext(contextType: ContextType): PromptContext {
    const memories = this.memory.selectRelevant(contextType, this.memoryContextLimit)
    if (!this.context) {
      return { memories, profileSummary: '', tension: null }
    }
    return {
      memories,
      profileSummary: this.context.profileSummary(),
      tension: this.context.tensionValue()
    }
  }

  private async runText(request: GenerationRequest): Promise<GenerationResult> {
    const started = this.now()

    // An identical request ahead of this one may have filled the cache
    const cached = this.lookupCache(request)
    if (cached !== undefined) {
      this.cacheHits++
      this.recordOutcome(request, 'cached', 0, started)
      return { ok: true, content: cached, cached: true, attempts: 0 }
    }

    const context = this.promptContext(request.contextType)
    let prompt = enhancePrompt(request.prompt, context)
    let temperature = request.temperature
    let missing: string[] = []
    let lastContent = ''
    let attempts = 0

    while (attempts < MAX_ATTEMPTS) {
      attempts++

      let content: string
      try {
        this.backendCalls++
        content = await this.backend.generateText({
          prompt,
          temperature,
          maxTokens: request.maxTokens,
          model: request.model
        })
      } catch (e) {
        if (attempts >= MAX_ATTEMPTS) {
          this.recordOutcome(request, 'backend_error', attempts, started, errorMessage(e))
          throw new GenerationBackendError(
            `Generation ${request.id} (${request.contextType}) failed after ${attempts} attempts: ${errorMessage(e)}`,
            { requestId: request.id, attempts, cause: e }
          )
        }
        const kind = isNetworkError(e) ? 'network error' : 'backend error'
        console.warn(`[generation] ${kind} on ${request.contextType} request, retrying:`, errorMessage(e))
        continue
      }

      missing = findMissingElements(content, request.requiredElements)
      if (content.trim().length > 0 && missing.length === 0) {
        this.cache.set(request.cacheKey, content)
        this.memory.remember(request.contextType, content)
        this.recordOutcome(request, 'ok', attempts, started)
        return { ok: true, content, cached: false, attempts }
      }

      lastContent = content
      const asked = missing.length > 0 ? missing : ['a non-empty response']
      prompt = enhancePrompt(buildRetryPrompt(request.prompt, asked), context)
      temperature = retryTemperature(request.temperature)
    }

    console.warn(`[generation] ${request.contextType} response failed validation after ${attempts} attempts, missing: ${missing.join(', ') || '(empty response)'}`)
    this.recordOutcome(request, 'validation_failed', attempts, started, `missing: ${missing.join(', ')}`)
    return { ok: false, reason: 'validation', missing, attempts, content: lastContent }
  }

  private async runImage(request: GenerationRequest): Promise<ImageResult> {
    const started = this.now()
    let attempts = 0

    while (true) {
      attempts++
      try {
        this.backendCalls++
        const image = await this.backend.generateImage({ prompt: request.prompt, model: request.model })
        this.recordOutcome(request, 'ok', attempts, started)
        return image
      } catch (e) {
        if (attempts >= MAX_ATTEMPTS) {
          this.recordOutcome(request, 'backend_error', attempts, started, errorMessage(e))
          throw new GenerationBackendError(
            `Image generation ${request.id} failed after ${attempts} attempts: ${errorMessage(e)}`,
            { requestId: request.id, attempts, cause: e }
          )
        }
        console.warn('[generation] image backend error, retrying:', errorMessage(e))
      }
    }
  }

  private recordOutcome(
    request: GenerationRequest,
    status: GenerationOutcome['status'],
    attempts: number,
    started: number = this.now(),
    error?: string
  ): void {
    if (!this.onOutcome) return
    try {
      this.onOutcome({
        requestId: request.id,
        kind: request.kind,
        contextType: request.contextType,
        status,
        attempts,
        durationMs: this.now() - started,
        error
      })
    } catch (e) {
      console.error('[generation] outcome logger failed:', e)
    }
  }
}
