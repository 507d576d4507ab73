import type { DirectorConfig } from '../config.js'
import { ProfileTracker } from '../profile/tracker.js'
import { TensionDirector } from '../tension/director.js'
import { GenerationOrchestrator } from '../generation/orchestrator.js'
import { AiSdkBackend } from '../generation/backend.js'
import type { GenerationBackend } from '../generation/backend.js'
import type { Database } from '../storage/database.js'

/** Everything a Director needs, built once per session and passed in. */
export interface DirectorContext {
  config: DirectorConfig
  profile: ProfileTracker
  tension: TensionDirector
  orchestrator: GenerationOrchestrator
  db: Database | null
}

export interface CreateDirectorContextParams {
  config: DirectorConfig
  backend?: GenerationBackend
  db?: Database | null
  random?: () => number
}

export function createDirectorContext(params: CreateDirectorContextParams): DirectorContext {
  const { config } = params
  const db = params.db ?? null

  const profile = new ProfileTracker({
    decayRates: {
      paranoiaDecayPerSecond: config.profile.paranoiaDecayPerSecond,
      distortionDecayPerSecond: config.profile.distortionDecayPerSecond,
      instabilityDecayPerSecond: config.profile.instabilityDecayPerSecond,
      triggerDecayPerSecond: config.profile.triggerDecayPerSecond,
      triggerFloor: config.profile.triggerFloor
    },
    debug: config.debug
  })

  const tension = new TensionDirector({
    baseDecayRate: config.tension.baseDecayRate,
    smoothTime: config.tension.smoothTime,
    traits: () => profile.getTraits(),
    random: params.random
  })

  const orchestrator = new GenerationOrchestrator({
    backend: params.backend ?? new AiSdkBackend(config.llm),
    models: {
      creative: config.llm.creativeModel,
      analysis: config.llm.analysisModel,
      image: config.llm.imageModel
    },
    context: {
      profileSummary: () => profile.summary(),
      tensionValue: () => tension.getCurrentTension()
    },
    memoryContextLimit: config.orchestrator.memoryContextLimit,
    cacheTtlMs: config.orchestrator.cacheTtlMs,
    maxTokensCap: config.orchestrator.maxTokensCap,
    onOutcome: db ? outcome => db.insertGenerationOutcome(outcome) : undefined
  })

  return { config, profile, tension, orchestrator, db }
}
