import { GenerationBackendError, GenerationCancelledError, ProfileAnalysisError } from '../errors.js'
import { buildAnalysisPrompt, parseProfileAnalysis } from '../profile/analysis.js'
import { classifyChoice } from '../profile/lexicon.js'
import type { BehaviorSnapshot, ProfileAnalysis, ProfileSnapshot } from '../profile/types.js'
import type { ProfileTracker } from '../profile/tracker.js'
import type { TensionDirector } from '../tension/director.js'
import type { Severity, SeverityListener, HighTensionListener, TensionStateView } from '../tension/types.js'
import type { GenerationOrchestrator } from '../generation/orchestrator.js'
import type { ContextType, GenerationResult, OrchestratorStats } from '../generation/types.js'
import {
  buildEventPrompt,
  buildImpactPrompt,
  buildManifestationPrompt,
  buildRoomPrompt,
  highTensionDescription
} from '../generation/prompts.js'
import type { Database } from '../storage/database.js'
import type { DirectorContext } from './context.js'

// Tension stimuli per lexical class of a choice
const STIMULI = {
  observation: { source: 'paranoia', amount: 0.1 },
  unreality: { source: 'psychological', amount: 0.15 },
  confrontation: { source: 'aggression', amount: 0.1 }
} as const

const SIGNIFICANT_SHIFT = 0.2
const POST_INTENSE_RELIEF = -0.3
const HIGH_TENSION_FEAR = 0.1

export interface DirectorContent {
  source: string
  severity?: Severity
  content: string
  ok: boolean
  profileSummary: string
  tensionValue: number
}

export type ContentListener = (content: DirectorContent) => void

export interface ActionOutcome {
  snapshot: BehaviorSnapshot
  stimuli: { source: string; amount: number }[]
  /** Set when this action triggered a profile analysis. */
  analysis: Promise<ProfileAnalysis | null> | null
}

export interface RoomRequest {
  archetype: string
  theme: string
  level: number
}

export interface DirectorStatus {
  profile: ProfileSnapshot
  tension: TensionStateView
  generation: OrchestratorStats
}

/**
 * Ties one session together: player actions feed the profile and tension,
 * host ticks advance them, and scheduled events turn into generated content.
 */
export class Director {
  private profile: ProfileTracker
  private tension: TensionDirector
  private orchestrator: GenerationOrchestrator
  private db: Database | null
  private analysisInterval: number

  private actionsSinceAnalysis: number = 0
  private analysisInFlight: boolean = false
  private currentRoom: RoomRequest | null = null
  private contentListeners: ContentListener[] = []

  private readonly severityListener: SeverityListener
  private readonly highTensionListener: HighTensionListener

  constructor(context: DirectorContext) {
    this.profile = context.profile
    this.tension = context.tension
    this.orchestrator = context.orchestrator
    this.db = context.db
    this.analysisInterval = context.config.profile.analysisInterval

    this.severityListener = (severity, tension) => this.handleSeverity(severity, tension)
    this.highTensionListener = (source, tension) => this.handleHighTension(source, tension)
    this.tension.onSeverity(this.severityListener)
    this.tension.onHighTension(this.highTensionListener)
  }

  onContent(listener: ContentListener): void {
    this.contentListeners.push(listener)
  }

  removeContentListener(listener: ContentListener): void {
    this.contentListeners = this.contentListeners.filter(l => l !== listener)
  }

  // --- Player input ---

  handleAction(choiceType: string, target: string): ActionOutcome {
    const snapshot = this.profile.recordChoice(choiceType, target)

    const stimuli: { source: string; amount: number }[] = []
    for (const lexicalClass of classifyChoice(choiceType, target)) {
      const stimulus = STIMULI[lexicalClass]
      this.tension.modifyTension(stimulus.amount, stimulus.source)
      stimuli.push({ ...stimulus })
    }

    let analysis: Promise<ProfileAnalysis | null> | null = null
    this.actionsSinceAnalysis++
    if (this.actionsSinceAnalysis >= this.analysisInterval) {
      if (this.analysisInFlight) {
        console.log('[director] analysis still running, deferring')
      } else {
        this.actionsSinceAnalysis = 0
        analysis = this.runAnalysis()
      }
    }

    return { snapshot, stimuli, analysis }
  }

  private async runAnalysis(): Promise<ProfileAnalysis | null> {
    this.analysisInFlight = true
    try {
      return await this.analyzeProfile()
    } catch (e) {
      if (e instanceof GenerationBackendError || e instanceof GenerationCancelledError) {
        console.error('[director] profile analysis request failed:', e.message)
      } else {
        console.error('[director] profile analysis failed:', e)
      }
      return null
    } finally {
      this.analysisInFlight = false
    }
  }

  /**
   * Ask the model for a trait estimate and blend it into the profile. A
   * malformed reply leaves the profile untouched and resolves to null. A
   * sharp shift raises tension and brings on a manifestation.
   */
  async analyzeProfile(): Promise<ProfileAnalysis | null> {
    const prompt = buildAnalysisPrompt({
      traits: this.profile.getTraits(),
      recentBehavior: this.profile.getRecentBehavior(5),
      activeObsessions: this.profile.getActiveObsessions()
    })

    const result = await this.orchestrator.generate(prompt, 'analysis')
    if (!result.ok) {
      console.warn('[director] profile analysis came back empty')
      return null
    }

    let analysis: ProfileAnalysis
    try {
      analysis = parseProfileAnalysis(result.content)
    } catch (e) {
      if (e instanceof ProfileAnalysisError) {
        console.warn(`[director] discarding profile analysis: ${e.message}`)
        return null
      }
      throw e
    }

    // Parsing finished before anything is touched, so the update applies whole
    const shift = this.profile.applyAnalysis(analysis)
    if (shift > SIGNIFICANT_SHIFT) {
      this.tension.modifyTension(shift, 'psychological_shift')
      await this.produce('manifestation', buildManifestationPrompt({
        traits: this.profile.getTraits(),
        fixations: this.profile.getActiveObsessions(),
        tension: this.tension.getCurrentTension()
      }))
    }
    return analysis
  }

  // --- Host loop ---

  tick(deltaTime: number): void {
    if (!Number.isFinite(deltaTime) || deltaTime <= 0) return
    this.profile.decay(deltaTime)
    this.tension.adjustPacing(this.profile.getTraits())
    this.tension.tick(deltaTime)
  }

  // --- Content ---

  async describeRoom(room: RoomRequest): Promise<DirectorContent> {
    this.currentRoom = room
    const prompt = buildRoomPrompt({ ...room, traits: this.profile.getTraits() })
    return this.produce('room_description', prompt, undefined, [room.archetype.toLowerCase(), room.theme.toLowerCase()])
  }

  private async handleSeverity(severity: Severity, tension: number): Promise<void> {
    const traits = this.profile.getTraits()

    switch (severity) {
      case 'subtle': {
        await this.produce('event_generation', buildEventPrompt(this.roomContext(), traits), severity)
        break
      }
      case 'moderate': {
        const kind = traits.fear > traits.obsession ? 'paranoia_induction' : 'reality_distortion'
        await this.produce('psychological_impact', buildImpactPrompt(kind, tension, traits), severity)
        break
      }
      case 'intense': {
        try {
          await this.produce('manifestation', buildManifestationPrompt({
            traits,
            fixations: this.profile.getActiveObsessions(),
            tension
          }), severity)
        } finally {
          this.tension.modifyTension(POST_INTENSE_RELIEF, 'post_intense_event')
        }
        break
      }
    }
  }

  private handleHighTension(source: string, tension: number): void {
    this.profile.nudgeTrait('fear', HIGH_TENSION_FEAR)
    this.emit({
      source: 'high_tension',
      content: highTensionDescription(source),
      ok: true,
      profileSummary: this.profile.summary(),
      tensionValue: tension
    })
  }

  private roomContext(): string {
    const lines: string[] = []
    if (this.currentRoom) {
      lines.push(`The player is in a ${this.currentRoom.archetype} on level ${this.currentRoom.level} (${this.currentRoom.theme}).`)
    } else {
      lines.push('The player is somewhere unremarkable.')
    }
    const recent = this.profile.getRecentBehavior(3)
    if (recent.length > 0) {
      lines.push(`They recently: ${recent.map(s => `${s.action} ${s.context}`.trim()).join('; ')}`)
    }
    return lines.join('\n')
  }

  private async produce(
    contextType: ContextType,
    prompt: string,
    severity?: Severity,
    requiredElements: string[] = []
  ): Promise<DirectorContent> {
    let result: GenerationResult | null = null
    try {
      result = await this.orchestrator.generate(prompt, contextType, requiredElements)
    } catch (e) {
      if (!(e instanceof GenerationBackendError || e instanceof GenerationCancelledError)) throw e
      console.error(`[director] ${contextType} generation failed:`, e.message)
    }

    const content: DirectorContent = {
      source: contextType,
      severity,
      content: result ? result.content : '',
      ok: result ? result.ok : false,
      profileSummary: this.profile.summary(),
      tensionValue: this.tension.getCurrentTension()
    }
    this.emit(content)
    return content
  }

  private emit(content: DirectorContent): void {
    for (const listener of this.contentListeners) {
      try {
        listener(content)
      } catch (e) {
        console.error('[director] content listener failed:', e)
      }
    }
  }

  // --- Session ---

  /** Returns false when there is no session store. */
  save(): boolean {
    if (!this.db) return false
    this.db.saveProfileState(this.profile.getPersistedState())
    return true
  }

  /** Returns true when a saved profile was found and applied. */
  load(): boolean {
    if (!this.db) return false
    const state = this.db.getProfileState()
    if (!state) return false
    this.profile.restorePersistedState(state)
    return true
  }

  reset(): void {
    this.orchestrator.clearQueue()
    this.profile.reset()
    this.tension.reset()
    this.actionsSinceAnalysis = 0
    this.currentRoom = null
  }

  status(): DirectorStatus {
    return {
      profile: this.profile.snapshot(),
      tension: this.tension.getState(),
      generation: this.orchestrator.stats()
    }
  }

  dispose(): void {
    this.tension.removeSeverityListener(this.severityListener)
    this.tension.removeHighTensionListener(this.highTensionListener)
    this.contentListeners = []
  }
}
