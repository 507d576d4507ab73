import { nanoid } from 'nanoid'
import { InvariantViolationError } from '../errors.js'
import { clamp01, lerp, mean } from '../util/math.js'
import { RingBuffer } from '../util/ring-buffer.js'
import { validateAnalysis, validatePersistedState, validateTraits } from './analysis.js'
import { classifyChoice } from './lexicon.js'
import type {
  BehaviorSnapshot,
  DerivedIndices,
  PersistedProfileState,
  ProfileAnalysis,
  ProfileDecayRates,
  ProfileSnapshot,
  TraitName,
  TraitVector,
  TriggerRecord
} from './types.js'

export const BEHAVIOR_HISTORY_CAPACITY = 20
export const TRIGGER_BLEND = 0.3
export const ANALYSIS_BLEND = 0.3
export const OBSESSION_THRESHOLD = 3
export const WEIGHT_EPSILON = 1e-4

const PARANOIA_THRESHOLD = 0.6
const REALITY_DISTORTION_THRESHOLD = 0.8

const INITIAL_TRIGGER_WEIGHTS: Record<string, number> = {
  isolation: 0.3,
  paranoia: 0.3,
  unreality: 0.2,
  observation: 0.4,
  reflection: 0.3
}

export const DEFAULT_DECAY_RATES: ProfileDecayRates = {
  paranoiaDecayPerSecond: 0.05,
  distortionDecayPerSecond: 0.03,
  instabilityDecayPerSecond: 0.04,
  triggerDecayPerSecond: 0.02,
  triggerFloor: 0.1
}

const ZERO_TRAITS: TraitVector = { fear: 0, obsession: 0, aggression: 0, curiosity: 0 }
const ZERO_INDICES: DerivedIndices = { paranoiaIndex: 0, realityDistortion: 0, emotionalInstability: 0 }

export interface ProfileTrackerOptions {
  initialTraits?: Partial<TraitVector>
  decayRates?: Partial<ProfileDecayRates>
  /** Throw on a broken invariant instead of repairing it. */
  debug?: boolean
  now?: () => Date
}

/**
 * Continuous psychological state of one player. All mutation goes through
 * these methods; every method either applies fully or throws before touching
 * state.
 */
export class ProfileTracker {
  private traits: TraitVector
  private indices: DerivedIndices = { ...ZERO_INDICES }
  private triggerWeights: Map<string, number> = new Map()
  private triggerRecords: Map<string, TriggerRecord> = new Map()
  private choiceFrequencies: Map<string, number> = new Map()
  private keywordCounts: Map<string, number> = new Map()
  private history = new RingBuffer<BehaviorSnapshot>(BEHAVIOR_HISTORY_CAPACITY)

  private readonly initialTraits: TraitVector
  private readonly decayRates: ProfileDecayRates
  private readonly debug: boolean
  private readonly now: () => Date

  constructor(options: ProfileTrackerOptions = {}) {
    this.initialTraits = validateTraits({ ...ZERO_TRAITS, ...options.initialTraits })
    this.traits = { ...this.initialTraits }
    this.decayRates = { ...DEFAULT_DECAY_RATES, ...options.decayRates }
    this.debug = options.debug ?? false
    this.now = options.now ?? (() => new Date())
    this.resetTriggerWeights()
  }

  // --- Reads ---

  getTraits(): TraitVector {
    return { ...this.traits }
  }

  getIndices(): DerivedIndices {
    return { ...this.indices }
  }

  getTriggerWeights(): Record<string, number> {
    this.assertWeightsNormalized()
    return Object.fromEntries(this.triggerWeights)
  }

  getTriggerSensitivity(trigger: string): number {
    return this.triggerWeights.get(trigger) ?? 0
  }

  getTriggerRecords(): TriggerRecord[] {
    return [...this.triggerRecords.values()].map(r => ({ ...r }))
  }

  getChoiceFrequencies(): Record<string, number> {
    return Object.fromEntries(this.choiceFrequencies)
  }

  getActiveObsessions(): string[] {
    const active: string[] = []
    for (const [keyword, count] of this.keywordCounts) {
      if (count >= OBSESSION_THRESHOLD) active.push(keyword)
    }
    return active
  }

  getRecentBehavior(count: number = 5): BehaviorSnapshot[] {
    return this.history.last(count)
  }

  get behaviorCount(): number {
    return this.history.size
  }

  /** Highest of fear, obsession and aggression. */
  dominantIntensity(): number {
    return Math.max(this.traits.fear, this.traits.obsession, this.traits.aggression)
  }

  snapshot(): ProfileSnapshot {
    return {
      traits: this.getTraits(),
      indices: this.getIndices(),
      triggerWeights: this.getTriggerWeights(),
      choiceFrequencies: this.getChoiceFrequencies(),
      activeObsessions: this.getActiveObsessions(),
      recentBehavior: this.getRecentBehavior()
    }
  }

  summary(): string {
    const t = this.traits
    const i = this.indices
    const lines = [
      `Fear: ${t.fear.toFixed(2)}, Obsession: ${t.obsession.toFixed(2)}, Aggression: ${t.aggression.toFixed(2)}, Curiosity: ${t.curiosity.toFixed(2)}`,
      `Paranoia: ${i.paranoiaIndex.toFixed(2)}, Reality distortion: ${i.realityDistortion.toFixed(2)}, Instability: ${i.emotionalInstability.toFixed(2)}`
    ]

    const dominant = this.dominantTrigger()
    if (dominant) {
      lines.push(`Most sensitive to: ${dominant}`)
    }

    const obsessions = this.getActiveObsessions()
    if (obsessions.length > 0) {
      lines.push(`Fixations: ${obsessions.join(', ')}`)
    }

    return lines.join('\n')
  }

  private dominantTrigger(): string | null {
    let best: string | null = null
    let bestWeight = -1
    for (const [trigger, weight] of this.triggerWeights) {
      if (weight > bestWeight) {
        best = trigger
        bestWeight = weight
      }
    }
    return best
  }

  // --- Updates ---

  recordChoice(choiceType: string, target: string): BehaviorSnapshot {
    const key = choiceType.trim().toLowerCase()
    this.choiceFrequencies.set(key, (this.choiceFrequencies.get(key) ?? 0) + 1)

    const keyword = target.trim().toLowerCase()
    if (keyword.length > 0) {
      this.keywordCounts.set(keyword, (this.keywordCounts.get(keyword) ?? 0) + 1)
    }

    const snapshot: BehaviorSnapshot = Object.freeze({
      id: nanoid(),
      action: choiceType,
      context: target,
      traits: Object.freeze({ ...this.traits }),
      indices: Object.freeze({ ...this.indices }),
      timestamp: this.now()
    })
    this.history.push(snapshot)

    this.updateDerivedIndices(choiceType, target)
    return snapshot
  }

  private updateDerivedIndices(choiceType: string, target: string): void {
    const classes = classifyChoice(choiceType, target)

    if (classes.has('observation')) {
      const p = this.indices.paranoiaIndex
      this.indices.paranoiaIndex = clamp01(lerp(p, Math.min(1, p + 0.1), 0.3))
      if (this.indices.paranoiaIndex > PARANOIA_THRESHOLD) {
        this.bumpTrigger('paranoia', 0.1)
      }
    }

    if (classes.has('unreality')) {
      const r = this.indices.realityDistortion
      this.indices.realityDistortion = clamp01(lerp(r, Math.min(1, r + 0.15), 0.4))
      if (this.indices.realityDistortion > REALITY_DISTORTION_THRESHOLD) {
        this.bumpTrigger('unreality', 0.15)
      }
    }

    // Volatility between the two latest snapshots, not magnitude
    const [previous, latest] = this.history.last(2)
    if (previous && latest) {
      const variance = mean([
        Math.abs(latest.traits.fear - previous.traits.fear),
        Math.abs(latest.traits.obsession - previous.traits.obsession),
        Math.abs(latest.traits.aggression - previous.traits.aggression)
      ])
      this.indices.emotionalInstability = clamp01(lerp(this.indices.emotionalInstability, variance, 0.2))
    }

    this.normalizeTriggerWeights()
  }

  private bumpTrigger(trigger: string, amount: number): void {
    this.triggerWeights.set(trigger, (this.triggerWeights.get(trigger) ?? 0) + amount)
  }

  recordTrigger(trigger: string, intensity: number): void {
    if (!Number.isFinite(intensity)) {
      throw new RangeError(`Trigger intensity must be finite, got ${intensity}`)
    }
    const level = clamp01(intensity)

    const record = this.triggerRecords.get(trigger)
    if (record) {
      record.intensity = lerp(record.intensity, level, TRIGGER_BLEND)
      record.occurrences++
      record.lastTriggered = this.now()
    } else {
      this.triggerRecords.set(trigger, { trigger, intensity: level, occurrences: 1, lastTriggered: this.now() })
    }

    const current = this.triggerWeights.get(trigger) ?? 0
    this.triggerWeights.set(trigger, lerp(current, level, TRIGGER_BLEND))
    this.normalizeTriggerWeights()
  }

  decay(deltaTime: number): void {
    if (!Number.isFinite(deltaTime)) {
      throw new RangeError(`decay deltaTime must be finite, got ${deltaTime}`)
    }
    if (deltaTime <= 0) return

    const rates = this.decayRates
    this.indices.paranoiaIndex = Math.max(0, this.indices.paranoiaIndex - rates.paranoiaDecayPerSecond * deltaTime)
    this.indices.realityDistortion = Math.max(0, this.indices.realityDistortion - rates.distortionDecayPerSecond * deltaTime)
    this.indices.emotionalInstability = Math.max(0, this.indices.emotionalInstability - rates.instabilityDecayPerSecond * deltaTime)

    for (const [trigger, weight] of this.triggerWeights) {
      this.triggerWeights.set(trigger, Math.max(rates.triggerFloor, weight - rates.triggerDecayPerSecond * deltaTime))
    }
    this.normalizeTriggerWeights()
  }

  /**
   * Blend traits toward a validated analysis. Returns the largest shift the
   * analysis proposed across fear, obsession and aggression.
   */
  applyAnalysis(analysis: ProfileAnalysis): number {
    const valid = validateAnalysis(analysis)

    const shift = Math.max(
      Math.abs(valid.fear - this.traits.fear),
      Math.abs(valid.obsession - this.traits.obsession),
      Math.abs(valid.aggression - this.traits.aggression)
    )

    this.traits.fear = clamp01(lerp(this.traits.fear, valid.fear, ANALYSIS_BLEND))
    this.traits.obsession = clamp01(lerp(this.traits.obsession, valid.obsession, ANALYSIS_BLEND))
    this.traits.aggression = clamp01(lerp(this.traits.aggression, valid.aggression, ANALYSIS_BLEND))
    if (valid.curiosity !== undefined) {
      this.traits.curiosity = clamp01(lerp(this.traits.curiosity, valid.curiosity, ANALYSIS_BLEND))
    }

    return shift
  }

  nudgeTrait(trait: TraitName, delta: number): number {
    if (!Number.isFinite(delta)) {
      throw new RangeError(`Trait delta must be finite, got ${delta}`)
    }
    this.traits[trait] = clamp01(this.traits[trait] + delta)
    return this.traits[trait]
  }

  reset(): void {
    this.traits = { ...this.initialTraits }
    this.indices = { ...ZERO_INDICES }
    this.triggerRecords.clear()
    this.choiceFrequencies.clear()
    this.keywordCounts.clear()
    this.history.clear()
    this.resetTriggerWeights()
  }

  // --- Persisted fields ---

  setTraits(traits: TraitVector): void {
    this.traits = validateTraits(traits)
  }

  setChoiceFrequencies(frequencies: Record<string, number>): void {
    const valid = validatePersistedState({
      traits: this.traits,
      choiceFrequencies: frequencies,
      activeObsessions: []
    })
    this.choiceFrequencies = new Map(Object.entries(valid.choiceFrequencies))
  }

  setActiveObsessions(keywords: string[]): void {
    const valid = validatePersistedState({
      traits: this.traits,
      choiceFrequencies: {},
      activeObsessions: keywords
    })
    this.keywordCounts = new Map(valid.activeObsessions.map(k => [k.toLowerCase(), OBSESSION_THRESHOLD]))
  }

  getPersistedState(): PersistedProfileState {
    return {
      traits: this.getTraits(),
      choiceFrequencies: this.getChoiceFrequencies(),
      activeObsessions: this.getActiveObsessions()
    }
  }

  /** Accepts saved values as-is; history the save does not carry stays as it is. */
  restorePersistedState(state: unknown): void {
    const valid = validatePersistedState(state)
    this.traits = valid.traits
    this.choiceFrequencies = new Map(Object.entries(valid.choiceFrequencies))
    this.keywordCounts = new Map(valid.activeObsessions.map(k => [k.toLowerCase(), OBSESSION_THRESHOLD]))
  }

  // --- Trigger weight distribution ---

  private resetTriggerWeights(): void {
    this.triggerWeights = new Map(Object.entries(INITIAL_TRIGGER_WEIGHTS))
    this.normalizeTriggerWeights()
  }

  private normalizeTriggerWeights(): void {
    let total = 0
    for (const weight of this.triggerWeights.values()) total += weight

    if (!(total > 0) || !Number.isFinite(total)) {
      this.handleBrokenWeights(`trigger weights sum to ${total}`)
      return
    }

    for (const [trigger, weight] of this.triggerWeights) {
      this.triggerWeights.set(trigger, weight / total)
    }
    this.assertWeightsNormalized()
  }

  private assertWeightsNormalized(): void {
    let total = 0
    for (const weight of this.triggerWeights.values()) {
      if (!Number.isFinite(weight) || weight < 0) {
        this.handleBrokenWeights(`trigger weight ${weight} is out of range`)
        return
      }
      total += weight
    }
    if (this.triggerWeights.size > 0 && Math.abs(total - 1) > WEIGHT_EPSILON) {
      this.handleBrokenWeights(`trigger weights sum to ${total}`)
    }
  }

  private handleBrokenWeights(reason: string): void {
    if (this.debug) {
      throw new InvariantViolationError(reason)
    }
    console.warn(`[profile] ${reason}; resetting to a uniform distribution`)
    const uniform = this.triggerWeights.size > 0 ? 1 / this.triggerWeights.size : 0
    for (const trigger of this.triggerWeights.keys()) {
      this.triggerWeights.set(trigger, uniform)
    }
  }
}
