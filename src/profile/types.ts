export type TraitName = 'fear' | 'obsession' | 'aggression' | 'curiosity'

export type TraitVector = Record<TraitName, number>

export interface DerivedIndices {
  paranoiaIndex: number
  realityDistortion: number
  emotionalInstability: number
}

export interface BehaviorSnapshot {
  readonly id: string
  readonly action: string
  readonly context: string
  readonly traits: Readonly<TraitVector>
  readonly indices: Readonly<DerivedIndices>
  readonly timestamp: Date
}

export interface TriggerRecord {
  trigger: string
  intensity: number
  occurrences: number
  lastTriggered: Date
}

export interface ObsessivePattern {
  keyword: string
  occurrences: number
}

export interface ProfileSnapshot {
  traits: TraitVector
  indices: DerivedIndices
  triggerWeights: Record<string, number>
  choiceFrequencies: Record<string, number>
  activeObsessions: string[]
  recentBehavior: BehaviorSnapshot[]
}

/** Fields the save subsystem owns. */
export interface PersistedProfileState {
  traits: TraitVector
  choiceFrequencies: Record<string, number>
  activeObsessions: string[]
}

/** Well-formed output of an analysis request. */
export interface ProfileAnalysis {
  fear: number
  obsession: number
  aggression: number
  curiosity?: number
  notes?: string
}

export interface ProfileDecayRates {
  paranoiaDecayPerSecond: number
  distortionDecayPerSecond: number
  instabilityDecayPerSecond: number
  triggerDecayPerSecond: number
  triggerFloor: number
}
