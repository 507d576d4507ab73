import type { ContextType } from './types.js'

export const DEFAULT_TEMPERATURE = 0.7
export const MIN_MAX_TOKENS = 128
export const MAX_TOKENS_CAP = 2048

// Creative content runs hot, analysis and checks run cold
const TEMPERATURES: Record<string, number> = {
  event_generation: 0.8,
  manifestation: 0.85,
  pattern_recognition: 0.7,
  emotional_filter: 0.75,
  style_generation: 0.8,
  room_description: 0.75,
  character_dialogue: 0.8,
  image_prompt: 0.8,
  analysis: 0.5,
  parameter_generation: 0.4,
  psychological_impact: 0.6,
  validation: 0.3,
  coherence_check: 0.4
}

const DESCRIPTIVE_CONTEXTS = new Set<string>(['room_description', 'event_generation', 'manifestation'])

export function temperatureFor(contextType: ContextType): number {
  return TEMPERATURES[contextType] ?? DEFAULT_TEMPERATURE
}

export function retryTemperature(temperature: number): number {
  return Math.min(1, temperature + 0.1)
}

export function maxTokensFor(prompt: string, cap: number = MAX_TOKENS_CAP): number {
  return Math.min(cap, Math.max(MIN_MAX_TOKENS, prompt.length * 2))
}

export type ModelRole = 'creative' | 'analysis'

export function modelRoleFor(contextType: ContextType): ModelRole {
  return DESCRIPTIVE_CONTEXTS.has(contextType) ? 'creative' : 'analysis'
}
