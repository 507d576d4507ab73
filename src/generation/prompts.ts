import type { TraitVector } from '../profile/types.js'
import type { MemoryEntry } from './types.js'

export interface PromptContext {
  memories: MemoryEntry[]
  profileSummary: string
  tension: number | null
}

/** The caller's prompt first, then relevant memories, then the live state. */
export function enhancePrompt(prompt: string, context: PromptContext): string {
  const parts: string[] = [prompt.trimEnd()]

  if (context.memories.length > 0) {
    parts.push('')
    parts.push('Relevant Context:')
    for (const memory of context.memories) {
      parts.push(`- ${memory.content}`)
    }
  }

  if (context.profileSummary.length > 0) {
    parts.push('')
    parts.push('Psychological State:')
    parts.push(context.profileSummary)
  }

  if (context.tension !== null) {
    parts.push('')
    parts.push(`Current Tension: ${context.tension.toFixed(2)}`)
  }

  return parts.join('\n')
}

export function buildRetryPrompt(prompt: string, missing: string[]): string {
  return `Previous attempt did not meet requirements. Please ensure the response includes: ${missing.join(', ')}\n\n${prompt}`
}

/** Required elements the content lacks, in the order given. Case-sensitive. */
export function findMissingElements(content: string, requiredElements: string[]): string[] {
  return requiredElements.filter(element => !content.includes(element))
}

function traitLines(traits: TraitVector): string[] {
  return [
    `Fear Level: ${traits.fear.toFixed(2)}`,
    `Obsession Level: ${traits.obsession.toFixed(2)}`,
    `Aggression Level: ${traits.aggression.toFixed(2)}`
  ]
}

export interface RoomPromptParams {
  archetype: string
  theme: string
  level: number
  traits?: TraitVector
}

export function buildRoomPrompt(params: RoomPromptParams): string {
  const parts: string[] = []
  parts.push(`Generate a psychological horror description for a room in level ${params.level}.`)
  parts.push(`Level theme: ${params.theme}`)
  parts.push(`Room archetype: ${params.archetype}`)
  parts.push(`Mention the room as "${params.archetype.toLowerCase()}" and the theme as "${params.theme.toLowerCase()}" in the text.`)

  if (params.traits) {
    parts.push('')
    parts.push('Player:')
    parts.push(...traitLines(params.traits))
  }

  return parts.join('\n')
}

export function buildEventPrompt(context: string, traits: TraitVector): string {
  const parts: string[] = []
  parts.push('Generate a subtle psychological horror event based on the following context:')
  parts.push(context)
  parts.push('')
  parts.push('Player:')
  parts.push(...traitLines(traits))
  parts.push('')
  parts.push('Keep it small and deniable: a sound, a detail out of place, a feeling of being watched. Two or three sentences.')
  return parts.join('\n')
}

export type ImpactKind = 'paranoia_induction' | 'reality_distortion'

export function buildImpactPrompt(kind: ImpactKind, tension: number, traits: TraitVector): string {
  const parts: string[] = []
  if (kind === 'paranoia_induction') {
    parts.push('Describe a moment that makes the player doubt they are alone.')
    parts.push('The atmosphere grows heavy with tension. Something is aware of them, but never seen directly.')
  } else {
    parts.push('Describe the room subtly distorting around the player.')
    parts.push('Reality begins to waver: proportions drift, a doorway is not where it was.')
  }
  parts.push('')
  parts.push(`Intensity: ${tension.toFixed(2)}`)
  parts.push(...traitLines(traits))
  parts.push('')
  parts.push('Second person, present tense, under 80 words.')
  return parts.join('\n')
}

export function buildManifestationPrompt(params: {
  traits: TraitVector
  fixations: string[]
  tension: number
}): string {
  const parts: string[] = []
  parts.push('The room twists impossibly and the player\'s fears take physical form.')
  parts.push('Describe the manifestation that appears, shaped by what this player dreads most.')
  parts.push('')
  parts.push(...traitLines(params.traits))
  if (params.fixations.length > 0) {
    parts.push(`The player keeps returning to: ${params.fixations.join(', ')}`)
  }
  parts.push(`Intensity: ${params.tension.toFixed(2)}`)
  parts.push('')
  parts.push('Second person, present tense, one paragraph.')
  return parts.join('\n')
}

const HIGH_TENSION_DESCRIPTIONS: Record<string, string> = {
  paranoia: 'The air grows thick with paranoid energy...',
  fear: 'Terror seeps into your bones...',
  psychological: 'Your mind strains against reality...',
  manifestation: 'The darkness itself seems to watch...'
}

export function highTensionDescription(source: string): string {
  return HIGH_TENSION_DESCRIPTIONS[source.toLowerCase()] ?? 'Tension reaches a breaking point...'
}
