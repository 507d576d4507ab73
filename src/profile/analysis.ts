import { z } from 'zod'
import { ProfileAnalysisError, ProfileStateError } from '../errors.js'
import type { BehaviorSnapshot, PersistedProfileState, ProfileAnalysis, TraitVector } from './types.js'

const unit = z.number().finite().min(0).max(1)

export const profileAnalysisSchema = z.object({
  fear: unit,
  obsession: unit,
  aggression: unit,
  curiosity: unit.optional(),
  notes: z.string().optional()
})

const traitVectorSchema = z.object({
  fear: unit,
  obsession: unit,
  aggression: unit,
  curiosity: unit
})

export const persistedProfileSchema = z.object({
  traits: traitVectorSchema,
  choiceFrequencies: z.record(z.string(), z.number().int().nonnegative()),
  activeObsessions: z.array(z.string().min(1))
})

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}

// Models often wrap JSON in ```json ... ``` despite being told not to
export function stripCodeFences(text: string): string {
  return text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim()
}

/**
 * Parse an analysis reply. The reply must be a JSON object with `fear`,
 * `obsession` and `aggression` in [0,1], optionally `curiosity` and `notes`.
 * Throws ProfileAnalysisError for anything else.
 */
export function parseProfileAnalysis(raw: string): ProfileAnalysis {
  const cleaned = stripCodeFences(raw)
  if (cleaned.length === 0) {
    throw new ProfileAnalysisError('Analysis reply was empty', raw)
  }

  let json: unknown
  try {
    json = JSON.parse(cleaned)
  } catch {
    throw new ProfileAnalysisError('Analysis reply is not valid JSON', raw)
  }

  const result = profileAnalysisSchema.safeParse(json)
  if (!result.success) {
    throw new ProfileAnalysisError(`Analysis reply failed validation: ${formatIssues(result.error).join('; ')}`, raw)
  }
  return result.data
}

export function validateAnalysis(analysis: ProfileAnalysis): ProfileAnalysis {
  const result = profileAnalysisSchema.safeParse(analysis)
  if (!result.success) {
    throw new ProfileAnalysisError(
      `Analysis failed validation: ${formatIssues(result.error).join('; ')}`,
      JSON.stringify(analysis)
    )
  }
  return result.data
}

export function validatePersistedState(state: unknown): PersistedProfileState {
  const result = persistedProfileSchema.safeParse(state)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ProfileStateError(`Rejected persisted profile state: ${issues.join('; ')}`, issues)
  }
  return result.data
}

export function validateTraits(traits: unknown): TraitVector {
  const result = traitVectorSchema.safeParse(traits)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ProfileStateError(`Rejected trait values: ${issues.join('; ')}`, issues)
  }
  return result.data
}

export function buildAnalysisPrompt(params: {
  traits: TraitVector
  recentBehavior: BehaviorSnapshot[]
  activeObsessions: string[]
}): string {
  const parts: string[] = []

  parts.push('Analyze the psychological state of a player in a psychological horror game, based on their recent actions.')
  parts.push('')

  if (params.recentBehavior.length > 0) {
    parts.push('Recent actions (oldest first):')
    for (const snapshot of params.recentBehavior) {
      parts.push(`- ${snapshot.action}${snapshot.context ? ` -> ${snapshot.context}` : ''}`)
    }
    parts.push('')
  }

  if (params.activeObsessions.length > 0) {
    parts.push(`Recurring fixations: ${params.activeObsessions.join(', ')}`)
    parts.push('')
  }

  parts.push(`Current Fear: ${params.traits.fear.toFixed(2)}`)
  parts.push(`Current Obsession: ${params.traits.obsession.toFixed(2)}`)
  parts.push(`Current Aggression: ${params.traits.aggression.toFixed(2)}`)
  parts.push(`Current Curiosity: ${params.traits.curiosity.toFixed(2)}`)
  parts.push('')
  parts.push('Return JSON only, every number between 0 and 1:')
  parts.push('{ "fear": number, "obsession": number, "aggression": number, "curiosity": number, "notes": string }')

  return parts.join('\n')
}
