export type LexicalClass = 'observation' | 'unreality' | 'confrontation'

// Matched against the choice type and target together
export const OBSERVATION_PATTERNS: RegExp[] = [
  /observ/i,
  /caution/i,
  /watch/i,
  /inspect/i,
  /peer/i,
  /listen/i,
  /hide|hiding/i,
  /sneak/i,
]

// Matched against the target only: what the player claims to perceive
export const UNREALITY_PATTERNS: RegExp[] = [
  /impossible/i,
  /unreal/i,
  /shift(ed|ing)? (wall|door|room)/i,
  /wasn't there/i,
  /moved on its own/i,
  /reflection/i,
]

export const CONFRONTATION_PATTERNS: RegExp[] = [
  /attack/i,
  /confront/i,
  /smash|break/i,
  /fight/i,
  /kick/i,
]

export function classifyChoice(choiceType: string, target: string): Set<LexicalClass> {
  const classes = new Set<LexicalClass>()
  const choiceText = `${choiceType} ${target}`

  if (OBSERVATION_PATTERNS.some(p => p.test(choiceText))) {
    classes.add('observation')
  }
  if (UNREALITY_PATTERNS.some(p => p.test(target))) {
    classes.add('unreality')
  }
  if (CONFRONTATION_PATTERNS.some(p => p.test(choiceText))) {
    classes.add('confrontation')
  }

  return classes
}

const SIGNIFICANCE_KEYWORDS = ['significant', 'important', 'crucial', 'vital', 'key', 'critical']

const EMOTIONAL_KEYWORDS: [string, number][] = [
  ['fear', 0.2],
  ['terror', 0.3],
  ['dread', 0.25],
  ['horror', 0.2],
  ['panic', 0.25],
  ['anxiety', 0.15],
]

export function hasSignificanceKeyword(text: string): boolean {
  return SIGNIFICANCE_KEYWORDS.some(k => text.includes(k))
}

export function emotionalKeywordWeight(text: string): number {
  let weight = 0
  for (const [keyword, value] of EMOTIONAL_KEYWORDS) {
    if (text.includes(keyword)) weight += value
  }
  return weight
}
