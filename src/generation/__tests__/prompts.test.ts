import { describe, it, expect } from 'vitest'
import {
  buildImpactPrompt,
  buildRetryPrompt,
  buildRoomPrompt,
  enhancePrompt,
  findMissingElements,
  highTensionDescription
} from '../prompts.js'

const traits = { fear: 0.6, obsession: 0.2, aggression: 0.1, curiosity: 0.4 }

describe('enhancePrompt', () => {
  it('returns the prompt alone when there is no context', () => {
    expect(enhancePrompt('Describe the room', { memories: [], profileSummary: '', tension: null })).toBe('Describe the room')
  })

  it('appends memories, then profile, then tension', () => {
    const result = enhancePrompt('Describe the room', {
      memories: [{
        id: 'm1',
        contextType: 'room_description',
        content: 'The wallpaper breathes.',
        relevance: 0.8,
        emotionalImpact: 0.5,
        timestamp: new Date('2026-01-01')
      }],
      profileSummary: 'Fear: 0.60',
      tension: 0.456
    })
    expect(result).toBe([
      'Describe the room',
      '',
      'Relevant Context:',
      '- The wallpaper breathes.',
      '',
      'Psychological State:',
      'Fear: 0.60',
      '',
      'Current Tension: 0.46'
    ].join('\n'))
  })
})

describe('findMissingElements', () => {
  it('matches case-sensitively', () => {
    expect(findMissingElements('A Shadow moves', ['shadow', 'moves'])).toEqual(['shadow'])
    expect(findMissingElements('a shadow moves', ['shadow'])).toEqual([])
  })
})

describe('buildRetryPrompt', () => {
  it('states the missing elements before the original prompt', () => {
    expect(buildRetryPrompt('Describe the room', ['shadow', 'mirror'])).toBe(
      'Previous attempt did not meet requirements. Please ensure the response includes: shadow, mirror\n\nDescribe the room'
    )
  })
})

describe('buildRoomPrompt', () => {
  it('names the level, theme and archetype and asks for the lower-cased forms', () => {
    const prompt = buildRoomPrompt({ archetype: 'Nursery', theme: 'Drowned Childhood', level: 3, traits })
    expect(prompt.split('\n').slice(0, 4)).toEqual([
      'Generate a psychological horror description for a room in level 3.',
      'Level theme: Drowned Childhood',
      'Room archetype: Nursery',
      'Mention the room as "nursery" and the theme as "drowned childhood" in the text.'
    ])
    expect(prompt).toContain('Fear Level: 0.60')
  })
})

describe('buildImpactPrompt', () => {
  it('picks the framing by kind', () => {
    expect(buildImpactPrompt('paranoia_induction', 0.5, traits)).toContain('doubt they are alone')
    expect(buildImpactPrompt('reality_distortion', 0.5, traits)).toContain('Reality begins to waver')
  })
})

describe('highTensionDescription', () => {
  it('describes known sources and falls back otherwise', () => {
    expect(highTensionDescription('Paranoia')).toBe('The air grows thick with paranoid energy...')
    expect(highTensionDescription('psychological')).toBe('Your mind strains against reality...')
    expect(highTensionDescription('door_slam')).toBe('Tension reaches a breaking point...')
  })
})
