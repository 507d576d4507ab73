import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync, unlinkSync } from 'fs'
import { Director } from '../director.js'
import type { DirectorContent } from '../director.js'
import { createDirectorContext } from '../context.js'
import { DEFAULT_CONFIG } from '../../config.js'
import type { DirectorConfig } from '../../config.js'
import { Database } from '../../storage/database.js'
import type { ImageCall, TextCall } from '../../generation/backend.js'

const TEST_DB = '/tmp/dread-director-session-test.db'

function removeTestDb(): void {
  for (const file of [TEST_DB, `${TEST_DB}-wal`, `${TEST_DB}-shm`]) {
    if (existsSync(file)) unlinkSync(file)
  }
}

function stubBackend(reply: (call: TextCall) => string | Promise<string>) {
  return {
    generateText: vi.fn(async (call: TextCall): Promise<string> => reply(call)),
    generateImage: vi.fn(async (_call: ImageCall) => ({ base64: '', mediaType: 'image/png' }))
  }
}

function setup(
  reply: (call: TextCall) => string | Promise<string>,
  options: { random?: number; db?: Database; configure?: (config: DirectorConfig) => void } = {}
) {
  const config = structuredClone(DEFAULT_CONFIG)
  options.configure?.(config)
  const backend = stubBackend(reply)
  const context = createDirectorContext({
    config,
    backend,
    db: options.db ?? null,
    random: () => options.random ?? 0.5
  })
  const director = new Director(context)
  const contents: DirectorContent[] = []
  director.onContent(content => { contents.push(content) })
  return { director, context, backend, contents }
}

function tickFor(director: Director, seconds: number, step: number): void {
  const steps = Math.round(seconds / step)
  for (let i = 0; i < steps; i++) director.tick(step)
}

describe('Director', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    removeTestDb()
  })

  describe('handleAction', () => {
    it('turns an observation into paranoia tension', () => {
      const { director, context } = setup(() => 'unused')

      const outcome = director.handleAction('observe', 'shadow')

      expect(outcome.stimuli).toEqual([{ source: 'paranoia', amount: 0.1 }])
      expect(outcome.analysis).toBeNull()
      expect(outcome.snapshot.action).toBe('observe')
      expect(context.tension.getSourceContribution('paranoia')).toBeCloseTo(0.1)
      expect(context.profile.getChoiceFrequencies()).toEqual({ observe: 1 })
    })

    it('turns an impossible perception into psychological tension', () => {
      const { director } = setup(() => 'unused')
      const outcome = director.handleAction('touch', 'reflection in the mirror')
      expect(outcome.stimuli).toEqual([{ source: 'psychological', amount: 0.15 }])
    })

    it('turns confrontation into aggression tension', () => {
      const { director } = setup(() => 'unused')
      const outcome = director.handleAction('kick', 'door')
      expect(outcome.stimuli).toEqual([{ source: 'aggression', amount: 0.1 }])
    })

    it('leaves tension alone for a neutral action', () => {
      const { director, context } = setup(() => 'unused')
      expect(director.handleAction('walk', 'hall').stimuli).toEqual([])
      expect(context.tension.getActiveEvents()).toEqual([])
    })
  })

  describe('profile analysis', () => {
    it('runs on the configured interval and blends the reply into the traits', async () => {
      const { director, context, backend } = setup(() => '{"fear": 0.9, "obsession": 0.2, "aggression": 0.1}')

      for (let i = 0; i < 4; i++) {
        expect(director.handleAction('walk', 'hall').analysis).toBeNull()
      }
      const outcome = director.handleAction('walk', 'hall')
      expect(outcome.analysis).not.toBeNull()

      const analysis = await outcome.analysis
      expect(analysis).toEqual({ fear: 0.9, obsession: 0.2, aggression: 0.1 })

      const traits = context.profile.getTraits()
      expect(traits.fear).toBeCloseTo(0.27)
      expect(traits.obsession).toBeCloseTo(0.06)
      expect(traits.aggression).toBeCloseTo(0.03)

      expect(backend.generateText.mock.calls[0][0].model).toBe(DEFAULT_CONFIG.llm.analysisModel)
    })

    it('raises tension and brings on a manifestation when a trait moves sharply', async () => {
      const { director, context, backend, contents } = setup(call =>
        call.model === DEFAULT_CONFIG.llm.analysisModel
          ? '{"fear": 0.9, "obsession": 0.2, "aggression": 0.1}'
          : 'Your reflection steps out of the mirror.'
      )

      await director.analyzeProfile()

      const shift = context.tension.getActiveEvents().find(e => e.source === 'psychological_shift')
      expect(shift?.amount).toBeCloseTo(0.9)

      expect(backend.generateText).toHaveBeenCalledTimes(2)
      expect(backend.generateText.mock.calls[1][0].model).toBe(DEFAULT_CONFIG.llm.creativeModel)
      expect(contents).toHaveLength(1)
      expect(contents[0]).toMatchObject({
        source: 'manifestation',
        content: 'Your reflection steps out of the mirror.',
        ok: true
      })
      expect(contents[0].severity).toBeUndefined()
    })

    it('brings on no manifestation for a small shift', async () => {
      const { director, context, backend, contents } = setup(() => '{"fear": 0.1, "obsession": 0.1, "aggression": 0.1}')

      await director.analyzeProfile()

      expect(backend.generateText).toHaveBeenCalledOnce()
      expect(contents).toEqual([])
      expect(context.tension.getActiveEvents()).toEqual([])
    })

    it('resolves a failed analysis to null instead of rejecting', async () => {
      const { director, context } = setup(() => '{"fear": 0.9, "obsession": 0.2, "aggression": 0.1}', {
        configure: config => { config.profile.analysisInterval = 1 }
      })
      vi.spyOn(context.profile, 'summary').mockImplementation(() => { throw new Error('summary unavailable') })

      const outcome = director.handleAction('walk', 'hall')

      await expect(outcome.analysis).resolves.toBeNull()
      expect(console.error).toHaveBeenCalledWith('[director] profile analysis failed:', expect.any(Error))
      expect(context.profile.getTraits().fear).toBe(0)
    })

    it('leaves the profile untouched when the reply is malformed', async () => {
      const { director, context } = setup(() => 'The player seems scared.')

      const result = await director.analyzeProfile()

      expect(result).toBeNull()
      expect(context.profile.getTraits()).toEqual({ fear: 0, obsession: 0, aggression: 0, curiosity: 0 })
      expect(context.tension.getActiveEvents()).toEqual([])
    })

    it('rejects an out-of-range analysis without applying any of it', async () => {
      const { director, context } = setup(() => '{"fear": 1.4, "obsession": 0.2, "aggression": 0.1}')

      expect(await director.analyzeProfile()).toBeNull()
      expect(context.profile.getTraits().obsession).toBe(0)
    })

    it('defers a new analysis while one is still running', async () => {
      let release: (value: string) => void = () => {}
      const gate = new Promise<string>(resolve => { release = resolve })
      const { director, backend } = setup(() => gate, {
        configure: config => { config.profile.analysisInterval = 1 }
      })

      const first = director.handleAction('walk', 'hall')
      const second = director.handleAction('walk', 'stairs')

      expect(first.analysis).not.toBeNull()
      expect(second.analysis).toBeNull()
      expect(console.log).toHaveBeenCalledWith('[director] analysis still running, deferring')

      release('{"fear": 0.1, "obsession": 0.1, "aggression": 0.1}')
      await first.analysis
      expect(backend.generateText).toHaveBeenCalledOnce()

      expect(director.handleAction('walk', 'cellar').analysis).not.toBeNull()
    })
  })

  describe('describeRoom', () => {
    it('requires the archetype and theme in the description', async () => {
      const { director, backend, contents } = setup(() => 'The library smells of the drowned archive.')

      const content = await director.describeRoom({ archetype: 'Library', theme: 'Drowned Archive', level: 2 })

      expect(content).toMatchObject({
        source: 'room_description',
        content: 'The library smells of the drowned archive.',
        ok: true
      })
      expect(content.severity).toBeUndefined()
      expect(contents).toEqual([content])

      const call = backend.generateText.mock.calls[0][0]
      expect(call.model).toBe(DEFAULT_CONFIG.llm.creativeModel)
      expect(call.prompt.split('\n').slice(0, 3)).toEqual([
        'Generate a psychological horror description for a room in level 2.',
        'Level theme: Drowned Archive',
        'Room archetype: Library'
      ])
    })

    it('reports a description that never names the room', async () => {
      const { director, backend } = setup(() => 'A quiet room.')

      const content = await director.describeRoom({ archetype: 'Library', theme: 'Drowned Archive', level: 1 })

      expect(content.ok).toBe(false)
      expect(content.content).toBe('A quiet room.')
      expect(backend.generateText).toHaveBeenCalledTimes(2)
    })

    it('emits an empty result when the backend keeps failing', async () => {
      const { director, contents } = setup(() => { throw new Error('503 Service Unavailable') })

      const content = await director.describeRoom({ archetype: 'Cellar', theme: 'Rot', level: 1 })

      expect(content).toMatchObject({ source: 'room_description', content: '', ok: false })
      expect(contents).toHaveLength(1)
    })
  })

  describe('scheduled events', () => {
    it('produces a subtle event at low tension', async () => {
      const { director, backend, contents } = setup(() => 'A floorboard creaks behind you.', { random: 0 })

      director.tick(40)

      await vi.waitFor(() => expect(contents).toHaveLength(1))
      expect(contents[0]).toMatchObject({
        source: 'event_generation',
        severity: 'subtle',
        content: 'A floorboard creaks behind you.',
        ok: true
      })
      expect(backend.generateText.mock.calls[0][0].prompt.split('\n').slice(0, 2)).toEqual([
        'Generate a subtle psychological horror event based on the following context:',
        'The player is somewhere unremarkable.'
      ])
    })

    it('produces a reality distortion at middling tension when fear does not dominate', async () => {
      const { director, context, backend, contents } = setup(() => 'The doorway has drifted to the left.', {
        random: 0,
        configure: config => { config.tension.baseDecayRate = 0.01 }
      })
      context.tension.modifyTension(0.9, 'dread')

      tickFor(director, 34, 0.5)

      await vi.waitFor(() => expect(contents).toHaveLength(1))
      expect(contents[0]).toMatchObject({ source: 'psychological_impact', severity: 'moderate', ok: true })
      expect(backend.generateText.mock.calls[0][0].prompt).toContain('Reality begins to waver')
    })

    it('produces a manifestation at high tension and then relieves it', async () => {
      const { director, context, contents } = setup(() => 'Your own silhouette peels off the wall.', {
        random: 0,
        configure: config => { config.tension.baseDecayRate = 0.01 }
      })
      context.tension.modifyTension(1, 'a')
      context.tension.modifyTension(1, 'b')

      tickFor(director, 34, 0.5)

      await vi.waitFor(() => {
        expect(context.tension.getActiveEvents().some(e => e.source === 'post_intense_event')).toBe(true)
      })
      const manifestation = contents.find(c => c.source === 'manifestation')
      expect(manifestation).toMatchObject({ severity: 'intense', content: 'Your own silhouette peels off the wall.' })
      expect(context.tension.getSourceContribution('post_intense_event')).toBe(0)
    })

    it('stops producing content once disposed', () => {
      const { director, backend, contents } = setup(() => 'unused', { random: 0 })

      director.dispose()
      director.tick(40)

      expect(backend.generateText).not.toHaveBeenCalled()
      expect(contents).toEqual([])
    })
  })

  describe('high tension', () => {
    it('raises fear and emits a description named for the source', () => {
      const { director, context, contents } = setup(() => 'unused')
      context.tension.modifyTension(1, 'a')
      context.tension.modifyTension(1, 'b')
      for (let i = 0; i < 100; i++) context.tension.tick(0.1)
      expect(context.tension.getCurrentTension()).toBeGreaterThan(0.8)

      director.handleAction('observe', 'shadow')

      expect(context.profile.getTraits().fear).toBeCloseTo(0.1)
      expect(contents).toHaveLength(1)
      expect(contents[0]).toMatchObject({
        source: 'high_tension',
        content: 'The air grows thick with paranoid energy...',
        ok: true
      })
    })
  })

  describe('session', () => {
    it('returns false for save and load without a store', () => {
      const { director } = setup(() => 'unused')
      expect(director.save()).toBe(false)
      expect(director.load()).toBe(false)
    })

    it('restores a saved profile into a fresh session', () => {
      removeTestDb()
      const db = new Database(TEST_DB)
      try {
        const first = setup(() => 'unused', { db })
        first.context.profile.nudgeTrait('fear', 0.4)
        for (let i = 0; i < 3; i++) first.director.handleAction('inspect', 'Mirror')
        expect(first.director.save()).toBe(true)

        const second = setup(() => 'unused', { db })
        expect(second.director.load()).toBe(true)
        expect(second.context.profile.getTraits().fear).toBeCloseTo(0.4)
        expect(second.context.profile.getChoiceFrequencies()).toEqual({ inspect: 3 })
        expect(second.context.profile.getActiveObsessions()).toEqual(['mirror'])
      } finally {
        db.close()
      }
    })

    it('logs generation outcomes to the store', async () => {
      removeTestDb()
      const db = new Database(TEST_DB)
      try {
        const { director } = setup(() => 'The cellar hums with rot.', { db })
        await director.describeRoom({ archetype: 'Cellar', theme: 'Rot', level: 1 })

        const [entry] = db.getGenerationLog(1)
        expect(entry).toMatchObject({ kind: 'text', contextType: 'room_description', status: 'ok', attempts: 1 })
      } finally {
        db.close()
      }
    })

    it('resets profile and tension', () => {
      const { director } = setup(() => 'unused')
      director.handleAction('observe', 'shadow')

      director.reset()

      const status = director.status()
      expect(status.profile.choiceFrequencies).toEqual({})
      expect(status.tension.current).toBe(0.1)
      expect(status.tension.sourceContributions).toEqual({})
      expect(status.generation.queueDepth).toBe(0)
    })
  })
})
