import { describe, it, expect, vi, afterEach } from 'vitest'
import { TensionDirector, MAX_ACTIVE_EVENTS, MIN_TENSION, idealTension, severityFor } from '../director.js'
import type { Severity } from '../types.js'

function tickFor(director: TensionDirector, seconds: number, step: number): void {
  const steps = Math.round(seconds / step)
  for (let i = 0; i < steps; i++) director.tick(step)
}

describe('TensionDirector', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('starts at the minimum tension', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    expect(director.getCurrentTension()).toBe(MIN_TENSION)
    expect(director.getTargetTension()).toBe(MIN_TENSION)
  })

  it('rises monotonically toward the target without passing it', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    director.modifyTension(0.5, 'event_A')

    let previous = director.getCurrentTension()
    for (let i = 0; i < 20; i++) {
      director.tick(0.1)
      const current = director.getCurrentTension()
      expect(current).toBeGreaterThan(previous)
      expect(current).toBeLessThanOrEqual(director.getTargetTension())
      previous = current
    }
  })

  it('keeps current and target in [0,1] under heavy stimulus', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    for (let i = 0; i < 10; i++) director.modifyTension(1, `source-${i}`)
    for (let i = 0; i < 200; i++) {
      director.tick(0.1)
      expect(director.getCurrentTension()).toBeLessThanOrEqual(1)
      expect(director.getTargetTension()).toBeLessThanOrEqual(1)
      expect(director.getCurrentTension()).toBeGreaterThanOrEqual(0)
    }
  })

  it('scales the target by the dominant trait', () => {
    const calm = new TensionDirector({ random: () => 0.5 })
    const afraid = new TensionDirector({ random: () => 0.5, traits: () => ({ fear: 1, obsession: 0, aggression: 0 }) })
    calm.modifyTension(0.2, 'noise')
    afraid.modifyTension(0.2, 'noise')
    calm.tick(0.1)
    afraid.tick(0.1)
    expect(afraid.getTargetTension()).toBeCloseTo(calm.getTargetTension() * 1.5)
    expect(afraid.getState().multiplier).toBe(1.5)
  })

  it('decays source contributions linearly at the clamped rate', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    director.setDecayRate(5)
    director.modifyTension(0.5, 'noise')
    director.tick(1)
    expect(director.getSourceContribution('noise')).toBeCloseTo(0.4)
  })

  it('keeps at most five active events, dropping the oldest', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    for (let i = 0; i < MAX_ACTIVE_EVENTS + 2; i++) director.modifyTension(0.1, `e${i}`)
    expect(director.getActiveEvents().map(e => e.source)).toEqual(['e2', 'e3', 'e4', 'e5', 'e6'])
  })

  it('prunes events once their duration has passed', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    director.modifyTension(0.1, 'blip')
    director.tick(5)
    expect(director.getActiveEvents()).toHaveLength(1)
    director.tick(2)
    expect(director.getActiveEvents()).toHaveLength(0)
  })

  it('rejects a non-finite amount', () => {
    const director = new TensionDirector()
    expect(() => director.modifyTension(Number.NaN, 'x')).toThrow(RangeError)
    expect(director.getActiveEvents()).toHaveLength(0)
  })

  it('ignores non-positive and non-finite time steps', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    director.tick(0)
    director.tick(-1)
    director.tick(Number.NaN)
    expect(director.getState().time).toBe(0)
  })

  it('records a peak when tension jumps above the recent average', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    tickFor(director, 1, 0.1)
    expect(director.getPeaks()).toHaveLength(0)

    director.modifyTension(1, 'scream')
    director.tick(2)
    const peaks = director.getPeaks()
    expect(peaks).toHaveLength(1)
    expect(peaks[0].value).toBe(director.getCurrentTension())
  })

  it('fires a subtle event once the interval elapses at low tension', () => {
    const director = new TensionDirector({ random: () => 0 })
    const listener = vi.fn()
    director.onSeverity(listener)

    // lerp(45, 15, 0.1) * 0.8
    expect(director.getState().nextEventIn).toBeCloseTo(33.6)
    director.tick(30)
    expect(listener).not.toHaveBeenCalled()
    director.tick(4)
    expect(listener).toHaveBeenCalledOnce()
    expect(listener.mock.calls[0][0]).toBe('subtle')
  })

  it('fires a moderate event at middling tension', () => {
    const director = new TensionDirector({ random: () => 0 })
    const severities: Severity[] = []
    director.onSeverity(severity => { severities.push(severity) })
    director.setDecayRate(0.01)
    director.modifyTension(0.9, 'dread')

    tickFor(director, 34, 0.5)
    expect(severities).toEqual(['moderate'])
  })

  it('fires an intense event at high tension', () => {
    const director = new TensionDirector({ random: () => 0 })
    const severities: Severity[] = []
    director.onSeverity(severity => { severities.push(severity) })
    director.setDecayRate(0.01)
    director.modifyTension(1, 'a')
    director.modifyTension(1, 'b')

    tickFor(director, 34, 0.5)
    expect(severities).toEqual(['intense'])
  })

  it('keeps ticking when a listener throws or rejects', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const director = new TensionDirector({ random: () => 0 })
    const survivor = vi.fn()
    director.onSeverity(() => { throw new Error('renderer offline') })
    director.onSeverity(async () => { throw new Error('backend offline') })
    director.onSeverity(survivor)

    expect(() => director.tick(40)).not.toThrow()
    expect(survivor).toHaveBeenCalledOnce()

    await Promise.resolve()
    expect(errorSpy).toHaveBeenCalledTimes(2)
    expect(director.getState().time).toBe(40)
  })

  it('keeps ticking when the trait reader fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const director = new TensionDirector({
      random: () => 0.5,
      traits: () => { throw new Error('profile locked') }
    })
    director.modifyTension(0.3, 'noise')
    expect(() => director.tick(0.1)).not.toThrow()
    expect(director.getState().multiplier).toBe(1)
  })

  it('notifies high-tension listeners only above 0.8', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    const listener = vi.fn()
    director.onHighTension(listener)

    director.modifyTension(1, 'a')
    director.modifyTension(1, 'b')
    expect(listener).not.toHaveBeenCalled()

    tickFor(director, 10, 0.1)
    expect(director.getCurrentTension()).toBeGreaterThan(0.8)
    director.modifyTension(0.1, 'fear')
    expect(listener).toHaveBeenCalledWith('fear', director.getCurrentTension())
  })

  it('adjusts pacing toward the ideal tension', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    director.adjustPacing({ fear: 1, obsession: 1, aggression: 1 })
    expect(director.getIntensityMultiplier()).toBe(1.5)
    expect(director.modifyTension(0.2, 'x').amount).toBeCloseTo(0.3)

    director.adjustPacing({ fear: 0, obsession: 0, aggression: 0 })
    expect(director.getIntensityMultiplier()).toBe(1)
  })

  it('resets to its initial state', () => {
    const director = new TensionDirector({ random: () => 0.5 })
    director.modifyTension(0.8, 'x')
    tickFor(director, 2, 0.1)
    director.reset()
    expect(director.getCurrentTension()).toBe(MIN_TENSION)
    expect(director.getActiveEvents()).toEqual([])
    expect(director.getSourceContribution('x')).toBe(0)
    expect(director.getState().history).toEqual([])
  })
})

describe('severityFor', () => {
  it('bands tension at 0.3 and 0.7', () => {
    expect(severityFor(0.29)).toBe('subtle')
    expect(severityFor(0.3)).toBe('moderate')
    expect(severityFor(0.69)).toBe('moderate')
    expect(severityFor(0.7)).toBe('intense')
  })
})

describe('idealTension', () => {
  it('weights fear highest and clamps to [0.2, 0.8]', () => {
    expect(idealTension({ fear: 0.5, obsession: 0.5, aggression: 0.5 })).toBeCloseTo(0.5)
    expect(idealTension({ fear: 0, obsession: 0, aggression: 0 })).toBe(0.2)
    expect(idealTension({ fear: 1, obsession: 1, aggression: 1 })).toBe(0.8)
  })
})
