import { clamp, clamp01, lerp, mean, smoothDamp } from '../util/math.js'
import { RingBuffer } from '../util/ring-buffer.js'
import { curveForAmount, eventDuration } from './curve.js'
import type { TraitVector } from '../profile/types.js'
import type {
  HighTensionListener,
  Severity,
  SeverityListener,
  TensionEvent,
  TensionPeak,
  TensionStateView
} from './types.js'

export const MIN_TENSION = 0.1
export const HISTORY_LENGTH = 10
export const PEAK_CAPACITY = 3
export const PEAK_MARGIN = 0.2
export const MAX_ACTIVE_EVENTS = 5
export const HIGH_TENSION_THRESHOLD = 0.8

const LOW_TENSION_INTERVAL = 45
const HIGH_TENSION_INTERVAL = 15
const INTERVAL_JITTER = 0.2

export type PacingTraits = Pick<TraitVector, 'fear' | 'obsession' | 'aggression'>

export function severityFor(tension: number): Severity {
  if (tension < 0.3) return 'subtle'
  if (tension < 0.7) return 'moderate'
  return 'intense'
}

export function idealTension(traits: PacingTraits): number {
  return clamp(traits.fear * 0.4 + traits.obsession * 0.3 + traits.aggression * 0.3, 0.2, 0.8)
}

export interface TensionDirectorOptions {
  baseDecayRate?: number
  smoothTime?: number
  /** Read on every tick to scale the target; null means no scaling. */
  traits?: () => PacingTraits | null
  random?: () => number
}

/**
 * Paces the session. `tick` must be called once per fixed host step with the
 * step length in seconds; it never throws.
 */
export class TensionDirector {
  private current: number = MIN_TENSION
  private target: number = MIN_TENSION
  private velocity: number = 0
  private multiplier: number = 1
  private intensityMultiplier: number = 1
  private baseDecayRate: number
  private readonly smoothTime: number

  private sources: Map<string, number> = new Map()
  private events: TensionEvent[] = []
  private history = new RingBuffer<number>(HISTORY_LENGTH)
  private peaks = new RingBuffer<TensionPeak>(PEAK_CAPACITY)

  private time: number = 0
  private sinceLastEvent: number = 0
  private nextEventThreshold: number

  private readonly readTraits: () => PacingTraits | null
  private readonly random: () => number
  private severityListeners: SeverityListener[] = []
  private highTensionListeners: HighTensionListener[] = []

  constructor(options: TensionDirectorOptions = {}) {
    this.baseDecayRate = clamp(options.baseDecayRate ?? 0.02, 0.01, 0.1)
    this.smoothTime = options.smoothTime ?? 2
    this.readTraits = options.traits ?? (() => null)
    this.random = options.random ?? Math.random
    this.nextEventThreshold = this.rollEventThreshold()
  }

  onSeverity(listener: SeverityListener): void {
    this.severityListeners.push(listener)
  }

  removeSeverityListener(listener: SeverityListener): void {
    this.severityListeners = this.severityListeners.filter(l => l !== listener)
  }

  onHighTension(listener: HighTensionListener): void {
    this.highTensionListeners.push(listener)
  }

  removeHighTensionListener(listener: HighTensionListener): void {
    this.highTensionListeners = this.highTensionListeners.filter(l => l !== listener)
  }

  modifyTension(amount: number, source: string): TensionEvent {
    if (!Number.isFinite(amount)) {
      throw new RangeError(`Tension amount must be finite, got ${amount}`)
    }

    const event: TensionEvent = {
      source,
      amount: amount * this.intensityMultiplier,
      startTime: this.time,
      duration: eventDuration(amount),
      curve: curveForAmount(amount)
    }

    this.events.push(event)
    if (this.events.length > MAX_ACTIVE_EVENTS) {
      this.events.shift()
    }

    this.sources.set(source, clamp01((this.sources.get(source) ?? 0) + amount))

    if (this.current > HIGH_TENSION_THRESHOLD) {
      for (const listener of this.highTensionListeners) {
        this.notify(() => listener(source, this.current), 'high-tension listener')
      }
    }

    return event
  }

  tick(deltaTime: number): void {
    if (!Number.isFinite(deltaTime) || deltaTime <= 0) return
    this.time += deltaTime

    // 1. Linear source decay
    let sourceTotal = 0
    for (const [source, value] of this.sources) {
      const decayed = Math.max(0, value - this.baseDecayRate * deltaTime)
      this.sources.set(source, decayed)
      sourceTotal += decayed
    }

    // 2. Shaped event contributions
    let eventTotal = 0
    try {
      eventTotal = this.evaluateEvents()
    } catch (e) {
      console.error('[tension] event evaluation failed, no event contribution this tick:', e)
    }

    // 3. Target, scaled by the dominant trait
    this.multiplier = this.traitMultiplier()
    this.target = clamp01((sourceTotal + eventTotal) * this.multiplier)

    // 4. Critically damped follow
    const step = smoothDamp(this.current, this.target, this.velocity, this.smoothTime, deltaTime)
    this.current = clamp01(step.value)
    this.velocity = step.velocity

    // 5. Peaks against the rolling window
    this.recordSample(this.current)

    // 6. Scheduled content event
    this.sinceLastEvent += deltaTime
    if (this.sinceLastEvent >= this.nextEventThreshold) {
      this.fireScheduledEvent()
      this.sinceLastEvent = 0
      this.nextEventThreshold = this.rollEventThreshold()
    }
  }

  private evaluateEvents(): number {
    this.events = this.events.filter(evt => this.time - evt.startTime <= evt.duration)

    let total = 0
    for (const evt of this.events) {
      const progress = (this.time - evt.startTime) / evt.duration
      const impact = evt.curve.evaluate(progress) * evt.amount
      if (!Number.isFinite(impact)) {
        throw new RangeError(`Event from "${evt.source}" produced ${impact}`)
      }
      total += impact
    }
    return total
  }

  private traitMultiplier(): number {
    let traits: PacingTraits | null
    try {
      traits = this.readTraits()
    } catch (e) {
      console.error('[tension] failed to read profile traits:', e)
      return 1
    }
    if (!traits) return 1

    const dominant = Math.max(traits.fear, traits.obsession, traits.aggression)
    if (!Number.isFinite(dominant)) {
      console.error(`[tension] ignoring non-finite trait reading ${dominant}`)
      return 1
    }
    return 1 + 0.5 * clamp01(dominant)
  }

  private recordSample(value: number): void {
    if (this.history.size > 0 && value > mean(this.history.toArray()) + PEAK_MARGIN) {
      this.peaks.push({ value, time: this.time })
    }
    this.history.push(value)
  }

  private fireScheduledEvent(): void {
    const severity = severityFor(this.current)
    const tension = this.current
    for (const listener of this.severityListeners) {
      this.notify(() => listener(severity, tension), `${severity} severity listener`)
    }
  }

  private notify(call: () => void | Promise<void>, label: string): void {
    try {
      const result = call()
      if (result instanceof Promise) {
        result.catch(e => console.error(`[tension] ${label} failed:`, e))
      }
    } catch (e) {
      console.error(`[tension] ${label} failed:`, e)
    }
  }

  private rollEventThreshold(): number {
    const base = lerp(LOW_TENSION_INTERVAL, HIGH_TENSION_INTERVAL, this.current)
    const jitter = 1 - INTERVAL_JITTER + this.random() * INTERVAL_JITTER * 2
    return base * jitter
  }

  /** Scale future event amounts toward the tension the profile calls for. */
  adjustPacing(traits: PacingTraits): void {
    const ideal = idealTension(traits)
    if (Math.abs(this.current - ideal) > 0.3) {
      this.intensityMultiplier = this.current < ideal ? 1.5 : 0.7
    } else {
      this.intensityMultiplier = 1
    }
  }

  setDecayRate(rate: number): void {
    this.baseDecayRate = clamp(rate, 0.01, 0.1)
  }

  reset(): void {
    this.current = MIN_TENSION
    this.target = MIN_TENSION
    this.velocity = 0
    this.multiplier = 1
    this.intensityMultiplier = 1
    this.sources.clear()
    this.events = []
    this.history.clear()
    this.peaks.clear()
    this.sinceLastEvent = 0
    this.nextEventThreshold = this.rollEventThreshold()
  }

  // --- Reads ---

  getCurrentTension(): number {
    return this.current
  }

  getTargetTension(): number {
    return this.target
  }

  getSourceContribution(source: string): number {
    return this.sources.get(source) ?? 0
  }

  getActiveEvents(): TensionEvent[] {
    return this.events.map(evt => ({ ...evt }))
  }

  getPeaks(): TensionPeak[] {
    return this.peaks.toArray()
  }

  getIntensityMultiplier(): number {
    return this.intensityMultiplier
  }

  getState(): TensionStateView {
    return {
      current: this.current,
      target: this.target,
      velocity: this.velocity,
      multiplier: this.multiplier,
      intensityMultiplier: this.intensityMultiplier,
      sourceContributions: Object.fromEntries(this.sources),
      activeEventCount: this.events.length,
      history: this.history.toArray(),
      peaks: this.getPeaks(),
      time: this.time,
      nextEventIn: Math.max(0, this.nextEventThreshold - this.sinceLastEvent)
    }
  }
}
