import type { ShapeCurve } from './curve.js'

export type Severity = 'subtle' | 'moderate' | 'intense'

export interface TensionEvent {
  source: string
  amount: number
  startTime: number
  duration: number
  curve: ShapeCurve
}

export interface TensionPeak {
  value: number
  time: number
}

export interface TensionStateView {
  current: number
  target: number
  velocity: number
  multiplier: number
  intensityMultiplier: number
  sourceContributions: Record<string, number>
  activeEventCount: number
  history: number[]
  peaks: TensionPeak[]
  time: number
  nextEventIn: number
}

export type SeverityListener = (severity: Severity, tension: number) => void | Promise<void>
export type HighTensionListener = (source: string, tension: number) => void | Promise<void>
