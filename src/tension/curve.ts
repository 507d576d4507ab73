export interface Keyframe {
  time: number
  value: number
  inTangent?: number
  outTangent?: number
}

/**
 * Piecewise cubic Hermite curve over keyframes. Missing tangents are flat.
 * Inputs outside the key range clamp to the first or last key.
 */
export class ShapeCurve {
  private readonly keys: Keyframe[]

  constructor(keys: Keyframe[]) {
    if (keys.length === 0) {
      throw new Error('ShapeCurve needs at least one keyframe')
    }
    this.keys = [...keys].sort((a, b) => a.time - b.time)
  }

  evaluate(t: number): number {
    if (!Number.isFinite(t)) {
      throw new RangeError(`Cannot evaluate curve at ${t}`)
    }

    const first = this.keys[0]
    const last = this.keys[this.keys.length - 1]
    if (t <= first.time) return first.value
    if (t >= last.time) return last.value

    let i = 0
    while (i < this.keys.length - 2 && t > this.keys[i + 1].time) i++

    const k0 = this.keys[i]
    const k1 = this.keys[i + 1]
    const dt = k1.time - k0.time
    if (dt <= 0) return k1.value

    const s = (t - k0.time) / dt
    const s2 = s * s
    const s3 = s2 * s

    const h00 = 2 * s3 - 3 * s2 + 1
    const h10 = s3 - 2 * s2 + s
    const h01 = -2 * s3 + 3 * s2
    const h11 = s3 - s2

    return h00 * k0.value +
      h10 * dt * (k0.outTangent ?? 0) +
      h01 * k1.value +
      h11 * dt * (k1.inTangent ?? 0)
  }
}

// Quick rise, held plateau, fall at the end
export function escalationCurve(): ShapeCurve {
  return new ShapeCurve([
    { time: 0, value: 0, inTangent: 2, outTangent: 2 },
    { time: 0.3, value: 0.8 },
    { time: 0.7, value: 0.9 },
    { time: 1, value: 0, inTangent: -0.5, outTangent: -0.5 }
  ])
}

// Gradual relief: positive shape, the negative amount supplies the sign
export function reliefCurve(): ShapeCurve {
  return new ShapeCurve([
    { time: 0, value: 0, inTangent: 0.5, outTangent: 0.5 },
    { time: 0.5, value: 1 },
    { time: 1, value: 0, inTangent: -0.5, outTangent: -0.5 }
  ])
}

export function curveForAmount(amount: number): ShapeCurve {
  return amount >= 0 ? escalationCurve() : reliefCurve()
}

export function eventDuration(amount: number): number {
  return 5 + 10 * Math.min(1, Math.abs(amount))
}
