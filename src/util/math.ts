export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1)
}

export function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * clamp01(t)
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0
  let sum = 0
  for (let i = 0; i < values.length; i++) {
    sum += values[i]
  }
  return sum / values.length
}

export interface SmoothDampResult {
  value: number
  velocity: number
}

/**
 * Critically damped spring toward `target`. Never overshoots the target it
 * was given on this step.
 */
export function smoothDamp(
  current: number,
  target: number,
  velocity: number,
  smoothTime: number,
  deltaTime: number
): SmoothDampResult {
  if (deltaTime <= 0) return { value: current, velocity }

  const time = Math.max(0.0001, smoothTime)
  const omega = 2 / time
  const x = omega * deltaTime
  const decay = 1 / (1 + x + 0.48 * x * x + 0.235 * x * x * x)

  const change = current - target
  const temp = (velocity + omega * change) * deltaTime
  let nextVelocity = (velocity - omega * temp) * decay
  let value = target + (change + temp) * decay

  // Approaching from either side, stop at the target
  if ((target - current > 0) === (value > target)) {
    value = target
    nextVelocity = (value - target) / deltaTime
  }

  return { value, velocity: nextVelocity }
}
