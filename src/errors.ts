export class GenerationBackendError extends Error {
  readonly requestId: string
  readonly attempts: number

  constructor(message: string, params: { requestId: string; attempts: number; cause?: unknown }) {
    super(message, { cause: params.cause })
    this.name = 'GenerationBackendError'
    this.requestId = params.requestId
    this.attempts = params.attempts
  }
}

export class GenerationCancelledError extends Error {
  readonly requestId: string

  constructor(requestId: string) {
    super(`Generation request ${requestId} was dropped from the queue before it started`)
    this.name = 'GenerationCancelledError'
    this.requestId = requestId
  }
}

/** Un-parseable or out-of-range analysis output. Carries the raw text for logging. */
export class ProfileAnalysisError extends Error {
  readonly raw: string

  constructor(message: string, raw: string) {
    super(message)
    this.name = 'ProfileAnalysisError'
    this.raw = raw
  }
}

/** Externally supplied profile state that does not fit the profile's ranges. */
export class ProfileStateError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(message)
    this.name = 'ProfileStateError'
    this.issues = issues
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}

// Transport-level failure, as opposed to a provider rejecting the request
export function isNetworkError(e: unknown): boolean {
  if (e instanceof Error) {
    const msg = e.message.toLowerCase()
    return msg.includes('etimedout') ||
      msg.includes('econnrefused') ||
      msg.includes('econnreset') ||
      msg.includes('cannot connect') ||
      msg.includes('network') ||
      msg.includes('fetch failed') ||
      e.name === 'AI_RetryError'
  }
  return false
}
