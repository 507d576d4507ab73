export { Director } from './director.js'
export type { ActionOutcome, ContentListener, DirectorContent, DirectorStatus, RoomRequest } from './director.js'
export { createDirectorContext } from './context.js'
export type { CreateDirectorContextParams, DirectorContext } from './context.js'

export { ProfileTracker } from '../profile/tracker.js'
export { parseProfileAnalysis } from '../profile/analysis.js'
export type * from '../profile/types.js'

export { TensionDirector, severityFor } from '../tension/director.js'
export { ShapeCurve } from '../tension/curve.js'
export type * from '../tension/types.js'

export { GenerationOrchestrator } from '../generation/orchestrator.js'
export { AiSdkBackend, createLLMProvider } from '../generation/backend.js'
export type { GenerationBackend, ImageCall, TextCall } from '../generation/backend.js'
export type * from '../generation/types.js'

export { Database } from '../storage/database.js'
export { DEFAULT_CONFIG, loadConfig, validateConfig } from '../config.js'
export type { DirectorConfig } from '../config.js'
export * from '../errors.js'
