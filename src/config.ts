import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'

export type LLMProviderName = 'openai' | 'cerebras' | 'ollama' | 'openrouter' | 'anthropic'

export interface DirectorConfig {
  llm: {
    provider: LLMProviderName
    creativeModel: string
    analysisModel: string
    imageModel: string
    apiKey?: string
    baseUrl?: string
  }
  profile: {
    paranoiaDecayPerSecond: number
    distortionDecayPerSecond: number
    instabilityDecayPerSecond: number
    triggerDecayPerSecond: number
    triggerFloor: number
    analysisInterval: number
  }
  tension: {
    baseDecayRate: number
    smoothTime: number
    tickIntervalMs: number
  }
  orchestrator: {
    memoryContextLimit: number
    cacheTtlMs: number | null
    maxTokensCap: number
  }
  storage: {
    dbPath: string
  }
  debug: boolean
}

export const DEFAULT_CONFIG: DirectorConfig = {
  llm: {
    provider: 'openai',
    creativeModel: 'gpt-4o',
    analysisModel: 'gpt-4o-mini',
    imageModel: 'dall-e-3',
    baseUrl: 'https://api.openai.com/v1'
  },
  profile: {
    paranoiaDecayPerSecond: 0.05,
    distortionDecayPerSecond: 0.03,
    instabilityDecayPerSecond: 0.04,
    triggerDecayPerSecond: 0.02,
    triggerFloor: 0.1,
    analysisInterval: 5
  },
  tension: {
    baseDecayRate: 0.02,
    smoothTime: 2,
    tickIntervalMs: 100
  },
  orchestrator: {
    memoryContextLimit: 3,
    cacheTtlMs: null,
    maxTokensCap: 2048
  },
  storage: {
    dbPath: '~/.dread-director/session.db'
  },
  debug: false
}

const CONFIG_DIR = path.join(homedir(), '.dread-director')
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function deepMerge<T extends object>(target: T, source: Record<string, unknown>): T {
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const incoming = source[key]
    const existing = result[key]
    if (isPlainObject(incoming)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, incoming)
    } else if (incoming !== undefined) {
      result[key] = incoming
    }
  }
  return result as T
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {}
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
    return isPlainObject(parsed) ? parsed : {}
  } catch (e) {
    console.error('Failed to load config:', e)
    return {}
  }
}

export function loadConfig(configPath: string = CONFIG_PATH): DirectorConfig {
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), readConfigFile(configPath))

  // Environment keys fill in only what the file left empty
  if (!merged.llm.apiKey) {
    const envKey = apiKeyFromEnv(merged.llm.provider)
    if (envKey) merged.llm.apiKey = envKey
  }

  if (process.env.DREAD_DEBUG === '1') {
    merged.debug = true
  }

  return merged
}

function apiKeyFromEnv(provider: LLMProviderName): string | undefined {
  switch (provider) {
    case 'cerebras':
      return process.env.CEREBRAS_API_KEY
    case 'openrouter':
      return process.env.OPENROUTER_API_KEY
    case 'anthropic':
      return process.env.ANTHROPIC_API_KEY
    default:
      return process.env.OPENAI_API_KEY
  }
}

/** Merge a partial config (nested plain objects) into the config file. */
export function saveConfig(patch: Record<string, unknown>, configPath: string = CONFIG_PATH): void {
  mkdirSync(path.dirname(configPath), { recursive: true })
  const merged = deepMerge(readConfigFile(configPath), patch)
  writeFileSync(configPath, JSON.stringify(merged, null, 2))
}

export interface ConfigError {
  field: string
  message: string
}

export function validateConfig(config: DirectorConfig): ConfigError[] {
  const errors: ConfigError[] = []

  if (config.llm.provider !== 'ollama' && !config.llm.apiKey) {
    errors.push({
      field: 'llm.apiKey',
      message: `No API key for provider "${config.llm.provider}". Set it in ${CONFIG_PATH} or the provider's environment variable.`
    })
  }

  if (!Number.isInteger(config.profile.analysisInterval) || config.profile.analysisInterval < 1) {
    errors.push({ field: 'profile.analysisInterval', message: 'profile.analysisInterval must be a positive integer.' })
  }

  if (config.tension.tickIntervalMs <= 0) {
    errors.push({ field: 'tension.tickIntervalMs', message: 'tension.tickIntervalMs must be greater than zero.' })
  }

  if (config.orchestrator.cacheTtlMs !== null && config.orchestrator.cacheTtlMs <= 0) {
    errors.push({ field: 'orchestrator.cacheTtlMs', message: 'orchestrator.cacheTtlMs must be null or greater than zero.' })
  }

  return errors
}

export function resolveDbPath(config: DirectorConfig): string {
  return config.storage.dbPath.replace(/^~/, homedir())
}
