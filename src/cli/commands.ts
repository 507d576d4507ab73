import { existsSync } from 'node:fs'
import { loadConfig, resolveDbPath, saveConfig } from '../config.js'
import { Database } from '../storage/database.js'
import { ProfileStateError } from '../errors.js'
import { startPlay } from './play.js'

function openExistingDb(configPath?: string): Database | null {
  const dbPath = resolveDbPath(loadConfig(configPath))
  if (!existsSync(dbPath)) {
    console.log('No saved session found. Run \'dread play\' first.')
    return null
  }
  return new Database(dbPath)
}

export async function playCommand(options: { config?: string }): Promise<void> {
  await startPlay(options)
}

export async function profileCommand(options: { config?: string }): Promise<void> {
  const db = openExistingDb(options.config)
  if (!db) return

  try {
    const state = db.getProfileState()
    if (!state) {
      console.log('No saved profile.')
      return
    }

    const frequencies = Object.entries(state.choiceFrequencies).sort((a, b) => b[1] - a[1])

    console.log('')
    console.log('  Saved Profile')
    console.log('  -------------')
    console.log(`  Fear:        ${state.traits.fear.toFixed(3)}`)
    console.log(`  Obsession:   ${state.traits.obsession.toFixed(3)}`)
    console.log(`  Aggression:  ${state.traits.aggression.toFixed(3)}`)
    console.log(`  Curiosity:   ${state.traits.curiosity.toFixed(3)}`)
    console.log(`  Fixations:   ${state.activeObsessions.join(', ') || '(none)'}`)
    if (frequencies.length > 0) {
      console.log('\n  Choices:')
      for (const [choice, count] of frequencies) {
        console.log(`    ${choice.padEnd(16)} ${count}`)
      }
    }
    console.log(`\n  Saved ${state.updated.toISOString()}`)
    console.log('')
  } catch (e) {
    if (!(e instanceof ProfileStateError)) throw e
    console.log(`Saved profile is unreadable: ${e.issues.join('; ')}`)
  } finally {
    db.close()
  }
}

export async function resetCommand(options: { config?: string; log?: boolean }): Promise<void> {
  const db = openExistingDb(options.config)
  if (!db) return

  try {
    db.clearProfileState()
    if (options.log) {
      db.clearGenerationLog()
    }
    console.log(options.log ? 'Profile and generation log cleared.' : 'Profile cleared.')
  } finally {
    db.close()
  }
}

export async function logCommand(options: { config?: string; limit?: string }): Promise<void> {
  const db = openExistingDb(options.config)
  if (!db) return

  try {
    const limit = options.limit ? parseInt(options.limit, 10) : 20
    const entries = db.getGenerationLog(Number.isNaN(limit) ? 20 : limit)
    if (entries.length === 0) {
      console.log('No generations recorded.')
      return
    }
    for (const entry of entries) {
      const error = entry.error ? `  ${entry.error}` : ''
      console.log(`${entry.timestamp.toISOString()}  ${entry.contextType.padEnd(22)} ${entry.status.padEnd(18)} x${entry.attempts} ${entry.durationMs}ms${error}`)
    }
  } finally {
    db.close()
  }
}

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    const config = loadConfig()
    console.log(JSON.stringify({ ...config, llm: { ...config.llm, apiKey: config.llm.apiKey ? '(set)' : undefined } }, null, 2))
    return
  }

  if (action === 'set' && key && value) {
    // Dot notation: llm.creativeModel, tension.smoothTime, ...
    const parts = key.split('.')
    const obj: Record<string, unknown> = {}
    let current: Record<string, unknown> = obj
    for (let i = 0; i < parts.length - 1; i++) {
      const next: Record<string, unknown> = {}
      current[parts[i]] = next
      current = next
    }
    try {
      current[parts[parts.length - 1]] = JSON.parse(value)
    } catch {
      current[parts[parts.length - 1]] = value
    }
    saveConfig(obj)
    console.log(`Set ${key} = ${value}`)
    return
  }

  console.log('Usage: dread config [set <key> <value>]')
}
