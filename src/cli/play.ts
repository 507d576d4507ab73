import * as readline from 'node:readline'
import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { loadConfig, resolveDbPath, validateConfig } from '../config.js'
import { Database } from '../storage/database.js'
import { createDirectorContext } from '../director/context.js'
import { Director } from '../director/director.js'
import type { DirectorContent } from '../director/director.js'
import { ProfileStateError } from '../errors.js'

// ANSI color codes
const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const ITALIC = '\x1b[3m'
const CYAN = '\x1b[36m'
const GREEN = '\x1b[32m'
const YELLOW = '\x1b[33m'
const RED = '\x1b[31m'
const MAGENTA = '\x1b[35m'

const HELP_TEXT = `
${BOLD}Play:${RESET}
  ${CYAN}<choice> <target>${RESET}          e.g. ${DIM}observe shadow${RESET}, ${DIM}open door${RESET}
${BOLD}Commands:${RESET}
  ${CYAN}/room <archetype> <theme>${RESET}  Enter and describe a room
  ${CYAN}/status${RESET}                    Show profile and tension
  ${CYAN}/help${RESET}                      Show this help
  ${CYAN}/quit${RESET}                      Save and leave
`

export type PlayInput =
  | { type: 'empty' }
  | { type: 'action'; choiceType: string; target: string }
  | { type: 'room'; archetype: string; theme: string }
  | { type: 'status' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string }

export function parseInput(line: string): PlayInput {
  const input = line.trim()
  if (!input) return { type: 'empty' }

  if (input.startsWith('/')) {
    const parts = input.slice(1).split(/\s+/)
    const cmd = parts[0]?.toLowerCase()
    switch (cmd) {
      case 'room': {
        const archetype = parts[1]
        const theme = parts.slice(2).join(' ')
        if (!archetype || !theme) {
          return { type: 'invalid', message: 'Usage: /room <archetype> <theme>' }
        }
        return { type: 'room', archetype, theme }
      }
      case 'status':
        return { type: 'status' }
      case 'help':
        return { type: 'help' }
      case 'quit':
      case 'exit':
        return { type: 'quit' }
      default:
        return { type: 'invalid', message: `Unknown command: /${cmd ?? ''}` }
    }
  }

  const [choiceType, ...rest] = input.split(/\s+/)
  return { type: 'action', choiceType, target: rest.join(' ') }
}

function bar(value: number, width: number = 20): string {
  const filled = Math.round(value * width)
  return `${'█'.repeat(filled)}${DIM}${'░'.repeat(width - filled)}${RESET}`
}

function printContent(content: DirectorContent): void {
  if (!content.ok) {
    const fallback = content.content || 'Something shifts just out of sight.'
    process.stdout.write(`\n${DIM}${ITALIC}${fallback}${RESET}\n`)
    return
  }
  const label = content.severity ? `${content.source}, ${content.severity}` : content.source
  process.stdout.write(`\n${MAGENTA}[${label}]${RESET} ${ITALIC}${content.content}${RESET}\n`)
}

function printStatus(director: Director): void {
  const { profile, tension, generation } = director.status()
  console.log('')
  console.log(`  ${BOLD}Tension${RESET}  ${bar(tension.current)} ${tension.current.toFixed(2)} ${DIM}(target ${tension.target.toFixed(2)}, next event in ${tension.nextEventIn.toFixed(0)}s)${RESET}`)
  console.log(`  ${BOLD}Fear${RESET}     ${bar(profile.traits.fear)} ${profile.traits.fear.toFixed(2)}`)
  console.log(`  ${BOLD}Obsession${RESET} ${bar(profile.traits.obsession)} ${profile.traits.obsession.toFixed(2)}`)
  console.log(`  ${BOLD}Aggression${RESET} ${bar(profile.traits.aggression)} ${profile.traits.aggression.toFixed(2)}`)
  console.log(`  ${DIM}Paranoia ${profile.indices.paranoiaIndex.toFixed(2)}, distortion ${profile.indices.realityDistortion.toFixed(2)}, instability ${profile.indices.emotionalInstability.toFixed(2)}${RESET}`)
  if (profile.activeObsessions.length > 0) {
    console.log(`  ${DIM}Fixations: ${profile.activeObsessions.join(', ')}${RESET}`)
  }
  console.log(`  ${DIM}Queue ${generation.queueDepth}, backend calls ${generation.backendCalls}, cache hits ${generation.cacheHits}${RESET}`)
  console.log('')
}

export async function startPlay(options: { config?: string } = {}): Promise<void> {
  const config = loadConfig(options.config)
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error(`${RED}Cannot start: invalid configuration${RESET}\n`)
    for (const err of errors) {
      console.error(`  ${err.field}: ${err.message}`)
    }
    process.exit(1)
  }

  const dbPath = resolveDbPath(config)
  mkdirSync(path.dirname(dbPath), { recursive: true })
  const db = new Database(dbPath)

  const director = new Director(createDirectorContext({ config, db }))
  try {
    if (director.load()) {
      console.log(`${DIM}Restored your previous profile.${RESET}`)
    }
  } catch (e) {
    if (!(e instanceof ProfileStateError)) throw e
    console.warn(`${YELLOW}Saved profile was unreadable and has been ignored: ${e.message}${RESET}`)
  }

  let lastTick = Date.now()
  const ticker = setInterval(() => {
    const now = Date.now()
    director.tick((now - lastTick) / 1000)
    lastTick = now
  }, config.tension.tickIntervalMs)

  let level = 0

  console.log(`${GREEN}The house is quiet.${RESET} Type what you do and press Enter. ${DIM}/help for commands.${RESET}\n`)

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: `${CYAN}>${RESET} `
  })

  director.onContent(content => {
    printContent(content)
    rl.prompt(true)
  })

  rl.prompt()

  rl.on('line', async (line: string) => {
    const input = parseInput(line)

    try {
      await handleInput(input)
    } catch (e) {
      const errorMessage = e instanceof Error ? e.message : 'Unknown error'
      console.error(`${RED}Error: ${errorMessage}${RESET}`)
    }

    if (input.type !== 'quit') rl.prompt()
  })

  async function handleInput(input: PlayInput): Promise<void> {
    switch (input.type) {
      case 'empty':
        break
      case 'help':
        console.log(HELP_TEXT)
        break
      case 'status':
        printStatus(director)
        break
      case 'invalid':
        console.log(`${YELLOW}${input.message}${RESET}`)
        break
      case 'quit':
        rl.close()
        break
      case 'room': {
        level++
        const content = await director.describeRoom({ archetype: input.archetype, theme: input.theme, level })
        if (!content.ok) {
          console.log(`${DIM}(the room resists description)${RESET}`)
        }
        break
      }
      case 'action': {
        const outcome = director.handleAction(input.choiceType, input.target)
        if (outcome.stimuli.length > 0) {
          console.log(`${DIM}${outcome.stimuli.map(s => `+${s.amount.toFixed(2)} ${s.source}`).join(', ')}${RESET}`)
        }
        break
      }
    }
  }

  rl.on('close', () => {
    clearInterval(ticker)
    try {
      director.save()
    } catch (e) {
      console.error('Failed to save profile:', e)
    }
    director.dispose()
    db.close()
    console.log(`\n${DIM}The door closes behind you.${RESET}`)
    process.exit(0)
  })
}
