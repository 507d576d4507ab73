import BetterSqlite3 from 'better-sqlite3'
import { validatePersistedState } from '../profile/analysis.js'
import type { PersistedProfileState } from '../profile/types.js'
import type { GenerationOutcome } from '../generation/types.js'

interface ProfileStateRow {
  traits: string
  choice_frequencies: string
  active_obsessions: string
  updated: string
}

interface GenerationLogRow {
  id: number
  request_id: string
  kind: string
  context_type: string
  status: string
  attempts: number
  duration_ms: number
  error: string | null
  timestamp: string
}

export interface GenerationLogEntry extends GenerationOutcome {
  timestamp: Date
}

function isOutcomeStatus(value: string): value is GenerationOutcome['status'] {
  return ['ok', 'cached', 'validation_failed', 'backend_error', 'cancelled'].includes(value)
}

export class Database {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS profile_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        traits JSON NOT NULL,
        choice_frequencies JSON NOT NULL,
        active_obsessions JSON NOT NULL,
        updated DATETIME NOT NULL
      );

      CREATE TABLE IF NOT EXISTS generation_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        request_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        context_type TEXT NOT NULL,
        status TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        duration_ms INTEGER NOT NULL,
        error TEXT,
        timestamp DATETIME NOT NULL
      );
    `)
  }

  listTables(): string[] {
    const rows = this.db.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all()
    return rows.map(r => r.name)
  }

  // --- Profile state ---

  saveProfileState(state: PersistedProfileState, updated: Date = new Date()): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO profile_state (id, traits, choice_frequencies, active_obsessions, updated)
      VALUES (1, ?, ?, ?, ?)
    `).run(
      JSON.stringify(state.traits),
      JSON.stringify(state.choiceFrequencies),
      JSON.stringify(state.activeObsessions),
      updated.toISOString()
    )
  }

  /** Throws ProfileStateError when the stored row no longer fits the profile's ranges. */
  getProfileState(): (PersistedProfileState & { updated: Date }) | null {
    const row = this.db.prepare<[], ProfileStateRow>(
      'SELECT traits, choice_frequencies, active_obsessions, updated FROM profile_state WHERE id = 1'
    ).get()
    if (!row) return null

    const state = validatePersistedState({
      traits: JSON.parse(row.traits),
      choiceFrequencies: JSON.parse(row.choice_frequencies),
      activeObsessions: JSON.parse(row.active_obsessions)
    })
    return { ...state, updated: new Date(row.updated) }
  }

  clearProfileState(): void {
    this.db.prepare('DELETE FROM profile_state').run()
  }

  // --- Generation log ---

  insertGenerationOutcome(outcome: GenerationOutcome, timestamp: Date = new Date()): void {
    this.db.prepare(`
      INSERT INTO generation_log (request_id, kind, context_type, status, attempts, duration_ms, error, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      outcome.requestId,
      outcome.kind,
      outcome.contextType,
      outcome.status,
      outcome.attempts,
      Math.round(outcome.durationMs),
      outcome.error ?? null,
      timestamp.toISOString()
    )
  }

  /** Newest first. */
  getGenerationLog(limit: number = 50): GenerationLogEntry[] {
    const rows = this.db.prepare<[number], GenerationLogRow>(
      'SELECT * FROM generation_log ORDER BY id DESC LIMIT ?'
    ).all(limit)

    const entries: GenerationLogEntry[] = []
    for (const row of rows) {
      if (!isOutcomeStatus(row.status) || (row.kind !== 'text' && row.kind !== 'image')) {
        console.warn(`[storage] skipping generation_log row ${row.id} with unknown status or kind`)
        continue
      }
      entries.push({
        requestId: row.request_id,
        kind: row.kind,
        contextType: row.context_type,
        status: row.status,
        attempts: row.attempts,
        durationMs: row.duration_ms,
        error: row.error ?? undefined,
        timestamp: new Date(row.timestamp)
      })
    }
    return entries
  }

  clearGenerationLog(): void {
    this.db.prepare('DELETE FROM generation_log').run()
  }

  close(): void {
    this.db.close()
  }
}
