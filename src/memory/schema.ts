import type Database from 'better-sqlite3'
import { z } from 'zod'

// Each entry upgrades the database by one version; never edit a released one.
const MIGRATIONS: readonly string[] = [
    `
    CREATE TABLE IF NOT EXISTS entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        prompt TEXT,
        answer TEXT,
        tags TEXT,
        file TEXT,
        attachments_json TEXT,
        execution_time REAL,
        tool_call_count INTEGER,
        tool_calls_json TEXT,
        created_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS project_notes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        content TEXT,
        tags TEXT,
        links TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT
    );
    CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT,
        plan TEXT,
        updates TEXT,
        logs TEXT,
        status TEXT NOT NULL DEFAULT 'pending',
        current_step INTEGER NOT NULL DEFAULT 0,
        step_results TEXT,
        tool_calls_json TEXT,
        workflow_type TEXT NOT NULL DEFAULT 'full',
        parent_task_id INTEGER REFERENCES tasks(id),
        subtask_results TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_tasks_parent ON tasks(parent_task_id);
    CREATE TABLE IF NOT EXISTS aegis_state (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        tags TEXT,
        summary TEXT,
        temperature REAL,
        created_at TEXT NOT NULL
    );
    `,
]

export const SCHEMA_VERSION = MIGRATIONS.length

const VersionRow = z.object({ value: z.string() })

export function migrate(db: Database.Database): number {
    db.exec('CREATE TABLE IF NOT EXISTS meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)')
    const row = VersionRow.safeParse(db.prepare("SELECT value FROM meta WHERE key = 'db_version'").get())
    const current = row.success ? Number.parseInt(row.data.value, 10) : 0

    const apply = db.transaction((from: number) => {
        for (let version = from; version < MIGRATIONS.length; version++) {
            const sql = MIGRATIONS[version]
            if (sql) db.exec(sql)
        }
        db.prepare("INSERT OR REPLACE INTO meta (key, value) VALUES ('db_version', ?)").run(String(MIGRATIONS.length))
    })
    if (current < MIGRATIONS.length) apply(current)
    return MIGRATIONS.length
}
