import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { z } from 'zod'
import { err, ok, type Result } from '../core/result.js'
import { collapseCodeBlocks } from '../core/text.js'
import { estimateJsonTokens, estimateTokens } from '../llm/token-counter.js'
import type { Logger } from '../logger/index.js'
import {
    AegisRowSchema,
    EntryRowSchema,
    NoteRowSchema,
    TaskRowSchema,
    toAegisSnapshot,
    toEntry,
    toNote,
    toTask,
} from './rows.js'
import { migrate } from './schema.js'
import { scoreNote, tokenize } from './scoring.js'
import {
    maxStepsForWorkflow,
    TaskActionSchema,
    type LooseTaskAction,
    type ParsedTaskAction,
    type TaskAction,
    type TaskActionOutput,
} from './task-actions.js'
import { MAX_NOTE_CONTENT_LENGTH, truncateNoteContent, truncateToolCallsByPriority, type PriorityLookup } from './truncation.js'
import type {
    AegisSnapshot,
    ConversationEntry,
    FetchHistoryOptions,
    Note,
    RecallOptions,
    RecordedToolCall,
    RecordEntryInput,
    ScoredNote,
    Task,
} from './types.js'

export interface MemoryStoreOptions {
    /** File path, or `:memory:` */
    dbPath: string
    logger: Logger
    clock?: () => Date
    priorityOf?: PriorityLookup
    noteMaxLength?: number
}

export interface NoteInput {
    content: string
    tags?: string[]
    links?: string[]
}

export interface AegisNotesOptions {
    maxTokens: number
    maxContentLength?: number
    limit?: number
}

const DEFAULT_HISTORY_LIMIT = 7
const DEFAULT_RECALL_LIMIT = 5
const AEGIS_NOTES_LIMIT = 8
const TASK_LIST_MAX_TOKENS = 1111

function csv(values: string[] | undefined): string {
    return (values ?? []).map((value) => value.trim()).filter(Boolean).join(',')
}

/** Durable record of entries, notes, tasks and aegis snapshots. */
export class MemoryStore {
    private readonly db: Database.Database
    private readonly logger: Logger
    private readonly clock: () => Date
    private readonly priorityOf: PriorityLookup
    private readonly noteMaxLength: number

    constructor(options: MemoryStoreOptions) {
        if (options.dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(options.dbPath), { recursive: true })
        }
        this.db = new Database(options.dbPath)
        this.db.pragma('journal_mode = WAL')
        this.db.pragma('busy_timeout = 5000')
        this.db.pragma('foreign_keys = ON')
        this.logger = options.logger.child({ component: 'memory' })
        this.clock = options.clock ?? (() => new Date())
        this.priorityOf = options.priorityOf ?? (() => undefined)
        this.noteMaxLength = options.noteMaxLength ?? MAX_NOTE_CONTENT_LENGTH

        const version = migrate(this.db)
        this.logger.debug({ dbPath: options.dbPath, version }, 'Memory store opened')
    }

    close(): void {
        this.db.close()
    }

    private now(): string {
        return this.clock().toISOString()
    }

    // ── Conversation entries ──────────────────────────────────────────

    recordEntry(input: RecordEntryInput): number {
        const toolCalls = truncateToolCallsByPriority(input.toolCalls ?? [], this.priorityOf)
        const info = this.db
            .prepare(
                `INSERT INTO entries (prompt, answer, tags, file, attachments_json, execution_time, tool_call_count, tool_calls_json, created_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
            )
            .run(
                input.prompt,
                input.answer,
                csv(input.tags),
                input.file ?? null,
                JSON.stringify(input.attachments ?? []),
                input.executionTime ?? 0,
                toolCalls.length,
                JSON.stringify(toolCalls),
                this.now()
            )
        const id = Number(info.lastInsertRowid)
        this.logger.debug({ id, toolCalls: toolCalls.length }, 'Entry recorded')
        return id
    }

    getEntry(id: number): ConversationEntry | undefined {
        const row = EntryRowSchema.safeParse(this.db.prepare('SELECT * FROM entries WHERE id = ?').get(id))
        return row.success ? toEntry(row.data, true) : undefined
    }

    /**
     * Most recent entries, returned oldest first. With `maxTokens`, entries are
     * taken newest first until one no longer fits even with its code blocks
     * collapsed; nothing older than that entry is returned.
     */
    fetchHistory(options: FetchHistoryOptions = {}): ConversationEntry[] {
        const { limit = DEFAULT_HISTORY_LIMIT, maxTokens, includeToolCalls = false } = options
        const rows = z.array(EntryRowSchema).parse(this.db.prepare('SELECT * FROM entries ORDER BY id DESC LIMIT ?').all(limit))
        const newestFirst = rows.map((row) => toEntry(row, includeToolCalls))
        if (maxTokens === undefined) return newestFirst.reverse()

        const included: ConversationEntry[] = []
        let used = 0
        for (const entry of newestFirst) {
            let cost = estimateTokens(entry.prompt + entry.answer)
            let fitted = entry
            if (used + cost > maxTokens) {
                const answer = collapseCodeBlocks(entry.answer)
                cost = estimateTokens(entry.prompt + answer)
                if (used + cost > maxTokens) break
                fitted = { ...entry, answer }
            }
            included.push(fitted)
            used += cost
        }
        return included.reverse()
    }

    searchEntries(query: string, limit = DEFAULT_RECALL_LIMIT): ConversationEntry[] {
        const pattern = `%${query}%`
        const rows = this.db
            .prepare('SELECT * FROM entries WHERE tags LIKE ? OR prompt LIKE ? OR file LIKE ? ORDER BY id DESC LIMIT ?')
            .all(pattern, pattern, pattern, limit)
        return z
            .array(EntryRowSchema)
            .parse(rows)
            .map((row) => toEntry(row, true))
    }

    // ── Notes ─────────────────────────────────────────────────────────

    createNote(input: NoteInput): number {
        const info = this.db
            .prepare('INSERT INTO project_notes (content, tags, links, created_at) VALUES (?, ?, ?, ?)')
            .run(truncateNoteContent(input.content, this.noteMaxLength), csv(input.tags), csv(input.links), this.now())
        return Number(info.lastInsertRowid)
    }

    /** Only the given fields change. Returns false when the note does not exist. */
    updateNote(id: number, input: Partial<NoteInput>): boolean {
        const existing = this.getNote(id)
        if (!existing) return false
        const info = this.db
            .prepare('UPDATE project_notes SET content = ?, tags = ?, links = ?, updated_at = ? WHERE id = ?')
            .run(
                truncateNoteContent(input.content ?? existing.content, this.noteMaxLength),
                csv(input.tags ?? existing.tags),
                csv(input.links ?? existing.links),
                this.now(),
                id
            )
        return info.changes > 0
    }

    removeNote(id: number): boolean {
        return this.db.prepare('DELETE FROM project_notes WHERE id = ?').run(id).changes > 0
    }

    getNote(id: number): Note | undefined {
        const row = NoteRowSchema.safeParse(this.db.prepare('SELECT * FROM project_notes WHERE id = ?').get(id))
        return row.success ? toNote(row.data) : undefined
    }

    fetchNotesByLinks(links: string[]): Note[] {
        const wanted = links.map((link) => link.trim()).filter(Boolean)
        if (wanted.length === 0) return []
        const clauses = wanted.map(() => 'links LIKE ?').join(' OR ')
        const rows = this.db
            .prepare(`SELECT * FROM project_notes WHERE ${clauses} ORDER BY id DESC`)
            .all(...wanted.map((link) => `%${link}%`))
        return z.array(NoteRowSchema).parse(rows).map(toNote)
    }

    recallNotes(query: string, options: RecallOptions = {}): ScoredNote[] {
        const { limit = DEFAULT_RECALL_LIMIT, maxContentLength } = options
        const queryTokens = tokenize(query)
        const rows = z.array(NoteRowSchema).parse(this.db.prepare('SELECT * FROM project_notes ORDER BY id').all())

        const scored = rows
            .map((row) => ({
                row,
                score: scoreNote(queryTokens, { content: row.content ?? '', tags: row.tags ?? '', links: row.links ?? '' }),
            }))
            .filter((candidate) => candidate.score > 0)
            .sort((a, b) => b.score - a.score)
            .slice(0, limit)

        return scored.map(({ row, score }) => {
            const note = toNote(row)
            const content = maxContentLength === undefined ? note.content : truncateNoteContent(note.content, maxContentLength)
            return { ...note, content, score }
        })
    }

    /** Notes matching the orientation tags (or summary), cut off at `maxTokens`. */
    recallAegisNotes(snapshot: AegisSnapshot, options: AegisNotesOptions): ScoredNote[] {
        const query = snapshot.tags.length > 0 ? snapshot.tags.join(' ') : snapshot.summary
        if (!query.trim()) return []
        const candidates = this.recallNotes(query, {
            limit: options.limit ?? AEGIS_NOTES_LIMIT,
            maxContentLength: options.maxContentLength,
        })
        const selected: ScoredNote[] = []
        let used = 0
        for (const note of candidates) {
            const cost = estimateJsonTokens({ content: note.content, tags: note.tags, links: note.links })
            if (used + cost > options.maxTokens) break
            selected.push(note)
            used += cost
        }
        return selected
    }

    // ── Tasks ─────────────────────────────────────────────────────────

    getTask(id: number): Task | undefined {
        const row = TaskRowSchema.safeParse(this.db.prepare('SELECT * FROM tasks WHERE id = ?').get(id))
        return row.success ? toTask(row.data) : undefined
    }

    getSubtasks(parentId: number): Task[] {
        const rows = this.db.prepare('SELECT * FROM tasks WHERE parent_task_id = ? ORDER BY id').all(parentId)
        return z.array(TaskRowSchema).parse(rows).map(toTask)
    }

    manageTask(params: TaskAction | LooseTaskAction): Result<TaskActionOutput> {
        const parsed = TaskActionSchema.safeParse(params)
        if (!parsed.success) {
            const issue = parsed.error.issues[0]
            return err(`Invalid task action: ${issue ? `${issue.path.join('.') || 'params'}: ${issue.message}` : 'unknown error'}`)
        }
        const action = parsed.data
        this.logger.debug({ action: action.action }, 'Task action')
        return this.applyTaskAction(action)
    }

    private applyTaskAction(action: ParsedTaskAction): Result<TaskActionOutput> {
        switch (action.action) {
            case 'create':
                return this.createTask(action)
            case 'list':
                return ok({ action: 'list', tasks: this.listTasks(action.parentTaskId) })
            case 'delete': {
                const removed = this.db.prepare('DELETE FROM tasks WHERE id = ?').run(action.id).changes > 0
                return removed ? ok({ action: 'delete', id: action.id }) : err(`Task ${action.id} not found`)
            }
            default:
                break
        }

        const task = this.getTask(action.id)
        if (!task) return err(`Task ${action.id} not found`)
        const maxSteps = maxStepsForWorkflow(task.workflowType)
        const now = this.now()

        switch (action.action) {
            case 'activate':
                return this.saveTask({ ...task, status: 'active', updatedAt: now }, 'activate')
            case 'advance_step':
                if (action.currentStep > maxSteps) {
                    return err(`Step ${action.currentStep} exceeds the ${maxSteps} steps of a ${task.workflowType} workflow`)
                }
                return this.saveTask({ ...task, currentStep: action.currentStep, updatedAt: now }, 'advance_step')
            case 'update_plan': {
                const step = action.currentStep ?? task.currentStep
                if (step > maxSteps) {
                    return err(`Step ${step} exceeds the ${maxSteps} steps of a ${task.workflowType} workflow`)
                }
                return this.saveTask(
                    {
                        ...task,
                        plan: action.plan,
                        planUpdates: [...task.planUpdates, { step, plan: action.plan, timestamp: now }],
                        updatedAt: now,
                    },
                    'update_plan'
                )
            }
            case 'update': {
                const step = action.currentStep ?? task.currentStep
                if (step > maxSteps) {
                    return err(`Step ${step} exceeds the ${maxSteps} steps of a ${task.workflowType} workflow`)
                }
                return this.saveTask(
                    {
                        ...task,
                        status: action.status ?? task.status,
                        currentStep: step,
                        stepResults: action.stepResults ?? task.stepResults,
                        logs: action.log ? [...task.logs, { timestamp: now, message: action.log }] : task.logs,
                        updatedAt: now,
                    },
                    'update'
                )
            }
        }
    }

    private createTask(action: Extract<ParsedTaskAction, { action: 'create' }>): Result<TaskActionOutput> {
        if (action.parentTaskId !== undefined && !this.getTask(action.parentTaskId)) {
            return err(`Parent task ${action.parentTaskId} not found`)
        }
        const now = this.now()
        const info = this.db
            .prepare(
                `INSERT INTO tasks (title, plan, updates, logs, status, current_step, step_results, tool_calls_json,
                                    workflow_type, parent_task_id, subtask_results, created_at, updated_at)
                 VALUES (?, ?, '[]', '[]', 'pending', 0, '{}', '{}', ?, ?, '{}', ?, ?)`
            )
            .run(action.title, action.plan, action.workflowType, action.parentTaskId ?? null, now, now)
        const task = this.getTask(Number(info.lastInsertRowid))
        if (!task) return err('Task could not be read back after insert')
        this.logger.info({ taskId: task.id, workflowType: task.workflowType }, 'Task created')
        return ok({ action: 'create', task })
    }

    private listTasks(parentTaskId?: number): Task[] {
        const rows =
            parentTaskId === undefined
                ? this.db.prepare('SELECT * FROM tasks ORDER BY id DESC').all()
                : this.db.prepare('SELECT * FROM tasks WHERE parent_task_id = ? ORDER BY id DESC').all(parentTaskId)
        const tasks = z.array(TaskRowSchema).parse(rows).map(toTask)

        const listed: Task[] = []
        let used = 0
        for (const task of tasks) {
            let cost = estimateJsonTokens(task)
            let fitted = task
            if (used + cost > TASK_LIST_MAX_TOKENS) {
                fitted = { ...task, plan: collapseCodeBlocks(task.plan) }
                cost = estimateJsonTokens(fitted)
                if (used + cost > TASK_LIST_MAX_TOKENS) break
            }
            listed.push(fitted)
            used += cost
        }
        return listed
    }

    private saveTask(
        task: Task,
        action: 'activate' | 'advance_step' | 'update_plan' | 'update'
    ): Result<TaskActionOutput> {
        this.writeTask(task)
        return ok({ action, task })
    }

    private writeTask(task: Task): void {
        this.db
            .prepare(
                `UPDATE tasks SET title = ?, plan = ?, updates = ?, logs = ?, status = ?, current_step = ?, step_results = ?,
                                  tool_calls_json = ?, subtask_results = ?, updated_at = ? WHERE id = ?`
            )
            .run(
                task.title,
                task.plan,
                JSON.stringify(task.planUpdates),
                JSON.stringify(task.logs),
                task.status,
                task.currentStep,
                JSON.stringify(task.stepResults),
                JSON.stringify(task.stepToolCalls),
                JSON.stringify(task.subtaskResults),
                task.updatedAt,
                task.id
            )
    }

    private withStep(taskId: number, step: number, change: (task: Task, key: string) => Task): Result<Task> {
        const task = this.getTask(taskId)
        if (!task) return err(`Task ${taskId} not found`)
        const maxSteps = maxStepsForWorkflow(task.workflowType)
        if (!Number.isInteger(step) || step < 0 || step > maxSteps) {
            return err(`Step ${step} is outside 0..${maxSteps} for a ${task.workflowType} workflow`)
        }
        const updated = { ...change(task, String(step)), updatedAt: this.now() }
        this.writeTask(updated)
        return ok(updated)
    }

    recordStepResult(taskId: number, step: number, result: unknown): Result<Task> {
        return this.withStep(taskId, step, (task, key) => ({ ...task, stepResults: { ...task.stepResults, [key]: result } }))
    }

    recordStepToolCalls(taskId: number, step: number, calls: RecordedToolCall[]): Result<Task> {
        const truncated = truncateToolCallsByPriority(calls, this.priorityOf)
        return this.withStep(taskId, step, (task, key) => ({
            ...task,
            stepToolCalls: { ...task.stepToolCalls, [key]: [...(task.stepToolCalls[key] ?? []), ...truncated] },
        }))
    }

    updateSubtaskResults(parentId: number, subtaskId: number, result: unknown): Result<Task> {
        const parent = this.getTask(parentId)
        if (!parent) return err(`Task ${parentId} not found`)
        const subtask = this.getTask(subtaskId)
        if (!subtask || subtask.parentTaskId !== parentId) {
            return err(`Task ${subtaskId} is not a subtask of ${parentId}`)
        }
        const updated: Task = {
            ...parent,
            subtaskResults: { ...parent.subtaskResults, [String(subtaskId)]: result },
            updatedAt: this.now(),
        }
        this.writeTask(updated)
        return ok(updated)
    }

    // ── Aegis snapshots ───────────────────────────────────────────────

    appendAegisSnapshot(snapshot: Omit<AegisSnapshot, 'createdAt'>): AegisSnapshot {
        const createdAt = this.now()
        this.db
            .prepare('INSERT INTO aegis_state (tags, summary, temperature, created_at) VALUES (?, ?, ?, ?)')
            .run(csv(snapshot.tags), snapshot.summary, snapshot.temperature, createdAt)
        return { ...snapshot, tags: [...snapshot.tags], createdAt }
    }

    latestAegisSnapshot(): AegisSnapshot | undefined {
        const row = AegisRowSchema.safeParse(
            this.db.prepare('SELECT tags, summary, temperature, created_at FROM aegis_state ORDER BY id DESC LIMIT 1').get()
        )
        return row.success ? toAegisSnapshot(row.data) : undefined
    }

    /**
     * Snapshots with a summary created strictly before `before`, oldest first,
     * within `maxTokens`. A snapshot repeating the previous one's summary is
     * skipped, so only summary changes are returned.
     */
    aegisSnapshotsBefore(before: string, maxTokens: number): AegisSnapshot[] {
        const rows = this.db
            .prepare('SELECT tags, summary, temperature, created_at FROM aegis_state WHERE created_at < ? ORDER BY id')
            .all(before)
        const changes: AegisSnapshot[] = []
        let previous = ''
        for (const snapshot of z.array(AegisRowSchema).parse(rows).map(toAegisSnapshot)) {
            if (snapshot.summary && snapshot.summary !== previous) changes.push(snapshot)
            previous = snapshot.summary
        }

        const selected: AegisSnapshot[] = []
        let used = 0
        for (const snapshot of changes.reverse()) {
            const cost = estimateTokens(`${snapshot.summary} ${snapshot.tags.join(',')}`)
            if (used + cost > maxTokens) break
            selected.push(snapshot)
            used += cost
        }
        return selected.reverse()
    }

    countRows(table: 'entries' | 'project_notes' | 'tasks' | 'aegis_state'): number {
        const row = z.object({ count: z.number() }).parse(this.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get())
        return row.count
    }
}
