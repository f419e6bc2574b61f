import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { AegisState, DEFAULT_TEMPERATURE } from '../../../src/memory/aegis.js'
import { MemoryStore } from '../../../src/memory/store.js'
import type { Task } from '../../../src/memory/types.js'
import { silentLogger } from '../../helpers/harness.js'

function tickingClock(start = '2026-01-01T00:00:00.000Z'): () => Date {
    let now = Date.parse(start)
    return () => {
        now += 1000
        return new Date(now)
    }
}

function createdTask(store: MemoryStore, title: string, workflowType: 'simple' | 'analysis' | 'full' = 'simple'): Task {
    const result = store.manageTask({ action: 'create', title, workflowType })
    if (!result.ok || result.value.action !== 'create') throw new Error('task not created')
    return result.value.task
}

describe('MemoryStore', () => {
    let store: MemoryStore

    beforeEach(() => {
        store = new MemoryStore({ dbPath: ':memory:', logger: silentLogger, clock: tickingClock() })
    })

    afterEach(() => {
        store.close()
    })

    describe('entries', () => {
        it('records and reads back an entry', () => {
            const id = store.recordEntry({
                prompt: 'What is 2+2?',
                answer: '4',
                tags: ['math', ' quick '],
                file: 'notes.md',
                attachments: [{ file: 'notes.md', selection: '1:2' }],
                executionTime: 0.5,
                toolCalls: [{ request: { tool: 'recall_notes', args: { query: 'math' } }, result: { notes: [] } }],
            })
            const entry = store.getEntry(id)
            expect(entry?.prompt).toBe('What is 2+2?')
            expect(entry?.tags).toEqual(['math', 'quick'])
            expect(entry?.attachments).toEqual([{ file: 'notes.md', selection: '1:2' }])
            expect(entry?.toolCallCount).toBe(1)
            expect(entry?.toolCalls[0]?.request.tool).toBe('recall_notes')
        })

        it('returns history oldest first, limited to the most recent entries', () => {
            for (const n of [1, 2, 3]) store.recordEntry({ prompt: `p${n}`, answer: `a${n}` })
            expect(store.fetchHistory({ limit: 2 }).map((entry) => entry.prompt)).toEqual(['p2', 'p3'])
        })

        it('stops at the first entry over the token budget', () => {
            store.recordEntry({ prompt: 'p1', answer: 'a'.repeat(5) })
            store.recordEntry({ prompt: 'p2', answer: 'b'.repeat(100) })
            store.recordEntry({ prompt: 'p3', answer: 'c'.repeat(35) })
            // p3 costs 11 tokens, p2 costs 30; p1 would fit but is older than the entry that did not
            expect(store.fetchHistory({ maxTokens: 25 }).map((entry) => entry.prompt)).toEqual(['p3'])
        })

        it('collapses code blocks of an entry that does not fit as is', () => {
            store.recordEntry({ prompt: 'q', answer: `See:\n\`\`\`ts\n${'x'.repeat(200)}\n\`\`\`\nDone` })
            const [entry] = store.fetchHistory({ maxTokens: 20 })
            expect(entry?.answer).toBe('See:```ts[CONTENT EXPIRED]```Done')
        })

        it('leaves tool calls out of history unless asked for them', () => {
            store.recordEntry({ prompt: 'p', answer: 'a', toolCalls: [{ request: { tool: 't', args: {} } }] })
            expect(store.fetchHistory()[0]?.toolCalls).toEqual([])
            expect(store.fetchHistory({ includeToolCalls: true })[0]?.toolCalls).toEqual([{ request: { tool: 't', args: {} } }])
        })

        it('searches prompts, tags and files, newest first', () => {
            store.recordEntry({ prompt: 'fix the parser', answer: 'done' })
            store.recordEntry({ prompt: 'unrelated', answer: 'ok', tags: ['parser'] })
            store.recordEntry({ prompt: 'other', answer: 'ok' })
            expect(store.searchEntries('parser').map((entry) => entry.prompt)).toEqual(['unrelated', 'fix the parser'])
        })
    })

    describe('notes', () => {
        it('caps content on create', () => {
            const id = store.createNote({ content: 'a'.repeat(600) })
            expect(store.getNote(id)?.content).toHaveLength(500)
        })

        it('updates only the given fields', () => {
            const id = store.createNote({ content: 'keep me', tags: ['old'] })
            expect(store.updateNote(id, { tags: ['new'] })).toBe(true)
            const note = store.getNote(id)
            expect(note?.content).toBe('keep me')
            expect(note?.tags).toEqual(['new'])
            expect(note?.updatedAt).not.toBeNull()
        })

        it('reports missing notes on update and remove', () => {
            const id = store.createNote({ content: 'x' })
            expect(store.updateNote(999, { content: 'y' })).toBe(false)
            expect(store.removeNote(id)).toBe(true)
            expect(store.removeNote(id)).toBe(false)
        })

        it('ranks notes by weighted overlap and drops non-matches', () => {
            store.createNote({ content: 'database migrations run on boot', tags: ['db'] })
            const cacheId = store.createNote({ content: 'the cache layer', tags: ['cache'], links: ['src/cache.ts'] })
            const recalled = store.recallNotes('cache')
            expect(recalled.map((note) => note.id)).toEqual([cacheId])
            // content 4 + tag 3 + link token 2 + path bonus 5
            expect(recalled[0]?.score).toBe(14)
        })

        it('adds the path bonus when a query word is part of a link', () => {
            store.createNote({ content: 'x', links: ['lib/parser.ts'] })
            expect(store.recallNotes('pars')[0]?.score).toBe(5)
        })

        it('shortens recalled code blocks without dropping their fences', () => {
            store.createNote({ content: `intro\n\`\`\`ts\n${'x'.repeat(100)}\n\`\`\``, tags: ['lexer'] })
            const [note] = store.recallNotes('lexer', { maxContentLength: 60 })
            expect(note?.content).toBe(`intro\n\`\`\`ts\n${'x'.repeat(30)}...\n\`\`\``)
        })

        it('returns every note for an empty query, up to the limit', () => {
            for (const n of [1, 2, 3]) store.createNote({ content: `note ${n}` })
            expect(store.recallNotes('', { limit: 2 }).map((note) => note.content)).toEqual(['note 1', 'note 2'])
        })

        it('finds notes by link', () => {
            store.createNote({ content: 'a', links: ['src/a.ts'] })
            store.createNote({ content: 'b', links: ['src/b.ts'] })
            expect(store.fetchNotesByLinks(['src/b.ts']).map((note) => note.content)).toEqual(['b'])
            expect(store.fetchNotesByLinks([' '])).toEqual([])
        })
    })

    describe('tasks', () => {
        it('creates a pending task at step 0', () => {
            const task = createdTask(store, 'Ship it')
            expect(task).toMatchObject({ title: 'Ship it', status: 'pending', currentStep: 0, plan: '', workflowType: 'simple' })
        })

        it('rejects a missing parent', () => {
            expect(store.manageTask({ action: 'create', title: 'child', parentTaskId: 99 })).toEqual({
                ok: false,
                error: 'Parent task 99 not found',
            })
        })

        it('rejects malformed actions', () => {
            expect(store.manageTask({ action: 'create' })).toEqual({ ok: false, error: 'Invalid task action: title: Required' })
        })

        it('accepts ids given as strings', () => {
            const task = createdTask(store, 'Coerce')
            const result = store.manageTask({ action: 'activate', id: String(task.id) })
            expect(result.ok && result.value.action === 'activate' && result.value.task.status).toBe('active')
        })

        it('keeps the step within the workflow', () => {
            const task = createdTask(store, 'Bounded')
            expect(store.manageTask({ action: 'advance_step', id: task.id, currentStep: 4 })).toEqual({
                ok: false,
                error: 'Step 4 exceeds the 3 steps of a simple workflow',
            })
            expect(store.manageTask({ action: 'advance_step', id: task.id, currentStep: 3 }).ok).toBe(true)
            expect(store.getTask(task.id)?.currentStep).toBe(3)
        })

        it('appends logs and plan updates', () => {
            const task = createdTask(store, 'Logged')
            store.manageTask({ action: 'update', id: task.id, log: 'started' })
            store.manageTask({ action: 'update_plan', id: task.id, plan: '1. read\n2. write' })
            const stored = store.getTask(task.id)
            expect(stored?.logs.map((log) => log.message)).toEqual(['started'])
            expect(stored?.plan).toBe('1. read\n2. write')
            expect(stored?.planUpdates).toHaveLength(1)
            expect(stored?.planUpdates[0]).toMatchObject({ step: 0, plan: '1. read\n2. write' })
        })

        it('lists tasks newest first and deletes them', () => {
            const first = createdTask(store, 'first')
            createdTask(store, 'second')
            const listed = store.manageTask({ action: 'list' })
            expect(listed.ok && listed.value.action === 'list' && listed.value.tasks.map((task) => task.title)).toEqual([
                'second',
                'first',
            ])
            expect(store.manageTask({ action: 'delete', id: first.id })).toEqual({ ok: true, value: { action: 'delete', id: first.id } })
            expect(store.manageTask({ action: 'delete', id: first.id })).toEqual({ ok: false, error: `Task ${first.id} not found` })
        })

        it('records step results and tool calls under the same step key', () => {
            const task = createdTask(store, 'Steps')
            store.recordStepResult(task.id, 1, 'read the code')
            store.recordStepToolCalls(task.id, 1, [{ request: { tool: 'a', args: {} } }])
            store.recordStepToolCalls(task.id, 1, [{ request: { tool: 'b', args: {} } }])
            const stored = store.getTask(task.id)
            expect(stored?.stepResults).toEqual({ '1': 'read the code' })
            expect(stored?.stepToolCalls['1']?.map((call) => call.request.tool)).toEqual(['a', 'b'])
        })

        it('rejects step writes outside the workflow', () => {
            const task = createdTask(store, 'Out of range')
            expect(store.recordStepResult(task.id, 4, 'x')).toEqual({ ok: false, error: 'Step 4 is outside 0..3 for a simple workflow' })
        })

        it('stores subtask results only on the real parent', () => {
            const parent = createdTask(store, 'parent')
            const other = createdTask(store, 'other')
            const child = store.manageTask({ action: 'create', title: 'child', parentTaskId: parent.id })
            if (!child.ok || child.value.action !== 'create') throw new Error('child not created')
            const childId = child.value.task.id

            expect(store.getSubtasks(parent.id).map((task) => task.id)).toEqual([childId])
            expect(store.updateSubtaskResults(other.id, childId, 'x')).toEqual({
                ok: false,
                error: `Task ${childId} is not a subtask of ${other.id}`,
            })
            const updated = store.updateSubtaskResults(parent.id, childId, { done: true })
            expect(updated.ok && updated.value.subtaskResults).toEqual({ [String(childId)]: { done: true } })
        })
    })

    describe('aegis', () => {
        it('starts from the default orientation', () => {
            const aegis = new AegisState(store)
            expect(aegis.current()).toEqual({ tags: [], summary: '', temperature: DEFAULT_TEMPERATURE, createdAt: new Date(0).toISOString() })
        })

        it('persists updates and restores the latest snapshot', () => {
            const aegis = new AegisState(store)
            aegis.update({ tags: ['parser'], summary: 'rewriting the lexer' })
            aegis.update({ temperature: 0.3 })
            const restored = new AegisState(store).current()
            expect(restored).toMatchObject({ tags: ['parser'], summary: 'rewriting the lexer', temperature: 0.3 })
            expect(store.countRows('aegis_state')).toBe(2)
        })

        it('returns summaries strictly older than a timestamp, skipping empty ones', () => {
            const aegis = new AegisState(store)
            aegis.update({ summary: 'alpha', tags: ['a'] })
            aegis.update({ summary: '' })
            const third = aegis.update({ summary: 'gamma' })
            expect(aegis.summariesBefore(third.createdAt, 1000).map((s) => s.summary)).toEqual(['alpha'])
            expect(aegis.summariesBefore('2100-01-01T00:00:00.000Z', 1000).map((s) => s.summary)).toEqual(['alpha', 'gamma'])
            expect(aegis.summariesBefore('2100-01-01T00:00:00.000Z', 3).map((s) => s.summary)).toEqual(['gamma'])
        })

        it('returns a summary once however many snapshots repeat it', () => {
            const aegis = new AegisState(store)
            aegis.update({ summary: 'Refactoring the parser' })
            aegis.update({ temperature: 0.7 })
            aegis.update({ tags: ['parser'] })
            aegis.update({ summary: 'Testing the parser' })
            expect(aegis.summariesBefore('2100-01-01T00:00:00.000Z', 1000).map((s) => [s.summary, s.tags])).toEqual([
                ['Refactoring the parser', []],
                ['Testing the parser', ['parser']],
            ])
        })

        it('recalls notes for the orientation within a token budget', () => {
            store.createNote({ content: 'lexer handles unicode', tags: ['parser'] })
            store.createNote({ content: 'unrelated' })
            const aegis = new AegisState(store)
            const snapshot = aegis.update({ tags: ['parser'] })
            expect(store.recallAegisNotes(snapshot, { maxTokens: 500 }).map((note) => note.content)).toEqual(['lexer handles unicode'])
            expect(store.recallAegisNotes(snapshot, { maxTokens: 1 })).toEqual([])
            expect(store.recallAegisNotes(new AegisState(store).current(), { maxTokens: 500 })).toHaveLength(1)
        })
    })
})
