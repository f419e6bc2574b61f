import { z } from 'zod'
import type { AegisState } from '../memory/aegis.js'
import type { MemoryStore } from '../memory/store.js'
import { toTaskWire } from '../memory/rows.js'
import { TASK_STATUSES, WORKFLOW_TYPES } from '../memory/types.js'
import type { AnyTool, Tool } from './types.js'

const RecallInput = z.object({
    query: z.string().describe('Words to look for in note content, tags and links'),
    limit: z.number().int().positive().max(20).optional().describe('Max notes to return (default: 5)'),
})

const RememberInput = z.object({
    content: z.string().min(1).describe('What to remember; long text is shortened'),
    tags: z.array(z.string()).optional(),
    links: z.array(z.string()).optional().describe('Related file paths'),
})

const UpdateNoteInput = z.object({
    id: z.number().int().positive(),
    content: z.string().optional(),
    tags: z.array(z.string()).optional(),
    links: z.array(z.string()).optional(),
})

const RemoveNoteInput = z.object({ id: z.number().int().positive() })

const ManageTasksInput = z.object({
    action: z.enum(['create', 'update', 'activate', 'update_plan', 'advance_step', 'delete', 'list']),
    id: z.number().int().positive().optional(),
    title: z.string().optional(),
    plan: z.string().optional(),
    workflow_type: z.enum(WORKFLOW_TYPES).optional(),
    parent_task_id: z.number().int().positive().optional(),
    status: z.enum(TASK_STATUSES).optional(),
    current_step: z.number().int().nonnegative().optional(),
    log: z.string().optional(),
})

const UpdateAegisInput = z.object({
    tags: z.array(z.string()).optional().describe('Replaces the current orientation tags'),
    summary: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
})

export function createMemoryTools(store: MemoryStore, aegis: AegisState): AnyTool[] {
    const recallNotes: Tool<z.infer<typeof RecallInput>> = {
        name: 'recall_notes',
        description: 'Search long-term notes by keyword; results are ranked by relevance',
        parameters: RecallInput,
        historyPriority: 2,
        async execute(input) {
            const notes = store.recallNotes(input.query, { limit: input.limit })
            return { notes: notes.map(({ id, content, tags, links, score }) => ({ id, content, tags, links, score })) }
        },
    }

    const remember: Tool<z.infer<typeof RememberInput>> = {
        name: 'remember',
        description: 'Save a note to long-term memory',
        parameters: RememberInput,
        historyPriority: 3,
        async execute(input) {
            return { id: store.createNote(input) }
        },
    }

    const updateNote: Tool<z.infer<typeof UpdateNoteInput>> = {
        name: 'update_note',
        description: 'Change the content, tags or links of a note',
        parameters: UpdateNoteInput,
        historyPriority: 3,
        async execute({ id, ...change }) {
            return store.updateNote(id, change) ? { ok: true, id } : { error: `Note ${id} not found` }
        },
    }

    const removeNote: Tool<z.infer<typeof RemoveNoteInput>> = {
        name: 'remove_note',
        description: 'Delete a note from long-term memory',
        parameters: RemoveNoteInput,
        historyPriority: 1,
        async execute({ id }) {
            return store.removeNote(id) ? { ok: true, id } : { error: `Note ${id} not found` }
        },
    }

    const manageTasks: Tool<z.infer<typeof ManageTasksInput>> = {
        name: 'manage_tasks',
        description: 'Create, update, activate, re-plan, advance, delete or list tasks',
        parameters: ManageTasksInput,
        historyPriority: 4,
        async execute(input) {
            const result = store.manageTask({
                action: input.action,
                id: input.id,
                title: input.title,
                plan: input.plan,
                workflowType: input.workflow_type,
                parentTaskId: input.parent_task_id,
                status: input.status,
                currentStep: input.current_step,
                log: input.log,
            })
            if (!result.ok) return { error: result.error }
            const output = result.value
            switch (output.action) {
                case 'list':
                    return { tasks: output.tasks.map(toTaskWire) }
                case 'delete':
                    return { deleted: output.id }
                default:
                    return { task: toTaskWire(output.task) }
            }
        },
    }

    const updateAegis: Tool<z.infer<typeof UpdateAegisInput>> = {
        name: 'update_aegis',
        description: 'Update the sticky orientation: focus tags, a running summary and the sampling temperature',
        parameters: UpdateAegisInput,
        historyPriority: 2,
        async execute(input) {
            const { tags, summary, temperature } = aegis.update(input)
            return { tags, summary, temperature }
        },
    }

    return [recallNotes, remember, updateNote, removeNote, manageTasks, updateAegis]
}
