import { z } from 'zod'
import { splitCsv } from '../core/text.js'
import {
    TASK_STATUSES,
    WORKFLOW_TYPES,
    type AegisSnapshot,
    type ConversationEntry,
    type Note,
    type RecordedToolCall,
    type Task,
    type TaskWire,
} from './types.js'

export const RecordedToolCallSchema = z.object({
    request: z.object({
        tool: z.string(),
        args: z.record(z.unknown()).default({}),
    }),
    result: z.unknown().optional(),
    content: z.string().optional(),
})

const AttachmentSchema = z.object({
    file: z.string().optional(),
    selection: z.string().optional(),
    line: z.number().optional(),
    column: z.number().optional(),
    selectionRange: z.string().optional(),
})

const ToolCallListSchema = z.array(RecordedToolCallSchema)
const StepToolCallsSchema = z.record(ToolCallListSchema)
const JsonMapSchema = z.record(z.unknown())
const LogsSchema = z.array(z.object({ timestamp: z.string(), message: z.string() }))
const PlanUpdatesSchema = z.array(z.object({ step: z.number(), plan: z.string(), timestamp: z.string() }))

export function parseJsonColumn<T>(text: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    if (!text) return fallback
    try {
        const parsed = schema.safeParse(JSON.parse(text))
        return parsed.success ? parsed.data : fallback
    } catch {
        return fallback
    }
}

export const EntryRowSchema = z.object({
    id: z.number(),
    prompt: z.string().nullable(),
    answer: z.string().nullable(),
    tags: z.string().nullable(),
    file: z.string().nullable(),
    attachments_json: z.string().nullable(),
    execution_time: z.number().nullable(),
    tool_call_count: z.number().nullable(),
    tool_calls_json: z.string().nullable(),
    created_at: z.string(),
})

export function toEntry(row: z.infer<typeof EntryRowSchema>, includeToolCalls = false): ConversationEntry {
    return {
        id: row.id,
        prompt: row.prompt ?? '',
        answer: row.answer ?? '',
        tags: splitCsv(row.tags),
        file: row.file,
        attachments: parseJsonColumn(row.attachments_json, z.array(AttachmentSchema), []),
        executionTime: row.execution_time ?? 0,
        toolCallCount: row.tool_call_count ?? 0,
        toolCalls: includeToolCalls ? parseJsonColumn<RecordedToolCall[]>(row.tool_calls_json, ToolCallListSchema, []) : [],
        createdAt: row.created_at,
    }
}

export const NoteRowSchema = z.object({
    id: z.number(),
    content: z.string().nullable(),
    tags: z.string().nullable(),
    links: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string().nullable(),
})

export type NoteRow = z.infer<typeof NoteRowSchema>

export function toNote(row: NoteRow): Note {
    return {
        id: row.id,
        content: row.content ?? '',
        tags: splitCsv(row.tags),
        links: splitCsv(row.links),
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    }
}

export const TaskRowSchema = z.object({
    id: z.number(),
    title: z.string().nullable(),
    plan: z.string().nullable(),
    updates: z.string().nullable(),
    logs: z.string().nullable(),
    status: z.string().nullable(),
    current_step: z.number().nullable(),
    step_results: z.string().nullable(),
    tool_calls_json: z.string().nullable(),
    workflow_type: z.string().nullable(),
    parent_task_id: z.number().nullable(),
    subtask_results: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
})

export function toTask(row: z.infer<typeof TaskRowSchema>): Task {
    const status = z.enum(TASK_STATUSES).safeParse(row.status)
    const workflowType = z.enum(WORKFLOW_TYPES).safeParse(row.workflow_type)
    return {
        id: row.id,
        title: row.title ?? '',
        plan: row.plan ?? '',
        status: status.success ? status.data : 'pending',
        currentStep: row.current_step ?? 0,
        workflowType: workflowType.success ? workflowType.data : 'full',
        stepResults: parseJsonColumn(row.step_results, JsonMapSchema, {}),
        stepToolCalls: parseJsonColumn<Record<string, RecordedToolCall[]>>(row.tool_calls_json, StepToolCallsSchema, {}),
        parentTaskId: row.parent_task_id,
        subtaskResults: parseJsonColumn(row.subtask_results, JsonMapSchema, {}),
        logs: parseJsonColumn(row.logs, LogsSchema, []),
        planUpdates: parseJsonColumn(row.updates, PlanUpdatesSchema, []),
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    }
}

export function toTaskWire(task: Task): TaskWire {
    return {
        id: task.id,
        title: task.title,
        plan: task.plan,
        status: task.status,
        current_step: task.currentStep,
        step_results: task.stepResults,
        tool_calls_json: task.stepToolCalls,
        workflow_type: task.workflowType,
        parent_task_id: task.parentTaskId,
        subtask_results: task.subtaskResults,
    }
}

export const AegisRowSchema = z.object({
    tags: z.string().nullable(),
    summary: z.string().nullable(),
    temperature: z.number().nullable(),
    created_at: z.string(),
})

export function toAegisSnapshot(row: z.infer<typeof AegisRowSchema>): AegisSnapshot {
    return {
        tags: splitCsv(row.tags),
        summary: row.summary ?? '',
        temperature: row.temperature ?? 1,
        createdAt: row.created_at,
    }
}
