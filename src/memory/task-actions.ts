import { z } from 'zod'
import { TASK_STATUSES, WORKFLOW_TYPES, type Task, type WorkflowType } from './types.js'

const TaskId = z.coerce.number().int().positive()
const Step = z.coerce.number().int().nonnegative()

export const TaskActionSchema = z.discriminatedUnion('action', [
    z.object({
        action: z.literal('create'),
        title: z.string().min(1),
        plan: z.string().default(''),
        workflowType: z.enum(WORKFLOW_TYPES).default('full'),
        parentTaskId: TaskId.optional(),
    }),
    z.object({
        action: z.literal('update'),
        id: TaskId,
        log: z.string().optional(),
        stepResults: z.record(z.unknown()).optional(),
        status: z.enum(TASK_STATUSES).optional(),
        currentStep: Step.optional(),
    }),
    z.object({ action: z.literal('activate'), id: TaskId }),
    z.object({
        action: z.literal('update_plan'),
        id: TaskId,
        plan: z.string(),
        currentStep: Step.optional(),
    }),
    z.object({ action: z.literal('advance_step'), id: TaskId, currentStep: Step }),
    z.object({ action: z.literal('delete'), id: TaskId }),
    z.object({ action: z.literal('list'), parentTaskId: TaskId.optional() }),
])

export type TaskAction = z.input<typeof TaskActionSchema>

/** Untyped form, as it arrives from a tool call; validated before use. */
export type LooseTaskAction = { action: string } & Record<string, unknown>
export type ParsedTaskAction = z.output<typeof TaskActionSchema>

export type TaskActionOutput =
    | { action: 'create' | 'update' | 'activate' | 'update_plan' | 'advance_step'; task: Task }
    | { action: 'delete'; id: number }
    | { action: 'list'; tasks: Task[] }

const MAX_STEPS: Record<WorkflowType, number> = {
    simple: 3,
    analysis: 5,
    full: 10,
}

export function maxStepsForWorkflow(workflowType: WorkflowType): number {
    return MAX_STEPS[workflowType]
}
