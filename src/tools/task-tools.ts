import { z } from 'zod'
import { StepTermination } from '../core/errors.js'
import type { MemoryStore } from '../memory/store.js'
import type { AnyTool, Tool } from './types.js'

const CompleteStepInput = z.object({
    result: z.unknown().optional().describe('What this step produced; later steps read it'),
})

const RejectStepInput = z.object({
    reason: z.string().optional().describe('Why the step cannot be completed as planned'),
    restart_from_step: z.number().int().positive().optional().describe('Step to resume from (default: the previous step)'),
})

const PreviousResultsInput = z.object({})

/** Tools that end a task step. They throw StepTermination, which the executor turns into an interruption marker. */
export function createTaskTools(store: MemoryStore): AnyTool[] {
    const completeStep: Tool<z.infer<typeof CompleteStepInput>, never> = {
        name: 'task_complete_step',
        description: 'Finish the current task step with its result',
        parameters: CompleteStepInput,
        historyPriority: 5,
        async execute(input) {
            throw new StepTermination('step_completed', { result: input.result })
        },
    }

    const rejectStep: Tool<z.infer<typeof RejectStepInput>, never> = {
        name: 'task_reject_step',
        description: 'Stop the current task step and send the task back to an earlier step',
        parameters: RejectStepInput,
        historyPriority: 5,
        async execute(input) {
            throw new StepTermination('step_rejected', {
                reason: input.reason,
                restartFromStep: input.restart_from_step,
            })
        },
    }

    const previousResults: Tool<z.infer<typeof PreviousResultsInput>> = {
        name: 'task_get_previous_results',
        description: 'Results recorded by the earlier steps of the current task',
        parameters: PreviousResultsInput,
        historyPriority: 3,
        async execute(_input, ctx) {
            if (!ctx.task) return { error: 'Not running inside a task step' }
            const task = store.getTask(ctx.task.taskId)
            if (!task) return { error: `Task ${ctx.task.taskId} not found` }
            const step = ctx.task.step
            const results = Object.fromEntries(Object.entries(task.stepResults).filter(([key]) => Number(key) < step))
            return { task_id: task.id, current_step: step, results }
        },
    }

    return [completeStep, rejectStep, previousResults]
}
