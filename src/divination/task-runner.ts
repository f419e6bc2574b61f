import { err, ok, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { MemoryStore } from '../memory/store.js'
import { maxStepsForWorkflow } from '../memory/task-actions.js'
import type { Task } from '../memory/types.js'
import type { InterruptionMarker } from '../tools/interrupt.js'
import { type Channel, type ChannelResponse, toRecordedCalls } from './channel.js'
import { DEFAULT_STEP_REMINDERS } from './prompts.js'

export type StepOutcome =
    | { kind: 'completed'; step: number; nextStep: number; taskCompleted: boolean }
    | { kind: 'rejected'; step: number; restartFrom: number; reason?: string }
    | { kind: 'unfinished'; step: number; answer: string }
    | { kind: 'failed'; step: number; status: ChannelResponse['status']; message: string }

export interface RunStepOptions {
    instructions?: string
    reminders?: string[]
}

/** Where a rejected step resumes: the requested step, or the one before, kept within the workflow. */
export function restartStepFor(marker: InterruptionMarker, step: number, maxSteps: number): number {
    const requested = marker.restart_from_step ?? Math.max(step - 1, 1)
    return Math.min(Math.max(requested, 1), maxSteps)
}

export function stepPrompt(task: Task, step: number, maxSteps: number, instructions?: string): string {
    const previous = Object.entries(task.stepResults).filter(([key]) => Number(key) < step)
    const lines = [
        `Task #${task.id}: ${task.title}`,
        '',
        'Plan:',
        task.plan || '(no plan recorded)',
        '',
        `Current step: ${step} of ${maxSteps}`,
    ]
    if (previous.length > 0) {
        lines.push('', 'Results of earlier steps:')
        for (const [key, value] of previous) lines.push(`- step ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    }
    if (instructions) lines.push('', instructions)
    return lines.join('\n')
}

/**
 * Runs one step of a stored task through the channel and moves the step
 * counter according to the interruption the step ended with.
 */
export class TaskStepRunner {
    private readonly logger: Logger

    constructor(
        private readonly store: MemoryStore,
        private readonly channel: Channel,
        logger: Logger
    ) {
        this.logger = logger.child({ component: 'tasks' })
    }

    async runStep(taskId: number, options: RunStepOptions = {}): Promise<Result<StepOutcome>> {
        const task = this.store.getTask(taskId)
        if (!task) return err(`Task ${taskId} not found`)
        if (task.status === 'completed' || task.status === 'cancelled') {
            return err(`Task ${taskId} is ${task.status}`)
        }

        const maxSteps = maxStepsForWorkflow(task.workflowType)
        const step = Math.max(task.currentStep, 1)
        const prepared = this.store.manageTask({ action: 'update', id: taskId, status: 'active', currentStep: step })
        if (!prepared.ok) return err(prepared.error)

        this.logger.info({ taskId, step, maxSteps }, 'Running task step')
        const response = await this.channel.divine({
            prompt: stepPrompt(task, step, maxSteps, options.instructions),
            history: false,
            reminders: options.reminders ?? DEFAULT_STEP_REMINDERS,
            task: { taskId, step },
            context: { task_id: taskId, step, previous_results: task.stepResults },
        })

        const recorded = this.store.recordStepToolCalls(taskId, step, toRecordedCalls(response.toolResults))
        if (!recorded.ok) return err(recorded.error)

        if (response.status === 'interrupted' && response.interruption) {
            return this.applyInterruption(task, step, maxSteps, response.interruption)
        }
        if (response.status === 'success') {
            const answer = response.answer ?? ''
            this.appendLog(taskId, `Step ${step} ended without completing: ${answer.slice(0, 200)}`)
            return ok({ kind: 'unfinished', step, answer })
        }
        const message = response.message ?? response.status
        this.appendLog(taskId, `Step ${step} failed: ${message}`)
        return ok({ kind: 'failed', step, status: response.status, message })
    }

    private applyInterruption(task: Task, step: number, maxSteps: number, marker: InterruptionMarker): Result<StepOutcome> {
        if (marker.__divine_interrupt === 'step_completed') {
            const saved = this.store.recordStepResult(task.id, step, marker.result ?? '')
            if (!saved.ok) return err(saved.error)
            const taskCompleted = step >= maxSteps
            const nextStep = taskCompleted ? step : step + 1
            const updated = this.store.manageTask({
                action: 'update',
                id: task.id,
                currentStep: nextStep,
                status: taskCompleted ? 'completed' : 'active',
                log: `Step ${step} completed`,
            })
            if (!updated.ok) return err(updated.error)
            return ok({ kind: 'completed', step, nextStep, taskCompleted })
        }

        const restartFrom = restartStepFor(marker, step, maxSteps)
        const updated = this.store.manageTask({
            action: 'update',
            id: task.id,
            currentStep: restartFrom,
            log: `Step ${step} rejected${marker.reason ? `: ${marker.reason}` : ''}; resuming at step ${restartFrom}`,
        })
        if (!updated.ok) return err(updated.error)
        return ok({ kind: 'rejected', step, restartFrom, reason: marker.reason ?? undefined })
    }

    private appendLog(taskId: number, message: string): void {
        const logged = this.store.manageTask({ action: 'update', id: taskId, log: message })
        if (!logged.ok) this.logger.warn({ taskId, error: logged.error }, 'Could not append task log')
    }
}
