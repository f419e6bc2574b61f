import pc from 'picocolors'
import type { ChannelResponse } from '../divination/channel.js'
import type { StepOutcome } from '../divination/task-runner.js'
import type { AegisSnapshot, ScoredNote, Task } from '../memory/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    tool: (name: string) => pc.blue(`${name}`),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatTokenUsage(prompt: number, completion: number): string {
    const total = prompt + completion
    return colors.dim(`tokens: ${total} (${prompt}p + ${completion}c)`)
}

export function formatResponse(response: ChannelResponse): string {
    switch (response.status) {
        case 'success':
            return response.answer ?? ''
        case 'interrupted':
            return colors.warn(`Interrupted: ${response.interruption?.__divine_interrupt ?? 'unknown'}`)
        default:
            return formatError(`[${response.status}] ${response.message ?? ''}`)
    }
}

export function formatNote(note: ScoredNote): string {
    const tags = note.tags.length > 0 ? colors.dim(` [${note.tags.join(', ')}]`) : ''
    return `${colors.bold(`#${note.id}`)} ${colors.dim(`(${note.score})`)}${tags}\n${note.content}`
}

export function formatTask(task: Task): string {
    const parent = task.parentTaskId !== null ? colors.dim(` ↳ #${task.parentTaskId}`) : ''
    return `${colors.bold(`#${task.id}`)} ${task.title} ${colors.dim(`${task.status} · step ${task.currentStep} · ${task.workflowType}`)}${parent}`
}

export function formatAegis(snapshot: AegisSnapshot): string {
    return [
        `${colors.bold('tags')}        ${snapshot.tags.join(', ') || colors.dim('(none)')}`,
        `${colors.bold('summary')}     ${snapshot.summary || colors.dim('(none)')}`,
        `${colors.bold('temperature')} ${snapshot.temperature}`,
    ].join('\n')
}

export function formatStepOutcome(outcome: StepOutcome): string {
    switch (outcome.kind) {
        case 'completed':
            return outcome.taskCompleted
                ? colors.success(`Step ${outcome.step} completed; task finished`)
                : colors.success(`Step ${outcome.step} completed; next step ${outcome.nextStep}`)
        case 'rejected':
            return colors.warn(`Step ${outcome.step} rejected${outcome.reason ? ` (${outcome.reason})` : ''}; resuming at ${outcome.restartFrom}`)
        case 'unfinished':
            return `${colors.warn(`Step ${outcome.step} ended without a decision`)}\n${outcome.answer}`
        case 'failed':
            return formatError(`Step ${outcome.step}: ${outcome.message}`)
    }
}
