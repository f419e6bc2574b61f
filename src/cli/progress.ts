import type { EventMap, TypedEventEmitter } from '../core/events.js'

const TOOL_LABELS: Record<string, string> = {
    recall_notes: 'Recalling notes...',
    remember: 'Saving a note...',
    update_note: 'Updating a note...',
    remove_note: 'Removing a note...',
    manage_tasks: 'Updating tasks...',
    update_aegis: 'Re-orienting...',
    task_complete_step: 'Completing step...',
    task_reject_step: 'Rejecting step...',
    task_get_previous_results: 'Reading earlier steps...',
}

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    const onTurn = (data: EventMap['divination:turn']) => {
        spinner.message(data.toolCalls > 0 ? `Turn ${data.turn}: ${data.toolCalls} tool call(s)` : `Turn ${data.turn}: thinking...`)
    }

    const onToolBefore = (data: EventMap['tool:before']) => {
        spinner.message(TOOL_LABELS[data.toolName] ?? `Running ${data.toolName}...`)
    }

    const onReminder = (data: EventMap['reminder:injected']) => {
        spinner.message(`Nudging to finish (${data.remaining} reminder(s) left)...`)
    }

    const onRestart = (data: EventMap['divination:restart']) => {
        spinner.message(`Temperature now ${data.temperature}; restarting...`)
    }

    eventBus.on('divination:turn', onTurn)
    eventBus.on('tool:before', onToolBefore)
    eventBus.on('reminder:injected', onReminder)
    eventBus.on('divination:restart', onRestart)

    return {
        dispose() {
            eventBus.off('divination:turn', onTurn)
            eventBus.off('tool:before', onToolBefore)
            eventBus.off('reminder:injected', onReminder)
            eventBus.off('divination:restart', onRestart)
        },
    }
}
