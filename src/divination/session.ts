import { randomUUID } from 'node:crypto'

export type DivinationMode = 'standard' | 'reasoning'

export interface SessionOptions {
    id?: string
    reasoning?: boolean
    reminders?: readonly string[]
}

/** State owned by one divination: its mode and the reminders still to inject. */
export class DivinationSession {
    readonly id: string
    readonly mode: DivinationMode
    private readonly reminders: string[]

    constructor(options: SessionOptions = {}) {
        this.id = options.id ?? randomUUID()
        this.mode = options.reasoning ? 'reasoning' : 'standard'
        this.reminders = [...(options.reminders ?? [])]
    }

    get reasoning(): boolean {
        return this.mode === 'reasoning'
    }

    get remainingReminders(): number {
        return this.reminders.length
    }

    nextReminder(): string | undefined {
        return this.reminders.shift()
    }

    /** A fresh session with the same id, mode and original reminders. */
    static restart(previous: DivinationSession, options: SessionOptions): DivinationSession {
        return new DivinationSession({ ...options, id: previous.id })
    }
}
