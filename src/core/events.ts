import type { InterruptKind } from './errors.js'

export type EventMap = {
    'divination:start': { sessionId: string; reasoning: boolean }
    'divination:turn': { sessionId: string; turn: number; toolCalls: number }
    'divination:restart': { sessionId: string; attempt: number; temperature: number }
    'divination:complete': { sessionId: string; turns: number; outcome: 'answer' | 'interrupted' | 'failure' }
    'divination:interrupt': { sessionId: string; interrupt: InterruptKind }
    'reminder:injected': { sessionId: string; remaining: number }
    'tool:before': { toolName: string; args: unknown; fallback: boolean }
    'tool:after': { toolName: string; duration: number; success: boolean }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<never>>>()

    /** Listener failures are reported here and never reach the emitter */
    constructor(private readonly onListenerError?: (event: keyof EventMap, error: unknown) => void) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                ;(handler as EventHandler<EventMap[K]>)(data)
            } catch (error) {
                this.onListenerError?.(event, error)
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
