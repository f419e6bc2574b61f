import type { MemoryStore } from './store.js'
import type { AegisSnapshot } from './types.js'

export const DEFAULT_TEMPERATURE = 1.0

export interface AegisUpdate {
    tags?: string[]
    summary?: string
    temperature?: number
}

/**
 * Sticky orientation shared by every session of a process. Each update appends
 * a snapshot; `current()` is always the last one fully written.
 */
export class AegisState {
    private snapshot: AegisSnapshot

    constructor(private readonly store: MemoryStore) {
        this.snapshot = store.latestAegisSnapshot() ?? {
            tags: [],
            summary: '',
            temperature: DEFAULT_TEMPERATURE,
            createdAt: new Date(0).toISOString(),
        }
    }

    current(): AegisSnapshot {
        return { ...this.snapshot, tags: [...this.snapshot.tags] }
    }

    get temperature(): number {
        return this.snapshot.temperature
    }

    update(change: AegisUpdate): AegisSnapshot {
        const next = this.store.appendAegisSnapshot({
            tags: change.tags ?? this.snapshot.tags,
            summary: change.summary ?? this.snapshot.summary,
            temperature: change.temperature ?? this.snapshot.temperature,
        })
        this.snapshot = next
        return this.current()
    }

    /** Re-reads the latest snapshot, picking up writes from other processes. */
    refresh(): AegisSnapshot {
        const latest = this.store.latestAegisSnapshot()
        if (latest) this.snapshot = latest
        return this.current()
    }

    summariesBefore(timestamp: string, maxTokens: number): AegisSnapshot[] {
        return this.store.aegisSnapshotsBefore(timestamp, maxTokens)
    }
}
