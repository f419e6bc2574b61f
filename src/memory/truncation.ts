import { OMISSION, truncateText } from '../core/text.js'
import type { RecordedToolCall } from './types.js'

export const MAX_NOTE_CONTENT_LENGTH = 500

const FENCED_BLOCK = /```(\w*)\n([\s\S]*?)\n```/g

/**
 * Caps note content at `maxLength` before it is written.
 *
 * Fenced code blocks are shortened first so the prose around them and the
 * fence markers survive. Only when the prose alone is over the cap is the
 * whole text cut.
 */
export function truncateNoteContent(content: string, maxLength = MAX_NOTE_CONTENT_LENGTH): string {
    if (content.length <= maxLength) return content

    const blocks = [...content.matchAll(FENCED_BLOCK)]
    if (blocks.length === 0) return truncateText(content, maxLength)

    const codeLength = blocks.reduce((sum, block) => sum + (block[2]?.length ?? 0), 0)
    const proseLength = content.length - codeLength
    const available = maxLength - proseLength - blocks.length * OMISSION.length
    if (available < 0) return truncateText(content, maxLength)

    const innerLimit = Math.min(Math.floor(maxLength / 2), Math.floor(available / blocks.length))
    return content.replace(FENCED_BLOCK, (match, lang: string, inner: string) => {
        if (inner.length <= innerLimit) return match
        return `\`\`\`${lang}\n${inner.slice(0, innerLimit)}${OMISSION}\n\`\`\``
    })
}

export type StorageTier = 'minimal' | 'standard' | 'generous' | 'full'

const STORAGE_LIMITS: Record<StorageTier, number> = {
    minimal: 300,
    standard: 600,
    generous: 1200,
    full: 3000,
}

export function storageTier(priority: number): StorageTier {
    if (priority <= 1) return 'minimal'
    if (priority <= 4) return 'standard'
    if (priority <= 9) return 'generous'
    return 'full'
}

export function storageLimit(priority: number): number {
    return STORAGE_LIMITS[storageTier(priority)]
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Strings keep `limit`, nested objects get half of it, strings inside arrays a third. */
export function truncateValues(values: Record<string, unknown>, limit: number): Record<string, unknown> {
    const out: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(values)) {
        if (typeof value === 'string') {
            out[key] = truncateText(value, limit)
        } else if (isRecord(value)) {
            out[key] = truncateValues(value, Math.floor(limit / 2))
        } else if (Array.isArray(value)) {
            out[key] = value.map((item) => (typeof item === 'string' ? truncateText(item, Math.floor(limit / 3)) : item))
        } else {
            out[key] = value
        }
    }
    return out
}

function truncateResult(result: unknown, limit: number): unknown {
    if (typeof result === 'string') return truncateText(result, limit)
    if (isRecord(result)) return truncateValues(result, limit)
    return result
}

export type PriorityLookup = (toolName: string) => number | undefined

/** Applies the storage tier of each call's tool before the calls are persisted. */
export function truncateToolCallsByPriority(calls: RecordedToolCall[], priorityOf: PriorityLookup): RecordedToolCall[] {
    return calls.map((call) => {
        const limit = storageLimit(priorityOf(call.request.tool) ?? 1)
        const truncated: RecordedToolCall = {
            request: {
                tool: truncateText(call.request.tool, limit),
                args: truncateValues(call.request.args, Math.floor(limit / 2)),
            },
        }
        if (call.result !== undefined) truncated.result = truncateResult(call.result, limit)
        if (call.content !== undefined) truncated.content = truncateText(call.content, limit)
        return truncated
    })
}
