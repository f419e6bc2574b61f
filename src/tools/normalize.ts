import { randomUUID } from 'node:crypto'

/** Canonical field name → every spelling accepted for it. */
export const TOOL_CALL_ALIASES = Object.freeze({
    tool_calls: Object.freeze(['tool_calls', 'toolcalls', 'tools']),
    name: Object.freeze(['name', 'tool_name', 'toolname']),
    arguments: Object.freeze(['arguments', 'args', 'params', 'parameters']),
})

export type CanonicalField = keyof typeof TOOL_CALL_ALIASES

export interface CanonicalToolCall {
    id: string
    name: string
    arguments: Record<string, unknown>
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function pick(source: Record<string, unknown>, field: CanonicalField): unknown {
    for (const key of TOOL_CALL_ALIASES[field]) {
        const value = source[key]
        if (value !== undefined && value !== null) return value
    }
    return undefined
}

/** Looks on the call itself first, then under its `function` key. */
function lookup(call: unknown, field: CanonicalField): unknown {
    if (!isRecord(call)) return undefined
    const direct = pick(call, field)
    if (direct !== undefined) return direct
    return isRecord(call.function) ? pick(call.function, field) : undefined
}

export function extractName(call: unknown): string | undefined {
    const name = lookup(call, 'name')
    return typeof name === 'string' && name.length > 0 ? name : undefined
}

/** String arguments are parsed as JSON; text that is not an object comes back as `{error: text}`. */
export function extractArguments(call: unknown): Record<string, unknown> {
    const args = lookup(call, 'arguments')
    if (isRecord(args)) return args
    if (typeof args !== 'string') return {}
    if (args.trim() === '') return {}
    try {
        const parsed: unknown = JSON.parse(args)
        return isRecord(parsed) ? parsed : { error: args }
    } catch {
        return { error: args }
    }
}

export function extractId(call: unknown): string | undefined {
    if (!isRecord(call)) return undefined
    return typeof call.id === 'string' && call.id.length > 0 ? call.id : undefined
}

export function normalizeToolCall(call: unknown): CanonicalToolCall | undefined {
    const name = extractName(call)
    if (!name) return undefined
    return { id: extractId(call) ?? randomUUID(), name, arguments: extractArguments(call) }
}

const JSON_FENCE = /^\s*```json\s*\n([\s\S]*?)^\s*```/gm

function callsFromObject(parsed: unknown): unknown[] {
    if (!isRecord(parsed)) return []
    const batch = pick(parsed, 'tool_calls')
    if (Array.isArray(batch)) return batch
    const hasCallField = [...TOOL_CALL_ALIASES.name, ...TOOL_CALL_ALIASES.arguments].some((key) => key in parsed)
    return hasCallField ? [parsed] : []
}

/**
 * Tool calls written into free text as fenced `json` blocks. Every block is
 * read, in document order; blocks that do not parse or name no tool are skipped.
 */
export function extractFromContent(text: string | null | undefined): CanonicalToolCall[] {
    if (!text) return []
    const calls: CanonicalToolCall[] = []
    for (const match of text.matchAll(JSON_FENCE)) {
        let parsed: unknown
        try {
            parsed = JSON.parse(match[1] ?? '')
        } catch {
            continue
        }
        for (const raw of callsFromObject(parsed)) {
            const call = normalizeToolCall(raw)
            if (call) calls.push(call)
        }
    }
    return calls
}
