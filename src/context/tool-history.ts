import { inlineValue, truncateText } from '../core/text.js'
import type { PriorityLookup } from '../memory/truncation.js'
import type { RecordedToolCall } from '../memory/types.js'

export const TOOL_HISTORY_BEGIN = '=== BEGIN TOOL HISTORY ==='
export const TOOL_HISTORY_END = '=== END TOOL HISTORY ==='

export interface FieldLimits {
    args: number
    result: number
    content: number
}

interface PriorityBand {
    floor: FieldLimits
    scale: FieldLimits
}

const UNKNOWN_PRIORITY_LIMITS: FieldLimits = { args: 50, result: 0, content: 100 }

function bandFor(toolPriority: number): PriorityBand | undefined {
    if (toolPriority === 1) return { floor: { args: 50, result: 0, content: 50 }, scale: { args: 25, result: 50, content: 25 } }
    if (toolPriority >= 2 && toolPriority <= 4) {
        return { floor: { args: 100, result: 200, content: 100 }, scale: { args: 50, result: 100, content: 50 } }
    }
    if (toolPriority >= 5 && toolPriority <= 9) {
        return { floor: { args: 200, result: 400, content: 200 }, scale: { args: 100, result: 200, content: 100 } }
    }
    if (toolPriority >= 10) {
        return { floor: { args: 500, result: 1000, content: 500 }, scale: { args: 200, result: 400, content: 200 } }
    }
    return undefined
}

/**
 * Character budgets for one call's fields. Each priority band has a floor and
 * grows with `combined`; tools of unknown priority get fixed small limits.
 */
export function fieldLimits(toolPriority: number, combined: number, mostRecent: boolean): FieldLimits {
    const band = bandFor(toolPriority)
    const limits: FieldLimits = band
        ? {
              args: Math.max(band.floor.args, Math.trunc(combined * band.scale.args)),
              result: Math.max(band.floor.result, Math.trunc(combined * band.scale.result)),
              content: Math.max(band.floor.content, Math.trunc(combined * band.scale.content)),
          }
        : UNKNOWN_PRIORITY_LIMITS
    if (!mostRecent) return limits
    return {
        args: Math.trunc(limits.args * 1.5),
        result: Math.trunc(limits.result * 1.5),
        content: Math.trunc(limits.content * 1.5),
    }
}

/**
 * Renders an entry's tool calls for replay in history. `index` is the entry's
 * distance from the present; detail decays as `exp(-index) × 3`, is shared
 * out over busy entries and favours later calls of the most recent entry.
 */
export function formatHistoryToolCalls(calls: RecordedToolCall[], index: number, priorityOf: PriorityLookup): string {
    const basePriority = Math.exp(-index) * 3
    const density = Math.max(1, calls.length / 5)

    const lines = calls.map((call, position) => {
        const name = call.request.tool
        if (!name && call.content === undefined) return ''

        const toolPriority = priorityOf(name) ?? 0
        const positionFactor = index === 0 ? 1 + (position / calls.length) * 0.5 : 1
        const combined = ((basePriority + toolPriority) * positionFactor) / density
        const limits = fieldLimits(toolPriority, combined, index === 0)

        const args = limits.args > 20 ? ` ${truncateText(inlineValue(call.request.args), limits.args, 'middle')}` : ''
        const result =
            limits.result > 30 ? ` → ${truncateText(inlineValue(call.result ?? null), limits.result, 'middle')}\n` : ' # result omitted'
        const content =
            call.content !== undefined
                ? `${TOOL_HISTORY_END}\n${truncateText(call.content, limits.content)}\n${TOOL_HISTORY_BEGIN}\n`
                : ''
        return `${name}${args}${result}${content}`
    })

    return `${TOOL_HISTORY_BEGIN}\n${lines.join('\n')}\n${TOOL_HISTORY_END}`
}
