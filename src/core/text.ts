export const OMISSION = '...'

const FENCED_BLOCK_IN_PROSE = /\n\s*```(\w*)[\s\S]*?\n\s*```\s*\n/g

/**
 * Cuts `text` to at most `limit` characters, marking the cut with `...`.
 * `middle` keeps both ends of the text and drops its centre.
 */
export function truncateText(text: string, limit: number, position: 'end' | 'middle' = 'end'): string {
    if (text.length <= limit) return text
    if (limit <= OMISSION.length) return OMISSION.slice(0, Math.max(0, limit))

    const keep = limit - OMISSION.length
    if (position === 'middle') {
        const head = Math.ceil(keep / 2)
        const tail = keep - head
        return `${text.slice(0, head)}${OMISSION}${tail > 0 ? text.slice(text.length - tail) : ''}`
    }
    return `${text.slice(0, keep)}${OMISSION}`
}

/** Replaces fenced code blocks embedded in prose with a short placeholder. */
export function collapseCodeBlocks(text: string): string {
    return text.replace(FENCED_BLOCK_IN_PROSE, '```$1[CONTENT EXPIRED]```')
}

/** Compact one-line rendering of a value with string quotes removed. */
export function inlineValue(value: unknown): string {
    if (typeof value === 'string') return value
    const json = JSON.stringify(value)
    return json === undefined ? String(value) : json.replace(/"/g, '')
}

export function splitCsv(value: string | null | undefined): string[] {
    if (!value) return []
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
}
