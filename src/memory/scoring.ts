export const STOP_WORDS: ReadonlySet<string> = new Set(
    'the a an and of in to with on for is are am be was were it this that at by from as if or but so not into out about then'.split(' ')
)

export function tokenize(text: string | null | undefined): Set<string> {
    if (!text) return new Set()
    const tokens = text.toLowerCase().match(/\w+/g) ?? []
    return new Set(tokens.filter((token) => !STOP_WORDS.has(token)))
}

function overlap(a: Set<string>, b: Set<string>): number {
    let count = 0
    for (const token of a) if (b.has(token)) count++
    return count
}

export interface ScorableNote {
    content: string
    tags: string
    links: string
}

export const CONTENT_WEIGHT = 4
export const TAG_WEIGHT = 3
export const LINK_WEIGHT = 2
export const LINK_PATH_BONUS = 5

/** Fields are scored in their stored csv form, so the path bonus sees raw link text. */
export function scoreNote(queryTokens: Set<string>, note: ScorableNote): number {
    if (queryTokens.size === 0) return 1

    let score = CONTENT_WEIGHT * overlap(queryTokens, tokenize(note.content))
    score += TAG_WEIGHT * overlap(queryTokens, tokenize(note.tags))
    score += LINK_WEIGHT * overlap(queryTokens, tokenize(note.links))

    if (note.links && [...queryTokens].some((token) => note.links.includes(token))) {
        score += LINK_PATH_BONUS
    }
    return score
}
