import { describe, expect, it } from 'vitest'
import { estimateJsonTokens, estimateTokens } from '../../../src/llm/token-counter.js'

describe('estimateTokens', () => {
    it('rounds characters / 3.5 up', () => {
        expect(estimateTokens('')).toBe(0)
        expect(estimateTokens('abc')).toBe(1)
        expect(estimateTokens('a'.repeat(7))).toBe(2)
        expect(estimateTokens('a'.repeat(8))).toBe(3)
    })

    it('measures the JSON form of a value', () => {
        // {"a":1} is 7 characters
        expect(estimateJsonTokens({ a: 1 })).toBe(2)
    })
})
