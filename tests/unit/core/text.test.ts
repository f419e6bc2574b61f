import { describe, expect, it } from 'vitest'
import { collapseCodeBlocks, inlineValue, splitCsv, truncateText } from '../../../src/core/text.js'

describe('truncateText', () => {
    it('leaves short text alone', () => {
        expect(truncateText('abc', 3)).toBe('abc')
    })

    it('cuts the end', () => {
        expect(truncateText('abcdefghij', 6)).toBe('abc...')
    })

    it('keeps both ends in middle mode', () => {
        expect(truncateText('abcdefghij', 7, 'middle')).toBe('ab...ij')
        expect(truncateText('abcdefghij', 8, 'middle')).toBe('abc...ij')
    })

    it('returns only the marker for tiny limits', () => {
        expect(truncateText('abcdefghij', 2)).toBe('..')
        expect(truncateText('abcdefghij', 0)).toBe('')
    })
})

describe('collapseCodeBlocks', () => {
    it('replaces fenced blocks embedded in prose', () => {
        expect(collapseCodeBlocks('Before\n```rb\nputs 1\n```\nAfter')).toBe('Before```rb[CONTENT EXPIRED]```After')
    })

    it('leaves text without fences alone', () => {
        expect(collapseCodeBlocks('plain')).toBe('plain')
    })
})

describe('inlineValue', () => {
    it('drops quotes from JSON', () => {
        expect(inlineValue({ path: 'a.ts', lines: [1, 2] })).toBe('{path:a.ts,lines:[1,2]}')
        expect(inlineValue('raw')).toBe('raw')
        expect(inlineValue(undefined)).toBe('undefined')
    })
})

describe('splitCsv', () => {
    it('trims and drops empty items', () => {
        expect(splitCsv(' a, b ,,c ')).toEqual(['a', 'b', 'c'])
        expect(splitCsv(null)).toEqual([])
    })
})
