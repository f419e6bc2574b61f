import { describe, expect, it, vi } from 'vitest'
import { PermanentError, TransientError, TransportError } from '../../../src/core/errors.js'
import { backoffDelay, CircuitBreaker, retryAfterMs, withRetry } from '../../../src/llm/retry.js'

const fast = { retries: 3, baseDelayMs: 1, maxDelayMs: 5 }

describe('withRetry', () => {
    it('returns on first success', async () => {
        const fn = vi.fn(() => Promise.resolve('ok'))
        await expect(withRetry(fn, fast)).resolves.toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries on transient error and reports each retry', async () => {
        let calls = 0
        const fn = vi.fn(() => {
            calls++
            if (calls === 1) return Promise.reject(new TransientError('timeout'))
            return Promise.resolve('recovered')
        })
        const onRetry = vi.fn()
        await expect(withRetry(fn, { ...fast, onRetry })).resolves.toBe('recovered')
        expect(fn).toHaveBeenCalledTimes(2)
        expect(onRetry).toHaveBeenCalledTimes(1)
        expect(onRetry.mock.calls[0]?.[1]).toBe(1)
    })

    it('throws immediately on permanent error', async () => {
        const fn = vi.fn(() => Promise.reject(new PermanentError('invalid key')))
        await expect(withRetry(fn, fast)).rejects.toThrow('invalid key')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('throws after the configured retries', async () => {
        const fn = vi.fn(() => Promise.reject(new TransportError('rate_limit', 'slow down')))
        await expect(withRetry(fn, { ...fast, retries: 2 })).rejects.toThrow('slow down')
        expect(fn).toHaveBeenCalledTimes(3)
    })
})

describe('backoffDelay', () => {
    const policy = { retries: 3, baseDelayMs: 100, maxDelayMs: 1000 }

    it('doubles per attempt with up to ten percent jitter', () => {
        const delay = backoffDelay(2, policy)
        expect(delay).toBeGreaterThanOrEqual(400)
        expect(delay).toBeLessThan(440)
    })

    it('follows a retry-after hint, capped at the maximum delay', () => {
        expect(backoffDelay(0, policy, { headers: { 'retry-after': '0.5' } })).toBe(500)
        expect(backoffDelay(0, policy, { headers: { 'retry-after': '30' } })).toBe(1000)
    })
})

describe('retryAfterMs', () => {
    it('ignores errors without a usable header', () => {
        expect(retryAfterMs(new Error('x'))).toBeUndefined()
        expect(retryAfterMs({ headers: { 'retry-after': 'soon' } })).toBeUndefined()
        expect(retryAfterMs({ headers: null })).toBeUndefined()
    })
})

describe('CircuitBreaker', () => {
    it('starts in closed state', () => {
        expect(new CircuitBreaker().getState()).toBe('closed')
    })

    it('opens after threshold failures and refuses calls during the cooldown', async () => {
        const breaker = new CircuitBreaker(2, 100, () => 0)
        const fail = () => Promise.reject(new Error('fail'))

        await expect(breaker.execute(fail)).rejects.toThrow('fail')
        await expect(breaker.execute(fail)).rejects.toThrow('fail')
        expect(breaker.getState()).toBe('open')

        const refused = await breaker.execute(() => Promise.resolve('ok')).catch((error: unknown) => error)
        expect(refused).toBeInstanceOf(TransportError)
        expect(refused).toMatchObject({ failure: 'connection_failure', message: 'Completion service unavailable after 2 failures' })
    })

    it('recovers after the cooldown', async () => {
        let now = 0
        const breaker = new CircuitBreaker(1, 50, () => now)
        await expect(breaker.execute(() => Promise.reject(new Error('x')))).rejects.toThrow()
        expect(breaker.getState()).toBe('open')

        now = 60
        await expect(breaker.execute(() => Promise.resolve('ok'))).resolves.toBe('ok')
        expect(breaker.getState()).toBe('closed')
    })

    it('opens again when the trial call fails', async () => {
        let now = 0
        const breaker = new CircuitBreaker(3, 50, () => now)
        for (let i = 0; i < 3; i++) await breaker.execute(() => Promise.reject(new Error('x'))).catch(() => undefined)
        now = 60
        await expect(breaker.execute(() => Promise.reject(new Error('still down')))).rejects.toThrow('still down')
        expect(breaker.getState()).toBe('open')
    })
})
