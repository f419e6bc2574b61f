import { classifyError, TransportError } from '../core/errors.js'

export interface RetryPolicy {
    /** Retries after the first attempt */
    retries: number
    baseDelayMs: number
    maxDelayMs: number
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    retries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60000,
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Milliseconds asked for by a `retry-after` header on an API error, if it carries one. */
export function retryAfterMs(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('headers' in error)) return undefined
    const { headers } = error
    if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) return undefined
    const value = headers['retry-after']
    const seconds = typeof value === 'string' ? Number.parseFloat(value) : Number.NaN
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined
}

export function backoffDelay(attempt: number, policy: RetryPolicy, error?: unknown): number {
    const hinted = retryAfterMs(error)
    if (hinted !== undefined) return Math.min(hinted, policy.maxDelayMs)
    const delay = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs)
    return delay + delay * 0.1 * Math.random()
}

/** Retries transient completion failures (429, 5xx, dropped connections); permanent ones throw at once. */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy = DEFAULT_RETRY_POLICY): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (classifyError(error) === 'permanent' || attempt >= policy.retries) throw error
            const delay = backoffDelay(attempt, policy, error)
            policy.onRetry?.(error, attempt + 1, delay)
            await sleep(delay)
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

/** Stops calling the completion service after repeated failures until a cooldown passes. */
export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private openedAt = 0

    constructor(
        private readonly threshold = 5,
        private readonly cooldownMs = 30000,
        private readonly now: () => number = Date.now
    ) {}

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === 'open') {
            if (this.now() - this.openedAt < this.cooldownMs) {
                throw new TransportError('connection_failure', `Completion service unavailable after ${this.failures} failures`)
            }
            this.state = 'half_open'
        }

        try {
            const result = await fn()
            this.failures = 0
            this.state = 'closed'
            return result
        } catch (error) {
            this.failures++
            if (this.state === 'half_open' || this.failures >= this.threshold) {
                this.state = 'open'
                this.openedAt = this.now()
            }
            throw error
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
