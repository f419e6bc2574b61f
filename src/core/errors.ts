export type ErrorKind = 'transient' | 'permanent'

export class AugurError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'AugurError'
        this.kind = kind
    }
}

export class TransientError extends AugurError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends AugurError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

export type TransportFailure = 'timeout' | 'connection_failure' | 'rate_limit' | 'context_length_exceeded' | 'failure'

/**
 * Raised once by the transport client after a request failed for good.
 * The divination loop turns it into a terminal status, never re-classifies it.
 */
export class TransportError extends AugurError {
    readonly failure: TransportFailure

    constructor(failure: TransportFailure, message: string, options?: ErrorOptions) {
        super(message, failure === 'rate_limit' || failure === 'timeout' ? 'transient' : 'permanent', options)
        this.name = 'TransportError'
        this.failure = failure
    }
}

export type ToolFailureKind = 'timeout' | 'rate_limit' | 'network' | 'parse_error' | 'context_length' | 'tool_execution'

export class ToolExecutionError extends AugurError {
    readonly failure: ToolFailureKind
    readonly attempts: number

    constructor(failure: ToolFailureKind, message: string, attempts: number, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'ToolExecutionError'
        this.failure = failure
        this.attempts = attempts
    }
}

export type InterruptKind = 'step_completed' | 'step_rejected'

/**
 * Thrown by a tool to hand control back to the task engine.
 * Not a fault: the sandbox never retries it and the executor turns it into an interruption marker.
 */
export class StepTermination extends Error {
    readonly interrupt: InterruptKind
    readonly result?: unknown
    readonly reason?: string
    readonly restartFromStep?: number

    constructor(
        interrupt: InterruptKind,
        details: { result?: unknown; reason?: string; restartFromStep?: number } = {}
    ) {
        super(`Step termination: ${interrupt}`)
        this.name = 'StepTermination'
        this.interrupt = interrupt
        this.result = details.result
        this.reason = details.reason
        this.restartFromStep = details.restartFromStep
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function truncateMessage(message: string, max = 300): string {
    if (message.length <= max) return message
    return `${message.slice(0, max - 3)}...`
}

export function shortBacktrace(error: unknown, frames = 3): string | undefined {
    if (!(error instanceof Error) || !error.stack) return undefined
    return error.stack
        .split('\n')
        .slice(1, frames + 1)
        .map((line) => line.trim())
        .join(' | ')
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function httpStatusOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('status' in error)) return undefined
    return typeof error.status === 'number' ? error.status : undefined
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof AugurError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    const status = httpStatusOf(error)
    if (status !== undefined) return classifyHttpError(status)
    return 'permanent'
}
