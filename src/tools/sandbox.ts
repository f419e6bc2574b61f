import { ZodError } from 'zod'
import {
    errorMessage,
    httpStatusOf,
    StepTermination,
    ToolExecutionError,
    type ToolFailureKind,
    truncateMessage,
} from '../core/errors.js'
import { sleep } from '../llm/retry.js'
import type { Logger } from '../logger/index.js'

export interface SandboxOptions {
    maxRetries: number
    timeoutMs: number
    backoffBaseMs: number
    logger?: Logger
    label?: string
}

class SandboxTimeout extends Error {
    constructor(timeoutMs: number) {
        super(`Execution timed out after ${timeoutMs}ms`)
        this.name = 'TimeoutError'
    }
}

const FAILURE_LABELS: Record<ToolFailureKind, string> = {
    timeout: 'Timeout',
    rate_limit: 'Rate limit',
    network: 'Network',
    parse_error: 'Parse error',
    context_length: 'Context length',
    tool_execution: 'Tool execution',
}

export function classifyToolFailure(error: unknown): ToolFailureKind {
    if (error instanceof SandboxTimeout) return 'timeout'
    if (error instanceof SyntaxError || error instanceof ZodError) return 'parse_error'

    const message = errorMessage(error).toLowerCase()
    if (message.includes('context length') || message.includes('maximum context')) return 'context_length'
    if (message.includes('timeout') || message.includes('timed out')) return 'timeout'
    if (httpStatusOf(error) === 429 || message.includes('rate limit') || message.includes('rate_limit')) return 'rate_limit'
    if (message.includes('network') || message.includes('connection') || message.includes('econn')) return 'network'
    return 'tool_execution'
}

async function withTimeout<T>(work: () => Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new SandboxTimeout(timeoutMs)), timeoutMs)
    })
    try {
        return await Promise.race([work(), timeout])
    } finally {
        clearTimeout(timer)
    }
}

/**
 * Runs `work` with a timeout; the n-th retry waits `2^n × backoffBaseMs`.
 * StepTermination passes through untouched; anything else that outlasts the
 * retry budget becomes a ToolExecutionError.
 */
export async function runInSandbox<T>(work: () => Promise<T>, options: SandboxOptions): Promise<T> {
    const { maxRetries, timeoutMs, backoffBaseMs, logger, label = 'tool' } = options
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        try {
            return await withTimeout(work, timeoutMs)
        } catch (error) {
            if (error instanceof StepTermination) throw error
            const failure = classifyToolFailure(error)
            if (attempt === maxRetries) {
                throw new ToolExecutionError(
                    failure,
                    `${FAILURE_LABELS[failure]}: ${truncateMessage(errorMessage(error))}`,
                    attempt + 1,
                    { cause: error }
                )
            }
            const delay = 2 ** (attempt + 1) * backoffBaseMs
            logger?.warn({ label, failure, attempt: attempt + 1, maxRetries, delay }, 'tool:retry')
            await sleep(delay)
        }
    }
    throw new Error('Unreachable')
}
