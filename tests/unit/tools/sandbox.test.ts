import { describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { StepTermination, ToolExecutionError } from '../../../src/core/errors.js'
import { classifyToolFailure, runInSandbox } from '../../../src/tools/sandbox.js'

const options = { maxRetries: 2, timeoutMs: 1000, backoffBaseMs: 0 }

describe('runInSandbox', () => {
    it('returns the first successful result', async () => {
        const work = vi.fn(async () => 'done')
        await expect(runInSandbox(work, options)).resolves.toBe('done')
        expect(work).toHaveBeenCalledTimes(1)
    })

    it('retries failed attempts', async () => {
        let calls = 0
        const work = vi.fn(async () => {
            calls++
            if (calls < 3) throw new Error('flaky')
            return 'recovered'
        })
        await expect(runInSandbox(work, options)).resolves.toBe('recovered')
        expect(work).toHaveBeenCalledTimes(3)
    })

    it('raises a classified error once retries run out', async () => {
        const work = vi.fn(async () => {
            throw new Error('boom')
        })
        const error = await runInSandbox(work, { ...options, maxRetries: 1 }).catch((e: unknown) => e)
        expect(error).toBeInstanceOf(ToolExecutionError)
        if (error instanceof ToolExecutionError) {
            expect(error.failure).toBe('tool_execution')
            expect(error.message).toBe('Tool execution: boom')
            expect(error.attempts).toBe(2)
        }
        expect(work).toHaveBeenCalledTimes(2)
    })

    it('times out work that never settles', async () => {
        const error = await runInSandbox(() => new Promise<never>(() => {}), { ...options, maxRetries: 0, timeoutMs: 10 }).catch(
            (e: unknown) => e
        )
        expect(error).toBeInstanceOf(ToolExecutionError)
        if (error instanceof ToolExecutionError) {
            expect(error.failure).toBe('timeout')
            expect(error.message).toBe('Timeout: Execution timed out after 10ms')
        }
    })

    it('passes step terminations through without retrying', async () => {
        const work = vi.fn(async () => {
            throw new StepTermination('step_completed', { result: 'ok' })
        })
        await expect(runInSandbox(work, options)).rejects.toBeInstanceOf(StepTermination)
        expect(work).toHaveBeenCalledTimes(1)
    })
})

describe('classifyToolFailure', () => {
    it('recognises parse errors', () => {
        expect(classifyToolFailure(new SyntaxError('Unexpected token'))).toBe('parse_error')
        const zodError = z.string().safeParse(1)
        if (!zodError.success) expect(classifyToolFailure(zodError.error)).toBe('parse_error')
    })

    it('recognises service-side failures', () => {
        expect(classifyToolFailure(new Error('maximum context length exceeded'))).toBe('context_length')
        expect(classifyToolFailure({ status: 429 })).toBe('rate_limit')
        expect(classifyToolFailure(new Error('connect ECONNREFUSED 127.0.0.1'))).toBe('network')
        expect(classifyToolFailure(new Error('request timed out'))).toBe('timeout')
    })

    it('defaults to a tool execution failure', () => {
        expect(classifyToolFailure(new Error('file missing'))).toBe('tool_execution')
    })
})
