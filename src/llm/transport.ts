import OpenAI from 'openai'
import { z } from 'zod'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, httpStatusOf, isAbortError, TransportError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, DEFAULT_RETRY_POLICY, withRetry } from './retry.js'
import type { CompletionPayload, CompletionRequest, ExtractedCompletion, TransportClient } from './types.js'

export type TransportSettings = Pick<
    ResolvedConfig,
    'model' | 'reasoningModel' | 'maxTokens' | 'reasoningMaxTokens' | 'requestTimeout' | 'reasoningTimeout'
>

const REASONING_MODEL_PATTERN = /reason/i

export function isReasoningModel(model: string): boolean {
    return REASONING_MODEL_PATTERN.test(model)
}

/** Reasoning requests never carry tool schemas; neither does any request to a reasoning model. */
export function buildCompletionPayload(
    settings: TransportSettings,
    request: CompletionRequest,
    temperature: number
): CompletionPayload {
    const model = request.reasoning ? settings.reasoningModel : settings.model
    const payload: CompletionPayload = {
        model,
        messages: request.messages,
        max_tokens: request.reasoning ? settings.reasoningMaxTokens : settings.maxTokens,
        temperature: request.temperature ?? temperature,
    }
    if (!request.reasoning && !isReasoningModel(model) && request.tools.length > 0) {
        payload.tools = request.tools
    }
    return payload
}

const CompletionResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                finish_reason: z.string().nullable().optional(),
                message: z.object({
                    content: z.string().nullable().optional(),
                    tool_calls: z.array(z.unknown()).nullable().optional(),
                    reasoning_content: z.string().nullable().optional(),
                }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number().optional(),
            completion_tokens: z.number().optional(),
        })
        .nullable()
        .optional(),
})

export function extractCompletion(raw: unknown): ExtractedCompletion {
    const parsed = CompletionResponseSchema.safeParse(raw)
    if (!parsed.success) {
        throw new TransportError('failure', `Malformed completion response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`)
    }
    const [choice] = parsed.data.choices
    const message = choice?.message
    const artifacts: ExtractedCompletion['artifacts'] = {}
    if (message?.reasoning_content) artifacts.reasoning = message.reasoning_content
    if (choice?.finish_reason) artifacts.finishReason = choice.finish_reason
    if (parsed.data.usage) {
        artifacts.usage = {
            promptTokens: parsed.data.usage.prompt_tokens ?? 0,
            completionTokens: parsed.data.usage.completion_tokens ?? 0,
        }
    }
    return {
        content: message?.content ?? '',
        toolCalls: message?.tool_calls ?? [],
        artifacts,
    }
}

const TIMEOUT_MARKERS = ['timed out', 'timeout', 'etimedout']
const CONTEXT_MARKERS = ['context length', 'context_length', 'maximum context', 'too many tokens']
const RATE_LIMIT_MARKERS = ['rate_limit', 'rate limit', 'too many requests']
const CONNECTION_MARKERS = ['econnrefused', 'econnreset', 'enotfound', 'fetch failed', 'connection', 'socket hang up']

function mentions(message: string, markers: string[]): boolean {
    return markers.some((marker) => message.includes(marker))
}

/** Maps any failure of a completion request to one transport failure kind. */
export function classifyTransportError(error: unknown): TransportError {
    if (error instanceof TransportError) return error
    const message = errorMessage(error)
    const lower = message.toLowerCase()

    if (error instanceof OpenAI.APIConnectionTimeoutError || isAbortError(error) || mentions(lower, TIMEOUT_MARKERS)) {
        return new TransportError('timeout', message, { cause: error })
    }
    if (mentions(lower, CONTEXT_MARKERS)) {
        return new TransportError('context_length_exceeded', message, { cause: error })
    }
    if (httpStatusOf(error) === 429 || mentions(lower, RATE_LIMIT_MARKERS)) {
        return new TransportError('rate_limit', message, { cause: error })
    }
    if (error instanceof OpenAI.APIConnectionError || mentions(lower, CONNECTION_MARKERS)) {
        return new TransportError('connection_failure', message, { cause: error })
    }
    return new TransportError('failure', message, { cause: error })
}

export interface TransportClientOptions {
    /** Orientation temperature used when a request carries none */
    currentTemperature: () => number
}

export function createTransportClient(
    config: ResolvedConfig,
    logger: Logger,
    options: TransportClientOptions
): TransportClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        maxRetries: 0,
    })
    const breaker = new CircuitBreaker()
    const log = logger.child({ component: 'transport' })

    return {
        buildRequest(request: CompletionRequest): CompletionPayload {
            return buildCompletionPayload(config, request, options.currentTemperature())
        },

        timeoutFor(reasoning: boolean): number {
            return (reasoning ? config.reasoningTimeout : config.requestTimeout) * 1000
        },

        async send(payload: CompletionPayload, timeoutMs: number): Promise<unknown> {
            log.debug({ model: payload.model, messages: payload.messages.length, tools: payload.tools?.length ?? 0 }, 'llm:request')
            try {
                const response = await breaker.execute(() =>
                    withRetry(
                        () =>
                            openai.chat.completions.create(
                                {
                                    model: payload.model,
                                    messages: payload.messages as OpenAI.ChatCompletionMessageParam[],
                                    tools: payload.tools as OpenAI.ChatCompletionTool[] | undefined,
                                    temperature: payload.temperature,
                                    max_tokens: payload.max_tokens,
                                },
                                { timeout: timeoutMs }
                            ),
                        {
                            ...DEFAULT_RETRY_POLICY,
                            onRetry: (error, attempt, delayMs) =>
                                log.warn({ attempt, delayMs, error: errorMessage(error) }, 'llm:retry'),
                        }
                    )
                )
                log.debug({ usage: response.usage }, 'llm:response')
                return response
            } catch (error) {
                const classified = classifyTransportError(error)
                log.error({ failure: classified.failure, error: classified.message }, 'llm:failed')
                throw classified
            }
        },

        extract: extractCompletion,
    }
}
