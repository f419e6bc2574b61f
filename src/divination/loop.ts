import type { DivinationConfig } from '../config/schema.js'
import {
    errorMessage,
    shortBacktrace,
    ToolExecutionError,
    TransportError,
    type TransportFailure,
    truncateMessage,
} from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { type AssembledContext, contextMessage } from '../context/assembler.js'
import type { ChatMessage, CompletionArtifacts, ToolCall, ToolDefinition, TransportClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { ExecutionState, ToolCallExecutor } from '../tools/executor.js'
import type { InterruptionMarker } from '../tools/interrupt.js'
import { type CanonicalToolCall, extractFromContent, normalizeToolCall } from '../tools/normalize.js'
import type { TaskScope, ToolDispatcher, ToolResultRecord } from '../tools/types.js'
import { BRIEFING_PROMPT, REASONING_PROMPT, SYSTEM_PROMPT } from './prompts.js'
import { DivinationSession } from './session.js'

export const EMPTY_ANSWER = '<<empty>>'

export type FailureStatus = TransportFailure | 'tool_failure'

export interface DivinationFailure {
    status: FailureStatus
    /** Short, safe to show */
    message: string
    backtrace?: string
}

export interface DivinationArtifacts {
    /** Every non-empty content the model produced, in order */
    prelude: string[]
    reasoning?: string
    /** Calls recovered from fenced JSON in the last response that had any */
    fallbackCalls?: CanonicalToolCall[]
    usage: { promptTokens: number; completionTokens: number }
}

interface OutcomeBase {
    artifacts: DivinationArtifacts
    toolResults: ToolResultRecord[]
    turns: number
    restarts: number
}

export type DivinationOutcome =
    | (OutcomeBase & { kind: 'answer'; answer: string })
    | (OutcomeBase & { kind: 'interrupted'; marker: InterruptionMarker })
    | (OutcomeBase & { kind: 'failure'; failure: DivinationFailure })

type AttemptResult = DivinationOutcome | { kind: 'restart'; turns: number; temperature: number }

export interface DivinationRequest {
    prompt?: string
    /** Replaces the single user prompt */
    messages?: ChatMessage[]
    context?: AssembledContext
    reasoning?: boolean
    reminders?: readonly string[]
    tools?: ToolDefinition[]
    dispatch: ToolDispatcher
    /** Overrides the orientation temperature for every request */
    temperature?: number
    task?: TaskScope
    sessionId?: string
}

export interface TemperatureSource {
    readonly temperature: number
}

export interface DivinationDeps {
    transport: TransportClient
    executor: ToolCallExecutor
    aegis: TemperatureSource
    config: DivinationConfig
    logger: Logger
    events?: TypedEventEmitter
}

function toWireCall(call: CanonicalToolCall): ToolCall {
    return { id: call.id, type: 'function', function: { name: call.name, arguments: JSON.stringify(call.arguments) } }
}

/** System prompt, context, manifest, history, briefing (standard mode only), then the user turn. */
export function baseMessages(request: DivinationRequest, reasoning: boolean): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: 'system', content: reasoning ? REASONING_PROMPT : SYSTEM_PROMPT }]
    if (request.context) {
        messages.push(contextMessage(request.context.extraContext), request.context.extraContext.manifest)
        messages.push(...request.context.history)
    }
    if (!reasoning) messages.push({ role: 'system', content: BRIEFING_PROMPT })
    if (request.messages && request.messages.length > 0) {
        messages.push(...request.messages)
    } else {
        messages.push({ role: 'user', content: request.prompt ?? '' })
    }
    return messages
}

export function describeFailure(error: unknown): DivinationFailure {
    if (error instanceof TransportError) {
        return { status: error.failure, message: truncateMessage(error.message) }
    }
    if (error instanceof ToolExecutionError) {
        return { status: 'tool_failure', message: truncateMessage(`Tool execution error: ${error.message}`) }
    }
    return { status: 'failure', message: truncateMessage(errorMessage(error)), backtrace: shortBacktrace(error) }
}

/**
 * Drives one conversation: asks the model, runs the tools it requests and
 * feeds results back until it answers, a tool interrupts, or the depth limit
 * is reached. A temperature change mid-run restarts from the first turn.
 */
export class Divination {
    private readonly logger: Logger

    constructor(private readonly deps: DivinationDeps) {
        this.logger = deps.logger.child({ component: 'divination' })
    }

    async divine(request: DivinationRequest): Promise<DivinationOutcome> {
        const sessionOptions = { id: request.sessionId, reasoning: request.reasoning, reminders: request.reminders }
        let session = new DivinationSession(sessionOptions)
        const { maxRestarts } = this.deps.config
        this.deps.events?.emit('divination:start', { sessionId: session.id, reasoning: session.reasoning })

        let turns = 0
        for (let restarts = 0; restarts <= maxRestarts; restarts++) {
            const result = await this.attempt(request, session, restarts)
            if (result.kind !== 'restart') {
                this.deps.events?.emit('divination:complete', {
                    sessionId: session.id,
                    turns: result.turns,
                    outcome: result.kind,
                })
                return result
            }
            turns = result.turns
            this.logger.info({ sessionId: session.id, attempt: restarts + 1, temperature: result.temperature }, 'Temperature changed, restarting')
            this.deps.events?.emit('divination:restart', {
                sessionId: session.id,
                attempt: restarts + 1,
                temperature: result.temperature,
            })
            session = DivinationSession.restart(session, sessionOptions)
        }

        this.deps.events?.emit('divination:complete', { sessionId: session.id, turns, outcome: 'failure' })
        return {
            kind: 'failure',
            failure: { status: 'failure', message: `Temperature kept changing; gave up after ${maxRestarts + 1} attempts` },
            artifacts: { prelude: [], usage: { promptTokens: 0, completionTokens: 0 } },
            toolResults: [],
            turns,
            restarts: maxRestarts,
        }
    }

    private async attempt(request: DivinationRequest, session: DivinationSession, restarts: number): Promise<AttemptResult> {
        const { transport, executor, aegis, config } = this.deps
        const initialTemperature = aegis.temperature
        const tools = request.tools ?? []
        const scope = { sessionId: session.id, task: request.task }
        const artifacts: DivinationArtifacts = { prelude: [], usage: { promptTokens: 0, completionTokens: 0 } }
        let state: ExecutionState = { messages: baseMessages(request, session.reasoning), results: [] }
        let lastContent = ''
        let turn = 0

        const finish = (answer: string): DivinationOutcome => ({
            kind: 'answer',
            answer: answer.length > 0 ? answer : EMPTY_ANSWER,
            artifacts,
            toolResults: state.results,
            turns: turn,
            restarts,
        })

        try {
            for (turn = 1; turn <= config.maxDepth; turn++) {
                const temperature = aegis.temperature
                if (Math.abs(temperature - initialTemperature) > config.temperatureDeltaThreshold) {
                    return { kind: 'restart', turns: turn - 1, temperature }
                }

                const payload = transport.buildRequest({
                    messages: state.messages,
                    tools,
                    reasoning: session.reasoning,
                    temperature: request.temperature,
                })
                const raw = await transport.send(payload, transport.timeoutFor(session.reasoning))
                const response = transport.extract(raw)
                this.mergeArtifacts(artifacts, response.artifacts)

                const content = response.content
                lastContent = content
                if (content.trim().length > 0) artifacts.prelude.push(content)

                if (session.reasoning) {
                    state = { ...state, messages: [...state.messages, { role: 'assistant', content }] }
                    this.deps.events?.emit('divination:turn', { sessionId: session.id, turn, toolCalls: 0 })
                    return finish(content)
                }

                const structured = this.canonicalCalls(response.toolCalls)
                const fallback = structured.length === 0 ? extractFromContent(content) : []
                const calls = structured.length > 0 ? structured : fallback
                const assistant: ChatMessage = { role: 'assistant', content }
                if (calls.length > 0) assistant.tool_calls = calls.map(toWireCall)
                state = { ...state, messages: [...state.messages, assistant] }
                this.deps.events?.emit('divination:turn', { sessionId: session.id, turn, toolCalls: calls.length })

                if (calls.length > 0) {
                    if (fallback.length > 0) artifacts.fallbackCalls = fallback
                    this.logger.debug({ turn, calls: calls.length, fallback: fallback.length > 0 }, 'Dispatching tools')
                    const batch = await executor.executeBatch(calls, state, request.dispatch, {
                        ...scope,
                        fallback: fallback.length > 0,
                    })
                    state = batch.state
                    if (batch.interruption) {
                        this.deps.events?.emit('divination:interrupt', {
                            sessionId: session.id,
                            interrupt: batch.interruption.__divine_interrupt,
                        })
                        return {
                            kind: 'interrupted',
                            marker: batch.interruption,
                            artifacts,
                            toolResults: state.results,
                            turns: turn,
                            restarts,
                        }
                    }
                    continue
                }

                const reminder = session.nextReminder()
                if (reminder !== undefined) {
                    state = { ...state, messages: [...state.messages, { role: 'system', content: reminder }] }
                    this.deps.events?.emit('reminder:injected', {
                        sessionId: session.id,
                        remaining: session.remainingReminders,
                    })
                    continue
                }

                return finish(content)
            }

            turn = config.maxDepth
            this.logger.warn({ sessionId: session.id, maxDepth: config.maxDepth }, 'Maximum depth reached')
            return finish(lastContent)
        } catch (error) {
            const failure = describeFailure(error)
            this.logger.error({ sessionId: session.id, status: failure.status, error: failure.message, backtrace: failure.backtrace }, 'Divination failed')
            return { kind: 'failure', failure, artifacts, toolResults: state.results, turns: turn, restarts }
        }
    }

    private canonicalCalls(raw: unknown[]): CanonicalToolCall[] {
        const calls: CanonicalToolCall[] = []
        for (const entry of raw) {
            const call = normalizeToolCall(entry)
            if (call) calls.push(call)
            else this.logger.warn({ call: entry }, 'Ignoring tool call without a name')
        }
        return calls
    }

    private mergeArtifacts(target: DivinationArtifacts, source: CompletionArtifacts): void {
        if (source.reasoning) target.reasoning = target.reasoning ? `${target.reasoning}\n\n${source.reasoning}` : source.reasoning
        if (source.usage) {
            target.usage.promptTokens += source.usage.promptTokens
            target.usage.completionTokens += source.usage.completionTokens
        }
    }
}
