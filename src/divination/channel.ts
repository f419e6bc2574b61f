import type { ContextAssembler, ContextRequest } from '../context/assembler.js'
import type { Logger } from '../logger/index.js'
import type { MemoryStore } from '../memory/store.js'
import type { RecordedToolCall } from '../memory/types.js'
import type { InterruptionMarker } from '../tools/interrupt.js'
import type { ToolRegistry } from '../tools/registry.js'
import type { TaskScope, ToolDispatcher, ToolResultRecord } from '../tools/types.js'
import { type Divination, type DivinationArtifacts, type DivinationOutcome, describeFailure, type FailureStatus } from './loop.js'

export type ChannelStatus = 'success' | 'interrupted' | FailureStatus

export interface ChannelRequest extends ContextRequest {
    prompt: string
    /** Store the exchange as a conversation entry */
    record?: boolean
    tags?: string[]
    reminders?: string[]
    temperature?: number
    task?: TaskScope
}

export interface ChannelResponse {
    status: ChannelStatus
    answer?: string
    reasoning?: string
    interruption?: InterruptionMarker
    /** Classification tag and short message for failed statuses */
    message?: string
    backtrace?: string
    toolResults: ToolResultRecord[]
    artifacts?: DivinationArtifacts
    entryId?: number
    executionTime: number
}

export interface ChannelDeps {
    assembler: ContextAssembler
    divination: Divination
    store: MemoryStore
    registry: ToolRegistry
    dispatch: ToolDispatcher
    logger: Logger
}

const FAILURE_LABELS: Record<FailureStatus, string> = {
    timeout: 'Timeout',
    connection_failure: 'Connection failure',
    rate_limit: 'Rate limit',
    context_length_exceeded: 'Context length exceeded',
    tool_failure: 'Tool failure',
    failure: 'Failure',
}

export function toRecordedCalls(results: ToolResultRecord[]): RecordedToolCall[] {
    return results.map((record) => ({ request: { tool: record.name, args: record.arguments }, result: record.result }))
}

/** Caller-facing entry point: assembles context, runs a divination and reports a status. */
export class Channel {
    private readonly logger: Logger

    constructor(private readonly deps: ChannelDeps) {
        this.logger = deps.logger.child({ component: 'channel' })
    }

    divine(request: ChannelRequest): Promise<ChannelResponse> {
        return this.run(request, false)
    }

    /** Reasoning mode: no tools, the reasoning prompt and the larger token ceiling. */
    conjure(request: ChannelRequest): Promise<ChannelResponse> {
        return this.run(request, true)
    }

    private async run(request: ChannelRequest, reasoning: boolean): Promise<ChannelResponse> {
        const started = Date.now()
        let outcome: DivinationOutcome
        try {
            const context = await this.deps.assembler.build(request)
            outcome = await this.deps.divination.divine({
                prompt: request.prompt,
                messages: request.messages,
                context,
                reasoning,
                reminders: request.reminders,
                tools: reasoning ? [] : this.deps.registry.getToolDefinitions(),
                dispatch: this.deps.dispatch,
                temperature: request.temperature,
                task: request.task,
            })
        } catch (error) {
            const failure = describeFailure(error)
            this.logger.error({ status: failure.status, error: failure.message, backtrace: failure.backtrace }, 'Channel failed')
            return this.respondFailure(request, failure.status, failure.message, [], started, failure.backtrace)
        }

        switch (outcome.kind) {
            case 'answer': {
                const executionTime = (Date.now() - started) / 1000
                const response: ChannelResponse = {
                    status: 'success',
                    answer: outcome.answer,
                    reasoning: outcome.artifacts.reasoning,
                    toolResults: outcome.toolResults,
                    artifacts: outcome.artifacts,
                    executionTime,
                }
                if (request.record) {
                    response.entryId = this.record(request, outcome.answer, outcome.toolResults, executionTime)
                }
                return response
            }
            case 'interrupted':
                return {
                    status: 'interrupted',
                    interruption: outcome.marker,
                    toolResults: outcome.toolResults,
                    artifacts: outcome.artifacts,
                    executionTime: (Date.now() - started) / 1000,
                }
            case 'failure':
                return this.respondFailure(
                    request,
                    outcome.failure.status,
                    outcome.failure.message,
                    outcome.toolResults,
                    started,
                    outcome.failure.backtrace
                )
        }
    }

    private respondFailure(
        request: ChannelRequest,
        status: FailureStatus,
        message: string,
        toolResults: ToolResultRecord[],
        started: number,
        backtrace?: string
    ): ChannelResponse {
        const executionTime = (Date.now() - started) / 1000
        const response: ChannelResponse = {
            status,
            message: `${FAILURE_LABELS[status]}: ${message}`,
            toolResults,
            executionTime,
        }
        if (backtrace) response.backtrace = backtrace
        if (request.record) {
            response.entryId = this.record(request, `Error: ${message}`, toolResults, executionTime)
        }
        return response
    }

    private record(request: ChannelRequest, answer: string, toolResults: ToolResultRecord[], executionTime: number): number {
        const attachments = request.attachments ?? []
        return this.deps.store.recordEntry({
            prompt: request.prompt,
            answer,
            tags: request.tags,
            file: attachments[0]?.file,
            attachments,
            executionTime,
            toolCalls: toRecordedCalls(toolResults),
        })
    }
}
