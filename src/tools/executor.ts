import { randomUUID } from 'node:crypto'
import type { ToolSandboxConfig } from '../config/schema.js'
import { errorMessage, StepTermination } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { ChatMessage } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { type InterruptionMarker, interruptionOf, markerFromTermination } from './interrupt.js'
import { type CanonicalToolCall, extractId, normalizeToolCall } from './normalize.js'
import type { ToolRegistry } from './registry.js'
import { runInSandbox } from './sandbox.js'
import type { DispatchContext, DispatchScope, ToolDispatcher, ToolResultRecord } from './types.js'

/** Registry-backed dispatcher: unknown tools and invalid arguments come back to the model as errors. */
export class ToolExecutor {
    constructor(private registry: ToolRegistry) {}

    async executeSafe(name: string, args: unknown, ctx: DispatchContext): Promise<unknown> {
        const tool = this.registry.get(name)
        if (!tool) {
            return { error: `Tool '${name}' not found` }
        }

        const parsed = tool.parameters.safeParse(args)
        if (!parsed.success) {
            const issue = parsed.error.issues[0]
            return { error: `Invalid params for ${name}: ${issue ? `${issue.path.join('.')} ${issue.message}`.trim() : 'rejected'}` }
        }

        return tool.execute(parsed.data, ctx)
    }

    readonly dispatch: ToolDispatcher = (name, args, ctx) => this.executeSafe(name, args, ctx)
}

export interface ExecutionState {
    messages: ChatMessage[]
    results: ToolResultRecord[]
}

export interface ExecutionOutcome {
    result: unknown
    state: ExecutionState
}

export interface BatchOutcome {
    state: ExecutionState
    /** Set when a call stopped the batch; later calls were not executed */
    interruption?: InterruptionMarker
    executed: number
}

export interface RunOptions extends DispatchScope {
    fallback: boolean
}

function serializeResult(result: unknown): string {
    return JSON.stringify(result) ?? 'null'
}

/**
 * Runs tool calls through the sandbox and threads each result into the
 * message list as a `tool` message and into the result records.
 */
export class ToolCallExecutor {
    private readonly logger: Logger

    constructor(
        private readonly sandbox: ToolSandboxConfig,
        logger: Logger,
        private readonly events?: TypedEventEmitter
    ) {
        this.logger = logger.child({ component: 'tools' })
    }

    /** A call as returned by the completion service, in any accepted shape. */
    async executeStandard(
        call: unknown,
        state: ExecutionState,
        dispatch: ToolDispatcher,
        scope: DispatchScope
    ): Promise<ExecutionOutcome> {
        const canonical = normalizeToolCall(call)
        if (!canonical) {
            const id = extractId(call) ?? randomUUID()
            const result = { error: 'Tool call did not name a tool' }
            return { result, state: this.append(state, { id, name: '', arguments: {} }, result) }
        }
        return this.run(canonical, state, dispatch, { ...scope, fallback: false })
    }

    /** A call recovered from fenced JSON in the response text. */
    executeFallback(
        call: CanonicalToolCall,
        state: ExecutionState,
        dispatch: ToolDispatcher,
        scope: DispatchScope
    ): Promise<ExecutionOutcome> {
        return this.run(call, state, dispatch, { ...scope, fallback: true })
    }

    /** Executes calls in order and stops at the first interruption marker. */
    async executeBatch(
        calls: readonly unknown[],
        state: ExecutionState,
        dispatch: ToolDispatcher,
        options: RunOptions
    ): Promise<BatchOutcome> {
        let current = state
        let executed = 0
        for (const call of calls) {
            const outcome = options.fallback
                ? await this.executeFallbackCall(call, current, dispatch, options)
                : await this.executeStandard(call, current, dispatch, options)
            current = outcome.state
            executed++
            const interruption = interruptionOf(outcome.result)
            if (interruption) {
                this.logger.info({ interrupt: interruption.__divine_interrupt, executed, total: calls.length }, 'tool:interrupt')
                return { state: current, interruption, executed }
            }
        }
        return { state: current, executed }
    }

    private executeFallbackCall(
        call: unknown,
        state: ExecutionState,
        dispatch: ToolDispatcher,
        scope: DispatchScope
    ): Promise<ExecutionOutcome> {
        const canonical = normalizeToolCall(call)
        if (!canonical) {
            return this.executeStandard(call, state, dispatch, scope)
        }
        return this.executeFallback(canonical, state, dispatch, scope)
    }

    private async run(
        call: CanonicalToolCall,
        state: ExecutionState,
        dispatch: ToolDispatcher,
        options: RunOptions
    ): Promise<ExecutionOutcome> {
        const context: DispatchContext = {
            sessionId: options.sessionId,
            task: options.task,
            toolResults: Object.freeze([...state.results]),
            fallback: options.fallback,
        }
        this.logger.debug({ tool: call.name, fallback: options.fallback }, 'tool:call')
        this.events?.emit('tool:before', { toolName: call.name, args: call.arguments, fallback: options.fallback })

        const started = Date.now()
        let result: unknown
        try {
            result = await runInSandbox(() => dispatch(call.name, call.arguments, context), {
                maxRetries: this.sandbox.maxRetries,
                timeoutMs: options.fallback ? this.sandbox.fallbackTimeoutMs : this.sandbox.standardTimeoutMs,
                backoffBaseMs: this.sandbox.backoffBaseMs,
                logger: this.logger,
                label: call.name,
            })
        } catch (error) {
            if (!(error instanceof StepTermination)) {
                this.events?.emit('tool:after', { toolName: call.name, duration: Date.now() - started, success: false })
                this.logger.error({ tool: call.name, error: errorMessage(error) }, 'tool:failed')
                throw error
            }
            result = markerFromTermination(error)
        }

        this.events?.emit('tool:after', { toolName: call.name, duration: Date.now() - started, success: true })
        return { result, state: this.append(state, call, result) }
    }

    private append(state: ExecutionState, call: CanonicalToolCall, result: unknown): ExecutionState {
        return {
            messages: [...state.messages, { role: 'tool', tool_call_id: call.id, content: serializeResult(result) }],
            results: [...state.results, { id: call.id, name: call.name, arguments: call.arguments, result }],
        }
    }
}
