import type { ZodType, ZodTypeDef } from 'zod'
import type { Result } from '../core/result.js'

export interface ToolResultRecord {
    id: string
    name: string
    arguments: Record<string, unknown>
    result: unknown
}

export interface TaskScope {
    taskId: number
    step: number
}

/** Who a call is made for: the divination session and, inside a task step, that step. */
export interface DispatchScope {
    sessionId: string
    task?: TaskScope
}

/** What a dispatcher sees besides the call itself. */
export interface DispatchContext extends DispatchScope {
    /** Results of earlier calls in this divination, oldest first */
    toolResults: readonly ToolResultRecord[]
    fallback: boolean
}

export type ToolDispatcher = (name: string, args: Record<string, unknown>, context: DispatchContext) => Promise<unknown>

export interface Tool<TInput = unknown, TOutput = unknown> {
    name: string
    description: string
    /** Input may differ from the parsed shape (defaults, coercion) */
    parameters: ZodType<TInput, ZodTypeDef, unknown>
    /** Higher keeps more of this tool's calls in stored and replayed history */
    historyPriority: number
    execute(input: TInput, ctx: DispatchContext): Promise<TOutput>
}

export type ToolResult<T = unknown> = Result<T, string>

export type AnyTool = Tool<unknown, unknown>
