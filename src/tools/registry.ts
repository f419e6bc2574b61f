import { zodToJsonSchema } from 'zod-to-json-schema'
import type { ToolDefinition } from '../llm/types.js'
import type { AnyTool } from './types.js'

export const DEFAULT_HISTORY_PRIORITY = 1

export class ToolRegistry {
    private tools = new Map<string, AnyTool>()
    private definitionCache: ToolDefinition[] | undefined

    register(tool: AnyTool): void {
        this.tools.set(tool.name, tool)
        this.definitionCache = undefined
    }

    registerAll(tools: AnyTool[]): void {
        for (const tool of tools) this.register(tool)
    }

    get(name: string): AnyTool | undefined {
        return this.tools.get(name)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    priorityOf(name: string): number | undefined {
        return this.tools.get(name)?.historyPriority
    }

    getToolDefinitions(): ToolDefinition[] {
        if (this.definitionCache) return this.definitionCache

        this.definitionCache = this.listAll().map((tool) => ({
            type: 'function' as const,
            function: {
                name: tool.name,
                description: tool.description,
                parameters: zodToJsonSchema(tool.parameters) as Record<string, unknown>,
            },
        }))
        return this.definitionCache
    }

    listAll(): AnyTool[] {
        return [...this.tools.values()]
    }
}
