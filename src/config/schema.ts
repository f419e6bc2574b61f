import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z.object({
    model: z.string().optional(),
    reasoningModel: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    maxTokens: z.number().int().positive().optional(),
    reasoningMaxTokens: z.number().int().positive().optional(),
    requestTimeout: z.number().positive().optional(),
    reasoningTimeout: z.number().positive().optional(),
    logLevel: LogLevelSchema.optional(),
    dbPath: z.string().optional(),
    manifestPath: z.string().optional(),
    noteMaxLength: z.number().int().positive().optional(),
    history: z
        .object({
            limit: z.number().int().positive().optional(),
            maxTokens: z.number().int().positive().optional(),
            summaryMaxTokens: z.number().int().nonnegative().optional(),
            notesMaxTokens: z.number().int().nonnegative().optional(),
        })
        .optional(),
    divination: z
        .object({
            maxDepth: z.number().int().positive().optional(),
            maxRestarts: z.number().int().nonnegative().optional(),
            temperatureDeltaThreshold: z.number().nonnegative().optional(),
        })
        .optional(),
    tools: z
        .object({
            maxRetries: z.number().int().nonnegative().optional(),
            standardTimeoutMs: z.number().positive().optional(),
            fallbackTimeoutMs: z.number().positive().optional(),
            backoffBaseMs: z.number().nonnegative().optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface HistoryConfig {
    limit: number
    maxTokens: number
    summaryMaxTokens: number
    notesMaxTokens: number
}

export interface DivinationConfig {
    maxDepth: number
    maxRestarts: number
    temperatureDeltaThreshold: number
}

export interface ToolSandboxConfig {
    maxRetries: number
    standardTimeoutMs: number
    fallbackTimeoutMs: number
    backoffBaseMs: number
}

export interface ResolvedConfig {
    model: string
    reasoningModel: string
    apiKey: string
    baseURL: string
    maxTokens: number
    reasoningMaxTokens: number
    /** seconds */
    requestTimeout: number
    /** seconds */
    reasoningTimeout: number
    logLevel: LogLevel
    dbPath: string
    manifestPath: string
    noteMaxLength: number
    history: HistoryConfig
    divination: DivinationConfig
    tools: ToolSandboxConfig
    projectDir: string
    configDir: string
}
