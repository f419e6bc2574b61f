import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'projectDir' | 'configDir' | 'dbPath'> = {
    model: 'deepseek-chat',
    reasoningModel: 'deepseek-reasoner',
    baseURL: 'https://api.deepseek.com/v1',
    maxTokens: 8192,
    reasoningMaxTokens: 64_000,
    requestTimeout: 300,
    reasoningTimeout: 600,
    logLevel: 'warn',
    manifestPath: 'AUGUR.md',
    noteMaxLength: 500,
    history: {
        limit: 7,
        maxTokens: 2200,
        summaryMaxTokens: 400,
        notesMaxTokens: 500,
    },
    divination: {
        maxDepth: 80,
        maxRestarts: 3,
        temperatureDeltaThreshold: 0.2,
    },
    tools: {
        maxRetries: 2,
        standardTimeoutMs: 3_000_000,
        fallbackTimeoutMs: 30_000,
        backoffBaseMs: 1000,
    },
}

export const CONFIG_DIR = path.join(process.env.HOME ?? os.homedir(), '.config', 'augur')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.augur'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const LOCAL_DB_FILE = `${LOCAL_CONFIG_DIR}/memory.db`
