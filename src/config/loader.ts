import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { errorMessage } from '../core/errors.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE, LOCAL_DB_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
    onWarning?: (message: string) => void
}

async function loadJsonConfig(fs: FileSystem, filePath: string, onWarning?: (message: string) => void): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch (error) {
        onWarning?.(`Ignoring invalid config ${filePath}: ${errorMessage(error)}`)
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    return merged
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    const apiKey = env.AUGUR_API_KEY ?? env.DEEPSEEK_API_KEY
    if (apiKey) config.apiKey = apiKey
    if (env.AUGUR_MODEL) config.model = env.AUGUR_MODEL
    if (env.AUGUR_API_URL ?? env.DEEPSEEK_API_URL) config.baseURL = env.AUGUR_API_URL ?? env.DEEPSEEK_API_URL
    const logLevel = LogLevelSchema.safeParse(env.AUGUR_LOG_LEVEL)
    if (logLevel.success) config.logLevel = logLevel.data
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env, onWarning } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, onWarning)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE), onWarning)

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        apiKey: merged.apiKey ?? '',
        dbPath: merged.dbPath ? path.resolve(projectDir, merged.dbPath) : path.join(projectDir, LOCAL_DB_FILE),
        projectDir,
        configDir: CONFIG_DIR,
        history: { ...DEFAULT_CONFIG.history, ...merged.history },
        divination: { ...DEFAULT_CONFIG.divination, ...merged.divination },
        tools: { ...DEFAULT_CONFIG.tools, ...merged.tools },
    }
}
