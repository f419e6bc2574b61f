import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

// Logs go to stderr so CLI answers on stdout stay clean
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const options = { name: 'augur', level: config.logLevel }
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            ...options,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino(options, pino.destination(2))
}
