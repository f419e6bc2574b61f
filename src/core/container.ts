import type { ResolvedConfig } from '../config/schema.js'
import { ContextAssembler } from '../context/assembler.js'
import { Channel } from '../divination/channel.js'
import { Divination } from '../divination/loop.js'
import { TaskStepRunner } from '../divination/task-runner.js'
import { createTransportClient } from '../llm/transport.js'
import type { TransportClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { AegisState } from '../memory/aegis.js'
import { MemoryStore } from '../memory/store.js'
import { ToolCallExecutor, ToolExecutor } from '../tools/executor.js'
import { createMemoryTools } from '../tools/memory-tools.js'
import { ToolRegistry } from '../tools/registry.js'
import { createTaskTools } from '../tools/task-tools.js'
import type { AnyTool } from '../tools/types.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    store: MemoryStore
    aegis: AegisState
    transport: TransportClient
    toolRegistry: ToolRegistry
    toolExecutor: ToolExecutor
    assembler: ContextAssembler
    divination: Divination
    channel: Channel
    taskRunner: TaskStepRunner
    shutdown(): void
}

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    transport?: TransportClient
    /** Registered after the built-in memory and task tools */
    tools?: AnyTool[]
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter((event, error) =>
        logger.warn({ event, error: errorMessage(error) }, 'Event listener failed')
    )
    const fs = overrides.fs ?? new NodeFileSystem()

    const toolRegistry = new ToolRegistry()
    const priorityOf = (name: string) => toolRegistry.priorityOf(name)
    const store = new MemoryStore({ dbPath: config.dbPath, logger, priorityOf, noteMaxLength: config.noteMaxLength })
    const aegis = new AegisState(store)

    toolRegistry.registerAll(createMemoryTools(store, aegis))
    toolRegistry.registerAll(createTaskTools(store))
    toolRegistry.registerAll(overrides.tools ?? [])
    const toolExecutor = new ToolExecutor(toolRegistry)

    const transport =
        overrides.transport ?? createTransportClient(config, logger, { currentTemperature: () => aegis.temperature })
    const assembler = new ContextAssembler({
        fs,
        store,
        aegis,
        logger,
        priorityOf,
        projectDir: config.projectDir,
        manifestPath: config.manifestPath,
        history: config.history,
    })
    const divination = new Divination({
        transport,
        executor: new ToolCallExecutor(config.tools, logger, eventBus),
        aegis,
        config: config.divination,
        logger,
        events: eventBus,
    })
    const channel = new Channel({
        assembler,
        divination,
        store,
        registry: toolRegistry,
        dispatch: toolExecutor.dispatch,
        logger,
    })
    const taskRunner = new TaskStepRunner(store, channel, logger)

    return {
        config,
        logger,
        eventBus,
        fs,
        store,
        aegis,
        transport,
        toolRegistry,
        toolExecutor,
        assembler,
        divination,
        channel,
        taskRunner,

        shutdown() {
            eventBus.removeAll()
            store.close()
        },
    }
}
