export { loadConfig } from './config/loader.js'
export { DEFAULT_CONFIG } from './config/defaults.js'
export type { Config, ResolvedConfig } from './config/schema.js'

export { type Container, type ContainerOverrides, createContainer } from './core/container.js'
export { AugurError, StepTermination, ToolExecutionError, TransportError } from './core/errors.js'
export { err, ok, type Result } from './core/result.js'
export { type FileSystem, MockFileSystem, NodeFileSystem } from './core/fs.js'
export { createLogger, type Logger } from './logger/index.js'

export { type AssembledContext, ContextAssembler, type ContextRequest } from './context/assembler.js'
export { Channel, type ChannelRequest, type ChannelResponse, type ChannelStatus } from './divination/channel.js'
export { Divination, type DivinationOutcome, type DivinationRequest, EMPTY_ANSWER } from './divination/loop.js'
export { type RunStepOptions, type StepOutcome, TaskStepRunner } from './divination/task-runner.js'

export { AegisState } from './memory/aegis.js'
export { MemoryStore, type NoteInput } from './memory/store.js'
export type { AegisSnapshot, Attachment, ConversationEntry, Note, ScoredNote, Task, WorkflowType } from './memory/types.js'

export { createTransportClient } from './llm/transport.js'
export type { ChatMessage, TransportClient } from './llm/types.js'

export { INTERRUPT_KEY, type InterruptionMarker } from './tools/interrupt.js'
export { createMemoryTools } from './tools/memory-tools.js'
export { ToolRegistry } from './tools/registry.js'
export { createTaskTools } from './tools/task-tools.js'
export type { AnyTool, DispatchContext, Tool } from './tools/types.js'
