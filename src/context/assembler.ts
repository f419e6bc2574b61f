import path from 'node:path'
import type { HistoryConfig } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { ChatMessage } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { AegisState } from '../memory/aegis.js'
import type { MemoryStore } from '../memory/store.js'
import type { PriorityLookup } from '../memory/truncation.js'
import type { AegisSnapshot, Attachment, ConversationEntry, ScoredNote } from '../memory/types.js'
import { formatHistoryToolCalls } from './tool-history.js'

const PROJECT_FILE_IGNORE = ['node_modules/**', '.git/**', 'dist/**', '.augur/**']
const MAX_PROJECT_FILES = 500

export interface ContextRequest {
    /** Single user prompt; ignored by the assembler, carried for the loop */
    prompt?: string
    messages?: ChatMessage[]
    attachments?: Attachment[]
    /** `undefined`/`true` fetch stored history, `false` or `[]` skip it, an array is used as given */
    history?: boolean | ConversationEntry[]
    env?: Record<string, string | undefined>
    context?: Record<string, unknown>
}

export interface AegisOrientation {
    tags: string[]
    summary: string
    temperature: number
    files?: string[]
    selections?: { path: string; range: string }[]
}

export interface ExtraContext {
    projectFiles: string[]
    attachments: Attachment[]
    aegisOrientation: AegisOrientation
    aegisNotes: ScoredNote[]
    context?: Record<string, unknown>
    manifest: ChatMessage
}

export interface AssembledContext {
    history: ChatMessage[]
    extraContext: ExtraContext
}

export interface ContextAssemblerDeps {
    fs: FileSystem
    store: MemoryStore
    aegis: AegisState
    logger: Logger
    priorityOf: PriorityLookup
    projectDir: string
    manifestPath: string
    history: HistoryConfig
    /** Where environment injection writes; defaults to `process.env` */
    env?: NodeJS.ProcessEnv
}

export function summaryMessage(snapshot: AegisSnapshot): ChatMessage {
    return { role: 'system', content: `Summary: ${snapshot.summary}\n\nTags: ${snapshot.tags.join(', ')}` }
}

export function manifestMessage(manifestPath: string, content: string): ChatMessage {
    return {
        role: 'system',
        content: `PROJECT MANIFEST (optional guidance, editable by the user and the assistant) ${manifestPath}:\n${content}`,
    }
}

/** Entries oldest first become user/assistant pairs; replayed tool calls decay with distance from the newest. */
export function formatHistory(entries: ConversationEntry[], priorityOf: PriorityLookup): ChatMessage[] {
    return entries.flatMap((entry, position): ChatMessage[] => {
        const index = entries.length - 1 - position
        const answer =
            entry.toolCalls.length > 0
                ? `${formatHistoryToolCalls(entry.toolCalls, index, priorityOf)}\n\n${entry.answer}`
                : entry.answer
        return [
            { role: 'user', content: entry.prompt },
            { role: 'assistant', content: answer },
        ]
    })
}

export class ContextAssembler {
    private readonly logger: Logger

    constructor(private readonly deps: ContextAssemblerDeps) {
        this.logger = deps.logger.child({ component: 'context' })
    }

    async build(request: ContextRequest = {}): Promise<AssembledContext> {
        if (request.env) this.injectEnv(request.env)

        const attachments = request.attachments ?? []
        const entries = this.resolveHistory(request.history)
        const history = [...this.summariesFor(entries), ...formatHistory(entries, this.deps.priorityOf)]

        const aegis = this.deps.aegis.current()
        const extraContext: ExtraContext = {
            projectFiles: await this.listProjectFiles(),
            attachments,
            aegisOrientation: this.orientation(aegis, attachments[0]),
            aegisNotes: this.deps.store.recallAegisNotes(aegis, { maxTokens: this.deps.history.notesMaxTokens }),
            manifest: await this.readManifest(),
        }
        if (request.context) extraContext.context = request.context

        this.logger.debug(
            { entries: entries.length, messages: history.length, notes: extraContext.aegisNotes.length },
            'Context assembled'
        )
        return { history, extraContext }
    }

    private injectEnv(values: Record<string, string | undefined>): void {
        const target = this.deps.env ?? process.env
        for (const [key, value] of Object.entries(values)) {
            if (value !== undefined) target[key] = value
        }
    }

    private resolveHistory(history: ContextRequest['history']): ConversationEntry[] {
        if (history === undefined || history === true) {
            return this.deps.store.fetchHistory({
                limit: this.deps.history.limit,
                maxTokens: this.deps.history.maxTokens,
                includeToolCalls: true,
            })
        }
        if (history === false) return []
        return history
    }

    private summariesFor(entries: ConversationEntry[]): ChatMessage[] {
        if (entries.length === 0) return []
        const earliest = entries.reduce((min, entry) => (entry.createdAt < min ? entry.createdAt : min), entries[0]?.createdAt ?? '')
        return this.deps.aegis.summariesBefore(earliest, this.deps.history.summaryMaxTokens).map(summaryMessage)
    }

    private orientation(aegis: AegisSnapshot, first: Attachment | undefined): AegisOrientation {
        const orientation: AegisOrientation = { tags: aegis.tags, summary: aegis.summary, temperature: aegis.temperature }
        if (!first?.file) return orientation
        orientation.files = [first.file]
        if (first.selection) orientation.selections = [{ path: first.file, range: first.selection }]
        return orientation
    }

    private async listProjectFiles(): Promise<string[]> {
        try {
            const files = await this.deps.fs.glob('**/*', this.deps.projectDir, PROJECT_FILE_IGNORE)
            return files.slice(0, MAX_PROJECT_FILES)
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'Could not list project files')
            return []
        }
    }

    private async readManifest(): Promise<ChatMessage> {
        const { manifestPath, projectDir, fs } = this.deps
        const fullPath = path.resolve(projectDir, manifestPath)
        try {
            if (!(await fs.exists(fullPath))) return manifestMessage(manifestPath, 'Manifest file not found')
            return manifestMessage(manifestPath, await fs.readText(fullPath))
        } catch (error) {
            return manifestMessage(manifestPath, `Error reading manifest: ${errorMessage(error)}`)
        }
    }
}

/** Everything but the manifest, as one system message. */
export function contextMessage(extra: ExtraContext): ChatMessage {
    const { manifest: _manifest, ...rest } = extra
    return { role: 'system', content: `Context:\n${JSON.stringify(rest)}` }
}
