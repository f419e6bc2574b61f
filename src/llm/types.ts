export interface ChatMessage {
    role: 'system' | 'user' | 'assistant' | 'tool'
    content: string | null
    tool_calls?: ToolCall[]
    tool_call_id?: string
}

export interface ToolCall {
    id: string
    type: 'function'
    function: {
        name: string
        arguments: string
    }
}

export interface ToolDefinition {
    type: 'function'
    function: {
        name: string
        description: string
        parameters: Record<string, unknown>
    }
}

/** Request body sent to the chat-completion endpoint. */
export interface CompletionPayload {
    model: string
    messages: ChatMessage[]
    max_tokens: number
    temperature: number
    tools?: ToolDefinition[]
}

export interface CompletionRequest {
    messages: ChatMessage[]
    tools: ToolDefinition[]
    reasoning: boolean
    /** Overrides the current orientation temperature */
    temperature?: number
}

export interface CompletionArtifacts {
    reasoning?: string
    finishReason?: string
    usage?: { promptTokens: number; completionTokens: number }
}

export interface ExtractedCompletion {
    content: string
    /** Tool calls exactly as the service returned them; shapes vary by provider */
    toolCalls: unknown[]
    artifacts: CompletionArtifacts
}

export interface TransportClient {
    buildRequest(request: CompletionRequest): CompletionPayload
    send(payload: CompletionPayload, timeoutMs: number): Promise<unknown>
    extract(raw: unknown): ExtractedCompletion
    timeoutFor(reasoning: boolean): number
}
