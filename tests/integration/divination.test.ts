import { afterEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { MockFileSystem } from '../../src/core/fs.js'
import { BRIEFING_PROMPT, REASONING_PROMPT, SYSTEM_PROMPT } from '../../src/divination/prompts.js'
import { INTERRUPT_KEY } from '../../src/tools/interrupt.js'
import type { Tool } from '../../src/tools/types.js'
import { createHarness, type Harness } from '../helpers/harness.js'
import { type ScriptedResponse, wireCall } from '../helpers/scripted-transport.js'

function readFileTool(fs: MockFileSystem): Tool<{ path: string }> {
    return {
        name: 'read_file',
        description: 'Read a project file',
        parameters: z.object({ path: z.string() }),
        historyPriority: 3,
        async execute({ path }) {
            return { ok: true, content: await fs.readText(`/project/${path}`) }
        },
    }
}

function projectFs(): MockFileSystem {
    const fs = new MockFileSystem()
    fs.setFile('/project/main.rb', 'puts 1')
    return fs
}

describe('divination', () => {
    let harness: Harness | undefined

    afterEach(() => {
        harness?.container.shutdown()
        harness = undefined
    })

    it('answers a plain question in one request', async () => {
        harness = createHarness([{ content: '4' }])
        const response = await harness.container.channel.divine({ prompt: 'What is 2+2?' })

        expect(response.status).toBe('success')
        expect(response.answer).toBe('4')
        expect(harness.transport.requestCount).toBe(1)

        const [request] = harness.transport.captured
        expect(request?.payload.model).toBe('test-chat')
        expect(request?.timeoutMs).toBe(30_000)
        expect(request?.payload.messages.map((message) => message.role)).toEqual(['system', 'system', 'system', 'system', 'user'])
        expect(request?.payload.messages[0]?.content).toBe(SYSTEM_PROMPT)
        expect(request?.payload.messages[1]?.content?.startsWith('Context:\n')).toBe(true)
        expect(request?.payload.messages[3]?.content).toBe(BRIEFING_PROMPT)
        expect(request?.payload.messages[4]?.content).toBe('What is 2+2?')
        expect(request?.payload.tools?.map((tool) => tool.function.name)).toContain('task_complete_step')
    })

    it('feeds a structured tool result back to the model', async () => {
        const fs = projectFs()
        harness = createHarness(
            [{ toolCalls: [wireCall('call_1', 'read_file', { path: 'main.rb' })] }, { content: 'It prints 1.' }],
            { fs, tools: [readFileTool(fs)] }
        )
        const response = await harness.container.channel.divine({ prompt: 'What does main.rb do?' })

        expect(response.answer).toBe('It prints 1.')
        expect(response.toolResults).toEqual([
            { id: 'call_1', name: 'read_file', arguments: { path: 'main.rb' }, result: { ok: true, content: 'puts 1' } },
        ])
        const second = harness.transport.captured[1]?.payload.messages ?? []
        expect(second.slice(-2)).toEqual([
            { role: 'assistant', content: '', tool_calls: [wireCall('call_1', 'read_file', { path: 'main.rb' })] },
            { role: 'tool', tool_call_id: 'call_1', content: '{"ok":true,"content":"puts 1"}' },
        ])
    })

    it('runs calls written as fenced json when the service returns none', async () => {
        const fs = projectFs()
        const content = 'Reading it.\n```json\n{"name": "read_file", "arguments": {"path": "main.rb"}}\n```\n'
        harness = createHarness([{ content }, { content: 'It prints 1.' }], { fs, tools: [readFileTool(fs)] })
        const response = await harness.container.channel.divine({ prompt: 'What does main.rb do?' })

        expect(response.answer).toBe('It prints 1.')
        expect(response.artifacts?.fallbackCalls?.map((call) => call.name)).toEqual(['read_file'])
        expect(response.artifacts?.prelude).toEqual([content, 'It prints 1.'])

        const second = harness.transport.captured[1]?.payload.messages ?? []
        const [assistant, tool] = second.slice(-2)
        const callId = assistant?.tool_calls?.[0]?.id
        expect(assistant?.tool_calls?.[0]?.function.name).toBe('read_file')
        expect(tool).toEqual({ role: 'tool', tool_call_id: callId, content: '{"ok":true,"content":"puts 1"}' })
    })

    it('stops at the first interrupting call and skips the rest of the batch', async () => {
        harness = createHarness([
            {
                toolCalls: [
                    wireCall('c1', 'task_complete_step', { result: 'step output' }),
                    wireCall('c2', 'remember', { content: 'never saved' }),
                ],
            },
        ])
        const response = await harness.container.channel.divine({ prompt: 'finish the step', history: false })

        expect(response.status).toBe('interrupted')
        expect(response.interruption).toEqual({ [INTERRUPT_KEY]: 'step_completed', result: 'step output' })
        expect(response.toolResults.map((record) => record.id)).toEqual(['c1'])
        expect(harness.transport.requestCount).toBe(1)
        expect(harness.container.store.countRows('project_notes')).toBe(0)
    })

    it('stops on a returned marker whose optional fields are null', async () => {
        const rejecting: Tool<Record<string, never>> = {
            name: 'check_plan',
            description: 'Rejects the step',
            parameters: z.object({}),
            historyPriority: 1,
            async execute() {
                return { [INTERRUPT_KEY]: 'step_rejected', reason: null, restart_from_step: null }
            },
        }
        harness = createHarness([{ toolCalls: [wireCall('c1', 'check_plan', {})] }, { content: 'kept going' }], {
            tools: [rejecting],
        })
        const response = await harness.container.channel.divine({ prompt: 'check', history: false })

        expect(response.status).toBe('interrupted')
        expect(response.interruption).toEqual({ [INTERRUPT_KEY]: 'step_rejected', reason: null, restart_from_step: null })
        expect(harness.transport.requestCount).toBe(1)
    })

    it('stops on a completed step whose result is structured', async () => {
        harness = createHarness([
            { toolCalls: [wireCall('c1', 'task_complete_step', { result: { files: 2 } })] },
            { content: 'kept going' },
        ])
        const response = await harness.container.channel.divine({ prompt: 'finish', history: false })

        expect(response.status).toBe('interrupted')
        expect(response.interruption).toEqual({ [INTERRUPT_KEY]: 'step_completed', result: { files: 2 } })
        expect(harness.transport.requestCount).toBe(1)
    })

    it('rejects a step without a reason', async () => {
        harness = createHarness([
            { toolCalls: [wireCall('c1', 'task_reject_step', { restart_from_step: 1 })] },
            { content: 'kept going' },
        ])
        const response = await harness.container.channel.divine({ prompt: 'reject', history: false })

        expect(response.status).toBe('interrupted')
        expect(response.interruption).toEqual({ [INTERRUPT_KEY]: 'step_rejected', restart_from_step: 1 })
        expect(harness.transport.requestCount).toBe(1)
    })

    it('takes one extra turn per reminder', async () => {
        harness = createHarness([{ content: 'a' }, { content: 'b' }, { content: 'c' }])
        const { container } = harness
        const outcome = await container.divination.divine({
            prompt: 'go',
            reminders: ['first nudge', 'second nudge'],
            dispatch: container.toolExecutor.dispatch,
        })

        expect(outcome.kind).toBe('answer')
        expect(outcome.turns).toBe(3)
        if (outcome.kind === 'answer') expect(outcome.answer).toBe('c')
        const last = harness.transport.captured[2]?.payload.messages.slice(-4)
        expect(last).toEqual([
            { role: 'assistant', content: 'a' },
            { role: 'system', content: 'first nudge' },
            { role: 'assistant', content: 'b' },
            { role: 'system', content: 'second nudge' },
        ])
    })

    it('restarts with the same messages when the temperature moves', async () => {
        harness = createHarness([
            { toolCalls: [wireCall('c1', 'update_aegis', { temperature: 0.5 })] },
            { content: 'after restart' },
        ])
        const restarted = vi.fn()
        harness.container.eventBus.on('divination:restart', restarted)
        const response = await harness.container.channel.divine({ prompt: 'settle down', history: false })

        expect(response.answer).toBe('after restart')
        expect(restarted).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, temperature: 0.5 }))
        const [first, second] = harness.transport.captured
        expect(second?.payload.messages).toEqual(first?.payload.messages)
        expect(first?.payload.temperature).toBe(1)
        expect(second?.payload.temperature).toBe(0.5)
    })

    it('gives up after the configured number of restarts', async () => {
        const responses: ScriptedResponse[] = [0.5, 1].map((temperature) => ({
            content: 'x',
            onServe: () => {
                harness?.container.aegis.update({ temperature })
            },
        }))
        harness = createHarness(responses, {
            config: { divination: { maxDepth: 5, maxRestarts: 1, temperatureDeltaThreshold: 0.2 } },
        })
        const { container } = harness
        const outcome = await container.divination.divine({
            prompt: 'go',
            reminders: ['again', 'again'],
            dispatch: container.toolExecutor.dispatch,
        })

        expect(outcome.kind).toBe('failure')
        if (outcome.kind === 'failure') expect(outcome.failure.message).toBe('Temperature kept changing; gave up after 2 attempts')
        expect(harness.transport.requestCount).toBe(2)
    })

    it('answers with the last content when the depth limit is reached', async () => {
        harness = createHarness(
            [
                { content: 'still working', toolCalls: [wireCall('c1', 'recall_notes', { query: 'x' })] },
                { content: 'still working', toolCalls: [wireCall('c2', 'recall_notes', { query: 'y' })] },
            ],
            { config: { divination: { maxDepth: 2, maxRestarts: 3, temperatureDeltaThreshold: 0.2 } } }
        )
        const response = await harness.container.channel.divine({ prompt: 'loop', history: false })

        expect(response.status).toBe('success')
        expect(response.answer).toBe('still working')
        expect(response.toolResults).toHaveLength(2)
    })

    it('reports an unknown tool back to the model instead of failing', async () => {
        harness = createHarness([{ toolCalls: [wireCall('c1', 'launch_rocket', {})] }, { content: 'ok' }])
        const response = await harness.container.channel.divine({ prompt: 'go', history: false })

        expect(response.status).toBe('success')
        expect(response.toolResults[0]?.result).toEqual({ error: "Tool 'launch_rocket' not found" })
    })

    it('substitutes a marker for an empty answer', async () => {
        harness = createHarness([{ content: '' }])
        const response = await harness.container.channel.divine({ prompt: 'say nothing', history: false })
        expect(response.answer).toBe('<<empty>>')
    })

    it('conjures with the reasoning model and no tools', async () => {
        const content = '```json\n{"name": "remember", "arguments": {"content": "x"}}\n```'
        harness = createHarness([{ content, reasoning: 'weighing options' }])
        const response = await harness.container.channel.conjure({ prompt: 'Which design?', history: false })

        expect(response.status).toBe('success')
        expect(response.answer).toBe(content)
        expect(response.reasoning).toBe('weighing options')
        expect(harness.container.store.countRows('project_notes')).toBe(0)

        const [request] = harness.transport.captured
        expect(request?.payload.model).toBe('test-reasoner')
        expect(request?.payload.max_tokens).toBe(4000)
        expect(request?.payload.tools).toBeUndefined()
        expect(request?.timeoutMs).toBe(60_000)
        expect(request?.payload.messages[0]?.content).toBe(REASONING_PROMPT)
        expect(request?.payload.messages.some((message) => message.content === BRIEFING_PROMPT)).toBe(false)
    })

    it('accumulates token usage across turns', async () => {
        harness = createHarness([
            { toolCalls: [wireCall('c1', 'recall_notes', { query: 'x' })], usage: { promptTokens: 100, completionTokens: 10 } },
            { content: 'done', usage: { promptTokens: 150, completionTokens: 20 } },
        ])
        const response = await harness.container.channel.divine({ prompt: 'go', history: false })
        expect(response.artifacts?.usage).toEqual({ promptTokens: 250, completionTokens: 30 })
    })
})
