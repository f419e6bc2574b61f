import * as clack from '@clack/prompts'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config, ResolvedConfig } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { splitCsv } from '../core/text.js'
import { WORKFLOW_TYPES, type WorkflowType } from '../memory/types.js'
import { createProgressTracker } from './progress.js'
import { colors, formatAegis, formatError, formatNote, formatResponse, formatStepOutcome, formatTask, formatTokenUsage } from './ui.js'

type GlobalFlags = {
    model?: string
    key?: string
    db?: string
    debug?: boolean
}

type AskFlags = {
    reason?: boolean
    history: boolean
    record: boolean
    tags?: string
    file?: string
    selection?: string
}

function parseNumber(value: string): number {
    const parsed = Number(value)
    if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.')
    return parsed
}

function parseWorkflow(value: string): WorkflowType {
    const match = WORKFLOW_TYPES.find((type) => type === value)
    if (!match) throw new InvalidArgumentError(`Expected one of ${WORKFLOW_TYPES.join(', ')}.`)
    return match
}

async function resolveConfig(flags: GlobalFlags): Promise<ResolvedConfig> {
    const cliFlags: Config = {
        model: flags.model,
        apiKey: flags.key,
        dbPath: flags.db,
        logLevel: flags.debug ? 'debug' : undefined,
    }
    return loadConfig({
        fs: new NodeFileSystem(),
        cliFlags,
        onWarning: (message) => console.error(colors.warn(message)),
    })
}

/** Asks for a key on a terminal; elsewhere a missing key is an error. */
async function ensureApiKey(config: ResolvedConfig): Promise<ResolvedConfig | null> {
    if (config.apiKey) return config
    if (!process.stdin.isTTY) {
        console.error(formatError('No API key. Set AUGUR_API_KEY or DEEPSEEK_API_KEY, or pass --key.'))
        return null
    }
    const apiKey = await clack.password({ message: 'API key for the completion service' })
    if (clack.isCancel(apiKey) || !apiKey) {
        clack.cancel('No API key given.')
        return null
    }
    return { ...config, apiKey }
}

async function withContainer(config: ResolvedConfig, run: (container: Container) => Promise<void>): Promise<void> {
    const container = createContainer(config)
    try {
        await run(container)
    } finally {
        container.shutdown()
    }
}

function fail(error: unknown): void {
    console.error(formatError(errorMessage(error)))
    process.exitCode = 1
}

export function createProgram(): Command {
    const program = new Command()
    const globals = () => program.opts<GlobalFlags>()

    program
        .name('augur')
        .description('Multi-turn model sessions with tools, notes and tasks')
        .version('0.1.0')
        .option('-m, --model <model>', 'Model to use')
        .option('-k, --key <key>', 'API key for the completion service')
        .option('--db <path>', 'Memory database path')
        .option('--debug', 'Enable debug logging')

    program
        .command('ask')
        .description('Ask a question; the model may use tools before answering')
        .argument('<prompt...>', 'Prompt text')
        .option('-r, --reason', 'Reasoning mode (no tools)')
        .option('--no-history', 'Do not include earlier exchanges')
        .option('--no-record', 'Do not store this exchange')
        .option('-t, --tags <tags>', 'Comma-separated tags for the stored exchange')
        .option('-f, --file <path>', 'Attach a file')
        .option('-s, --selection <range>', 'Selection within the attached file, e.g. 10:20')
        .action(async (words: string[], flags: AskFlags) => {
            try {
                const config = await ensureApiKey(await resolveConfig(globals()))
                if (!config) {
                    process.exitCode = 1
                    return
                }
                await withContainer(config, async (container) => {
                    const spinner = clack.spinner()
                    spinner.start('Consulting...')
                    const tracker = createProgressTracker(container.eventBus, spinner)
                    const request = {
                        prompt: words.join(' '),
                        history: flags.history,
                        record: flags.record,
                        tags: splitCsv(flags.tags),
                        attachments: flags.file ? [{ file: flags.file, selection: flags.selection }] : [],
                    }
                    try {
                        const response = flags.reason
                            ? await container.channel.conjure(request)
                            : await container.channel.divine(request)
                        spinner.stop(response.status === 'success' ? colors.success('Done') : colors.warn(response.status))
                        console.log(formatResponse(response))
                        if (response.artifacts) {
                            const { promptTokens, completionTokens } = response.artifacts.usage
                            console.log(formatTokenUsage(promptTokens, completionTokens))
                        }
                        if (response.status !== 'success') process.exitCode = 1
                    } finally {
                        tracker.dispose()
                    }
                })
            } catch (error) {
                fail(error)
            }
        })

    const notes = program.command('notes').description('Long-term notes')

    notes
        .command('add')
        .argument('<content...>', 'Note text')
        .option('-t, --tags <tags>', 'Comma-separated tags')
        .option('-l, --links <paths>', 'Comma-separated related paths')
        .action(async (words: string[], flags: { tags?: string; links?: string }) => {
            try {
                await withContainer(await resolveConfig(globals()), async ({ store }) => {
                    const id = store.createNote({ content: words.join(' '), tags: splitCsv(flags.tags), links: splitCsv(flags.links) })
                    console.log(colors.success(`Saved note #${id}`))
                })
            } catch (error) {
                fail(error)
            }
        })

    notes
        .command('recall')
        .argument('[query...]', 'Words to search for')
        .option('-n, --limit <n>', 'Max notes', parseNumber, 5)
        .action(async (words: string[], flags: { limit: number }) => {
            try {
                await withContainer(await resolveConfig(globals()), async ({ store }) => {
                    const found = store.recallNotes(words.join(' '), { limit: flags.limit })
                    if (found.length === 0) console.log(colors.dim('No matching notes.'))
                    for (const note of found) console.log(`${formatNote(note)}\n`)
                })
            } catch (error) {
                fail(error)
            }
        })

    const task = program.command('task').description('Multi-step tasks')

    task.command('create')
        .argument('<title...>', 'Task title')
        .option('-p, --plan <text>', 'Plan text', '')
        .option('-w, --workflow <type>', 'simple, analysis or full', parseWorkflow, 'full')
        .option('--parent <id>', 'Parent task id', parseNumber)
        .action(async (words: string[], flags: { plan: string; workflow: WorkflowType; parent?: number }) => {
            try {
                await withContainer(await resolveConfig(globals()), async ({ store }) => {
                    const result = store.manageTask({
                        action: 'create',
                        title: words.join(' '),
                        plan: flags.plan,
                        workflowType: flags.workflow,
                        parentTaskId: flags.parent,
                    })
                    if (!result.ok) throw new Error(result.error)
                    if (result.value.action === 'create') console.log(formatTask(result.value.task))
                })
            } catch (error) {
                fail(error)
            }
        })

    task.command('list').action(async () => {
        try {
            await withContainer(await resolveConfig(globals()), async ({ store }) => {
                const result = store.manageTask({ action: 'list' })
                if (!result.ok) throw new Error(result.error)
                if (result.value.action !== 'list') return
                if (result.value.tasks.length === 0) console.log(colors.dim('No tasks.'))
                for (const item of result.value.tasks) console.log(formatTask(item))
            })
        } catch (error) {
            fail(error)
        }
    })

    task.command('step')
        .description('Run the current step of a task')
        .argument('<id>', 'Task id', parseNumber)
        .option('-i, --instructions <text>', 'Extra instructions for this step')
        .action(async (id: number, flags: { instructions?: string }) => {
            try {
                const config = await ensureApiKey(await resolveConfig(globals()))
                if (!config) {
                    process.exitCode = 1
                    return
                }
                await withContainer(config, async (container) => {
                    const spinner = clack.spinner()
                    spinner.start(`Running task #${id}...`)
                    const tracker = createProgressTracker(container.eventBus, spinner)
                    try {
                        const result = await container.taskRunner.runStep(id, { instructions: flags.instructions })
                        spinner.stop(result.ok ? 'Step finished' : colors.error('Step not run'))
                        if (!result.ok) throw new Error(result.error)
                        console.log(formatStepOutcome(result.value))
                    } finally {
                        tracker.dispose()
                    }
                })
            } catch (error) {
                fail(error)
            }
        })

    const aegis = program.command('aegis').description('Sticky orientation: tags, summary and temperature')

    aegis.command('show').action(async () => {
        try {
            await withContainer(await resolveConfig(globals()), async (container) => {
                console.log(formatAegis(container.aegis.current()))
            })
        } catch (error) {
            fail(error)
        }
    })

    aegis
        .command('set')
        .option('-t, --tags <tags>', 'Comma-separated tags')
        .option('-s, --summary <text>', 'Summary text')
        .option('--temperature <value>', 'Sampling temperature', parseNumber)
        .action(async (flags: { tags?: string; summary?: string; temperature?: number }) => {
            try {
                await withContainer(await resolveConfig(globals()), async (container) => {
                    const snapshot = container.aegis.update({
                        tags: flags.tags === undefined ? undefined : splitCsv(flags.tags),
                        summary: flags.summary,
                        temperature: flags.temperature,
                    })
                    console.log(formatAegis(snapshot))
                })
            } catch (error) {
                fail(error)
            }
        })

    return program
}
