import { z } from 'zod'
import type { StepTermination } from '../core/errors.js'

export const INTERRUPT_KEY = '__divine_interrupt'

// The key alone marks an interruption; malformed optional fields are dropped
const InterruptionMarkerSchema = z.object({
    [INTERRUPT_KEY]: z.enum(['step_completed', 'step_rejected']),
    result: z.unknown().optional(),
    reason: z.string().nullish().catch(undefined),
    restart_from_step: z.number().int().nullish().catch(undefined),
})

/** Returned by a tool to stop the divination and hand control back to the task engine. */
export type InterruptionMarker = z.infer<typeof InterruptionMarkerSchema>

export function interruptionOf(value: unknown): InterruptionMarker | undefined {
    const parsed = InterruptionMarkerSchema.safeParse(value)
    return parsed.success ? parsed.data : undefined
}

export function markerFromTermination(termination: StepTermination): InterruptionMarker {
    const marker: InterruptionMarker = { [INTERRUPT_KEY]: termination.interrupt }
    if (termination.result !== undefined) marker.result = termination.result
    if (termination.reason !== undefined) marker.reason = termination.reason
    if (termination.restartFromStep !== undefined) marker.restart_from_step = termination.restartFromStep
    return marker
}
