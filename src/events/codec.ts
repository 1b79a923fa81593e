import { z } from "zod"

import { RefineryError } from "../core/errors.js"
import type { RefineryEvent } from "./types.js"

const statusSchema = z.enum(["pending", "in_progress", "completed", "failed"])
const progressSchema = z.number().int().min(0).max(100)

const envelope = {
    seq: z.number().int().positive(),
    projectId: z.string(),
    timestamp: z.string(),
}

export const refineryEventSchema = z.discriminatedUnion("type", [
    z.object({
        ...envelope,
        type: z.literal("project_update"),
        state: z.enum(["idle", "running", "completed", "failed", "exhausted"]),
        status: statusSchema,
        progress: progressSchema,
        detail: z.string().optional(),
    }),
    z.object({
        ...envelope,
        type: z.literal("iteration_update"),
        iterationId: z.string(),
        iterationNumber: z.number().int().positive(),
        status: statusSchema,
        progress: progressSchema,
        detail: z.string().optional(),
    }),
    z.object({
        ...envelope,
        type: z.literal("agent_update"),
        iterationId: z.string(),
        agentId: z.string(),
        agentName: z.string(),
        agentKind: z.enum([
            "schema",
            "implementation",
            "test_generation",
            "review",
        ]),
        status: statusSchema,
        progress: progressSchema,
        detail: z.string().optional(),
    }),
    z.object({
        ...envelope,
        type: z.literal("tool_call"),
        iterationId: z.string(),
        agentId: z.string(),
        toolId: z.string(),
        toolName: z.string(),
        status: statusSchema,
        detail: z.string().optional(),
    }),
])

export class EventDecodeError extends RefineryError {
    public readonly line: string

    constructor(line: string, message: string) {
        super(message, "EVENT_DECODE_ERROR")
        this.name = "EventDecodeError"
        this.line = line
    }
}

export function encodeEvent(event: RefineryEvent): string {
    return `${JSON.stringify(event)}\n`
}

export function decodeEventLine(line: string): RefineryEvent {
    let raw: unknown
    try {
        raw = JSON.parse(line)
    } catch {
        throw new EventDecodeError(line, "Event line is not valid JSON")
    }
    const parsed = refineryEventSchema.safeParse(raw)
    if (!parsed.success) {
        throw new EventDecodeError(
            line,
            `Malformed event: ${parsed.error.issues[0]?.message ?? "unknown"}`
        )
    }
    return parsed.data
}

/**
 * Incremental JSON-lines decoder. Chunks may split lines anywhere; an event
 * is returned once its terminating newline has arrived.
 */
export class EventStreamDecoder {
    private buffer = ""

    public push(chunk: string): RefineryEvent[] {
        this.buffer += chunk
        const events: RefineryEvent[] = []
        let newline = this.buffer.indexOf("\n")
        while (newline !== -1) {
            const line = this.buffer.slice(0, newline).trim()
            this.buffer = this.buffer.slice(newline + 1)
            if (line) events.push(decodeEventLine(line))
            newline = this.buffer.indexOf("\n")
        }
        return events
    }

    /** Decodes a trailing line that was never newline-terminated. */
    public end(): RefineryEvent[] {
        const rest = this.buffer.trim()
        this.buffer = ""
        return rest ? [decodeEventLine(rest)] : []
    }
}
