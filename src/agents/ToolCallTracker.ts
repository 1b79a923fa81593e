import { InvalidTransitionError } from "../core/errors.js"
import type { Publish } from "../events/types.js"
import { canTransition, isTerminal } from "../status/invariants.js"
import type { EntityStatus, TerminalStatus, ToolCallSnapshot } from "../types.js"

export interface ToolCallTrackerOptions {
    iterationId: string
    agentId: string
    publish: Publish
    /** Runs after every transition, once its event is out. */
    onTransition?: (toolCall: ToolCallSnapshot) => void
}

/**
 * Owns the tool calls of one agent. Ids are `<agentId>-tool-<n>` and the map
 * keeps invocation order.
 */
export class ToolCallTracker {
    private readonly iterationId: string
    private readonly agentId: string
    private readonly publish: Publish
    private readonly onTransition?: (toolCall: ToolCallSnapshot) => void
    private readonly calls: Map<string, ToolCallSnapshot> = new Map()
    private counter = 0

    constructor(options: ToolCallTrackerOptions) {
        this.iterationId = options.iterationId
        this.agentId = options.agentId
        this.publish = options.publish
        this.onTransition = options.onTransition
    }

    public begin(name: string, detail?: string): string {
        this.counter++
        const id = `${this.agentId}-tool-${this.counter}`
        const toolCall: ToolCallSnapshot = {
            id,
            name,
            status: "pending",
            detail,
            timestamp: new Date().toISOString(),
            agentId: this.agentId,
        }
        this.calls.set(id, toolCall)
        this.emit(toolCall)
        return id
    }

    public update(id: string, status: EntityStatus, detail?: string): void {
        const current = this.calls.get(id)
        if (!current) {
            throw new InvalidTransitionError(`Unknown tool call ${id}`)
        }
        if (!canTransition(current.status, status)) {
            throw new InvalidTransitionError(
                `Tool call ${id} (${current.name}) cannot go from ${current.status} to ${status}`
            )
        }
        const next: ToolCallSnapshot = {
            ...current,
            status,
            detail: detail ?? current.detail,
        }
        this.calls.set(id, next)
        this.emit(next)
    }

    public end(id: string, status: TerminalStatus, detail?: string): void {
        if (!isTerminal(status)) {
            throw new InvalidTransitionError(
                `Tool call ${id} cannot end with status ${String(status)}`
            )
        }
        this.update(id, status, detail)
    }

    public get(id: string): ToolCallSnapshot | undefined {
        return this.calls.get(id)
    }

    public list(): ToolCallSnapshot[] {
        return [...this.calls.values()]
    }

    public openIds(): string[] {
        return this.list()
            .filter((call) => !isTerminal(call.status))
            .map((call) => call.id)
    }

    public counts(): { total: number; completed: number } {
        const all = this.list()
        return {
            total: all.length,
            completed: all.filter((call) => call.status === "completed").length,
        }
    }

    private emit(toolCall: ToolCallSnapshot): void {
        this.publish({
            type: "tool_call",
            iterationId: this.iterationId,
            agentId: this.agentId,
            toolId: toolCall.id,
            toolName: toolCall.name,
            status: toolCall.status,
            detail: toolCall.detail,
        })
        this.onTransition?.(toolCall)
    }
}
