import type { RefineryEvent } from "../events/types.js"
import type { CreateRendererOptions, EventSource, Renderer } from "./types.js"

/** One plain line per event, for CI logs and piped output. */
export class LogRenderer implements Renderer {
    private source: EventSource | null = null
    private handler: ((event: RefineryEvent) => void) | null = null
    private startedAt = 0
    private readonly write: (text: string) => void

    constructor(options?: CreateRendererOptions) {
        this.write =
            options?.write ??
            ((text: string): void => {
                process.stdout.write(text)
            })
    }

    public attach(source: EventSource): void {
        this.source = source
        this.handler = (event: RefineryEvent): void => this.handleEvent(event)
        this.source.on(this.handler)
    }

    public detach(): void {
        if (this.source && this.handler) {
            this.source.off(this.handler)
        }
        this.source = null
        this.handler = null
    }

    private handleEvent(event: RefineryEvent): void {
        const elapsed = this.formatElapsed()
        this.write(`[${elapsed}] ${formatEvent(event)}\n`)
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = Date.now()
        const seconds = (Date.now() - this.startedAt) / 1000
        const minutes = Math.floor(seconds / 60)
        const secs = (seconds % 60).toFixed(1)
        return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
    }
}

export function formatEvent(event: RefineryEvent): string {
    const detail = event.detail ? `  "${truncate(event.detail, 80)}"` : ""
    switch (event.type) {
        case "project_update":
            return `project   ${pad(event.state)}  ${event.progress}%${detail}`
        case "iteration_update":
            return `iteration ${pad(`#${event.iterationNumber}`)}  ${event.status} ${event.progress}%${detail}`
        case "agent_update":
            return `agent     ${pad(event.agentName)}  ${event.status} ${event.progress}%${detail}`
        case "tool_call":
            return `tool      ${pad(event.toolName)}  ${event.status}${detail}`
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}

function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}
