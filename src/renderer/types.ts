import type { RefineryEvent } from "../events/types.js"

/** Anything a renderer can subscribe to: the bus or an orchestrator. */
export interface EventSource {
    on(handler: (event: RefineryEvent) => void): void
    off(handler: (event: RefineryEvent) => void): void
}

export interface CreateRendererOptions {
    verbose?: boolean
    /** Where the terminal renderer leaves its final frame. */
    runLogPath?: string
    write?: (text: string) => void
}

export interface Renderer {
    attach(source: EventSource): void
    detach(): void
}
