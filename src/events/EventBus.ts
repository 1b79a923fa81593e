import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventDraft, RefineryEvent } from "./types.js"

type EventHandler = (event: RefineryEvent) => void

/**
 * Per-run publisher. Stamps each draft with the next sequence number and
 * delivers it synchronously, so subscribers observe transitions in the order
 * they happened. A throwing subscriber is logged and skipped; it never
 * reaches the publisher.
 */
export class EventBus {
    private readonly handlers: Set<EventHandler> = new Set()
    private readonly published: RefineryEvent[] = []
    private seq = 0

    constructor(private readonly projectId: string) {}

    public on(handler: EventHandler): void {
        this.handlers.add(handler)
    }

    public publish(draft: EventDraft): RefineryEvent {
        this.seq++
        const event: RefineryEvent = Object.freeze({
            ...draft,
            seq: this.seq,
            projectId: this.projectId,
            timestamp: new Date().toISOString(),
        })
        this.published.push(event)
        for (const handler of [...this.handlers]) {
            try {
                handler(event)
            } catch (error) {
                log.orchestrator(
                    "Subscriber failed on event #%d (%s): %s",
                    event.seq,
                    event.type,
                    errorMessage(error)
                )
            }
        }
        return event
    }

    public off(handler: EventHandler): void {
        this.handlers.delete(handler)
    }

    public history(): readonly RefineryEvent[] {
        return this.published
    }
}
