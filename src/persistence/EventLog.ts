import { createReadStream, createWriteStream, type WriteStream } from "node:fs"
import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import { finished } from "node:stream/promises"

import { log } from "../core/Logger.js"
import { encodeEvent, EventStreamDecoder } from "../events/codec.js"
import type { RefineryEvent } from "../events/types.js"

/**
 * Appends every event of a run to a JSON-lines file, in order. A failing
 * stream stops taking writes; the failure surfaces from `close()`.
 */
export class EventLogWriter {
    private stream: WriteStream | null = null
    private failure: Error | null = null

    constructor(private readonly path: string) {}

    public async open(): Promise<void> {
        await mkdir(dirname(this.path), { recursive: true })
        const stream = createWriteStream(this.path, { flags: "a" })
        stream.on("error", (error) => {
            this.failure ??= error
            log.persistence("Event log %s failed: %s", this.path, error.message)
        })
        this.stream = stream
    }

    public write(event: RefineryEvent): void {
        if (this.failure) return
        this.stream?.write(encodeEvent(event))
    }

    public async close(): Promise<void> {
        const stream = this.stream
        this.stream = null
        if (!stream) return
        stream.end()
        try {
            await finished(stream)
        } catch (error) {
            throw this.failure ?? error
        }
        if (this.failure) throw this.failure
    }
}

/** Streams a JSON-lines log back in, whatever size the chunks come in. */
export async function readEventLog(
    path: string,
    highWaterMark?: number
): Promise<RefineryEvent[]> {
    const decoder = new EventStreamDecoder()
    const events: RefineryEvent[] = []
    const stream = createReadStream(path, { encoding: "utf-8", highWaterMark })
    for await (const chunk of stream) {
        events.push(...decoder.push(String(chunk)))
    }
    events.push(...decoder.end())
    return events
}
