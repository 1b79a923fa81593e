import { describe, expect, it } from "vitest"

import { encodeEvent, EventStreamDecoder } from "../../events/codec.js"
import type { RefineryEvent } from "../../events/types.js"
import { checkStatusInvariants, validateEventStream } from "../../status/invariants.js"
import {
    applyEvent,
    initialProjectStatus,
    replayEvents,
} from "../../status/projection.js"
import { recordedRun, seededRandom, splitRandomly } from "../helpers/runs.js"

const envelope = { projectId: "p", timestamp: "2026-01-01T00:00:00.000Z" }

describe("status projection", () => {
    it("rebuilds the live status from the event stream alone", async () => {
        const orchestrator = await recordedRun()
        const status = orchestrator.getStatus()

        expect(replayEvents(orchestrator.events())).toEqual(status)
        expect(status.state).toBe("completed")
        expect(status.iterations.map((i) => i.status)).toEqual([
            "failed",
            "completed",
            "completed",
        ])
        expect(checkStatusInvariants(status)).toEqual([])
    })

    it("replays the same tree whatever the chunking of the encoded stream", async () => {
        const orchestrator = await recordedRun()
        const encoded = orchestrator.events().map(encodeEvent).join("")

        for (const seed of [1, 7, 42, 1234]) {
            const decoder = new EventStreamDecoder()
            const decoded: RefineryEvent[] = []
            for (const chunk of splitRandomly(encoded, seededRandom(seed))) {
                decoded.push(...decoder.push(chunk))
            }
            decoded.push(...decoder.end())

            expect(decoded).toHaveLength(orchestrator.events().length)
            expect(validateEventStream(decoded)).toEqual([])
            expect(replayEvents(decoded)).toEqual(orchestrator.getStatus())
        }
    })

    it("keeps the order of iterations by number", () => {
        let status = initialProjectStatus("p")
        status = applyEvent(status, {
            ...envelope,
            seq: 1,
            type: "iteration_update",
            iterationId: "b",
            iterationNumber: 2,
            status: "in_progress",
            progress: 0,
        })
        status = applyEvent(status, {
            ...envelope,
            seq: 2,
            type: "iteration_update",
            iterationId: "a",
            iterationNumber: 1,
            status: "completed",
            progress: 100,
        })
        expect(status.iterations.map((i) => i.id)).toEqual(["a", "b"])
    })

    it("drops events whose parent it has never seen", () => {
        const status = applyEvent(initialProjectStatus("p"), {
            ...envelope,
            seq: 1,
            type: "agent_update",
            iterationId: "missing",
            agentId: "agent-1",
            agentName: "Schema Agent",
            agentKind: "schema",
            status: "in_progress",
            progress: 0,
        })
        expect(status.iterations).toEqual([])
    })

    it("keeps the creation timestamp of a tool call", () => {
        const events: RefineryEvent[] = [
            {
                ...envelope,
                seq: 1,
                type: "iteration_update",
                iterationId: "it",
                iterationNumber: 1,
                status: "in_progress",
                progress: 0,
            },
            {
                ...envelope,
                seq: 2,
                type: "agent_update",
                iterationId: "it",
                agentId: "ag",
                agentName: "Schema Agent",
                agentKind: "schema",
                status: "in_progress",
                progress: 0,
            },
            {
                ...envelope,
                seq: 3,
                type: "tool_call",
                iterationId: "it",
                agentId: "ag",
                toolId: "ag-tool-1",
                toolName: "generate_schema",
                status: "pending",
                timestamp: "2026-01-01T00:00:01.000Z",
            },
            {
                ...envelope,
                seq: 4,
                type: "tool_call",
                iterationId: "it",
                agentId: "ag",
                toolId: "ag-tool-1",
                toolName: "generate_schema",
                status: "completed",
                detail: "done",
                timestamp: "2026-01-01T00:00:09.000Z",
            },
        ]
        const [toolCall] = replayEvents(events).iterations[0].agents[0].toolCalls
        expect(toolCall).toEqual({
            id: "ag-tool-1",
            name: "generate_schema",
            status: "completed",
            detail: "done",
            timestamp: "2026-01-01T00:00:01.000Z",
            agentId: "ag",
        })
    })
})

describe("validateEventStream", () => {
    const iteration = (
        seq: number,
        status: "in_progress" | "completed",
        progress: number
    ): RefineryEvent => ({
        ...envelope,
        seq,
        type: "iteration_update",
        iterationId: "it",
        iterationNumber: 1,
        status,
        progress,
    })

    it("reports progress that goes backwards", () => {
        expect(
            validateEventStream([iteration(1, "in_progress", 50), iteration(2, "in_progress", 40)])
        ).toEqual(["#2 iteration:it: progress went from 50 to 40"])
    })

    it("reports gaps in the sequence", () => {
        expect(
            validateEventStream([iteration(1, "in_progress", 0), iteration(3, "in_progress", 10)])
        ).toEqual(["expected seq 2, got 3"])
    })

    it("reports a completed iteration with an open agent", () => {
        const violations = validateEventStream([
            iteration(1, "in_progress", 0),
            {
                ...envelope,
                seq: 2,
                type: "agent_update",
                iterationId: "it",
                agentId: "ag",
                agentName: "Schema Agent",
                agentKind: "schema",
                status: "in_progress",
                progress: 0,
            },
            iteration(3, "completed", 100),
        ])
        expect(violations).toContain(
            "#3 iteration 1 is completed with open agents Schema Agent"
        )
    })
})
