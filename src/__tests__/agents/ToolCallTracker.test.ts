import { describe, expect, it, vi } from "vitest"

import { ToolCallTracker } from "../../agents/ToolCallTracker.js"
import { InvalidTransitionError } from "../../core/errors.js"
import { createRecorder, eventsOfType } from "../helpers/fakes.js"

function createTracker(onTransition?: () => void): {
    tracker: ToolCallTracker
    recorder: ReturnType<typeof createRecorder>
} {
    const recorder = createRecorder()
    const tracker = new ToolCallTracker({
        iterationId: "it-1",
        agentId: "agent-1",
        publish: recorder.publish,
        onTransition,
    })
    return { tracker, recorder }
}

describe("ToolCallTracker", () => {
    it("creates pending tool calls with ids scoped to the agent", () => {
        const { tracker, recorder } = createTracker()
        const first = tracker.begin("generate_code")
        const second = tracker.begin("write_file", "src/app.ts")

        expect(first).toBe("agent-1-tool-1")
        expect(second).toBe("agent-1-tool-2")
        expect(tracker.get(second)).toMatchObject({
            name: "write_file",
            status: "pending",
            detail: "src/app.ts",
            agentId: "agent-1",
        })
        const events = eventsOfType(recorder.events, "tool_call")
        expect(events.map((e) => [e.toolId, e.status])).toEqual([
            ["agent-1-tool-1", "pending"],
            ["agent-1-tool-2", "pending"],
        ])
        expect(events[0].iterationId).toBe("it-1")
    })

    it("emits one event per transition", () => {
        const { tracker, recorder } = createTracker()
        const id = tracker.begin("generate_code")
        tracker.update(id, "in_progress", "Starting generate_code")
        tracker.update(id, "in_progress", "Retry 1/2 after: boom")
        tracker.end(id, "completed", "done")

        expect(recorder.events.map((e) => e.detail)).toEqual([
            undefined,
            "Starting generate_code",
            "Retry 1/2 after: boom",
            "done",
        ])
        expect(tracker.get(id)?.status).toBe("completed")
    })

    it("keeps the current detail when an update carries none", () => {
        const { tracker } = createTracker()
        const id = tracker.begin("write_file", "README.md")
        tracker.update(id, "in_progress")
        expect(tracker.get(id)?.detail).toBe("README.md")
    })

    it("rejects transitions out of a terminal status", () => {
        const { tracker } = createTracker()
        const id = tracker.begin("generate_code")
        tracker.end(id, "failed", "Error")

        expect(() => tracker.end(id, "completed")).toThrow(InvalidTransitionError)
        expect(() => tracker.update(id, "in_progress")).toThrow(
            InvalidTransitionError
        )
    })

    it("rejects backwards transitions and unknown ids", () => {
        const { tracker } = createTracker()
        const id = tracker.begin("generate_code")
        tracker.update(id, "in_progress")

        expect(() => tracker.update(id, "pending")).toThrow(
            "cannot go from in_progress to pending"
        )
        expect(() => tracker.update("agent-1-tool-9", "in_progress")).toThrow(
            "Unknown tool call agent-1-tool-9"
        )
    })

    it("tracks open calls and completion counts", () => {
        const { tracker } = createTracker()
        const a = tracker.begin("a")
        const b = tracker.begin("b")
        tracker.begin("c")
        tracker.end(a, "completed")
        tracker.end(b, "failed")

        expect(tracker.counts()).toEqual({ total: 3, completed: 1 })
        expect(tracker.openIds()).toEqual(["agent-1-tool-3"])
        expect(tracker.list().map((t) => t.name)).toEqual(["a", "b", "c"])
    })

    it("notifies the owner after the event is published", () => {
        const order: string[] = []
        const recorder = createRecorder()
        const tracker = new ToolCallTracker({
            iterationId: "it-1",
            agentId: "agent-1",
            publish: (draft) => {
                order.push("event")
                return recorder.publish(draft)
            },
            onTransition: vi.fn(() => order.push("owner")),
        })
        tracker.begin("a")
        expect(order).toEqual(["event", "owner"])
    })
})
