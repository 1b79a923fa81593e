import { describe, expect, it, vi } from "vitest"

import type { AgentSpec, IterationContext } from "../../agents/AgentRunner.js"
import { IterationFailure } from "../../core/errors.js"
import { emptyFeedback } from "../../workflow/FeedbackAccumulator.js"
import { IterationController } from "../../workflow/IterationController.js"
import {
    createRecorder,
    eventsOfType,
    makeArtifact,
    makeIssue,
    scriptedAgent,
} from "../helpers/fakes.js"

const projectState = {
    projectName: "Todo App",
    description: "A todo list",
    directory: "/tmp/todo",
    previousArtifacts: [],
}

describe("IterationController", () => {
    it("runs every agent in order and merges their issues", async () => {
        const recorder = createRecorder()
        const controller = new IterationController({
            agents: [
                scriptedAgent("schema", "Schema Agent"),
                scriptedAgent("review", "Review Agent", {
                    issues: [
                        makeIssue("high", "No input validation"),
                        makeIssue("low", "Weak hashing", "security"),
                    ],
                }),
            ],
            publish: recorder.publish,
        })

        const result = await controller.runIteration(1, projectState, emptyFeedback())

        expect(result.status).toBe("completed")
        expect(result.progress).toBe(100)
        expect(result.agentResults.map((r) => r.name)).toEqual([
            "Schema Agent",
            "Review Agent",
        ])
        expect(result.feedback.review.map((i) => i.description)).toEqual([
            "No input validation",
        ])
        expect(result.feedback.security.map((i) => i.description)).toEqual([
            "Weak hashing",
        ])
        expect(result.feedback.performance).toEqual([])
        expect(Object.isFrozen(result.feedback)).toBe(true)

        const updates = eventsOfType(recorder.events, "iteration_update")
        expect(updates.map((e) => e.progress)).toEqual([0, 49, 50, 99, 100])
        expect(updates.at(-1)).toMatchObject({
            status: "completed",
            iterationNumber: 1,
            detail: "Iteration 1 completed with 2 issue(s)",
        })
    })

    it("stops at the first failed agent and never starts the rest", async () => {
        const recorder = createRecorder()
        const later = vi.fn()
        const controller = new IterationController({
            agents: [
                scriptedAgent("schema", "Schema Agent"),
                scriptedAgent("implementation", "Implementation Agent", {
                    operation: () => Promise.reject(new Error("boom")),
                }),
                scriptedAgent("test_generation", "Test Generation Agent", {
                    onExecute: later,
                }),
                scriptedAgent("review", "Review Agent", { onExecute: later }),
            ],
            publish: recorder.publish,
            maxRetries: 0,
        })

        const result = await controller.runIteration(1, projectState, emptyFeedback())

        expect(result.status).toBe("failed")
        expect(result.cancelled).toBe(false)
        expect(later).not.toHaveBeenCalled()
        expect(result.failure).toBeInstanceOf(IterationFailure)
        expect(result.failure?.message).toBe(
            "Iteration 1 failed: Implementation Agent failed: Error in step_1: boom (1 attempt)"
        )
        expect(result.progress).toBe(25)
        expect(result.artifacts.map((a) => a.kind)).toEqual(["schema"])

        const agentNames = new Set(
            eventsOfType(recorder.events, "agent_update").map((e) => e.agentName)
        )
        expect([...agentNames]).toEqual(["Schema Agent", "Implementation Agent"])
        expect(recorder.events.at(-1)).toMatchObject({
            type: "iteration_update",
            status: "failed",
            progress: 25,
        })
    })

    it("shows later agents the artifacts of earlier ones", async () => {
        const seen: IterationContext[] = []
        const capture = (kind: "schema" | "implementation"): AgentSpec => ({
            kind,
            name: kind,
            execute(_session, context) {
                seen.push(context)
                return Promise.resolve({ artifact: makeArtifact(kind), issues: [] })
            },
        })
        const previous = [makeArtifact("review", "last round")]
        const controller = new IterationController({
            agents: [capture("schema"), capture("implementation")],
            publish: createRecorder().publish,
        })

        await controller.runIteration(
            2,
            { ...projectState, previousArtifacts: previous },
            emptyFeedback()
        )

        expect(seen[0].artifacts).toEqual([])
        expect(seen[1].artifacts.map((a) => a.kind)).toEqual(["schema"])
        expect(seen[1].previousArtifacts).toBe(previous)
        expect(seen[1].iterationNumber).toBe(2)
    })

    it("passes the feedback it was given to every agent", async () => {
        const feedbacks: unknown[] = []
        const feedback = { ...emptyFeedback(), review: [makeIssue("high")] }
        const controller = new IterationController({
            agents: [
                {
                    kind: "schema",
                    name: "Schema Agent",
                    execute(_session, _context, received) {
                        feedbacks.push(received)
                        return Promise.resolve({
                            artifact: makeArtifact("schema"),
                            issues: [],
                        })
                    },
                },
            ],
            publish: createRecorder().publish,
        })
        await controller.runIteration(2, projectState, feedback)
        expect(feedbacks).toEqual([feedback])
    })

    it("marks the iteration cancelled when the run stops between agents", async () => {
        const abort = new AbortController()
        const controller = new IterationController({
            agents: [
                {
                    kind: "schema",
                    name: "Schema Agent",
                    execute() {
                        abort.abort("user stop")
                        return Promise.resolve({
                            artifact: makeArtifact("schema"),
                            issues: [],
                        })
                    },
                },
                scriptedAgent("implementation", "Implementation Agent"),
            ],
            publish: createRecorder().publish,
            signal: abort.signal,
        })

        const result = await controller.runIteration(1, projectState, emptyFeedback())

        expect(result.status).toBe("failed")
        expect(result.cancelled).toBe(true)
        expect(result.agentResults).toHaveLength(1)
        expect(result.failure?.message).toBe(
            "Iteration 1 failed: Cancelled before Implementation Agent started"
        )
    })
})
