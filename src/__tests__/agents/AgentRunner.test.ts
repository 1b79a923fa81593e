import { describe, expect, it, vi } from "vitest"

import type { AgentSpec } from "../../agents/AgentRunner.js"
import { AgentRunner } from "../../agents/AgentRunner.js"
import {
    AgentFailure,
    CancelledError,
    GenerationError,
    InvalidTransitionError,
    ToolCallFailure,
} from "../../core/errors.js"
import { emptyFeedback } from "../../workflow/FeedbackAccumulator.js"
import {
    createRecorder,
    eventsOfType,
    makeArtifact,
    scriptedAgent,
} from "../helpers/fakes.js"

const context = {
    iterationId: "it-1",
    iterationNumber: 1,
    projectName: "Todo App",
    description: "A todo list",
    directory: "/tmp/todo",
    artifacts: [],
    previousArtifacts: [],
}

function setup(options: { signal?: AbortSignal; maxRetries?: number; toolTimeoutMs?: number } = {}): {
    runner: AgentRunner
    recorder: ReturnType<typeof createRecorder>
} {
    const recorder = createRecorder()
    const runner = new AgentRunner({
        iterationId: "it-1",
        publish: recorder.publish,
        ...options,
    })
    return { runner, recorder }
}

describe("AgentRunner", () => {
    it("completes an agent and reports non-decreasing progress", async () => {
        const { runner, recorder } = setup()
        const result = await runner.run(
            scriptedAgent("schema", "Schema Agent", { toolCount: 2 }),
            context,
            emptyFeedback()
        )

        expect(result.status).toBe("completed")
        expect(result.progress).toBe(100)
        expect(result.detail).toBe("Schema Agent completed")

        const updates = eventsOfType(recorder.events, "agent_update")
        expect(updates.map((e) => e.status)).toEqual([
            "pending",
            "in_progress",
            "in_progress",
            "completed",
        ])
        expect(updates.map((e) => e.progress)).toEqual([0, 0, 99, 100])
        expect(updates.every((e) => e.agentKind === "schema")).toBe(true)
    })

    it("retries a failing tool call on the same id before giving up", async () => {
        const { runner, recorder } = setup({ maxRetries: 2 })
        const operation = vi.fn((index: number): Promise<string> =>
            index === 3 ? Promise.reject(new Error("boom")) : Promise.resolve("ok")
        )
        const result = await runner.run(
            scriptedAgent("implementation", "Implementation Agent", {
                toolCount: 3,
                operation,
            }),
            context,
            emptyFeedback()
        )

        expect(operation).toHaveBeenCalledTimes(5)
        expect(result.status).toBe("failed")
        expect(result.progress).toBe(99)
        expect(result.detail).toBe(
            "Implementation Agent failed: Error in step_3: boom (3 attempts)"
        )
        expect(result.failure).toBeInstanceOf(AgentFailure)
        expect(result.failure?.cause).toBeInstanceOf(ToolCallFailure)

        const third = eventsOfType(recorder.events, "tool_call").filter(
            (e) => e.toolName === "step_3"
        )
        expect(new Set(third.map((e) => e.toolId)).size).toBe(1)
        expect(third.map((e) => [e.status, e.detail])).toEqual([
            ["pending", undefined],
            ["in_progress", "Starting step_3"],
            ["in_progress", "Retry 1/2 after: boom"],
            ["in_progress", "Retry 2/2 after: boom"],
            ["failed", "Error in step_3: boom (3 attempts)"],
        ])
    })

    it("recovers when a retry succeeds", async () => {
        const { runner } = setup()
        let attempts = 0
        const result = await runner.run(
            scriptedAgent("review", "Review Agent", {
                operation: () => {
                    attempts++
                    return attempts === 1
                        ? Promise.reject(new Error("rate limit"))
                        : Promise.resolve("ok")
                },
            }),
            context,
            emptyFeedback()
        )
        expect(attempts).toBe(2)
        expect(result.status).toBe("completed")
    })

    it("does not retry non-retryable errors", async () => {
        const { runner } = setup({ maxRetries: 2 })
        const operation = vi.fn(
            (): Promise<string> =>
                Promise.reject(new GenerationError("invalid api key", false))
        )
        const result = await runner.run(
            scriptedAgent("schema", "Schema Agent", { operation }),
            context,
            emptyFeedback()
        )
        expect(operation).toHaveBeenCalledTimes(1)
        expect(result.detail).toBe(
            "Schema Agent failed: Error in step_1: invalid api key (1 attempt)"
        )
    })

    it("fails an attempt that runs past its deadline", async () => {
        const { runner, recorder } = setup({ maxRetries: 0, toolTimeoutMs: 10 })
        const result = await runner.run(
            scriptedAgent("schema", "Schema Agent", {
                operation: () => new Promise<string>(() => undefined),
            }),
            context,
            emptyFeedback()
        )
        expect(result.status).toBe("failed")
        const last = eventsOfType(recorder.events, "tool_call").at(-1)
        expect(last?.status).toBe("failed")
        expect(last?.detail).toBe(
            "Error in step_1: step_1 timed out after 10ms (1 attempt)"
        )
    })

    it("fails the in-flight tool call and the agent on cancellation", async () => {
        const controller = new AbortController()
        const { runner, recorder } = setup({ signal: controller.signal })
        let operationAborted = false

        const result = await runner.run(
            scriptedAgent("implementation", "Implementation Agent", {
                operation: (_, signal) =>
                    new Promise<string>((_resolve, reject) => {
                        signal.addEventListener("abort", () => {
                            operationAborted = true
                            reject(new Error("aborted"))
                        })
                        controller.abort("user stop")
                    }),
            }),
            context,
            emptyFeedback()
        )

        expect(operationAborted).toBe(true)
        expect(result.status).toBe("failed")
        expect(result.detail).toBe("Cancelled: user stop")
        expect(result.failure?.cause).toBeInstanceOf(CancelledError)

        const toolEvents = eventsOfType(recorder.events, "tool_call")
        expect(toolEvents.at(-1)).toMatchObject({
            status: "failed",
            detail: "Cancelled: user stop",
        })
        const agentEvents = eventsOfType(recorder.events, "agent_update")
        expect(agentEvents.at(-1)?.status).toBe("failed")
        expect(recorder.events.at(-1)?.type).toBe("agent_update")
    })

    it("does not start work when the run is already cancelled", async () => {
        const controller = new AbortController()
        controller.abort()
        const { runner, recorder } = setup({ signal: controller.signal })
        const result = await runner.run(
            scriptedAgent("schema", "Schema Agent"),
            context,
            emptyFeedback()
        )
        expect(result.detail).toBe("Cancelled: run cancelled")
        expect(eventsOfType(recorder.events, "tool_call")).toHaveLength(0)
    })

    it("takes progress reported by the agent without going backwards", async () => {
        const { runner, recorder } = setup()
        const spec: AgentSpec = {
            kind: "review",
            name: "Review Agent",
            execute(session) {
                session.reportProgress(40, "Halfway")
                session.reportProgress(20)
                return Promise.resolve({
                    artifact: makeArtifact("review"),
                    issues: [],
                })
            },
        }
        await runner.run(spec, context, emptyFeedback())
        const updates = eventsOfType(recorder.events, "agent_update")
        expect(updates.map((e) => e.progress)).toEqual([0, 0, 40, 100])
        expect(updates[2].detail).toBe("Halfway")
    })

    it("keeps a recorded artifact when the agent fails afterwards", async () => {
        const { runner } = setup()
        const partial = makeArtifact("implementation", "half done")
        const spec: AgentSpec = {
            kind: "implementation",
            name: "Implementation Agent",
            execute(session) {
                session.recordArtifact(partial)
                return Promise.reject(new Error("disk full"))
            },
        }
        const result = await runner.run(spec, context, emptyFeedback())
        expect(result.status).toBe("failed")
        expect(result.artifact).toBe(partial)
        expect(result.detail).toBe("Implementation Agent failed: disk full")
    })

    it("fails an agent that carries on past a failed tool call", async () => {
        const { runner, recorder } = setup({ maxRetries: 0 })
        const artifact = makeArtifact("review")
        const spec: AgentSpec = {
            kind: "review",
            name: "Review Agent",
            async execute(session) {
                await session
                    .tool("lint", () =>
                        Promise.reject(new GenerationError("lint crashed", false))
                    )
                    .catch(() => undefined)
                await session.tool("review_code", () => Promise.resolve("ok"))
                return { artifact, issues: [] }
            },
        }

        const result = await runner.run(spec, context, emptyFeedback())

        expect(result.status).toBe("failed")
        expect(result.progress).toBe(50)
        expect(result.artifact).toBe(artifact)
        expect(result.detail).toBe(
            "Review Agent failed: Tool call lint failed: Error in lint: lint crashed (1 attempt)"
        )
        const updates = eventsOfType(recorder.events, "agent_update")
        expect(updates.map((e) => e.progress)).toEqual([0, 0, 50, 50])
        expect(updates.at(-1)?.status).toBe("failed")
    })

    it("refuses to run the same agent twice", async () => {
        const { runner } = setup()
        const spec = scriptedAgent("schema", "Schema Agent")
        await runner.run(spec, context, emptyFeedback())
        await expect(runner.run(spec, context, emptyFeedback())).rejects.toThrow(
            InvalidTransitionError
        )
    })
})
