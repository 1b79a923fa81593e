import type { RefineryEvent } from "../../events/types.js"
import { Orchestrator } from "../../orchestrator/Orchestrator.js"
import { makeArtifact, makeIssue, scriptedAgent } from "./fakes.js"

/**
 * Runs a small project: the first iteration fails, the second leaves a
 * blocking issue, the third is accepted.
 */
export async function recordedRun(): Promise<Orchestrator> {
    let implementationRuns = 0
    let reviews = 0
    const orchestrator = new Orchestrator({
        project: {
            id: "project_20260101_120000",
            name: "Todo App",
            description: "A todo list",
            directory: "/tmp/todo",
        },
        agents: [
            scriptedAgent("schema", "Schema Agent", { toolCount: 2 }),
            scriptedAgent("implementation", "Implementation Agent", {
                toolCount: 3,
                onExecute: () => {
                    implementationRuns++
                },
                operation: (index) =>
                    index === 2 && implementationRuns === 1
                        ? Promise.reject(new Error("flaky"))
                        : Promise.resolve("ok"),
            }),
            {
                ...scriptedAgent("review", "Review Agent"),
                execute(session) {
                    reviews++
                    return session.tool("review_code", () =>
                        Promise.resolve({
                            artifact: makeArtifact("review"),
                            issues: reviews === 1 ? [makeIssue("high")] : [],
                        })
                    )
                },
            },
        ],
        maxIterations: 3,
        maxRetries: 0,
        continueOnIterationFailure: true,
    })
    await orchestrator.run()
    return orchestrator
}

/** Deterministic pseudo-random numbers in [0, 1). */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0
    return () => {
        state = (state + 0x6d2b79f5) >>> 0
        let t = state
        t = Math.imul(t ^ (t >>> 15), t | 1)
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

export function splitRandomly(text: string, random: () => number): string[] {
    const chunks: string[] = []
    let offset = 0
    while (offset < text.length) {
        const size = 1 + Math.floor(random() * 40)
        chunks.push(text.slice(offset, offset + size))
        offset += size
    }
    return chunks
}

export function cloneEvents(events: readonly RefineryEvent[]): RefineryEvent[] {
    return events.map((event) => ({ ...event }))
}
