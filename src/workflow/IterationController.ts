import { randomUUID } from "node:crypto"

import type { AgentResult, AgentSpec } from "../agents/AgentRunner.js"
import { AgentRunner } from "../agents/AgentRunner.js"
import { AgentFailure, CancelledError, IterationFailure } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { Publish } from "../events/types.js"
import type {
    Artifact,
    EntityStatus,
    FeedbackSet,
    TerminalStatus,
} from "../types.js"
import { buildFeedbackSet } from "./FeedbackAccumulator.js"

export interface ProjectState {
    projectName: string
    description: string
    directory: string
    previousArtifacts: Artifact[]
}

export interface IterationResult {
    iterationId: string
    iterationNumber: number
    status: TerminalStatus
    progress: number
    /** Every artifact produced, including a failed agent's partial one. */
    artifacts: Artifact[]
    feedback: FeedbackSet
    agentResults: AgentResult[]
    failure?: IterationFailure
    cancelled: boolean
}

export interface IterationControllerOptions {
    agents: readonly AgentSpec[]
    publish: Publish
    signal?: AbortSignal
    maxRetries?: number
    toolTimeoutMs?: number
    onProgress?: (iterationNumber: number, progress: number) => void
}

/**
 * Runs the agent sequence for one refinement pass. Agents run strictly in
 * order and the first failure ends the pass.
 */
export class IterationController {
    private readonly options: IterationControllerOptions

    constructor(options: IterationControllerOptions) {
        this.options = options
    }

    public async runIteration(
        seq: number,
        projectState: ProjectState,
        feedback: FeedbackSet
    ): Promise<IterationResult> {
        const iterationId = randomUUID()
        const { agents, publish, signal } = this.options
        const agentProgress = new Map<string, number>()
        let progress = 0
        let status: EntityStatus = "in_progress"

        const emit = (detail: string): void => {
            publish({
                type: "iteration_update",
                iterationId,
                iterationNumber: seq,
                status,
                progress,
                detail,
            })
            this.options.onProgress?.(seq, progress)
        }

        const recompute = (): void => {
            if (status !== "in_progress") return
            let sum = 0
            for (const value of agentProgress.values()) sum += value
            // 100 is only reported once every agent has completed.
            const next = Math.min(
                99,
                Math.max(
                    progress,
                    agents.length === 0 ? 0 : Math.floor(sum / agents.length)
                )
            )
            if (next === progress) return
            progress = next
            emit(`Iteration ${seq} in progress`)
        }

        emit(`Starting iteration ${seq}`)
        log.iteration("Iteration %d started with %d agents", seq, agents.length)

        const runner = new AgentRunner({
            iterationId,
            publish,
            signal,
            maxRetries: this.options.maxRetries,
            toolTimeoutMs: this.options.toolTimeoutMs,
            onProgress: (agentId, value) => {
                agentProgress.set(agentId, value)
                recompute()
            },
        })

        const artifacts: Artifact[] = []
        const agentResults: AgentResult[] = []
        let failure: AgentFailure | undefined
        let cancelled = false

        for (const spec of agents) {
            if (signal?.aborted) {
                cancelled = true
                failure = new AgentFailure(
                    spec.name,
                    `Cancelled before ${spec.name} started`,
                    new CancelledError()
                )
                break
            }

            const result = await runner.run(
                spec,
                {
                    iterationId,
                    iterationNumber: seq,
                    projectName: projectState.projectName,
                    description: projectState.description,
                    directory: projectState.directory,
                    artifacts: [...artifacts],
                    previousArtifacts: projectState.previousArtifacts,
                },
                feedback
            )
            agentResults.push(result)
            if (result.artifact) artifacts.push(result.artifact)

            if (result.status === "failed") {
                failure =
                    result.failure ??
                    new AgentFailure(result.name, result.detail)
                cancelled = failure.cause instanceof CancelledError
                break
            }
        }

        const issues = agentResults.flatMap((result) => result.issues)
        const iterationFeedback = buildFeedbackSet(issues)

        if (failure) {
            const iterationFailure = new IterationFailure(seq, failure)
            status = "failed"
            emit(iterationFailure.message)
            log.iteration("%s", iterationFailure.message)
            return {
                iterationId,
                iterationNumber: seq,
                status: "failed",
                progress,
                artifacts,
                feedback: iterationFeedback,
                agentResults,
                failure: iterationFailure,
                cancelled,
            }
        }

        status = "completed"
        progress = 100
        emit(`Iteration ${seq} completed with ${issues.length} issue(s)`)
        log.iteration("Iteration %d completed, %d issue(s)", seq, issues.length)
        return {
            iterationId,
            iterationNumber: seq,
            status: "completed",
            progress,
            artifacts,
            feedback: iterationFeedback,
            agentResults,
            cancelled: false,
        }
    }
}
