import type { AgentSpec } from "../agents/AgentRunner.js"
import { validateMaxIterations } from "../core/Config.js"
import { errorMessage, InvalidTransitionError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { EventBus } from "../events/EventBus.js"
import type { RefineryEvent } from "../events/types.js"
import { isTerminal } from "../status/invariants.js"
import { overallStatusFor, StatusProjector } from "../status/projection.js"
import type {
    AcceptancePredicate,
    Artifact,
    FeedbackSet,
    ProjectStatus,
    RunState,
} from "../types.js"
import type { FeedbackEntry } from "../workflow/FeedbackAccumulator.js"
import {
    emptyFeedback,
    FeedbackAccumulator,
    noBlockingIssues,
} from "../workflow/FeedbackAccumulator.js"
import type { IterationResult } from "../workflow/IterationController.js"
import { IterationController } from "../workflow/IterationController.js"

export interface OrchestratorProject {
    id: string
    name: string
    description: string
    directory: string
}

export interface OrchestratorOptions {
    project: OrchestratorProject
    agents: readonly AgentSpec[]
    maxIterations: number
    acceptance?: AcceptancePredicate
    maxRetries?: number
    toolTimeoutMs?: number
    /** Keep refining after an agent failure instead of ending the run. */
    continueOnIterationFailure?: boolean
}

export interface OrchestratorResult {
    projectId: string
    state: RunState
    iterationsRun: number
    artifacts: Artifact[]
    feedback: FeedbackSet
    status: ProjectStatus
}

type Handler = (event: RefineryEvent) => void

/**
 * Drives one project run: Idle → Running → Completed | Failed | Exhausted.
 * Owns the run's bus, feedback history and status tree.
 */
export class Orchestrator {
    private readonly options: OrchestratorOptions
    private readonly maxIterations: number
    private readonly acceptance: AcceptancePredicate
    private readonly bus: EventBus
    private readonly projector: StatusProjector
    private readonly accumulator: FeedbackAccumulator = new FeedbackAccumulator()
    private readonly abortController: AbortController = new AbortController()
    private state: RunState = "idle"
    private progress = 0
    private finished = 0

    constructor(options: OrchestratorOptions) {
        this.options = options
        this.maxIterations = validateMaxIterations(options.maxIterations)
        this.acceptance = options.acceptance ?? noBlockingIssues
        this.bus = new EventBus(options.project.id)
        this.projector = new StatusProjector(options.project.id)
        this.bus.on((event) => this.projector.apply(event))
    }

    public on(handler: Handler): void {
        this.bus.on(handler)
    }

    public off(handler: Handler): void {
        this.bus.off(handler)
    }

    public getState(): RunState {
        return this.state
    }

    public getStatus(): ProjectStatus {
        return this.projector.snapshot()
    }

    public events(): readonly RefineryEvent[] {
        return this.bus.history()
    }

    public feedbackHistory(): readonly FeedbackEntry[] {
        return this.accumulator.history()
    }

    /** Cooperative: takes effect at the next tool call or agent boundary. */
    public cancel(reason = "run cancelled"): void {
        if (!this.abortController.signal.aborted) {
            log.orchestrator("Cancelling: %s", reason)
            this.abortController.abort(reason)
        }
    }

    public async run(): Promise<OrchestratorResult> {
        if (this.state !== "idle") {
            throw new InvalidTransitionError(
                `Project ${this.options.project.id} has already been run`
            )
        }

        const { project } = this.options
        const signal = this.abortController.signal
        const controller = new IterationController({
            agents: this.options.agents,
            publish: (draft) => this.bus.publish(draft),
            signal,
            maxRetries: this.options.maxRetries,
            toolTimeoutMs: this.options.toolTimeoutMs,
            onProgress: (_, iterationProgress) =>
                this.updateProgress(iterationProgress),
        })

        let artifacts: Artifact[] = []
        let feedback = emptyFeedback()
        let completedIterations = 0

        this.transition("running", `Starting ${project.name}`)
        log.orchestrator(
            "Run %s started (max %d iterations)",
            project.id,
            this.maxIterations
        )

        try {
            for (let n = 1; n <= this.maxIterations; n++) {
                if (signal.aborted) {
                    return this.finish(
                        "failed",
                        `Cancelled: ${String(signal.reason)}`,
                        artifacts,
                        feedback
                    )
                }

                const result: IterationResult = await controller.runIteration(
                    n,
                    {
                        projectName: project.name,
                        description: project.description,
                        directory: project.directory,
                        previousArtifacts: artifacts,
                    },
                    this.accumulator.contextFor(n)
                )
                this.finished = n
                if (result.artifacts.length > 0) {
                    artifacts = result.artifacts
                }

                if (result.status === "completed") {
                    completedIterations++
                    this.accumulator.accumulate(n, result.feedback)
                    feedback = result.feedback
                    if (this.acceptance(result.feedback)) {
                        return this.finish(
                            "completed",
                            `Accepted after ${n} iteration(s)`,
                            artifacts,
                            feedback
                        )
                    }
                    this.updateProgress(0)
                    continue
                }

                const reason = result.failure?.message ?? `Iteration ${n} failed`
                if (result.cancelled || !this.options.continueOnIterationFailure) {
                    return this.finish("failed", reason, artifacts, feedback)
                }
                log.orchestrator("%s; continuing", reason)
                this.updateProgress(0)
            }

            if (completedIterations === 0) {
                return this.finish(
                    "failed",
                    `No iteration completed in ${this.maxIterations} attempt(s)`,
                    artifacts,
                    feedback
                )
            }
            return this.finish(
                "exhausted",
                `Reached ${this.maxIterations} iteration(s) without meeting acceptance`,
                artifacts,
                feedback
            )
        } catch (error) {
            // A broken transition means the tree can no longer be trusted.
            const detail = `Run aborted: ${errorMessage(error)}`
            log.orchestrator("%s", detail)
            this.failOpenEntities(detail)
            return this.finish("failed", detail, artifacts, feedback)
        }
    }

    /**
     * Overall progress counts finished iterations against the budget and
     * blends in the one that is running. Never moves backwards.
     */
    private updateProgress(inFlight: number): void {
        if (this.state !== "running") return
        const blended = Math.floor(
            (100 * (this.finished + inFlight / 100)) / this.maxIterations
        )
        // 100 is reserved for a successful end of the run.
        const next = Math.min(99, Math.max(this.progress, blended))
        if (next === this.progress) return
        this.progress = next
        this.transition("running")
    }

    private transition(state: RunState, detail?: string): void {
        this.state = state
        this.bus.publish({
            type: "project_update",
            state,
            status: overallStatusFor(state),
            progress: this.progress,
            detail: detail ?? this.getStatus().detail,
        })
    }

    private finish(
        state: Extract<RunState, "completed" | "failed" | "exhausted">,
        detail: string,
        artifacts: Artifact[],
        feedback: FeedbackSet
    ): OrchestratorResult {
        if (state !== "failed") this.progress = 100
        this.transition(state, detail)
        log.orchestrator("Run %s ended %s: %s", this.options.project.id, state, detail)
        return {
            projectId: this.options.project.id,
            state,
            iterationsRun: this.finished,
            artifacts,
            feedback,
            status: this.getStatus(),
        }
    }

    /** Closes every open entity bottom-up so observers see a terminal tree. */
    private failOpenEntities(detail: string): void {
        for (const iteration of this.getStatus().iterations) {
            if (isTerminal(iteration.status)) continue
            for (const agent of iteration.agents) {
                if (isTerminal(agent.status)) continue
                for (const toolCall of agent.toolCalls) {
                    if (isTerminal(toolCall.status)) continue
                    this.bus.publish({
                        type: "tool_call",
                        iterationId: iteration.id,
                        agentId: agent.id,
                        toolId: toolCall.id,
                        toolName: toolCall.name,
                        status: "failed",
                        detail,
                    })
                }
                this.bus.publish({
                    type: "agent_update",
                    iterationId: iteration.id,
                    agentId: agent.id,
                    agentName: agent.name,
                    agentKind: agent.kind,
                    status: "failed",
                    progress: agent.progress,
                    detail,
                })
            }
            this.bus.publish({
                type: "iteration_update",
                iterationId: iteration.id,
                iterationNumber: iteration.number,
                status: "failed",
                progress: iteration.progress,
                detail,
            })
            this.finished = Math.max(this.finished, iteration.number)
        }
    }
}
