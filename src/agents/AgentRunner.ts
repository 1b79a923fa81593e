import { randomUUID } from "node:crypto"

import { DEFAULT_MAX_RETRIES } from "../core/Config.js"
import {
    AgentFailure,
    CancelledError,
    errorMessage,
    InvalidTransitionError,
    isRetryable,
    ToolCallFailure,
    ToolTimeoutError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { Publish } from "../events/types.js"
import type {
    AgentKind,
    Artifact,
    EntityStatus,
    FeedbackSet,
    Issue,
    TerminalStatus,
} from "../types.js"
import { ToolCallTracker } from "./ToolCallTracker.js"

/** What an agent sees of the iteration it runs in. */
export interface IterationContext {
    iterationId: string
    iterationNumber: number
    projectName: string
    description: string
    directory: string
    /** Artifacts of the agents that already ran in this iteration. */
    artifacts: Artifact[]
    /** Artifacts the previous iteration left behind. */
    previousArtifacts: Artifact[]
}

export interface ToolOptions<T> {
    maxRetries?: number
    timeoutMs?: number
    detail?: string
    describe?: (result: T) => string
}

export interface AgentSession {
    readonly agentId: string
    readonly signal?: AbortSignal
    /**
     * Runs one tracked operation. Failed attempts are retried with the same
     * operation; the last failure is thrown as a ToolCallFailure.
     */
    tool<T>(
        name: string,
        operation: (signal: AbortSignal) => Promise<T>,
        options?: ToolOptions<T>
    ): Promise<T>
    /** For agents whose work is not split into tool calls. */
    reportProgress(progress: number, detail?: string): void
    /** Keeps an artifact with the result even if the agent later fails. */
    recordArtifact(artifact: Artifact): void
}

export interface AgentOutput {
    artifact: Artifact
    issues: Issue[]
}

export interface AgentSpec {
    kind: AgentKind
    name: string
    maxRetries?: number
    toolTimeoutMs?: number
    execute(
        session: AgentSession,
        context: IterationContext,
        feedback: FeedbackSet
    ): Promise<AgentOutput>
}

export interface AgentResult {
    agentId: string
    kind: AgentKind
    name: string
    status: TerminalStatus
    progress: number
    detail: string
    artifact?: Artifact
    issues: Issue[]
    failure?: AgentFailure
}

export interface AgentRunnerOptions {
    iterationId: string
    publish: Publish
    signal?: AbortSignal
    maxRetries?: number
    toolTimeoutMs?: number
    onProgress?: (agentId: string, progress: number) => void
}

const RUNNING_CAP = 99

/** Runs the agents of one iteration, one at a time, each at most once. */
export class AgentRunner {
    private readonly options: AgentRunnerOptions
    private readonly ran: Set<string> = new Set()

    constructor(options: AgentRunnerOptions) {
        this.options = options
    }

    public async run(
        spec: AgentSpec,
        context: IterationContext,
        feedback: FeedbackSet
    ): Promise<AgentResult> {
        if (this.ran.has(spec.name)) {
            throw new InvalidTransitionError(
                `${spec.name} already ran in iteration ${context.iterationNumber}`
            )
        }
        this.ran.add(spec.name)

        const execution = new AgentExecution(spec, this.options)
        return execution.run(context, feedback)
    }
}

class AgentExecution implements AgentSession {
    public readonly agentId: string = randomUUID()
    public readonly signal?: AbortSignal
    private readonly spec: AgentSpec
    private readonly options: AgentRunnerOptions
    private readonly tracker: ToolCallTracker
    private readonly maxRetries: number
    private readonly timeoutMs?: number
    private status: EntityStatus = "pending"
    private progress = 0
    private override: number | null = null
    private detail = ""
    private artifact?: Artifact

    constructor(spec: AgentSpec, options: AgentRunnerOptions) {
        this.spec = spec
        this.options = options
        this.signal = options.signal
        this.maxRetries =
            spec.maxRetries ?? options.maxRetries ?? DEFAULT_MAX_RETRIES
        this.timeoutMs = spec.toolTimeoutMs ?? options.toolTimeoutMs
        this.tracker = new ToolCallTracker({
            iterationId: options.iterationId,
            agentId: this.agentId,
            publish: options.publish,
            onTransition: () => this.recompute(),
        })
    }

    public async run(
        context: IterationContext,
        feedback: FeedbackSet
    ): Promise<AgentResult> {
        this.transition("pending", `${this.spec.name} queued`)
        this.transition("in_progress", `Starting ${this.spec.name}`)
        log.agent("%s started (iteration %d)", this.spec.name, context.iterationNumber)

        try {
            if (this.signal?.aborted) {
                throw new CancelledError(cancelReason(this.signal))
            }
            const output = await this.spec.execute(this, context, feedback)
            if (this.tracker.openIds().length > 0) {
                throw new InvalidTransitionError(
                    `${this.spec.name} finished with open tool calls`
                )
            }
            // A swallowed tool failure still fails the agent.
            const failedCall = this.tracker
                .list()
                .find((call) => call.status === "failed")
            if (failedCall) {
                this.artifact = output.artifact
                throw new AgentFailure(
                    this.spec.name,
                    `Tool call ${failedCall.name} failed${failedCall.detail ? `: ${failedCall.detail}` : ""}`
                )
            }
            this.progress = 100
            this.transition("completed", `${this.spec.name} completed`)
            return this.result("completed", output.artifact, output.issues)
        } catch (error) {
            if (error instanceof InvalidTransitionError) throw error

            const cause = error instanceof Error ? error : new Error(String(error))
            const detail =
                error instanceof CancelledError
                    ? `Cancelled: ${error.message}`
                    : `${this.spec.name} failed: ${cause.message}`
            for (const id of this.tracker.openIds()) {
                this.tracker.end(id, "failed", detail)
            }
            log.agent("%s", detail)
            this.transition("failed", detail)
            return this.result(
                "failed",
                this.artifact,
                [],
                new AgentFailure(this.spec.name, detail, cause)
            )
        }
    }

    public async tool<T>(
        name: string,
        operation: (signal: AbortSignal) => Promise<T>,
        options?: ToolOptions<T>
    ): Promise<T> {
        if (this.signal?.aborted) {
            throw new CancelledError(cancelReason(this.signal))
        }

        const maxRetries = options?.maxRetries ?? this.maxRetries
        const timeoutMs = options?.timeoutMs ?? this.timeoutMs
        const maxAttempts = maxRetries + 1
        const id = this.tracker.begin(name, options?.detail)

        let lastError: unknown = null
        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (this.signal?.aborted) {
                const reason = cancelReason(this.signal)
                this.tracker.end(id, "failed", `Cancelled: ${reason}`)
                throw new CancelledError(reason)
            }

            this.tracker.update(
                id,
                "in_progress",
                attempt === 1
                    ? (options?.detail ?? `Starting ${name}`)
                    : `Retry ${attempt - 1}/${maxRetries} after: ${errorMessage(lastError)}`
            )

            try {
                const result = await this.attempt(name, operation, timeoutMs)
                this.tracker.end(
                    id,
                    "completed",
                    options?.describe?.(result) ?? `Completed ${name}`
                )
                return result
            } catch (error) {
                if (error instanceof CancelledError) {
                    this.tracker.end(id, "failed", `Cancelled: ${error.message}`)
                    throw error
                }
                lastError = error
                if (!isRetryable(error) || attempt === maxAttempts) {
                    const message = `Error in ${name}: ${errorMessage(error)} (${attempt} attempt${attempt === 1 ? "" : "s"})`
                    this.tracker.end(id, "failed", message)
                    throw new ToolCallFailure(
                        name,
                        attempt,
                        message,
                        error instanceof Error ? error : undefined
                    )
                }
                log.agent(
                    "%s: %s failed (attempt %d/%d): %s",
                    this.spec.name,
                    name,
                    attempt,
                    maxAttempts,
                    errorMessage(error)
                )
            }
        }

        // Unreachable: the last attempt either returns or throws.
        throw new ToolCallFailure(name, maxAttempts, `Error in ${name}`)
    }

    public reportProgress(progress: number, detail?: string): void {
        this.override = Math.max(0, Math.min(100, Math.floor(progress)))
        if (detail !== undefined) this.detail = detail
        this.recompute(detail !== undefined)
    }

    public recordArtifact(artifact: Artifact): void {
        this.artifact = artifact
    }

    /**
     * Races one attempt against cancellation and the optional deadline. The
     * operation gets its own signal so it can stop early either way.
     */
    private attempt<T>(
        name: string,
        operation: (signal: AbortSignal) => Promise<T>,
        timeoutMs?: number
    ): Promise<T> {
        const controller = new AbortController()
        const runSignal = this.signal

        return new Promise<T>((resolve, reject) => {
            let timer: ReturnType<typeof setTimeout> | undefined
            const onAbort = (): void => {
                cleanup()
                controller.abort()
                reject(new CancelledError(cancelReason(runSignal)))
            }
            const cleanup = (): void => {
                if (timer) clearTimeout(timer)
                runSignal?.removeEventListener("abort", onAbort)
            }

            runSignal?.addEventListener("abort", onAbort, { once: true })
            if (timeoutMs !== undefined && timeoutMs > 0) {
                timer = setTimeout(() => {
                    cleanup()
                    controller.abort()
                    reject(new ToolTimeoutError(name, timeoutMs))
                }, timeoutMs)
            }

            operation(controller.signal).then(
                (value) => {
                    cleanup()
                    resolve(value)
                },
                (error: unknown) => {
                    cleanup()
                    reject(error)
                }
            )
        })
    }

    private recompute(forceEmit = false): void {
        if (this.status !== "in_progress") return
        const { total, completed } = this.tracker.counts()
        const derived =
            this.override ?? (total === 0 ? 0 : Math.floor((100 * completed) / total))
        const next = Math.min(RUNNING_CAP, Math.max(this.progress, derived))
        if (next === this.progress && !forceEmit) return
        this.progress = next
        this.transition("in_progress", this.detail)
    }

    private transition(status: EntityStatus, detail: string): void {
        this.status = status
        this.detail = detail
        this.options.publish({
            type: "agent_update",
            iterationId: this.options.iterationId,
            agentId: this.agentId,
            agentName: this.spec.name,
            agentKind: this.spec.kind,
            status,
            progress: this.progress,
            detail,
        })
        this.options.onProgress?.(this.agentId, this.progress)
    }

    private result(
        status: TerminalStatus,
        artifact: Artifact | undefined,
        issues: Issue[],
        failure?: AgentFailure
    ): AgentResult {
        return {
            agentId: this.agentId,
            kind: this.spec.kind,
            name: this.spec.name,
            status,
            progress: this.progress,
            detail: this.detail,
            artifact,
            issues,
            failure,
        }
    }
}

function cancelReason(signal?: AbortSignal): string {
    const reason: unknown = signal?.reason
    if (typeof reason === "string" && reason) return reason
    if (reason instanceof CancelledError) return reason.message
    return "run cancelled"
}
