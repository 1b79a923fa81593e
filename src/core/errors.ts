export class RefineryError extends Error {
    public readonly code: string
    public override readonly cause?: Error

    constructor(message: string, code: string, cause?: Error) {
        super(message)
        this.name = "RefineryError"
        this.code = code
        this.cause = cause
    }
}

/** A state-machine misuse. Always a contract violation, never user-facing. */
export class InvalidTransitionError extends RefineryError {
    constructor(message: string) {
        super(message, "INVALID_TRANSITION")
        this.name = "InvalidTransitionError"
    }
}

export class ToolCallFailure extends RefineryError {
    public readonly toolName: string
    public readonly attempts: number

    constructor(
        toolName: string,
        attempts: number,
        message: string,
        cause?: Error
    ) {
        super(message, "TOOL_CALL_FAILURE", cause)
        this.name = "ToolCallFailure"
        this.toolName = toolName
        this.attempts = attempts
    }
}

export class AgentFailure extends RefineryError {
    public readonly agentName: string

    constructor(agentName: string, message: string, cause?: Error) {
        super(message, "AGENT_FAILURE", cause)
        this.name = "AgentFailure"
        this.agentName = agentName
    }
}

export class IterationFailure extends RefineryError {
    public readonly iterationNumber: number

    constructor(iterationNumber: number, cause: AgentFailure) {
        super(
            `Iteration ${iterationNumber} failed: ${cause.message}`,
            "ITERATION_FAILURE",
            cause
        )
        this.name = "IterationFailure"
        this.iterationNumber = iterationNumber
    }
}

export class ToolTimeoutError extends RefineryError {
    public readonly timeoutMs: number

    constructor(toolName: string, timeoutMs: number) {
        super(`${toolName} timed out after ${timeoutMs}ms`, "TOOL_TIMEOUT")
        this.name = "ToolTimeoutError"
        this.timeoutMs = timeoutMs
    }
}

export class WorkspaceError extends RefineryError {
    public readonly retryable: boolean

    constructor(message: string, retryable: boolean, cause?: Error) {
        super(message, "WORKSPACE_ERROR", cause)
        this.name = "WorkspaceError"
        this.retryable = retryable
    }
}

export class CancelledError extends RefineryError {
    constructor(reason = "Cancelled") {
        super(reason, "CANCELLED")
        this.name = "CancelledError"
    }
}

export class GenerationError extends RefineryError {
    public readonly retryable: boolean

    constructor(message: string, retryable: boolean, cause?: Error) {
        super(message, "GENERATION_ERROR", cause)
        this.name = "GenerationError"
        this.retryable = retryable
    }
}

export class ConfigError extends RefineryError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR")
        this.name = "ConfigError"
    }
}

/**
 * Whether a failed tool-call attempt may be repeated with the same input.
 * Contract violations, configuration problems and cancellation never are.
 */
export function isRetryable(error: unknown): boolean {
    if (error instanceof GenerationError || error instanceof WorkspaceError) {
        return error.retryable
    }
    if (
        error instanceof InvalidTransitionError ||
        error instanceof ConfigError ||
        error instanceof CancelledError
    ) {
        return false
    }
    return true
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
