export type AgentKind = "schema" | "implementation" | "test_generation" | "review"

export type LLMProviderType = "openai" | "anthropic"

export type EntityStatus = "pending" | "in_progress" | "completed" | "failed"

export type TerminalStatus = Extract<EntityStatus, "completed" | "failed">

export type RunState = "idle" | "running" | "completed" | "failed" | "exhausted"

export type IssueCategory = "review" | "security" | "performance"

export type IssueSeverity = "low" | "medium" | "high" | "critical"

export type RendererType = "terminal" | "log" | "none"

export interface ModelConfig {
    provider: LLMProviderType
    model: string
    temperature?: number
    maxTokens?: number
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

export interface LLMMessage {
    role: "system" | "user" | "assistant"
    content: string
}

export interface LLMResponse {
    content: string
    usage: TokenUsage
}

export interface LLMProvider {
    complete(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse>
}

export interface Issue {
    category: IssueCategory
    severity: IssueSeverity
    description: string
    target: string
    recommendation: string
}

export type FeedbackSet = Readonly<Record<IssueCategory, readonly Issue[]>>

export interface GeneratedFile {
    path: string
    content: string
}

export interface GeneratedArtifact {
    content: string
    files: GeneratedFile[]
    issues: Issue[]
    usage?: TokenUsage
}

export interface Artifact {
    kind: AgentKind
    agentName: string
    content: string
    files: GeneratedFile[]
    createdAt: string
}

/** Everything an agent gets to build its generation request from. */
export interface GenerationInput {
    projectName: string
    description: string
    directory: string
    iterationNumber: number
    artifacts: Artifact[]
    previousArtifacts: Artifact[]
    feedback: FeedbackSet
}

export interface GenerationService {
    invoke(
        kind: AgentKind,
        input: GenerationInput,
        signal?: AbortSignal
    ): Promise<GeneratedArtifact>
}

export interface Workspace {
    writeFile(directory: string, file: GeneratedFile): Promise<void>
}

export interface CommandResult {
    exitCode: number
    stdout: string
    stderr: string
    timedOut: boolean
}

export interface CommandOptions {
    cwd: string
    signal?: AbortSignal
    timeoutMs?: number
}

/** Runs a shell command line and reports how it ended; never rejects on a non-zero exit. */
export type CommandRunner = (
    command: string,
    options: CommandOptions
) => Promise<CommandResult>

export interface ProjectRequest {
    project_name: string
    description: string
}

export interface ProjectHandle {
    project_id: string
    directory: string
}

export interface ProjectRecord {
    id: string
    name: string
    description: string
    directory: string
    state: RunState
    iterations: number
    createdAt: string
    updatedAt: string
}

export interface ToolCallSnapshot {
    id: string
    name: string
    status: EntityStatus
    detail?: string
    timestamp: string
    agentId: string
}

export interface AgentSnapshot {
    id: string
    name: string
    kind: AgentKind
    status: EntityStatus
    progress: number
    detail?: string
    toolCalls: ToolCallSnapshot[]
}

export interface IterationSnapshot {
    id: string
    number: number
    status: EntityStatus
    progress: number
    detail?: string
    agents: AgentSnapshot[]
}

export interface ProjectStatus {
    projectId: string
    state: RunState
    overallStatus: EntityStatus
    overallProgress: number
    detail?: string
    iterations: IterationSnapshot[]
}

export type AcceptancePredicate = (feedback: FeedbackSet) => boolean

export interface RefineryConfig {
    openaiApiKey?: string
    anthropicApiKey?: string
    rootDirectory: string
    persistencePath?: string
    maxIterations: number
    maxRetries?: number
    toolTimeoutMs?: number
    defaultProvider?: LLMProviderType
    defaultModel?: string
    renderer?: RendererType
    verbose?: boolean
    continueOnIterationFailure?: boolean
    acceptance?: AcceptancePredicate
    agents?: AgentKind[]
    generation?: GenerationService
    providers?: Partial<Record<LLMProviderType, LLMProvider>>
    workspace?: Workspace
    /** Shell command run in the project directory after test generation. */
    testCommand?: string
    testTimeoutMs?: number
    commandRunner?: CommandRunner
}

export interface RunResult {
    projectId: string
    directory: string
    state: RunState
    iterationsRun: number
    artifacts: Artifact[]
    feedback: FeedbackSet
    status: ProjectStatus
    duration: number
}
