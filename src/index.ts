import { join } from "node:path"

import { createDefaultAgents } from "./agents/roles.js"
import { DEFAULT_AGENT_SEQUENCE } from "./core/Config.js"
import { ConfigError } from "./core/errors.js"
import { log } from "./core/Logger.js"
import type { RefineryEvent } from "./events/types.js"
import { createLLMProvider, LLMGenerationService } from "./llm/index.js"
import { Orchestrator } from "./orchestrator/Orchestrator.js"
import { ProjectManager } from "./orchestrator/ProjectManager.js"
import { EventLogWriter } from "./persistence/EventLog.js"
import { FileStore } from "./persistence/FileStore.js"
import { createRenderer } from "./renderer/index.js"
import type {
    GenerationService,
    LLMProvider,
    LLMProviderType,
    ProjectHandle,
    ProjectRequest,
    RefineryConfig,
    RunResult,
} from "./types.js"
import { execaCommandRunner } from "./workspace/CommandRunner.js"
import { FileWorkspace } from "./workspace/FileWorkspace.js"

export const PERSISTENCE_DIR = ".refinery"

export interface RunOptions {
    /** Where the terminal renderer leaves its final frame. */
    runLogPath?: string
}

type Handler = (event: RefineryEvent) => void

export class Refinery {
    private readonly config: RefineryConfig
    private readonly projects: ProjectManager
    private readonly handlers: Set<Handler> = new Set()
    private current: Orchestrator | null = null
    private running = false

    constructor(config: RefineryConfig) {
        this.config = config
        const store = new FileStore(
            config.persistencePath ?? join(config.rootDirectory, PERSISTENCE_DIR)
        )
        this.projects = new ProjectManager(store, config.rootDirectory)
    }

    public start(request: ProjectRequest): Promise<ProjectHandle> {
        return this.projects.start(request)
    }

    /** Subscribes to the events of every run started afterwards. */
    public on(handler: Handler): void {
        this.handlers.add(handler)
        this.current?.on(handler)
    }

    public off(handler: Handler): void {
        this.handlers.delete(handler)
        this.current?.off(handler)
    }

    public cancel(reason?: string): void {
        this.current?.cancel(reason)
    }

    public async run(
        request: ProjectRequest,
        options: RunOptions = {}
    ): Promise<RunResult> {
        // Set before the first await so a second call is refused.
        if (this.running) {
            throw new ConfigError("A run is already in progress")
        }
        this.running = true
        try {
            return await this.execute(request, options)
        } finally {
            this.current = null
            this.running = false
        }
    }

    private async execute(
        request: ProjectRequest,
        options: RunOptions
    ): Promise<RunResult> {
        const startTime = Date.now()
        const generation = this.createGenerationService()
        const project = await this.projects.create(request)

        const orchestrator = new Orchestrator({
            project,
            agents: createDefaultAgents(
                this.config.agents ?? DEFAULT_AGENT_SEQUENCE,
                {
                    generation,
                    workspace: this.config.workspace ?? new FileWorkspace(),
                    tests: this.config.testCommand
                        ? {
                              command: this.config.testCommand,
                              runner: this.config.commandRunner ?? execaCommandRunner,
                              timeoutMs: this.config.testTimeoutMs,
                          }
                        : undefined,
                }
            ),
            maxIterations: this.config.maxIterations,
            acceptance: this.config.acceptance,
            maxRetries: this.config.maxRetries,
            toolTimeoutMs: this.config.toolTimeoutMs,
            continueOnIterationFailure: this.config.continueOnIterationFailure,
        })
        this.current = orchestrator
        for (const handler of this.handlers) orchestrator.on(handler)

        const eventLog = new EventLogWriter(this.projects.eventLogPath(project.id))
        await eventLog.open()
        const writeEvent = (event: RefineryEvent): void => eventLog.write(event)
        orchestrator.on(writeEvent)

        const renderer = createRenderer(this.config.renderer ?? "terminal", {
            verbose: this.config.verbose,
            runLogPath: options.runLogPath,
        })
        renderer?.attach(orchestrator)

        try {
            await this.projects.updateState(project.id, "running")
            const result = await orchestrator.run()
            await this.projects.updateState(
                project.id,
                result.state,
                result.iterationsRun
            )
            log.orchestrator("Project %s finished: %s", project.id, result.state)
            return {
                ...result,
                directory: project.directory,
                duration: Date.now() - startTime,
            }
        } finally {
            renderer?.detach()
            orchestrator.off(writeEvent)
            await eventLog.close()
        }
    }

    private createGenerationService(): GenerationService {
        if (this.config.generation) return this.config.generation

        const providers: Partial<Record<LLMProviderType, LLMProvider>> = {
            ...this.config.providers,
        }
        if (!providers.openai && this.config.openaiApiKey) {
            providers.openai = createLLMProvider("openai", this.config.openaiApiKey)
        }
        if (!providers.anthropic && this.config.anthropicApiKey) {
            providers.anthropic = createLLMProvider(
                "anthropic",
                this.config.anthropicApiKey
            )
        }
        if (!providers.openai && !providers.anthropic) {
            throw new ConfigError(
                "No generation provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY"
            )
        }
        return new LLMGenerationService({
            providers,
            defaultProvider:
                this.config.defaultProvider ??
                (providers.openai ? undefined : "anthropic"),
            defaultModel: this.config.defaultModel,
        })
    }
}

export { EventBus } from "./events/EventBus.js"
export { decodeEventLine, encodeEvent, EventStreamDecoder } from "./events/codec.js"
export { Orchestrator } from "./orchestrator/Orchestrator.js"
export { ProjectManager } from "./orchestrator/ProjectManager.js"
export { readEventLog } from "./persistence/EventLog.js"
export { replayEvents, StatusProjector } from "./status/projection.js"
export { validateEventStream } from "./status/invariants.js"
export {
    AgentFailure,
    CancelledError,
    ConfigError,
    GenerationError,
    InvalidTransitionError,
    IterationFailure,
    RefineryError,
    ToolCallFailure,
} from "./core/errors.js"

export type { AgentSession, AgentSpec } from "./agents/AgentRunner.js"
export type { RefineryEvent } from "./events/types.js"
export type {
    AcceptancePredicate,
    AgentKind,
    Artifact,
    CommandResult,
    CommandRunner,
    FeedbackSet,
    GeneratedArtifact,
    GenerationInput,
    GenerationService,
    Issue,
    ProjectHandle,
    ProjectRequest,
    ProjectStatus,
    RefineryConfig,
    RunResult,
    Workspace,
} from "./types.js"
