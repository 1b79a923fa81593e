import type {
    AgentUpdateEvent,
    IterationUpdateEvent,
    RefineryEvent,
    ToolCallEvent,
} from "../events/types.js"
import type {
    AgentSnapshot,
    EntityStatus,
    IterationSnapshot,
    ProjectStatus,
    RunState,
    ToolCallSnapshot,
} from "../types.js"

export function overallStatusFor(state: RunState): EntityStatus {
    switch (state) {
        case "idle":
            return "pending"
        case "running":
            return "in_progress"
        case "completed":
        case "exhausted":
            return "completed"
        case "failed":
            return "failed"
    }
}

export function initialProjectStatus(projectId: string): ProjectStatus {
    return {
        projectId,
        state: "idle",
        overallStatus: "pending",
        overallProgress: 0,
        iterations: [],
    }
}

/**
 * Folds one event into the status tree. Never mutates its input; a later
 * event for an id replaces the earlier snapshot of that entity. Events whose
 * parent is unknown are dropped.
 */
export function applyEvent(
    status: ProjectStatus,
    event: RefineryEvent
): ProjectStatus {
    switch (event.type) {
        case "project_update":
            return {
                ...status,
                state: event.state,
                overallStatus: event.status,
                overallProgress: event.progress,
                detail: event.detail,
            }
        case "iteration_update":
            return { ...status, iterations: upsertIteration(status, event) }
        case "agent_update":
            return {
                ...status,
                iterations: status.iterations.map((iteration) =>
                    iteration.id === event.iterationId
                        ? { ...iteration, agents: upsertAgent(iteration, event) }
                        : iteration
                ),
            }
        case "tool_call":
            return {
                ...status,
                iterations: status.iterations.map((iteration) =>
                    iteration.id === event.iterationId
                        ? {
                              ...iteration,
                              agents: iteration.agents.map((agent) =>
                                  agent.id === event.agentId
                                      ? {
                                            ...agent,
                                            toolCalls: upsertToolCall(
                                                agent,
                                                event
                                            ),
                                        }
                                      : agent
                              ),
                          }
                        : iteration
                ),
            }
    }
}

export function replayEvents(
    events: Iterable<RefineryEvent>,
    projectId = ""
): ProjectStatus {
    let status: ProjectStatus | null = null
    for (const event of events) {
        status = applyEvent(status ?? initialProjectStatus(event.projectId), event)
    }
    return status ?? initialProjectStatus(projectId)
}

function upsertIteration(
    status: ProjectStatus,
    event: IterationUpdateEvent
): IterationSnapshot[] {
    const existing = status.iterations.find((i) => i.id === event.iterationId)
    if (!existing) {
        return [
            ...status.iterations,
            {
                id: event.iterationId,
                number: event.iterationNumber,
                status: event.status,
                progress: event.progress,
                detail: event.detail,
                agents: [],
            },
        ].sort((a, b) => a.number - b.number)
    }
    return status.iterations.map((iteration) =>
        iteration.id === event.iterationId
            ? {
                  ...iteration,
                  status: event.status,
                  progress: event.progress,
                  detail: event.detail,
              }
            : iteration
    )
}

function upsertAgent(
    iteration: IterationSnapshot,
    event: AgentUpdateEvent
): AgentSnapshot[] {
    const existing = iteration.agents.find((a) => a.id === event.agentId)
    if (!existing) {
        return [
            ...iteration.agents,
            {
                id: event.agentId,
                name: event.agentName,
                kind: event.agentKind,
                status: event.status,
                progress: event.progress,
                detail: event.detail,
                toolCalls: [],
            },
        ]
    }
    return iteration.agents.map((agent) =>
        agent.id === event.agentId
            ? {
                  ...agent,
                  status: event.status,
                  progress: event.progress,
                  detail: event.detail,
              }
            : agent
    )
}

function upsertToolCall(
    agent: AgentSnapshot,
    event: ToolCallEvent
): ToolCallSnapshot[] {
    const existing = agent.toolCalls.find((t) => t.id === event.toolId)
    if (!existing) {
        return [
            ...agent.toolCalls,
            {
                id: event.toolId,
                name: event.toolName,
                status: event.status,
                detail: event.detail,
                timestamp: event.timestamp,
                agentId: event.agentId,
            },
        ]
    }
    // The creation timestamp stays with the first snapshot.
    return agent.toolCalls.map((toolCall) =>
        toolCall.id === event.toolId
            ? { ...toolCall, status: event.status, detail: event.detail }
            : toolCall
    )
}

/** Live projection that a run keeps current by subscribing to its bus. */
export class StatusProjector {
    private status: ProjectStatus

    constructor(projectId: string) {
        this.status = initialProjectStatus(projectId)
    }

    public apply(event: RefineryEvent): void {
        this.status = applyEvent(this.status, event)
    }

    public snapshot(): ProjectStatus {
        return this.status
    }
}
