import type { AgentKind, EntityStatus, RunState } from "../types.js"

interface EventEnvelope {
    /** Position in the run's stream, starting at 1. */
    seq: number
    projectId: string
    timestamp: string
}

export interface ProjectUpdateEvent extends EventEnvelope {
    type: "project_update"
    state: RunState
    status: EntityStatus
    progress: number
    detail?: string
}

export interface IterationUpdateEvent extends EventEnvelope {
    type: "iteration_update"
    iterationId: string
    iterationNumber: number
    status: EntityStatus
    progress: number
    detail?: string
}

export interface AgentUpdateEvent extends EventEnvelope {
    type: "agent_update"
    iterationId: string
    agentId: string
    agentName: string
    agentKind: AgentKind
    status: EntityStatus
    progress: number
    detail?: string
}

export interface ToolCallEvent extends EventEnvelope {
    type: "tool_call"
    iterationId: string
    agentId: string
    toolId: string
    toolName: string
    status: EntityStatus
    detail?: string
}

export type RefineryEvent =
    | ProjectUpdateEvent
    | IterationUpdateEvent
    | AgentUpdateEvent
    | ToolCallEvent

export type RefineryEventType = RefineryEvent["type"]

type WithoutEnvelope<E> = E extends RefineryEvent
    ? Omit<E, keyof EventEnvelope>
    : never

/** An event as produced by a component, before the bus stamps it. */
export type EventDraft = WithoutEnvelope<RefineryEvent>

export type Publish = (draft: EventDraft) => RefineryEvent
