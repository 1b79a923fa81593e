import type { RefineryEvent } from "../events/types.js"
import type { EntityStatus, ProjectStatus } from "../types.js"
import { applyEvent, initialProjectStatus } from "./projection.js"

const STATUS_RANK: Record<EntityStatus, number> = {
    pending: 0,
    in_progress: 1,
    completed: 2,
    failed: 2,
}

export function isTerminal(status: EntityStatus): boolean {
    return status === "completed" || status === "failed"
}

export function canTransition(from: EntityStatus, to: EntityStatus): boolean {
    return !isTerminal(from) && STATUS_RANK[to] >= STATUS_RANK[from]
}

function duplicates(ids: string[]): string[] {
    const seen = new Set<string>()
    const dup = new Set<string>()
    for (const id of ids) {
        if (seen.has(id)) dup.add(id)
        seen.add(id)
    }
    return [...dup]
}

/** Structural checks on a single status tree. Returns human-readable violations. */
export function checkStatusInvariants(status: ProjectStatus): string[] {
    const violations: string[] = []

    for (const id of duplicates(status.iterations.map((i) => i.id))) {
        violations.push(`duplicate iteration id ${id}`)
    }
    status.iterations.forEach((iteration, index) => {
        if (iteration.number !== index + 1) {
            violations.push(
                `iteration ${iteration.id} has number ${iteration.number}, expected ${index + 1}`
            )
        }
    })

    for (const iteration of status.iterations) {
        for (const id of duplicates(iteration.agents.map((a) => a.id))) {
            violations.push(`duplicate agent id ${id} in iteration ${iteration.number}`)
        }
        const openAgents = iteration.agents.filter((a) => !isTerminal(a.status))
        if (isTerminal(iteration.status) && openAgents.length > 0) {
            violations.push(
                `iteration ${iteration.number} is ${iteration.status} with open agents ${openAgents.map((a) => a.name).join(", ")}`
            )
        }
        if (
            iteration.status === "completed" &&
            iteration.agents.some((a) => a.status !== "completed")
        ) {
            violations.push(
                `iteration ${iteration.number} is completed but not every agent completed`
            )
        }

        for (const agent of iteration.agents) {
            for (const id of duplicates(agent.toolCalls.map((t) => t.id))) {
                violations.push(`duplicate tool call id ${id} in agent ${agent.id}`)
            }
            const openCalls = agent.toolCalls.filter((t) => !isTerminal(t.status))
            if (isTerminal(agent.status) && openCalls.length > 0) {
                violations.push(
                    `agent ${agent.name} is ${agent.status} with open tool calls`
                )
            }
            if (
                agent.progress === 100 &&
                agent.toolCalls.some((t) => t.status !== "completed")
            ) {
                violations.push(
                    `agent ${agent.name} reports 100% with unfinished tool calls`
                )
            }
        }
    }

    const openIterations = status.iterations.filter((i) => !isTerminal(i.status))
    if (isTerminal(status.overallStatus) && openIterations.length > 0) {
        violations.push(
            `project is ${status.state} with open iterations ${openIterations.map((i) => i.number).join(", ")}`
        )
    }

    return violations
}

interface Tracked {
    status: EntityStatus
    progress: number
}

/**
 * Replays a stream and checks ordering on top of the per-tree invariants:
 * contiguous sequence numbers, parents announced before children, monotonic
 * status and progress per entity.
 */
export function validateEventStream(
    events: readonly RefineryEvent[]
): string[] {
    const violations: string[] = []
    const entities = new Map<string, Tracked>()
    let status = initialProjectStatus(events[0]?.projectId ?? "")
    let expectedSeq = events[0]?.seq ?? 1

    const track = (
        key: string,
        next: EntityStatus,
        progress: number,
        seq: number
    ): void => {
        const previous = entities.get(key)
        if (previous) {
            if (!canTransition(previous.status, next)) {
                violations.push(
                    `#${seq} ${key}: ${previous.status} -> ${next} is not allowed`
                )
            }
            if (progress < previous.progress) {
                violations.push(
                    `#${seq} ${key}: progress went from ${previous.progress} to ${progress}`
                )
            }
        }
        entities.set(key, { status: next, progress })
    }

    for (const event of events) {
        if (event.seq !== expectedSeq) {
            violations.push(`expected seq ${expectedSeq}, got ${event.seq}`)
        }
        expectedSeq = event.seq + 1

        switch (event.type) {
            case "project_update":
                track("project", event.status, event.progress, event.seq)
                break
            case "iteration_update":
                track(
                    `iteration:${event.iterationId}`,
                    event.status,
                    event.progress,
                    event.seq
                )
                break
            case "agent_update":
                if (!entities.has(`iteration:${event.iterationId}`)) {
                    violations.push(
                        `#${event.seq} agent ${event.agentId} before its iteration started`
                    )
                }
                track(
                    `agent:${event.agentId}`,
                    event.status,
                    event.progress,
                    event.seq
                )
                break
            case "tool_call": {
                if (!entities.has(`agent:${event.agentId}`)) {
                    violations.push(
                        `#${event.seq} tool call ${event.toolId} before its agent started`
                    )
                }
                const progress = event.status === "completed" ? 100 : 0
                track(`tool:${event.toolId}`, event.status, progress, event.seq)
                break
            }
        }

        status = applyEvent(status, event)
        for (const violation of checkStatusInvariants(status)) {
            violations.push(`#${event.seq} ${violation}`)
        }
    }

    return violations
}
