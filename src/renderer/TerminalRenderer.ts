import { writeFile } from "node:fs/promises"

import chalk from "chalk"
import logUpdate from "log-update"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { RefineryEvent } from "../events/types.js"
import { StatusProjector } from "../status/projection.js"
import type {
    AgentSnapshot,
    EntityStatus,
    IterationSnapshot,
    ProjectStatus,
} from "../types.js"
import type { CreateRendererOptions, EventSource, Renderer } from "./types.js"

const STATUS_GLYPHS: Record<EntityStatus, string> = {
    pending: chalk.dim("·"),
    in_progress: chalk.blue("⟳"),
    completed: chalk.green("✓"),
    failed: chalk.red("✗"),
}

export interface StatusTreeOptions {
    verbose?: boolean
    elapsedMs?: number
}

/** Live tree of iterations, their agents and (verbose) their tool calls. */
export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly runLogPath: string | undefined
    private source: EventSource | null = null
    private handler: ((event: RefineryEvent) => void) | null = null
    private projector: StatusProjector | null = null
    private startedAt = 0
    private tickInterval: ReturnType<typeof setInterval> | null = null
    private lastRenderedOutput = ""

    constructor(options?: CreateRendererOptions) {
        this.verbose = options?.verbose ?? false
        this.runLogPath = options?.runLogPath
    }

    public attach(source: EventSource): void {
        this.source = source
        this.handler = (event: RefineryEvent): void => this.handleEvent(event)
        this.source.on(this.handler)
    }

    public detach(): void {
        if (this.source && this.handler) {
            this.source.off(this.handler)
        }
        this.stopTick()
        logUpdate.done()
        this.source = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: RefineryEvent): void {
        if (!this.projector) {
            this.projector = new StatusProjector(event.projectId)
            this.startedAt = Date.now()
            this.startTick()
        }
        this.projector.apply(event)

        const finished =
            event.type === "project_update" &&
            event.state !== "idle" &&
            event.state !== "running"
        this.render()
        if (finished) {
            this.stopTick()
            this.flushRunLog()
        }
    }

    private render(): void {
        if (!this.projector) return
        const output = formatStatusTree(this.projector.snapshot(), {
            verbose: this.verbose,
            elapsedMs: Date.now() - this.startedAt,
        })
        this.lastRenderedOutput = output
        logUpdate(output)
    }

    private flushRunLog(): void {
        const runLogPath = this.runLogPath
        if (!runLogPath) return
        writeFile(runLogPath, stripAnsi(this.lastRenderedOutput) + "\n", "utf-8").catch(
            (error: unknown) => {
                log.cli("Could not write run log %s: %s", runLogPath, errorMessage(error))
            }
        )
    }
}

export function formatStatusTree(
    status: ProjectStatus,
    options: StatusTreeOptions = {}
): string {
    const lines: string[] = []
    lines.push(
        `${chalk.bold.cyan("refinery")}  ${chalk.dim(status.projectId)}  ${status.state}  ${status.overallProgress}%`
    )
    lines.push(chalk.dim("│"))

    status.iterations.forEach((iteration, i) => {
        const isLast = i === status.iterations.length - 1
        renderIteration(iteration, lines, isLast, options.verbose ?? false)
    })

    const elapsed =
        options.elapsedMs !== undefined ? `  ·  ${formatDuration(options.elapsedMs)}` : ""
    lines.push(chalk.dim("│"))
    lines.push(
        chalk.dim(
            `└─ ${countCompletedAgents(status)}/${countAgents(status)} agents${elapsed}`
        )
    )
    if (status.detail && status.state !== "running") {
        const colour = status.state === "completed" ? chalk.green : chalk.red
        lines.push(colour(`╰─ ${status.detail}`))
    }
    return lines.join("\n")
}

function renderIteration(
    iteration: IterationSnapshot,
    lines: string[],
    isLast: boolean,
    verbose: boolean
): void {
    const childPrefix = isLast ? " " : "│"
    lines.push(
        [
            chalk.dim(`${isLast ? "└" : "├"}─`),
            STATUS_GLYPHS[iteration.status],
            `Iteration ${iteration.number}`,
            chalk.dim(`${iteration.progress}%`),
        ].join("  ")
    )
    iteration.agents.forEach((agent, i) => {
        const isLastAgent = i === iteration.agents.length - 1
        renderAgent(agent, lines, childPrefix, isLastAgent, verbose)
    })
}

function renderAgent(
    agent: AgentSnapshot,
    lines: string[],
    prefix: string,
    isLast: boolean,
    verbose: boolean
): void {
    const detail =
        agent.detail && (verbose || agent.status === "failed")
            ? chalk.dim(truncate(agent.detail, 60))
            : ""
    lines.push(
        [
            chalk.dim(`${prefix}  ${isLast ? "└" : "├"}─`),
            STATUS_GLYPHS[agent.status],
            agent.name,
            chalk.dim(`${agent.progress}%`),
            detail,
        ]
            .filter(Boolean)
            .join("  ")
    )

    if (!verbose) return
    const childPrefix = `${prefix}  ${isLast ? " " : "│"}`
    agent.toolCalls.forEach((toolCall, i) => {
        const connector = i === agent.toolCalls.length - 1 ? "└─" : "├─"
        const toolDetail = toolCall.detail ? `  ${truncate(toolCall.detail, 60)}` : ""
        lines.push(
            chalk.dim(`${childPrefix}  ${connector} `) +
                `${STATUS_GLYPHS[toolCall.status]} ${toolCall.name}` +
                chalk.dim(toolDetail)
        )
    })
}

function countAgents(status: ProjectStatus): number {
    return status.iterations.reduce((sum, it) => sum + it.agents.length, 0)
}

function countCompletedAgents(status: ProjectStatus): number {
    return status.iterations.reduce(
        (sum, it) => sum + it.agents.filter((a) => a.status === "completed").length,
        0
    )
}

function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}

function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

function stripAnsi(text: string): string {
    return text.replace(/\u001b\[[0-9;]*m/g, "")
}
