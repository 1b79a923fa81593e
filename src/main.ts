#!/usr/bin/env node

import { readFile } from "node:fs/promises"
import { join, resolve } from "node:path"

import chalk from "chalk"
import { Command, InvalidArgumentError, Option } from "commander"

import { loadRcConfig, validateMaxIterations } from "./core/Config.js"
import { ConfigError, errorMessage } from "./core/errors.js"
import { log } from "./core/Logger.js"
import { Refinery } from "./index.js"
import { readEventLog } from "./persistence/EventLog.js"
import { formatStatusTree } from "./renderer/index.js"
import { validateEventStream } from "./status/invariants.js"
import { replayEvents } from "./status/projection.js"
import type { LLMProviderType, RefineryConfig, RendererType } from "./types.js"

async function loadEnvFile(cwd: string): Promise<void> {
    let content: string
    try {
        content = await readFile(join(cwd, ".env"), "utf-8")
    } catch {
        log.cli("No .env in %s", cwd)
        return
    }
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex)
        const value = trimmed.slice(eqIndex + 1)
        process.env[key] ??= value
    }
}

function parseInteger(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError("Not an integer.")
    }
    return parsed
}

interface RunCommandOptions {
    name?: string
    maxIterations?: number
    provider?: LLMProviderType
    model?: string
    renderer?: RendererType
    maxRetries?: number
    toolTimeout?: number
    continueOnFailure?: boolean
    runLog?: string
    testCommand?: string
    testTimeout?: number
    cwd?: string
    verbose?: boolean
}

const program = new Command()

program
    .name("refinery")
    .description("Iterative multi-agent code generation")
    .version("1.0.0")

program
    .command("run")
    .description("Generate a project from a description, refining until accepted")
    .argument("<description>", "What the project should do")
    .option("--name <name>", "Project name", "project")
    .option("--max-iterations <n>", "Refinement budget", parseInteger)
    .addOption(
        new Option("--provider <provider>", "Default LLM provider").choices([
            "openai",
            "anthropic",
        ])
    )
    .option("--model <model>", "Default model name")
    .addOption(
        new Option("--renderer <type>", "Output renderer").choices([
            "terminal",
            "log",
            "none",
        ])
    )
    .option("--max-retries <n>", "Retries per tool call", parseInteger)
    .option("--tool-timeout <ms>", "Deadline per tool call attempt", parseInteger)
    .option("--continue-on-failure", "Keep iterating after an agent failure")
    .option("--run-log <path>", "Write the final status tree to a file")
    .option("--test-command <command>", "Run the generated tests with this command")
    .option("--test-timeout <ms>", "Deadline for one test run", parseInteger)
    .option("--cwd <path>", "Working directory (defaults to current directory)")
    .option("--verbose", "Show tool calls and details per agent")
    .action(async (description: string, options: RunCommandOptions) => {
        const rootDirectory = options.cwd ? resolve(options.cwd) : process.cwd()

        await loadEnvFile(rootDirectory)
        const rc = await loadRcConfig(rootDirectory)

        const config: RefineryConfig = {
            openaiApiKey: process.env.OPENAI_API_KEY ?? rc.openaiApiKey,
            anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? rc.anthropicApiKey,
            rootDirectory,
            persistencePath: rc.persistencePath,
            maxIterations: validateMaxIterations(
                options.maxIterations ?? rc.maxIterations ?? 3
            ),
            maxRetries: options.maxRetries ?? rc.maxRetries,
            toolTimeoutMs: options.toolTimeout ?? rc.toolTimeoutMs,
            defaultProvider: options.provider ?? rc.defaultProvider,
            defaultModel: options.model ?? rc.defaultModel,
            renderer: options.renderer ?? rc.renderer ?? "terminal",
            verbose: options.verbose ?? rc.verbose ?? false,
            continueOnIterationFailure:
                options.continueOnFailure ?? rc.continueOnIterationFailure,
            agents: rc.agents,
            testCommand: options.testCommand ?? rc.testCommand,
            testTimeoutMs: options.testTimeout ?? rc.testTimeoutMs,
        }

        if (!config.openaiApiKey && !config.anthropicApiKey) {
            throw new ConfigError(
                "No API keys found. Set OPENAI_API_KEY or ANTHROPIC_API_KEY, add them to .env, or configure .refineryrc.json"
            )
        }

        const refinery = new Refinery(config)
        process.on("SIGINT", () => {
            refinery.cancel("interrupted")
        })

        const result = await refinery.run(
            { project_name: options.name ?? "project", description },
            { runLogPath: options.runLog }
        )

        if (config.renderer === "none") {
            console.log(JSON.stringify(result, null, 2))
        } else {
            console.log(`\nProject:  ${result.projectId}`)
            console.log(`Output:   ${result.directory}`)
            console.log(`State:    ${result.state}`)
            console.log(`Duration: ${(result.duration / 1000).toFixed(1)}s`)
            if (result.status.detail) {
                console.log(`Detail:   ${result.status.detail}`)
            }
        }
        process.exitCode = result.state === "completed" ? 0 : 1
    })

program
    .command("replay")
    .description("Rebuild and check a run's status tree from its event log")
    .argument("<file>", "JSON-lines event log")
    .option("--verbose", "Show tool calls per agent")
    .action(async (file: string, options: { verbose?: boolean }) => {
        const events = await readEventLog(resolve(file))
        const status = replayEvents(events, events[0]?.projectId)
        console.log(formatStatusTree(status, { verbose: options.verbose }))

        const violations = validateEventStream(events)
        if (violations.length > 0) {
            console.error(chalk.red(`\n${violations.length} violation(s):`))
            for (const violation of violations) {
                console.error(chalk.red(`  - ${violation}`))
            }
            process.exitCode = 1
            return
        }
        console.log(chalk.green(`\n${events.length} event(s), no violations`))
    })

program.parseAsync().catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error))
    process.exit(1)
})
