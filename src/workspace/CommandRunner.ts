import { execa } from "execa"

import { log } from "../core/Logger.js"
import type { CommandResult, CommandRunner, Issue } from "../types.js"

export const DEFAULT_TEST_TIMEOUT_MS = 300_000

const OUTPUT_TAIL_CHARS = 2000

export const execaCommandRunner: CommandRunner = async (command, options) => {
    log.agent("Running %s in %s", command, options.cwd)
    const result = await execa(command, {
        shell: true,
        cwd: options.cwd,
        timeout: options.timeoutMs ?? DEFAULT_TEST_TIMEOUT_MS,
        reject: false,
        cancelSignal: options.signal,
        stdin: "ignore",
    })
    return {
        exitCode: result.exitCode ?? -1,
        stdout: typeof result.stdout === "string" ? result.stdout : "",
        stderr: typeof result.stderr === "string" ? result.stderr : "",
        timedOut: result.timedOut,
    }
}

function tail(text: string): string {
    const trimmed = text.trim()
    return trimmed.length > OUTPUT_TAIL_CHARS
        ? `…${trimmed.slice(-OUTPUT_TAIL_CHARS)}`
        : trimmed
}

/** A failed test run becomes one blocking review issue for the next iteration. */
export function testRunIssues(command: string, result: CommandResult): Issue[] {
    if (result.exitCode === 0 && !result.timedOut) return []

    const outcome = result.timedOut
        ? "timed out"
        : `exited with code ${result.exitCode}`
    const output = [
        result.stdout.trim() ? `stdout:\n${tail(result.stdout)}` : "",
        result.stderr.trim() ? `stderr:\n${tail(result.stderr)}` : "",
    ]
        .filter(Boolean)
        .join("\n")

    return [
        {
            category: "review",
            severity: "high",
            description: `Test run \`${command}\` ${outcome}${output ? `\n${output}` : ""}`,
            target: "tests",
            recommendation:
                "Fix the implementation or the tests so the test command passes",
        },
    ]
}

export function describeTestRun(result: CommandResult): string {
    if (result.timedOut) return "Tests timed out"
    return result.exitCode === 0
        ? "Tests passed"
        : `Tests failed (exit code ${result.exitCode})`
}
