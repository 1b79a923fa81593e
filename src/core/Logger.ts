import createDebug from "debug"

const APP_PREFIX = "refinery"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "agent", "llm")
 * @returns A debug logger function
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Pre-defined loggers for the refinery subsystems.
 *
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.agent("Tool %s failed: %s", toolName, message)
 * ```
 *
 * Enable via env: `DEBUG=refinery:*`
 * Enable specific: `DEBUG=refinery:orchestrator,refinery:agent`
 */
export const log = {
    orchestrator: createLogger("orchestrator"),
    iteration: createLogger("iteration"),
    agent: createLogger("agent"),
    llm: createLogger("llm"),
    persistence: createLogger("persistence"),
    cli: createLogger("cli"),
}
