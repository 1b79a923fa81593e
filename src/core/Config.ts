import { readFile } from "node:fs/promises"
import { join } from "node:path"

import { z } from "zod"

import type {
    AgentKind,
    LLMProviderType,
    ModelConfig,
    RefineryConfig,
} from "../types.js"
import { ConfigError, errorMessage } from "./errors.js"

export const RC_FILENAME = ".refineryrc.json"

export const DEFAULT_AGENT_SEQUENCE: readonly AgentKind[] = [
    "schema",
    "implementation",
    "test_generation",
    "review",
]

export const DEFAULT_MAX_RETRIES = 2

const DEFAULT_MODELS: Record<AgentKind, ModelConfig> = {
    schema: {
        provider: "openai",
        model: "gpt-4o-mini",
        temperature: 0.2,
        maxTokens: 4096,
    },
    implementation: {
        provider: "openai",
        model: "gpt-4o-mini",
        temperature: 0.2,
        maxTokens: 16384,
    },
    test_generation: {
        provider: "openai",
        model: "gpt-4o-mini",
        temperature: 0.3,
        maxTokens: 8192,
    },
    review: {
        provider: "openai",
        model: "gpt-4o-mini",
        temperature: 0.1,
        maxTokens: 4096,
    },
}

const PROVIDER_FALLBACK_MODELS: Record<LLMProviderType, string> = {
    openai: "gpt-4o-mini",
    anthropic: "claude-sonnet-4-20250514",
}

export function getDefaultModel(
    kind: AgentKind,
    overrideProvider?: LLMProviderType,
    overrideModel?: string
): ModelConfig {
    const base = DEFAULT_MODELS[kind]
    const provider = overrideProvider ?? base.provider
    const model =
        overrideModel ??
        (provider === base.provider
            ? base.model
            : PROVIDER_FALLBACK_MODELS[provider])
    return { ...base, provider, model }
}

export function validateMaxIterations(value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(
            `maxIterations must be a positive integer, got ${String(value)}`
        )
    }
    return value
}

const agentKindSchema = z.enum([
    "schema",
    "implementation",
    "test_generation",
    "review",
])

export const rcConfigSchema = z
    .object({
        openaiApiKey: z.string(),
        anthropicApiKey: z.string(),
        persistencePath: z.string(),
        maxIterations: z.number().int().positive(),
        maxRetries: z.number().int().nonnegative(),
        toolTimeoutMs: z.number().int().positive(),
        defaultProvider: z.enum(["openai", "anthropic"]),
        defaultModel: z.string(),
        renderer: z.enum(["terminal", "log", "none"]),
        verbose: z.boolean(),
        continueOnIterationFailure: z.boolean(),
        agents: z.array(agentKindSchema).nonempty(),
        testCommand: z.string().min(1),
        testTimeoutMs: z.number().int().positive(),
    })
    .partial()
    .strict()

export type RcConfig = z.infer<typeof rcConfigSchema>

export async function loadRcConfig(
    cwd: string
): Promise<Partial<RefineryConfig>> {
    const rcPath = join(cwd, RC_FILENAME)
    let content: string
    try {
        content = await readFile(rcPath, "utf-8")
    } catch {
        return {}
    }

    let raw: unknown
    try {
        raw = JSON.parse(content)
    } catch (parseError) {
        throw new ConfigError(
            `Invalid JSON in ${rcPath}: ${errorMessage(parseError)}`
        )
    }

    const parsed = rcConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ")
        throw new ConfigError(`Invalid ${RC_FILENAME}: ${problems}`)
    }
    return parsed.data
}
