import { z } from "zod"

import { GenerationError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { AgentKind, GeneratedArtifact } from "../types.js"

const issueSchema = z.object({
    category: z.enum(["review", "security", "performance"]).catch("review"),
    severity: z.enum(["low", "medium", "high", "critical"]).catch("medium"),
    description: z.string(),
    target: z.string().default(""),
    recommendation: z.string().default(""),
})

const fileSchema = z.object({
    path: z.string().min(1),
    content: z.string(),
})

export const generationOutputSchema = z.object({
    summary: z.string().default(""),
    files: z.array(fileSchema).default([]),
    issues: z.array(issueSchema).default([]),
})

export function stripCodeFence(raw: string): string {
    return raw
        .trim()
        .replace(/^```(?:json)?\s*/i, "")
        .replace(/\s*```$/i, "")
}

/**
 * Parses a model response into an artifact. Generators that answer in prose
 * are kept as a summary-only artifact; a reviewer must answer in JSON, since
 * its issues drive the next iteration.
 */
export function parseGenerationOutput(
    kind: AgentKind,
    raw: string
): GeneratedArtifact {
    let json: unknown
    try {
        json = JSON.parse(stripCodeFence(raw))
    } catch {
        if (kind === "review") {
            throw new GenerationError("Review output is not valid JSON", true)
        }
        log.llm("%s output is not JSON; keeping it as text", kind)
        return { content: raw.trim(), files: [], issues: [] }
    }

    const parsed = generationOutputSchema.safeParse(json)
    if (!parsed.success) {
        const problem = parsed.error.issues[0]
        throw new GenerationError(
            `Malformed ${kind} output at ${problem?.path.join(".") || "(root)"}: ${problem?.message ?? "unknown"}`,
            true
        )
    }

    return {
        content: parsed.data.summary,
        files: parsed.data.files,
        issues: parsed.data.issues,
    }
}
