import { GenerationError } from "../core/errors.js"

/** Rate limits, server errors and dropped connections are worth another try. */
export function isRetryableMessage(message: string): boolean {
    const msg = message.toLowerCase()
    if (msg.includes("429") || msg.includes("rate limit")) return true
    if (msg.includes("500") || msg.includes("502") || msg.includes("503"))
        return true
    if (msg.includes("timeout") || msg.includes("econnreset")) return true
    return false
}

export function toGenerationError(
    providerName: string,
    error: unknown
): GenerationError {
    if (error instanceof GenerationError) return error
    const message = error instanceof Error ? error.message : String(error)
    return new GenerationError(
        `${providerName} API error: ${message}`,
        isRetryableMessage(message),
        error instanceof Error ? error : undefined
    )
}
