import { randomUUID } from "node:crypto"
import { mkdir, readFile, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import type { z } from "zod"

import { RefineryError } from "../core/errors.js"
import { log } from "../core/Logger.js"

/** JSON documents keyed by slash-separated paths under one directory. */
export class FileStore {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public async write(key: string, data: unknown): Promise<void> {
        const filePath = this.keyToPath(key)
        const tempPath = `${filePath}.tmp.${randomUUID()}`
        const content = JSON.stringify(data, null, 2)

        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence(
                "Failed to write %s: %s",
                key,
                error instanceof Error ? error.message : String(error)
            )
            throw error
        }
    }

    /** Reads and validates a document; a missing key is null. */
    public async read<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
        const filePath = this.keyToPath(key)
        let content: string
        try {
            content = await readFile(filePath, "utf-8")
        } catch (error) {
            if (isNotFound(error)) return null
            log.persistence(
                "Failed to read %s: %s",
                key,
                error instanceof Error ? error.message : String(error)
            )
            throw error
        }

        let raw: unknown
        try {
            raw = JSON.parse(content)
        } catch (error) {
            throw new RefineryError(
                `Stored document ${key} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
                "STORE_CORRUPT",
                error instanceof Error ? error : undefined
            )
        }
        const parsed = schema.safeParse(raw)
        if (!parsed.success) {
            throw new RefineryError(
                `Stored document ${key} is malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`,
                "STORE_CORRUPT"
            )
        }
        return parsed.data
    }

    public async exists(key: string): Promise<boolean> {
        try {
            await readFile(this.keyToPath(key))
            return true
        } catch {
            return false
        }
    }

    public pathFor(key: string, extension = ".json"): string {
        return join(this.basePath, `${key}${extension}`)
    }

    private keyToPath(key: string): string {
        return this.pathFor(key)
    }
}

function isNotFound(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "ENOENT"
    )
}
