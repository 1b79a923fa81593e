import { mkdir, writeFile } from "node:fs/promises"
import { dirname, isAbsolute, relative, resolve, sep } from "node:path"

import { errorMessage, WorkspaceError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { GeneratedFile, Workspace } from "../types.js"

const RESTRICTED_DIRS = ["node_modules", ".git", ".refinery"]

/** Resolves a generated path inside the project directory, or refuses it. */
export function resolveProjectPath(directory: string, path: string): string {
    const basePath = resolve(directory)
    const filePath = resolve(basePath, path)
    const rel = relative(basePath, filePath)
    if (
        !rel ||
        rel === ".." ||
        rel.startsWith(`..${sep}`) ||
        isAbsolute(rel)
    ) {
        throw new WorkspaceError(
            `Path ${path} is outside the project directory`,
            false
        )
    }
    const top = rel.split(/[\\/]/)[0]
    if (RESTRICTED_DIRS.includes(top)) {
        throw new WorkspaceError(`Path ${path} is in a restricted directory`, false)
    }
    return filePath
}

/** Writes generated files straight into the project directory. */
export class FileWorkspace implements Workspace {
    public async writeFile(
        directory: string,
        file: GeneratedFile
    ): Promise<void> {
        const filePath = resolveProjectPath(directory, file.path)
        try {
            await mkdir(dirname(filePath), { recursive: true })
            await writeFile(filePath, file.content, "utf-8")
            log.persistence("Wrote %s (%d bytes)", file.path, file.content.length)
        } catch (error) {
            throw new WorkspaceError(
                `Failed to write ${file.path}: ${errorMessage(error)}`,
                true,
                error instanceof Error ? error : undefined
            )
        }
    }
}
