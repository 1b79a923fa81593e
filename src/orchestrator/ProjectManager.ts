import { mkdir } from "node:fs/promises"
import { join } from "node:path"

import { z } from "zod"

import { ConfigError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { FileStore } from "../persistence/FileStore.js"
import type {
    ProjectHandle,
    ProjectRecord,
    ProjectRequest,
    RunState,
} from "../types.js"

export const PROJECTS_DIR = "generated_projects"

const projectRecordSchema = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    directory: z.string(),
    state: z.enum(["idle", "running", "completed", "failed", "exhausted"]),
    iterations: z.number().int().nonnegative(),
    createdAt: z.string(),
    updatedAt: z.string(),
})

function pad(value: number): string {
    return String(value).padStart(2, "0")
}

/** `project_YYYYMMDD_HHMMSS`, in local time. */
export function formatProjectId(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    return `project_${day}_${time}`
}

export class ProjectManager {
    private readonly store: FileStore
    private readonly rootDirectory: string
    private readonly projects: Map<string, ProjectRecord> = new Map()
    /** Ids handed out or seen on disk, claimed before any await. */
    private readonly claimed: Set<string> = new Set()
    private readonly now: () => Date

    constructor(store: FileStore, rootDirectory: string, now?: () => Date) {
        this.store = store
        this.rootDirectory = rootDirectory
        this.now = now ?? ((): Date => new Date())
    }

    /** Project initiation: allocates an id and creates its directory. */
    public async start(request: ProjectRequest): Promise<ProjectHandle> {
        const record = await this.create(request)
        return { project_id: record.id, directory: record.directory }
    }

    public async create(request: ProjectRequest): Promise<ProjectRecord> {
        const name = request.project_name.trim()
        const description = request.description.trim()
        if (!name) throw new ConfigError("project_name must not be empty")
        if (!description) throw new ConfigError("description must not be empty")

        const id = await this.allocateId()
        const directory = join(this.rootDirectory, PROJECTS_DIR, id)
        try {
            await mkdir(directory, { recursive: true })
        } catch (error) {
            this.claimed.delete(id)
            throw error
        }

        const timestamp = this.now().toISOString()
        const record: ProjectRecord = {
            id,
            name,
            description,
            directory,
            state: "idle",
            iterations: 0,
            createdAt: timestamp,
            updatedAt: timestamp,
        }
        this.projects.set(id, record)
        await this.persist(record)
        log.persistence("Created project %s at %s", id, directory)
        return record
    }

    public get(id: string): ProjectRecord | undefined {
        return this.projects.get(id)
    }

    public async updateState(
        id: string,
        state: RunState,
        iterations?: number
    ): Promise<ProjectRecord | undefined> {
        const record = this.projects.get(id)
        if (!record) return undefined
        record.state = state
        if (iterations !== undefined) record.iterations = iterations
        record.updatedAt = this.now().toISOString()
        await this.persist(record)
        return record
    }

    public async load(id: string): Promise<ProjectRecord | null> {
        const existing = this.projects.get(id)
        if (existing) return existing
        const loaded = await this.store.read(`projects/${id}`, projectRecordSchema)
        if (loaded) {
            this.projects.set(id, loaded)
            this.claimed.add(id)
        }
        return loaded
    }

    public eventLogPath(id: string): string {
        return this.store.pathFor(`events/${id}`, ".jsonl")
    }

    private async allocateId(): Promise<string> {
        const base = formatProjectId(this.now())
        let id = base
        let suffix = 1
        while (!(await this.claim(id))) {
            suffix++
            id = `${base}_${suffix}`
        }
        return id
    }

    /** Reserves the id before the first await, then checks the store. */
    private async claim(id: string): Promise<boolean> {
        if (this.claimed.has(id)) return false
        this.claimed.add(id)
        return !(await this.store.exists(`projects/${id}`))
    }

    private async persist(record: ProjectRecord): Promise<void> {
        await this.store.write(`projects/${record.id}`, record)
    }
}
