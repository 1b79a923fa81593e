import type {
    AgentKind,
    Artifact,
    CommandRunner,
    GenerationInput,
    GenerationService,
    Workspace,
} from "../types.js"
import { allIssues } from "../workflow/FeedbackAccumulator.js"
import { describeTestRun, testRunIssues } from "../workspace/CommandRunner.js"
import type { AgentSpec } from "./AgentRunner.js"

export const AGENT_NAMES: Record<AgentKind, string> = {
    schema: "Schema Agent",
    implementation: "Implementation Agent",
    test_generation: "Test Generation Agent",
    review: "Review Agent",
}

export const GENERATION_TOOLS: Record<AgentKind, string> = {
    schema: "generate_schema",
    implementation: "generate_code",
    test_generation: "generate_tests",
    review: "review_code",
}

const OUTPUT_FORMAT = `## Output

Respond with a single JSON object and nothing else:
\`\`\`json
{
  "summary": "One paragraph describing what you produced",
  "files": [{ "path": "relative/path.ts", "content": "full file content" }],
  "issues": []
}
\`\`\`
File paths are relative to the project root. Always send complete file contents, never diffs.`

const SCHEMA_PROMPT = `You are the schema designer in an iterative code-generation pipeline.

Design the data model for the project: entities, fields, relations and the storage schema (SQL migrations or equivalent). Keep it minimal; model only what the description needs.

${OUTPUT_FORMAT}

Put the schema files in "files" and leave "issues" empty.`

const IMPLEMENTATION_PROMPT = `You are the implementation agent in an iterative code-generation pipeline.

Write the application code for the project on top of the schema you are given. When feedback from the previous iteration is present, fix exactly those issues and keep everything else as it was.

## Constraints

- Do not add packages beyond what the project already uses.
- Keep data access out of request handlers; go through a small data layer.
- Every file you send replaces the file at that path.

${OUTPUT_FORMAT}`

const TEST_GENERATION_PROMPT = `You are the test author in an iterative code-generation pipeline.

Write end-to-end and unit tests that exercise the features in the project description against the implementation you are given. Tests must be runnable without network access.

${OUTPUT_FORMAT}

Leave "issues" empty unless the implementation makes a feature untestable; then report it as a review issue.`

const REVIEW_PROMPT = `You are the reviewer in an iterative code-generation pipeline.

Review the generated schema, implementation and tests against the project description. Report only problems that stop the application from working or that a careful reviewer would block on.

## Output

Respond with a single JSON object and nothing else:
\`\`\`json
{
  "summary": "Overall assessment",
  "files": [],
  "issues": [
    {
      "category": "review | security | performance",
      "severity": "low | medium | high | critical",
      "description": "What is wrong",
      "target": "file path or feature affected",
      "recommendation": "How to fix it"
    }
  ]
}
\`\`\`
An empty "issues" array means the project is ready.`

const SYSTEM_PROMPTS: Record<AgentKind, string> = {
    schema: SCHEMA_PROMPT,
    implementation: IMPLEMENTATION_PROMPT,
    test_generation: TEST_GENERATION_PROMPT,
    review: REVIEW_PROMPT,
}

export function getSystemPrompt(kind: AgentKind): string {
    return SYSTEM_PROMPTS[kind]
}

function formatArtifacts(title: string, artifacts: Artifact[]): string {
    if (artifacts.length === 0) return ""
    const sections = artifacts.map((artifact) => {
        const files = artifact.files
            .map((file) => `### ${file.path}\n\`\`\`\n${file.content}\n\`\`\``)
            .join("\n\n")
        return `## ${artifact.agentName}\n${artifact.content}${files ? `\n\n${files}` : ""}`
    })
    return `# ${title}\n\n${sections.join("\n\n")}`
}

/** Builds the user message for one generation call. */
export function buildUserPrompt(input: GenerationInput): string {
    const issues = allIssues(input.feedback)
    const feedback =
        issues.length > 0
            ? `# Feedback from iteration ${input.iterationNumber - 1}\n\n${issues
                  .map(
                      (issue, index) =>
                          `${index + 1}. [${issue.severity}] (${issue.category}) ${issue.target}: ${issue.description}\n   Recommendation: ${issue.recommendation}`
                  )
                  .join("\n")}`
            : ""

    return [
        `# Project: ${input.projectName}`,
        input.description,
        `Iteration ${input.iterationNumber}.`,
        formatArtifacts("Produced so far in this iteration", input.artifacts),
        formatArtifacts("Previous iteration", input.previousArtifacts),
        feedback,
    ]
        .filter(Boolean)
        .join("\n\n")
}

export const RUN_TESTS_TOOL = "run_tests"

export interface TestRunSettings {
    command: string
    runner: CommandRunner
    timeoutMs?: number
}

export interface AgentDependencies {
    generation: GenerationService
    workspace: Workspace
    /** When set, the test agent runs the suite once its files are written. */
    tests?: TestRunSettings
}

/**
 * The standard agent: one generation call, then one write per generated file.
 * The test agent then runs the suite when a test command is configured.
 */
export function createAgentSpec(
    kind: AgentKind,
    deps: AgentDependencies
): AgentSpec {
    const name = AGENT_NAMES[kind]
    return {
        kind,
        name,
        async execute(session, context, feedback) {
            const input: GenerationInput = {
                projectName: context.projectName,
                description: context.description,
                directory: context.directory,
                iterationNumber: context.iterationNumber,
                artifacts: context.artifacts,
                previousArtifacts: context.previousArtifacts,
                feedback,
            }

            const generated = await session.tool(
                GENERATION_TOOLS[kind],
                (signal) => deps.generation.invoke(kind, input, signal),
                {
                    describe: (result) =>
                        `Generated ${result.files.length} file(s), ${result.issues.length} issue(s)`,
                }
            )

            const artifact: Artifact = {
                kind,
                agentName: name,
                content: generated.content,
                files: generated.files,
                createdAt: new Date().toISOString(),
            }
            session.recordArtifact(artifact)

            for (const file of generated.files) {
                await session.tool(
                    "write_file",
                    () => deps.workspace.writeFile(context.directory, file),
                    {
                        detail: file.path,
                        describe: () => `Wrote ${file.path}`,
                    }
                )
            }

            const tests = deps.tests
            if (kind !== "test_generation" || !tests) {
                return { artifact, issues: generated.issues }
            }

            // The run itself is the check; a failing suite is feedback, not a retry.
            const run = await session.tool(
                RUN_TESTS_TOOL,
                (signal) =>
                    tests.runner(tests.command, {
                        cwd: context.directory,
                        signal,
                        timeoutMs: tests.timeoutMs,
                    }),
                { maxRetries: 0, detail: tests.command, describe: describeTestRun }
            )
            return {
                artifact,
                issues: [...generated.issues, ...testRunIssues(tests.command, run)],
            }
        },
    }
}

export function createDefaultAgents(
    kinds: readonly AgentKind[],
    deps: AgentDependencies
): AgentSpec[] {
    return kinds.map((kind) => createAgentSpec(kind, deps))
}
