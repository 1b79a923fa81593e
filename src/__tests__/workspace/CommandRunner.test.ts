import { describe, expect, it } from "vitest"

import { describeTestRun, testRunIssues } from "../../workspace/CommandRunner.js"

const passed = { exitCode: 0, stdout: "3 passed", stderr: "", timedOut: false }

describe("testRunIssues", () => {
    it("has nothing to report for a passing run", () => {
        expect(testRunIssues("npm test", passed)).toEqual([])
        expect(describeTestRun(passed)).toBe("Tests passed")
    })

    it("reports a timed out run with its output", () => {
        const result = { exitCode: -1, stdout: "", stderr: "still waiting\n", timedOut: true }
        const [issue] = testRunIssues("npx vitest run", result)
        expect(issue.severity).toBe("high")
        expect(issue.description).toBe(
            "Test run `npx vitest run` timed out\nstderr:\nstill waiting"
        )
        expect(describeTestRun(result)).toBe("Tests timed out")
    })

    it("keeps only the end of long output", () => {
        const stdout = `${"a".repeat(500)}${"b".repeat(2000)}`
        const [issue] = testRunIssues("npm test", {
            exitCode: 2,
            stdout,
            stderr: "",
            timedOut: false,
        })
        expect(issue.description).toBe(
            `Test run \`npm test\` exited with code 2\nstdout:\n…${"b".repeat(2000)}`
        )
    })
})
