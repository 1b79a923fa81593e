import { InvalidTransitionError } from "../core/errors.js"
import type {
    FeedbackSet,
    Issue,
    IssueCategory,
    IssueSeverity,
} from "../types.js"

export const ISSUE_CATEGORIES: readonly IssueCategory[] = [
    "review",
    "security",
    "performance",
]

const BLOCKING_SEVERITIES: ReadonlySet<IssueSeverity> = new Set([
    "high",
    "critical",
])

export function emptyFeedback(): FeedbackSet {
    return freezeFeedback({ review: [], security: [], performance: [] })
}

/** Groups issues by category, keeping the order they were reported in. */
export function buildFeedbackSet(issues: readonly Issue[]): FeedbackSet {
    const grouped: Record<IssueCategory, Issue[]> = {
        review: [],
        security: [],
        performance: [],
    }
    for (const issue of issues) {
        grouped[issue.category].push(issue)
    }
    return freezeFeedback(grouped)
}

export function allIssues(feedback: FeedbackSet): Issue[] {
    return ISSUE_CATEGORIES.flatMap((category) => [...feedback[category]])
}

export function countIssues(feedback: FeedbackSet): number {
    return allIssues(feedback).length
}

export function isBlocking(issue: Issue): boolean {
    return BLOCKING_SEVERITIES.has(issue.severity)
}

/** Default acceptance: nothing of high or critical severity left. */
export function noBlockingIssues(feedback: FeedbackSet): boolean {
    return !allIssues(feedback).some(isBlocking)
}

function freezeFeedback(feedback: Record<IssueCategory, Issue[]>): FeedbackSet {
    return Object.freeze({
        review: Object.freeze(feedback.review.map((i) => Object.freeze({ ...i }))),
        security: Object.freeze(
            feedback.security.map((i) => Object.freeze({ ...i }))
        ),
        performance: Object.freeze(
            feedback.performance.map((i) => Object.freeze({ ...i }))
        ),
    })
}

export interface FeedbackEntry {
    iterationNumber: number
    feedback: FeedbackSet
}

/**
 * Append-only store of each closed iteration's feedback. The next iteration
 * only ever sees the latest set, never a merge of the history.
 */
export class FeedbackAccumulator {
    private readonly entries: FeedbackEntry[] = []

    public accumulate(iterationNumber: number, feedback: FeedbackSet): void {
        const last = this.entries[this.entries.length - 1]
        if (last && iterationNumber <= last.iterationNumber) {
            throw new InvalidTransitionError(
                `Feedback for iteration ${iterationNumber} arrived after iteration ${last.iterationNumber}`
            )
        }
        this.entries.push({
            iterationNumber,
            feedback: freezeFeedback({
                review: [...feedback.review],
                security: [...feedback.security],
                performance: [...feedback.performance],
            }),
        })
    }

    public contextFor(nextIterationNumber: number): FeedbackSet {
        for (let i = this.entries.length - 1; i >= 0; i--) {
            const entry = this.entries[i]
            if (entry.iterationNumber < nextIterationNumber) {
                return entry.feedback
            }
        }
        return emptyFeedback()
    }

    public history(): readonly FeedbackEntry[] {
        return [...this.entries]
    }
}
