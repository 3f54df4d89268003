import fs from "fs"
import { z } from "zod";
import { ParseError } from "./errors";
import type { FetchResult, ProblemRecord, ProfileStats } from "./types";

const submissionDocumentSchema = z.object({
    status: z.string(),
    code: z.string(),
    timestamp: z.string(),
    runtime: z.string().nullable(),
    memory: z.string().nullable(),
    language: z.string(),
});

const problemDocumentSchema = z.object({
    title: z.string(),
    slug: z.string(),
    description: z.string(),
    difficulty: z.enum(['Easy', 'Medium', 'Hard']),
    tags: z.array(z.string()),
    submissions: z.array(submissionDocumentSchema),
});

const documentSchema = z.object({
    username: z.string(),
    profile_stats: z.object({
        total_solved: z.number().int().nonnegative(),
        easy: z.number().int().nonnegative(),
        medium: z.number().int().nonnegative(),
        hard: z.number().int().nonnegative(),
    }),
    problems: z.array(problemDocumentSchema),
});

/** The canonical JSON shape written to disk. */
export type HistoryDocument = z.infer<typeof documentSchema>;

/** Freezes a run's results; nothing downstream may change them. */
export function assembleResult(username: string, profileStats: ProfileStats, problems: ProblemRecord[]): FetchResult {
    return Object.freeze({
        username,
        profileStats: Object.freeze({ ...profileStats }),
        problems: Object.freeze(problems.map(problem => Object.freeze({
            ...problem,
            tags: Object.freeze([...problem.tags]),
            submissions: Object.freeze(problem.submissions.map(submission => Object.freeze({ ...submission }))),
        }))),
    });
}

export function toDocument(result: FetchResult): HistoryDocument {
    return {
        username: result.username,
        profile_stats: {
            total_solved: result.profileStats.totalSolved,
            easy: result.profileStats.easy,
            medium: result.profileStats.medium,
            hard: result.profileStats.hard,
        },
        problems: result.problems.map(problem => ({
            title: problem.title,
            slug: problem.slug,
            description: problem.description,
            difficulty: problem.difficulty,
            tags: [...problem.tags],
            submissions: problem.submissions.map(submission => ({
                status: submission.status,
                code: submission.code,
                timestamp: submission.timestamp,
                runtime: submission.runtime,
                memory: submission.memory,
                language: submission.language,
            })),
        })),
    };
}

export function fromDocument(document: HistoryDocument): FetchResult {
    const { profile_stats: stats } = document;
    return assembleResult(
        document.username,
        { totalSolved: stats.total_solved, easy: stats.easy, medium: stats.medium, hard: stats.hard },
        document.problems.map(problem => ({
            title: problem.title,
            slug: problem.slug,
            description: problem.description,
            difficulty: problem.difficulty,
            tags: problem.tags,
            submissions: problem.submissions,
        })),
    );
}

export function serializeDocument(result: FetchResult, pretty = false): string {
    return JSON.stringify(toDocument(result), null, pretty ? 2 : undefined);
}

export function parseDocument(text: string): FetchResult {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ParseError(`History document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ParseError(`History document is malformed at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return fromDocument(parsed.data);
}

export function writeDocument(path: string, result: FetchResult, pretty = false): void {
    fs.writeFileSync(path, serializeDocument(result, pretty) + '\n', 'utf-8');
}
