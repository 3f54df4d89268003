import type { Outcome } from './errors';

type Difficulty = 'Easy' | 'Medium' | 'Hard';

type Credentials = {
    readonly username: string,
    readonly sessionToken: string,
    readonly csrfToken: string,
}

type ProfileStats = {
    totalSolved: number,
    easy: number,
    medium: number,
    hard: number,
}

type Problem = {
    title: string,
    slug: string,
    description: string,
    difficulty: Difficulty,
    tags: string[],
}

type Submission = {
    status: string,
    code: string,
    /** epoch seconds */
    timestamp: string,
    runtime: string | null,
    memory: string | null,
    language: string,
}

type ProblemRecord = Problem & {
    submissions: Submission[],
}

/** A ProblemRecord as it appears in a FetchResult: frozen all the way down. */
type ExportedProblem = Readonly<Omit<Problem, 'tags'>> & {
    readonly tags: readonly string[],
    readonly submissions: readonly Readonly<Submission>[],
}

type FetchResult = {
    readonly username: string,
    readonly profileStats: Readonly<ProfileStats>,
    readonly problems: readonly ExportedProblem[],
}

/** One way of reaching LeetCode data. Both transports answer the same four questions. */
interface HistoryTransport {
    readonly name: string;
    /** Confirms the session is signed in as `username`; only the GraphQL transport can tell. */
    verifySession?(username: string): Promise<Outcome<void>>;
    fetchProfileStats(username: string): Promise<Outcome<ProfileStats>>;
    fetchSolvedSlugs(username: string): Promise<Outcome<string[]>>;
    fetchProblemDetail(slug: string): Promise<Outcome<Problem>>;
    fetchSubmissions(slug: string): Promise<Outcome<Submission[]>>;
}

export type {
    Difficulty,
    Credentials,
    ProfileStats,
    Problem,
    Submission,
    ProblemRecord,
    ExportedProblem,
    FetchResult,
    HistoryTransport,
};
