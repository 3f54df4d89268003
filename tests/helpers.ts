/**
 * Test helpers: an in-process stand-in for the HTTP layer plus factories
 * for GraphQL payloads and LeetCode pages.
 */
import { vi } from 'vitest';
import { z } from 'zod';
import { ClientOptions, HttpRequest, HttpResponse, HttpSend, LeetCodeClient, createCredentials } from '../src/client';
import type { Logger, LogLevel } from '../src/console';
import { Outcome, UnavailableError, fail } from '../src/errors';
import type { Credentials, HistoryTransport } from '../src/types';

// ─── HTTP fake ──────────────────────────────────────────────────────

export type Reply = HttpResponse | Error;
export type Handler = (req: HttpRequest) => Reply | undefined;

/** Routes each request to the first handler that answers; unanswered requests get a 404 page. */
export class FakeHttp {
    public readonly calls: HttpRequest[] = [];
    private readonly handlers: Handler[] = [];

    public on(handler: Handler): this {
        this.handlers.push(handler);
        return this;
    }

    public send: HttpSend = async (req) => {
        this.calls.push(req);
        for (const handler of this.handlers) {
            const reply = handler(req);
            if (reply instanceof Error) {
                throw reply;
            }
            if (reply) {
                return reply;
            }
        }
        return htmlResponse('<html><body>Not Found</body></html>', 404, req.url);
    };

    public operations(): string[] {
        return this.calls.map(call => graphqlCall(call)?.operationName ?? `${call.method} ${call.url}`);
    }
}

export function jsonResponse(
    body: unknown,
    statusCode = 200,
    url = 'https://leetcode.com/graphql/',
    headers: Record<string, string> = {},
): HttpResponse {
    return { statusCode, headers, body: JSON.stringify(body), finalUrl: url };
}

export function htmlResponse(body: string, statusCode = 200, url = 'https://leetcode.com/'): HttpResponse {
    return { statusCode, headers: { 'content-type': 'text/html' }, body, finalUrl: url };
}

export function networkError(code = 'ECONNRESET'): Error {
    return Object.assign(new Error(code === 'ETIMEDOUT' ? 'connect ETIMEDOUT' : 'socket hang up'), { code });
}

const graphqlBodySchema = z.object({
    operationName: z.string(),
    variables: z.record(z.unknown()),
});

export function graphqlCall(req: HttpRequest): z.infer<typeof graphqlBodySchema> | undefined {
    if (req.method !== 'POST' || !req.body) {
        return undefined;
    }
    const parsed = graphqlBodySchema.safeParse(JSON.parse(req.body));
    return parsed.success ? parsed.data : undefined;
}

export function onGraphQL(operationName: string, reply: (variables: Record<string, unknown>) => Reply | undefined): Handler {
    return (req) => {
        const call = graphqlCall(req);
        return call?.operationName === operationName ? reply(call.variables) : undefined;
    };
}

export function onPage(url: string, reply: () => Reply): Handler {
    return (req) => (req.method === 'GET' && req.url === url ? reply() : undefined);
}

// ─── client factories ───────────────────────────────────────────────

export function makeCredentials(username = 'alice'): Credentials {
    return createCredentials(username, 's1', 'c1');
}

export function recordingSleep(): { delays: number[], sleep: (ms: number) => Promise<void> } {
    const delays: number[] = [];
    return {
        delays,
        sleep: async (ms: number) => {
            delays.push(ms);
        },
    };
}

/** random() of 0.5 cancels the jitter, so delays are exact. */
export function makeClient(http: FakeHttp, options: ClientOptions = {}): LeetCodeClient {
    return new LeetCodeClient(makeCredentials(), {
        send: http.send,
        sleep: async () => undefined,
        random: () => 0.5,
        ...options,
    });
}

export type LoggedLine = { level: LogLevel, message: string };

export function spyLogger(): Logger & { lines: LoggedLine[], messages: (level: LogLevel) => string[] } {
    const lines: LoggedLine[] = [];
    const log = (level: LogLevel) => (message: string) => {
        lines.push({ level, message });
    };
    return {
        lines,
        messages: (level) => lines.filter(line => line.level === level).map(line => line.message),
        debug: log('debug'),
        info: log('info'),
        warn: log('warn'),
        error: log('error'),
    };
}

// ─── transport stubs ────────────────────────────────────────────────

function notStubbed<T>(): Promise<Outcome<T>> {
    return Promise.resolve(fail(new UnavailableError('not stubbed')));
}

type Method<K extends keyof HistoryTransport> = NonNullable<HistoryTransport[K]>;

/** A transport whose unstubbed operations all answer "unavailable". */
export function stubTransport(name: string, overrides: Partial<Omit<HistoryTransport, 'name'>> = {}) {
    return {
        name,
        fetchProfileStats: vi.fn<Method<'fetchProfileStats'>>(overrides.fetchProfileStats ?? (() => notStubbed())),
        fetchSolvedSlugs: vi.fn<Method<'fetchSolvedSlugs'>>(overrides.fetchSolvedSlugs ?? (() => notStubbed())),
        fetchProblemDetail: vi.fn<Method<'fetchProblemDetail'>>(overrides.fetchProblemDetail ?? (() => notStubbed())),
        fetchSubmissions: vi.fn<Method<'fetchSubmissions'>>(overrides.fetchSubmissions ?? (() => notStubbed())),
        ...(overrides.verifySession ? { verifySession: vi.fn<Method<'verifySession'>>(overrides.verifySession) } : {}),
    } satisfies HistoryTransport;
}

/** Total number of calls made to a stub, across every operation. */
export function callCount(transport: ReturnType<typeof stubTransport>): number {
    return transport.fetchProfileStats.mock.calls.length
        + transport.fetchSolvedSlugs.mock.calls.length
        + transport.fetchProblemDetail.mock.calls.length
        + transport.fetchSubmissions.mock.calls.length;
}

// ─── GraphQL payloads ───────────────────────────────────────────────

export function userStatusData(username: string | null, isSignedIn = true) {
    return { data: { userStatus: { isSignedIn, username } } };
}

export function profileData(counts: { All?: number, Easy: number, Medium: number, Hard: number }) {
    return {
        data: {
            matchedUser: {
                username: 'alice',
                submitStats: {
                    acSubmissionNum: Object.entries(counts).map(([difficulty, count]) => ({ difficulty, count })),
                },
            },
        },
    };
}

export function problemListData(questions: { titleSlug: string, status: string | null }[], total: number) {
    return { data: { problemsetQuestionList: { total, questions } } };
}

export function questionData(question: {
    title: string,
    titleSlug: string,
    content: string | null,
    difficulty: string,
    tags: string[],
} | null) {
    return {
        data: {
            question: question && {
                title: question.title,
                titleSlug: question.titleSlug,
                content: question.content,
                difficulty: question.difficulty,
                topicTags: question.tags.map(name => ({ name })),
            },
        },
    };
}

export type RawSubmissionFixture = {
    id: string,
    statusDisplay: string,
    lang: string,
    runtime: string | null,
    memory: string | null,
    timestamp: string,
};

export function submissionListData(submissions: RawSubmissionFixture[], hasNext = false, lastKey: string | null = null) {
    return { data: { questionSubmissionList: { lastKey, hasNext, submissions } } };
}

export function submissionDetailsData(code: string | null) {
    return { data: { submissionDetails: code === null ? null : { code } } };
}

// ─── pages ──────────────────────────────────────────────────────────

export function profilePage(counts: Partial<Record<'All' | 'Easy' | 'Medium' | 'Hard', string>>): string {
    const items = Object.entries(counts)
        .map(([difficulty, count]) => `<div data-difficulty="${difficulty}"><span class="label">${difficulty}</span><span class="count">${count}</span></div>`)
        .join('');
    return `<html><body><div data-testid="solved-stats">${items}</div></body></html>`;
}

export function problemsetPage(slugs: string[]): string {
    const rows = slugs
        .map(slug => `<div role="row"><div role="cell"><a href="/problems/${slug}/">${slug}</a></div></div>`)
        .join('');
    return `<html><body><div role="table"><div role="rowgroup">${rows}</div></div></body></html>`;
}

export function problemPage(problem: { title: string, difficulty: string, description: string | null, tags: string[] }): string {
    const tags = problem.tags.map(tag => `<a href="/tag/${tag.toLowerCase().replace(/ /g, '-')}/">${tag}</a>`).join('');
    const description = problem.description === null ? '' : `<div class="content__u3I1">${problem.description}</div>`;
    return `<html><head><title>${problem.title} - LeetCode</title></head><body>`
        + `<div diff="${problem.difficulty}"></div>${description}<div class="tags">${tags}</div>`
        + `</body></html>`;
}

export type SubmissionRowFixture = {
    id: string,
    timestamp: string,
    status: string,
    runtime: string,
    memory: string,
    language: string,
};

export function submissionsPage(rows: SubmissionRowFixture[]): string {
    const body = rows
        .map(row => `<tr data-submission-id="${row.id}">`
            + `<td><a href="/problems/two-sum/">Two Sum</a></td>`
            + `<td><span data-timestamp="${row.timestamp}">a while ago</span></td>`
            + `<td>${row.status}</td><td>${row.runtime}</td><td>${row.memory}</td><td>${row.language}</td>`
            + `</tr>`)
        .join('');
    return `<html><body><table><tbody>${body}</tbody></table></body></html>`;
}

export function submissionDetailPage(lines: string[] | null): string {
    const code = lines === null ? '' : `<div class="CodeMirror-code">${lines.map(line => `<div>${line}</div>`).join('')}</div>`;
    return `<html><body>${code}</body></html>`;
}
