import { describe, test, expect } from 'vitest';
import config from '../src/config';
import { AuthenticationError, ParseError, UnavailableError } from '../src/errors';
import { MarkupTransport } from '../src/scraper';
import {
    FakeHttp,
    htmlResponse,
    makeClient,
    onPage,
    problemPage,
    problemsetPage,
    profilePage,
    spyLogger,
    submissionDetailPage,
    submissionsPage,
} from './helpers';

const PROFILE_URL = 'https://leetcode.com/u/alice/';
const PROBLEM_URL = 'https://leetcode.com/problems/two-sum/';

const problemsetUrl = (status: string, page: number) => `https://leetcode.com/problemset/all/?status=${status}&page=${page}`;
const submissionsUrl = (page: number) => `https://leetcode.com/problems/two-sum/submissions/?page=${page}`;
const detailUrl = (id: string) => `https://leetcode.com/submissions/detail/${id}/`;

function page(url: string, body: string) {
    return onPage(url, () => htmlResponse(body, 200, url));
}

function transportFor(http: FakeHttp, logger = spyLogger()) {
    return new MarkupTransport(makeClient(http), logger);
}

// ─── profile ────────────────────────────────────────────────────────

describe('fetchProfileStats', () => {

    test('reads the solved counts', async () => {
        const http = new FakeHttp().on(page(PROFILE_URL, profilePage({ All: '1,204', Easy: '600', Medium: '500 / 1700', Hard: '104' })));
        const result = await transportFor(http).fetchProfileStats('alice');

        expect(result).toEqual({ ok: true, value: { totalSolved: 1204, easy: 600, medium: 500, hard: 104 } });
    });

    test('sums the difficulties when the total is not shown', async () => {
        const http = new FakeHttp().on(page(PROFILE_URL, profilePage({ Easy: '3', Medium: '2', Hard: '0' })));
        const result = await transportFor(http).fetchProfileStats('alice');

        expect(result).toEqual({ ok: true, value: { totalSolved: 5, easy: 3, medium: 2, hard: 0 } });
    });

    test('is unavailable without the stats container', async () => {
        const http = new FakeHttp().on(page(PROFILE_URL, '<html><body><h1>alice</h1></body></html>'));
        const result = await transportFor(http).fetchProfileStats('alice');

        expect(!result.ok && result.error).toBeInstanceOf(UnavailableError);
    });

    test('fails to parse when a difficulty is missing or unreadable', async () => {
        const missing = new FakeHttp().on(page(PROFILE_URL, profilePage({ Easy: '3', Medium: '2' })));
        const unreadable = new FakeHttp().on(page(PROFILE_URL, profilePage({ Easy: '3', Medium: 'lots', Hard: '1' })));

        const first = await transportFor(missing).fetchProfileStats('alice');
        const second = await transportFor(unreadable).fetchProfileStats('alice');

        expect(!first.ok && first.error).toBeInstanceOf(ParseError);
        expect(!second.ok && second.error.message).toBe('Unreadable Medium count "lots" on the profile page of alice');
    });
});

// ─── problem list ───────────────────────────────────────────────────

describe('fetchSolvedSlugs', () => {

    test('collects solved and tried problems across pages', async () => {
        const logger = spyLogger();
        const http = new FakeHttp()
            .on(page(problemsetUrl('AC', 1), problemsetPage(['two-sum', 'lru-cache'])))
            .on(page(problemsetUrl('AC', 2), problemsetPage([])))
            .on(page(problemsetUrl('TRIED', 1), problemsetPage(['two-sum', 'add-two-numbers'])));
        const result = await transportFor(http, logger).fetchSolvedSlugs('alice');

        expect(result).toEqual({ ok: true, value: ['two-sum', 'lru-cache', 'add-two-numbers'] });
        expect(http.calls.map(call => call.url)).toEqual([
            problemsetUrl('AC', 1),
            problemsetUrl('AC', 2),
            problemsetUrl('TRIED', 1),
            problemsetUrl('TRIED', 2),
        ]);
        expect(logger.messages('warn')).toEqual([
            '[markup] Stopped reading TRIED problems at page 2: '
                + 'Request to https://leetcode.com/problemset/all/?status=TRIED&page=2 failed with status code: 404',
        ]);
    });

    test('is unavailable when the first page has no list', async () => {
        const http = new FakeHttp().on(page(problemsetUrl('AC', 1), '<html><body>Loading…</body></html>'));
        const result = await transportFor(http).fetchSolvedSlugs('alice');

        expect(!result.ok && result.error.message).toBe('Problem list not found on the AC problemset page');
    });
});

// ─── problem detail ─────────────────────────────────────────────────

describe('fetchProblemDetail', () => {

    test('reads title, statement, difficulty and tags', async () => {
        const http = new FakeHttp().on(page(PROBLEM_URL, problemPage({
            title: 'Two Sum',
            difficulty: 'Easy',
            description: '<p>Given an   array of integers.</p><pre>Input: [2,7]</pre>',
            tags: ['Array', 'Hash Table'],
        })));
        const result = await transportFor(http).fetchProblemDetail('two-sum');

        expect(result).toEqual({
            ok: true,
            value: {
                title: 'Two Sum',
                slug: 'two-sum',
                description: 'Given an array of integers.',
                difficulty: 'Easy',
                tags: ['Array', 'Hash Table'],
            },
        });
    });

    test('prefers the numbered heading for the title', async () => {
        const body = '<html><body><div data-cy="question-title">1. Two Sum</div><div diff="Easy"></div>'
            + '<div class="question-content"><p>Text</p></div></body></html>';
        const http = new FakeHttp().on(page(PROBLEM_URL, body));
        const result = await transportFor(http).fetchProblemDetail('two-sum');

        expect(result.ok && result.value.title).toBe('Two Sum');
    });

    test('is unavailable without a statement', async () => {
        const http = new FakeHttp().on(page(PROBLEM_URL, problemPage({ title: 'Two Sum', difficulty: 'Easy', description: null, tags: [] })));
        const result = await transportFor(http).fetchProblemDetail('two-sum');

        expect(!result.ok && result.error).toBeInstanceOf(UnavailableError);
    });

    test('fails to parse an unknown difficulty', async () => {
        const http = new FakeHttp().on(page(PROBLEM_URL, problemPage({ title: 'Two Sum', difficulty: 'Legendary', description: '<p>x</p>', tags: [] })));
        const result = await transportFor(http).fetchProblemDetail('two-sum');

        expect(!result.ok && result.error.message).toBe('Difficulty not found on the page of two-sum');
    });
});

// ─── submissions ────────────────────────────────────────────────────

describe('fetchSubmissions', () => {

    const rows = [
        { id: '102', timestamp: '1700000200', status: 'Accepted', runtime: '60 ms', memory: '15 MB', language: 'python3' },
        { id: '101', timestamp: '1700000100', status: 'Wrong Answer', runtime: 'N/A', memory: 'N/A', language: 'python3' },
    ];

    test('reads each row and its code, oldest first', async () => {
        const http = new FakeHttp()
            .on(page(submissionsUrl(1), submissionsPage(rows)))
            .on(page(submissionsUrl(2), submissionsPage([])))
            .on(page(detailUrl('102'), submissionDetailPage(['class Solution:', '    pass'])))
            .on(page(detailUrl('101'), submissionDetailPage(['print(1)'])));
        const result = await transportFor(http).fetchSubmissions('two-sum');

        expect(result).toEqual({
            ok: true,
            value: [
                { status: 'Wrong Answer', code: 'print(1)', timestamp: '1700000100', runtime: null, memory: null, language: 'python3' },
                { status: 'Accepted', code: 'class Solution:\n    pass', timestamp: '1700000200', runtime: '60 ms', memory: '15 MB', language: 'python3' },
            ],
        });
        expect(http.calls[2].headers.Referer).toBe(submissionsUrl(1));
    });

    test('drops a submission whose code is missing', async () => {
        const logger = spyLogger();
        const http = new FakeHttp()
            .on(page(submissionsUrl(1), submissionsPage(rows)))
            .on(page(submissionsUrl(2), submissionsPage([])))
            .on(page(detailUrl('102'), submissionDetailPage(['print(2)'])))
            .on(page(detailUrl('101'), submissionDetailPage(null)));
        const result = await transportFor(http, logger).fetchSubmissions('two-sum');

        expect(result.ok && result.value.map(s => s.code)).toEqual(['print(2)']);
        expect(logger.messages('warn')).toEqual(['[markup] Skipping submission 101 of two-sum: No code found for submission 101']);
    });

    test('propagates a login redirect met while reading code', async () => {
        const http = new FakeHttp()
            .on(page(submissionsUrl(1), submissionsPage(rows)))
            .on(page(submissionsUrl(2), submissionsPage([])))
            .on(onPage(detailUrl('102'), () => htmlResponse('<html>Sign in</html>', 200, 'https://leetcode.com/accounts/login/')));
        const result = await transportFor(http).fetchSubmissions('two-sum');

        expect(!result.ok && result.error).toBeInstanceOf(AuthenticationError);
    });

    test('reads every page of the submission list', async () => {
        const http = new FakeHttp()
            .on(page(submissionsUrl(1), submissionsPage([rows[0]])))
            .on(page(submissionsUrl(2), submissionsPage([rows[1]])))
            .on(page(submissionsUrl(3), submissionsPage([])))
            .on(page(detailUrl('102'), submissionDetailPage(['print(2)'])))
            .on(page(detailUrl('101'), submissionDetailPage(['print(1)'])));
        const result = await transportFor(http).fetchSubmissions('two-sum');

        expect(result.ok && result.value.map(s => s.code)).toEqual(['print(1)', 'print(2)']);
        expect(http.calls.find(call => call.url === detailUrl('101'))?.headers.Referer).toBe(submissionsUrl(2));
    });

    test('warns when the page limit cuts the list short', async () => {
        const logger = spyLogger();
        const http = new FakeHttp()
            .on((req) => (req.url.startsWith('https://leetcode.com/problems/two-sum/submissions/')
                ? htmlResponse(submissionsPage([rows[0]]), 200, req.url)
                : undefined))
            .on(page(detailUrl('102'), submissionDetailPage(['print(2)'])));
        const result = await transportFor(http, logger).fetchSubmissions('two-sum');

        const limit = config.defaults.maxScrapePages;
        expect(result.ok && result.value).toHaveLength(limit);
        expect(http.calls.filter(call => call.url.includes('/submissions/?page=')).length).toBe(limit);
        expect(logger.messages('warn')).toEqual([`[markup] Submissions of two-sum truncated at ${limit} pages (${limit} rows)`]);
    });

    test('is unavailable without a submission table', async () => {
        const http = new FakeHttp().on(page(submissionsUrl(1), '<html><body><p>No submissions yet</p></body></html>'));
        const result = await transportFor(http).fetchSubmissions('two-sum');

        expect(!result.ok && result.error.kind).toBe('unavailable');
    });
});
