const config = {
    urls: {
        base: 'https://leetcode.com',
        graphql: 'https://leetcode.com/graphql/',
        login: 'https://leetcode.com/accounts/login/',
        // pages read by the markup transport
        profile: 'https://leetcode.com/u/$username/',
        problemset: 'https://leetcode.com/problemset/all/?status=$status&page=$page',
        problem: 'https://leetcode.com/problems/$slug/',
        submissions: 'https://leetcode.com/problems/$slug/submissions/?page=$page',
        submission: 'https://leetcode.com/submissions/detail/$id/',
    },
    selectors: {
        profileStats: '[data-testid="solved-stats"]',
        difficultyCount: '[data-difficulty="$difficulty"] .count',
        problemRows: '[role="rowgroup"]',
        problemLink: '[role="row"] a[href^="/problems/"]',
        title: '[data-cy="question-title"]',
        description: '.content__u3I1, .question-content, [data-track-load="description_content"]',
        difficulty: '[diff]',
        tags: '.tag-v2, a[href^="/tag/"]',
        submissionTable: 'table',
        submissionRow: 'tr[data-submission-id]',
        code: 'div.CodeMirror-code',
    },
    // problem list statuses meaning the user has submitted at least once
    interactedStatuses: ['ac', 'notac'],
    scrapeStatuses: ['AC', 'TRIED'],
    userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_14_3) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/73.0.3683.86 Safari/537.36',
    defaults: {
        maxAttempts: 5,
        baseDelayMs: 1000,
        maxDelayMs: 30 * 1000,
        jitter: 0.2,
        timeoutMs: 30 * 1000,
        problemDelayMs: 0,
        cliProblemDelayMs: 1000,
        problemPageSize: 100,
        submissionPageSize: 20,
        maxSubmissionPages: 20,
        maxScrapePages: 50,
    },
};

export default config;
