import _ from "underscore"
import { ClientOptions, LeetCodeClient } from "./client";
import { Logger, silentLogger } from "./console";
import type { FailureKind, FetchError, Outcome } from "./errors";
import { GraphQLTransport } from "./graphql";
import { sleep } from "./helper";
import { assembleResult } from "./output";
import { MarkupTransport } from "./scraper";
import type { Credentials, FetchResult, HistoryTransport, ProblemRecord, ProfileStats } from "./types";

type NextStep = 'abort' | 'fallback';

// A session problem is not fixed by switching transport; everything else is worth a second try.
const NEXT_STEP: Record<FailureKind, NextStep> = {
    auth: 'abort',
    rate_limited: 'fallback',
    network: 'fallback',
    unavailable: 'fallback',
    parse: 'fallback',
};

export function nextStep(error: FetchError): NextStep {
    return NEXT_STEP[error.kind];
}

export type FetcherOptions = {
    logger?: Logger,
    /** pause between problems */
    problemDelayMs?: number,
    sleep?: (ms: number) => Promise<void>,
}

function emptyStats(): ProfileStats {
    return { totalSolved: 0, easy: 0, medium: 0, hard: 0 };
}

/**
 * Drives one user's export: profile stats, the list of attempted problems, then
 * each problem's detail and submissions, one entity at a time. GraphQL is asked
 * first; the markup pages are asked only when GraphQL could not answer.
 */
export class LeetCodeFetcher {
    private readonly logger: Logger;
    private readonly problemDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly credentials: Credentials,
        private readonly primary: HistoryTransport,
        private readonly fallback: HistoryTransport,
        options: FetcherOptions = {},
    ) {
        this.logger = options.logger ?? silentLogger;
        this.problemDelayMs = options.problemDelayMs ?? 0;
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Fetches everything it can. Only an authentication failure is thrown;
     * when `signal` is aborted the results gathered so far are returned.
     */
    public async run(signal?: AbortSignal): Promise<FetchResult> {
        const { username } = this.credentials;
        const problems: ProblemRecord[] = [];
        let profileStats = emptyStats();
        const finish = () => assembleResult(username, profileStats, problems);
        const stopped = () => {
            if (signal?.aborted) {
                this.logger.warn(`Stopped early; returning ${problems.length} problems fetched so far`);
                return true;
            }
            return false;
        };

        await this.verifySession(username);
        if (stopped()) {
            return finish();
        }

        const stats = await this.acquire('profile stats', transport => transport.fetchProfileStats(username));
        if (stats) {
            profileStats = stats;
            this.checkStats(stats);
        } else {
            this.logger.warn('Profile stats unavailable; reporting zeros');
        }
        if (stopped()) {
            return finish();
        }

        const slugs = _.uniq(await this.acquire('solved problem list', transport => transport.fetchSolvedSlugs(username)) ?? []);
        this.logger.info(`Found ${slugs.length} attempted problems`);

        for (const [index, slug] of slugs.entries()) {
            if (stopped()) {
                return finish();
            }
            if (index > 0 && this.problemDelayMs > 0) {
                await this.sleep(this.problemDelayMs);
            }
            this.logger.info(`Fetching problem ${index + 1}/${slugs.length}: ${slug}`);
            const problem = await this.acquire(`problem ${slug}`, transport => transport.fetchProblemDetail(slug));
            if (problem && signal?.aborted) {
                problems.push({ ...problem, submissions: [] });
            }
            if (stopped()) {
                return finish();
            }
            const submissions = await this.acquire(`submissions of ${slug}`, transport => transport.fetchSubmissions(slug));
            if (!problem) {
                this.logger.warn(`Skipping ${slug}: no transport could fetch its details`);
                continue;
            }
            problems.push({ ...problem, submissions: submissions ?? [] });
        }
        return finish();
    }

    private async verifySession(username: string): Promise<void> {
        if (!this.primary.verifySession) {
            return;
        }
        const check = await this.primary.verifySession(username);
        if (!check.ok) {
            if (nextStep(check.error) === 'abort') {
                throw check.error;
            }
            this.logger.warn(`Could not confirm the session (${check.error.message}); continuing`);
        }
    }

    /** Primary transport, then fallback; undefined when neither could answer. */
    private async acquire<T>(entity: string, fetch: (transport: HistoryTransport) => Promise<Outcome<T>>): Promise<T | undefined> {
        const first = await fetch(this.primary);
        if (first.ok) {
            return first.value;
        }
        if (nextStep(first.error) === 'abort') {
            throw first.error;
        }
        this.logger.debug(`${this.primary.name} could not fetch ${entity}: ${first.error.message}; trying ${this.fallback.name}`);

        const second = await fetch(this.fallback);
        if (second.ok) {
            return second.value;
        }
        if (nextStep(second.error) === 'abort') {
            throw second.error;
        }
        this.logger.warn(`Could not fetch ${entity}: ${first.error.message}; ${this.fallback.name}: ${second.error.message}`);
        return undefined;
    }

    private checkStats(stats: ProfileStats): void {
        const sum = stats.easy + stats.medium + stats.hard;
        if (sum !== stats.totalSolved) {
            this.logger.warn(`Profile reports ${stats.totalSolved} solved but difficulties add up to ${sum}`);
        }
    }
}

export type HistoryOptions = ClientOptions & FetcherOptions & {
    signal?: AbortSignal,
};

/** One complete export with a client scoped to this run. */
export function fetchHistory(credentials: Credentials, options: HistoryOptions = {}): Promise<FetchResult> {
    const logger = options.logger ?? silentLogger;
    const client = new LeetCodeClient(credentials, options);
    const fetcher = new LeetCodeFetcher(
        credentials,
        new GraphQLTransport(client, logger),
        new MarkupTransport(client, logger),
        options,
    );
    return fetcher.run(options.signal);
}
