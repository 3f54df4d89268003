import _ from "underscore"
import type { Difficulty, Submission } from "./types";

export type RetryPolicy = {
    maxAttempts: number,
    baseDelayMs: number,
    maxDelayMs: number,
    /** fraction of the computed delay, applied in both directions */
    jitter: number,
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before retrying after failed attempt number `attempt` (1-based):
 * `base * 2^(attempt-1)`, capped at `maxDelayMs`, then spread by the jitter fraction.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    const computed = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
    const spread = computed * policy.jitter;
    return Math.round(computed - spread + random() * spread * 2);
}

/** A server-sent wait wins over the computed backoff. */
export function retryDelay(attempt: number, policy: RetryPolicy, retryAfterMs?: number, random: () => number = Math.random): number {
    if (retryAfterMs !== undefined) {
        return retryAfterMs;
    }
    return backoffDelay(attempt, policy, random);
}

/** Reads a Retry-After header given either as delta-seconds or as an HTTP date. */
export function parseRetryAfter(header: string | string[] | undefined, now: number = Date.now()): number | undefined {
    const value = (Array.isArray(header) ? header[0] : header)?.trim();
    if (!value) {
        return undefined;
    }
    if (/^\d+(\.\d+)?$/.test(value)) {
        return Math.round(parseFloat(value) * 1000);
    }
    const date = Date.parse(value);
    if (Number.isNaN(date)) {
        return undefined;
    }
    return Math.max(0, date - now);
}

/** Fills `$name` placeholders of a config url. */
export function fillUrl(template: string, params: Record<string, string | number>): string {
    return template.replace(/\$(\w+)/g, (match, key: string) =>
        key in params ? encodeURIComponent(String(params[key])) : match);
}

export function toDifficulty(value: string | undefined | null): Difficulty | undefined {
    switch (value?.trim().toLowerCase()) {
        case 'easy':
            return 'Easy';
        case 'medium':
            return 'Medium';
        case 'hard':
            return 'Hard';
        default:
            return undefined;
    }
}

/** Runtime and memory are optional: blanks and "N/A" become null. */
export function optionalMetric(value: string | null | undefined): string | null {
    const trimmed = value?.trim();
    if (!trimmed || trimmed.toUpperCase() === 'N/A') {
        return null;
    }
    return trimmed;
}

export function uniqueTags(tags: string[]): string[] {
    return _.uniq(_.compact(tags.map(tag => tag.trim())));
}

export function sortByTimestamp(submissions: Submission[]): Submission[] {
    return _.sortBy(submissions, submission => Number(submission.timestamp));
}

/** `/problems/two-sum/description/?x=1` -> `two-sum` */
export function slugFromHref(href: string | undefined): string | undefined {
    if (!href) {
        return undefined;
    }
    const segments = _.compact(href.split(/[?#]/)[0].split('/'));
    const index = segments.indexOf('problems');
    return index >= 0 ? segments[index + 1] : undefined;
}
