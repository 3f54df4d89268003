import _ from "underscore"
import type * as cheerio from "cheerio";
import config from "./config"
import { LeetCodeClient, markupBody } from "./client";
import { Logger, silentLogger } from "./console";
import { Outcome, ParseError, UnavailableError, fail, mapOutcome, succeed } from "./errors";
import { fillUrl, optionalMetric, slugFromHref, sortByTimestamp, toDifficulty, uniqueTags } from "./helper";
import { firstAttr, firstText, htmlToText } from "./markup";
import type { HistoryTransport, Problem, ProfileStats, Submission } from "./types";

const PAGE_ACCEPT = 'text/html,application/xhtml+xml,application/xml';

type SubmissionRow = Omit<Submission, 'code'> & { id: string, referer: string };

/** "1,234" or "57 / 800" -> the leading count */
function parseCount(text: string): number | undefined {
    const match = /^(\d[\d,]*)/.exec(text.trim());
    return match ? parseInt(match[1].replace(/,/g, ''), 10) : undefined;
}

/**
 * Fallback transport: the pages a person would look at. Markup changes without
 * notice, so the orchestrator only comes here after GraphQL has failed.
 *
 * Optional fields (runtime, memory) degrade to null. A container that cannot be
 * found at all makes the whole entity unavailable.
 */
export class MarkupTransport implements HistoryTransport {
    public readonly name = 'markup';

    constructor(private readonly client: LeetCodeClient, private readonly logger: Logger = silentLogger) {
    }

    public async fetchProfileStats(username: string): Promise<Outcome<ProfileStats>> {
        const page = await this.page(fillUrl(config.urls.profile, { username }));
        return mapOutcome(page, ($): Outcome<ProfileStats> => {
            const stats = $(config.selectors.profileStats).first();
            if (stats.length === 0) {
                return fail(new UnavailableError(`Solved stats not found on the profile page of ${username}`));
            }
            const counts: Partial<Record<string, number>> = {};
            for (const difficulty of ['All', 'Easy', 'Medium', 'Hard']) {
                const text = stats.find(config.selectors.difficultyCount.replace('$difficulty', difficulty)).first().text().trim();
                if (!text) {
                    continue;
                }
                const count = parseCount(text);
                if (count === undefined) {
                    return fail(new ParseError(`Unreadable ${difficulty} count "${text}" on the profile page of ${username}`));
                }
                counts[difficulty.toLowerCase()] = count;
            }
            const { all, easy, medium, hard } = counts;
            if (easy === undefined || medium === undefined || hard === undefined) {
                return fail(new ParseError(`Difficulty counts missing on the profile page of ${username}`));
            }
            return succeed({ totalSolved: all ?? easy + medium + hard, easy, medium, hard });
        });
    }

    public async fetchSolvedSlugs(username: string): Promise<Outcome<string[]>> {
        const slugs: string[] = [];
        for (const status of config.scrapeStatuses) {
            for (let page = 1; page <= config.defaults.maxScrapePages; page++) {
                const result = await this.page(fillUrl(config.urls.problemset, { status, page }));
                if (!result.ok) {
                    if (page === 1 || result.error.kind === 'auth') {
                        return result;
                    }
                    this.logger.warn(`[markup] Stopped reading ${status} problems at page ${page}: ${result.error.message}`);
                    break;
                }
                const $ = result.value;
                if ($(config.selectors.problemRows).length === 0) {
                    if (page === 1) {
                        return fail(new UnavailableError(`Problem list not found on the ${status} problemset page`));
                    }
                    break;
                }
                const found = _.compact($(config.selectors.problemLink).toArray().map(el => slugFromHref($(el).attr('href'))));
                if (found.length === 0) {
                    break;
                }
                slugs.push(...found);
            }
        }
        this.logger.debug(`[markup] ${slugs.length} problems attempted by ${username}`);
        return succeed(_.uniq(slugs));
    }

    public async fetchProblemDetail(slug: string): Promise<Outcome<Problem>> {
        const page = await this.page(fillUrl(config.urls.problem, { slug }));
        return mapOutcome(page, ($): Outcome<Problem> => {
            const description = $(config.selectors.description).first();
            if (description.length === 0) {
                return fail(new UnavailableError(`Description not found on the page of ${slug}`));
            }
            const difficulty = toDifficulty(firstAttr($, config.selectors.difficulty, 'diff'));
            if (!difficulty) {
                return fail(new ParseError(`Difficulty not found on the page of ${slug}`));
            }
            const title = firstText($, config.selectors.title).replace(/^\d+\.\s*/, '')
                || firstText($, 'title').replace(/\s*-\s*LeetCode\s*$/, '')
                || slug;
            return succeed({
                title,
                slug,
                description: htmlToText(description.html()),
                difficulty,
                tags: uniqueTags($(config.selectors.tags).toArray().map(el => $(el).text())),
            });
        });
    }

    public async fetchSubmissions(slug: string): Promise<Outcome<Submission[]>> {
        const listed = await this.listSubmissions(slug);
        if (!listed.ok) {
            return listed;
        }
        const submissions: Submission[] = [];
        for (const { id, referer, ...fields } of listed.value) {
            if (!id) {
                this.logger.warn(`[markup] Skipping a submission row of ${slug} without an id`);
                continue;
            }
            const code = await this.fetchCode(id, referer);
            if (!code.ok) {
                if (code.error.kind === 'auth') {
                    return code;
                }
                this.logger.warn(`[markup] Skipping submission ${id} of ${slug}: ${code.error.message}`);
                continue;
            }
            submissions.push({ ...fields, code: code.value });
        }
        return succeed(sortByTimestamp(submissions));
    }

    /** Reads `?page=N` until a page has no rows. */
    private async listSubmissions(slug: string): Promise<Outcome<SubmissionRow[]>> {
        const maxPages = config.defaults.maxScrapePages;
        const rows: SubmissionRow[] = [];
        let more = true;
        for (let page = 1; page <= maxPages && more; page++) {
            const url = fillUrl(config.urls.submissions, { slug, page });
            const result = await this.page(url);
            if (!result.ok) {
                if (page === 1 || result.error.kind === 'auth') {
                    return result;
                }
                this.logger.warn(`[markup] Stopped reading submissions of ${slug} at page ${page}: ${result.error.message}`);
                return succeed(rows);
            }
            const $ = result.value;
            if ($(config.selectors.submissionTable).length === 0) {
                if (page === 1) {
                    return fail(new UnavailableError(`Submission table not found on the submissions page of ${slug}`));
                }
                more = false;
                continue;
            }
            const found = this.readRows($, url);
            rows.push(...found);
            more = found.length > 0;
        }
        if (more) {
            this.logger.warn(`[markup] Submissions of ${slug} truncated at ${maxPages} pages (${rows.length} rows)`);
        }
        return succeed(rows);
    }

    private readRows($: cheerio.CheerioAPI, referer: string): SubmissionRow[] {
        return $(config.selectors.submissionRow).toArray().map((el): SubmissionRow => {
            const row = $(el);
            const cell = (n: number) => row.find(`td:nth-child(${n})`).first();
            return {
                id: row.attr('data-submission-id')?.trim() ?? '',
                referer,
                status: cell(3).text().trim() || 'Unknown',
                runtime: optionalMetric(cell(4).text()),
                memory: optionalMetric(cell(5).text()),
                language: cell(6).text().trim() || 'Unknown',
                timestamp: cell(2).find('[data-timestamp]').first().attr('data-timestamp')?.trim() || '0',
            };
        });
    }

    private async fetchCode(id: string, referer: string): Promise<Outcome<string>> {
        const page = await this.page(fillUrl(config.urls.submission, { id }), referer);
        return mapOutcome(page, ($): Outcome<string> => {
            const container = $(config.selectors.code).first();
            if (container.length === 0) {
                return fail(new ParseError(`No code found for submission ${id}`));
            }
            const lines = container.children('div').toArray().map(el => $(el).text());
            return succeed(lines.join('\n').trim());
        });
    }

    private page(url: string, referer?: string): Promise<Outcome<cheerio.CheerioAPI>> {
        return this.client.execute({ method: 'GET', url, referer, accept: PAGE_ACCEPT, decode: markupBody });
    }
}
