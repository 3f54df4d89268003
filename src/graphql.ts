import _ from "underscore"
import { z } from "zod";
import config from "./config"
import { ClientRequest, LeetCodeClient, jsonBody, validateShape } from "./client";
import { Logger, silentLogger } from "./console";
import {
    AuthenticationError,
    Outcome,
    ParseError,
    UnavailableError,
    fail,
    mapOutcome,
    succeed,
} from "./errors";
import { fillUrl, optionalMetric, sortByTimestamp, toDifficulty, uniqueTags } from "./helper";
import { htmlToText } from "./markup";
import type { HistoryTransport, Problem, ProfileStats, Submission } from "./types";

// ─── queries ───────────────────────────────────────────────────────

const USER_STATUS_QUERY = `query globalData {
  userStatus {
    isSignedIn
    username
  }
}`;

const PROFILE_QUERY = `query userPublicProfile($username: String!) {
  matchedUser(username: $username) {
    username
    submitStats: submitStatsGlobal {
      acSubmissionNum {
        difficulty
        count
      }
    }
  }
}`;

const PROBLEM_LIST_QUERY = `query problemsetQuestionList($categorySlug: String, $limit: Int, $skip: Int, $filters: QuestionListFilterInput) {
  problemsetQuestionList: questionList(categorySlug: $categorySlug, limit: $limit, skip: $skip, filters: $filters) {
    total: totalNum
    questions: data {
      titleSlug
      status
    }
  }
}`;

const QUESTION_QUERY = `query questionData($titleSlug: String!) {
  question(titleSlug: $titleSlug) {
    title
    titleSlug
    content
    difficulty
    topicTags {
      name
    }
  }
}`;

const SUBMISSION_LIST_QUERY = `query submissionList($offset: Int!, $limit: Int!, $lastKey: String, $questionSlug: String!) {
  questionSubmissionList(offset: $offset, limit: $limit, lastKey: $lastKey, questionSlug: $questionSlug) {
    lastKey
    hasNext
    submissions {
      id
      statusDisplay
      lang
      runtime
      memory
      timestamp
    }
  }
}`;

const SUBMISSION_DETAILS_QUERY = `query submissionDetails($submissionId: Int!) {
  submissionDetails(submissionId: $submissionId) {
    code
  }
}`;

// ─── response shapes ───────────────────────────────────────────────

const envelopeSchema = z.object({ data: z.unknown() });

const idSchema = z.union([z.string(), z.number()]).transform(String);

const userStatusSchema = z.object({
    userStatus: z.object({
        isSignedIn: z.boolean(),
        username: z.string().nullish(),
    }),
});

const profileSchema = z.object({
    matchedUser: z.object({
        submitStats: z.object({
            acSubmissionNum: z.array(z.object({
                difficulty: z.string(),
                count: z.number().int().nonnegative(),
            })),
        }),
    }).nullable(),
});

const problemListSchema = z.object({
    problemsetQuestionList: z.object({
        total: z.number().int().nonnegative(),
        questions: z.array(z.object({
            titleSlug: z.string(),
            status: z.string().nullish(),
        })),
    }),
});

const questionSchema = z.object({
    question: z.object({
        title: z.string(),
        titleSlug: z.string(),
        content: z.string().nullish(),
        difficulty: z.string(),
        topicTags: z.array(z.object({ name: z.string() })).nullish(),
    }).nullable(),
});

const rawSubmissionSchema = z.object({
    id: idSchema,
    statusDisplay: z.string(),
    lang: z.string(),
    runtime: z.string().nullish(),
    memory: z.string().nullish(),
    timestamp: idSchema,
});

type RawSubmission = z.infer<typeof rawSubmissionSchema>;

const submissionListSchema = z.object({
    questionSubmissionList: z.object({
        lastKey: z.string().nullish(),
        hasNext: z.boolean(),
        submissions: z.array(rawSubmissionSchema),
    }).nullable(),
});

type SubmissionListData = z.infer<typeof submissionListSchema>;

const submissionDetailsSchema = z.object({
    submissionDetails: z.object({ code: z.string() }).nullable(),
});

// ─── transport ─────────────────────────────────────────────────────

/**
 * Primary transport: LeetCode's GraphQL endpoint. Every response is checked
 * against a schema before it becomes a typed entity.
 */
export class GraphQLTransport implements HistoryTransport {
    public readonly name = 'graphql';

    constructor(private readonly client: LeetCodeClient, private readonly logger: Logger = silentLogger) {
    }

    public async verifySession(username: string): Promise<Outcome<void>> {
        const result = await this.query('globalData', USER_STATUS_QUERY, {}, userStatusSchema);
        return mapOutcome(result, ({ userStatus }): Outcome<void> => {
            if (!userStatus.isSignedIn) {
                return fail(new AuthenticationError('Authentication failed or user not signed in'));
            }
            if (userStatus.username && userStatus.username.toLowerCase() !== username.toLowerCase()) {
                return fail(new AuthenticationError(`Session belongs to ${userStatus.username}, not ${username}`));
            }
            return succeed(undefined);
        });
    }

    public async fetchProfileStats(username: string): Promise<Outcome<ProfileStats>> {
        const result = await this.query('userPublicProfile', PROFILE_QUERY, { username }, profileSchema);
        return mapOutcome(result, ({ matchedUser }): Outcome<ProfileStats> => {
            if (!matchedUser) {
                return fail(new UnavailableError(`No profile returned for ${username}`));
            }
            const counts: Partial<Record<string, number>> = {};
            for (const item of matchedUser.submitStats.acSubmissionNum) {
                counts[item.difficulty.toLowerCase()] = item.count;
            }
            const easy = counts.easy ?? 0;
            const medium = counts.medium ?? 0;
            const hard = counts.hard ?? 0;
            return succeed({ totalSolved: counts.all ?? easy + medium + hard, easy, medium, hard });
        });
    }

    public async fetchSolvedSlugs(username: string): Promise<Outcome<string[]>> {
        const limit = config.defaults.problemPageSize;
        const slugs: string[] = [];
        for (let skip = 0; ; skip += limit) {
            const result = await this.query('problemsetQuestionList', PROBLEM_LIST_QUERY,
                { categorySlug: '', limit, skip, filters: {} }, problemListSchema);
            if (!result.ok) {
                return result;
            }
            const { total, questions } = result.value.problemsetQuestionList;
            for (const question of questions) {
                if (question.status && config.interactedStatuses.includes(question.status.toLowerCase())) {
                    slugs.push(question.titleSlug);
                }
            }
            if (questions.length === 0 || skip + limit >= total) {
                break;
            }
        }
        this.logger.debug(`[graphql] ${slugs.length} problems attempted by ${username}`);
        return succeed(_.uniq(slugs));
    }

    public async fetchProblemDetail(slug: string): Promise<Outcome<Problem>> {
        const result = await this.query('questionData', QUESTION_QUERY, { titleSlug: slug }, questionSchema,
            fillUrl(config.urls.problem, { slug }));
        return mapOutcome(result, ({ question }): Outcome<Problem> => {
            if (!question) {
                return fail(new UnavailableError(`Problem ${slug} not returned by GraphQL`));
            }
            const difficulty = toDifficulty(question.difficulty);
            if (!difficulty) {
                return fail(new ParseError(`Unrecognised difficulty "${question.difficulty}" for ${slug}`));
            }
            return succeed({
                title: question.title,
                slug,
                description: htmlToText(question.content),
                difficulty,
                tags: uniqueTags((question.topicTags ?? []).map(tag => tag.name)),
            });
        });
    }

    public async fetchSubmissions(slug: string): Promise<Outcome<Submission[]>> {
        const listed = await this.listSubmissions(slug);
        if (!listed.ok) {
            return listed;
        }
        const submissions: Submission[] = [];
        for (const raw of listed.value) {
            const details = await this.query('submissionDetails', SUBMISSION_DETAILS_QUERY,
                { submissionId: Number(raw.id) }, submissionDetailsSchema, fillUrl(config.urls.submission, { id: raw.id }));
            if (!details.ok) {
                if (details.error.kind === 'auth') {
                    return details;
                }
                this.logger.warn(`[graphql] Skipping submission ${raw.id} of ${slug}: ${details.error.message}`);
                continue;
            }
            if (!details.value.submissionDetails) {
                this.logger.warn(`[graphql] Skipping submission ${raw.id} of ${slug}: no code returned`);
                continue;
            }
            submissions.push({
                status: raw.statusDisplay,
                code: details.value.submissionDetails.code,
                timestamp: raw.timestamp,
                runtime: optionalMetric(raw.runtime),
                memory: optionalMetric(raw.memory),
                language: raw.lang,
            });
        }
        return succeed(sortByTimestamp(submissions));
    }

    private async listSubmissions(slug: string): Promise<Outcome<RawSubmission[]>> {
        const limit = config.defaults.submissionPageSize;
        const maxPages = config.defaults.maxSubmissionPages;
        const collected: RawSubmission[] = [];
        let lastKey: string | null = null;
        let hasNext = true;
        for (let page = 0; page < maxPages && hasNext; page++) {
            const result: Outcome<SubmissionListData> = await this.query('submissionList', SUBMISSION_LIST_QUERY,
                { questionSlug: slug, offset: page * limit, limit, lastKey }, submissionListSchema,
                fillUrl(config.urls.submissions, { slug, page: 1 }));
            if (!result.ok) {
                return result;
            }
            const list: SubmissionListData['questionSubmissionList'] = result.value.questionSubmissionList;
            if (!list) {
                return fail(new UnavailableError(`Submission list for ${slug} not returned by GraphQL`));
            }
            collected.push(...list.submissions);
            hasNext = list.hasNext && list.submissions.length > 0;
            lastKey = list.lastKey ?? null;
        }
        if (hasNext) {
            this.logger.warn(`[graphql] Submission history of ${slug} truncated at ${maxPages} pages (${collected.length} submissions)`);
        }
        return succeed(collected);
    }

    private query<T>(
        operationName: string,
        query: string,
        variables: Record<string, unknown>,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        referer?: string,
    ): Promise<Outcome<T>> {
        const req: ClientRequest<T> = {
            method: 'POST',
            url: config.urls.graphql,
            body: { operationName, query, variables },
            referer,
            accept: 'application/json',
            decode: (response) => mapOutcome(
                jsonBody(envelopeSchema)(response),
                ({ data }) => validateShape(schema, data, `${operationName} data`, response.statusCode),
            ),
        };
        this.logger.debug(`[graphql] ${operationName} ${JSON.stringify(variables)}`);
        return this.client.execute(req);
    }
}
