import request from "request"
import { z } from "zod";
import type * as cheerio from "cheerio";
import config from "./config"
import { Logger, silentLogger } from "./console";
import {
    AuthenticationError,
    CredentialsError,
    FetchError,
    NetworkError,
    Outcome,
    RateLimitedError,
    UnavailableError,
    fail,
    isRetryable,
    succeed,
} from "./errors";
import { RetryPolicy, parseRetryAfter, retryDelay, sleep } from "./helper";
import { loadHtml } from "./markup";
import type { Credentials } from "./types";

export type HttpMethod = 'GET' | 'POST';

export type HttpRequest = {
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string,
    timeoutMs: number,
}

export type HttpResponse = {
    statusCode: number,
    headers: Record<string, string | string[] | undefined>,
    body: string,
    /** url after redirects */
    finalUrl: string,
}

/** The raw HTTP layer; swapped for an in-process fake in tests. */
export type HttpSend = (req: HttpRequest) => Promise<HttpResponse>;

/** Turns a successful response into the value the caller asked for. */
export type Decoder<T> = (response: HttpResponse) => Outcome<T>;

export type ClientRequest<T> = {
    method: HttpMethod,
    url: string,
    /** serialized as JSON */
    body?: unknown,
    referer?: string,
    accept: string,
    decode: Decoder<T>,
}

export type ClientOptions = {
    send?: HttpSend,
    sleep?: (ms: number) => Promise<void>,
    random?: () => number,
    policy?: Partial<RetryPolicy>,
    timeoutMs?: number,
    logger?: Logger,
}

export const requestSend: HttpSend = (req) => new Promise((resolve, reject) => {
    request({
        url: req.url,
        method: req.method,
        headers: req.headers,
        body: req.body,
        timeout: req.timeoutMs,
        followAllRedirects: true,
    }, (error, response, body) => {
        if (error) {
            reject(error);
            return;
        }
        resolve({
            statusCode: response.statusCode,
            headers: response.headers,
            body: typeof body === 'string' ? body : String(body ?? ''),
            finalUrl: response.request.uri.href,
        });
    });
});

export function createCredentials(username: string, sessionToken: string, csrfToken: string): Credentials {
    const credentials = {
        username: username.trim(),
        sessionToken: sessionToken.trim(),
        csrfToken: csrfToken.trim(),
    };
    for (const [field, value] of Object.entries(credentials)) {
        if (!value) {
            throw new CredentialsError(`Credentials are incomplete: ${field} is empty`);
        }
    }
    return Object.freeze(credentials);
}

// ─── decoders ──────────────────────────────────────────────────────

export function jsonBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Decoder<T> {
    return (response) => {
        const text = response.body.trimStart();
        if (text.startsWith('<')) {
            return fail(new UnavailableError(`Expected JSON from ${response.finalUrl} but received markup`, response.statusCode));
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            return fail(new UnavailableError(`Invalid JSON from ${response.finalUrl}: ${reason}`, response.statusCode));
        }
        return validateShape(schema, parsed, response.finalUrl, response.statusCode);
    };
}

/** A body that parsed but does not have the expected fields is unavailable, not malformed. */
export function validateShape<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, source: string, status?: number): Outcome<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        return fail(new UnavailableError(
            `Unexpected response shape from ${source}: ${issue.path.join('.') || '(root)'} ${issue.message}`,
            status,
        ));
    }
    return succeed(result.data);
}

export const markupBody: Decoder<cheerio.CheerioAPI> = (response) => {
    const text = response.body.trim();
    if (!text) {
        return fail(new UnavailableError(`Empty page from ${response.finalUrl}`, response.statusCode));
    }
    if (text.startsWith('{') || text.startsWith('[')) {
        return fail(new UnavailableError(`Expected markup from ${response.finalUrl} but received JSON`, response.statusCode));
    }
    return succeed(loadHtml(text));
};

// ─── classification ────────────────────────────────────────────────

const bodyErrorsSchema = z.object({
    errors: z.array(z.object({ message: z.string() })).optional(),
    error: z.string().optional(),
    detail: z.string().optional(),
});

const AUTH_MESSAGE = /not (authenticated|logged in|signed in)|login required|session (has )?expired|authentication credentials were not provided/i;
const RATE_LIMIT_MESSAGE = /rate.?limit|too many requests|too soon/i;

function bodyMessages(body: string): string[] {
    const text = body.trimStart();
    if (!text.startsWith('{')) {
        return [];
    }
    try {
        const parsed = bodyErrorsSchema.safeParse(JSON.parse(text));
        if (!parsed.success) {
            return [];
        }
        const { errors = [], error, detail } = parsed.data;
        return [...errors.map(e => e.message), error ?? '', detail ?? ''].filter(Boolean);
    } catch {
        // not JSON: the decoder reports it
        return [];
    }
}

/** Maps a response to the failure it represents, or undefined when it can be decoded. */
export function classifyResponse(response: HttpResponse): FetchError | undefined {
    const { statusCode, headers, finalUrl } = response;
    if (finalUrl.startsWith(config.urls.login)) {
        return new AuthenticationError('Session expired: redirected to the login page');
    }
    if (statusCode === 401 || statusCode === 403) {
        return new AuthenticationError(`Authentication failed: ${finalUrl} answered ${statusCode}`);
    }
    if (statusCode === 429) {
        return new RateLimitedError(`Rate limited by ${finalUrl}`, parseRetryAfter(headers['retry-after']));
    }
    if (statusCode === 503 && headers['retry-after'] !== undefined) {
        return new RateLimitedError(`${finalUrl} is throttling requests`, parseRetryAfter(headers['retry-after']));
    }
    if (statusCode < 200 || statusCode >= 300) {
        return new UnavailableError(`Request to ${finalUrl} failed with status code: ${statusCode}`, statusCode);
    }
    for (const message of bodyMessages(response.body)) {
        if (AUTH_MESSAGE.test(message)) {
            return new AuthenticationError(`Authentication failed: ${message}`);
        }
        if (RATE_LIMIT_MESSAGE.test(message)) {
            return new RateLimitedError(message, parseRetryAfter(headers['retry-after']));
        }
    }
    return undefined;
}

function toNetworkError(error: unknown, url: string): NetworkError {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return new NetworkError(`Request to ${url} failed: ${error.message}`, code);
    }
    return new NetworkError(`Request to ${url} failed: ${String(error)}`);
}

// ─── client ────────────────────────────────────────────────────────

/**
 * Authenticated HTTP for one fetch run. Attaches the session cookies to every
 * request and retries rate-limited and network failures with exponential backoff.
 * Everything else is returned to the caller on the first attempt.
 */
export class LeetCodeClient {
    private readonly send: HttpSend;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;
    private readonly policy: RetryPolicy;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly credentials: Credentials;

    constructor(credentials: Credentials, options: ClientOptions = {}) {
        this.credentials = createCredentials(credentials.username, credentials.sessionToken, credentials.csrfToken);
        this.send = options.send ?? requestSend;
        this.sleep = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;
        this.policy = {
            maxAttempts: options.policy?.maxAttempts ?? config.defaults.maxAttempts,
            baseDelayMs: options.policy?.baseDelayMs ?? config.defaults.baseDelayMs,
            maxDelayMs: options.policy?.maxDelayMs ?? config.defaults.maxDelayMs,
            jitter: options.policy?.jitter ?? config.defaults.jitter,
        };
        this.timeoutMs = options.timeoutMs ?? config.defaults.timeoutMs;
        this.logger = options.logger ?? silentLogger;
    }

    public async execute<T>(req: ClientRequest<T>): Promise<Outcome<T>> {
        let outcome: Outcome<T> = fail(new NetworkError(`No attempt made for ${req.url}`));
        for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
            outcome = await this.attempt(req);
            if (outcome.ok || !isRetryable(outcome.error)) {
                return outcome;
            }
            if (attempt === this.policy.maxAttempts) {
                break;
            }
            const retryAfter = outcome.error instanceof RateLimitedError ? outcome.error.retryAfterMs : undefined;
            const wait = retryDelay(attempt, this.policy, retryAfter, this.random);
            this.logger.debug(`${outcome.error.message}; retrying in ${wait} ms (attempt ${attempt + 1}/${this.policy.maxAttempts})`);
            await this.sleep(wait);
        }
        if (!outcome.ok) {
            this.logger.debug(`Giving up on ${req.url} after ${this.policy.maxAttempts} attempts`);
        }
        return outcome;
    }

    private async attempt<T>(req: ClientRequest<T>): Promise<Outcome<T>> {
        let response: HttpResponse;
        try {
            response = await this.send(this.makeOpts(req));
        } catch (error) {
            return fail(toNetworkError(error, req.url));
        }
        const failure = classifyResponse(response);
        if (failure) {
            return fail(failure);
        }
        return req.decode(response);
    }

    private makeOpts<T>(req: ClientRequest<T>): HttpRequest {
        const opts: HttpRequest = {
            method: req.method,
            url: req.url,
            headers: {
                'User-Agent': config.userAgent,
                'Accept': req.accept,
                'Referer': req.referer ?? config.urls.base,
                'Origin': config.urls.base,
            },
            timeoutMs: this.timeoutMs,
        };
        if (req.body !== undefined) {
            opts.body = JSON.stringify(req.body);
            opts.headers['Content-Type'] = 'application/json';
        }
        this.signOpts(opts);
        return opts;
    }

    private signOpts(opts: HttpRequest): void {
        opts.headers.Cookie = 'LEETCODE_SESSION=' + this.credentials.sessionToken +
            ';csrftoken=' + this.credentials.csrfToken + ';';
        opts.headers['X-CSRFToken'] = this.credentials.csrfToken;
        opts.headers['X-Requested-With'] = 'XMLHttpRequest';
    }
}
