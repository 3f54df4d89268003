export type FailureKind = 'auth' | 'rate_limited' | 'network' | 'unavailable' | 'parse';

/** Session cookies were rejected or have expired. Never retried, never worked around. */
export class AuthenticationError extends Error {
    public readonly kind = 'auth' as const;
    constructor(message = 'Authentication failed: invalid or expired cookies') {
        super(message);
        this.name = 'AuthenticationError';
    }
}

export class RateLimitedError extends Error {
    public readonly kind = 'rate_limited' as const;
    /** Server-requested wait before the next attempt, when it sent one. */
    public readonly retryAfterMs?: number;
    constructor(message = 'Rate limited', retryAfterMs?: number) {
        super(message);
        this.name = 'RateLimitedError';
        this.retryAfterMs = retryAfterMs;
    }
}

export class NetworkError extends Error {
    public readonly kind = 'network' as const;
    public readonly code?: string;
    constructor(message: string, code?: string) {
        super(message);
        this.name = 'NetworkError';
        this.code = code;
    }
}

/**
 * The request went through but did not produce what was asked for: a markup page
 * where JSON was expected, a body failing its schema, or a non-success status.
 */
export class UnavailableError extends Error {
    public readonly kind = 'unavailable' as const;
    public readonly status?: number;
    constructor(message: string, status?: number) {
        super(message);
        this.name = 'UnavailableError';
        this.status = status;
    }
}

export class ParseError extends Error {
    public readonly kind = 'parse' as const;
    constructor(message: string) {
        super(message);
        this.name = 'ParseError';
    }
}

export class CredentialsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CredentialsError';
    }
}

export type FetchError = AuthenticationError | RateLimitedError | NetworkError | UnavailableError | ParseError;

export type Outcome<T> =
    | { ok: true, value: T }
    | { ok: false, error: FetchError };

export function succeed<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function fail<T>(error: FetchError): Outcome<T> {
    return { ok: false, error };
}

export function mapOutcome<T, U>(outcome: Outcome<T>, fn: (value: T) => Outcome<U>): Outcome<U> {
    return outcome.ok ? fn(outcome.value) : outcome;
}

export function isRetryable(error: FetchError): boolean {
    return error.kind === 'rate_limited' || error.kind === 'network';
}
