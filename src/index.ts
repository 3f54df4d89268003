export { LeetCodeClient, createCredentials, requestSend, classifyResponse, jsonBody, markupBody } from "./client";
export type { ClientOptions, ClientRequest, Decoder, HttpRequest, HttpResponse, HttpSend } from "./client";
export { ConsoleLogger, silentLogger } from "./console";
export type { Logger, LogLevel } from "./console";
export {
    AuthenticationError,
    CredentialsError,
    NetworkError,
    ParseError,
    RateLimitedError,
    UnavailableError,
} from "./errors";
export type { FailureKind, FetchError, Outcome } from "./errors";
export { LeetCodeFetcher, fetchHistory, nextStep } from "./fetcher";
export type { FetcherOptions, HistoryOptions } from "./fetcher";
export { GraphQLTransport } from "./graphql";
export { MarkupTransport } from "./scraper";
export { parseDocument, serializeDocument, toDocument, fromDocument, writeDocument } from "./output";
export type { HistoryDocument } from "./output";
export type {
    Credentials,
    Difficulty,
    ExportedProblem,
    FetchResult,
    HistoryTransport,
    Problem,
    ProblemRecord,
    ProfileStats,
    Submission,
} from "./types";
