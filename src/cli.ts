import { HttpSend, createCredentials } from "./client";
import { ConsoleLogger, Logger } from "./console";
import { AuthenticationError, CredentialsError } from "./errors";
import { fetchHistory } from "./fetcher";
import { serializeDocument, writeDocument } from "./output";
import { SettingsError, USAGE, parseArgs, resolveSettings } from "./settings";

export type CliDeps = {
    env?: NodeJS.ProcessEnv,
    stdout?: (text: string) => void,
    logger?: Logger,
    send?: HttpSend,
    sleep?: (ms: number) => Promise<void>,
    signal?: AbortSignal,
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/** Runs one export and resolves with the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
    const env = deps.env ?? process.env;
    const stdout = deps.stdout ?? ((text: string) => { process.stdout.write(text); });
    let logger: Logger = deps.logger ?? new ConsoleLogger({ colors: !env.NO_COLOR });

    try {
        const options = parseArgs(argv);
        if (options.help) {
            stdout(USAGE + '\n');
            return EXIT_OK;
        }
        const settings = resolveSettings(options, env);
        logger = deps.logger ?? new ConsoleLogger({ level: settings.logLevel, colors: !env.NO_COLOR });
        const credentials = createCredentials(settings.username, settings.sessionToken, settings.csrfToken);

        logger.info(`Fetching data for user: ${credentials.username}`);
        const result = await fetchHistory(credentials, {
            logger,
            send: deps.send,
            sleep: deps.sleep,
            signal: deps.signal,
            timeoutMs: settings.timeoutMs,
            problemDelayMs: settings.problemDelayMs,
            policy: {
                maxAttempts: settings.maxAttempts,
                baseDelayMs: settings.baseDelayMs,
                maxDelayMs: settings.maxDelayMs,
            },
        });

        if (settings.outFile) {
            writeDocument(settings.outFile, result, settings.pretty);
            logger.info(`Wrote ${result.problems.length} problems to ${settings.outFile}`);
        } else {
            stdout(serializeDocument(result, settings.pretty) + '\n');
        }

        if (deps.signal?.aborted) {
            return EXIT_INTERRUPTED;
        }
        logger.info(`Successfully fetched and processed data for ${credentials.username}.`);
        return EXIT_OK;
    } catch (error: unknown) {
        if (error instanceof SettingsError || error instanceof CredentialsError) {
            logger.error(error.message);
            logger.info(`Run with --help for usage`);
        } else if (error instanceof AuthenticationError) {
            logger.error(`${error.message}. Copy fresh LEETCODE_SESSION and csrftoken cookies from a signed-in browser.`);
        } else {
            logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        }
        return EXIT_FAILURE;
    }
}
