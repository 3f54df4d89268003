import { z } from "zod";
import config from "./config"

export type CliOptions = {
    username?: string,
    session?: string,
    csrf?: string,
    out?: string,
    maxAttempts?: string,
    timeout?: string,
    delay?: string,
    pretty: boolean,
    verbose: boolean,
    help: boolean,
}

export const USAGE = `Usage: leetcode-history-export [options]

Options:
  --username <name>     LeetCode username (env LEETCODE_USERNAME)
  --session <cookie>    LEETCODE_SESSION cookie value (env LEETCODE_SESSION)
  --csrf <token>        csrftoken cookie value (env LEETCODE_CSRF)
  --out <file>          Write the JSON document to a file instead of stdout
  --pretty              Indent the JSON document
  --max-attempts <n>    Attempts per request before giving up (default ${config.defaults.maxAttempts})
  --timeout <ms>        Per-request timeout (default ${config.defaults.timeoutMs})
  --delay <ms>          Pause between problems (default ${config.defaults.cliProblemDelayMs})
  --verbose             Debug logging
  --help                Show this message`;

export class SettingsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SettingsError';
    }
}

export function parseArgs(argv: string[]): CliOptions {
    const opts: CliOptions = {
        pretty: false,
        verbose: false,
        help: false,
    };

    const value = (index: number, flag: string): string => {
        const next = argv[index + 1];
        if (next === undefined || next.startsWith('--')) {
            throw new SettingsError(`${flag} needs a value`);
        }
        return next;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '--username':
                opts.username = value(i++, arg);
                break;
            case '--session':
                opts.session = value(i++, arg);
                break;
            case '--csrf':
                opts.csrf = value(i++, arg);
                break;
            case '--out':
                opts.out = value(i++, arg);
                break;
            case '--max-attempts':
                opts.maxAttempts = value(i++, arg);
                break;
            case '--timeout':
                opts.timeout = value(i++, arg);
                break;
            case '--delay':
                opts.delay = value(i++, arg);
                break;
            case '--pretty':
                opts.pretty = true;
                break;
            case '--verbose':
                opts.verbose = true;
                break;
            case '--help':
            case '-h':
                opts.help = true;
                break;
            default:
                throw new SettingsError(`Unknown argument: ${arg}`);
        }
    }
    return opts;
}

const count = z.coerce.number().int().nonnegative();

const settingsSchema = z.object({
    username: z.string().trim().min(1, 'is required (--username or LEETCODE_USERNAME)'),
    sessionToken: z.string().trim().min(1, 'is required (--session or LEETCODE_SESSION)'),
    csrfToken: z.string().trim().min(1, 'is required (--csrf or LEETCODE_CSRF)'),
    outFile: z.string().trim().min(1).optional(),
    pretty: z.boolean(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    maxAttempts: z.coerce.number().int().min(1).max(10),
    baseDelayMs: count,
    maxDelayMs: count,
    timeoutMs: z.coerce.number().int().positive(),
    problemDelayMs: count,
});

export type Settings = z.infer<typeof settingsSchema>;

/** Flags win over the environment, the environment over built-in defaults. */
export function resolveSettings(options: CliOptions, env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = settingsSchema.safeParse({
        username: options.username ?? env.LEETCODE_USERNAME ?? '',
        sessionToken: options.session ?? env.LEETCODE_SESSION ?? '',
        csrfToken: options.csrf ?? env.LEETCODE_CSRF ?? '',
        outFile: options.out ?? env.LEETCODE_OUT,
        pretty: options.pretty,
        logLevel: options.verbose ? 'debug' : env.LOG_LEVEL ?? 'info',
        maxAttempts: options.maxAttempts ?? env.LEETCODE_MAX_ATTEMPTS ?? config.defaults.maxAttempts,
        baseDelayMs: env.LEETCODE_BASE_DELAY_MS ?? config.defaults.baseDelayMs,
        maxDelayMs: env.LEETCODE_MAX_DELAY_MS ?? config.defaults.maxDelayMs,
        timeoutMs: options.timeout ?? env.LEETCODE_TIMEOUT_MS ?? config.defaults.timeoutMs,
        problemDelayMs: options.delay ?? env.LEETCODE_PROBLEM_DELAY_MS ?? config.defaults.cliProblemDelayMs,
    });
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
        throw new SettingsError(`Invalid settings: ${problems.join('; ')}`);
    }
    return parsed.data;
}
