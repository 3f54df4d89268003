export enum Color {
    red = "\x1b[31m",
    green = "\x1b[32m",
    yellow = "\x1b[33m",
    grey = "\x1b[90m",
}

const RESET = "\x1b[0m";

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_COLORS: Record<LogLevel, Color> = {
    debug: Color.grey,
    info: Color.green,
    warn: Color.yellow,
    error: Color.red,
};

export type ConsoleLoggerOptions = {
    level?: LogLevel,
    colors?: boolean,
    /** Defaults to stderr so stdout stays free for the JSON document. */
    write?: (line: string) => void,
}

/**
 * Level-prefixed progress lines, colored when the terminal allows it.
 */
export class ConsoleLogger implements Logger {
    private readonly level: LogLevel;
    private readonly colors: boolean;
    private readonly write: (line: string) => void;

    constructor(options: ConsoleLoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.colors = options.colors ?? true;
        this.write = options.write ?? ((line) => console.error(line));
    }

    public debug(message: string) {
        this.print('debug', message);
    }
    public info(message: string) {
        this.print('info', message);
    }
    public warn(message: string) {
        this.print('warn', message);
    }
    public error(message: string) {
        this.print('error', message);
    }

    private print(level: LogLevel, message: string) {
        if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
            return;
        }
        const tag = level.toUpperCase().padEnd(5);
        this.write(this.colors ? `${LEVEL_COLORS[level]}${tag}${RESET} ${message}` : `${tag} ${message}`);
    }
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
