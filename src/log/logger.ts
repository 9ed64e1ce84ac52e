/**
 * @file Logger
 *
 * Level-filtered console logger with chalk styling. Library code takes
 * a `Logger` and defaults to `silentLogger`; hosts create a console
 * logger from the resolved settings.
 *
 * @module log
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Prefix shown in brackets before every line. */
    scope?: string;
    /** Force colour on or off; chalk's detection applies when omitted. */
    color?: boolean;
    /** Line sink; defaults to stderr so stdout stays free for plan output. */
    sink?: (line: string) => void;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_LABELS: Record<EmittingLevel, string> = {
    debug: 'DEBUG',
    info: 'INFO',
    warn: 'WARN',
    error: 'ERROR',
};

export const silentLogger: Logger = {
    debug: (): void => {},
    info: (): void => {},
    warn: (): void => {},
    error: (): void => {},
};

/**
 * Parse a level name, ignoring case and surrounding whitespace.
 * Returns undefined for anything that is not a known level.
 */
export function logLevel_parse(raw: string | undefined): LogLevel | undefined {
    if (raw === undefined) return undefined;
    const normalized: string = raw.trim().toLowerCase();
    return LOG_LEVELS.find((level: LogLevel): boolean => level === normalized);
}

/**
 * Create a console logger.
 *
 * Lines look like `[bake-graph] INFO resolved 3 targets`.
 */
export function logger_create(options: LoggerOptions = {}): Logger {
    const threshold: number = LOG_LEVELS.indexOf(options.level ?? 'info');
    const scope: string = options.scope ?? 'bake-graph';
    const sink: (line: string) => void = options.sink ?? ((line: string): void => console.error(line));
    const paint: ChalkInstance = painter_resolve(options.color);

    const emit = (level: EmittingLevel, message: string): void => {
        if (LOG_LEVELS.indexOf(level) < threshold) return;
        sink(`${paint.dim(`[${scope}]`)} ${label_style(paint, level)} ${message}`);
    };

    return {
        debug: (message: string): void => emit('debug', message),
        info: (message: string): void => emit('info', message),
        warn: (message: string): void => emit('warn', message),
        error: (message: string): void => emit('error', message),
    };
}

function painter_resolve(color: boolean | undefined): ChalkInstance {
    if (color === undefined) return chalk;
    return new Chalk({ level: color ? 1 : 0 });
}

function label_style(paint: ChalkInstance, level: EmittingLevel): string {
    const label: string = LEVEL_LABELS[level];
    switch (level) {
        case 'debug':
            return paint.gray(label);
        case 'info':
            return paint.cyan(label);
        case 'warn':
            return paint.yellow(label);
        case 'error':
            return paint.red.bold(label);
    }
}
