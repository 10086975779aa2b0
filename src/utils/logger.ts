import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    jsonLogs?: boolean;
    /** Write log lines here instead of stdout */
    destination?: DestinationStream;
}

type Output = DestinationStream & { end?: () => void };

/**
 * Stream the process-wide logger writes through. `configure()` picks where
 * lines go; the output itself is opened on the first write, so a run that
 * never logs starts no pretty-print worker.
 */
class SwitchableOutput implements DestinationStream {
    private options: LoggerOptions = {};
    private output: Output | null = null;
    private owned = false;

    configure(options: LoggerOptions): void {
        if (this.owned) this.output?.end?.();
        this.options = options;
        this.output = null;
        this.owned = false;
    }

    write(line: string): void {
        if (!this.output) {
            this.output = this.open();
        }
        this.output.write(line);
    }

    private open(): Output {
        const { destination, jsonLogs = false } = this.options;
        if (destination) return destination;
        if (jsonLogs) return pino.destination(1);

        this.owned = true;
        return pino.transport({
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
            },
        });
    }
}

const output = new SwitchableOutput();
let loggerInstance: Logger | null = null;

/**
 * The process-wide logger. Modules hold on to it from import time, so it is
 * created once and only ever reconfigured. Starts at `SLRSEARCH_LOG_LEVEL`
 * (default info) with pretty output.
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: parseLogLevel(process.env['SLRSEARCH_LOG_LEVEL']) }, output);
    }
    return loggerInstance;
}

/**
 * Set the level and output of the shared logger. Called at CLI startup once
 * the configuration is resolved; every module logger follows.
 */
export function initLogger(options: LoggerOptions): Logger {
    const logger = getLogger();
    logger.level = options.level ?? 'info';
    output.configure(options);
    return logger;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Narrow an arbitrary string to a LogLevel, falling back to info.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    return LOG_LEVELS.find((level) => level === value) ?? 'info';
}
