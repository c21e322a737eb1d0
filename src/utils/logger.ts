/**
 * Logger Module
 * Levelled component logging with pino: a chalk-coloured console stream for
 * every enabled level, plus a JSON log file for warnings and errors.
 */

import chalk from 'chalk';
import pino, { type Logger as PinoLogger } from 'pino';
import { z } from 'zod';
import { config, LogLevel } from '../config/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    /** Warnings and errors are also written here as JSON lines. */
    file?: string;
}

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
};

const logRecordSchema = z
    .object({
        level: z.number(),
        time: z.string(),
        name: z.string().optional(),
        msg: z.string().default(''),
    })
    .passthrough();

function levelFor(value: number): LogLevel {
    if (value >= pino.levels.values.error) return 'error';
    if (value >= pino.levels.values.warn) return 'warn';
    if (value >= pino.levels.values.info) return 'info';
    return 'debug';
}

/**
 * Renders pino's JSON lines through console so output stays readable.
 */
function consoleStream(): pino.DestinationStream {
    return {
        write(line: string): void {
            const record: unknown = JSON.parse(line);
            const parsed = logRecordSchema.safeParse(record);
            if (!parsed.success) {
                console.log(line.trimEnd());
                return;
            }

            const { level: levelValue, time, name, msg, ...context } = parsed.data;
            const level = levelFor(levelValue);
            const suffix = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
            const text = `${chalk.gray(time)} ${LEVEL_STYLE[level](level.toUpperCase().padEnd(5))} ${chalk.cyan(`[${name ?? ''}]`)} ${msg}${suffix}`;

            switch (level) {
                case 'debug':
                    console.debug(text);
                    break;
                case 'info':
                    console.info(text);
                    break;
                case 'warn':
                    console.warn(text);
                    break;
                case 'error':
                    console.error(text);
                    break;
            }
        },
    };
}

/**
 * Thin wrapper over a pino logger keeping the `(message, context)` call shape
 * the services use.
 */
export class Logger {
    private readonly component: string;
    private readonly level: LogLevel;
    private readonly file?: string;
    private readonly pino: PinoLogger;

    constructor(component: string, options: LoggerOptions = {}) {
        this.component = component;
        this.level = options.level ?? config.logging.level;
        this.file = options.file ?? config.logging.file;

        const streams: pino.StreamEntry[] = [{ level: 'debug', stream: consoleStream() }];
        if (this.file) {
            streams.push({
                level: 'warn',
                stream: pino.destination({ dest: this.file, sync: true, mkdir: true }),
            });
        }

        this.pino = pino(
            {
                name: component,
                level: this.level,
                base: {},
                timestamp: pino.stdTimeFunctions.isoTime,
            },
            pino.multistream(streams)
        );
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.pino.debug(context ?? {}, message);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.pino.info(context ?? {}, message);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.pino.warn(context ?? {}, message);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.pino.error(context ?? {}, message);
    }

    child(component: string): Logger {
        return new Logger(`${this.component}:${component}`, { level: this.level, file: this.file });
    }

    isEnabled(level: LogLevel): boolean {
        return this.pino.isLevelEnabled(level);
    }
}

export function createLogger(component: string, options?: LoggerOptions): Logger {
    return new Logger(component, options);
}
