/**
 * Stderr Logger
 *
 * stdout belongs to the MCP client while a session is running, so every log
 * level goes to stderr. The level comes from LOG_LEVEL (default "info");
 * "silent" turns logging off entirely.
 */

import winston from 'winston';
import _ from 'lodash';

export interface Logger {
    debug(infoObject: Record<string, unknown>, message?: string): Logger
    debug(message: string, ...meta: unknown[]): Logger
    info(infoObject: Record<string, unknown>, message?: string): Logger
    info(message: string, ...meta: unknown[]): Logger
    warn(infoObject: Record<string, unknown>, message?: string): Logger
    warn(message: string, ...meta: unknown[]): Logger
    error(infoObject: Record<string, unknown>, message?: string): Logger
    error(message: string, ...meta: unknown[]): Logger
}

type Level = 'debug' | 'info' | 'warn' | 'error';

function createStderrLogger(level: string): winston.Logger {
    return winston.createLogger({
        level:  level === 'silent' ? 'error' : level,
        silent: level === 'silent',
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ),
        transports: [
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'info', 'debug'], // ALL levels to stderr
            }),
        ],
    });
}

let current: winston.Logger = createStderrLogger(process.env.LOG_LEVEL ?? 'info');

/**
 * Replace the underlying winston logger, e.g. after the CLI parsed --log-level
 */
export function configureLogger(level: string): void {
    current = createStderrLogger(level);
}

function write(level: Level, infoObjectOrMessage: Record<string, unknown> | string, meta: unknown[]): void {
    if(_.isString(infoObjectOrMessage)) {
        current.log(level, infoObjectOrMessage, ...meta);
        return;
    }
    const [message] = meta;
    current.log(level, _.isString(message) ? message : '', infoObjectOrMessage);
}

function createDelegatingLogger(): Logger {
    const delegate = (level: Level) => (infoObjectOrMessage: Record<string, unknown> | string, ...meta: unknown[]): Logger => {
        write(level, infoObjectOrMessage, meta);
        return logger;
    };
    return {
        debug: delegate('debug'),
        info:  delegate('info'),
        warn:  delegate('warn'),
        error: delegate('error'),
    };
}

/**
 * Shared logger; delegates to whichever winston instance is current at call time
 */
export const logger: Logger = createDelegatingLogger();
