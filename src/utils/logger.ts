/**
 * Stderr Logger
 *
 * Every log record goes to stderr so stdout stays free for protocol
 * and CLI output.
 *
 * - silentLogger: no-op logger, selected with LOG_LEVEL=silent
 * - createStderrLogger: winston JSON logger writing all levels to stderr
 * - dynamicLogger: picks one of the two on every call
 */

import winston from 'winston';
import _ from 'lodash';

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(fields: LogFields, message?: string): Logger
    debug(message: string, ...meta: unknown[]): Logger
    info(fields: LogFields, message?: string): Logger
    info(message: string, ...meta: unknown[]): Logger
    warn(fields: LogFields, message?: string): Logger
    warn(message: string, ...meta: unknown[]): Logger
    error(fields: LogFields, message?: string): Logger
    error(message: string, ...meta: unknown[]): Logger
}

type LevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Shared front for every logger: both call styles funnel into emit()
 */
abstract class BaseLogger implements Logger {
    abstract emit(level: LevelName, args: unknown[]): void;

    debug(...args: unknown[]): Logger {
        this.emit('debug', args);
        return this;
    }

    info(...args: unknown[]): Logger {
        this.emit('info', args);
        return this;
    }

    warn(...args: unknown[]): Logger {
        this.emit('warn', args);
        return this;
    }

    error(...args: unknown[]): Logger {
        this.emit('error', args);
        return this;
    }
}

class SilentLogger extends BaseLogger {
    override emit(_level: LevelName, _args: unknown[]): void {
        // no-op
    }
}

/**
 * Accepts `logger.info({ serverName }, 'message')` and `logger.info('message', ...meta)`
 */
class WinstonStderrLogger extends BaseLogger {
    constructor(private readonly winstonLogger: winston.Logger) {
        super();
    }

    override emit(level: LevelName, args: unknown[]): void {
        const [first, second, ...rest] = args;
        if(_.isString(first)) {
            this.winstonLogger.log(level, first, ...(second === undefined ? rest : [second, ...rest]));
            return;
        }
        this.winstonLogger.log(level, _.isString(second) ? second : '', _.isObject(first) ? first : { value: first });
    }
}

function createWinstonLogger(level: string, stream: NodeJS.WritableStream): BaseLogger {
    const winstonLogger = winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ),
        transports: [
            new winston.transports.Stream({ stream }),
        ],
    });
    return new WinstonStderrLogger(winstonLogger);
}

/**
 * Winston JSON logger writing every level to one stream (stderr unless given)
 */
export function createStderrLogger(level: string, stream: NodeJS.WritableStream = process.stderr): Logger {
    return createWinstonLogger(level, stream);
}

const silentSink = new SilentLogger();

export const silentLogger: Logger = silentSink;

const stderrLoggers = new Map<string, BaseLogger>();

/**
 * Logger for the current LOG_LEVEL, read at call time so that changes
 * made after module load (CLI flags, tests) take effect.
 */
function getLogger(): BaseLogger {
    const level = process.env.LOG_LEVEL ?? 'info';
    if(level === 'silent') {
        return silentSink;
    }

    let logger = stderrLoggers.get(level);
    if(!logger) {
        logger = createWinstonLogger(level, process.stderr);
        stderrLoggers.set(level, logger);
    }
    return logger;
}

class LazyLogger extends BaseLogger {
    override emit(level: LevelName, args: unknown[]): void {
        getLogger().emit(level, args);
    }
}

export const dynamicLogger: Logger = new LazyLogger();
