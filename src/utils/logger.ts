// src/utils/logger.ts
import pino from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

// Log levels exposed to callers; OK is the fine-grained debug level.
export enum LogLevel {
    OK = 'OK',       // Maps to debug
    INFO = 'INFO',   // Maps to info
    WARN = 'WARN',   // Maps to warn
    ERROR = 'ERROR'  // Maps to error
}

// Configuration for the logger
export interface LoggerConfig {
    level?: string | undefined;
    pretty?: boolean | undefined;
    redactPaths?: string[] | undefined;
}

type PinoLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_MAP: Record<string, PinoLevel | 'silent'> = {
    'OK': 'debug',
    'INFO': 'info',
    'WARN': 'warn',
    'ERROR': 'error',
    'SILENT': 'silent'
};

let globalConfig: LoggerConfig = {};
let root: PinoLogger | undefined;
let generation = 0;

function buildRoot(config: LoggerConfig): PinoLogger {
    const configured = config.level ?? process.env.LOG_LEVEL;
    const level = configured ? LEVEL_MAP[configured.toUpperCase()] ?? 'info' : 'info';

    const options: LoggerOptions = {
        level,
        name: 'recordquery',

        // Records and query operands may carry credentials
        redact: {
            paths: config.redactPaths ?? [
                'password',
                'token',
                'secret',
                '*.password',
                '*.token',
                '*.secret'
            ],
            remove: true
        },

        serializers: {
            err: pino.stdSerializers.err,
            error: pino.stdSerializers.err
        },

        base: {
            env: process.env.NODE_ENV || 'development'
        },

        timestamp: pino.stdTimeFunctions.isoTime
    };

    // Only add transport if pretty printing is enabled
    if (config.pretty ?? process.env.LOG_PRETTY === 'true') {
        options.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                messageFormat: '[{component}] {msg}'
            }
        };
    }

    return pino(options);
}

function rootLogger(): PinoLogger {
    root ??= buildRoot(globalConfig);
    return root;
}

/**
 * Component logger backed by a shared pino instance.
 */
export class Log {
    private cached: PinoLogger | undefined;
    private cachedGeneration = -1;

    private constructor(private readonly component: string) {}

    /**
     * Get the logger for a component, e.g. `Log.getLog('QueryParser')`.
     */
    static getLog(component: string): Log {
        return new Log(component);
    }

    // Resolved on use so module-level loggers follow configureLogging()
    private get pino(): PinoLogger {
        if (this.cached === undefined || this.cachedGeneration !== generation) {
            this.cached = rootLogger().child({ component: this.component });
            this.cachedGeneration = generation;
        }
        return this.cached;
    }

    isLoggable(level: LogLevel): boolean {
        return this.pino.isLevelEnabled(this.mapLevel(level));
    }

    isOk(): boolean {
        return this.pino.isLevelEnabled('debug');
    }

    ok(message: string, context?: Record<string, unknown>): void {
        this.write(LogLevel.OK, message, context, undefined);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.write(LogLevel.INFO, message, context, undefined);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.write(LogLevel.WARN, message, context, undefined);
    }

    error(message: string, context?: Record<string, unknown>, ex?: Error): void {
        this.write(LogLevel.ERROR, message, context, ex);
    }

    private write(
        level: LogLevel,
        message: string,
        context: Record<string, unknown> | undefined,
        ex: Error | undefined
    ): void {
        const pinoLevel = this.mapLevel(level);
        if (!this.pino.isLevelEnabled(pinoLevel)) return;

        const logContext: Record<string, unknown> = { ...(context ?? {}) };
        if (ex !== undefined) {
            logContext.err = ex;
        }
        this.pino[pinoLevel](logContext, message);
    }

    private mapLevel(level: LogLevel): PinoLevel {
        switch (level) {
            case LogLevel.OK:
                return 'debug';
            case LogLevel.INFO:
                return 'info';
            case LogLevel.WARN:
                return 'warn';
            case LogLevel.ERROR:
                return 'error';
        }
    }
}

export function getLog(component: string): Log {
    return Log.getLog(component);
}

/**
 * Replace the logging configuration for every logger, including those
 * already handed out.
 */
export function configureLogging(config: LoggerConfig): void {
    globalConfig = config;
    root = undefined;
    generation++;
}
