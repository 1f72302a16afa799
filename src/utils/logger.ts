/**
 * 📝 STRUCTURED LOGGER
 *
 * Pretty, coloured lines while developing; one JSON object per line in production.
 * Everything goes to stderr: stdout is reserved for prompts and wordlists so the
 * CLI can be piped into other tools.
 */

export enum ErrorCategory {
    NETWORK = 'NETWORK',        // Timeout, DNS, connection refused
    PROVIDER = 'PROVIDER',      // 5xx, overloaded, empty completions
    PARSING = 'PARSING',        // Malformed JSON / response bodies
    VALIDATION = 'VALIDATION',  // Bad input, zod failures
    AUTH = 'AUTH',              // API key invalid, rate limited
    IO = 'IO',                  // Seed files, output files
    LOGIC = 'LOGIC'             // Programmer error (bugs)
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
    wordlist_type?: string;
    provider?: string;
    model?: string;
    seeds?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

export interface LoggerOptions {
    level?: LogLevel;
    pretty?: boolean;
    serviceName?: string;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    fatal: 50,
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LEVEL_WEIGHT;
}

const ENV_LOG_LEVEL = process.env.LOG_LEVEL;

export class Logger {
    private static pretty = process.env.NODE_ENV !== 'production';
    private static serviceName = process.env.SERVICE_NAME || 'wordforge';
    private static level: LogLevel = isLogLevel(ENV_LOG_LEVEL) ? ENV_LOG_LEVEL : 'info';

    /**
     * Applies the validated application config. Called once by the CLI after
     * `loadConfig()`; until then the logger falls back to raw env values.
     */
    static configure(options: LoggerOptions): void {
        if (options.level) this.level = options.level;
        if (options.pretty !== undefined) this.pretty = options.pretty;
        if (options.serviceName) this.serviceName = options.serviceName;
    }

    static isEnabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
    }

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    /**
     * 💀 FATAL: unrecoverable errors right before the process exits
     */
    static fatal(msg: string, context?: LogContext) {
        this.log('fatal', msg, context);
    }

    /**
     * 🔥 Categorize an error from its message
     */
    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();

        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('api key') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('overloaded') || msg.includes('server error') || msg.includes('503') || msg.includes('empty completion')) {
            return ErrorCategory.PROVIDER;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json') || msg.includes('malformed')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('enoent') || msg.includes('eacces') || msg.includes('eisdir')) {
            return ErrorCategory.IO;
        }
        if (msg.includes('validation') || msg.includes('invalid') || msg.includes('must be')) {
            return ErrorCategory.VALIDATION;
        }
        return ErrorCategory.LOGIC;
    }

    /**
     * 📊 Log an error with automatic categorization
     */
    static logError(msg: string, error: Error, extraContext?: Partial<LogContext>) {
        this.error(msg, {
            ...extraContext,
            error,
            error_category: this.categorizeError(error),
        });
    }

    private static log(level: LogLevel, msg: string, context?: LogContext) {
        if (!this.isEnabled(level)) return;

        const timestamp = new Date().toISOString();
        const label = level.toUpperCase();

        let fields: Record<string, unknown> | undefined;
        let errorStack: string | undefined;
        if (context) {
            const { error, ...rest } = context;
            fields = rest;
            if (error instanceof Error) {
                errorStack = error.stack;
                fields = { ...rest, error_message: error.message, error_stack: errorStack };
            }
        }

        if (this.pretty) {
            const colors: Record<LogLevel, string> = {
                debug: '\x1b[90m',  // Grey
                info: '\x1b[32m',   // Green
                warn: '\x1b[33m',   // Yellow
                error: '\x1b[31m',  // Red
                fatal: '\x1b[35m',  // Magenta
            };
            const color = colors[level];
            const reset = '\x1b[0m';

            let output = `${color}[${timestamp}] [${label}]${reset} ${msg}`;
            if (fields) {
                const brief = Object.fromEntries(
                    Object.entries(fields).filter(([key, v]) => v !== undefined && key !== 'error_stack')
                );
                if (Object.keys(brief).length > 0) {
                    output += ` ${JSON.stringify(brief)}`;
                }
            }
            console.error(output);

            if ((level === 'error' || level === 'fatal') && errorStack && this.isEnabled('debug')) {
                console.error(`${color}${errorStack}${reset}`);
            }
        } else {
            console.error(JSON.stringify({
                timestamp,
                level: label,
                service: this.serviceName,
                message: msg,
                ...fields,
            }));
        }
    }
}
