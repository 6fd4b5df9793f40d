/**
 * ================================================================================
 * LOGGER UTILITY - Structured Logging and Monitoring
 * ================================================================================
 *
 * Console output for the operator plus JSON-structured file logging through
 * winston. Every record carries the current execution id, and records from
 * long-lived components (client pool, cache, metrics collector, sessions)
 * carry a `component` field.
 *
 * KEY FEATURES:
 * • Multi-level Logging - info, warn, error, debug, success, step
 * • Execution Tracking - UUID-based execution correlation
 * • File Persistence - JSON logs in ~/.aws-ssm/ssm-ops.log (SSM_OPS_LOG_FILE)
 * • Component Loggers - child(component) shares state with its parent
 * • Quiet Mode - console output suppressed while the TUI owns the screen
 * • Performance Timing - timer(label).end() returns milliseconds
 * • Progress Indicators - ora spinners for long operations
 *
 * LOG LEVELS:
 * • ERROR - Failures surfaced to the operator
 * • WARN  - Degraded paths (cache write failed, session not terminated)
 * • INFO  - General operational information
 * • DEBUG - Diagnostics and full error chains (verbose mode only on console)
 */

import winston from 'winston';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { randomUUID } from 'crypto';
import os from 'os';
import path from 'path';

export type LogData = Record<string, unknown>;

export interface LoggerOptions {
    /** Log file path; `null` disables file logging. */
    logFile?: string | null;
    /** Console output (default true). */
    console?: boolean;
    verbose?: boolean;
}

/**
 * State shared between a logger and its component children.
 */
interface LoggerState {
    verbose: boolean;
    quiet: boolean;
    executionId: string;
    logFilePath: string | null;
}

export function defaultLogFilePath(): string {
    return process.env.SSM_OPS_LOG_FILE || path.join(os.homedir(), '.aws-ssm', 'ssm-ops.log');
}

function createWinston(logFilePath: string | null): winston.Logger {
    return winston.createLogger({
        level: 'info',
        silent: logFilePath === null,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ),
        transports: logFilePath === null
            ? []
            : [new winston.transports.File({ filename: logFilePath })]
    });
}

/**
 * ================================================================================
 * LOGGER CLASS
 * ================================================================================
 *
 * //! IMPORTANT: construct one Logger at startup and pass it down; components
 * //! take `logger.child('<name>')` rather than building their own
 * //? Tests construct `new Logger({ logFile: null, console: false })`
 */
export class Logger {
    private winston: winston.Logger;
    private state: LoggerState;
    private component?: string;

    constructor(options: LoggerOptions = {}, shared?: { winston: winston.Logger; state: LoggerState; component: string }) {
        if (shared) {
            this.winston = shared.winston;
            this.state = shared.state;
            this.component = shared.component;
            return;
        }

        const logFilePath = options.logFile === undefined ? defaultLogFilePath() : options.logFile;
        this.state = {
            verbose: options.verbose ?? false,
            quiet: options.console === false,
            executionId: '',
            logFilePath
        };
        this.winston = createWinston(logFilePath);
        if (this.state.verbose) {
            this.winston.level = 'debug';
        }
    }

    /**
     * Logger view whose records carry `component`.
     */
    child(component: string): Logger {
        return new Logger({}, {
            winston: this.winston.child({ component }),
            state: this.state,
            component
        });
    }

    /**
     * Enable or disable verbose logging mode
     *
     * //? Verbose mode shows debug lines and step markers on the console
     */
    setVerbose(verbose: boolean): void {
        this.state.verbose = verbose;
        this.winston.level = verbose ? 'debug' : 'info';
        this.debug('Verbose logging enabled');
    }

    /**
     * Suppress console output; file logging continues.
     */
    setQuiet(quiet: boolean): void {
        this.state.quiet = quiet;
    }

    isVerbose(): boolean {
        return this.state.verbose;
    }

    /**
     * Start a new execution with a unique tracking id.
     *
     * //? The id is shown only in verbose mode; it correlates file records
     */
    startExecution(command: string): string {
        this.state.executionId = randomUUID();

        if (this.state.verbose && !this.state.quiet) {
            console.error(chalk.cyan('🚀'), chalk.bold(`Execution ID: ${this.state.executionId}`));
            if (this.state.logFilePath) {
                console.error(chalk.gray('📄'), `Log file: ${this.state.logFilePath}`);
            }
        }

        this.winston.info(`Starting execution: ${command}`, {
            executionId: this.state.executionId,
            command
        });
        return this.state.executionId;
    }

    private formatMessage(message: string): string {
        const prefix = this.component ? `${this.component}: ` : '';
        return this.state.executionId
            ? `[${this.state.executionId.slice(0, 8)}] ${prefix}${message}`
            : `${prefix}${message}`;
    }

    private meta(data?: LogData): LogData {
        return data === undefined
            ? { executionId: this.state.executionId }
            : { executionId: this.state.executionId, data };
    }

    /**
     * ================================================================================
     * LOGGING METHODS - Different Log Levels
     * ================================================================================
     */

    info(message: string, data?: LogData): void {
        if (!this.state.quiet) {
            console.error(chalk.blue('ℹ'), this.formatMessage(message));
        }
        this.winston.info(message, this.meta(data));
    }

    success(message: string, data?: LogData): void {
        if (!this.state.quiet) {
            console.error(chalk.green('✓'), this.formatMessage(message));
        }
        this.winston.info(message, { ...this.meta(data), outcome: 'success' });
    }

    warn(message: string, data?: LogData): void {
        if (!this.state.quiet) {
            console.error(chalk.yellow('⚠'), this.formatMessage(message));
        }
        this.winston.warn(message, this.meta(data));
    }

    /**
     * Log an error. The stack goes to the file, and to the console in verbose mode.
     */
    error(message: string, error?: Error, data?: LogData): void {
        if (!this.state.quiet) {
            console.error(chalk.red('✗'), this.formatMessage(message));
            if (error && this.state.verbose && error.stack) {
                console.error(chalk.red(error.stack));
            }
        }

        this.winston.error(message, {
            ...this.meta(data),
            ...(error ? { error: error.stack ?? error.message } : {})
        });
    }

    /**
     * Debug output: console only in verbose mode, file always.
     */
    debug(message: string, data?: LogData): void {
        if (this.state.verbose && !this.state.quiet) {
            console.error(chalk.gray('🔍'), chalk.gray(this.formatMessage(message)));
            if (data) {
                console.error(chalk.gray('   Data:'), chalk.gray(safeStringify(data)));
            }
        }
        this.winston.debug(message, this.meta(data));
    }

    /**
     * Log a workflow step (e.g. 'SESSION_START', 'ASG_SCALE').
     */
    step(step: string, message: string, data?: LogData): void {
        if (this.state.verbose && !this.state.quiet) {
            console.error(chalk.magenta('📋'), chalk.magenta(this.formatMessage(`${step}: ${message}`)));
        }

        this.winston.info(`${step}: ${message}`, {
            ...this.meta(data),
            step,
            type: 'step'
        });
    }

    /**
     * ================================================================================
     * UTILITY METHODS - Timing and Progress
     * ================================================================================
     */

    timer(label: string): { end: () => number } {
        const startTime = Date.now();
        this.debug(`Timer started: ${label}`);

        return {
            end: () => {
                const duration = Date.now() - startTime;
                this.debug(`Timer ended: ${label} (${duration}ms)`, { duration, label });
                return duration;
            }
        };
    }

    /**
     * Spinner for long-running operations; silent in quiet mode.
     *
     * //? Remember to call .succeed(), .fail(), or .stop() when done
     */
    spinner(message: string): Ora {
        return ora({ text: this.formatMessage(message), isSilent: this.state.quiet, stream: process.stderr }).start();
    }

    getExecutionId(): string {
        return this.state.executionId;
    }
}

function safeStringify(data: LogData): string {
    try {
        return JSON.stringify(data, null, 2);
    } catch {
        return String(data);
    }
}

/**
 * ================================================================================
 * DEFAULT LOGGER INSTANCE
 * ================================================================================
 *
 * Created lazily by the CLI entry point; library code receives a Logger
 * through its constructor instead of importing this.
 */
let defaultLogger: Logger | undefined;

export function getLogger(): Logger {
    if (!defaultLogger) {
        defaultLogger = new Logger();
    }
    return defaultLogger;
}
