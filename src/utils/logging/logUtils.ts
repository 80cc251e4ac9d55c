// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types';

import chalk from 'chalk';

const loggerMap: Record<string, ILogger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing colored, prefixed lines to a log facility and keeping a history per level.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        const msg = chalk.blue(`[INFO] ${this.name} :: ${message}`);
        this.logger.log(msg);
        this.infoMessages.push(message);
    }

    success(message: string) {
        const msg = chalk.green(`[SUCCESS] ${this.name} :: ${message}`);
        this.logger.log(msg);
        this.successMessages.push(message);
    }

    warn(message: string) {
        const msg = chalk.yellow(`[WARNING] ${this.name} :: ${message}`);
        this.logger.warn(msg);
        this.warnMessages.push(message);
    }

    error(message: string) {
        const msg = chalk.red(`[ERROR] ${this.name} :: ${message}`);
        this.logger.error(msg);
        this.errorMessages.push(message);
    }

    debug(message: string) {
        const msg = chalk.magenta(`[DEBUG] ${this.name} :: ${message}`);
        if (this.verbose) {
            this.logger.log(msg);
        }
        this.debugMessages.push(message);
    }
}

/**
 * Builds a logger that is not cached, for callers that need their own history and verbosity per run.
 */
export function createLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    return new Logger(name, logFacility, verbose);
}

/**
 * Retrieves logger by name. If the logger does not already exist, it creates a new one.
 *
 * @param name - The name identifier for the logger.
 * @param logFacility - Where the lines go; console unless a test or a quiet CLI run passes `NoopLogFacility`.
 * @param verbose - Whether debug lines reach the facility.
 * @return The logger instance associated with the provided name.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    const existing = loggerMap[name];
    if (existing) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}
