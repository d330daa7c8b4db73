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
 * Named logger writing coloured `[LEVEL] name :: message` lines to a log facility.
 * Every message is also kept in memory per level.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.facility.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
        this.infoMessages.push(message);
    }

    success(message: string) {
        this.facility.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
        this.successMessages.push(message);
    }

    warn(message: string) {
        this.facility.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.facility.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.facility.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        this.debugMessages.push(message);
    }
}

/**
 * Retrieves a logger by name, creating it on first use. Later calls with the same
 * name return the existing logger and ignore the facility and verbosity arguments.
 *
 * @param name - Identifier printed in every line.
 * @param logFacility - Where lines are sent; `NoopLogFacility` silences output.
 * @param verbose - Whether debug lines are printed.
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
