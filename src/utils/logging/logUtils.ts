// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Writes colored, name-prefixed lines to a log facility and keeps the plain
 * messages per level so callers can inspect what was reported.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    warnMessages: string[] = [];
    debugMessages: string[] = [];
    errorMessages: string[] = [];

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
        this.infoMessages.push(message);
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
 * Creates a named logger writing to `logFacility`; debug lines are written only
 * when `verbose` is set.
 */
export function createLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    return new Logger(name, logFacility, verbose);
}
