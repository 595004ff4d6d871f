/**
 * Console logging for mangadex-dl
 */

import chalk from 'chalk';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Logger that discards everything. Library default.
 */
export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

/**
 * Creates a coloured console logger
 *
 * @param verbose - When false, debug messages are dropped
 */
export function createLogger(verbose = false): Logger {
    return {
        debug(message) {
            if (verbose) {
                console.log(chalk.gray(`[debug] ${message}`));
            }
        },
        info(message) {
            console.log(message);
        },
        warn(message) {
            console.warn(chalk.yellow(message));
        },
        error(message) {
            console.error(chalk.red(message));
        },
    };
}
