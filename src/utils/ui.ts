/**
 * Terminal output helpers shared by the CLI commands.
 */

import chalk from 'chalk';

export const colors = {
    bold: chalk.bold,
    dim: chalk.dim,
    cyan: chalk.cyan,
    green: chalk.green,
    yellow: chalk.yellow,
    red: chalk.red,
};

/**
 * Minimal logging surface the core depends on
 */
export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    debug(message: string): void;
}

let verbose = false;

/**
 * Enables or disables debug output
 */
export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function success(message: string): void {
    console.log(colors.green('✓ ') + message);
}

export function info(message: string): void {
    console.log(colors.cyan('ℹ ') + message);
}

export function warn(message: string): void {
    console.error(colors.yellow('⚠ ') + message);
}

export function debug(message: string): void {
    if (verbose) {
        console.error(colors.dim(`[debug] ${message}`));
    }
}

/**
 * Prints an error and terminates the process
 */
export function error(message: string): never {
    console.error(colors.red('✗ ') + message);
    process.exit(1);
}

/** Logger writing through the helpers above */
export const consoleLogger: Logger = { info, warn, debug };

/** Logger that drops everything */
export const silentLogger: Logger = {
    info: () => {},
    warn: () => {},
    debug: () => {},
};
