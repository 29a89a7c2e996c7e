/**
 * Safe Process Injector
 *
 * Spawns interactive child processes (the editor, commands run by `exec`)
 * with an environment overlay. The invoking process's own environment is
 * never modified; the overlay is merged into a copy handed to spawn.
 *
 * Key Features:
 * - Overlay merged on top of process.env
 * - Forwards SIGINT, SIGTERM, SIGHUP to the child
 * - Returns the child's exit code
 * - Child inherits stdin/stdout/stderr
 */

import { spawn, type ChildProcess } from 'node:child_process';

/**
 * Options for the run function
 */
export interface RunOptions {
    /** Variables layered over process.env for the child only */
    env?: Record<string, string>;
    /** Working directory for the child process */
    cwd?: string;
}

/**
 * Signals to forward to child process
 */
const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Conventional 128 + n exit codes for forwarded signals */
const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
    SIGHUP: 129,
    SIGINT: 130,
    SIGTERM: 143,
};

/**
 * Merges an overlay into a copy of the given environment
 */
export function inject(original: NodeJS.ProcessEnv, overrides: Record<string, string>): NodeJS.ProcessEnv {
    return { ...original, ...overrides };
}

/**
 * Runs a command with inherited stdio and an environment overlay
 *
 * @param command - The command to execute
 * @param args - Arguments to pass to the command
 * @param options - Environment overlay and cwd
 * @returns Promise resolving to the child's exit code
 */
export function run(command: string, args: string[], options: RunOptions = {}): Promise<number> {
    return new Promise((resolve, reject) => {
        const child: ChildProcess = spawn(command, args, {
            env: inject(process.env, options.env ?? {}),
            cwd: options.cwd ?? process.cwd(),
            stdio: 'inherit',
        });

        const signalHandlers = new Map<NodeJS.Signals, () => void>();

        for (const signal of FORWARDED_SIGNALS) {
            const handler = () => {
                if (child.pid) {
                    child.kill(signal);
                }
            };
            signalHandlers.set(signal, handler);
            process.on(signal, handler);
        }

        function cleanupSignalHandlers(): void {
            for (const [signal, handler] of signalHandlers) {
                process.removeListener(signal, handler);
            }
            signalHandlers.clear();
        }

        // Spawn errors, e.g. command not found
        child.on('error', (error) => {
            cleanupSignalHandlers();
            reject(new Error(`Failed to start command "${command}": ${error.message}`));
        });

        child.on('close', (code, signal) => {
            cleanupSignalHandlers();

            if (signal) {
                resolve(SIGNAL_EXIT_CODES[signal] ?? 128);
            } else {
                resolve(code ?? 0);
            }
        });
    });
}
