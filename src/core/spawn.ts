/**
 * Captured execution of external tools (gpg, git).
 */

import { spawn } from 'node:child_process';

/**
 * Result of a finished child process
 */
export interface ExecResult {
    /** Exit code, null when the child was killed by a signal */
    code: number | null;
    stdout: Buffer;
    stderr: string;
}

export interface ExecOptions {
    /** Data written to the child's stdin; stdin is closed either way */
    input?: Buffer | string;
    cwd?: string;
}

/**
 * Runs a command to completion, capturing its output
 *
 * Rejects only when the process cannot be started; a non-zero exit is
 * reported through `code`.
 */
export function execCommand(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: options.cwd,
            stdio: ['pipe', 'pipe', 'pipe'],
        });
        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];

        child.stdout.on('data', (data: Buffer) => {
            stdoutChunks.push(data);
        });

        child.stderr.on('data', (data: Buffer) => {
            stderrChunks.push(data);
        });

        // A child that exits without reading stdin raises EPIPE here; its exit code tells the story
        child.stdin.on('error', (err) => {
            stderrChunks.push(Buffer.from(`stdin: ${err.message}\n`));
        });

        child.on('error', (err) => {
            reject(new Error(`Failed to start "${command}": ${err.message}`));
        });

        child.on('close', (code) => {
            resolve({
                code,
                stdout: Buffer.concat(stdoutChunks),
                stderr: Buffer.concat(stderrChunks).toString('utf8'),
            });
        });

        if (options.input !== undefined) {
            child.stdin.write(options.input);
        }
        child.stdin.end();
    });
}
