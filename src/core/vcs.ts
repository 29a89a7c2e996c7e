/**
 * Safe Commit Adapter
 *
 * Stages and commits the files touched by a lifecycle operation. The
 * version control system sits behind the VersionControl interface; git is
 * the default implementation.
 */

import { ErrorCode, SafeError, errorMessage } from './errors.js';
import { execCommand } from './spawn.js';
import type { Logger } from '../utils/ui.js';

/** Namespace every generated commit message starts with */
export const COMMIT_NAMESPACE = 'safe';

/**
 * External version control primitive
 */
export interface VersionControl {
    /** Stages a single path */
    add(path: string): Promise<void>;
    /** Commits everything staged */
    commit(message: string): Promise<void>;
}

/**
 * VersionControl backed by the git binary
 */
export class GitVersionControl implements VersionControl {
    constructor(
        private readonly cwd: string,
        private readonly binary: string = 'git'
    ) {}

    async add(path: string): Promise<void> {
        const result = await execCommand(this.binary, ['add', '--', path], { cwd: this.cwd });
        if (result.code !== 0) {
            throw new Error(`git add ${path} failed: ${result.stderr.trim()}`);
        }
    }

    async commit(message: string): Promise<void> {
        const result = await execCommand(this.binary, ['commit', '-m', message], { cwd: this.cwd });
        if (result.code !== 0) {
            const detail = result.stderr.trim() || result.stdout.toString('utf8').trim();
            throw new Error(`git commit failed: ${detail}`);
        }
    }
}

/**
 * Builds "<namespace>: <action> <logical-path>"
 */
export function commitMessage(action: string, logicalPath: string): string {
    return `${COMMIT_NAMESPACE}: ${action} ${logicalPath}`;
}

/**
 * Stages each path on its own, then commits
 *
 * A path that fails to stage is skipped: a plaintext that was never tracked
 * cannot be staged once it has been deleted, and that must not block the
 * rest of the commit.
 */
export async function stageAndCommit(
    vcs: VersionControl,
    paths: string[],
    message: string,
    logger?: Logger
): Promise<void> {
    for (const path of paths) {
        try {
            await vcs.add(path);
        } catch (error) {
            logger?.debug(`Skipping ${path}: ${errorMessage(error)}`);
        }
    }

    try {
        await vcs.commit(message);
    } catch (error) {
        throw new SafeError({
            code: ErrorCode.COMMIT_FAILED,
            message: errorMessage(error),
            cause: error,
        });
    }
}
