/**
 * Interactive editor launched against scratch files.
 */

import { ErrorCode, SafeError, errorMessage } from './errors.js';
import { run } from './injector.js';

export interface Editor {
    /** Opens `path` and resolves once the editor has exited */
    edit(path: string): Promise<void>;
}

/**
 * Splits an editor command such as "code --wait" into binary and arguments
 */
export function parseEditorCommand(command: string): { binary: string; args: string[] } {
    const [binary = '', ...args] = command.trim().split(/\s+/);
    if (!binary) {
        throw new SafeError({ code: ErrorCode.EDITOR_FAILED, message: 'No editor configured' });
    }
    return { binary, args };
}

/**
 * Editor running as a child process with the terminal attached
 */
export class ProcessEditor implements Editor {
    constructor(private readonly command: string) {}

    async edit(path: string): Promise<void> {
        const { binary, args } = parseEditorCommand(this.command);

        let exitCode: number;
        try {
            exitCode = await run(binary, [...args, path]);
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.EDITOR_FAILED,
                message: errorMessage(error),
                path,
                cause: error,
            });
        }

        if (exitCode !== 0) {
            throw new SafeError({
                code: ErrorCode.EDITOR_FAILED,
                message: `Editor "${binary}" exited with code ${exitCode}`,
                path,
            });
        }
    }
}
