/**
 * Safe Runtime Settings
 *
 * Settings that belong to the machine rather than the repository: which
 * editor to launch, which gpg and git binaries to call and where scratch
 * plaintext is materialized. Read from environment variables.
 */

import { tmpdir } from 'node:os';
import { isAbsolute } from 'node:path';
import { z } from 'zod';
import { ErrorCode, SafeError } from './errors.js';

/** Editor used when none of the editor variables are set */
export const DEFAULT_EDITOR = 'vim';

/** Unset and blank variables both read as "not configured" */
const optionalText = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().optional()
);

const DEBUG_FLAGS: Record<string, boolean> = {
    '1': true,
    true: true,
    yes: true,
    on: true,
    '0': false,
    false: false,
    no: false,
    off: false,
};

const envSchema = z.object({
    SAFE_EDITOR: optionalText,
    VISUAL: optionalText,
    EDITOR: optionalText,
    SAFE_GPG: optionalText,
    SAFE_GIT: optionalText,
    SAFE_SCRATCH_DIR: optionalText.refine((value) => value === undefined || isAbsolute(value), {
        message: 'must be an absolute path',
    }),
    SAFE_DEBUG: optionalText.refine(
        (value) => value === undefined || Object.hasOwn(DEBUG_FLAGS, value.trim().toLowerCase()),
        { message: 'must be one of 1, 0, true, false, yes, no, on, off' }
    ),
});

/**
 * Resolved runtime settings
 */
export interface Settings {
    editor: string;
    gpgBinary: string;
    gitBinary: string;
    scratchDir: string;
    debug: boolean;
}

/**
 * Loads settings from the given environment
 *
 * Editor precedence: SAFE_EDITOR, VISUAL, EDITOR, then vim.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const result = envSchema.safeParse({
        SAFE_EDITOR: env.SAFE_EDITOR,
        VISUAL: env.VISUAL,
        EDITOR: env.EDITOR,
        SAFE_GPG: env.SAFE_GPG,
        SAFE_GIT: env.SAFE_GIT,
        SAFE_SCRATCH_DIR: env.SAFE_SCRATCH_DIR,
        SAFE_DEBUG: env.SAFE_DEBUG,
    });

    if (!result.success) {
        const issue = result.error.issues[0];
        const name = issue?.path.join('.') ?? 'environment';
        throw new SafeError({
            code: ErrorCode.INVALID_CONFIG,
            message: `Invalid ${name}: ${issue?.message ?? result.error.message}`,
        });
    }

    const vars = result.data;
    return {
        editor: vars.SAFE_EDITOR ?? vars.VISUAL ?? vars.EDITOR ?? DEFAULT_EDITOR,
        gpgBinary: vars.SAFE_GPG ?? 'gpg',
        gitBinary: vars.SAFE_GIT ?? 'git',
        scratchDir: vars.SAFE_SCRATCH_DIR ?? tmpdir(),
        debug: vars.SAFE_DEBUG === undefined ? false : DEBUG_FLAGS[vars.SAFE_DEBUG.trim().toLowerCase()] === true,
    };
}
