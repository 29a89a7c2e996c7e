/**
 * Safe SDK
 *
 * Programmatic access to the lifecycle engine with the default gpg, git and
 * editor collaborators wired in.
 *
 * @example Protect a file and commit it
 * ```typescript
 * import { openSafe } from 'gpg-safe';
 *
 * const safe = await openSafe();
 * await safe.protect('config/prod.yml', { commit: true });
 * ```
 *
 * @example Swap a collaborator
 * ```typescript
 * const safe = await openSafe({ vcs: myVersionControl });
 * ```
 */

import { CipherGateway, GpgCipher, type CipherService } from './core/cipher.js';
import { loadSettings, type Settings } from './core/config.js';
import { ProcessEditor, type Editor } from './core/editor.js';
import { LifecycleEngine, type CommandRunner } from './core/lifecycle.js';
import { ManifestStore } from './core/manifest.js';
import { GitVersionControl, type VersionControl } from './core/vcs.js';
import type { Logger } from './utils/ui.js';

/**
 * Options for opening a safe
 */
export interface OpenSafeOptions {
    /** Directory the manifest search starts from (default: process.cwd()) */
    cwd?: string;
    /** Runtime settings (default: read from process.env) */
    settings?: Settings;
    logger?: Logger;
    /** Replaces the gpg-backed cipher */
    cipherService?: CipherService;
    /** Replaces the git-backed version control */
    vcs?: VersionControl;
    /** Replaces the $EDITOR-backed editor */
    editor?: Editor;
    runCommand?: CommandRunner;
}

/**
 * Discovers the manifest and returns an engine bound to it
 */
export async function openSafe(options: OpenSafeOptions = {}): Promise<LifecycleEngine> {
    const cwd = options.cwd ?? process.cwd();
    const settings = options.settings ?? loadSettings();
    const store = new ManifestStore({ workDir: cwd });
    const manifest = await store.load();

    return new LifecycleEngine({
        manifest,
        store,
        cipher: new CipherGateway(options.cipherService ?? new GpgCipher(settings.gpgBinary), {
            scratchDir: settings.scratchDir,
        }),
        vcs: options.vcs ?? new GitVersionControl(manifest.location, settings.gitBinary),
        editor: options.editor ?? new ProcessEditor(settings.editor),
        cwd,
        logger: options.logger,
        runCommand: options.runCommand,
    });
}
