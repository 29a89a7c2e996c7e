/**
 * Safe Lifecycle Engine
 *
 * The only component allowed to change both the filesystem and the
 * manifest. Each operation moves a logical file between three states:
 *
 *   Unprotected  plaintext on disk, not in the manifest
 *   Protected    ciphertext (<file>.gpg.asc) on disk, listed in the manifest
 *   Removed      neither on disk nor in the manifest
 *
 * Step ordering is chosen so an interrupted operation leaves extra state
 * behind (a plaintext next to its ciphertext) rather than missing state.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { CipherGateway } from './cipher.js';
import type { Editor } from './editor.js';
import { ErrorCode, SafeError, errorMessage, hasErrnoCode } from './errors.js';
import { run, type RunOptions } from './injector.js';
import type { Manifest, ManifestStore } from './manifest.js';
import { isStructuredFile, parseEnvDocument, toEnvironment } from './parser.js';
import {
    ensureSuffix,
    fromManifestPath,
    isProtected,
    resolvePath,
    toManifestPath,
    trimSuffix,
} from './protection.js';
import { commitMessage, stageAndCommit, type VersionControl } from './vcs.js';
import { silentLogger, type Logger } from '../utils/ui.js';

/** Launches a command with an environment overlay, resolving to its exit code */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<number>;

export interface LifecycleEngineOptions {
    manifest: Manifest;
    store: ManifestStore;
    cipher: CipherGateway;
    vcs: VersionControl;
    editor: Editor;
    /** Directory user-supplied paths are resolved against (defaults to process.cwd()) */
    cwd?: string;
    logger?: Logger;
    runCommand?: CommandRunner;
}

export interface CommitOptions {
    /** Commit the touched files to version control afterwards */
    commit?: boolean;
}

export interface EditResult {
    /** Absolute ciphertext path */
    path: string;
    /** False when the editor left the content byte-identical */
    changed: boolean;
}

export class LifecycleEngine {
    readonly manifest: Manifest;
    private readonly store: ManifestStore;
    private readonly cipher: CipherGateway;
    private readonly vcs: VersionControl;
    private readonly editor: Editor;
    private readonly cwd: string;
    private readonly logger: Logger;
    private readonly runCommand: CommandRunner;

    constructor(options: LifecycleEngineOptions) {
        this.manifest = options.manifest;
        this.store = options.store;
        this.cipher = options.cipher;
        this.vcs = options.vcs;
        this.editor = options.editor;
        this.cwd = options.cwd ?? process.cwd();
        this.logger = options.logger ?? silentLogger;
        this.runCommand = options.runCommand ?? run;
    }

    /**
     * Whether `path` is listed in the manifest (exact match, no suffix added)
     */
    isProtected(path: string): boolean {
        return isProtected(path, this.manifest, this.cwd);
    }

    /**
     * Encrypts an existing plaintext file and deletes the plaintext
     *
     * @param path - Plaintext path, with or without the encrypted suffix
     * @returns Absolute ciphertext path
     */
    async protect(path: string, options: CommitOptions = {}): Promise<string> {
        const target = this.target(path);
        const entry = this.entry(target);

        if (this.manifest.files.includes(entry)) {
            throw new SafeError({
                code: ErrorCode.ALREADY_PROTECTED,
                message: `${entry} is already protected`,
                path: target,
            });
        }

        const source = trimSuffix(target);
        let plaintext: Buffer;
        try {
            plaintext = await readFile(source);
        } catch (error) {
            throw new SafeError({
                code: hasErrnoCode(error, 'ENOENT') ? ErrorCode.FILE_NOT_FOUND : ErrorCode.IO_ERROR,
                message: `Cannot read ${source}: ${errorMessage(error)}`,
                path: source,
                cause: error,
            });
        }

        // Manifest is written before the plaintext goes away
        await this.writeEncrypted(target, plaintext);

        try {
            await rm(source);
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.IO_ERROR,
                message: `${entry} is protected but the plaintext ${source} could not be deleted: ${errorMessage(error)}`,
                path: source,
                cause: error,
            });
        }
        this.logger.info(`Protected ${trimSuffix(entry)}`);

        if (options.commit) {
            await this.commit('protect', target, [this.manifest.path, source, target]);
        }

        return target;
    }

    /**
     * Opens the decrypted content in the editor and re-encrypts on change
     *
     * A file that does not exist yet starts empty and becomes protected once
     * saved with content.
     */
    async edit(path: string, options: CommitOptions = {}): Promise<EditResult> {
        const target = this.target(path);
        const scratch = await this.cipher.decryptToTemp(target);

        try {
            await this.editor.edit(scratch.tempPath);
            const edited = await this.cipher.readScratch(scratch);

            if (edited.equals(scratch.plaintext)) {
                this.logger.info('No changes found');
                return { path: target, changed: false };
            }

            await this.writeEncrypted(target, edited);
            this.logger.info(`${scratch.existed ? 'Encrypted' : 'Created'} ${this.logicalName(target)}`);

            if (options.commit) {
                await this.commit('edit', target, [target, this.manifest.path]);
            }

            return { path: target, changed: true };
        } finally {
            await scratch.release();
        }
    }

    /**
     * Deletes a protected file and drops it from the manifest
     */
    async remove(path: string, options: CommitOptions = {}): Promise<string> {
        const target = this.target(path);
        const entry = this.entry(target);
        const index = this.manifest.files.indexOf(entry);

        if (index === -1) {
            throw new SafeError({
                code: ErrorCode.NOT_PROTECTED,
                message: `${entry} is not protected`,
                path: target,
            });
        }

        try {
            await rm(target);
        } catch (error) {
            if (!hasErrnoCode(error, 'ENOENT')) {
                throw new SafeError({
                    code: ErrorCode.IO_ERROR,
                    message: `Cannot delete ${target}: ${errorMessage(error)}`,
                    path: target,
                    cause: error,
                });
            }
            // Left over from an interrupted remove; finish dropping the entry
            this.logger.warn(`${target} was already deleted, dropping it from the manifest`);
        }

        this.manifest.files.splice(index, 1);
        await this.store.save(this.manifest);
        this.logger.info(`Removed ${trimSuffix(entry)}`);

        if (options.commit) {
            await this.commit('remove', target, [target, this.manifest.path]);
        }

        return target;
    }

    /**
     * Re-encrypts every protected file for its current recipients
     *
     * Files are processed one at a time, each persisted (and committed, when
     * requested) before the next. The first failure stops the run; files
     * already handled stay re-encrypted.
     *
     * @returns Absolute paths re-encrypted, in manifest order
     */
    async reencryptAll(options: CommitOptions = {}): Promise<string[]> {
        const done: string[] = [];

        for (const entry of [...this.manifest.files]) {
            const target = fromManifestPath(entry, this.manifest);
            const plaintext = await this.cipher.decrypt(target);

            await this.writeEncrypted(target, plaintext);
            this.logger.info(`Re-encrypted ${trimSuffix(entry)}`);

            if (options.commit) {
                await this.commit('reencrypt', target, [target, this.manifest.path]);
            }
            done.push(target);
        }

        return done;
    }

    /**
     * Runs a command with a protected YAML file's keys exported as variables
     *
     * @returns The command's exit code
     */
    async exportToEnvironment(path: string, command: string, args: string[] = []): Promise<number> {
        const target = this.requireExportable(path);

        if (!command) {
            throw new SafeError({ code: ErrorCode.COMMAND_FAILED, message: 'No command given' });
        }

        const env = await this.environmentOf(target);
        this.logger.debug(`Exporting ${Object.keys(env).join(', ')} from ${this.entry(target)}`);

        try {
            return await this.runCommand(command, args, { env, cwd: this.cwd });
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.COMMAND_FAILED,
                message: errorMessage(error),
                cause: error,
            });
        }
    }

    /**
     * Variables `exportToEnvironment` would hand to the command, without running it
     */
    async previewEnvironment(path: string): Promise<Record<string, string>> {
        return this.environmentOf(this.requireExportable(path));
    }

    /**
     * Decrypted content of a protected file
     */
    async reveal(path: string): Promise<Buffer> {
        return this.cipher.decrypt(this.requireProtected(path));
    }

    /**
     * Recursively lists the protected files under `directory`
     *
     * @returns Paths joined onto `directory`, in lexical walk order
     */
    async find(directory: string = '.'): Promise<string[]> {
        const found: string[] = [];
        await this.walk(directory, found);
        return found;
    }

    private async walk(path: string, found: string[]): Promise<void> {
        if (this.isProtected(path)) {
            found.push(path);
        }

        let entries: Dirent[];
        try {
            entries = await readdir(resolvePath(path, this.cwd), { withFileTypes: true });
        } catch (error) {
            if (hasErrnoCode(error, 'ENOTDIR')) {
                return;
            }
            throw new SafeError({
                code: ErrorCode.IO_ERROR,
                message: `Cannot read directory ${path}: ${errorMessage(error)}`,
                path,
                cause: error,
            });
        }

        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const dirent of entries) {
            const child = join(path, dirent.name);
            if (dirent.isDirectory()) {
                await this.walk(child, found);
            } else if (this.isProtected(child)) {
                found.push(child);
            }
        }
    }

    private target(path: string): string {
        return resolvePath(ensureSuffix(path), this.cwd);
    }

    private entry(target: string): string {
        return toManifestPath(target, this.manifest);
    }

    private logicalName(target: string): string {
        return trimSuffix(this.entry(target));
    }

    private requireProtected(path: string): string {
        const target = this.target(path);
        if (!this.manifest.files.includes(this.entry(target))) {
            throw new SafeError({
                code: ErrorCode.NOT_PROTECTED,
                message: `${this.entry(target)} is not protected`,
                path: target,
            });
        }
        return target;
    }

    private requireExportable(path: string): string {
        const target = this.requireProtected(path);
        if (!isStructuredFile(trimSuffix(target))) {
            throw new SafeError({
                code: ErrorCode.UNSUPPORTED_FORMAT,
                message: `Only protected .yml or .yaml files can be exported, got ${this.entry(target)}`,
                path: target,
            });
        }
        return target;
    }

    private async environmentOf(target: string): Promise<Record<string, string>> {
        const plaintext = await this.cipher.decrypt(target);
        return toEnvironment(parseEnvDocument(plaintext.toString('utf8'), this.entry(target)));
    }

    /**
     * Encrypts, then records the file in the manifest and persists it
     */
    private async writeEncrypted(target: string, plaintext: Buffer): Promise<void> {
        await this.cipher.encrypt(target, plaintext, this.manifest);

        const entry = this.entry(target);
        if (!this.manifest.files.includes(entry)) {
            this.manifest.files.push(entry);
        }
        await this.store.save(this.manifest);
    }

    private async commit(action: string, target: string, paths: string[]): Promise<void> {
        await stageAndCommit(this.vcs, paths, commitMessage(action, this.logicalName(target)), this.logger);
    }
}
