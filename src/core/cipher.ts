/**
 * Safe Cipher Gateway
 *
 * Thin adapter between the lifecycle engine and the asymmetric encryption
 * tool. The tool itself sits behind the CipherService interface; GnuPG is
 * the default implementation.
 *
 * Framing contract:
 * - encrypt appends one "\n" to the plaintext before handing it to the tool
 * - decrypt strips one trailing "\n" from the tool's output
 * so callers always get back exactly the bytes they stored.
 */

import { access, readFile, rm, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { tmpdir } from 'node:os';
import { ErrorCode, SafeError, errorMessage, hasErrnoCode, isSafeError } from './errors.js';
import type { Manifest } from './manifest.js';
import { toManifestPath, trimSuffix } from './protection.js';
import { execCommand } from './spawn.js';

/** Prefix of scratch files holding decrypted plaintext */
export const SCRATCH_PREFIX = 'safe--';

/**
 * External encryption primitive
 */
export interface CipherService {
    /** Returns the tool's raw output for the ciphertext at `path` */
    decrypt(path: string): Promise<Buffer>;
    /** Writes armored ciphertext of `input` for `recipients` to `outputPath`, overwriting it */
    encrypt(outputPath: string, recipients: string[], input: Buffer): Promise<void>;
}

/**
 * CipherService backed by the gpg binary
 */
export class GpgCipher implements CipherService {
    constructor(private readonly binary: string = 'gpg') {}

    async decrypt(path: string): Promise<Buffer> {
        const result = await execCommand(this.binary, ['--batch', '--quiet', '--decrypt', path]);

        if (result.code !== 0) {
            const detail = result.stderr.trim() || `exit code ${String(result.code)}`;
            if (detail.includes('No secret key')) {
                throw new Error(
                    `No secret key available to decrypt ${path}. Check "gpg --list-secret-keys".\n\n${detail}`
                );
            }
            throw new Error(`gpg failed to decrypt ${path}: ${detail}`);
        }

        return result.stdout;
    }

    async encrypt(outputPath: string, recipients: string[], input: Buffer): Promise<void> {
        const args = ['--armor', '--encrypt', '--yes', '--output', outputPath];
        for (const recipient of recipients) {
            args.push('--recipient', recipient);
        }

        const result = await execCommand(this.binary, args, { input });

        if (result.code !== 0) {
            const detail = result.stderr.trim() || `exit code ${String(result.code)}`;
            if (detail.includes('No public key') || detail.includes('unusable public key')) {
                throw new Error(
                    `Public key missing for one of ${recipients.join(', ')}. Import it with "gpg --import <keyfile>".\n\n${detail}`
                );
            }
            throw new Error(`gpg failed to encrypt ${outputPath}: ${detail}`);
        }
    }
}

/**
 * Plaintext materialized on disk for editing
 */
export interface ScratchFile {
    tempPath: string;
    /** Content written to the scratch file */
    plaintext: Buffer;
    /** False when there was no ciphertext and the scratch file starts empty */
    existed: boolean;
    /** Removes the scratch file; safe to call more than once */
    release(): Promise<void>;
}

export interface CipherGatewayOptions {
    /** Directory scratch files are written to (defaults to the OS temp dir) */
    scratchDir?: string;
}

const NEWLINE = 0x0a;

export class CipherGateway {
    private readonly scratchDir: string;

    constructor(
        private readonly service: CipherService,
        options: CipherGatewayOptions = {}
    ) {
        this.scratchDir = options.scratchDir ?? tmpdir();
    }

    /**
     * Deterministic scratch location for a protected file
     */
    scratchPath(path: string): string {
        return join(this.scratchDir, SCRATCH_PREFIX + basename(trimSuffix(path)));
    }

    /**
     * Decrypts the ciphertext at `path`
     */
    async decrypt(path: string): Promise<Buffer> {
        try {
            await access(path);
        } catch (error) {
            throw new SafeError({
                code: hasErrnoCode(error, 'ENOENT') ? ErrorCode.FILE_NOT_FOUND : ErrorCode.IO_ERROR,
                message: `${path} not found`,
                path,
                cause: error,
            });
        }

        let output: Buffer;
        try {
            output = await this.service.decrypt(path);
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.DECRYPT_FAILED,
                message: errorMessage(error),
                path,
                cause: error,
            });
        }

        return output.length > 0 && output[output.length - 1] === NEWLINE
            ? output.subarray(0, output.length - 1)
            : output;
    }

    /**
     * Decrypts `path` into its scratch file
     *
     * A missing ciphertext yields an empty scratch file so new files can be
     * created through the same path.
     */
    async decryptToTemp(path: string): Promise<ScratchFile> {
        let plaintext: Buffer = Buffer.alloc(0);
        let existed = true;

        try {
            plaintext = await this.decrypt(path);
        } catch (error) {
            if (!isSafeError(error, ErrorCode.FILE_NOT_FOUND)) {
                throw error;
            }
            existed = false;
        }

        const tempPath = this.scratchPath(path);
        const release = async (): Promise<void> => {
            await rm(tempPath, { force: true });
        };

        try {
            // Stale file or planted symlink; the exclusive create below must own the path
            await rm(tempPath, { force: true });
            await writeFile(tempPath, plaintext, { mode: 0o600, flag: 'wx' });
        } catch (error) {
            await release();
            throw new SafeError({
                code: ErrorCode.IO_ERROR,
                message: `Failed to write scratch file ${tempPath}: ${errorMessage(error)}`,
                path: tempPath,
                cause: error,
            });
        }

        return { tempPath, plaintext, existed, release };
    }

    /**
     * Reads a scratch file back after editing
     */
    async readScratch(scratch: ScratchFile): Promise<Buffer> {
        try {
            return await readFile(scratch.tempPath);
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.IO_ERROR,
                message: `Failed to read scratch file ${scratch.tempPath}: ${errorMessage(error)}`,
                path: scratch.tempPath,
                cause: error,
            });
        }
    }

    /**
     * Recipients for `path`: its override verbatim if present, else the defaults
     */
    resolveRecipients(path: string, manifest: Manifest): string[] {
        const entry = toManifestPath(path, manifest);
        if (Object.prototype.hasOwnProperty.call(manifest.overrides, entry)) {
            return [...manifest.overrides[entry]];
        }
        return [...manifest.recipients];
    }

    /**
     * Encrypts `plaintext` to `path` for the recipients the manifest selects
     */
    async encrypt(path: string, plaintext: Buffer, manifest: Manifest): Promise<void> {
        const recipients = this.resolveRecipients(path, manifest);
        if (recipients.length === 0) {
            throw new SafeError({
                code: ErrorCode.INVALID_CONFIG,
                message: `No recipients configured for ${toManifestPath(path, manifest)}`,
                path,
            });
        }

        try {
            await this.service.encrypt(path, recipients, Buffer.concat([plaintext, Buffer.from('\n')]));
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.ENCRYPT_FAILED,
                message: errorMessage(error),
                path,
                cause: error,
            });
        }
    }
}
