/**
 * Safe Manifest Store
 *
 * Handles the manifest file (safe.yml), the single on-disk record of which
 * files are protected and who may decrypt them.
 *
 * Manifest Structure:
 *   recipients: [alice@example.com, bob@example.com]   # required, non-empty
 *   overrides:                                         # optional
 *     deploy/prod.yml.gpg.asc: [ops@example.com]
 *   files:                                             # sorted on write
 *     - deploy/prod.yml.gpg.asc
 *     - notes.md.gpg.asc
 *
 * Paths in `files` and `overrides` are relative to the directory holding the
 * manifest. That directory is found by walking up from the working directory.
 */

import { readFile, writeFile, rename, rm, access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ErrorCode, SafeError, errorMessage, hasErrnoCode } from './errors.js';

/** Manifest filename searched for from the working directory upwards */
export const MANIFEST_FILENAME = 'safe.yml';

/**
 * In-memory manifest
 */
export interface Manifest {
    /** Default decryption audience for every protected file */
    recipients: string[];
    /** Per-file recipient lists that replace `recipients` for that file */
    overrides: Record<string, string[]>;
    /** Protected artifacts, relative to `location` */
    files: string[];
    /** Absolute directory containing the manifest */
    readonly location: string;
    /** Absolute path of the manifest file */
    readonly path: string;
}

const manifestSchema = z.object({
    recipients: z.array(z.string().min(1)).nullish(),
    overrides: z.record(z.array(z.string().min(1)).nullish()).nullish(),
    files: z.array(z.string().min(1)).nullish(),
});

/**
 * Options for the ManifestStore
 */
export interface ManifestStoreOptions {
    /** Directory the search starts from (defaults to process.cwd()) */
    workDir?: string;
    /** Custom manifest filename */
    manifestFile?: string;
}

/**
 * Walks up from `startDir` looking for the manifest
 *
 * @returns Absolute manifest path, or null when the filesystem root is reached
 */
export async function findManifest(
    startDir: string,
    manifestFile: string = MANIFEST_FILENAME
): Promise<string | null> {
    let dir = resolve(startDir);

    for (;;) {
        const candidate = join(dir, manifestFile);
        try {
            await access(candidate);
            return candidate;
        } catch {
            const parent = dirname(dir);
            if (parent === dir) {
                return null;
            }
            dir = parent;
        }
    }
}

/**
 * Parses serialized manifest content
 *
 * @param content - Raw YAML
 * @param manifestPath - Absolute path the content was read from
 */
export function parseManifest(content: string, manifestPath: string): Manifest {
    const parsed = YAML.parseDocument(content);
    const [parseError] = parsed.errors;
    if (parseError) {
        throw new SafeError({
            code: ErrorCode.INVALID_CONFIG,
            message: `Failed to parse ${manifestPath}: ${parseError.message}`,
            path: manifestPath,
            cause: parseError,
        });
    }

    // Key IDs such as 12345678 or 0xDEADBEEF resolve to numbers; keep them as written
    YAML.visit(parsed, {
        Scalar(_key, node) {
            if (typeof node.value === 'number' || typeof node.value === 'bigint' || typeof node.value === 'boolean') {
                node.value = node.source ?? String(node.value);
            }
        },
    });
    const document: unknown = parsed.toJS();

    const result = manifestSchema.safeParse(document ?? {});
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new SafeError({
            code: ErrorCode.INVALID_CONFIG,
            message: `Invalid manifest ${manifestPath}${where}: ${issue?.message ?? result.error.message}`,
            path: manifestPath,
        });
    }

    const recipients = result.data.recipients ?? [];
    if (recipients.length === 0) {
        throw new SafeError({
            code: ErrorCode.INVALID_CONFIG,
            message: `Invalid manifest ${manifestPath}: no recipients`,
            path: manifestPath,
        });
    }

    const overrides: Record<string, string[]> = {};
    for (const [file, list] of Object.entries(result.data.overrides ?? {})) {
        overrides[file] = list ?? [];
    }

    return {
        recipients,
        overrides,
        files: [...new Set(result.data.files ?? [])],
        location: dirname(manifestPath),
        path: manifestPath,
    };
}

/**
 * Serializes a manifest, files sorted for stable diffs
 */
export function serializeManifest(manifest: Manifest): string {
    const document: Record<string, unknown> = {
        recipients: manifest.recipients,
    };

    if (Object.keys(manifest.overrides).length > 0) {
        document.overrides = manifest.overrides;
    }

    document.files = [...manifest.files].sort();

    return YAML.stringify(document);
}

/**
 * Loads and persists the manifest
 */
export class ManifestStore {
    private readonly workDir: string;
    private readonly manifestFile: string;

    constructor(options: ManifestStoreOptions = {}) {
        this.workDir = resolve(options.workDir ?? process.cwd());
        this.manifestFile = options.manifestFile ?? MANIFEST_FILENAME;
    }

    /**
     * Resolves the manifest path or fails with CONFIG_NOT_FOUND
     */
    async locate(): Promise<string> {
        const found = await findManifest(this.workDir, this.manifestFile);
        if (!found) {
            throw new SafeError({
                code: ErrorCode.CONFIG_NOT_FOUND,
                message: `No ${this.manifestFile} found in ${this.workDir} or any parent directory. Run "safe init" first.`,
            });
        }
        return found;
    }

    /**
     * Loads and validates the manifest
     */
    async load(): Promise<Manifest> {
        const manifestPath = await this.locate();

        let content: string;
        try {
            content = await readFile(manifestPath, 'utf8');
        } catch (error) {
            throw new SafeError({
                code: ErrorCode.IO_ERROR,
                message: `Failed to read ${manifestPath}: ${errorMessage(error)}`,
                path: manifestPath,
                cause: error,
            });
        }

        return parseManifest(content, manifestPath);
    }

    /**
     * Writes the manifest, sorting `files` in place
     *
     * The content goes to a sibling temp file which is then renamed over the
     * manifest, so the manifest is either the old or the new version.
     */
    async save(manifest: Manifest): Promise<void> {
        manifest.files.sort();
        const content = serializeManifest(manifest);
        const tempPath = `${manifest.path}.${process.pid}.tmp`;

        try {
            await writeFile(tempPath, content, { encoding: 'utf8', mode: 0o644 });
            await rename(tempPath, manifest.path);
        } catch (error) {
            await rm(tempPath, { force: true });
            throw new SafeError({
                code: ErrorCode.IO_ERROR,
                message: `Failed to write ${manifest.path}: ${errorMessage(error)}`,
                path: manifest.path,
                cause: error,
            });
        }
    }

    /**
     * Creates a new manifest in the working directory
     *
     * @returns The created manifest
     */
    async init(recipients: string[]): Promise<Manifest> {
        const cleaned = recipients.map((recipient) => recipient.trim()).filter(Boolean);
        if (cleaned.length === 0) {
            throw new SafeError({
                code: ErrorCode.INVALID_CONFIG,
                message: 'At least one recipient is required',
            });
        }

        const manifestPath = join(this.workDir, this.manifestFile);
        const manifest: Manifest = {
            recipients: cleaned,
            overrides: {},
            files: [],
            location: this.workDir,
            path: manifestPath,
        };

        try {
            await writeFile(manifestPath, serializeManifest(manifest), { encoding: 'utf8', flag: 'wx' });
        } catch (error) {
            const message = hasErrnoCode(error, 'EEXIST')
                ? `${manifestPath} already exists`
                : `Failed to write ${manifestPath}: ${errorMessage(error)}`;
            throw new SafeError({ code: ErrorCode.IO_ERROR, message, path: manifestPath, cause: error });
        }

        return manifest;
    }
}
