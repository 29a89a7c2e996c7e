/**
 * Safe Protection Predicate
 *
 * Decides whether a path is protected by a manifest. Protection is an exact
 * membership test on the path relative to the manifest directory; there is
 * no globbing and no prefix matching.
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';
import { ErrorCode, SafeError } from './errors.js';
import type { Manifest } from './manifest.js';

/** Suffix carried by every encrypted artifact */
export const ENCRYPTED_SUFFIX = '.gpg.asc';

/**
 * Appends the encrypted suffix unless it is already present
 */
export function ensureSuffix(filePath: string): string {
    return filePath.endsWith(ENCRYPTED_SUFFIX) ? filePath : filePath + ENCRYPTED_SUFFIX;
}

/**
 * Strips the encrypted suffix if present
 */
export function trimSuffix(filePath: string): string {
    return filePath.endsWith(ENCRYPTED_SUFFIX) ? filePath.slice(0, -ENCRYPTED_SUFFIX.length) : filePath;
}

/**
 * Resolves a user-supplied path to an absolute one
 *
 * @param cwd - Directory relative paths are resolved against
 */
export function resolvePath(filePath: string, cwd: string = process.cwd()): string {
    if (filePath.trim() === '' || filePath.includes('\0')) {
        throw new SafeError({
            code: ErrorCode.PATH_RESOLUTION,
            message: `Cannot resolve path ${JSON.stringify(filePath)}`,
            path: filePath,
        });
    }
    return resolve(cwd, filePath);
}

/**
 * Converts a path to the form stored in the manifest
 *
 * Separators are normalized to "/" so manifests written on one platform
 * match on another.
 */
export function toManifestPath(filePath: string, manifest: Manifest, cwd?: string): string {
    const rel = relative(manifest.location, resolvePath(filePath, cwd));
    return sep === '/' ? rel : rel.split(sep).join('/');
}

/**
 * Converts a manifest entry back to an absolute path
 */
export function fromManifestPath(entry: string, manifest: Manifest): string {
    return isAbsolute(entry) ? entry : resolve(manifest.location, entry);
}

/**
 * Checks whether `filePath` is listed in the manifest
 */
export function isProtected(filePath: string, manifest: Manifest, cwd?: string): boolean {
    return manifest.files.includes(toManifestPath(filePath, manifest, cwd));
}
