/**
 * gpg-safe
 *
 * Keeps GPG-encrypted files, the manifest listing them and their git
 * history consistent with each other.
 *
 * @example
 * ```typescript
 * import { openSafe } from 'gpg-safe';
 *
 * const safe = await openSafe();
 * const files = await safe.find('.');
 * ```
 *
 * @packageDocumentation
 */

export * from './sdk.js';

export { LifecycleEngine } from './core/lifecycle.js';
export type { LifecycleEngineOptions, CommitOptions, EditResult, CommandRunner } from './core/lifecycle.js';
export { ManifestStore, MANIFEST_FILENAME, findManifest, parseManifest, serializeManifest } from './core/manifest.js';
export type { Manifest, ManifestStoreOptions } from './core/manifest.js';
export { ENCRYPTED_SUFFIX, ensureSuffix, trimSuffix, isProtected } from './core/protection.js';
export { CipherGateway, GpgCipher } from './core/cipher.js';
export type { CipherService, ScratchFile } from './core/cipher.js';
export { GitVersionControl, stageAndCommit, commitMessage } from './core/vcs.js';
export type { VersionControl } from './core/vcs.js';
export { ProcessEditor } from './core/editor.js';
export type { Editor } from './core/editor.js';
export { parseEnvDocument, toEnvironment, toEnvString } from './core/parser.js';
export type { EnvValue } from './core/parser.js';
export { loadSettings } from './core/config.js';
export type { Settings } from './core/config.js';
export { SafeError, ErrorCode, isSafeError } from './core/errors.js';
export type { Logger } from './utils/ui.js';
