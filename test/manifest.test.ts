import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import {
    ManifestStore,
    MANIFEST_FILENAME,
    findManifest,
    parseManifest,
    serializeManifest,
    type Manifest,
} from '../src/core/manifest.js';
import { ErrorCode } from '../src/core/errors.js';
import { captureError } from './helpers/errors.js';

describe('ManifestStore', () => {
    let workDir: string;
    let manifestPath: string;

    beforeEach(async () => {
        workDir = await mkdtemp(join(tmpdir(), 'safe-manifest-'));
        manifestPath = join(workDir, MANIFEST_FILENAME);
    });

    afterEach(async () => {
        await rm(workDir, { recursive: true, force: true });
    });

    describe('findManifest', () => {
        it('should find the manifest in a parent directory', async () => {
            await writeFile(manifestPath, 'recipients: [A]\n');
            const nested = join(workDir, 'a', 'b');
            await mkdir(nested, { recursive: true });

            expect(await findManifest(nested)).toBe(manifestPath);
        });

        it('should return null when nothing is found up to the root', async () => {
            expect(await findManifest(workDir, 'safe-test-absent-manifest.yml')).toBeNull();
        });

        it('should not change the working directory', async () => {
            await writeFile(manifestPath, 'recipients: [A]\n');
            const nested = join(workDir, 'deep');
            await mkdir(nested);
            const before = process.cwd();

            await findManifest(nested);

            expect(process.cwd()).toBe(before);
        });
    });

    describe('load', () => {
        it('should load recipients, overrides and files', async () => {
            await writeFile(
                manifestPath,
                [
                    'recipients:',
                    '  - alice@example.com',
                    'overrides:',
                    '  secrets.yml.gpg.asc: [bob@example.com]',
                    'files:',
                    '  - secrets.yml.gpg.asc',
                    '',
                ].join('\n')
            );

            const manifest = await new ManifestStore({ workDir }).load();

            expect(manifest.recipients).toEqual(['alice@example.com']);
            expect(manifest.overrides).toEqual({ 'secrets.yml.gpg.asc': ['bob@example.com'] });
            expect(manifest.files).toEqual(['secrets.yml.gpg.asc']);
            expect(manifest.location).toBe(workDir);
            expect(manifest.path).toBe(manifestPath);
        });

        it('should load from a nested working directory', async () => {
            await writeFile(manifestPath, 'recipients: [A]\n');
            const nested = join(workDir, 'nested');
            await mkdir(nested);

            const manifest = await new ManifestStore({ workDir: nested }).load();

            expect(manifest.location).toBe(workDir);
        });

        it('should fail with CONFIG_NOT_FOUND when there is no manifest', async () => {
            const store = new ManifestStore({ workDir, manifestFile: 'safe-test-absent-manifest.yml' });

            const err = await captureError(store.load());

            expect(err.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
        });

        it('should reject an empty recipient list', async () => {
            await writeFile(manifestPath, 'recipients: []\nfiles: []\n');

            const err = await captureError(new ManifestStore({ workDir }).load());

            expect(err.code).toBe(ErrorCode.INVALID_CONFIG);
            expect(err.message).toBe(`Invalid manifest ${manifestPath}: no recipients`);
        });

        it('should reject a manifest without recipients', async () => {
            await writeFile(manifestPath, 'files: [a.gpg.asc]\n');

            const err = await captureError(new ManifestStore({ workDir }).load());

            expect(err.code).toBe(ErrorCode.INVALID_CONFIG);
        });

        it('should reject malformed YAML', async () => {
            await writeFile(manifestPath, 'recipients: [A\n');

            const err = await captureError(new ManifestStore({ workDir }).load());

            expect(err.code).toBe(ErrorCode.INVALID_CONFIG);
        });

        it('should reject fields of the wrong shape', async () => {
            await writeFile(manifestPath, 'recipients: alice\n');

            const err = await captureError(new ManifestStore({ workDir }).load());

            expect(err.code).toBe(ErrorCode.INVALID_CONFIG);
            expect(err.message).toContain('at recipients');
        });

        it('should drop duplicate files', async () => {
            await writeFile(manifestPath, 'recipients: [A]\nfiles: [a.gpg.asc, a.gpg.asc, b.gpg.asc]\n');

            const manifest = await new ManifestStore({ workDir }).load();

            expect(manifest.files).toEqual(['a.gpg.asc', 'b.gpg.asc']);
        });

        it('should keep numeric key IDs as written', async () => {
            await writeFile(
                manifestPath,
                [
                    'recipients: [12345678, 0xDEADBEEF, alice@example.com]',
                    'overrides:',
                    '  deploy.yml.gpg.asc: [12345678901234567890]',
                    '',
                ].join('\n')
            );

            const manifest = await new ManifestStore({ workDir }).load();

            expect(manifest.recipients).toEqual(['12345678', '0xDEADBEEF', 'alice@example.com']);
            expect(manifest.overrides).toEqual({ 'deploy.yml.gpg.asc': ['12345678901234567890'] });
        });
    });

    describe('save', () => {
        it('should write files sorted and leave no temp file behind', async () => {
            await writeFile(manifestPath, 'recipients: [A]\n');
            const store = new ManifestStore({ workDir });
            const manifest = await store.load();
            manifest.files.push('z.txt.gpg.asc', 'a.txt.gpg.asc');

            await store.save(manifest);

            expect(manifest.files).toEqual(['a.txt.gpg.asc', 'z.txt.gpg.asc']);
            expect((await store.load()).files).toEqual(['a.txt.gpg.asc', 'z.txt.gpg.asc']);
            expect(await readdir(workDir)).toEqual([MANIFEST_FILENAME]);
        });

        it('should fail with IO_ERROR when the directory is gone', async () => {
            await writeFile(manifestPath, 'recipients: [A]\n');
            const store = new ManifestStore({ workDir });
            const manifest = await store.load();
            await rm(workDir, { recursive: true, force: true });

            const err = await captureError(store.save(manifest));

            expect(err.code).toBe(ErrorCode.IO_ERROR);
        });
    });

    describe('serializeManifest', () => {
        const base: Manifest = {
            recipients: ['A'],
            overrides: {},
            files: ['z.gpg.asc', 'a.gpg.asc'],
            location: '/repo',
            path: '/repo/safe.yml',
        };

        it('should omit empty overrides and sort files', () => {
            expect(serializeManifest(base)).toBe('recipients:\n  - A\nfiles:\n  - a.gpg.asc\n  - z.gpg.asc\n');
        });

        it('should round-trip through parseManifest', () => {
            const manifest = { ...base, overrides: { 'a.gpg.asc': ['B', 'C'] } };

            const parsed = parseManifest(serializeManifest(manifest), '/repo/safe.yml');

            expect(parsed.recipients).toEqual(['A']);
            expect(parsed.overrides).toEqual({ 'a.gpg.asc': ['B', 'C'] });
            expect(parsed.files).toEqual(['a.gpg.asc', 'z.gpg.asc']);
            expect(parsed.location).toBe('/repo');
        });
    });

    describe('init', () => {
        it('should create a manifest with the given recipients', async () => {
            const store = new ManifestStore({ workDir });

            await store.init(['alice@example.com', ' bob@example.com ']);

            const manifest = await store.load();
            expect(manifest.recipients).toEqual(['alice@example.com', 'bob@example.com']);
            expect(manifest.files).toEqual([]);
            expect(await readFile(manifestPath, 'utf8')).toBe(
                'recipients:\n  - alice@example.com\n  - bob@example.com\nfiles: []\n'
            );
        });

        it('should refuse to overwrite an existing manifest', async () => {
            await writeFile(manifestPath, 'recipients: [A]\n');

            const err = await captureError(new ManifestStore({ workDir }).init(['B']));

            expect(err.code).toBe(ErrorCode.IO_ERROR);
            expect(await readFile(manifestPath, 'utf8')).toBe('recipients: [A]\n');
        });

        it('should require a recipient', async () => {
            const err = await captureError(new ManifestStore({ workDir }).init(['  ']));

            expect(err.code).toBe(ErrorCode.INVALID_CONFIG);
        });
    });
});
