import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { DEFAULT_EDITOR, loadSettings } from '../src/core/config.js';
import { ErrorCode } from '../src/core/errors.js';

describe('Settings', () => {
    it('should fall back to defaults', () => {
        expect(loadSettings({})).toEqual({
            editor: DEFAULT_EDITOR,
            gpgBinary: 'gpg',
            gitBinary: 'git',
            scratchDir: tmpdir(),
            debug: false,
        });
    });

    it('should prefer SAFE_EDITOR over VISUAL and EDITOR', () => {
        expect(loadSettings({ SAFE_EDITOR: 'nano', VISUAL: 'code --wait', EDITOR: 'vi' }).editor).toBe('nano');
        expect(loadSettings({ VISUAL: 'code --wait', EDITOR: 'vi' }).editor).toBe('code --wait');
        expect(loadSettings({ EDITOR: 'vi' }).editor).toBe('vi');
    });

    it('should ignore blank editor variables', () => {
        expect(loadSettings({ SAFE_EDITOR: '  ', EDITOR: 'emacs' }).editor).toBe('emacs');
    });

    it('should read binaries and scratch directory overrides', () => {
        const settings = loadSettings({
            SAFE_GPG: '/opt/gpg2',
            SAFE_GIT: '/opt/git',
            SAFE_SCRATCH_DIR: '/dev/shm',
        });

        expect(settings.gpgBinary).toBe('/opt/gpg2');
        expect(settings.gitBinary).toBe('/opt/git');
        expect(settings.scratchDir).toBe('/dev/shm');
    });

    it.each([
        ['1', true],
        ['TRUE', true],
        ['on', true],
        ['0', false],
        ['no', false],
    ])('should read SAFE_DEBUG=%s as %s', (value, expected) => {
        expect(loadSettings({ SAFE_DEBUG: value }).debug).toBe(expected);
    });

    it('should reject a relative scratch directory', () => {
        expect(() => loadSettings({ SAFE_SCRATCH_DIR: 'scratch' })).toThrow(
            'Invalid SAFE_SCRATCH_DIR: must be an absolute path'
        );
    });

    it('should reject an unrecognized SAFE_DEBUG value', () => {
        try {
            loadSettings({ SAFE_DEBUG: 'maybe' });
            expect.unreachable();
        } catch (error) {
            expect(error).toMatchObject({
                code: ErrorCode.INVALID_CONFIG,
                message: 'Invalid SAFE_DEBUG: must be one of 1, 0, true, false, yes, no, on, off',
            });
        }
    });
});
