import { describe, it, expect } from 'vitest';
import {
    classifyValue,
    isStructuredFile,
    parseEnvDocument,
    toEnvironment,
    toEnvString,
} from '../../src/core/parser.js';
import { ErrorCode } from '../../src/core/errors.js';

describe('Parser Module', () => {
    describe('parseEnvDocument', () => {
        it('should classify top-level values', () => {
            const input = [
                'key: value',
                'hosts:',
                '  - a',
                '  - b',
                'port: 8080',
                'debug: true',
                'empty:',
                'db:',
                '  host: localhost',
            ].join('\n');

            expect(parseEnvDocument(input)).toEqual({
                key: { kind: 'scalar', value: 'value' },
                hosts: { kind: 'sequence', items: ['a', 'b'] },
                port: { kind: 'other', value: '8080' },
                debug: { kind: 'other', value: 'true' },
                empty: { kind: 'other', value: '' },
                db: { kind: 'other', value: '{"host":"localhost"}' },
            });
        });

        it('should keep every digit of large integers', () => {
            const env = toEnvironment(parseEnvDocument('account_id: 12345678901234567890\nids: [98765432109876543210]\n'));

            expect(env).toEqual({ ACCOUNT_ID: '12345678901234567890', IDS: '98765432109876543210' });
        });

        it('should encode integers inside nested mappings', () => {
            expect(parseEnvDocument('db: {port: 5432, shard: 12345678901234567890}\n')).toEqual({
                db: { kind: 'other', value: '{"port":5432,"shard":"12345678901234567890"}' },
            });
        });

        it('should treat an empty document as no variables', () => {
            expect(parseEnvDocument('')).toEqual({});
        });

        it('should reject documents that are not mappings', () => {
            try {
                parseEnvDocument('- a\n- b\n', 'list.yml');
                expect.unreachable();
            } catch (error) {
                expect(error).toMatchObject({ code: ErrorCode.UNSUPPORTED_FORMAT });
            }
        });

        it('should reject invalid YAML', () => {
            expect(() => parseEnvDocument('key: [unterminated', 'bad.yml')).toThrow('bad.yml is not valid YAML');
        });
    });

    describe('toEnvironment', () => {
        it('should upper-case keys and stringify values', () => {
            const env = toEnvironment(parseEnvDocument('key: value\nports: [80, 443]\nratio: 1.5\n'));

            expect(env).toEqual({ KEY: 'value', PORTS: '80,443', RATIO: '1.5' });
        });
    });

    describe('toEnvString', () => {
        it('should map every variant', () => {
            expect(toEnvString({ kind: 'scalar', value: 'x' })).toBe('x');
            expect(toEnvString({ kind: 'sequence', items: ['a', 'b', 'c'] })).toBe('a,b,c');
            expect(toEnvString({ kind: 'sequence', items: [] })).toBe('');
            expect(toEnvString({ kind: 'other', value: '42' })).toBe('42');
        });

        it('should stringify sequence items that are not strings', () => {
            expect(classifyValue([1, null, 'x'])).toEqual({ kind: 'sequence', items: ['1', '', 'x'] });
        });
    });

    describe('isStructuredFile', () => {
        it('should accept .yml and .yaml only', () => {
            expect(isStructuredFile('cfg.yml')).toBe(true);
            expect(isStructuredFile('config/app.YAML')).toBe(true);
            expect(isStructuredFile('cfg.json')).toBe(false);
            expect(isStructuredFile('yml')).toBe(false);
        });
    });
});
