/**
 * Safe Environment Projection
 *
 * Turns a decrypted YAML document into environment variables for `exec`.
 *
 * Each top-level value is classified into a closed set of shapes:
 * - scalar:   strings, exported as-is
 * - sequence: lists, items joined with ","
 * - other:    numbers, booleans, null, nested mappings, stringified once
 *
 * Integers are read as bigint so values past 2^53 keep every digit.
 *
 * Keys are upper-cased.
 */

import YAML from 'yaml';
import { ErrorCode, SafeError, errorMessage } from './errors.js';

/** Logical file extensions `exec` can read */
export const STRUCTURED_EXTENSIONS = ['.yml', '.yaml'];

/**
 * A decoded top-level value
 */
export type EnvValue =
    | { kind: 'scalar'; value: string }
    | { kind: 'sequence'; items: string[] }
    | { kind: 'other'; value: string };

/**
 * Whether a logical (unsuffixed) filename holds a structured document
 */
export function isStructuredFile(logicalPath: string): boolean {
    const lower = logicalPath.toLowerCase();
    return STRUCTURED_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Integers are decoded as bigint; keep the ones JSON can carry as numbers
function toJsonInteger(value: bigint): number | string {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

function stringifyOther(value: unknown): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'object') {
        return JSON.stringify(value, (_key, nested: unknown) =>
            typeof nested === 'bigint' ? toJsonInteger(nested) : nested
        );
    }
    return String(value);
}

/**
 * Classifies one decoded value
 */
export function classifyValue(value: unknown): EnvValue {
    if (typeof value === 'string') {
        return { kind: 'scalar', value };
    }
    if (Array.isArray(value)) {
        return { kind: 'sequence', items: value.map(stringifyOther) };
    }
    return { kind: 'other', value: stringifyOther(value) };
}

/**
 * Environment string for a classified value
 */
export function toEnvString(value: EnvValue): string {
    switch (value.kind) {
        case 'scalar':
            return value.value;
        case 'sequence':
            return value.items.join(',');
        case 'other':
            return value.value;
    }
}

/**
 * Parses a flat YAML mapping into classified values
 *
 * @param content - Decrypted document
 * @param source - Name used in error messages
 */
export function parseEnvDocument(content: string, source: string = 'document'): Record<string, EnvValue> {
    let document: unknown;
    try {
        document = YAML.parse(content, { intAsBigInt: true });
    } catch (error) {
        throw new SafeError({
            code: ErrorCode.UNSUPPORTED_FORMAT,
            message: `${source} is not valid YAML: ${errorMessage(error)}`,
            path: source,
            cause: error,
        });
    }

    if (document === null || document === undefined) {
        return {};
    }

    if (!isRecord(document)) {
        throw new SafeError({
            code: ErrorCode.UNSUPPORTED_FORMAT,
            message: `${source} must contain a mapping of keys to values`,
            path: source,
        });
    }

    const values: Record<string, EnvValue> = {};
    for (const [key, raw] of Object.entries(document)) {
        values[key] = classifyValue(raw);
    }
    return values;
}

/**
 * Projects classified values to environment variables
 */
export function toEnvironment(values: Record<string, EnvValue>): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
        env[key.toUpperCase()] = toEnvString(value);
    }
    return env;
}
