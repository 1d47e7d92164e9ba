/**
 * Smart Redaction
 *
 * Masks sensitive fields in log data. Field names are matched in every
 * case variation (camelCase, snake_case, kebab-case, etc.) through a Set.
 *
 * Staged values are secrets by nature, so `value` and its relatives are
 * masked alongside the usual credential names.
 *
 * @example
 * ```typescript
 * maskValue('mysecretpassword', 'Password', 'info')
 * // => '<Password ************... (16) />'
 *
 * maskValue('mysecretpassword', 'Password', 'verbose')
 * // => '<Password myse********... (16) />'
 * ```
 */
import type { LogLevel } from './types.js';

const MASK_MAX_LENGTH = 12;

/**
 * Fields whose string values never reach a log output in clear.
 */
const SENSITIVE_FIELDS = [
    'value',
    'staged_value',
    'remote_value',
    'secret_string',
    'passphrase',
    'password',
    'secret',
    'token',
    'credential',
    'api_key',
    'access_key',
    'secret_key',
    'secret_access_key',
    'session_token',
    'private_key',
    'encryption_key',
];

const MASKED_FIELDS = new Set<string>();

/** Split `apiKey`, `api_key`, `api-key` or `API KEY` into lowercase words. */
function wordsOf(field: string): string[] {

    return field
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .split(/[-_\s]+/)
        .filter(Boolean)
        .map((word) => word.toLowerCase());

}

function capitalized(word: string): string {

    return word.charAt(0).toUpperCase() + word.slice(1);

}

/** `api_key` -> `ApiKey`, used as the mask label. */
function labelOf(field: string): string {

    return wordsOf(field).map(capitalized).join('');

}

/**
 * Every spelling a field is likely to appear under in event data or env.
 */
function spellingsOf(field: string): string[] {

    const words = wordsOf(field);
    const [head = '', ...rest] = words;
    const joined = words.join('');

    return [
        field,
        field.toLowerCase(),
        field.toUpperCase(),
        head + rest.map(capitalized).join(''),
        words.join('_'),
        words.join('-'),
        words.map(capitalized).join(''),
        joined,
        joined.toUpperCase(),
        words.join('_').toUpperCase(),
    ];

}

/**
 * Mask additional fields, with and without the `stagecraft_` prefix used
 * by environment variables.
 */
export function addMaskedFields(fields: string[]): void {

    for (const field of fields) {

        for (const spelling of [...spellingsOf(field), ...spellingsOf(`stagecraft_${field}`)]) {

            MASKED_FIELDS.add(spelling);

        }

    }

}

addMaskedFields(SENSITIVE_FIELDS);

export function isMaskedField(key: string): boolean {

    return MASKED_FIELDS.has(key);

}

// ─────────────────────────────────────────────────────────────
// Masking
// ─────────────────────────────────────────────────────────────

/**
 * Mask a value with asterisks.
 *
 * Format: `<FieldName mask (length) />`. At verbose level the first
 * four characters stay visible.
 */
export function maskValue(value: string, prefix: string, level: LogLevel): string {

    const valueLen = value.length;
    const maskLen = Math.min(valueLen, MASK_MAX_LENGTH);

    let masked = '*'.repeat(maskLen);

    if (level === 'verbose' && valueLen >= 4) {

        masked = value.slice(0, 4) + '*'.repeat(Math.max(0, maskLen - 4));

    }

    if (valueLen > MASK_MAX_LENGTH) {

        masked += '...';

    }

    return `<${labelOf(prefix)} ${masked} (${valueLen}) />`;

}

// ─────────────────────────────────────────────────────────────
// Data Filtering
// ─────────────────────────────────────────────────────────────

function isPlainRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && !(value instanceof Date)
        && !(value instanceof Error)
        && !(value instanceof URL);

}

function filterValue(value: unknown, level: LogLevel): unknown {

    if (Array.isArray(value)) {

        return value.map((item) => filterValue(item, level));

    }

    if (isPlainRecord(value)) {

        return filterData(value, level);

    }

    return value;

}

/**
 * Recursively filter an object, masking sensitive string fields.
 *
 * Returns a copy. Errors, dates and URLs pass through untouched.
 *
 * @example
 * ```typescript
 * filterData({ name: '/app/db', value: 'hunter2' }, 'info')
 * // { name: '/app/db', value: '<Value ******* (7) />' }
 * ```
 */
export function filterData(
    entry: Record<string, unknown>,
    level: LogLevel,
): Record<string, unknown> {

    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {

        if (MASKED_FIELDS.has(key) && typeof value === 'string') {

            filtered[key] = maskValue(value, key, level);

        }
        else {

            filtered[key] = filterValue(value, level);

        }

    }

    return filtered;

}
