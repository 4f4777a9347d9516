/**
 * Stage result codecs
 *
 * Each stage result type has a codec that turns it into payload text and back.
 * Payloads carry a schema version; a record written under a different version,
 * or one whose data fails the stage's structural check, decodes to
 * CacheCorruptionError and is treated as a miss by the runner.
 */

import { CacheCorruptionError, getErrorMessage } from '../errors';

export interface Codec<T> {
    readonly schemaVersion: number;
    encode(value: T): string;
    /** @throws CacheCorruptionError when the payload cannot be trusted */
    decode(payload: string): T;
}

/**
 * Structural check for decoded data. Returns the typed value or throws.
 */
export type Validator<T> = (data: unknown) => T;

interface Envelope {
    schemaVersion: number;
    data: unknown;
}

function isEnvelope(value: unknown): value is Envelope {
    return typeof value === 'object'
        && value !== null
        && 'schemaVersion' in value
        && typeof value.schemaVersion === 'number'
        && 'data' in value;
}

/**
 * Build a JSON codec for a result type.
 *
 * @param schemaVersion Bump whenever the result type changes shape
 * @param validate Structural check applied on decode
 */
export function createJsonCodec<T>(schemaVersion: number, validate: Validator<T>): Codec<T> {
    return {
        schemaVersion,
        encode(value: T): string {
            const envelope: Envelope = { schemaVersion, data: value };
            return JSON.stringify(envelope);
        },
        decode(payload: string): T {
            let parsed: unknown;
            try {
                parsed = JSON.parse(payload);
            } catch (error) {
                throw new CacheCorruptionError(`Payload is not valid JSON: ${getErrorMessage(error)}`, { cause: error });
            }
            if (!isEnvelope(parsed)) {
                throw new CacheCorruptionError('Payload is missing its schema envelope');
            }
            if (parsed.schemaVersion !== schemaVersion) {
                throw new CacheCorruptionError(
                    `Payload schema version ${parsed.schemaVersion} does not match ${schemaVersion}`
                );
            }
            try {
                return validate(parsed.data);
            } catch (error) {
                throw new CacheCorruptionError(`Payload failed validation: ${getErrorMessage(error)}`, { cause: error });
            }
        },
    };
}

// ============================================================================
// Validation helpers
// ============================================================================

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Check helpers
// ============================================================================

/**
 * Small assertion helpers for writing Validators by hand.
 * Each throws an Error naming the offending field.
 */
export const check = {
    object(value: unknown, field: string): Record<string, unknown> {
        if (!isPlainRecord(value)) {
            throw new Error(`"${field}" must be an object`);
        }
        return value;
    },
    array(value: unknown, field: string): unknown[] {
        if (!Array.isArray(value)) {
            throw new Error(`"${field}" must be an array`);
        }
        return value;
    },
    string(value: unknown, field: string): string {
        if (typeof value !== 'string') {
            throw new Error(`"${field}" must be a string`);
        }
        return value;
    },
    optionalString(value: unknown, field: string): string | undefined {
        return value === undefined ? undefined : check.string(value, field);
    },
    number(value: unknown, field: string): number {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new Error(`"${field}" must be a number`);
        }
        return value;
    },
    boolean(value: unknown, field: string): boolean {
        if (typeof value !== 'boolean') {
            throw new Error(`"${field}" must be a boolean`);
        }
        return value;
    },
    stringArray(value: unknown, field: string): string[] {
        return check.array(value, field).map((item, i) => check.string(item, `${field}[${i}]`));
    },
    stringRecord<V>(value: unknown, field: string, item: (v: unknown, f: string) => V): Record<string, V> {
        const obj = check.object(value, field);
        const result: Record<string, V> = {};
        for (const [k, v] of Object.entries(obj)) {
            result[k] = item(v, `${field}.${k}`);
        }
        return result;
    },
};
