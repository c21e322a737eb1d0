import { z } from 'zod';
import { NOT_AVAILABLE } from '../variant/types.js';

/**
 * Outcome of pulling one sub-field out of a service response.
 */
export type FieldResult<T> =
    | { status: 'present'; value: T }
    | { status: 'absent'; path: string }
    | { status: 'malformed'; path: string; reason: string };

export type FieldPath = ReadonlyArray<string | number>;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatPath(path: FieldPath): string {
    return path.map(segment => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`)).join('').replace(/^\./, '');
}

/**
 * Walk `path` into `source` and validate the leaf with `schema`.
 * A missing step is `absent`; a step of the wrong shape or a leaf that fails
 * the schema is `malformed`.
 */
export function extractField<T>(source: unknown, path: FieldPath, schema: z.ZodType<T, z.ZodTypeDef, unknown>): FieldResult<T> {
    const pathText = formatPath(path);
    let current: unknown = source;

    for (const segment of path) {
        if (current === undefined || current === null) {
            return { status: 'absent', path: pathText };
        }

        if (typeof segment === 'number') {
            if (!Array.isArray(current)) {
                return { status: 'malformed', path: pathText, reason: `expected an array before [${segment}]` };
            }
            current = current[segment];
        } else {
            if (!isRecord(current)) {
                return { status: 'malformed', path: pathText, reason: `expected an object before '${segment}'` };
            }
            current = current[segment];
        }
    }

    if (current === undefined || current === null) {
        return { status: 'absent', path: pathText };
    }

    const parsed = schema.safeParse(current);
    if (!parsed.success) {
        return { status: 'malformed', path: pathText, reason: parsed.error.issues[0]?.message ?? 'invalid value' };
    }
    return { status: 'present', value: parsed.data };
}

export function mapField<T, U>(result: FieldResult<T>, transform: (value: T) => U): FieldResult<U> {
    return result.status === 'present' ? { status: 'present', value: transform(result.value) } : result;
}

/**
 * The field's value, or the N/A sentinel when it is absent or malformed.
 */
export function valueOrNotAvailable(result: FieldResult<string>): string {
    return result.status === 'present' ? result.value : NOT_AVAILABLE;
}

export const nonEmptyString = z.string().trim().min(1);
