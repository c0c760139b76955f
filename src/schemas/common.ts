import { z } from 'zod';

/**
 * Lenient building blocks for LLM output. Models routinely emit `null`,
 * numbers where strings are expected, or a lone string instead of a list;
 * those shapes are normalised here. Anything structurally different (an
 * object where a list belongs, for instance) still fails validation.
 */

export const looseString = z
    .union([z.string(), z.number()])
    .nullish()
    .transform(value => (value === null || value === undefined ? '' : String(value).trim()));

export const stringList = z
    .union([z.array(z.union([z.string(), z.number()]).nullable()), z.string()])
    .nullish()
    .transform(value => {
        if (value === null || value === undefined) {
            return [];
        }
        const items = typeof value === 'string' ? [value] : value;
        return items
            .filter((item): item is string | number => item !== null)
            .map(item => String(item).trim())
            .filter(item => item.length > 0);
    });

export function listOf<T extends z.ZodTypeAny>(item: T) {
    return z.preprocess(value => value ?? [], z.array(item));
}

export function objectOrEmpty<T extends z.ZodTypeAny>(shape: T) {
    return z.preprocess(value => value ?? {}, shape);
}

export function formatIssues(error: z.ZodError): string {
    return error.errors
        .slice(0, 5)
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}
