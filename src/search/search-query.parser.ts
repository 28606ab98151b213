import { z } from 'zod';
import { QueryError } from '../shared/errors';
import { SearchQuery } from './interfaces';

const queryObjectSchema = z.record(z.string());

/**
 * Validates raw query input.
 *
 * Accepts a flat object of string values, or the same object nested under a
 * `parameters` key. Unknown field names pass through untouched.
 *
 * @throws QueryError naming the offending key
 */
export function parseQuery(input: unknown): SearchQuery {
    const nested = isPlainObject(input) && Object.hasOwn(input, 'parameters');
    const target = nested ? input.parameters : input;

    const result = queryObjectSchema.safeParse(target);
    if (!result.success) {
        const issues = result.error.errors.map((issue) => {
            const keyPath = [...(nested ? ['parameters'] : []), ...issue.path].join('.');
            return `${keyPath || '(root)'}: ${issue.message}`;
        });
        throw new QueryError(`Invalid query: ${issues.join('; ')}`);
    }

    return Object.freeze({ ...result.data });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
