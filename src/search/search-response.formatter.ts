/**
 * @fileoverview Search Response Formatter
 *
 * Wraps engine output in the transport-agnostic envelope. Callers (the HTTP
 * layer) decide which status code accompanies each envelope.
 */

import { Injectable, Logger } from '@nestjs/common';
import { QueryError } from '../shared/errors';
import { RegistryRecord } from '../records';
import { SearchErrorEnvelope, SearchSuccessEnvelope } from './interfaces';

export const INTERNAL_ERROR_MESSAGE = 'Internal error while searching';

@Injectable()
export class SearchResponseFormatter {
    private readonly logger = new Logger(SearchResponseFormatter.name);

    /**
     * Builds the success envelope. Zero matches is a normal outcome.
     *
     * @param matches - Records already projected onto the exposed fields
     */
    format(matches: readonly RegistryRecord[]): SearchSuccessEnvelope {
        const count = matches.length;
        return {
            status: 'success',
            message: count === 0 ? 'No matching records found' : `Found ${count} matching record(s)`,
            count,
            results: [...matches],
        };
    }

    /**
     * Builds the error envelope. Query errors keep their message; anything
     * else is logged and reported generically.
     */
    formatError(error: unknown): SearchErrorEnvelope {
        if (error instanceof QueryError) {
            return { status: 'error', message: error.message };
        }

        this.logger.error({ msg: 'Search failed', error });
        return { status: 'error', message: INTERNAL_ERROR_MESSAGE };
    }
}
