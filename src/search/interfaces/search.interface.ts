/**
 * @fileoverview Search Service Interfaces
 *
 * Type definitions for search operations.
 */

import { RegistryRecord } from '../../records';

/**
 * Caller-supplied predicates: field name to the text it must contain.
 * Keys outside the searchable allow-list are ignored by the engine.
 */
export type SearchQuery = Readonly<Record<string, string>>;

/** 'partial' is case-insensitive containment, 'exact' is literal equality */
export type SearchKind = 'partial' | 'exact';

/**
 * Successful search, including the zero-match case.
 */
export interface SearchSuccessEnvelope {
    status: 'success';

    /** Human-readable count summary */
    message: string;

    count: number;

    /** Matches projected onto the exposed fields, in store order */
    results: RegistryRecord[];
}

export interface SearchErrorEnvelope {
    status: 'error';
    message: string;
}

export type SearchEnvelope = SearchSuccessEnvelope | SearchErrorEnvelope;
