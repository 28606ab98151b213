/**
 * @fileoverview Registry Search Service
 *
 * Matches query predicates against the in-memory record store and returns
 * the matches projected onto the exposed fields.
 *
 * @remarks
 * Matching rules:
 * - Only keys in `searchable_fields` count as predicates; others are dropped
 * - Blank predicate values are dropped as well
 * - A record matches when EVERY predicate matches (logical AND)
 * - A predicate matches when the lower-cased value is a substring of the
 *   lower-cased field value. No punctuation or digit normalisation.
 * - No predicates left means no matches, never the whole table
 *
 * Every call is a pure function of (query, store, config): no state is kept
 * between calls and nothing shared is mutated.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { Counter, Histogram } from 'prom-client';
import { REGISTRY_CONFIG, RegistryConfig } from '../config';
import { FieldExposureService } from '../exposure';
import { RecordStore, RegistryRecord } from '../records';
import { SearchKind, SearchQuery } from './interfaces';

/* -------------------------------------------------------------------------- */
/*                              Prometheus Metrics                             */
/* -------------------------------------------------------------------------- */

const searchCounter = new Counter({
    name: 'registry_search_queries_total',
    help: 'Total number of registry search requests',
    labelNames: ['kind', 'status'],
});

const searchDuration = new Histogram({
    name: 'registry_search_duration_seconds',
    help: 'Registry search duration',
    labelNames: ['kind'],
    buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
});

/* -------------------------------------------------------------------------- */
/*                              Matching                                       */
/* -------------------------------------------------------------------------- */

type Predicate = readonly [field: string, value: string];

/**
 * Case-insensitive substring containment on the literal field text.
 * A record without the field never matches.
 */
export function matchesPredicate(record: RegistryRecord, [field, value]: Predicate): boolean {
    if (!Object.hasOwn(record, field)) {
        return false;
    }
    return record[field].toLowerCase().includes(value.toLowerCase());
}

/* -------------------------------------------------------------------------- */
/*                              Service Implementation                         */
/* -------------------------------------------------------------------------- */

@Injectable()
export class RegistrySearchService {
    private readonly logger = new Logger(RegistrySearchService.name);

    constructor(
        @Inject(REGISTRY_CONFIG) private readonly config: RegistryConfig,
        private readonly store: RecordStore,
        private readonly exposure: FieldExposureService,
    ) { }

    /**
     * Keeps the predicates that name a searchable field and carry a non-blank value.
     */
    recognisedPredicates(query: SearchQuery): Predicate[] {
        const searchable = this.config.fields.searchableFields;
        return Object.entries(query).filter(
            ([field, value]) => searchable.includes(field) && value.trim() !== '',
        );
    }

    /**
     * Raw matching records in store order, before projection.
     */
    match(query: SearchQuery): RegistryRecord[] {
        const predicates = this.recognisedPredicates(query);
        if (predicates.length === 0) {
            return [];
        }
        return this.store
            .all()
            .filter((record) => predicates.every((predicate) => matchesPredicate(record, predicate)));
    }

    /**
     * Partial, case-insensitive search across all recognised predicates.
     *
     * @returns Matches projected onto the exposed fields
     */
    search(query: SearchQuery): RegistryRecord[] {
        return this.observe('partial', Object.keys(query), () => this.exposure.projectAll(this.match(query)));
    }

    /**
     * Literal, case-sensitive equality on a single searchable field.
     * A non-searchable or unknown field yields no results.
     */
    searchExact(field: string, value: string): RegistryRecord[] {
        return this.observe('exact', [field], () => {
            if (!this.config.fields.searchableFields.includes(field)) {
                return [];
            }
            const matches = this.store.all().filter((record) => record[field] === value);
            return this.exposure.projectAll(matches);
        });
    }

    /**
     * Records metrics and, on success, a log line around one search.
     * Only field names are logged; predicate values may be identifiers.
     */
    private observe(kind: SearchKind, fields: string[], run: () => RegistryRecord[]): RegistryRecord[] {
        const timer = searchDuration.startTimer({ kind });

        try {
            const results = run();

            searchCounter.inc({ kind, status: results.length > 0 ? 'success' : 'empty' });
            this.logger.log({ msg: 'Search completed', kind, fields, resultCount: results.length });

            return results;
        } catch (error) {
            // Logged once, where the error envelope is built
            searchCounter.inc({ kind, status: 'error' });
            throw error;
        } finally {
            timer();
        }
    }
}
