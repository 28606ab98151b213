/**
 * @fileoverview Search Barrel Export
 */

export * from './search.module';
export * from './registry-search.service';
export * from './search-response.formatter';
export * from './search-query.parser';
export * from './interfaces';
