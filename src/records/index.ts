/**
 * @fileoverview Records Barrel Export
 */

export * from './records.module';
export * from './record-store';
export * from './interfaces';
