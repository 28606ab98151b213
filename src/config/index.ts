/**
 * @fileoverview Config Barrel Export
 */

export * from './config.module';
export * from './registry-config.loader';
export * from './registry-config.constants';
export * from './listen-address';
export * from './interfaces/registry-config.interface';
