export * from './registry.errors';
