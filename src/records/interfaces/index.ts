export * from './registry-record.interface';
