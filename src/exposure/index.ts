export * from './exposure.module';
export * from './field-exposure.service';
