export * from './tss-converter.module';
export * from './config';
export * from './domain/errors';
export * from './domain/value-objects';
export * from './application/services';
export * from './application/stages';
