export * from './converter.errors';
