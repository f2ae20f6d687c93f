export * from './converter.config';
