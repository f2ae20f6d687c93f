export * from './conversion.controller';
