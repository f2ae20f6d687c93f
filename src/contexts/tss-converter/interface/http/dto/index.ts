export * from './convert.dto';
