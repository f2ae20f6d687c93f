export * from './result';
export * from './column-letter';
export * from './sheet-type.vo';
export * from './column-mapping.vo';
export * from './merged-range.vo';
export * from './row-group-key.vo';
export * from './quality.vo';
