export * from './base-pipeline.stage';
export * from './template-creation.stage';
export * from './article-extraction.stage';
export * from './pre-mapping-fill.stage';
export * from './data-mapping.stage';
export * from './data-fill.stage';
export * from './filter-deduplicate.stage';
export * from './article-cross-reference.stage';
