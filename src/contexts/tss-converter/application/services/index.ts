export * from './quality-reporter';
export * from './cell-grid-reader';
export * from './header-locator.service';
export * from './vertical-list-extractor.service';
export * from './column-remapper.service';
export * from './fill-forward-filler.service';
export * from './duplicate-grouper.service';
export * from './cross-referencer.service';
export * from './conversion-pipeline.service';
