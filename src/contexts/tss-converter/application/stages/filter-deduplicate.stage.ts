import { Inject, Injectable } from '@nestjs/common';
import { type ConverterConfig, converterConfig } from '../../config';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { DuplicateGrouper } from '../services/duplicate-grouper.service';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

/**
 * Step 6: 문서 유형이 없거나 NA 인 행 제거 후 SD 행 중복 병합
 */
@Injectable()
export class FilterDeduplicateStage extends BasePipelineStage {
  readonly step = 6;
  readonly stepName = 'step6_filter';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
    private readonly grouper: DuplicateGrouper,
  ) {
    super(storage, config);
  }

  async process(inputPath: string, options: StageOptions = {}): Promise<string> {
    const reporter = this.reporterFrom(options);
    const input = await this.validateInput(inputPath);
    const outputPath = this.resolveOutputPath(input, options.outputPath);
    const { filter } = this.config;

    const workbook = await this.storage.load(input);
    const reader = this.readerFor(this.requireSheet(workbook, this.config.template.sheetName), reporter);

    const removed = this.grouper.removeRows(reader, {
      startRow: filter.startRow,
      indicatorColumn: filter.indicatorColumn,
      naValues: filter.naValues,
    });
    const deduped = this.grouper.dedupe(reader, filter);

    const finalRows = reader.findLastDataRow(filter.startRow);
    reporter.updateStats({
      rowsRemoved: removed,
      duplicateGroups: deduped.groups,
      duplicatesRemoved: deduped.removed,
      dataRowsFinal: finalRows === null ? 0 : finalRows - filter.startRow + 1,
    });
    reporter.addInfo(
      this.stepName,
      'deduplication',
      `${removed} rows filtered, ${deduped.removed} duplicates merged`,
    );
    return this.finish(workbook, outputPath, reporter);
  }
}
