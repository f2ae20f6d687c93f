import { Inject, Injectable } from '@nestjs/common';
import { type ConverterConfig, converterConfig } from '../../config';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { FillForwardFiller } from '../services/fill-forward-filler.service';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

/**
 * Step 5: 매핑된 데이터 행의 D/E/F 열 채우기
 */
@Injectable()
export class DataFillStage extends BasePipelineStage {
  readonly step = 5;
  readonly stepName = 'step5_fill';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
    private readonly filler: FillForwardFiller,
  ) {
    super(storage, config);
  }

  async process(inputPath: string, options: StageOptions = {}): Promise<string> {
    const reporter = this.reporterFrom(options);
    const input = await this.validateInput(inputPath);
    const outputPath = this.resolveOutputPath(input, options.outputPath);

    const workbook = await this.storage.load(input);
    const reader = this.readerFor(this.requireSheet(workbook, this.config.template.sheetName), reporter);
    const filled = this.filler.fill(reader, this.config.fill.columns, this.config.fill.startRow);

    reporter.updateStats({
      filledCells: Object.values(filled).reduce((sum, count) => sum + count, 0),
    });
    return this.finish(workbook, outputPath, reporter);
  }
}
