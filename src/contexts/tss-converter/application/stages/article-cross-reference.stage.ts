import { Inject, Injectable } from '@nestjs/common';
import { type ConverterConfig, converterConfig } from '../../config';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { CrossReferencer } from '../services/cross-referencer.service';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

/**
 * Step 7: Q열 기사 목록을 기사 헤더 열의 X 표시로 변환
 */
@Injectable()
export class ArticleCrossReferenceStage extends BasePipelineStage {
  readonly step = 7;
  readonly stepName = 'step7_crossref';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
    private readonly crossReferencer: CrossReferencer,
  ) {
    super(storage, config);
  }

  async process(inputPath: string, options: StageOptions = {}): Promise<string> {
    const reporter = this.reporterFrom(options);
    const input = await this.validateInput(inputPath);
    const outputPath = this.resolveOutputPath(input, options.outputPath);

    const workbook = await this.storage.load(input);
    const reader = this.readerFor(this.requireSheet(workbook, this.config.template.sheetName), reporter);
    const result = this.crossReferencer.crossReference(reader, this.config.crossReference);

    if (result.headers === 0) {
      reporter.addWarning(this.stepName, 'no_article_headers', 'No article headers to cross-reference');
    }
    reporter.updateStats({ crossReferenceMarks: result.marks });
    return this.finish(workbook, outputPath, reporter);
  }
}
