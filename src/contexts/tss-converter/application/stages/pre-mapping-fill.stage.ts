import { Inject, Injectable } from '@nestjs/common';
import { type ConverterConfig, converterConfig } from '../../config';
import { SheetType, classifySheet } from '../../domain/value-objects';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { FillForwardFiller } from '../services/fill-forward-filler.service';
import { HeaderLocator } from '../services/header-locator.service';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

/**
 * Step 3: 원본 워크북의 분류된 시트마다 지정 열을 위 값으로 채운다
 */
@Injectable()
export class PreMappingFillStage extends BasePipelineStage {
  readonly step = 3;
  readonly stepName = 'step3_prefill';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
    private readonly locator: HeaderLocator,
    private readonly filler: FillForwardFiller,
  ) {
    super(storage, config);
  }

  async process(sourcePath: string, options: StageOptions = {}): Promise<string> {
    const reporter = this.reporterFrom(options);
    const sourceFile = await this.validateInput(sourcePath);
    const outputPath = this.resolveOutputPath(sourceFile, options.outputPath);
    const { preFill } = this.config;

    const workbook = await this.storage.load(sourceFile);
    let filledCells = 0;

    for (const sheet of workbook.worksheets) {
      const type = classifySheet(sheet.name);
      const columns = type === SheetType.Unclassified ? [] : preFill.columns[type] ?? [];
      if (columns.length === 0) continue;

      const reader = this.readerFor(sheet, reporter);
      const anchor = this.locator.find(reader, preFill.anchorMarkers, {
        maxRows: preFill.searchRows,
        maxColumns: reader.columnCount,
      });
      if (!anchor) {
        this.logger.debug(`[${sheet.name}] no anchor, nothing to fill`);
        continue;
      }

      const filled = this.filler.fill(reader, columns, anchor.row + preFill.dataOffset);
      filledCells += Object.values(filled).reduce((sum, count) => sum + count, 0);
    }

    reporter.updateStats({ preFilledCells: filledCells });
    return this.finish(workbook, outputPath, reporter);
  }
}
