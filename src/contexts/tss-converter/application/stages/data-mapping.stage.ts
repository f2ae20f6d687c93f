import { Inject, Injectable } from '@nestjs/common';
import { type ConverterConfig, converterConfig } from '../../config';
import { SheetType, classifySheet, columnLetterToNumber } from '../../domain/value-objects';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { ColumnRemapper } from '../services/column-remapper.service';
import { HeaderLocator } from '../services/header-locator.service';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

/**
 * Step 4: 채워진 원본 시트들을 시트 유형별 매핑으로 템플릿 데이터 행에 옮긴다
 */
@Injectable()
export class DataMappingStage extends BasePipelineStage {
  readonly step = 4;
  readonly stepName = 'step4_mapping';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
    private readonly locator: HeaderLocator,
    private readonly remapper: ColumnRemapper,
  ) {
    super(storage, config);
  }

  async process(
    sourcePath: string,
    templatePath: string,
    options: StageOptions = {},
  ): Promise<string> {
    const reporter = this.reporterFrom(options);
    const sourceFile = await this.validateInput(sourcePath);
    const templateFile = await this.validateInput(templatePath);
    const outputPath = this.resolveOutputPath(sourceFile, options.outputPath);
    const { mapping } = this.config;

    const template = await this.storage.load(templateFile);
    const target = this.readerFor(this.requireSheet(template, this.config.template.sheetName), reporter);
    const source = await this.storage.load(sourceFile);

    // 이미 B열이 채워진 행 다음부터 쓴다
    const occupied = columnLetterToNumber(mapping.occupiedColumn);
    let targetRow = mapping.targetStartRow;
    while (target.read(targetRow, occupied) !== '') {
      targetRow++;
    }
    const firstRow = targetRow;

    for (const sheet of source.worksheets) {
      const type = classifySheet(sheet.name);
      if (type === SheetType.Unclassified) {
        this.logger.debug(`[${sheet.name}] unclassified, skipped`);
        continue;
      }

      const reader = this.readerFor(sheet, reporter);
      if (reader.findLastDataRow() === null) continue;

      const anchor = this.locator.find(reader, mapping.anchorMarkers, {
        maxRows: mapping.searchRows,
        maxColumns: reader.columnCount,
      });
      if (!anchor) {
        reporter.addWarning(
          this.stepName,
          'missing_headers',
          `"${mapping.anchorMarkers.join('" / "')}" not found in ${sheet.name}`,
        );
        continue;
      }

      const rows = this.remapper.mapSheet(reader, anchor.row + mapping.dataOffset, type);
      for (const row of rows) {
        for (const [column, value] of row) {
          target.write(targetRow, column, value);
        }
        targetRow++;
      }
      this.logger.log(`[${sheet.name}] ${rows.length} rows mapped as ${type}`);
    }

    reporter.updateStats({ dataRowsMapped: targetRow - firstRow });
    return this.finish(template, outputPath, reporter);
  }
}
