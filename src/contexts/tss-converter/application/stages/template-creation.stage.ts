import { Inject, Injectable } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import { type ConverterConfig, converterConfig } from '../../config';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

function solidFill(argb: string): ExcelJS.Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb } };
}

/**
 * Step 1: 빈 표준 템플릿 생성
 *
 * A1/A2 에 기사명/기사번호 라벨, 3행에 17개 헤더(A-Q)와 열 너비를 쓴다.
 */
@Injectable()
export class TemplateCreationStage extends BasePipelineStage {
  readonly step = 1;
  readonly stepName = 'step1_template';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
  ) {
    super(storage, config);
  }

  async process(inputPath: string, options: StageOptions = {}): Promise<string> {
    const reporter = this.reporterFrom(options);
    const input = await this.validateInput(inputPath);
    const outputPath = this.resolveOutputPath(input, options.outputPath);

    const workbook = this.buildTemplate();
    return this.finish(workbook, outputPath, reporter);
  }

  buildTemplate(): ExcelJS.Workbook {
    const { template } = this.config;
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet(template.sheetName);

    const labels = [template.articleNameLabel, template.articleNumberLabel];
    labels.forEach((label, index) => {
      const cell = worksheet.getCell(index + 1, 1);
      cell.value = label;
      cell.font = { bold: true, color: { argb: 'FF000000' } };
      cell.fill = solidFill(template.labelFill);
      cell.alignment = { horizontal: 'left', vertical: 'middle', wrapText: true };
    });

    template.headers.forEach((header, index) => {
      const column = index + 1;
      const cell = worksheet.getCell(template.headerRow, column);
      cell.value = header.title;
      cell.font = { bold: true, color: { argb: header.font } };
      cell.fill = solidFill(header.fill);
      cell.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true };
      worksheet.getColumn(column).width = header.width;
    });

    this.logger.log(`Created template with ${template.headers.length} headers`);
    return workbook;
  }
}
