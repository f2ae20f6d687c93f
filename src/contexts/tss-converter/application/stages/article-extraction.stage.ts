import { Inject, Injectable } from '@nestjs/common';
import type * as ExcelJS from 'exceljs';
import { type ConverterConfig, converterConfig } from '../../config';
import { InsufficientDataError } from '../../domain/errors';
import {
  columnLetterToNumber,
  columnNumberToLetter,
  isTextileSheet,
} from '../../domain/value-objects';
import { type WorkbookStoragePort, WORKBOOK_STORAGE_PORT } from '../ports';
import { HeaderLocator } from '../services/header-locator.service';
import type { QualityReporter } from '../services/quality-reporter';
import {
  type ArticlePair,
  VerticalListExtractor,
} from '../services/vertical-list-extractor.service';
import { BasePipelineStage, type StageOptions } from './base-pipeline.stage';

export interface ArticleExtractionOptions extends StageOptions {
  /** false 면 추출 결과가 없을 때 InsufficientDataError */
  allowMissingHeaders?: boolean;
}

/**
 * Step 2: M-Textile 시트에서 기사명/기사번호 추출 후 템플릿 R열부터 기록
 */
@Injectable()
export class ArticleExtractionStage extends BasePipelineStage {
  readonly step = 2;
  readonly stepName = 'step2_extraction';

  constructor(
    @Inject(WORKBOOK_STORAGE_PORT) storage: WorkbookStoragePort,
    @Inject(converterConfig.KEY) config: ConverterConfig,
    private readonly locator: HeaderLocator,
    private readonly extractor: VerticalListExtractor,
  ) {
    super(storage, config);
  }

  async process(
    templatePath: string,
    sourcePath: string,
    options: ArticleExtractionOptions = {},
  ): Promise<string> {
    const reporter = this.reporterFrom(options);
    const templateFile = await this.validateInput(templatePath);
    const sourceFile = await this.validateInput(sourcePath);
    const outputPath = this.resolveOutputPath(sourceFile, options.outputPath);

    const template = await this.storage.load(templateFile);
    const target = this.requireSheet(template, this.config.template.sheetName);
    const source = await this.storage.load(sourceFile);

    let pairs = this.extractPairs(source, reporter);
    if (pairs.length === 0) {
      const allowMissing = options.allowMissingHeaders ?? this.config.allowMissingHeaders;
      if (!allowMissing) {
        throw new InsufficientDataError('no article names could be extracted', {
          sourcePath: sourceFile,
        });
      }
      reporter.addWarning(
        this.stepName,
        'no_data_extracted',
        'No article data extracted; writing an empty placeholder column',
      );
      pairs = [{ name: '', number: '' }];
    }

    this.writeArticles(target, pairs);
    reporter.updateStats({ articlesExtracted: pairs.length });
    return this.finish(template, outputPath, reporter);
  }

  extractPairs(source: ExcelJS.Workbook, reporter: QualityReporter): ArticlePair[] {
    const { extraction } = this.config;
    const sheets = source.worksheets.filter((sheet) =>
      isTextileSheet(sheet.name, extraction.sheetMarkers),
    );

    if (sheets.length === 0) {
      reporter.addWarning(
        this.stepName,
        'missing_headers',
        `No sheet named like ${extraction.sheetMarkers.join(' / ')} found`,
      );
      return [];
    }

    const pairs: ArticlePair[] = [];
    for (const sheet of sheets) {
      const reader = this.readerFor(sheet, reporter);
      const window = { maxRows: extraction.searchRows, maxColumns: extraction.searchColumns };

      const anchor = this.locator.find(reader, extraction.anchorMarkers, window);
      if (!anchor) {
        reporter.addWarning(
          this.stepName,
          'missing_headers',
          `"${extraction.anchorMarkers.join('" / "')}" not found in ${sheet.name}`,
        );
        continue;
      }

      // 기사명/번호 헤더는 앵커 행에서 위로 찾는다
      const upward = {
        direction: 'up' as const,
        startRow: anchor.row,
        maxRows: anchor.row,
        maxColumns: extraction.searchColumns,
      };
      const nameHeaders = this.locator.findAll(reader, extraction.nameHeaders, upward);
      if (nameHeaders.length === 0) {
        reporter.addWarning(
          this.stepName,
          'missing_headers',
          `No article name header above ${sheet.name} row ${anchor.row}`,
        );
        continue;
      }
      const numberHeaders = this.locator.findAll(reader, extraction.numberHeaders, upward);

      const names = this.extractor.extractAll(reader, nameHeaders);
      const numbers = this.extractor.extractPaired(reader, nameHeaders, numberHeaders);
      this.logger.log(`[${sheet.name}] ${names.length} names, ${numbers.length} numbers`);
      pairs.push(...this.extractor.pair(names, numbers).slice(0, extraction.maxItems));
    }

    return this.extractor.dedupe(pairs);
  }

  /**
   * 기사명: <col>1:<col>9 병합 + 90도 회전, 기사번호: 10행
   */
  writeArticles(worksheet: ExcelJS.Worksheet, pairs: readonly ArticlePair[]): void {
    const { template } = this.config;
    const fill: ExcelJS.Fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: template.articleFill },
    };
    const firstColumn = columnLetterToNumber(template.articleStartColumn);

    pairs.forEach((pair, index) => {
      const column = firstColumn + index;
      const letter = columnNumberToLetter(column);
      worksheet.mergeCells(`${letter}1:${letter}${template.articleNameRows}`);

      const nameCell = worksheet.getCell(1, column);
      nameCell.value = pair.name;
      nameCell.alignment = {
        textRotation: 90,
        horizontal: 'center',
        vertical: 'middle',
        wrapText: true,
      };
      nameCell.fill = fill;

      const numberCell = worksheet.getCell(template.articleNumberRow, column);
      numberCell.value = pair.number;
      numberCell.alignment = { horizontal: 'center', vertical: 'middle' };
      numberCell.fill = fill;
    });
  }
}
