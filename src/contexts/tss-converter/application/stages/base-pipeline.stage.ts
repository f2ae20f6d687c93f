import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import { Logger } from '@nestjs/common';
import type * as ExcelJS from 'exceljs';
import type { ConverterConfig } from '../../config';
import {
  FileAccessError,
  FileFormatError,
  ValidationError,
  WorksheetNotFoundError,
} from '../../domain/errors';
import type { WorkbookStoragePort } from '../ports';
import { CellGridReader } from '../services/cell-grid-reader';
import { QualityReporter } from '../services/quality-reporter';

export interface StageOptions {
  /** 생략 시 `<base> - Step<N>.xlsx` */
  outputPath?: string;
  reporter?: QualityReporter;
}

const SUPPORTED_EXTENSIONS = ['.xlsx'];
const STEP_SUFFIX = / - Step\d+$/i;

/**
 * 입력 파일명에서 확장자와 ` - StepN` 접미사를 제거한 이름
 */
export function baseNameOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath)).replace(STEP_SUFFIX, '');
}

/**
 * 파이프라인 단계 공통 기반
 *
 * 단계는 파일을 받아 새 파일을 만든다. 단계 사이에 메모리 상태는 공유하지 않는다.
 */
export abstract class BasePipelineStage {
  abstract readonly step: number;
  abstract readonly stepName: string;

  protected readonly logger = new Logger(this.constructor.name);

  constructor(
    protected readonly storage: WorkbookStoragePort,
    protected readonly config: ConverterConfig,
  ) {}

  resolveOutputPath(inputPath: string, outputPath?: string): string {
    if (outputPath) {
      return path.resolve(this.config.baseDir, outputPath);
    }
    const directory = path.resolve(this.config.baseDir, this.config.outputDir);
    return path.join(directory, `${baseNameOf(inputPath)} - Step${this.step}.xlsx`);
  }

  /**
   * 존재, 확장자, 크기 검사. 절대 경로를 돌려준다.
   */
  protected async validateInput(filePath: string): Promise<string> {
    const resolved = path.resolve(this.config.baseDir, filePath);
    const extension = path.extname(resolved).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.includes(extension)) {
      throw new FileFormatError(resolved, `unsupported extension "${extension || 'none'}"`);
    }

    let size: number;
    try {
      const info = await stat(resolved);
      if (!info.isFile()) {
        throw new FileFormatError(resolved, 'not a regular file');
      }
      size = info.size;
    } catch (error) {
      if (error instanceof FileFormatError) throw error;
      throw new FileAccessError(resolved, 'read', error);
    }

    const limit = this.config.maxFileSizeMb * 1024 * 1024;
    if (size > limit) {
      throw new ValidationError(
        `File ${resolved} exceeds ${this.config.maxFileSizeMb}MB`,
        'FILE_TOO_LARGE',
        { size, limit },
      );
    }
    return resolved;
  }

  protected requireSheet(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
    const worksheet = workbook.getWorksheet(name);
    if (!worksheet) {
      throw new WorksheetNotFoundError(
        name,
        workbook.worksheets.map((sheet) => sheet.name),
      );
    }
    return worksheet;
  }

  protected readerFor(worksheet: ExcelJS.Worksheet, reporter: QualityReporter): CellGridReader {
    return new CellGridReader(worksheet, { reporter, step: this.stepName });
  }

  protected reporterFrom(options: StageOptions): QualityReporter {
    return options.reporter ?? new QualityReporter();
  }

  protected async finish(
    workbook: ExcelJS.Workbook,
    outputPath: string,
    reporter: QualityReporter,
  ): Promise<string> {
    await this.storage.save(workbook, outputPath);
    reporter.stepCompleted(this.stepName);
    this.logger.log(`Step ${this.step} completed: ${outputPath}`);
    return outputPath;
  }
}
