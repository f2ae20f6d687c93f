import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { type ConverterConfig, converterConfig } from '../../config';
import { TsConverterError } from '../../domain/errors';
import type { QualityReport, QualitySummary } from '../../domain/value-objects';
import {
  ArticleCrossReferenceStage,
  ArticleExtractionStage,
  DataFillStage,
  DataMappingStage,
  FilterDeduplicateStage,
  PreMappingFillStage,
  TemplateCreationStage,
  baseNameOf,
} from '../stages';
import { QualityReporter } from './quality-reporter';

export interface PipelineRunOptions {
  /** 중간/최종 파일 위치. 생략 시 설정의 outputDir */
  outputDir?: string;
  allowMissingHeaders?: boolean;
  /** false 면 Step1-6 파일 삭제 */
  keepIntermediates?: boolean;
}

export interface PipelineRunResult {
  outputPath: string;
  intermediatePaths: string[];
  quality: QualitySummary;
  report: QualityReport;
}

export interface UploadConversionResult {
  fileName: string;
  buffer: Buffer;
  quality: QualitySummary;
}

export const FINAL_PREFIX = 'Standard Internal TSS - ';

/**
 * 7단계 변환 파이프라인 실행기 (문서 1건씩 순차 실행)
 */
@Injectable()
export class ConversionPipelineService {
  private readonly logger = new Logger(ConversionPipelineService.name);

  constructor(
    @Inject(converterConfig.KEY) private readonly config: ConverterConfig,
    private readonly templateStage: TemplateCreationStage,
    private readonly extractionStage: ArticleExtractionStage,
    private readonly preFillStage: PreMappingFillStage,
    private readonly mappingStage: DataMappingStage,
    private readonly fillStage: DataFillStage,
    private readonly filterStage: FilterDeduplicateStage,
    private readonly crossReferenceStage: ArticleCrossReferenceStage,
  ) {}

  async run(inputPath: string, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const reporter = new QualityReporter();
    reporter.startProcessing();

    const directory = path.resolve(
      this.config.baseDir,
      options.outputDir ?? this.config.outputDir,
    );
    const base = baseNameOf(inputPath);
    const stepPath = (step: number) => path.join(directory, `${base} - Step${step}.xlsx`);
    const intermediatePaths: string[] = [];
    const track = (filePath: string) => {
      intermediatePaths.push(filePath);
      return filePath;
    };

    this.logger.log(`Converting ${inputPath}`);
    let outputPath: string;
    try {
      const template = track(
        await this.templateStage.process(inputPath, { outputPath: stepPath(1), reporter }),
      );
      const withArticles = track(
        await this.extractionStage.process(template, inputPath, {
          outputPath: stepPath(2),
          reporter,
          allowMissingHeaders: options.allowMissingHeaders,
        }),
      );
      const filledSource = track(
        await this.preFillStage.process(inputPath, { outputPath: stepPath(3), reporter }),
      );
      const mapped = track(
        await this.mappingStage.process(filledSource, withArticles, {
          outputPath: stepPath(4),
          reporter,
        }),
      );
      const filled = track(
        await this.fillStage.process(mapped, { outputPath: stepPath(5), reporter }),
      );
      const filtered = track(
        await this.filterStage.process(filled, { outputPath: stepPath(6), reporter }),
      );
      outputPath = await this.crossReferenceStage.process(filtered, {
        outputPath: path.join(directory, `${FINAL_PREFIX}${base}.xlsx`),
        reporter,
      });
    } catch (error) {
      reporter.addError(
        'pipeline',
        'processing_failed',
        error instanceof Error ? error.message : String(error),
        error instanceof TsConverterError ? error.code : undefined,
      );
      reporter.endProcessing();
      throw error;
    }

    if (options.keepIntermediates === false) {
      await Promise.all(intermediatePaths.map((filePath) => rm(filePath, { force: true })));
    }

    reporter.endProcessing();
    const quality = reporter.getUserSummary();
    this.logger.log(`Finished ${outputPath} (quality ${quality.qualityScore})`);

    return {
      outputPath,
      intermediatePaths: options.keepIntermediates === false ? [] : intermediatePaths,
      quality,
      report: reporter.getDetailedReport(),
    };
  }

  /**
   * 업로드 바이트를 임시 디렉터리에서 변환하고 결과 바이트를 돌려준다
   */
  async convertUpload(
    bytes: Buffer,
    originalName: string,
    options: Pick<PipelineRunOptions, 'allowMissingHeaders'> = {},
  ): Promise<UploadConversionResult> {
    const workDir = await mkdtemp(path.join(os.tmpdir(), 'tss-converter-'));
    try {
      const inputPath = path.join(workDir, path.basename(originalName));
      await writeFile(inputPath, bytes);

      const result = await this.run(inputPath, {
        outputDir: workDir,
        allowMissingHeaders: options.allowMissingHeaders,
        keepIntermediates: false,
      });

      return {
        fileName: path.basename(result.outputPath),
        buffer: await readFile(result.outputPath),
        quality: result.quality,
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
