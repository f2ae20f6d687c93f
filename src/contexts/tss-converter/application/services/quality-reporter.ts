import { Logger } from '@nestjs/common';
import type {
  IssueLevel,
  QualityIssue,
  QualityReport,
  QualitySummary,
} from '../../domain/value-objects';

const CRITICAL_ERRORS = ['file_validation_failed', 'processing_failed'];
const DATA_WARNINGS = ['missing_headers', 'formula_errors'];
const VALIDATION_WARNINGS = ['validation_warning', 'validation_failed'];
const DATA_CATEGORIES = ['missing_headers', 'formula_errors', 'data_validation'];

/**
 * 변환 1회 동안의 품질 이슈 수집기
 *
 * 문서마다 새로 만든다. 점수는 100 에서 시작해 이슈 수준/분류별로 차감한다.
 */
export class QualityReporter {
  private readonly logger = new Logger(QualityReporter.name);
  private readonly issues: QualityIssue[] = [];
  private readonly stepsCompleted: string[] = [];
  private readonly stats: Record<string, number> = {};
  // "시트!주소" 단위로 한 번만 보고
  private readonly formulaErrorCells = new Set<string>();
  private startedAt: number | null = null;
  private endedAt: number | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  addInfo(step: string, category: string, message: string, details?: string): void {
    this.add('info', step, category, message, details);
  }

  addWarning(step: string, category: string, message: string, details?: string): void {
    this.add('warning', step, category, message, details);
  }

  addError(step: string, category: string, message: string, details?: string): void {
    this.add('error', step, category, message, details);
  }

  /**
   * 수식 에러 셀 경고. 같은 시트/주소는 어느 단계에서 읽든 실행당 한 번만 기록한다.
   */
  addFormulaError(step: string, sheetName: string, address: string): void {
    const key = `${sheetName}!${address}`;
    if (this.formulaErrorCells.has(key)) {
      return;
    }
    this.formulaErrorCells.add(key);
    this.addWarning(step, 'formula_errors', `Formula error in ${key} treated as empty`);
  }

  stepCompleted(step: string): void {
    this.stepsCompleted.push(step);
  }

  startProcessing(): void {
    this.startedAt = this.now();
    this.endedAt = null;
  }

  endProcessing(): void {
    this.endedAt = this.now();
  }

  updateStats(values: Record<string, number>): void {
    Object.assign(this.stats, values);
  }

  getIssues(level?: IssueLevel): QualityIssue[] {
    return level ? this.issues.filter((issue) => issue.level === level) : [...this.issues];
  }

  hasCriticalErrors(): boolean {
    return this.issues.some(
      (issue) => issue.level === 'error' && CRITICAL_ERRORS.includes(issue.category),
    );
  }

  getQualityScore(): number {
    let score = 100;

    for (const issue of this.issues) {
      if (issue.level === 'error') {
        score -= CRITICAL_ERRORS.includes(issue.category) ? 30 : 15;
      } else if (issue.level === 'warning') {
        if (DATA_WARNINGS.includes(issue.category)) {
          score -= 10;
        } else if (VALIDATION_WARNINGS.includes(issue.category)) {
          score -= 15;
        } else {
          score -= 5;
        }
      }
    }

    // 헤더 누락이 반복되면 입력 품질 자체가 낮다고 본다
    const missingHeaders = this.issues.filter((issue) => issue.category === 'missing_headers');
    if (missingHeaders.length >= 2) {
      score -= 20;
    }

    return Math.max(0, score);
  }

  getUserSummary(): QualitySummary {
    const warnings = this.getIssues('warning');
    const errors = this.getIssues('error');
    const problems = [...warnings, ...errors];
    const dataIssues = problems.filter((issue) => DATA_CATEGORIES.includes(issue.category));
    const qualityScore = this.getQualityScore();

    const recommendations: string[] = [];
    if (dataIssues.length > 0) {
      recommendations.push(
        'Consider reviewing your input file for missing headers or formula errors to improve data quality.',
      );
    }
    if (qualityScore < 80) {
      recommendations.push(
        'The processing quality score is below 80%. Please check the detailed issues below.',
      );
    }
    if (problems.length === 0) {
      recommendations.push('Excellent! Your file was processed without any issues.');
    }

    return {
      qualityScore,
      totalIssues: this.issues.length,
      warningsCount: warnings.length,
      errorsCount: errors.length,
      dataQualityIssues: dataIssues.length,
      processingIssues: problems.length - dataIssues.length,
      processingTime:
        this.startedAt !== null && this.endedAt !== null
          ? (this.endedAt - this.startedAt) / 1000
          : null,
      stepsCompleted: [...this.stepsCompleted],
      recommendations,
    };
  }

  getDetailedReport(): QualityReport {
    return {
      issues: this.getIssues(),
      statistics: { ...this.stats, stepsCompleted: this.stepsCompleted.length },
      summary: this.getUserSummary(),
    };
  }

  private add(
    level: IssueLevel,
    step: string,
    category: string,
    message: string,
    details?: string,
  ): void {
    this.issues.push({
      level,
      step,
      category,
      message,
      details,
      timestamp: new Date(this.now()).toISOString(),
    });

    const line = `[${step}] ${category}: ${message}`;
    if (level === 'error') {
      this.logger.error(line);
    } else if (level === 'warning') {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }
}
