import { Injectable, Logger } from '@nestjs/common';
import { RowGroupKey, columnLetterToNumber } from '../../domain/value-objects';
import type { CellGridReader } from './cell-grid-reader';

export interface RemoveRowsOptions {
  startRow: number;
  indicatorColumn: string;
  /** 비교는 trim + 대소문자 무시 */
  naValues: readonly string[];
}

export interface DedupeOptions {
  startRow: number;
  indicatorColumn: string;
  markerValue: string;
  comparisonColumns: readonly string[];
  clearColumns: readonly string[];
  summaryColumn: string;
  defaultSummary: string;
}

export interface DedupeResult {
  groups: number;
  removed: number;
}

/**
 * 지시 열 기반 행 제거 및 SD 행 중복 병합
 *
 * 행 삭제는 항상 아래에서 위로 진행한다 (앞 행 번호가 밀리지 않도록).
 */
@Injectable()
export class DuplicateGrouper {
  private readonly logger = new Logger(DuplicateGrouper.name);

  removeRows(reader: CellGridReader, options: RemoveRowsOptions): number {
    const column = columnLetterToNumber(options.indicatorColumn);
    const naValues = new Set(options.naValues.map((value) => value.trim().toUpperCase()));
    const doomed: number[] = [];

    for (let row = options.startRow; row <= reader.rowCount; row++) {
      if (naValues.has(reader.read(row, column).toUpperCase())) {
        doomed.push(row);
      }
    }

    this.deleteRows(reader, doomed);
    this.logger.log(`[${reader.name}] removed ${doomed.length} rows without a usable ${options.indicatorColumn}`);
    return doomed.length;
  }

  dedupe(reader: CellGridReader, options: DedupeOptions): DedupeResult {
    const indicator = columnLetterToNumber(options.indicatorColumn);
    const comparison = options.comparisonColumns.map(columnLetterToNumber);
    const marker = options.markerValue.trim().toUpperCase();
    const groups = new Map<string, number[]>();

    for (let row = options.startRow; row <= reader.rowCount; row++) {
      if (reader.read(row, indicator).toUpperCase() !== marker) continue;

      const key = RowGroupKey.of(comparison.map((column) => reader.read(row, column)));
      if (key.isEmpty) continue;

      const rows = groups.get(key.toString());
      if (rows) {
        rows.push(row);
      } else {
        groups.set(key.toString(), [row]);
      }
    }

    const summaryColumn = columnLetterToNumber(options.summaryColumn);
    const clearColumns = options.clearColumns.map(columnLetterToNumber);
    const doomed: number[] = [];
    let merged = 0;

    for (const rows of groups.values()) {
      if (rows.length < 2) continue;
      merged++;

      const [keep, ...duplicates] = rows;
      const summary =
        this.majority(rows.map((row) => reader.read(row, summaryColumn))) ?? options.defaultSummary;

      reader.write(keep, summaryColumn, summary);
      for (const column of clearColumns) {
        reader.write(keep, column, null);
      }
      doomed.push(...duplicates);
    }

    this.deleteRows(reader, doomed);
    this.logger.log(`[${reader.name}] merged ${merged} ${marker} groups, removed ${doomed.length} rows`);
    return { groups: merged, removed: doomed.length };
  }

  // 동률이면 먼저 나온 값
  private majority(values: readonly string[]): string | null {
    const counts = new Map<string, number>();
    for (const value of values) {
      if (value !== '') {
        counts.set(value, (counts.get(value) ?? 0) + 1);
      }
    }

    let best: string | null = null;
    let bestCount = 0;
    for (const [value, count] of counts) {
      if (count > bestCount) {
        best = value;
        bestCount = count;
      }
    }
    return best;
  }

  private deleteRows(reader: CellGridReader, rows: readonly number[]): void {
    const ordered = [...rows].sort((a, b) => b - a);
    for (const row of ordered) {
      reader.worksheet.spliceRows(row, 1);
    }
    if (ordered.length > 0) {
      reader.invalidate();
    }
  }
}
