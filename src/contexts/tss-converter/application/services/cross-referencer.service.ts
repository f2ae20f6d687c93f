import { Injectable, Logger } from '@nestjs/common';
import { columnLetterToNumber } from '../../domain/value-objects';
import type { CellGridReader } from './cell-grid-reader';

export interface CrossReferenceOptions {
  listColumn: string;
  headerRow: number;
  headerColumnStart: string;
  startRow: number;
  marker: string;
  /** 연속 빈 헤더가 이만큼 나오면 인덱스 구성 종료 */
  maxConsecutiveEmpty: number;
}

export interface CrossReferenceResult {
  headers: number;
  rowsProcessed: number;
  marks: number;
}

const LIST_SPLIT = /[\n;]/;
const LEADING_NUMBER = /^\s*\d+\.\s*/;
const TRAILING_SEPARATORS = /[;,]+$/;

export function normalizeArticleName(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function parseArticleList(text: string): string[] {
  return text
    .split(LIST_SPLIT)
    .map((part) => part.replace(LEADING_NUMBER, '').replace(TRAILING_SEPARATORS, '').trim())
    .filter(Boolean);
}

/**
 * 행별 기사명 목록을 헤더 열과 대조해 표시(X)를 남긴다
 */
@Injectable()
export class CrossReferencer {
  private readonly logger = new Logger(CrossReferencer.name);

  crossReference(reader: CellGridReader, options: CrossReferenceOptions): CrossReferenceResult {
    const headers = this.buildHeaderIndex(reader, options);
    const listColumn = columnLetterToNumber(options.listColumn);
    let rowsProcessed = 0;
    let marks = 0;

    for (let row = options.startRow; row <= reader.rowCount; row++) {
      const text = reader.read(row, listColumn);
      if (text === '') continue;

      rowsProcessed++;
      const columns = this.matchColumns(parseArticleList(text), headers);
      for (const column of columns) {
        reader.write(row, column, options.marker);
        marks++;
      }
    }

    // 원본 목록 열은 비운다
    for (let row = options.startRow; row <= reader.rowCount; row++) {
      reader.write(row, listColumn, null);
    }

    this.logger.log(
      `[${reader.name}] ${marks} marks over ${rowsProcessed} rows against ${headers.size} article headers`,
    );
    return { headers: headers.size, rowsProcessed, marks };
  }

  /**
   * 정규화된 기사명 → 열. 같은 이름이 다시 나오면 뒤의 열이 이긴다.
   */
  buildHeaderIndex(reader: CellGridReader, options: CrossReferenceOptions): Map<string, number> {
    const index = new Map<string, number>();
    const lastColumn = reader.columnCount + 10;
    let emptyRun = 0;

    for (
      let column = columnLetterToNumber(options.headerColumnStart);
      column <= lastColumn && emptyRun < options.maxConsecutiveEmpty;
      column++
    ) {
      const name = normalizeArticleName(reader.read(options.headerRow, column));
      if (name === '') {
        emptyRun++;
        continue;
      }
      emptyRun = 0;
      index.set(name, column);
    }

    return index;
  }

  matchColumns(items: readonly string[], headers: ReadonlyMap<string, number>): number[] {
    const matched = new Set<number>();

    for (const item of items) {
      const needle = normalizeArticleName(item);
      if (needle === '') continue;

      const exact = headers.get(needle);
      if (exact !== undefined) {
        matched.add(exact);
        continue;
      }
      for (const [name, column] of headers) {
        if (name.includes(needle) || needle.includes(name)) {
          matched.add(column);
        }
      }
    }

    return [...matched];
  }
}
