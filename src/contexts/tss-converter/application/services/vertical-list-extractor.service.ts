import { Injectable, Logger } from '@nestjs/common';
import type { CellGridReader } from './cell-grid-reader';
import type { CellPosition } from './header-locator.service';

export interface ArticlePair {
  name: string;
  number: string;
}

const DELIMITERS = ['\n', ';', ','] as const;
const LEADING_NUMBER = /^\d+\.(?!\d)\s*/;
const TRAILING_SEPARATORS = /[;,]+$/;

// 최대 읽기 행 수
const MAX_ROWS = 1000;
// 시트 마지막 행 이후 허용 여유
const ROW_SLACK = 100;

/**
 * 여러 값이 한 셀에 들어 있으면 첫 번째로 2개 이상을 만드는 구분자로 분리
 */
export function parseMultiValue(text: string): string[] {
  for (const delimiter of DELIMITERS) {
    if (!text.includes(delimiter)) continue;
    const parts = text.split(delimiter).map(cleanItem).filter(Boolean);
    if (parts.length > 1) {
      return parts;
    }
  }
  const single = cleanItem(text);
  return single ? [single] : [];
}

export function cleanItem(value: string): string {
  return value.trim().replace(TRAILING_SEPARATORS, '').trim().replace(LEADING_NUMBER, '').trim();
}

/**
 * 헤더 아래로 세로 목록을 읽어 기사명/기사번호를 만든다
 */
@Injectable()
export class VerticalListExtractor {
  private readonly logger = new Logger(VerticalListExtractor.name);

  /**
   * 헤더(병합이면 병합 영역) 아래 행부터 빈 셀을 만날 때까지. 숨김 행은 건너뛴다.
   */
  *extract(reader: CellGridReader, headerRow: number, column: number): Generator<string> {
    const headerBottom = reader.findMergedRange(headerRow, column)?.bottom ?? headerRow;
    const lastRow = Math.min(headerBottom + MAX_ROWS, reader.rowCount + ROW_SLACK);

    for (let row = headerBottom + 1; row <= lastRow; row++) {
      if (reader.isHidden(row, column)) continue;

      const text = reader.read(row, column);
      if (text === '') {
        this.logger.debug(`[${reader.name}] list in column ${column} ends at row ${row}`);
        return;
      }
      yield* parseMultiValue(text);
    }
  }

  extractAll(reader: CellGridReader, positions: readonly CellPosition[]): string[] {
    return positions.flatMap((position) => [...this.extract(reader, position.row, position.column)]);
  }

  /**
   * 기사번호는 기사명 바로 오른쪽 열에서 읽는다. 아무것도 없으면 번호 헤더 아래에서 읽는다.
   */
  extractPaired(
    reader: CellGridReader,
    namePositions: readonly CellPosition[],
    numberHeaderPositions: readonly CellPosition[],
  ): string[] {
    const numbers = namePositions.flatMap((position) => [
      ...this.extract(reader, position.row, position.column + 1),
    ]);
    if (numbers.length > 0 || numberHeaderPositions.length === 0) {
      return numbers;
    }

    this.logger.log(`[${reader.name}] no numbers beside names, reading number headers`);
    return this.extractAll(reader, numberHeaderPositions);
  }

  pair(names: readonly string[], numbers: readonly string[]): ArticlePair[] {
    const length = Math.max(names.length, numbers.length);
    return Array.from({ length }, (_, i) => ({
      name: names[i] ?? '',
      number: numbers[i] ?? '',
    }));
  }

  dedupe(pairs: readonly ArticlePair[]): ArticlePair[] {
    const seen = new Set<string>();
    return pairs.filter((pair) => {
      const key = JSON.stringify([pair.name, pair.number]);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }
}
