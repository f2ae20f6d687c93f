import { Injectable } from '@nestjs/common';
import type { CellGridReader } from './cell-grid-reader';

export interface CellPosition {
  row: number;
  column: number;
  text: string;
}

export interface HeaderSearchOptions {
  /** 검색할 최대 행 수 (기본 100) */
  maxRows?: number;
  /** 검색할 최대 열 수 (기본 50) */
  maxColumns?: number;
  startRow?: number;
  direction?: 'down' | 'up';
  skipHidden?: boolean;
}

/**
 * 마커 텍스트가 포함된 셀(랜드마크) 검색
 *
 * 병합된 헤더는 좌상단 위치 하나로만 보고한다.
 */
@Injectable()
export class HeaderLocator {
  find(
    reader: CellGridReader,
    markers: readonly string[],
    options: HeaderSearchOptions = {},
  ): CellPosition | null {
    for (const position of this.scan(reader, markers, options)) {
      return position;
    }
    return null;
  }

  findAll(
    reader: CellGridReader,
    markers: readonly string[],
    options: HeaderSearchOptions = {},
  ): CellPosition[] {
    return [...this.scan(reader, markers, options)];
  }

  private *scan(
    reader: CellGridReader,
    markers: readonly string[],
    options: HeaderSearchOptions,
  ): Generator<CellPosition> {
    const needles = markers.map((marker) => marker.trim().toLowerCase()).filter(Boolean);
    if (needles.length === 0) return;

    const { maxRows = 100, maxColumns = 50, direction = 'down', skipHidden = true } = options;
    const lastColumn = Math.min(maxColumns, reader.columnCount);
    const rows = direction === 'down'
      ? this.rowsDown(options.startRow ?? 1, maxRows, reader.rowCount)
      : this.rowsUp(options.startRow ?? reader.rowCount, maxRows);

    for (const row of rows) {
      if (skipHidden && reader.isRowHidden(row)) continue;

      for (let column = 1; column <= lastColumn; column++) {
        if (skipHidden && reader.isHidden(row, column)) continue;

        // 병합 영역은 좌상단 셀에서 한 번만
        const range = reader.findMergedRange(row, column);
        if (range && !range.isAnchor(row, column)) continue;

        const text = reader.read(row, column);
        if (text === '') continue;

        const lower = text.toLowerCase();
        if (needles.some((needle) => lower.includes(needle))) {
          yield { row, column, text };
        }
      }
    }
  }

  private *rowsDown(startRow: number, maxRows: number, rowCount: number): Generator<number> {
    const last = Math.min(startRow + maxRows - 1, rowCount);
    for (let row = Math.max(1, startRow); row <= last; row++) {
      yield row;
    }
  }

  private *rowsUp(startRow: number, maxRows: number): Generator<number> {
    const last = Math.max(1, startRow - maxRows + 1);
    for (let row = startRow; row >= last; row--) {
      yield row;
    }
  }
}
