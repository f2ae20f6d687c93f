import { Logger } from '@nestjs/common';
import {
  type ColumnMappingTable,
  type ColumnMappingVO,
  SheetType,
} from '../../domain/value-objects';
import type { CellGridReader } from './cell-grid-reader';
import type { PlainCellValue } from './utils/excel-utils';

/** 대상 열 번호 → 값 */
export type TargetRow = ReadonlyMap<number, PlainCellValue>;

/**
 * 시트 유형별 매핑 테이블로 소스 행을 통합 레이아웃 행으로 변환
 *
 * 매핑 테이블은 생성자에서 한 번 주입되며 이후 바뀌지 않는다.
 */
export class ColumnRemapper {
  private readonly logger = new Logger(ColumnRemapper.name);

  constructor(private readonly table: ColumnMappingTable) {}

  map(reader: CellGridReader, sourceRow: number, type: SheetType): TargetRow {
    const target = new Map<number, PlainCellValue>();

    for (const literal of this.table.literalsFor(type)) {
      target.set(literal.column, literal.value);
    }

    for (const mapping of this.table.entriesFor(type)) {
      const value = mapping.isCombination
        ? this.combine(reader, sourceRow, mapping)
        : reader.readValue(sourceRow, mapping.sourceColumns[0]);
      if (value !== null) {
        target.set(mapping.destinationColumn, value);
      }
    }

    return target;
  }

  /**
   * startRow 부터 모든 열이 빈 첫 행 직전까지
   */
  mapSheet(reader: CellGridReader, startRow: number, type: SheetType): TargetRow[] {
    if (type === SheetType.Unclassified) {
      return [];
    }

    const rows: TargetRow[] = [];
    for (let row = startRow; row <= reader.rowCount; row++) {
      if (!reader.rowHasData(row)) break;
      rows.push(this.map(reader, row, type));
    }

    this.logger.debug(`[${reader.name}] mapped ${rows.length} rows as type ${type}`);
    return rows;
  }

  // 한쪽만 있으면 그 값, 둘 다 비면 null
  private combine(reader: CellGridReader, row: number, mapping: ColumnMappingVO): string | null {
    const parts = mapping.sourceColumns
      .map((column) => reader.read(row, column))
      .filter((part) => part !== '');
    return parts.length > 0 ? parts.join(this.table.delimiter) : null;
  }
}
