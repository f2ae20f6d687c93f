import type * as ExcelJS from 'exceljs';
import {
  MergedRange,
  type Result,
  columnNumberToLetter,
  err,
  ok,
} from '../../domain/value-objects';
import type { QualityReporter } from './quality-reporter';
import {
  type PlainCellValue,
  type UnwrappedCell,
  unwrapCellValue,
  valueToText,
} from './utils/excel-utils';

export type ReadErrorKind = 'out-of-bounds' | 'formula-error';

export interface CellGridReaderOptions {
  reporter?: QualityReporter;
  step?: string;
}

/**
 * 워크시트 셀 읽기 래퍼
 *
 * - 병합 영역 안의 셀은 좌상단 셀 값을 돌려준다
 * - 에러 마커(#N/A 등)는 Result 에러로, read() 에서는 빈 문자열로 취급
 * - 사용 범위 밖은 getCell 을 호출하지 않는다 (exceljs 는 getCell 로 행을 생성함)
 */
export class CellGridReader {
  private mergedRanges: MergedRange[] | null = null;
  // exceljs 의 columnCount 는 매번 전체 행을 순회한다
  private cachedColumnCount: number | null = null;

  constructor(
    public readonly worksheet: ExcelJS.Worksheet,
    private readonly options: CellGridReaderOptions = {},
  ) {}

  get name(): string {
    return this.worksheet.name;
  }

  get rowCount(): number {
    return this.worksheet.rowCount;
  }

  get columnCount(): number {
    if (this.cachedColumnCount === null) {
      this.cachedColumnCount = this.worksheet.columnCount;
    }
    return this.cachedColumnCount;
  }

  inBounds(row: number, column: number): boolean {
    return row >= 1 && column >= 1 && row <= this.rowCount && column <= this.columnCount;
  }

  tryRead(row: number, column: number): Result<string, ReadErrorKind> {
    const resolved = this.resolve(row, column);
    if (resolved === null) {
      return err('out-of-bounds');
    }
    if (resolved.kind === 'error') {
      return err('formula-error');
    }
    return ok(valueToText(resolved.value));
  }

  read(row: number, column: number): string {
    const result = this.tryRead(row, column);
    if (result.ok) {
      return result.value;
    }
    if (result.error === 'formula-error') {
      this.reportFormulaError(row, column);
    }
    return '';
  }

  /**
   * 값 복사용: 숫자/날짜 타입을 유지한다
   */
  readValue(row: number, column: number): PlainCellValue {
    const resolved = this.resolve(row, column);
    if (resolved === null) {
      return null;
    }
    if (resolved.kind === 'error') {
      this.reportFormulaError(row, column);
      return null;
    }
    const { value } = resolved;
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed === '' ? null : trimmed;
    }
    return value;
  }

  write(row: number, column: number, value: PlainCellValue): void {
    this.worksheet.getCell(row, column).value = value;
    if (value !== null && column > this.columnCount) {
      this.cachedColumnCount = column;
    }
  }

  isMerged(row: number, column: number): boolean {
    return this.findMergedRange(row, column) !== null;
  }

  findMergedRange(row: number, column: number): MergedRange | null {
    return this.getMergedRanges().find((range) => range.contains(row, column)) ?? null;
  }

  getMergedRanges(): readonly MergedRange[] {
    if (this.mergedRanges === null) {
      this.mergedRanges = this.scanMergedRanges();
    }
    return this.mergedRanges;
  }

  isHidden(row: number, column: number): boolean {
    if (!this.inBounds(row, column)) {
      return false;
    }
    return Boolean(this.worksheet.getRow(row).hidden || this.worksheet.getColumn(column).hidden);
  }

  isRowHidden(row: number): boolean {
    return row >= 1 && row <= this.rowCount && Boolean(this.worksheet.getRow(row).hidden);
  }

  rowHasData(row: number): boolean {
    for (let column = 1; column <= this.columnCount; column++) {
      if (this.read(row, column) !== '') {
        return true;
      }
    }
    return false;
  }

  /**
   * 마지막 행부터 거슬러 올라가 데이터가 있는 첫 행. 없으면 null
   */
  findLastDataRow(floorRow = 1): number | null {
    for (let row = this.rowCount; row >= Math.max(1, floorRow); row--) {
      if (this.rowHasData(row)) {
        return row;
      }
    }
    return null;
  }

  /**
   * 시트 변경 후 병합 정보 캐시 무효화
   */
  invalidate(): void {
    this.mergedRanges = null;
    this.cachedColumnCount = null;
  }

  private resolve(row: number, column: number): UnwrappedCell | null {
    if (!this.inBounds(row, column)) {
      return null;
    }
    const cell = this.worksheet.getCell(row, column);
    const source = cell.isMerged ? cell.master : cell;
    return unwrapCellValue(source.value);
  }

  private scanMergedRanges(): MergedRange[] {
    const bounds = new Map<string, { top: number; left: number; bottom: number; right: number }>();

    for (let row = 1; row <= this.rowCount; row++) {
      const sheetRow = this.worksheet.getRow(row);
      for (let column = 1; column <= this.columnCount; column++) {
        const cell = sheetRow.getCell(column);
        if (!cell.isMerged) continue;

        const key = cell.master.address;
        const current = bounds.get(key);
        if (current) {
          current.top = Math.min(current.top, row);
          current.left = Math.min(current.left, column);
          current.bottom = Math.max(current.bottom, row);
          current.right = Math.max(current.right, column);
        } else {
          bounds.set(key, { top: row, left: column, bottom: row, right: column });
        }
      }
    }

    return [...bounds.values()].map(
      ({ top, left, bottom, right }) => new MergedRange(top, left, bottom, right),
    );
  }

  private reportFormulaError(row: number, column: number): void {
    const address = `${columnNumberToLetter(column)}${row}`;
    this.options.reporter?.addFormulaError(this.options.step ?? 'read', this.name, address);
  }
}
