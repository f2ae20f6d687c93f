import { Injectable, Logger } from '@nestjs/common';
import { columnLetterToNumber } from '../../domain/value-objects';
import type { CellGridReader } from './cell-grid-reader';
import type { PlainCellValue } from './utils/excel-utils';

/**
 * 열 단위 빈 셀 채우기 (위쪽의 마지막 비어 있지 않은 값)
 *
 * 병합 영역 셀은 쓰지 않고, 병합 영역의 값은 좌상단 셀에서만 읽는다. 같은 입력에 두 번 적용해도 결과가 같다.
 */
@Injectable()
export class FillForwardFiller {
  private readonly logger = new Logger(FillForwardFiller.name);

  fill(
    reader: CellGridReader,
    columns: readonly string[],
    startRow: number,
    endRow?: number,
  ): Record<string, number> {
    const filled: Record<string, number> = {};
    const lastRow = endRow ?? reader.findLastDataRow(startRow);

    for (const letter of columns) {
      filled[letter] = lastRow === null ? 0 : this.fillColumn(reader, letter, startRow, lastRow);
    }

    const total = Object.values(filled).reduce((sum, count) => sum + count, 0);
    this.logger.debug(`[${reader.name}] filled ${total} cells in ${columns.join(',') || '-'}`);
    return filled;
  }

  private fillColumn(
    reader: CellGridReader,
    letter: string,
    startRow: number,
    endRow: number,
  ): number {
    const column = columnLetterToNumber(letter);
    let lastValue: PlainCellValue = null;
    let count = 0;

    for (let row = startRow; row <= endRow; row++) {
      // 병합 영역의 좌상단이 아닌 셀은 다른 셀의 값이므로 읽지도 쓰지도 않는다
      const range = reader.findMergedRange(row, column);
      if (range && !range.isAnchor(row, column)) {
        continue;
      }

      const value = reader.readValue(row, column);
      if (value !== null) {
        lastValue = value;
        continue;
      }
      if (lastValue === null || range) {
        continue;
      }
      reader.write(row, column, lastValue);
      count++;
    }

    return count;
  }
}
