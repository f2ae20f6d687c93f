import type * as ExcelJS from 'exceljs';

export type PlainCellValue = string | number | boolean | Date | null;

export type UnwrappedCell =
  | { kind: 'value'; value: PlainCellValue }
  | { kind: 'error'; marker: string };

export const ERROR_MARKERS = [
  '#N/A',
  '#REF!',
  '#VALUE!',
  '#DIV/0!',
  '#NAME?',
  '#NULL!',
  '#NUM!',
  '#ERROR!',
] as const;

export function findErrorMarker(text: string): string | null {
  return ERROR_MARKERS.find((marker) => text.includes(marker)) ?? null;
}

function plain(value: PlainCellValue): UnwrappedCell {
  if (typeof value === 'string') {
    const marker = findErrorMarker(value);
    if (marker) {
      return { kind: 'error', marker };
    }
  }
  return { kind: 'value', value };
}

/**
 * 셀 값 정규화 (richText, 수식 결과, 하이퍼링크, 에러 값)
 */
export function unwrapCellValue(value: ExcelJS.CellValue): UnwrappedCell {
  if (value === null || value === undefined) {
    return plain(null);
  }

  if (value instanceof Date) {
    return plain(value);
  }

  if (typeof value === 'object') {
    if ('error' in value) {
      return { kind: 'error', marker: value.error };
    }
    if ('richText' in value) {
      return plain((value.richText || []).map((t) => t.text).join(''));
    }
    if ('formula' in value || 'sharedFormula' in value) {
      const result = value.result;
      if (result === undefined || result === null) {
        return plain(null);
      }
      if (result instanceof Date) {
        return plain(result);
      }
      if (typeof result === 'object') {
        return { kind: 'error', marker: result.error };
      }
      return plain(result);
    }
    if ('hyperlink' in value) {
      return plain(value.text);
    }
    return plain(null);
  }

  return plain(value);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * 날짜 → 'YYYY-MM-DD HH:mm:ss' (UTC; exceljs 는 셀 날짜를 UTC 로 읽는다)
 */
export function formatDateTime(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function valueToText(value: PlainCellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return formatDateTime(value);
  return String(value).trim();
}
