/**
 * 워크시트 유형 (이름 접두사로만 결정)
 */
export enum SheetType {
  F = 'F',
  M = 'M',
  C = 'C',
  P = 'P',
  Unclassified = 'UNCLASSIFIED',
}

export type ClassifiedSheetType = Exclude<SheetType, SheetType.Unclassified>;

// 검사 순서가 곧 우선순위
const PREFIXES: ReadonlyArray<readonly [string, ClassifiedSheetType]> = [
  ['F-', SheetType.F],
  ['M-', SheetType.M],
  ['C-', SheetType.C],
  ['P', SheetType.P],
];

export function classifySheet(name: string): SheetType {
  const upper = name.toUpperCase();
  for (const [prefix, type] of PREFIXES) {
    if (upper.startsWith(prefix)) {
      return type;
    }
  }
  return SheetType.Unclassified;
}

export function isClassified(type: SheetType): type is ClassifiedSheetType {
  switch (type) {
    case SheetType.F:
    case SheetType.M:
    case SheetType.C:
    case SheetType.P:
      return true;
    case SheetType.Unclassified:
      return false;
    default:
      return assertNever(type);
  }
}

/**
 * 텍스타일 시트 여부 (기사 추출 대상)
 */
export function isTextileSheet(name: string, markers: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return markers.some((marker) => lower.includes(marker.toLowerCase()));
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled sheet type: ${String(value)}`);
}
