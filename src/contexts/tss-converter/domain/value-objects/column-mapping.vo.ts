import { ConfigurationError } from '../errors';
import { columnLetterToNumber, isColumnLetter } from './column-letter';
import { type ClassifiedSheetType, SheetType, isClassified } from './sheet-type.vo';

/**
 * 소스 컬럼(또는 "K+L" 조합) → 대상 컬럼 매핑 하나
 */
export class ColumnMappingVO {
  public readonly sourceColumns: readonly number[];
  public readonly destinationColumn: number;

  constructor(
    public readonly sourceKey: string,
    public readonly destinationLetter: string,
  ) {
    this.validate();
    this.sourceColumns = Object.freeze(
      this.sourceLetters.map((letter) => columnLetterToNumber(letter)),
    );
    this.destinationColumn = columnLetterToNumber(destinationLetter);
  }

  get sourceLetters(): string[] {
    return this.sourceKey.split('+').map((part) => part.trim().toUpperCase());
  }

  get isCombination(): boolean {
    return this.sourceColumns.length > 1;
  }

  private validate(): void {
    const invalid = this.sourceLetters.filter((letter) => !isColumnLetter(letter));
    if (invalid.length > 0) {
      throw new ConfigurationError(
        `mapping.${this.sourceKey}`,
        `invalid source column(s): ${invalid.join(', ')}`,
      );
    }
    if (!isColumnLetter(this.destinationLetter.trim().toUpperCase())) {
      throw new ConfigurationError(
        `mapping.${this.sourceKey}`,
        `invalid destination column: ${this.destinationLetter}`,
      );
    }
  }

  static create(props: { source: string; destination: string }): ColumnMappingVO {
    return new ColumnMappingVO(props.source, props.destination);
  }

  toJSON() {
    return {
      source: this.sourceKey,
      destination: this.destinationLetter,
    };
  }
}

export interface ColumnLiteral {
  readonly column: number;
  readonly value: string;
}

export interface ColumnMappingTableInput {
  tables: Record<string, Record<string, string>>;
  literals?: Record<string, Record<string, string>>;
  combinationDelimiter: string;
}

/**
 * 시트 유형별 매핑 테이블 (생성 후 불변)
 */
export class ColumnMappingTable {
  private constructor(
    private readonly entries: ReadonlyMap<ClassifiedSheetType, readonly ColumnMappingVO[]>,
    private readonly literals: ReadonlyMap<ClassifiedSheetType, readonly ColumnLiteral[]>,
    public readonly delimiter: string,
  ) {
    Object.freeze(this);
  }

  static fromConfig(input: ColumnMappingTableInput): ColumnMappingTable {
    const entries = new Map<ClassifiedSheetType, readonly ColumnMappingVO[]>();
    for (const [key, table] of Object.entries(input.tables)) {
      const type = parseSheetTypeKey(key, 'mapping.tables');
      entries.set(
        type,
        Object.freeze(
          Object.entries(table).map(([source, destination]) =>
            ColumnMappingVO.create({ source, destination }),
          ),
        ),
      );
    }

    const literals = new Map<ClassifiedSheetType, readonly ColumnLiteral[]>();
    for (const [key, table] of Object.entries(input.literals ?? {})) {
      const type = parseSheetTypeKey(key, 'mapping.literals');
      literals.set(
        type,
        Object.freeze(
          Object.entries(table).map(([letter, value]) => {
            if (!isColumnLetter(letter.toUpperCase())) {
              throw new ConfigurationError(`mapping.literals.${key}`, `invalid column: ${letter}`);
            }
            return { column: columnLetterToNumber(letter), value };
          }),
        ),
      );
    }

    return new ColumnMappingTable(entries, literals, input.combinationDelimiter);
  }

  entriesFor(type: SheetType): readonly ColumnMappingVO[] {
    return isClassified(type) ? this.entries.get(type) ?? [] : [];
  }

  literalsFor(type: SheetType): readonly ColumnLiteral[] {
    return isClassified(type) ? this.literals.get(type) ?? [] : [];
  }
}

export function parseSheetTypeKey(key: string, path: string): ClassifiedSheetType {
  switch (key.toUpperCase()) {
    case 'F':
      return SheetType.F;
    case 'M':
      return SheetType.M;
    case 'C':
      return SheetType.C;
    case 'P':
      return SheetType.P;
    default:
      throw new ConfigurationError(`${path}.${key}`, 'unknown sheet type');
  }
}
