/**
 * 중복 판정용 복합 키. 값은 trim 된 문자열.
 */
export class RowGroupKey {
  private constructor(public readonly values: readonly string[]) {}

  static of(values: readonly string[]): RowGroupKey {
    return new RowGroupKey(Object.freeze(values.map((value) => value.trim())));
  }

  // 모든 값이 빈 키는 그룹화하지 않는다
  get isEmpty(): boolean {
    return this.values.every((value) => value === '');
  }

  toString(): string {
    return JSON.stringify(this.values);
  }
}
