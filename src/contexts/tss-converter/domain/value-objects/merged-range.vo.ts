/**
 * 병합 셀 영역 (1-based, 경계 포함)
 */
export class MergedRange {
  constructor(
    public readonly top: number,
    public readonly left: number,
    public readonly bottom: number,
    public readonly right: number,
  ) {
    if (top < 1 || left < 1 || bottom < top || right < left) {
      throw new RangeError(`Invalid merged range ${top},${left}:${bottom},${right}`);
    }
  }

  contains(row: number, column: number): boolean {
    return row >= this.top && row <= this.bottom && column >= this.left && column <= this.right;
  }

  isAnchor(row: number, column: number): boolean {
    return row === this.top && column === this.left;
  }
}
