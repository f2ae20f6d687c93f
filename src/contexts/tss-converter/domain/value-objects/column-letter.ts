const LETTER_PATTERN = /^[A-Z]{1,3}$/;

export function isColumnLetter(value: string): boolean {
  return LETTER_PATTERN.test(value);
}

/**
 * 1 → A, 27 → AA
 */
export function columnNumberToLetter(column: number): string {
  let letter = '';
  let n = column;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letter = String.fromCharCode(65 + remainder) + letter;
    n = Math.floor((n - 1) / 26);
  }
  return letter;
}

export function columnLetterToNumber(letter: string): number {
  const upper = letter.trim().toUpperCase();
  if (!isColumnLetter(upper)) {
    throw new RangeError(`Invalid column letter: "${letter}"`);
  }
  let column = 0;
  for (const char of upper) {
    column = column * 26 + (char.charCodeAt(0) - 64);
  }
  return column;
}
