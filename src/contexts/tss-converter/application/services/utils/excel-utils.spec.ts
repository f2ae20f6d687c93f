import { formatDateTime, unwrapCellValue, valueToText } from './excel-utils';

describe('unwrapCellValue', () => {
  it('joins rich text runs', () => {
    expect(unwrapCellValue({ richText: [{ text: 'Body ' }, { text: 'fabric' }] })).toEqual({
      kind: 'value',
      value: 'Body fabric',
    });
  });

  it('uses cached formula results', () => {
    expect(unwrapCellValue({ formula: 'A1*2', result: 4, date1904: false })).toEqual({ kind: 'value', value: 4 });
    expect(unwrapCellValue({ formula: 'A1*2', date1904: false })).toEqual({ kind: 'value', value: null });
  });

  it('reports error values and error text', () => {
    expect(unwrapCellValue({ formula: 'VLOOKUP(A1,B:C,2)', result: { error: '#N/A' }, date1904: false })).toEqual({
      kind: 'error',
      marker: '#N/A',
    });
    expect(unwrapCellValue('see #REF! above')).toEqual({ kind: 'error', marker: '#REF!' });
  });

  it('reads hyperlink text', () => {
    expect(unwrapCellValue({ text: 'ISO 105', hyperlink: 'https://example.test/iso' })).toEqual({
      kind: 'value',
      value: 'ISO 105',
    });
  });
});

describe('valueToText', () => {
  it('formats dates in UTC and trims strings', () => {
    expect(formatDateTime(new Date(Date.UTC(2024, 0, 5, 9, 3, 7)))).toBe('2024-01-05 09:03:07');
    expect(valueToText('  Cotton ')).toBe('Cotton');
    expect(valueToText(12.5)).toBe('12.5');
    expect(valueToText(null)).toBe('');
  });
});
