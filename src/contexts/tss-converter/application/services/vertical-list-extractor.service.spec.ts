import { sheetFrom } from '../../../../../test/fixtures/sheet-builder';
import { CellGridReader } from './cell-grid-reader';
import { VerticalListExtractor, cleanItem, parseMultiValue } from './vertical-list-extractor.service';

describe('parseMultiValue', () => {
  it('splits numbered lists and strips numbering and separators', () => {
    expect(parseMultiValue('1.Item A;\n2. Item B;')).toEqual(['Item A', 'Item B']);
  });

  it('uses the first delimiter that yields more than one part', () => {
    expect(parseMultiValue('a;b,c')).toEqual(['a', 'b,c']);
    expect(parseMultiValue('a,b')).toEqual(['a', 'b']);
    expect(parseMultiValue('single;')).toEqual(['single']);
  });

  it('returns nothing for blank input', () => {
    expect(parseMultiValue('  ;  ')).toEqual([]);
  });

  it('keeps decimals that look like numbering', () => {
    expect(cleanItem('12.5 mm,')).toBe('12.5 mm');
  });
});

describe('VerticalListExtractor', () => {
  const extractor = new VerticalListExtractor();

  it('reads below the header until the first empty cell', () => {
    const reader = new CellGridReader(
      sheetFrom([['Article name'], ['Shirt'], ['Cap;Scarf'], [null], ['Ignored']]),
    );
    expect([...extractor.extract(reader, 1, 1)]).toEqual(['Shirt', 'Cap', 'Scarf']);
  });

  it('starts below a header merged over several rows', () => {
    const worksheet = sheetFrom([['Article name'], [null], ['Shirt'], ['Cap']]);
    worksheet.mergeCells('A1:A2');
    const reader = new CellGridReader(worksheet);
    expect([...extractor.extract(reader, 1, 1)]).toEqual(['Shirt', 'Cap']);
  });

  it('skips hidden rows instead of stopping', () => {
    const worksheet = sheetFrom([['Article name'], ['Shirt'], ['Hidden'], ['Cap']]);
    worksheet.getRow(3).hidden = true;
    const reader = new CellGridReader(worksheet);
    expect([...extractor.extract(reader, 1, 1)]).toEqual(['Shirt', 'Cap']);
  });

  it('treats error markers as the end of the list', () => {
    const reader = new CellGridReader(
      sheetFrom([['Article name'], ['Shirt'], [{ error: '#N/A' }], ['Cap']]),
    );
    expect([...extractor.extract(reader, 1, 1)]).toEqual(['Shirt']);
  });

  it('takes numbers from the column right of each name header', () => {
    const reader = new CellGridReader(
      sheetFrom([
        ['Article name', null, 'Article number'],
        ['Shirt', 'A-1', 'Z-9'],
        ['Cap', 'A-2', null],
      ]),
    );
    const names = [{ row: 1, column: 1, text: 'Article name' }];
    const numberHeaders = [{ row: 1, column: 3, text: 'Article number' }];
    expect(extractor.extractPaired(reader, names, numberHeaders)).toEqual(['A-1', 'A-2']);
  });

  it('falls back to the number headers when the neighbouring column is empty', () => {
    const reader = new CellGridReader(
      sheetFrom([
        ['Article name', null, 'Article number'],
        ['Shirt', null, 'Z-9'],
        ['Cap', null, 'Z-8'],
      ]),
    );
    const names = [{ row: 1, column: 1, text: 'Article name' }];
    const numberHeaders = [{ row: 1, column: 3, text: 'Article number' }];
    expect(extractor.extractPaired(reader, names, numberHeaders)).toEqual(['Z-9', 'Z-8']);
  });

  it('pads the shorter list and keeps the first of each exact pair', () => {
    const pairs = extractor.pair(['Shirt', 'Cap', 'Shirt', 'Cap'], ['A-1', 'A-2', 'A-1']);
    expect(extractor.dedupe(pairs)).toEqual([
      { name: 'Shirt', number: 'A-1' },
      { name: 'Cap', number: 'A-2' },
      { name: 'Cap', number: '' },
    ]);
  });
});
