import * as ExcelJS from 'exceljs';
import { writeRow } from '../../../../../test/fixtures/sheet-builder';
import { CellGridReader } from './cell-grid-reader';
import {
  type CrossReferenceOptions,
  CrossReferencer,
  normalizeArticleName,
  parseArticleList,
} from './cross-referencer.service';

const options: CrossReferenceOptions = {
  listColumn: 'Q',
  headerRow: 1,
  headerColumnStart: 'R',
  startRow: 2,
  marker: 'X',
  maxConsecutiveEmpty: 5,
};

function sheet(): ExcelJS.Worksheet {
  return new ExcelJS.Workbook().addWorksheet('Output Template');
}

describe('parseArticleList', () => {
  it('splits on newlines and semicolons and strips numbering', () => {
    expect(parseArticleList('1. Shirt;\n2.Cap,; 3. Scarf')).toEqual(['Shirt', 'Cap', 'Scarf']);
  });
});

describe('normalizeArticleName', () => {
  it('lower-cases and collapses whitespace', () => {
    expect(normalizeArticleName('  Case   34x51x28\tWHITE ')).toBe('case 34x51x28 white');
  });
});

describe('CrossReferencer', () => {
  const crossReferencer = new CrossReferencer();

  it('marks exact and substring matches, then clears the list column', () => {
    const worksheet = sheet();
    writeRow(worksheet, 1, { R: 'Case 34x51x28 white', S: 'Shirt Basic', U: 'Cap' });
    writeRow(worksheet, 2, { A: 'row2', Q: '1. STUK stor case 34x51x28 white/black AP;' });
    writeRow(worksheet, 3, { A: 'row3', Q: 'Shirt   Basic\nCAP;' });
    writeRow(worksheet, 4, { A: 'row4', Q: 'Unknown thing' });
    writeRow(worksheet, 5, { A: 'row5' });
    const reader = new CellGridReader(worksheet);

    const result = crossReferencer.crossReference(reader, options);

    expect(result).toEqual({ headers: 3, rowsProcessed: 3, marks: 3 });
    const marks = (row: number) => [18, 19, 20, 21].map((column) => reader.read(row, column));
    expect(marks(2)).toEqual(['X', '', '', '']);
    expect(marks(3)).toEqual(['', 'X', '', 'X']);
    expect(marks(4)).toEqual(['', '', '', '']);
    expect([2, 3, 4, 5].map((row) => reader.read(row, 17))).toEqual(['', '', '', '']);
    expect(reader.read(1, 18)).toBe('Case 34x51x28 white');
  });

  it('marks each matched column once per row', () => {
    const worksheet = sheet();
    writeRow(worksheet, 1, { R: 'Cap' });
    writeRow(worksheet, 2, { Q: 'Cap; cap;CAP' });
    const reader = new CellGridReader(worksheet);

    expect(crossReferencer.crossReference(reader, options).marks).toBe(1);
    expect(reader.read(2, 18)).toBe('X');
  });

  describe('buildHeaderIndex', () => {
    it('stops after five consecutive empty headers', () => {
      const worksheet = sheet();
      writeRow(worksheet, 1, { R: 'One', W: 'Two', AD: 'Too far' });
      const index = crossReferencer.buildHeaderIndex(new CellGridReader(worksheet), options);

      expect([...index.entries()]).toEqual([
        ['one', 18],
        ['two', 23],
      ]);
    });

    it('lets a later duplicate header win', () => {
      const worksheet = sheet();
      writeRow(worksheet, 1, { R: 'Cap', S: 'Shirt', T: 'cap ' });
      const index = crossReferencer.buildHeaderIndex(new CellGridReader(worksheet), options);

      expect(index.get('cap')).toBe(20);
      expect(index.size).toBe(2);
    });
  });
});
