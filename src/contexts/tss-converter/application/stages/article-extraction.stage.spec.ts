import * as path from 'node:path';
import * as ExcelJS from 'exceljs';
import { addSheet } from '../../../../../test/fixtures/sheet-builder';
import { type StageContext, createStageContext } from '../../../../../test/fixtures/stage-context';
import { writeInternalTss } from '../../../../../test/fixtures/tss-workbook';
import { InsufficientDataError, WorksheetNotFoundError } from '../../domain/errors';
import { HeaderLocator } from '../services/header-locator.service';
import { QualityReporter } from '../services/quality-reporter';
import { VerticalListExtractor } from '../services/vertical-list-extractor.service';
import { ArticleExtractionStage } from './article-extraction.stage';
import { TemplateCreationStage } from './template-creation.stage';

describe('ArticleExtractionStage', () => {
  let context: StageContext;
  let stage: ArticleExtractionStage;
  let templatePath: string;

  beforeEach(async () => {
    context = await createStageContext();
    stage = new ArticleExtractionStage(
      context.storage,
      context.config,
      new HeaderLocator(),
      new VerticalListExtractor(),
    );
    await writeInternalTss(path.join(context.dir, 'Supplier TSS.xlsx'));
    templatePath = await new TemplateCreationStage(context.storage, context.config).process(
      'Supplier TSS.xlsx',
    );
  });

  afterEach(() => context.cleanup());

  async function templateSheet(filePath: string): Promise<ExcelJS.Worksheet> {
    const sheet = (await context.storage.load(filePath)).getWorksheet('Output Template');
    if (!sheet) throw new Error('template sheet missing');
    return sheet;
  }

  async function writeSource(name: string, build: (workbook: ExcelJS.Workbook) => void) {
    const workbook = new ExcelJS.Workbook();
    build(workbook);
    await workbook.xlsx.writeFile(path.join(context.dir, name));
    return name;
  }

  it('writes article names into merged rotated cells and numbers below', async () => {
    const reporter = new QualityReporter();
    const output = await stage.process(templatePath, 'Supplier TSS.xlsx', { reporter });

    expect(path.basename(output)).toBe('Supplier TSS - Step2.xlsx');
    const sheet = await templateSheet(output);
    expect(['R', 'S', 'T', 'U'].map((column) => sheet.getCell(`${column}1`).value)).toEqual([
      'Shirt',
      'Cap',
      'Case 34x51x28 white',
      null,
    ]);
    expect(['R', 'S', 'T'].map((column) => sheet.getCell(`${column}10`).value)).toEqual([
      'A-100',
      'A-200',
      'A-300',
    ]);
    expect(sheet.getCell('R9').isMerged).toBe(true);
    expect(sheet.getCell('R9').master.address).toBe('R1');
    expect(sheet.getCell('R1').alignment.textRotation).toBe(90);
    expect(reporter.getIssues('warning')).toEqual([]);
  });

  it('falls back to the number header when no numbers sit beside the names', async () => {
    const source = await writeSource('numbers apart.xlsx', (workbook) => {
      addSheet(workbook, 'M- Textile', [
        ['Product name', null, 'Product number'],
        ['Towel', null, 'T-1'],
        ['Towel', null, 'T-1'],
        [null],
        ['Product information'],
      ]);
    });

    const sheet = await templateSheet(await stage.process(templatePath, source));
    expect(sheet.getCell('R1').value).toBe('Towel');
    expect(sheet.getCell('R10').value).toBe('T-1');
    expect(sheet.getCell('S1').value).toBeNull();
  });

  it('reads merged name and number headers once, from below the merge', async () => {
    const source = await writeSource('merged headers.xlsx', (workbook) => {
      const sheet = addSheet(workbook, 'M-Textile', [
        ['Internal TSS'],
        [null, 'Article name', 'Article number'],
        [null],
        [null, 'Shirt', 'A-100'],
        [null, 'Cap', 'A-200'],
        [null],
        ['Product combination'],
      ]);
      sheet.mergeCells('B2:B3');
      sheet.mergeCells('C2:C3');
    });
    const reporter = new QualityReporter();

    const sheet = await templateSheet(await stage.process(templatePath, source, { reporter }));

    expect(['R', 'S', 'T'].map((column) => sheet.getCell(`${column}1`).value)).toEqual([
      'Shirt',
      'Cap',
      null,
    ]);
    expect(['R', 'S', 'T'].map((column) => sheet.getCell(`${column}10`).value)).toEqual([
      'A-100',
      'A-200',
      null,
    ]);
    expect(reporter.getIssues('warning')).toEqual([]);
  });

  it('writes an empty placeholder when nothing can be extracted', async () => {
    const source = await writeSource('empty.xlsx', (workbook) => {
      addSheet(workbook, 'Other', [['nothing']]);
    });
    const reporter = new QualityReporter();

    const sheet = await templateSheet(await stage.process(templatePath, source, { reporter }));

    expect(sheet.getCell('R1').text).toBe('');
    expect(sheet.getCell('R9').isMerged).toBe(true);
    expect(reporter.getIssues('warning').map((issue) => issue.category)).toEqual([
      'missing_headers',
      'no_data_extracted',
    ]);
  });

  it('fails when fallback is disabled and nothing is extracted', async () => {
    const source = await writeSource('empty.xlsx', (workbook) => {
      addSheet(workbook, 'M-Textile', [['Product combination']]);
    });

    await expect(
      stage.process(templatePath, source, { allowMissingHeaders: false }),
    ).rejects.toBeInstanceOf(InsufficientDataError);
  });

  it('requires the template sheet', async () => {
    const notATemplate = await writeSource('plain.xlsx', (workbook) => {
      addSheet(workbook, 'Sheet1', [['x']]);
    });

    await expect(stage.process(notATemplate, 'Supplier TSS.xlsx')).rejects.toBeInstanceOf(
      WorksheetNotFoundError,
    );
  });
});
