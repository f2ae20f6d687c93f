import * as path from 'node:path';
import { type StageContext, createStageContext } from '../../../../../test/fixtures/stage-context';
import { writeInternalTss } from '../../../../../test/fixtures/tss-workbook';
import { QualityReporter } from '../services/quality-reporter';
import { TemplateCreationStage } from './template-creation.stage';

describe('TemplateCreationStage', () => {
  let context: StageContext;

  beforeEach(async () => {
    context = await createStageContext();
    await writeInternalTss(path.join(context.dir, 'Supplier TSS.xlsx'));
  });

  afterEach(() => context.cleanup());

  it('writes the standard layout next to the configured output directory', async () => {
    const stage = new TemplateCreationStage(context.storage, context.config);
    const reporter = new QualityReporter();

    const output = await stage.process('Supplier TSS.xlsx', { reporter });

    expect(output).toBe(path.join(context.dir, 'output', 'Supplier TSS - Step1.xlsx'));
    expect(reporter.getUserSummary().stepsCompleted).toEqual(['step1_template']);

    const workbook = await context.storage.load(output);
    const sheet = workbook.getWorksheet('Output Template');
    expect(sheet).toBeDefined();
    if (!sheet) return;

    expect(sheet.getCell('A1').value).toBe('Article name');
    expect(sheet.getCell('A2').value).toBe('Article number');
    const headers = Array.from({ length: 17 }, (_, i) => sheet.getCell(3, i + 1).value);
    expect(headers[0]).toBe('Combination');
    expect(headers[7]).toBe('Document type');
    expect(headers[16]).toBe('Additional Information');
    expect(sheet.getCell(3, 18).value).toBeNull();

    expect(sheet.getCell('B3').font.bold).toBe(true);
    expect(sheet.getCell('B3').font.color?.argb).toBe('FFFFFFFF');
    expect(sheet.getColumn(3).width).toBe(25);
  });
});
