import { Readable } from 'node:stream';
import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ConversionPipelineService } from '../../../application/services/conversion-pipeline.service';
import { FileAccessError, FileFormatError } from '../../../domain/errors';
import type { QualitySummary } from '../../../domain/value-objects';
import { ConvertRequestDto } from '../dto';
import { ConversionController } from './conversion.controller';

const quality: QualitySummary = {
  qualityScore: 90,
  totalIssues: 1,
  warningsCount: 1,
  errorsCount: 0,
  dataQualityIssues: 1,
  processingIssues: 0,
  processingTime: 0.5,
  stepsCompleted: [],
  recommendations: [],
};

function upload(originalname: string): Express.Multer.File {
  const buffer = Buffer.from('xlsx-bytes');
  return {
    fieldname: 'file',
    originalname,
    encoding: '7bit',
    mimetype: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    size: buffer.length,
    stream: Readable.from([]),
    destination: '',
    filename: '',
    path: '',
    buffer,
  };
}

describe('ConversionController', () => {
  const convertUpload = jest.fn();
  let controller: ConversionController;

  beforeEach(async () => {
    convertUpload.mockReset();
    const moduleRef = await Test.createTestingModule({
      controllers: [ConversionController],
      providers: [{ provide: ConversionPipelineService, useValue: { convertUpload } }],
    }).compile();
    controller = moduleRef.get(ConversionController);
  });

  it('returns the converted workbook as base64', async () => {
    convertUpload.mockResolvedValue({
      fileName: 'Standard Internal TSS - Vendor.xlsx',
      buffer: Buffer.from('done'),
      quality,
    });

    const response = await controller.convert(upload('Vendor.xlsx'), { allowMissingHeaders: false });

    expect(convertUpload).toHaveBeenCalledWith(Buffer.from('xlsx-bytes'), 'Vendor.xlsx', {
      allowMissingHeaders: false,
    });
    expect(response).toEqual({
      success: true,
      data: { fileName: 'Standard Internal TSS - Vendor.xlsx', file: 'ZG9uZQ==', quality },
      message: 'Converted with quality score 90',
    });
  });

  it('rejects a request without a file', async () => {
    await expect(controller.convert(undefined, {})).rejects.toBeInstanceOf(BadRequestException);
    expect(convertUpload).not.toHaveBeenCalled();
  });

  it('maps input validation failures to 400', async () => {
    convertUpload.mockRejectedValue(new FileFormatError('/tmp/a.csv', 'unsupported extension ".csv"'));

    await expect(controller.convert(upload('a.csv'), {})).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('reports other failures in the response body', async () => {
    const failure = new FileAccessError('/tmp/out.xlsx', 'write', new Error('disk full'));
    convertUpload.mockRejectedValue(failure);

    const response = await controller.convert(upload('Vendor.xlsx'), {});

    expect(response).toEqual({ success: false, error: failure.message });
  });
});

describe('ConvertRequestDto', () => {
  it.each([
    ['true', true],
    [' FALSE ', false],
  ])('parses form value %p', (raw, expected) => {
    const dto = plainToInstance(ConvertRequestDto, { allowMissingHeaders: raw });

    expect(dto.allowMissingHeaders).toBe(expected);
    expect(validateSync(dto)).toEqual([]);
  });

  it('rejects non-boolean values', () => {
    const dto = plainToInstance(ConvertRequestDto, { allowMissingHeaders: 'sometimes' });

    expect(validateSync(dto).map((error) => error.property)).toEqual(['allowMissingHeaders']);
  });
});
