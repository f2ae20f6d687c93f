import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import type { WorkbookStoragePort } from '../../application/ports';
import { FileAccessError, FileFormatError } from '../../domain/errors';

@Injectable()
export class ExceljsWorkbookAdapter implements WorkbookStoragePort {
  private readonly logger = new Logger(ExceljsWorkbookAdapter.name);

  async load(filePath: string): Promise<ExcelJS.Workbook> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new FileAccessError(filePath, 'read', error);
    }

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
    } catch (error) {
      throw new FileFormatError(
        filePath,
        error instanceof Error ? error.message : 'not a readable workbook',
      );
    }
    return workbook;
  }

  async save(workbook: ExcelJS.Workbook, filePath: string): Promise<void> {
    const buffer = await this.toBuffer(workbook);
    const partial = `${filePath}.partial`;

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(partial, buffer);
      await rename(partial, filePath);
    } catch (error) {
      await rm(partial, { force: true });
      throw new FileAccessError(filePath, 'write', error);
    }

    this.logger.debug(`saved ${filePath} (${buffer.length} bytes)`);
  }

  private async toBuffer(workbook: ExcelJS.Workbook): Promise<Buffer> {
    return Buffer.from(await workbook.xlsx.writeBuffer());
  }
}
