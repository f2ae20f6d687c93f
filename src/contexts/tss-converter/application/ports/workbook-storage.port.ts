import type * as ExcelJS from 'exceljs';

/**
 * 워크북 저장소 Port (의존성 역전)
 */
export interface WorkbookStoragePort {
  /**
   * .xlsx 파일을 읽어 워크북으로 로드
   */
  load(filePath: string): Promise<ExcelJS.Workbook>;

  /**
   * 워크북을 파일로 저장 (임시 파일에 쓴 뒤 교체)
   */
  save(workbook: ExcelJS.Workbook, filePath: string): Promise<void>;
}

export const WORKBOOK_STORAGE_PORT = Symbol('WORKBOOK_STORAGE_PORT');
