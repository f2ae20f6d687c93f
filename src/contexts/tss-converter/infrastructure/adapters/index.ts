export * from './exceljs-workbook.adapter';
