export * from './workbook-storage.port';
