/**
 * TSS 변환 파이프라인 예외 계층
 *
 * 모든 예외는 code 와 context 를 가지며, HTTP 계층은 ValidationError 계열만 400 으로 변환한다.
 */
export type ErrorContext = Record<string, unknown>;

export class TsConverterError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'TS_CONVERTER_ERROR',
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// 입력 검증 실패
export class ValidationError extends TsConverterError {
  constructor(message: string, code = 'VALIDATION_ERROR', context: ErrorContext = {}) {
    super(message, code, context);
  }
}

export class FileFormatError extends ValidationError {
  constructor(filePath: string, reason: string) {
    super(`Invalid file format for ${filePath}: ${reason}`, 'FILE_FORMAT_ERROR', {
      filePath,
      reason,
    });
  }
}

export class WorksheetNotFoundError extends ValidationError {
  constructor(sheetName: string, available: readonly string[]) {
    super(
      `Worksheet "${sheetName}" not found (available: ${available.join(', ') || 'none'})`,
      'WORKSHEET_NOT_FOUND',
      { sheetName, available: [...available] },
    );
  }
}

// 데이터 무결성 문제
export class DataIntegrityError extends TsConverterError {
  constructor(message: string, code = 'DATA_INTEGRITY_ERROR', context: ErrorContext = {}) {
    super(message, code, context);
  }
}

export class InsufficientDataError extends DataIntegrityError {
  constructor(what: string, context: ErrorContext = {}) {
    super(`Insufficient data: ${what}`, 'INSUFFICIENT_DATA', context);
  }
}

// 처리 단계 실패
export class ProcessingError extends TsConverterError {
  constructor(message: string, code = 'PROCESSING_ERROR', context: ErrorContext = {}) {
    super(message, code, context);
  }
}

export class FileAccessError extends ProcessingError {
  constructor(filePath: string, operation: 'read' | 'write', cause?: unknown) {
    super(
      `Cannot ${operation} ${filePath}${cause instanceof Error ? `: ${cause.message}` : ''}`,
      'FILE_ACCESS_ERROR',
      { filePath, operation },
    );
  }
}

export class ConfigurationError extends TsConverterError {
  constructor(key: string, reason: string) {
    super(`Invalid configuration "${key}": ${reason}`, 'CONFIGURATION_ERROR', { key, reason });
  }
}
