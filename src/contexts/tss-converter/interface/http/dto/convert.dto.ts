import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';
import type { QualitySummary } from '../../../domain/value-objects';

export class ConvertRequestDto {
  // FormData 로 오면 문자열이므로 boolean 으로 변환
  @IsOptional()
  @Transform(({ value }) => {
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (normalized === 'true') return true;
      if (normalized === 'false') return false;
    }
    return value;
  })
  @IsBoolean()
  allowMissingHeaders?: boolean;
}

export class ConvertResponseDto {
  fileName!: string;
  /** base64 인코딩된 .xlsx */
  file!: string;
  quality!: QualitySummary;
}
