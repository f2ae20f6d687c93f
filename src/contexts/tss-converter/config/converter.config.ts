import { readFileSync } from 'node:fs';
import { registerAs, type ConfigType } from '@nestjs/config';
import type { LogLevel } from '@nestjs/common';
import { Type, plainToInstance } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsString,
  Matches,
  Min,
  ValidateNested,
  validateSync,
  type ValidationError as ClassValidationError,
} from 'class-validator';
import { ConfigurationError } from '../domain/errors';
import defaults from './converter-defaults.json';

const COLUMN = /^[A-Z]{1,3}$/;
const ARGB = /^[0-9A-F]{8}$/i;
export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type ConverterLogLevel = (typeof LOG_LEVELS)[number];

class TemplateHeaderConfig {
  @IsString()
  title!: string;

  @Matches(ARGB)
  fill!: string;

  @Matches(ARGB)
  font!: string;

  @IsNumber()
  @Min(1)
  width!: number;
}

class TemplateConfig {
  @IsString()
  sheetName!: string;

  @IsString()
  articleNameLabel!: string;

  @IsString()
  articleNumberLabel!: string;

  @Matches(ARGB)
  labelFill!: string;

  @IsInt()
  @Min(1)
  headerRow!: number;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => TemplateHeaderConfig)
  headers!: TemplateHeaderConfig[];

  @Matches(COLUMN)
  articleStartColumn!: string;

  @IsInt()
  @Min(1)
  articleNameRows!: number;

  @IsInt()
  @Min(1)
  articleNumberRow!: number;

  @Matches(ARGB)
  articleFill!: string;
}

class ExtractionConfig {
  @IsString({ each: true })
  @ArrayMinSize(1)
  sheetMarkers!: string[];

  @IsString({ each: true })
  @ArrayMinSize(1)
  anchorMarkers!: string[];

  @IsString({ each: true })
  @ArrayMinSize(1)
  nameHeaders!: string[];

  @IsString({ each: true })
  numberHeaders!: string[];

  @IsInt()
  @Min(1)
  searchRows!: number;

  @IsInt()
  @Min(1)
  searchColumns!: number;

  @IsInt()
  @Min(1)
  maxItems!: number;
}

class PreFillConfig {
  @IsString({ each: true })
  @ArrayMinSize(1)
  anchorMarkers!: string[];

  @IsInt()
  @Min(1)
  searchRows!: number;

  @IsInt()
  @Min(0)
  dataOffset!: number;

  @IsObject()
  columns!: Record<string, string[]>;
}

class MappingConfig {
  @IsString({ each: true })
  @ArrayMinSize(1)
  anchorMarkers!: string[];

  @IsInt()
  @Min(1)
  searchRows!: number;

  @IsInt()
  @Min(0)
  dataOffset!: number;

  @IsInt()
  @Min(1)
  targetStartRow!: number;

  @Matches(COLUMN)
  occupiedColumn!: string;

  @IsString()
  combinationDelimiter!: string;

  @IsObject()
  tables!: Record<string, Record<string, string>>;

  @IsObject()
  literals!: Record<string, Record<string, string>>;
}

class FillConfig {
  @Matches(COLUMN, { each: true })
  columns!: string[];

  @IsInt()
  @Min(1)
  startRow!: number;
}

class FilterConfig {
  @IsInt()
  @Min(1)
  startRow!: number;

  @Matches(COLUMN)
  indicatorColumn!: string;

  @IsString({ each: true })
  naValues!: string[];

  @IsString()
  markerValue!: string;

  @Matches(COLUMN, { each: true })
  @ArrayMinSize(1)
  comparisonColumns!: string[];

  @Matches(COLUMN, { each: true })
  clearColumns!: string[];

  @Matches(COLUMN)
  summaryColumn!: string;

  @IsString()
  defaultSummary!: string;
}

class CrossReferenceConfig {
  @Matches(COLUMN)
  listColumn!: string;

  @IsInt()
  @Min(1)
  headerRow!: number;

  @Matches(COLUMN)
  headerColumnStart!: string;

  @IsInt()
  @Min(1)
  startRow!: number;

  @IsString()
  marker!: string;

  @IsInt()
  @Min(1)
  maxConsecutiveEmpty!: number;
}

export class ConverterSettings {
  @IsString()
  baseDir!: string;

  @IsString()
  outputDir!: string;

  @IsIn([...LOG_LEVELS])
  logLevel!: ConverterLogLevel;

  @IsNumber()
  @Min(1)
  maxFileSizeMb!: number;

  @IsBoolean()
  allowMissingHeaders!: boolean;

  @ValidateNested()
  @Type(() => TemplateConfig)
  template!: TemplateConfig;

  @ValidateNested()
  @Type(() => ExtractionConfig)
  extraction!: ExtractionConfig;

  @ValidateNested()
  @Type(() => PreFillConfig)
  preFill!: PreFillConfig;

  @ValidateNested()
  @Type(() => MappingConfig)
  mapping!: MappingConfig;

  @ValidateNested()
  @Type(() => FillConfig)
  fill!: FillConfig;

  @ValidateNested()
  @Type(() => FilterConfig)
  filter!: FilterConfig;

  @ValidateNested()
  @Type(() => CrossReferenceConfig)
  crossReference!: CrossReferenceConfig;
}

type Env = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// 배열은 통째로 교체, 객체는 재귀 병합
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

function parseBoolean(key: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(key, `expected a boolean, got "${raw}"`);
}

function readOverrideFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      'TSCONVERTER_CONFIG_FILE',
      error instanceof Error ? error.message : String(error),
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError('TSCONVERTER_CONFIG_FILE', 'must contain a JSON object');
  }
  return parsed;
}

/**
 * 환경 변수 오버라이드 수집
 */
function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.TSCONVERTER_BASE_DIR) overrides.baseDir = env.TSCONVERTER_BASE_DIR;
  if (env.TSCONVERTER_OUTPUT_DIR) overrides.outputDir = env.TSCONVERTER_OUTPUT_DIR;
  if (env.TSCONVERTER_LOG_LEVEL) overrides.logLevel = env.TSCONVERTER_LOG_LEVEL.toLowerCase();
  if (env.TSCONVERTER_ALLOW_MISSING_HEADERS) {
    overrides.allowMissingHeaders = parseBoolean(
      'TSCONVERTER_ALLOW_MISSING_HEADERS',
      env.TSCONVERTER_ALLOW_MISSING_HEADERS,
    );
  }
  if (env.TSCONVERTER_MAX_FILE_SIZE_MB) {
    overrides.maxFileSizeMb = Number(env.TSCONVERTER_MAX_FILE_SIZE_MB);
  }
  return overrides;
}

function formatErrors(errors: ClassValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...formatErrors(error.children ?? [], path)];
  });
}

/**
 * 기본값 → 설정 파일 → 환경 변수 순으로 병합 후 검증
 */
export function loadConverterSettings(env: Env = process.env): ConverterSettings {
  let merged: Record<string, unknown> = deepMerge({}, defaults);
  if (env.TSCONVERTER_CONFIG_FILE) {
    merged = deepMerge(merged, readOverrideFile(env.TSCONVERTER_CONFIG_FILE));
  }
  merged = deepMerge(merged, envOverrides(env));

  const settings = plainToInstance(ConverterSettings, merged);
  const errors = validateSync(settings, { forbidUnknownValues: true });
  if (errors.length > 0) {
    throw new ConfigurationError('converter', formatErrors(errors).join('; '));
  }
  return deepFreeze(settings);
}

export const converterConfig = registerAs('converter', () => loadConverterSettings());

export type ConverterConfig = ConfigType<typeof converterConfig>;

/**
 * Nest Logger 에 넘길 레벨 목록 (지정 레벨 이상)
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level?.toLowerCase());
  return LOG_LEVELS.slice(0, index === -1 ? 3 : index + 1);
}
