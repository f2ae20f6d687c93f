import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { type ConverterConfig, converterConfig } from './config';
import { ColumnMappingTable } from './domain/value-objects';
import { WORKBOOK_STORAGE_PORT } from './application/ports';
import {
  ColumnRemapper,
  ConversionPipelineService,
  CrossReferencer,
  DuplicateGrouper,
  FillForwardFiller,
  HeaderLocator,
  VerticalListExtractor,
} from './application/services';
import {
  ArticleCrossReferenceStage,
  ArticleExtractionStage,
  DataFillStage,
  DataMappingStage,
  FilterDeduplicateStage,
  PreMappingFillStage,
  TemplateCreationStage,
} from './application/stages';
import { ExceljsWorkbookAdapter } from './infrastructure/adapters';
import { ConversionController } from './interface/http/controllers';

@Module({
  imports: [ConfigModule.forFeature(converterConfig)],
  controllers: [ConversionController],
  providers: [
    HeaderLocator,
    VerticalListExtractor,
    FillForwardFiller,
    DuplicateGrouper,
    CrossReferencer,
    {
      // 매핑 테이블은 설정에서 한 번 만들어 고정
      provide: ColumnRemapper,
      useFactory: (config: ConverterConfig) =>
        new ColumnRemapper(ColumnMappingTable.fromConfig(config.mapping)),
      inject: [converterConfig.KEY],
    },
    {
      provide: WORKBOOK_STORAGE_PORT,
      useClass: ExceljsWorkbookAdapter,
    },
    TemplateCreationStage,
    ArticleExtractionStage,
    PreMappingFillStage,
    DataMappingStage,
    DataFillStage,
    FilterDeduplicateStage,
    ArticleCrossReferenceStage,
    ConversionPipelineService,
  ],
  exports: [ConversionPipelineService],
})
export class TssConverterModule {}
