import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ConversionPipelineService } from '../../../application/services/conversion-pipeline.service';
import { ValidationError } from '../../../domain/errors';
import { ConvertRequestDto, type ConvertResponseDto } from '../dto';

// 프론트엔드 호환 응답 형식
interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

@Controller('conversions')
export class ConversionController {
  private readonly logger = new Logger(ConversionController.name);

  constructor(private readonly pipeline: ConversionPipelineService) {}

  /**
   * Internal TSS → Standard Internal TSS 변환
   * POST /api/conversions
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  async convert(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: ConvertRequestDto,
  ): Promise<ApiResponse<ConvertResponseDto>> {
    if (!file) {
      throw new BadRequestException('An .xlsx file is required in the "file" field.');
    }

    try {
      const result = await this.pipeline.convertUpload(file.buffer, file.originalname, {
        allowMissingHeaders: body.allowMissingHeaders,
      });

      return {
        success: true,
        data: {
          fileName: result.fileName,
          file: result.buffer.toString('base64'),
          quality: result.quality,
        },
        message: `Converted with quality score ${result.quality.qualityScore}`,
      };
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new BadRequestException(error.message);
      }
      this.logger.error(
        `Conversion of ${file.originalname} failed`,
        error instanceof Error ? error.stack : undefined,
      );
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Conversion failed.',
      };
    }
  }
}
