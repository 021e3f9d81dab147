import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
} from '@nestjs/common';
import { ConversionService } from './conversion.service.js';
import {
  conversionReviewSchema,
  type ConversionReviewResponse,
} from '../dto/conversion-review.dto.js';

@Controller('convert')
export class ConversionController {
  constructor(@Inject(ConversionService) private readonly conversionService: ConversionService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  convert(@Body() body: unknown): ConversionReviewResponse {
    const parsed = conversionReviewSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(
        `Invalid ConversionReview: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          .join('; ')}`,
      );
    }
    return this.conversionService.review(parsed.data.request);
  }
}
