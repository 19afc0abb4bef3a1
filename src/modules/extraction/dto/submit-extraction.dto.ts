import { Transform } from 'class-transformer';
import { IsBase64, IsIn, IsOptional, IsString } from 'class-validator';

import type { ExtractionMode } from '../interfaces';

export class SubmitExtractionDto {
  @IsBase64()
  buffer!: string;

  @IsString()
  filename!: string;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsIn(['basic', 'advanced'], { message: 'mode must be basic or advanced' })
  mode?: ExtractionMode;

  @IsOptional()
  @IsString()
  password?: string;
}
