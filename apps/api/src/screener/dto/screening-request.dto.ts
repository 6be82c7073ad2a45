import { IsArray, IsEnum, IsInt, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { ScreeningStrategy } from '../screener.types';

export class ScreeningRequestDto {
  @IsOptional()
  @IsEnum(ScreeningStrategy)
  strategy?: ScreeningStrategy;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  sectors?: string[];

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  marketCapMin?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  marketCapMax?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  volumeMin?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  priceMin?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  priceMax?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number = 50;
}
