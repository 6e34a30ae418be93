import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { PROCESSING_MODES, ProcessingMode } from '../../scoring/interfaces/score.interface';

export const MAX_BATCH_LOCATIONS = 50;

export class RankQueryDto {
  @ApiProperty({ description: 'Region to sweep', example: 'clifton-block2' })
  @IsString()
  @IsNotEmpty()
  region!: string;

  @ApiProperty({ description: 'Business category', example: 'gym' })
  @IsString()
  @IsNotEmpty()
  category!: string;

  @ApiProperty({
    description: 'Number of grids to return',
    required: false,
    default: 10,
    minimum: 1,
    maximum: 100,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @ApiProperty({
    description: 'fast: rule-based only. full: blended with the contextual evaluator',
    required: false,
    enum: [...PROCESSING_MODES],
    default: 'fast',
  })
  @IsOptional()
  @IsIn(PROCESSING_MODES)
  mode?: ProcessingMode;
}

export class LocationDto {
  @ApiProperty({ example: 24.8138 })
  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @ApiProperty({ example: 67.0311 })
  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;

  @ApiProperty({
    description: 'Search radius in metres',
    required: false,
    default: 1000,
    minimum: 50,
    maximum: 5000,
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(50)
  @Max(5000)
  radius?: number;
}

export class EvaluatePointDto extends LocationDto {
  @ApiProperty({ required: false, enum: [...PROCESSING_MODES], default: 'fast' })
  @IsOptional()
  @IsIn(PROCESSING_MODES)
  mode?: ProcessingMode;

  @ApiProperty({
    description: 'Include the environment vector the scores were built from',
    required: false,
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  debug?: boolean;
}

export class BatchEvaluateDto {
  @ApiProperty({
    type: [LocationDto],
    description: `Up to ${MAX_BATCH_LOCATIONS} locations, evaluated in order`,
  })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_BATCH_LOCATIONS)
  @ValidateNested({ each: true })
  @Type(() => LocationDto)
  locations!: LocationDto[];

  @ApiProperty({ required: false, enum: [...PROCESSING_MODES], default: 'fast' })
  @IsOptional()
  @IsIn(PROCESSING_MODES)
  mode?: ProcessingMode;
}
