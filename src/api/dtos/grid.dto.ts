import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class CategoryQueryDto {
  @ApiProperty({ description: 'Business category', example: 'cafe' })
  @IsString()
  @IsNotEmpty()
  category!: string;
}
