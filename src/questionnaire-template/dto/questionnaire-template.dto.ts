import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';
import { TopicDto } from '../../questionnaire/dto/questionnaire.dto';
import { TemplateCategory, TemplateVisibility } from '../model/questionnaire-template.model';

const toLowerCase = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

export class CreateQuestionnaireTemplateDto {
  @ApiProperty({ example: 'Cloud hosting baseline' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  @ApiProperty({ enum: TemplateCategory, example: TemplateCategory.CUSTOM })
  @Transform(toLowerCase)
  @IsEnum(TemplateCategory)
  category!: TemplateCategory;

  @ApiPropertyOptional({ example: '1.0', default: '1.0' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  version?: string;

  @ApiPropertyOptional({ minimum: 0, maximum: 100, default: 70 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  defaultPassingScore?: number;

  @ApiPropertyOptional({ minimum: 1, maximum: 1440, default: 30 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1440)
  estimatedMinutes?: number;

  @ApiPropertyOptional({ type: [TopicDto] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @ValidateNested({ each: true })
  @Type(() => TopicDto)
  topics?: TopicDto[];

  @ApiPropertyOptional({ type: [String], example: ['hosting', 'baseline'] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(50, { each: true })
  tags?: string[];
}

export class UpdateQuestionnaireTemplateDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(20)
  version?: string;

  @ApiPropertyOptional({ minimum: 0, maximum: 100 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  defaultPassingScore?: number;

  @ApiPropertyOptional({ minimum: 1, maximum: 1440 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1440)
  estimatedMinutes?: number;

  @ApiPropertyOptional({ type: [TopicDto] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @ValidateNested({ each: true })
  @Type(() => TopicDto)
  topics?: TopicDto[];

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(50, { each: true })
  tags?: string[];
}

export class ImportQuestionnaireTemplateDto {
  @ApiProperty({ description: 'Template definition as a JSON document' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200_000)
  content!: string;
}

export class PublishQuestionnaireTemplateDto {
  @ApiProperty({ enum: [TemplateVisibility.LOCAL, TemplateVisibility.GLOBAL] })
  @IsIn([TemplateVisibility.LOCAL, TemplateVisibility.GLOBAL])
  visibility!: TemplateVisibility.LOCAL | TemplateVisibility.GLOBAL;
}

export class SystemTemplateQueryDto {
  @ApiPropertyOptional({ enum: TemplateCategory })
  @IsOptional()
  @Transform(toLowerCase)
  @IsEnum(TemplateCategory)
  category?: TemplateCategory;
}

export class TemplateQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: TemplateCategory })
  @IsOptional()
  @Transform(toLowerCase)
  @IsEnum(TemplateCategory)
  category?: TemplateCategory;

  @ApiPropertyOptional({ description: 'Matches the template name' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  search?: string;
}
