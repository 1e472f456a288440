import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsDate,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { DocumentGrade } from '../../requirement/model/requirement.model';

export class AnswerDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  questionId!: string;

  @ApiPropertyOptional({ type: [String], description: 'Option ids for choice questions' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  selectedOptionIds?: string[];

  @ApiPropertyOptional({ description: 'Answer for text questions' })
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  textAnswer?: string;
}

export class SaveDraftDto {
  @ApiProperty({ type: [AnswerDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => AnswerDto)
  answers!: AnswerDto[];
}

export class SubmitQuestionnaireDto {
  @ApiPropertyOptional({ type: [AnswerDto], description: 'Merged over the saved draft before scoring' })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AnswerDto)
  answers?: AnswerDto[];
}

export class SubmitDocumentDto {
  @ApiProperty({ example: 'ISO27001-2026-0042', description: 'Certificate or report reference' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  reference!: string;

  @ApiProperty({ enum: DocumentGrade })
  @IsEnum(DocumentGrade)
  grade!: DocumentGrade;

  @ApiProperty({ type: String, format: 'date-time' })
  @Type(() => Date)
  @IsDate()
  reportDate!: Date;
}
