import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsNotEmpty, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { DocumentGrade } from '../../requirement/model/requirement.model';

class ScoreOverrideDto {
  @ApiPropertyOptional({ minimum: 0, maximum: 100, description: 'Reviewer score shown instead of the computed one' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(100)
  overrideScore?: number;

  @ApiPropertyOptional({ enum: DocumentGrade })
  @IsOptional()
  @IsEnum(DocumentGrade)
  grade?: DocumentGrade;
}

export class ApproveRequirementDto extends ScoreOverrideDto {
  @ApiPropertyOptional({ example: 'Looks good' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}

export class RejectRequirementDto extends ScoreOverrideDto {
  @ApiProperty({ example: 'Encryption policy is missing' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  reason!: string;
}

export class RequestRevisionDto {
  @ApiProperty({ example: 'Please attach the latest audit report' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  reason!: string;
}
