import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsEmail,
  IsEnum,
  IsOptional,
  IsString,
  Length,
  Matches,
  MaxLength,
} from 'class-validator';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';
import { RelationshipStatus, SupplierClassification } from '../model/relationship.model';

export class InviteSupplierDto {
  @ApiProperty({ example: 'compliance@supplier.example' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({ enum: SupplierClassification, default: SupplierClassification.STANDARD })
  @IsOptional()
  @IsEnum(SupplierClassification)
  classification?: SupplierClassification;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;

  @ApiPropertyOptional({ type: [String], example: ['Hosting', 'Payroll'] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  servicesProvided?: string[];

  @ApiPropertyOptional({ example: 'MSA-2024-017' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  contractReference?: string;
}

export class AcceptInvitationDto {
  @ApiProperty({ description: 'Token from the invitation link' })
  @IsString()
  @Length(64, 64)
  @Matches(/^[0-9a-f]+$/, { message: 'token must be a hex string' })
  token!: string;
}

export class UpdateRelationshipDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  servicesProvided?: string[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(255)
  contractReference?: string;
}

export class UpdateClassificationDto {
  @ApiProperty({ enum: SupplierClassification })
  @IsEnum(SupplierClassification)
  classification!: SupplierClassification;
}

export class RelationshipStatusChangeDto {
  @ApiPropertyOptional({ example: 'Certificate lapsed' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}

export class RelationshipQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: RelationshipStatus })
  @IsOptional()
  @IsEnum(RelationshipStatus)
  status?: RelationshipStatus;

  @ApiPropertyOptional({ enum: SupplierClassification })
  @IsOptional()
  @IsEnum(SupplierClassification)
  classification?: SupplierClassification;

  @ApiPropertyOptional({ description: 'Matches invited email or notes' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  search?: string;
}
