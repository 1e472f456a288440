import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsJWT, IsNotEmpty, IsString, Length, Matches } from 'class-validator';

export class RequestMagicLinkDto {
  @ApiProperty({ example: 'jane@supplier.example' })
  @IsEmail()
  email!: string;
}

export class VerifyMagicLinkDto {
  @ApiProperty({ description: 'Identifier from the magic link', example: 'a3f1…' })
  @IsString()
  @Length(64, 64)
  @Matches(/^[0-9a-f]+$/, { message: 'token must be a hex string' })
  token!: string;
}

export class RefreshTokenDto {
  @ApiProperty()
  @IsNotEmpty()
  @IsJWT()
  refreshToken!: string;
}
