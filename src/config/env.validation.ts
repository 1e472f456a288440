import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { toBoolean } from '../common/utils/transform.util';

export class EnvironmentVariables {
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsInt()
  @Min(1)
  PORT: number = 3000;

  @IsString()
  APP_NAME: string = 'Supplier Compliance';

  @IsString()
  ALLOWED_ORIGINS: string = '';

  @IsString()
  DB_HOST: string = 'localhost';

  @IsInt()
  DB_PORT: number = 5432;

  @IsString()
  DB_USER: string = 'postgres';

  @IsString()
  DB_PASS: string = '';

  @IsString()
  DB_NAME: string = 'supplier_compliance';

  @Transform(toBoolean)
  @IsBoolean()
  DB_SSL: boolean = false;

  @IsString()
  @MinLength(8)
  JWT_SECRET!: string;

  @IsString()
  @MinLength(8)
  JWT_REFRESH_SECRET!: string;

  @IsString()
  JWT_ACCESS_EXPIRES_IN: string = '1h';

  @IsString()
  JWT_REFRESH_EXPIRES_IN: string = '30d';

  @IsUrl({ require_tld: false })
  MAGIC_LINK_BASE_URL: string = 'http://localhost:5173';

  @IsInt()
  @Min(1)
  @Max(1440)
  MAGIC_LINK_EXPIRY_MINUTES: number = 15;

  @IsInt()
  @Min(1)
  INVITATION_EXPIRY_HOURS: number = 168;

  @IsInt()
  @Min(1)
  MAGIC_LINK_RATE_LIMIT_MAX: number = 3;

  @IsInt()
  @Min(1)
  MAGIC_LINK_RATE_LIMIT_WINDOW_MINUTES: number = 60;

  @IsOptional()
  @IsString()
  NODEMAILER_HOST?: string;

  @IsInt()
  NODEMAILER_PORT: number = 587;

  @IsOptional()
  @IsString()
  NODEMAILER_USERNAME?: string;

  @IsOptional()
  @IsString()
  NODEMAILER_PASSWORD?: string;

  @IsString()
  NODEMAILER_FROM: string = 'no-reply@example.com';
}



export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }
  return validated;
}
