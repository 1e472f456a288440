import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AuthModule } from '../auth/auth.module';
import { validate } from '../config/env.validation';
import { DatabaseModule } from '../database/database.module';
import { OrganizationModule } from '../organization/organization.module';

/** Application context for the operator scripts: no HTTP server, no schedulers. */
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate }), DatabaseModule, OrganizationModule, AuthModule],
})
export class CliModule {}
