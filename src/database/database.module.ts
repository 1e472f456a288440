import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SequelizeModule, SequelizeModuleOptions } from '@nestjs/sequelize';
import { AuditLog } from '../audit/model/audit-log.model';
import { EnvironmentVariables } from '../config/env.validation';
import { Organization } from '../organization/model/organization.model';
import { Question } from '../questionnaire/model/question.model';
import { Questionnaire } from '../questionnaire/model/questionnaire.model';
import { QuestionnaireTemplate } from '../questionnaire-template/model/questionnaire-template.model';
import { Relationship } from '../relationship/model/relationship.model';
import { Requirement } from '../requirement/model/requirement.model';
import { QuestionnaireSubmission } from '../response/model/questionnaire-submission.model';
import { SupplierResponse } from '../response/model/supplier-response.model';
import { SecureLink } from '../secure-link/model/secure-link.model';
import { User } from '../user/model/user.model';

export const MODELS = [
  Organization,
  User,
  SecureLink,
  AuditLog,
  Relationship,
  QuestionnaireTemplate,
  Questionnaire,
  Question,
  Requirement,
  SupplierResponse,
  QuestionnaireSubmission,
];

export const sequelizeOptions = (config: ConfigService<EnvironmentVariables, true>): SequelizeModuleOptions => ({
  dialect: 'postgres',
  host: config.get('DB_HOST', { infer: true }),
  port: config.get('DB_PORT', { infer: true }),
  username: config.get('DB_USER', { infer: true }),
  password: config.get('DB_PASS', { infer: true }),
  database: config.get('DB_NAME', { infer: true }),
  models: MODELS,
  autoLoadModels: true,
  synchronize: true,
  logging: false,
  dialectOptions: config.get('DB_SSL', { infer: true })
    ? { ssl: { require: true, rejectUnauthorized: false } }
    : {},
});

@Module({
  imports: [
    SequelizeModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => sequelizeOptions(config),
    }),
  ],
})
export class DatabaseModule {}
