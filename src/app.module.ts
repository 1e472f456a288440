import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { RequestIdMiddleware } from './common/middleware/request-id.middleware';
import { validate } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { NotificationModule } from './notification/notification.module';
import { OrganizationModule } from './organization/organization.module';
import { QuestionnaireModule } from './questionnaire/questionnaire.module';
import { QuestionnaireTemplateModule } from './questionnaire-template/questionnaire-template.module';
import { RelationshipModule } from './relationship/relationship.module';
import { RequirementModule } from './requirement/requirement.module';
import { ResponseModule } from './response/response.module';
import { ReviewModule } from './review/review.module';
import { UserModule } from './user/user.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    DatabaseModule,
    ScheduleModule.forRoot(),
    AuditModule,
    UserModule,
    OrganizationModule,
    AuthModule,
    RelationshipModule,
    QuestionnaireTemplateModule,
    QuestionnaireModule,
    RequirementModule,
    ResponseModule,
    ReviewModule,
    NotificationModule,
    HealthModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
