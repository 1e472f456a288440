import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { AuditModule } from '../audit/audit.module';
import { QuestionnaireModule } from '../questionnaire/questionnaire.module';
import { RequirementModule } from '../requirement/requirement.module';
import { QuestionnaireSubmission } from './model/questionnaire-submission.model';
import { SupplierResponse } from './model/supplier-response.model';
import { ResponseService } from './response.service';
import { SupplierPortalController } from './supplier-portal.controller';

@Module({
  imports: [
    SequelizeModule.forFeature([SupplierResponse, QuestionnaireSubmission]),
    RequirementModule,
    QuestionnaireModule,
    AuditModule,
  ],
  controllers: [SupplierPortalController],
  providers: [ResponseService],
  exports: [ResponseService],
})
export class ResponseModule {}
