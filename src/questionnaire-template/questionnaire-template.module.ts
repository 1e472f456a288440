import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { AuditModule } from '../audit/audit.module';
import { QuestionnaireTemplate } from './model/questionnaire-template.model';
import { QuestionnaireTemplateController } from './questionnaire-template.controller';
import { QuestionnaireTemplateService } from './questionnaire-template.service';

@Module({
  imports: [SequelizeModule.forFeature([QuestionnaireTemplate]), AuditModule],
  controllers: [QuestionnaireTemplateController],
  providers: [QuestionnaireTemplateService],
  exports: [QuestionnaireTemplateService],
})
export class QuestionnaireTemplateModule {}
