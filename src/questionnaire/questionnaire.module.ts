import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { AuditModule } from '../audit/audit.module';
import { QuestionnaireTemplateModule } from '../questionnaire-template/questionnaire-template.module';
import { Question } from './model/question.model';
import { Questionnaire } from './model/questionnaire.model';
import { QuestionnaireController } from './questionnaire.controller';
import { QuestionnaireService } from './questionnaire.service';

@Module({
  imports: [SequelizeModule.forFeature([Questionnaire, Question]), AuditModule, QuestionnaireTemplateModule],
  controllers: [QuestionnaireController],
  providers: [QuestionnaireService],
  exports: [QuestionnaireService],
})
export class QuestionnaireModule {}
