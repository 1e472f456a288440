import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { AuditModule } from '../audit/audit.module';
import { OrganizationModule } from '../organization/organization.module';
import { QuestionnaireModule } from '../questionnaire/questionnaire.module';
import { RelationshipModule } from '../relationship/relationship.module';
import { Requirement } from './model/requirement.model';
import { RequirementController } from './requirement.controller';
import { RequirementService } from './requirement.service';

@Module({
  imports: [
    SequelizeModule.forFeature([Requirement]),
    RelationshipModule,
    QuestionnaireModule,
    OrganizationModule,
    AuditModule,
  ],
  controllers: [RequirementController],
  providers: [RequirementService],
  exports: [RequirementService, SequelizeModule],
})
export class RequirementModule {}
