import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { OrganizationModule } from '../organization/organization.module';
import { RelationshipModule } from '../relationship/relationship.module';
import { RequirementModule } from '../requirement/requirement.module';
import { ResponseModule } from '../response/response.module';
import { MailModule } from '../utils/mail.module';
import { ReviewController } from './review.controller';
import { ReviewService } from './review.service';

@Module({
  imports: [RequirementModule, ResponseModule, RelationshipModule, OrganizationModule, MailModule, AuditModule],
  controllers: [ReviewController],
  providers: [ReviewService],
})
export class ReviewModule {}
