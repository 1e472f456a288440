import { Module } from '@nestjs/common';
import { OrganizationModule } from '../organization/organization.module';
import { RelationshipModule } from '../relationship/relationship.module';
import { RequirementModule } from '../requirement/requirement.module';
import { SecureLinkModule } from '../secure-link/secure-link.module';
import { MailModule } from '../utils/mail.module';
import { NotificationScheduler } from './notification.scheduler';
import { NotificationService } from './notification.service';

@Module({
  imports: [RequirementModule, RelationshipModule, OrganizationModule, SecureLinkModule, MailModule],
  providers: [NotificationService, NotificationScheduler],
  exports: [NotificationService],
})
export class NotificationModule {}
