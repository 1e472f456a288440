import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { AuditModule } from '../audit/audit.module';
import { OrganizationModule } from '../organization/organization.module';
import { SecureLinkModule } from '../secure-link/secure-link.module';
import { MailModule } from '../utils/mail.module';
import { SupplierInvitationController } from './controllers/supplier-invitation.controller';
import { SupplierRelationshipController } from './controllers/supplier-relationship.controller';
import { Relationship } from './model/relationship.model';
import { RelationshipService } from './relationship.service';

@Module({
  imports: [
    SequelizeModule.forFeature([Relationship]),
    OrganizationModule,
    SecureLinkModule,
    MailModule,
    AuditModule,
  ],
  controllers: [SupplierRelationshipController, SupplierInvitationController],
  providers: [RelationshipService],
  exports: [RelationshipService, SequelizeModule],
})
export class RelationshipModule {}
