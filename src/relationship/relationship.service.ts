import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/sequelize';
import { Op, WhereOptions } from 'sequelize';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError } from '../common/errors/domain.error';
import { RequestMeta } from '../common/types/request.types';
import { appendHistory, historyEntry } from '../common/types/status-history';
import { PaginatedResult, PaginationOptions, resolvePagination, toPage } from '../common/utils/pagination.util';
import { normalizeEmail } from '../common/utils/string.util';
import { EnvironmentVariables } from '../config/env.validation';
import { Organization } from '../organization/model/organization.model';
import { OrganizationService } from '../organization/organization.service';
import { SecureLinkType } from '../secure-link/model/secure-link.model';
import { SecureLinkService } from '../secure-link/secure-link.service';
import { MailService } from '../utils/mail.service';
import { InviteSupplierDto, UpdateRelationshipDto } from './dto/relationship.dto';
import {
  Relationship,
  RelationshipAttributes,
  RelationshipStatus,
  SupplierClassification,
} from './model/relationship.model';
import {
  RELATIONSHIP_ACTIONS,
  canTransitionRelationship,
  isRelationshipTerminal,
} from './utils/relationship-transitions.util';

export interface RelationshipFilters {
  status?: RelationshipStatus;
  classification?: SupplierClassification;
  search?: string;
}

export interface RelationshipStats {
  total: number;
  active: number;
  pending: number;
  suspended: number;
  terminated: number;
  byClassification: Record<SupplierClassification, number>;
}

/** Who is acting. Company-side calls pass the admin, supplier-side calls the accepting user. */
export interface RelationshipActor {
  userId: string;
  email?: string;
  requestId?: string;
}

type TimestampChanges = Partial<Pick<RelationshipAttributes, 'supplierId' | 'acceptedAt' | 'suspendedAt' | 'terminatedAt'>>;

const COMPANY_SUMMARY = ['id', 'name', 'slug', 'contactEmail'];

const transitionRefused = (to: RelationshipStatus) =>
  DomainError.invalidTransition(`cannot ${RELATIONSHIP_ACTIONS[to]} this relationship`);

@Injectable()
export class RelationshipService {
  private readonly logger = new Logger(RelationshipService.name);

  constructor(
    @InjectModel(Relationship)
    private readonly relationshipModel: typeof Relationship,
    private readonly organizationService: OrganizationService,
    private readonly secureLinkService: SecureLinkService,
    private readonly mailService: MailService,
    private readonly auditLogService: AuditLogService,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  buildInvitationUrl(identifier: string): string {
    const base = this.configService.get('MAGIC_LINK_BASE_URL', { infer: true }).replace(/\/+$/, '');
    return `${base}/supplier/invitations?token=${identifier}`;
  }

  async invite(
    companyId: string,
    actor: RelationshipActor,
    dto: InviteSupplierDto,
    meta: RequestMeta = {},
  ): Promise<Relationship> {
    const email = normalizeEmail(dto.email);
    const company = await this.organizationService.getOrganization(companyId);

    const existing = await this.relationshipModel.findOne({
      where: { companyId, invitedEmail: email, status: { [Op.ne]: RelationshipStatus.TERMINATED } },
    });
    if (existing) {
      throw DomainError.alreadyExists('a relationship with this supplier already exists');
    }

    const now = new Date();
    const relationship = await this.relationshipModel.create({
      companyId,
      invitedEmail: email,
      invitedById: actor.userId,
      status: RelationshipStatus.PENDING,
      classification: dto.classification ?? SupplierClassification.STANDARD,
      notes: dto.notes ?? null,
      servicesProvided: dto.servicesProvided ?? [],
      contractReference: dto.contractReference ?? null,
      invitedAt: now,
      statusHistory: [historyEntry(null, RelationshipStatus.PENDING, 'Invitation sent', actor.userId, now)],
    });

    const link = await this.secureLinkService.issue({
      email,
      type: SecureLinkType.INVITATION,
      organizationId: companyId,
      relationshipId: relationship.id,
      ipAddress: meta.ipAddress,
      userAgent: meta.userAgent,
    });

    // Delivery does not hold up the invitation.
    void this.mailService
      .sendSupplierInvitation({
        to: email,
        companyName: company.name,
        url: this.buildInvitationUrl(link.identifier),
        expiresAt: link.expiresAt,
      })
      .catch((error: unknown) => {
        this.logger.error(
          `Failed to send invitation for relationship ${relationship.id}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      });

    await this.auditLogService.log({
      organizationId: companyId,
      action: AuditAction.INVITE,
      resourceType: AuditResourceType.RELATIONSHIP,
      resourceId: relationship.id,
      actorUserId: actor.userId,
      actorEmail: actor.email ?? null,
      description: `Invited supplier ${email}`,
      requestId: meta.requestId ?? actor.requestId,
    });

    this.logger.log(`Company ${companyId} invited ${email} (relationship ${relationship.id})`);
    return relationship;
  }

  async get(id: string, companyId: string): Promise<Relationship> {
    const relationship = await this.relationshipModel.findByPk(id);
    if (!relationship || relationship.companyId !== companyId) {
      throw DomainError.notFound('relationship');
    }
    return relationship;
  }

  /** Relationship visible to a supplier organization once it has accepted. */
  async getForSupplier(id: string, supplierId: string): Promise<Relationship> {
    const relationship = await this.relationshipModel.findByPk(id);
    if (!relationship || relationship.supplierId !== supplierId) {
      throw DomainError.notFound('relationship');
    }
    return relationship;
  }

  async listForCompany(
    companyId: string,
    filters: RelationshipFilters = {},
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<Relationship>> {
    const page = resolvePagination(pagination, ['createdAt', 'invitedAt', 'acceptedAt', 'invitedEmail']);

    const where: WhereOptions<RelationshipAttributes> = {
      companyId,
      ...(filters.status ? { status: filters.status } : {}),
      ...(filters.classification ? { classification: filters.classification } : {}),
    };
    const search = filters.search?.trim();
    if (search) {
      const pattern = `%${search}%`;
      Object.assign(where, {
        [Op.or]: [{ invitedEmail: { [Op.iLike]: pattern } }, { notes: { [Op.iLike]: pattern } }],
      });
    }

    const { rows, count } = await this.relationshipModel.findAndCountAll({
      where,
      order: page.order,
      limit: page.limit,
      offset: page.offset,
      include: [{ model: Organization, as: 'supplier', attributes: COMPANY_SUMMARY }],
    });
    return toPage(rows, count, page);
  }

  async getStats(companyId: string): Promise<RelationshipStats> {
    const rows = await this.relationshipModel.findAll({
      where: { companyId },
      attributes: ['status', 'classification'],
    });

    const byStatus: Record<RelationshipStatus, number> = {
      [RelationshipStatus.PENDING]: 0,
      [RelationshipStatus.ACTIVE]: 0,
      [RelationshipStatus.SUSPENDED]: 0,
      [RelationshipStatus.TERMINATED]: 0,
    };
    const byClassification: Record<SupplierClassification, number> = {
      [SupplierClassification.CRITICAL]: 0,
      [SupplierClassification.IMPORTANT]: 0,
      [SupplierClassification.STANDARD]: 0,
    };
    for (const row of rows) {
      byStatus[row.status] += 1;
      byClassification[row.classification] += 1;
    }

    return {
      total: rows.length,
      active: byStatus[RelationshipStatus.ACTIVE],
      pending: byStatus[RelationshipStatus.PENDING],
      suspended: byStatus[RelationshipStatus.SUSPENDED],
      terminated: byStatus[RelationshipStatus.TERMINATED],
      byClassification,
    };
  }

  async listPendingInvitations(email: string): Promise<Relationship[]> {
    return this.relationshipModel.findAll({
      where: { invitedEmail: normalizeEmail(email), status: RelationshipStatus.PENDING },
      order: [['invitedAt', 'DESC']],
      include: [{ model: Organization, as: 'company', attributes: COMPANY_SUMMARY }],
    });
  }

  /** Companies the supplier works with, excluding ended relationships. */
  async listCompaniesForSupplier(supplierId: string): Promise<Relationship[]> {
    return this.relationshipModel.findAll({
      where: {
        supplierId,
        status: [RelationshipStatus.ACTIVE, RelationshipStatus.SUSPENDED],
      },
      order: [['acceptedAt', 'DESC']],
      include: [{ model: Organization, as: 'company', attributes: COMPANY_SUMMARY }],
    });
  }

  /**
   * Accepts an invitation with the token from the invitation mail. The token
   * must belong to this relationship and to the accepting user's email, and
   * is consumed by the acceptance.
   */
  async accept(
    relationshipId: string,
    supplierId: string,
    actor: Required<Pick<RelationshipActor, 'userId' | 'email'>>,
    token: string,
  ): Promise<Relationship> {
    const relationship = await this.relationshipModel.findByPk(relationshipId);
    if (!relationship || relationship.invitedEmail !== normalizeEmail(actor.email)) {
      throw DomainError.notFound('invitation');
    }
    if (!canTransitionRelationship(relationship.status, RelationshipStatus.ACTIVE)) {
      this.logger.warn(`Relationship ${relationship.id} cannot be accepted while ${relationship.status}`);
      throw transitionRefused(RelationshipStatus.ACTIVE);
    }

    await this.secureLinkService.redeem(token, SecureLinkType.INVITATION, {
      email: relationship.invitedEmail,
      relationshipId: relationship.id,
    });

    const accepted = await this.applyTransition(
      relationship,
      RelationshipStatus.ACTIVE,
      'Invitation accepted',
      actor.userId,
      { supplierId, acceptedAt: new Date() },
    );

    await this.auditLogService.log({
      organizationId: relationship.companyId,
      action: AuditAction.ACCEPT,
      resourceType: AuditResourceType.RELATIONSHIP,
      resourceId: relationship.id,
      actorUserId: actor.userId,
      actorEmail: actor.email,
      description: `Invitation accepted by supplier organization ${supplierId}`,
    });
    return accepted;
  }

  async suspend(id: string, companyId: string, actor: RelationshipActor, reason?: string): Promise<Relationship> {
    const relationship = await this.get(id, companyId);
    const updated = await this.applyTransition(relationship, RelationshipStatus.SUSPENDED, reason, actor.userId, {
      suspendedAt: new Date(),
    });
    await this.audit(updated, AuditAction.SUSPEND, actor, reason);
    return updated;
  }

  async reactivate(id: string, companyId: string, actor: RelationshipActor, reason?: string): Promise<Relationship> {
    const relationship = await this.get(id, companyId);
    const updated = await this.applyTransition(relationship, RelationshipStatus.ACTIVE, reason, actor.userId, {
      suspendedAt: null,
    });
    await this.audit(updated, AuditAction.ACTIVATE, actor, reason);
    return updated;
  }

  async terminate(id: string, companyId: string, actor: RelationshipActor, reason?: string): Promise<Relationship> {
    const relationship = await this.get(id, companyId);
    const updated = await this.applyTransition(relationship, RelationshipStatus.TERMINATED, reason, actor.userId, {
      terminatedAt: new Date(),
    });
    await this.audit(updated, AuditAction.TERMINATE, actor, reason);
    return updated;
  }

  async updateClassification(
    id: string,
    companyId: string,
    classification: SupplierClassification,
  ): Promise<Relationship> {
    return this.updateOpen(id, companyId, { classification });
  }

  async updateDetails(id: string, companyId: string, dto: UpdateRelationshipDto): Promise<Relationship> {
    const changes: Partial<Pick<RelationshipAttributes, 'notes' | 'servicesProvided' | 'contractReference'>> = {};
    if (dto.notes !== undefined) changes.notes = dto.notes;
    if (dto.servicesProvided !== undefined) changes.servicesProvided = dto.servicesProvided;
    if (dto.contractReference !== undefined) changes.contractReference = dto.contractReference;
    return this.updateOpen(id, companyId, changes);
  }

  private async updateOpen(
    id: string,
    companyId: string,
    changes: Partial<Pick<RelationshipAttributes, 'classification' | 'notes' | 'servicesProvided' | 'contractReference'>>,
  ): Promise<Relationship> {
    const relationship = await this.get(id, companyId);
    if (isRelationshipTerminal(relationship.status)) {
      throw DomainError.cannotModify('cannot modify a terminated relationship');
    }
    if (Object.keys(changes).length === 0) {
      return relationship;
    }

    const [affected] = await this.relationshipModel.update(changes, {
      where: { id, status: { [Op.ne]: RelationshipStatus.TERMINATED } },
    });
    if (affected === 0) {
      throw DomainError.cannotModify('cannot modify a terminated relationship');
    }
    return this.reload(id);
  }

  /**
   * Moves the relationship along the transition table. The write is
   * conditional on the status that was read, so a concurrent change makes
   * this call fail instead of overwriting it.
   */
  private async applyTransition(
    relationship: Relationship,
    to: RelationshipStatus,
    reason: string | undefined,
    actorId: string,
    changes: TimestampChanges,
  ): Promise<Relationship> {
    const from = relationship.status;
    if (!canTransitionRelationship(from, to)) {
      this.logger.warn(`Relationship ${relationship.id} cannot move ${from} -> ${to}`);
      throw transitionRefused(to);
    }

    const [affected] = await this.relationshipModel.update(
      {
        ...changes,
        status: to,
        statusHistory: appendHistory(
          relationship.statusHistory,
          historyEntry(from, to, reason?.trim() || null, actorId),
        ),
      },
      { where: { id: relationship.id, status: from } },
    );
    if (affected === 0) {
      this.logger.warn(`Relationship ${relationship.id} left ${from} before the move to ${to}`);
      throw transitionRefused(to);
    }

    this.logger.log(`Relationship ${relationship.id} moved ${from} -> ${to}`);
    return this.reload(relationship.id);
  }

  private async reload(id: string): Promise<Relationship> {
    const relationship = await this.relationshipModel.findByPk(id);
    if (!relationship) {
      throw DomainError.notFound('relationship');
    }
    return relationship;
  }

  private async audit(
    relationship: Relationship,
    action: AuditAction,
    actor: RelationshipActor,
    reason?: string,
  ): Promise<void> {
    await this.auditLogService.log({
      organizationId: relationship.companyId,
      action,
      resourceType: AuditResourceType.RELATIONSHIP,
      resourceId: relationship.id,
      actorUserId: actor.userId,
      actorEmail: actor.email ?? null,
      description: reason,
      changes: { status: relationship.status },
      requestId: actor.requestId,
    });
  }
}
