import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import dayjs from 'dayjs';
import { Op, WhereOptions } from 'sequelize';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError } from '../common/errors/domain.error';
import { appendHistory, historyEntry } from '../common/types/status-history';
import { PaginatedResult, PaginationOptions, resolvePagination, toPage } from '../common/utils/pagination.util';
import { OrganizationService } from '../organization/organization.service';
import { QuestionnaireService } from '../questionnaire/questionnaire.service';
import { RelationshipService } from '../relationship/relationship.service';
import { canReceiveRequirements } from '../relationship/utils/relationship-transitions.util';
import { CreateRequirementDto, UpdateRequirementDto } from './dto/requirement.dto';
import {
  Requirement,
  RequirementAttributes,
  RequirementPriority,
  RequirementStatus,
  RequirementType,
} from './model/requirement.model';
import {
  DEFAULT_MAX_REPORT_AGE_DAYS,
  DEFAULT_MINIMUM_GRADE,
  OPEN_STATUSES,
  REQUIREMENT_ACTIONS,
  RequirementView,
  canTransitionRequirement,
  isOverdue,
  toRequirementView,
} from './utils/requirement-rules.util';

export const EXPIRY_REASON = 'Expired due to passing due date';

export interface RequirementActor {
  userId: string;
  email?: string;
  requestId?: string;
}

export interface RequirementFilters {
  status?: RequirementStatus;
  type?: RequirementType;
  priority?: RequirementPriority;
  relationshipId?: string;
  overdue?: boolean;
}

export interface SupplierRequirementFilters {
  status?: RequirementStatus;
  companyId?: string;
}

export interface RequirementStats {
  total: number;
  pending: number;
  inProgress: number;
  submitted: number;
  approved: number;
  rejected: number;
  revisionRequested: number;
  expired: number;
  overdue: number;
}

type RequirementChanges = Partial<
  Pick<
    RequirementAttributes,
    'title' | 'description' | 'priority' | 'dueDate' | 'passingScore' | 'minimumGrade' | 'maxReportAgeDays'
  >
>;

type TransitionTimestamps = Partial<Pick<RequirementAttributes, 'submittedAt' | 'reviewedAt' | 'expiredAt'>>;

const transitionRefused = (to: RequirementStatus) =>
  DomainError.invalidTransition(`cannot ${REQUIREMENT_ACTIONS[to]} this requirement`);

const timestampsFor = (to: RequirementStatus, at: Date): TransitionTimestamps => {
  switch (to) {
    case RequirementStatus.SUBMITTED:
      return { submittedAt: at };
    case RequirementStatus.APPROVED:
    case RequirementStatus.REJECTED:
    case RequirementStatus.REVISION_REQUESTED:
      return { reviewedAt: at };
    case RequirementStatus.EXPIRED:
      return { expiredAt: at };
    default:
      return {};
  }
};

const SORTABLE = ['createdAt', 'dueDate', 'assignedAt', 'status', 'title'];

@Injectable()
export class RequirementService {
  private readonly logger = new Logger(RequirementService.name);

  constructor(
    @InjectModel(Requirement)
    private readonly requirementModel: typeof Requirement,
    private readonly relationshipService: RelationshipService,
    private readonly questionnaireService: QuestionnaireService,
    private readonly organizationService: OrganizationService,
    private readonly auditLogService: AuditLogService,
  ) {}

  async create(companyId: string, actor: RequirementActor, dto: CreateRequirementDto): Promise<Requirement> {
    const relationship = await this.relationshipService.get(dto.relationshipId, companyId);
    const supplierId = relationship.supplierId;
    if (!canReceiveRequirements(relationship) || supplierId === null) {
      throw DomainError.invalidTransition('cannot assign requirements to this relationship');
    }

    const scoring: Pick<
      RequirementAttributes,
      'questionnaireId' | 'passingScore' | 'minimumGrade' | 'maxReportAgeDays'
    > = {
      questionnaireId: null,
      passingScore: null,
      minimumGrade: null,
      maxReportAgeDays: null,
    };
    if (dto.type === RequirementType.QUESTIONNAIRE) {
      if (!dto.questionnaireId) {
        throw DomainError.validation('questionnaireId is required for questionnaire requirements');
      }
      const questionnaire = await this.questionnaireService.getPublished(dto.questionnaireId, companyId);
      scoring.questionnaireId = questionnaire.id;
      scoring.passingScore = dto.passingScore ?? questionnaire.passingScore;
    } else {
      scoring.minimumGrade = dto.minimumGrade ?? DEFAULT_MINIMUM_GRADE;
      scoring.maxReportAgeDays = dto.maxReportAgeDays ?? DEFAULT_MAX_REPORT_AGE_DAYS;
    }

    const now = new Date();
    let dueDate = dto.dueDate ?? null;
    if (!dueDate) {
      const settings = await this.organizationService.getSettings(companyId);
      dueDate = dayjs(now).add(settings.defaultDueDays, 'day').toDate();
    }

    const requirement = await this.requirementModel.create({
      relationshipId: relationship.id,
      companyId,
      supplierId,
      type: dto.type,
      title: dto.title.trim(),
      description: dto.description ?? null,
      priority: dto.priority ?? RequirementPriority.MEDIUM,
      status: RequirementStatus.PENDING,
      dueDate,
      ...scoring,
      assignedAt: now,
      assignedById: actor.userId,
      statusHistory: [historyEntry(null, RequirementStatus.PENDING, 'Requirement assigned', actor.userId, now)],
    });

    await this.auditLogService.log({
      organizationId: companyId,
      action: AuditAction.CREATE,
      resourceType: AuditResourceType.REQUIREMENT,
      resourceId: requirement.id,
      actorUserId: actor.userId,
      actorEmail: actor.email ?? null,
      description: `Assigned "${requirement.title}" to supplier ${supplierId}`,
      requestId: actor.requestId,
    });
    return requirement;
  }

  /** Edits are only possible until the supplier starts working on it. */
  async update(id: string, companyId: string, dto: UpdateRequirementDto): Promise<Requirement> {
    const requirement = await this.get(id, companyId);
    if (requirement.status !== RequirementStatus.PENDING) {
      throw DomainError.notEditable('requirement can only be updated while pending');
    }

    const changes: RequirementChanges = {};
    if (dto.title !== undefined) changes.title = dto.title.trim();
    if (dto.description !== undefined) changes.description = dto.description;
    if (dto.priority !== undefined) changes.priority = dto.priority;
    if (dto.dueDate !== undefined) changes.dueDate = dto.dueDate;
    if (requirement.type === RequirementType.QUESTIONNAIRE) {
      if (dto.passingScore !== undefined) changes.passingScore = dto.passingScore;
    } else {
      if (dto.minimumGrade !== undefined) changes.minimumGrade = dto.minimumGrade;
      if (dto.maxReportAgeDays !== undefined) changes.maxReportAgeDays = dto.maxReportAgeDays;
    }
    if (Object.keys(changes).length === 0) {
      return requirement;
    }

    const [affected] = await this.requirementModel.update(changes, {
      where: { id, status: RequirementStatus.PENDING },
    });
    if (affected === 0) {
      throw DomainError.notEditable('requirement can only be updated while pending');
    }
    return this.reload(id);
  }

  /**
   * Moves a requirement along the transition table. Expiry is reserved for
   * the sweep and cannot be requested here.
   */
  async transition(
    requirement: Requirement,
    to: RequirementStatus,
    reason: string | null,
    actorId: string | null,
  ): Promise<Requirement> {
    if (to === RequirementStatus.EXPIRED) {
      throw DomainError.invalidTransition('requirements only expire when their due date passes');
    }
    const from = requirement.status;
    if (!canTransitionRequirement(from, to)) {
      this.logger.warn(`Requirement ${requirement.id} cannot move ${from} -> ${to}`);
      throw transitionRefused(to);
    }

    const now = new Date();
    const [affected] = await this.requirementModel.update(
      {
        ...timestampsFor(to, now),
        status: to,
        statusHistory: appendHistory(requirement.statusHistory, historyEntry(from, to, reason, actorId, now)),
      },
      { where: { id: requirement.id, status: from } },
    );
    if (affected === 0) {
      this.logger.warn(`Requirement ${requirement.id} left ${from} before the move to ${to}`);
      throw transitionRefused(to);
    }

    this.logger.log(`Requirement ${requirement.id} moved ${from} -> ${to}`);
    return this.reload(requirement.id);
  }

  async get(id: string, companyId: string): Promise<Requirement> {
    const requirement = await this.requirementModel.findByPk(id);
    if (!requirement || requirement.companyId !== companyId) {
      throw DomainError.notFound('requirement');
    }
    return requirement;
  }

  async getForSupplier(id: string, supplierId: string): Promise<Requirement> {
    const requirement = await this.requirementModel.findByPk(id);
    if (!requirement || requirement.supplierId !== supplierId) {
      throw DomainError.notFound('requirement');
    }
    return requirement;
  }

  async listForCompany(
    companyId: string,
    filters: RequirementFilters = {},
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<RequirementView>> {
    const now = new Date();
    const where: WhereOptions<RequirementAttributes> = {
      companyId,
      ...(filters.status ? { status: filters.status } : {}),
      ...(filters.type ? { type: filters.type } : {}),
      ...(filters.priority ? { priority: filters.priority } : {}),
      ...(filters.relationshipId ? { relationshipId: filters.relationshipId } : {}),
    };
    if (filters.overdue) {
      Object.assign(where, {
        [Op.and]: [{ status: [...OPEN_STATUSES] }, { dueDate: { [Op.lt]: now } }],
      });
    }
    return this.page(where, pagination, now);
  }

  async listForSupplier(
    supplierId: string,
    filters: SupplierRequirementFilters = {},
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<RequirementView>> {
    const where: WhereOptions<RequirementAttributes> = {
      supplierId,
      ...(filters.status ? { status: filters.status } : {}),
      ...(filters.companyId ? { companyId: filters.companyId } : {}),
    };
    return this.page(where, pagination, new Date());
  }

  async getStats(companyId: string): Promise<RequirementStats> {
    const rows = await this.requirementModel.findAll({
      where: { companyId },
      attributes: ['status', 'dueDate'],
    });

    const byStatus = new Map<RequirementStatus, number>();
    rows.forEach((row) => byStatus.set(row.status, (byStatus.get(row.status) ?? 0) + 1));
    const count = (status: RequirementStatus) => byStatus.get(status) ?? 0;
    const now = new Date();

    return {
      total: rows.length,
      pending: count(RequirementStatus.PENDING),
      inProgress: count(RequirementStatus.IN_PROGRESS),
      submitted: count(RequirementStatus.SUBMITTED),
      approved: count(RequirementStatus.APPROVED),
      rejected: count(RequirementStatus.REJECTED),
      revisionRequested: count(RequirementStatus.REVISION_REQUESTED),
      expired: count(RequirementStatus.EXPIRED),
      overdue: rows.filter((row) => isOverdue(row, now)).length,
    };
  }

  /**
   * Expiry sweep. Each write is conditional on the status it read, so a
   * supplier submitting at the same moment wins or loses cleanly and a second
   * run finds nothing left to expire.
   */
  async expireOverdue(now: Date = new Date()): Promise<number> {
    const candidates = await this.requirementModel.findAll({
      where: { status: [...OPEN_STATUSES], dueDate: { [Op.lt]: now } },
      order: [['dueDate', 'ASC']],
    });

    let expired = 0;
    for (const requirement of candidates) {
      const [affected] = await this.requirementModel.update(
        {
          status: RequirementStatus.EXPIRED,
          expiredAt: now,
          statusHistory: appendHistory(
            requirement.statusHistory,
            historyEntry(requirement.status, RequirementStatus.EXPIRED, EXPIRY_REASON, null, now),
          ),
        },
        { where: { id: requirement.id, status: requirement.status } },
      );
      if (affected === 0) continue;

      expired += affected;
      await this.auditLogService.log({
        organizationId: requirement.companyId,
        action: AuditAction.EXPIRE,
        resourceType: AuditResourceType.REQUIREMENT,
        resourceId: requirement.id,
        description: EXPIRY_REASON,
        changes: { from: requirement.status, to: RequirementStatus.EXPIRED },
      });
    }

    if (expired > 0) {
      this.logger.log(`Expired ${expired} overdue requirement(s)`);
    }
    return expired;
  }

  private async page(
    where: WhereOptions<RequirementAttributes>,
    pagination: PaginationOptions,
    now: Date,
  ): Promise<PaginatedResult<RequirementView>> {
    const page = resolvePagination(pagination, SORTABLE);
    const { rows, count } = await this.requirementModel.findAndCountAll({
      where,
      order: page.order,
      limit: page.limit,
      offset: page.offset,
    });
    return toPage(
      rows.map((row) => toRequirementView(row, now)),
      count,
      page,
    );
  }

  private async reload(id: string): Promise<Requirement> {
    const requirement = await this.requirementModel.findByPk(id);
    if (!requirement) {
      throw DomainError.notFound('requirement');
    }
    return requirement;
  }
}
