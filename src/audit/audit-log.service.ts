import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { WhereOptions } from 'sequelize';
import { PaginatedResult, PaginationOptions, resolvePagination, toPage } from '../common/utils/pagination.util';
import { AuditAction, AuditLog, AuditLogAttributes, AuditResourceType } from './model/audit-log.model';

export interface AuditEntry {
  organizationId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  actorUserId?: string | null;
  actorEmail?: string | null;
  description?: string;
  changes?: Record<string, unknown>;
  requestId?: string;
}

export interface AuditLogFilters {
  resourceType?: AuditResourceType;
  resourceId?: string;
}

@Injectable()
export class AuditLogService {
  private readonly logger = new Logger(AuditLogService.name);

  constructor(
    @InjectModel(AuditLog)
    private readonly auditLogModel: typeof AuditLog,
  ) {}

  /** Best-effort append; a failed write never fails the calling operation. */
  async log(entry: AuditEntry): Promise<void> {
    try {
      await this.auditLogModel.create({
        organizationId: entry.organizationId,
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        actorUserId: entry.actorUserId ?? null,
        actorEmail: entry.actorEmail ?? null,
        description: entry.description ?? null,
        changes: entry.changes ?? null,
        requestId: entry.requestId ?? null,
      });
    } catch (error) {
      this.logger.warn(
        `Failed to write audit entry ${entry.action} ${entry.resourceType}/${entry.resourceId}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  async listForOrganization(
    organizationId: string,
    filters: AuditLogFilters = {},
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<AuditLog>> {
    const page = resolvePagination(pagination, ['createdAt', 'action']);

    const where: WhereOptions<AuditLogAttributes> = {
      organizationId,
      ...(filters.resourceType ? { resourceType: filters.resourceType } : {}),
      ...(filters.resourceId ? { resourceId: filters.resourceId } : {}),
    };

    const { rows, count } = await this.auditLogModel.findAndCountAll({
      where,
      order: page.order,
      limit: page.limit,
      offset: page.offset,
    });

    return toPage(rows, count, page);
  }
}
