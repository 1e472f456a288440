import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, WhereOptions } from 'sequelize';
import { v4 as uuidv4 } from 'uuid';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError } from '../common/errors/domain.error';
import { PaginatedResult, PaginationOptions, resolvePagination, toPage } from '../common/utils/pagination.util';
import { TopicDto } from '../questionnaire/dto/questionnaire.dto';
import systemTemplates from './data/system-templates.json';
import { CreateQuestionnaireTemplateDto, UpdateQuestionnaireTemplateDto } from './dto/questionnaire-template.dto';
import {
  DEFAULT_ESTIMATED_MINUTES,
  DEFAULT_TEMPLATE_VERSION,
  QuestionnaireTemplate,
  QuestionnaireTemplateAttributes,
  TemplateCategory,
  TemplateTopic,
  TemplateVisibility,
} from './model/questionnaire-template.model';
import { parseTemplateDefinition, toTemplateDefinition } from './utils/template-definition.util';

export interface TemplateActor {
  userId: string;
  email?: string;
  requestId?: string;
}

export interface TemplateFilters {
  category?: TemplateCategory;
  search?: string;
}

const DEFAULT_TEMPLATE_PASSING_SCORE = 70;

const toTopics = (topics: TopicDto[]): TemplateTopic[] => {
  const converted = topics.map((topic, index) => ({
    id: topic.id ?? uuidv4(),
    name: topic.name.trim(),
    description: topic.description ?? null,
    order: index,
  }));
  if (new Set(converted.map((topic) => topic.id)).size !== converted.length) {
    throw DomainError.validation('topic ids must be unique');
  }
  return converted;
};

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

@Injectable()
export class QuestionnaireTemplateService implements OnApplicationBootstrap {
  private readonly logger = new Logger(QuestionnaireTemplateService.name);

  constructor(
    @InjectModel(QuestionnaireTemplate)
    private readonly templateModel: typeof QuestionnaireTemplate,
    private readonly auditLogService: AuditLogService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    try {
      const created = await this.seedSystemTemplates();
      if (created > 0) this.logger.log(`Seeded ${created} system template(s)`);
    } catch (error) {
      this.logger.warn(`System templates were not seeded: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async create(
    organizationId: string,
    actor: TemplateActor,
    dto: CreateQuestionnaireTemplateDto,
  ): Promise<QuestionnaireTemplate> {
    const template = await this.templateModel.create({
      name: dto.name.trim(),
      description: dto.description ?? null,
      category: dto.category,
      version: dto.version ?? DEFAULT_TEMPLATE_VERSION,
      isSystem: false,
      organizationId,
      createdById: actor.userId,
      visibility: TemplateVisibility.DRAFT,
      defaultPassingScore: dto.defaultPassingScore ?? DEFAULT_TEMPLATE_PASSING_SCORE,
      estimatedMinutes: dto.estimatedMinutes ?? DEFAULT_ESTIMATED_MINUTES,
      topics: toTopics(dto.topics ?? []),
      tags: dto.tags ?? [],
      usageCount: 0,
      publishedAt: null,
    });

    await this.audit(template, AuditAction.CREATE, actor);
    return template;
  }

  /** Creates a draft from a JSON template definition. */
  async import(organizationId: string, actor: TemplateActor, content: string): Promise<QuestionnaireTemplate> {
    return this.create(organizationId, actor, parseTemplateDefinition(content));
  }

  /** System and global templates are visible to every company; the rest only to their owner. */
  async get(id: string, organizationId: string): Promise<QuestionnaireTemplate> {
    const template = await this.templateModel.findByPk(id);
    if (
      !template ||
      !(template.isSystem || template.visibility === TemplateVisibility.GLOBAL || template.organizationId === organizationId)
    ) {
      throw DomainError.notFound('template');
    }
    return template;
  }

  async update(
    id: string,
    organizationId: string,
    dto: UpdateQuestionnaireTemplateDto,
  ): Promise<QuestionnaireTemplate> {
    const template = await this.getOwned(id, organizationId);
    if (template.visibility !== TemplateVisibility.DRAFT) {
      throw this.notEditable();
    }

    const changes: Partial<QuestionnaireTemplateAttributes> = {};
    if (dto.name !== undefined) changes.name = dto.name.trim();
    if (dto.description !== undefined) changes.description = dto.description;
    if (dto.version !== undefined) changes.version = dto.version;
    if (dto.defaultPassingScore !== undefined) changes.defaultPassingScore = dto.defaultPassingScore;
    if (dto.estimatedMinutes !== undefined) changes.estimatedMinutes = dto.estimatedMinutes;
    if (dto.topics !== undefined) changes.topics = toTopics(dto.topics);
    if (dto.tags !== undefined) changes.tags = dto.tags;

    if (Object.keys(changes).length > 0) {
      const [affected] = await this.templateModel.update(changes, {
        where: { id, visibility: TemplateVisibility.DRAFT },
      });
      if (affected === 0) {
        throw this.notEditable();
      }
    }
    return this.get(id, organizationId);
  }

  async remove(id: string, organizationId: string, actor: TemplateActor): Promise<void> {
    const template = await this.getOwned(id, organizationId);
    if (template.usageCount > 0) {
      throw this.inUse();
    }

    const removed = await this.templateModel.destroy({ where: { id, usageCount: 0 } });
    if (removed === 0) {
      throw this.inUse();
    }
    await this.audit(template, AuditAction.DELETE, actor);
  }

  async publish(
    id: string,
    organizationId: string,
    actor: TemplateActor,
    visibility: TemplateVisibility.LOCAL | TemplateVisibility.GLOBAL,
  ): Promise<QuestionnaireTemplate> {
    const template = await this.getOwned(id, organizationId);
    if (template.visibility !== TemplateVisibility.DRAFT) {
      throw DomainError.invalidTransition('cannot publish this template');
    }
    if (template.topics.length === 0) {
      throw DomainError.validation('a template needs at least one topic before publishing');
    }

    const [affected] = await this.templateModel.update(
      { visibility, publishedAt: new Date() },
      { where: { id, visibility: TemplateVisibility.DRAFT } },
    );
    if (affected === 0) {
      throw DomainError.invalidTransition('cannot publish this template');
    }

    const published = await this.get(id, organizationId);
    await this.audit(published, AuditAction.PUBLISH, actor);
    this.logger.log(`Template ${id} published as ${visibility}`);
    return published;
  }

  async unpublish(id: string, organizationId: string, actor: TemplateActor): Promise<QuestionnaireTemplate> {
    const template = await this.getOwned(id, organizationId);
    if (template.visibility === TemplateVisibility.DRAFT) {
      throw DomainError.invalidTransition('cannot unpublish this template');
    }
    if (template.usageCount > 0) {
      throw this.inUse();
    }

    const [affected] = await this.templateModel.update(
      { visibility: TemplateVisibility.DRAFT, publishedAt: null },
      { where: { id, visibility: template.visibility, usageCount: 0 } },
    );
    if (affected === 0) {
      throw DomainError.invalidTransition('cannot unpublish this template');
    }

    const unpublished = await this.get(id, organizationId);
    await this.audit(unpublished, AuditAction.UNPUBLISH, actor);
    return unpublished;
  }

  async listSystem(category?: TemplateCategory): Promise<QuestionnaireTemplate[]> {
    return this.templateModel.findAll({
      where: { isSystem: true, ...(category ? { category } : {}) },
      order: [
        ['category', 'ASC'],
        ['name', 'ASC'],
      ],
    });
  }

  /** Everything a company may build a questionnaire from. */
  async listAvailable(
    organizationId: string,
    filters: TemplateFilters = {},
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<QuestionnaireTemplate>> {
    const page = resolvePagination(pagination, ['createdAt', 'name', 'usageCount', 'publishedAt']);
    const where: WhereOptions<QuestionnaireTemplateAttributes> = {
      [Op.or]: [{ isSystem: true }, { visibility: TemplateVisibility.GLOBAL }, { organizationId }],
      ...(filters.category ? { category: filters.category } : {}),
      ...(filters.search ? { name: { [Op.iLike]: `%${escapeLike(filters.search.trim())}%` } } : {}),
    };
    const { rows, count } = await this.templateModel.findAndCountAll({
      where,
      order: page.order,
      limit: page.limit,
      offset: page.offset,
    });
    return toPage(rows, count, page);
  }

  async listForOrganization(
    organizationId: string,
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<QuestionnaireTemplate>> {
    const page = resolvePagination(pagination, ['createdAt', 'name', 'usageCount', 'publishedAt']);
    const { rows, count } = await this.templateModel.findAndCountAll({
      where: { organizationId },
      order: page.order,
      limit: page.limit,
      offset: page.offset,
    });
    return toPage(rows, count, page);
  }

  async recordUsage(id: string): Promise<void> {
    await this.templateModel.increment('usageCount', { where: { id } });
  }

  /** Inserts the bundled system templates that are missing, matched by name. Returns how many were created. */
  async seedSystemTemplates(): Promise<number> {
    const existing = await this.templateModel.findAll({ where: { isSystem: true } });
    const names = new Set(existing.map((template) => template.name));

    let created = 0;
    for (const entry of systemTemplates) {
      const definition = toTemplateDefinition(entry);
      if (names.has(definition.name)) continue;

      await this.templateModel.create({
        name: definition.name,
        description: definition.description ?? null,
        category: definition.category,
        version: definition.version ?? DEFAULT_TEMPLATE_VERSION,
        isSystem: true,
        organizationId: null,
        createdById: null,
        visibility: TemplateVisibility.GLOBAL,
        defaultPassingScore: definition.defaultPassingScore ?? DEFAULT_TEMPLATE_PASSING_SCORE,
        estimatedMinutes: definition.estimatedMinutes ?? DEFAULT_ESTIMATED_MINUTES,
        topics: toTopics(definition.topics ?? []),
        tags: definition.tags ?? [],
        usageCount: 0,
        publishedAt: new Date(),
      });
      names.add(definition.name);
      created += 1;
    }
    return created;
  }

  private async getOwned(id: string, organizationId: string): Promise<QuestionnaireTemplate> {
    const template = await this.get(id, organizationId);
    if (template.isSystem || template.organizationId !== organizationId) {
      throw DomainError.forbidden('template belongs to another organization');
    }
    return template;
  }

  private notEditable(): DomainError {
    return DomainError.notEditable('template can only be changed while it is a draft');
  }

  private inUse(): DomainError {
    return DomainError.cannotModify('template is in use');
  }

  private async audit(template: QuestionnaireTemplate, action: AuditAction, actor: TemplateActor): Promise<void> {
    if (!template.organizationId) return;
    await this.auditLogService.log({
      organizationId: template.organizationId,
      action,
      resourceType: AuditResourceType.TEMPLATE,
      resourceId: template.id,
      actorUserId: actor.userId,
      actorEmail: actor.email ?? null,
      description: template.name,
      requestId: actor.requestId,
    });
  }
}
