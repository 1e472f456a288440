import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { DomainError } from '../common/errors/domain.error';
import { normalizeEmail, slugify } from '../common/utils/string.util';
import { User, UserRole } from '../user/model/user.model';
import { UpdateOrganizationDto, UpdateOrganizationSettingsDto } from './dto/organization.dto';
import {
  DEFAULT_ORGANIZATION_SETTINGS,
  Organization,
  OrganizationSettings,
  OrganizationType,
  resolveSettings,
} from './model/organization.model';

export interface CreateOrganizationInput {
  name: string;
  type: OrganizationType;
  adminEmail: string;
  adminName?: string | null;
  slug?: string;
  contactEmail?: string | null;
  domain?: string | null;
}

@Injectable()
export class OrganizationService {
  constructor(
    @InjectModel(Organization)
    private readonly organizationModel: typeof Organization,
    @InjectModel(User)
    private readonly userModel: typeof User,
  ) {}

  /** Null when missing or soft-deleted. */
  async findActiveById(id: string): Promise<Organization | null> {
    const organization = await this.organizationModel.findByPk(id);
    if (!organization || organization.deletedAt !== null) {
      return null;
    }
    return organization;
  }

  async getOrganization(id: string): Promise<Organization> {
    const organization = await this.findActiveById(id);
    if (!organization) {
      throw DomainError.notFound('organization');
    }
    return organization;
  }

  async updateOrganization(id: string, dto: UpdateOrganizationDto): Promise<Organization> {
    await this.getOrganization(id);

    const changes: Partial<Pick<Organization, 'name' | 'contactEmail' | 'domain'>> = {};
    if (dto.name !== undefined) changes.name = dto.name.trim();
    if (dto.contactEmail !== undefined) changes.contactEmail = normalizeEmail(dto.contactEmail);
    if (dto.domain !== undefined) changes.domain = dto.domain.trim().toLowerCase();

    if (Object.keys(changes).length > 0) {
      await this.organizationModel.update(changes, { where: { id, deletedAt: null } });
    }
    return this.getOrganization(id);
  }

  async getSettings(id: string): Promise<OrganizationSettings> {
    const organization = await this.getOrganization(id);
    return resolveSettings(organization.settings);
  }

  async updateSettings(id: string, dto: UpdateOrganizationSettingsDto): Promise<OrganizationSettings> {
    const current = await this.getSettings(id);

    const settings: OrganizationSettings = {
      defaultDueDays: dto.defaultDueDays ?? current.defaultDueDays,
      reminderDaysBefore: dto.reminderDaysBefore ?? current.reminderDaysBefore,
      notificationsEnabled: dto.notificationsEnabled ?? current.notificationsEnabled,
      defaultLanguage: dto.defaultLanguage ?? current.defaultLanguage,
    };

    await this.organizationModel.update({ settings }, { where: { id, deletedAt: null } });
    return settings;
  }

  async findByIds(ids: string[]): Promise<Organization[]> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return [];
    return this.organizationModel.findAll({ where: { id: unique } });
  }

  async createWithAdmin(input: CreateOrganizationInput): Promise<{ organization: Organization; admin: User }> {
    const slug = slugify(input.slug ?? input.name);
    if (!slug) {
      throw DomainError.validation('organization name must contain letters or digits');
    }

    const adminEmail = normalizeEmail(input.adminEmail);
    const [existingSlug, existingUser] = await Promise.all([
      this.organizationModel.findOne({ where: { slug } }),
      this.userModel.findOne({ where: { email: adminEmail } }),
    ]);
    if (existingSlug) {
      throw DomainError.alreadyExists('organization slug already exists');
    }
    if (existingUser) {
      throw DomainError.alreadyExists('email already exists');
    }

    const organization = await this.organizationModel.create({
      type: input.type,
      name: input.name.trim(),
      slug,
      contactEmail: input.contactEmail ? normalizeEmail(input.contactEmail) : adminEmail,
      domain: input.domain ?? adminEmail.split('@')[1] ?? null,
      settings: { ...DEFAULT_ORGANIZATION_SETTINGS },
    });
    const admin = await this.userModel.create({
      email: adminEmail,
      name: input.adminName ?? null,
      organizationId: organization.id,
      role: UserRole.ADMIN,
      isActive: true,
    });

    return { organization, admin };
  }
}
