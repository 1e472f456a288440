import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/sequelize';
import dayjs from 'dayjs';
import { Op } from 'sequelize';
import { DomainError, DomainErrorKind } from '../common/errors/domain.error';
import { EnvironmentVariables } from '../config/env.validation';
import { SecureLink, SecureLinkAttributes, SecureLinkType } from './model/secure-link.model';
import { normalizeEmail } from '../common/utils/string.util';
import { canBeUsed, generateIdentifier, isLinkExpired } from './utils/secure-link.util';

export interface IssueSecureLinkInput {
  email: string;
  type: SecureLinkType;
  userId?: string | null;
  organizationId?: string | null;
  relationshipId?: string | null;
  ttlMinutes?: number;
  ipAddress?: string;
  userAgent?: string;
}

/** Fields a link must carry to be redeemed in a given context. */
export type SecureLinkScope = Partial<Pick<SecureLinkAttributes, 'email' | 'relationshipId'>>;

const inScope = (link: SecureLink, scope: SecureLinkScope): boolean =>
  (scope.email === undefined || link.email === normalizeEmail(scope.email)) &&
  (scope.relationshipId === undefined || link.relationshipId === scope.relationshipId);

@Injectable()
export class SecureLinkService {
  private readonly logger = new Logger(SecureLinkService.name);

  constructor(
    @InjectModel(SecureLink)
    private readonly secureLinkModel: typeof SecureLink,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  defaultTtlMinutes(type: SecureLinkType): number {
    if (type === SecureLinkType.INVITATION) {
      return this.configService.get('INVITATION_EXPIRY_HOURS', { infer: true }) * 60;
    }
    return this.configService.get('MAGIC_LINK_EXPIRY_MINUTES', { infer: true });
  }

  /**
   * Creates a new single-use link. Issuing an auth link first invalidates every
   * live auth link for the same email, so at most one login link is usable.
   */
  async issue(input: IssueSecureLinkInput): Promise<SecureLink> {
    const email = normalizeEmail(input.email);

    if (input.type === SecureLinkType.AUTH) {
      try {
        const invalidated = await this.invalidateAllForEmail(email, SecureLinkType.AUTH);
        if (invalidated > 0) {
          this.logger.debug(`Invalidated ${invalidated} previous login link(s) for ${email}`);
        }
      } catch (error) {
        this.logger.warn(
          `Failed to invalidate previous login links for ${email}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const ttlMinutes = input.ttlMinutes ?? this.defaultTtlMinutes(input.type);

    return this.secureLinkModel.create({
      identifier: generateIdentifier(),
      type: input.type,
      email,
      userId: input.userId ?? null,
      organizationId: input.organizationId ?? null,
      relationshipId: input.relationshipId ?? null,
      expiresAt: dayjs().add(ttlMinutes, 'minute').toDate(),
      isValid: true,
      usedAt: null,
      ipAddress: input.ipAddress ?? null,
      userAgent: input.userAgent ?? null,
    });
  }

  /** Links of any type created for the email inside the trailing window. */
  async countRecent(email: string, windowMinutes: number): Promise<number> {
    const since = dayjs().subtract(windowMinutes, 'minute').toDate();
    return this.secureLinkModel.count({
      where: {
        email: normalizeEmail(email),
        createdAt: { [Op.gte]: since },
      },
    });
  }

  async enforceRateLimit(email: string): Promise<void> {
    const max = this.configService.get('MAGIC_LINK_RATE_LIMIT_MAX', { infer: true });
    const windowMinutes = this.configService.get('MAGIC_LINK_RATE_LIMIT_WINDOW_MINUTES', { infer: true });

    const recent = await this.countRecent(email, windowMinutes);
    if (recent >= max) {
      throw new DomainError(
        DomainErrorKind.RATE_LIMIT_EXCEEDED,
        'Too many requests. Please try again later.',
      );
    }
  }

  /**
   * Consumes a link. The write only matches while the link is still valid and
   * unused, so of several concurrent redemptions exactly one succeeds. A link
   * outside the given scope is treated as unknown and left untouched.
   */
  async redeem(identifier: string, type: SecureLinkType, scope: SecureLinkScope = {}): Promise<SecureLink> {
    const link = await this.secureLinkModel.findOne({ where: { identifier, type } });
    if (!link || !inScope(link, scope)) {
      throw new DomainError(DomainErrorKind.NOT_FOUND, 'secure link not found');
    }

    const now = new Date();
    if (isLinkExpired(link, now)) {
      throw new DomainError(DomainErrorKind.EXPIRED, 'secure link has expired');
    }
    if (link.usedAt !== null) {
      throw new DomainError(DomainErrorKind.ALREADY_USED, 'secure link has already been used');
    }
    if (!canBeUsed(link, now)) {
      throw new DomainError(DomainErrorKind.INVALID, 'secure link is invalid');
    }

    const [affected] = await this.secureLinkModel.update(
      { usedAt: now, isValid: false },
      { where: { id: link.id, isValid: true, usedAt: null } },
    );
    if (affected === 0) {
      throw new DomainError(DomainErrorKind.ALREADY_USED, 'secure link has already been used');
    }

    const consumed = await this.secureLinkModel.findByPk(link.id);
    if (!consumed) {
      throw new DomainError(DomainErrorKind.NOT_FOUND, 'secure link not found');
    }
    return consumed;
  }

  async invalidateAllForEmail(email: string, type: SecureLinkType): Promise<number> {
    const [affected] = await this.secureLinkModel.update(
      { isValid: false },
      { where: { email: normalizeEmail(email), type, isValid: true, usedAt: null } },
    );
    return affected;
  }

  /** Retention sweep: drops every link past its expiry, used or not. */
  async deleteExpired(now: Date = new Date()): Promise<number> {
    return this.secureLinkModel.destroy({ where: { expiresAt: { [Op.lt]: now } } });
  }
}
