import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { isEmail } from 'class-validator';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError, DomainErrorKind } from '../common/errors/domain.error';
import { RequestMeta } from '../common/types/request.types';
import { normalizeEmail } from '../common/utils/string.util';
import { EnvironmentVariables } from '../config/env.validation';
import { Organization } from '../organization/model/organization.model';
import { OrganizationService } from '../organization/organization.service';
import { SecureLink, SecureLinkType } from '../secure-link/model/secure-link.model';
import { SecureLinkService } from '../secure-link/secure-link.service';
import { isUserAvailable, User } from '../user/model/user.model';
import { UserService } from '../user/user.service';
import { MailService } from '../utils/mail.service';
import { JwtPayload } from './jwt.strategy';

export const MAGIC_LINK_SENT_MESSAGE = 'If an account exists with this email, a magic link has been sent.';

const REDEMPTION_FAILURES = new Set<DomainErrorKind>([
  DomainErrorKind.NOT_FOUND,
  DomainErrorKind.EXPIRED,
  DomainErrorKind.ALREADY_USED,
  DomainErrorKind.INVALID,
]);

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  expiresIn: string;
}

export interface OperatorMagicLink {
  url: string;
  expiresAt: Date;
  user: User;
  organization: Organization;
}

export interface AuthSession extends TokenPair {
  user: User;
  organization: Organization;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly organizationService: OrganizationService,
    private readonly secureLinkService: SecureLinkService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    private readonly mailService: MailService,
    private readonly auditLogService: AuditLogService,
  ) {}

  buildMagicLinkUrl(identifier: string, baseUrl?: string): string {
    const base = (baseUrl ?? this.configService.get<EnvironmentVariables, 'MAGIC_LINK_BASE_URL'>('MAGIC_LINK_BASE_URL', { infer: true })).replace(/\/+$/, '');
    return `${base}/auth/verify/${identifier}`;
  }

  /**
   * Sends a login link when the email belongs to an active account. Unknown
   * or disabled accounts return normally so callers cannot tell which emails exist.
   */
  async requestMagicLink(email: string, meta: RequestMeta = {}): Promise<void> {
    const normalized = normalizeEmail(email);

    await this.secureLinkService.enforceRateLimit(normalized);

    const user = await this.userService.findActiveByEmail(normalized);
    if (!user) {
      this.logger.log('Magic link requested for an unknown or inactive account');
      return;
    }

    const organization = await this.organizationService.findActiveById(user.organizationId);
    if (!organization) {
      this.logger.warn(`Magic link requested for user ${user.id} whose organization is unavailable`);
      return;
    }

    const link = await this.secureLinkService.issue({
      email: normalized,
      type: SecureLinkType.AUTH,
      userId: user.id,
      organizationId: organization.id,
      ipAddress: meta.ipAddress,
      userAgent: meta.userAgent,
    });

    try {
      await this.mailService.sendMagicLink(
        normalized,
        this.buildMagicLinkUrl(link.identifier),
        this.secureLinkService.defaultTtlMinutes(SecureLinkType.AUTH),
      );
    } catch (error) {
      this.logger.error(`Failed to send magic link to user ${user.id}`, error instanceof Error ? error.stack : String(error));
    }
  }

  /**
   * Operator path to a login link: no rate limit and no mail. The caller hands
   * the URL over out of band.
   */
  async issueOperatorMagicLink(email: string, baseUrl?: string): Promise<OperatorMagicLink> {
    const normalized = normalizeEmail(email);
    if (!isEmail(normalized)) {
      throw DomainError.validation(`invalid email: ${email}`, 'invalid_email');
    }

    const user = await this.userService.findActiveByEmail(normalized);
    if (!user) {
      throw DomainError.notFound('active user');
    }
    const organization = await this.organizationService.findActiveById(user.organizationId);
    if (!organization) {
      throw DomainError.notFound('organization');
    }

    const link = await this.secureLinkService.issue({
      email: normalized,
      type: SecureLinkType.AUTH,
      userId: user.id,
      organizationId: organization.id,
    });
    return {
      url: this.buildMagicLinkUrl(link.identifier, baseUrl),
      expiresAt: link.expiresAt,
      user,
      organization,
    };
  }

  async verifyMagicLink(identifier: string, meta: RequestMeta = {}): Promise<AuthSession> {
    let link: SecureLink;
    try {
      link = await this.secureLinkService.redeem(identifier, SecureLinkType.AUTH);
    } catch (error) {
      if (error instanceof DomainError && REDEMPTION_FAILURES.has(error.kind)) {
        throw DomainError.unauthenticated('Invalid or expired magic link');
      }
      throw error;
    }

    if (!link.userId) {
      throw DomainError.unauthenticated('Invalid or expired magic link');
    }

    const user = await this.userService.findById(link.userId);
    if (!isUserAvailable(user)) {
      throw DomainError.unauthenticated('Account is not available');
    }
    const organization = await this.organizationService.findActiveById(user.organizationId);
    if (!organization) {
      throw DomainError.unauthenticated('Account is not available');
    }

    await this.userService.recordLogin(user.id);
    await this.auditLogService.log({
      organizationId: organization.id,
      actorUserId: user.id,
      actorEmail: user.email,
      action: AuditAction.LOGIN,
      resourceType: AuditResourceType.USER,
      resourceId: user.id,
      description: 'Signed in with magic link',
      requestId: meta.requestId,
    });

    const tokens = await this.issueTokens(user, organization);
    return { ...tokens, user, organization };
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    let payload: JwtPayload;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(refreshToken, {
        secret: this.configService.get('JWT_REFRESH_SECRET', { infer: true }),
      });
    } catch {
      throw DomainError.unauthenticated('Invalid refresh token');
    }

    if (payload.type !== 'refresh') {
      throw DomainError.unauthenticated('Invalid refresh token');
    }

    const user = await this.userService.findById(payload.sub);
    if (!isUserAvailable(user)) {
      throw DomainError.unauthenticated('Account is not available');
    }
    const organization = await this.organizationService.findActiveById(user.organizationId);
    if (!organization) {
      throw DomainError.unauthenticated('Account is not available');
    }

    return this.issueTokens(user, organization);
  }

  async me(userId: string): Promise<{ user: User; organization: Organization }> {
    const user = await this.userService.getAvailable(userId);
    const organization = await this.organizationService.getOrganization(user.organizationId);
    return { user, organization };
  }

  private async issueTokens(user: User, organization: Organization): Promise<TokenPair> {
    const claims = {
      sub: user.id,
      orgId: organization.id,
      role: user.role,
      orgType: organization.type,
    };

    const access: JwtPayload = { ...claims, type: 'access' };
    const refresh: JwtPayload = { ...claims, type: 'refresh' };

    const [accessToken, refreshToken] = await Promise.all([
      this.jwtService.signAsync(access),
      this.jwtService.signAsync(refresh, {
        secret: this.configService.get('JWT_REFRESH_SECRET', { infer: true }),
        expiresIn: this.configService.get('JWT_REFRESH_EXPIRES_IN', { infer: true }),
      }),
    ]);

    return {
      accessToken,
      refreshToken,
      tokenType: 'Bearer',
      expiresIn: this.configService.get('JWT_ACCESS_EXPIRES_IN', { infer: true }),
    };
  }
}
