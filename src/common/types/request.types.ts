import { Request } from 'express';
import { OrganizationType } from '../../organization/model/organization.model';
import { UserRole } from '../../user/model/user.model';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface AuthUser {
  userId: string;
  organizationId: string;
  orgType: OrganizationType;
  role: UserRole;
  email: string;
}

export interface AppRequest extends Request {
  requestId?: string;
}

export interface AuthenticatedRequest extends AppRequest {
  user: AuthUser;
}

/** Caller metadata recorded on magic links and audit entries. */
export interface RequestMeta {
  ipAddress?: string;
  userAgent?: string;
  requestId?: string;
}

export const requestMeta = (req: AppRequest): RequestMeta => ({
  ipAddress: req.ip,
  userAgent: req.get('user-agent'),
  requestId: req.requestId,
});
