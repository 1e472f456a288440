import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthUser } from '../common/types/request.types';
import { OrganizationType } from '../organization/model/organization.model';
import { UserRole } from '../user/model/user.model';
import { ORG_TYPES_KEY, ROLES_KEY } from './roles.decorator';

const requestUser = (context: ExecutionContext): AuthUser | undefined =>
  context.switchToHttp().getRequest<{ user?: AuthUser }>().user;

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<UserRole[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    const user = requestUser(context);
    if (!user) throw new ForbiddenException('No user data in request');

    // If no specific roles required, allow access
    if (!requiredRoles || requiredRoles.length === 0) return true;

    if (!requiredRoles.includes(user.role)) {
      throw new ForbiddenException('Access denied: Insufficient permissions');
    }

    return true;
  }
}

/** Separates the company API from the supplier portal. */
@Injectable()
export class OrgTypeGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const allowed = this.reflector.getAllAndOverride<OrganizationType[] | undefined>(ORG_TYPES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    const user = requestUser(context);
    if (!user) throw new ForbiddenException('No user data in request');

    if (!allowed || allowed.length === 0) return true;

    if (!allowed.includes(user.orgType)) {
      throw new ForbiddenException(`This endpoint is only available to ${allowed.join(' or ')} organizations`);
    }

    return true;
  }
}
