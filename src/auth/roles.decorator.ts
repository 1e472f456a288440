import { SetMetadata } from '@nestjs/common';
import { OrganizationType } from '../organization/model/organization.model';
import { UserRole } from '../user/model/user.model';

export const ROLES_KEY = 'roles';
export const ORG_TYPES_KEY = 'orgTypes';

export const Roles = (...roles: UserRole[]) => SetMetadata(ROLES_KEY, roles);

export const OrgTypes = (...types: OrganizationType[]) => SetMetadata(ORG_TYPES_KEY, types);
