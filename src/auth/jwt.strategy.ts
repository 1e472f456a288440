import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { AuthUser } from '../common/types/request.types';
import { EnvironmentVariables } from '../config/env.validation';
import { OrganizationType } from '../organization/model/organization.model';
import { isUserAvailable, UserRole } from '../user/model/user.model';
import { UserService } from '../user/user.service';

export type TokenType = 'access' | 'refresh';

export interface JwtPayload {
  sub: string;
  orgId: string;
  role: UserRole;
  orgType: OrganizationType;
  type: TokenType;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    private readonly userService: UserService,
    configService: ConfigService<EnvironmentVariables, true>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('JWT_SECRET', { infer: true }),
    });
  }

  async validate(payload: JwtPayload): Promise<AuthUser> {
    if (payload?.type !== 'access' || !payload.sub) {
      throw new UnauthorizedException('Invalid access token');
    }

    const user = await this.userService.findById(payload.sub);
    if (!isUserAvailable(user) || user.organizationId !== payload.orgId) {
      throw new UnauthorizedException('Invalid access token or user not found');
    }

    return {
      userId: user.id,
      organizationId: user.organizationId,
      orgType: payload.orgType,
      role: user.role,
      email: user.email,
    };
  }
}
