import { Body, Controller, Get, Patch, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { AuthenticatedRequest } from '../common/types/request.types';
import { UserRole } from '../user/model/user.model';
import { UserService } from '../user/user.service';
import { UpdateOrganizationDto, UpdateOrganizationSettingsDto } from './dto/organization.dto';
import { OrganizationService } from './organization.service';

@ApiTags('Organization')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Controller('organization')
export class OrganizationController {
  constructor(
    private readonly organizationService: OrganizationService,
    private readonly userService: UserService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Get the current organization' })
  @ApiResponse({ status: 200, description: 'Organization details' })
  async get(@Req() req: AuthenticatedRequest) {
    const data = await this.organizationService.getOrganization(req.user.organizationId);
    return { success: true, message: 'Organization retrieved successfully', data };
  }

  @Patch()
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update the current organization' })
  @ApiResponse({ status: 200, description: 'Organization updated' })
  async update(@Body() dto: UpdateOrganizationDto, @Req() req: AuthenticatedRequest) {
    const data = await this.organizationService.updateOrganization(req.user.organizationId, dto);
    return { success: true, message: 'Organization updated successfully', data };
  }

  @Get('settings')
  @ApiOperation({ summary: 'Get organization settings' })
  async getSettings(@Req() req: AuthenticatedRequest) {
    const data = await this.organizationService.getSettings(req.user.organizationId);
    return { success: true, message: 'Settings retrieved successfully', data };
  }

  @Patch('settings')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update organization settings' })
  @ApiResponse({ status: 200, description: 'Settings updated' })
  async updateSettings(@Body() dto: UpdateOrganizationSettingsDto, @Req() req: AuthenticatedRequest) {
    const data = await this.organizationService.updateSettings(req.user.organizationId, dto);
    return { success: true, message: 'Settings updated successfully', data };
  }

  @Get('users')
  @ApiOperation({ summary: 'List users of the current organization' })
  async listUsers(@Req() req: AuthenticatedRequest) {
    const data = await this.userService.listForOrganization(req.user.organizationId);
    return { success: true, message: 'Users retrieved successfully', data };
  }
}
