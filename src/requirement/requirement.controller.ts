import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, Query, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { OrgTypes, Roles } from '../auth/roles.decorator';
import { OrgTypeGuard, RolesGuard } from '../auth/roles.guard';
import { AuthenticatedRequest } from '../common/types/request.types';
import { OrganizationType } from '../organization/model/organization.model';
import { UserRole } from '../user/model/user.model';
import { CreateRequirementDto, RequirementQueryDto, UpdateRequirementDto } from './dto/requirement.dto';
import { RequirementService } from './requirement.service';
import { toRequirementView } from './utils/requirement-rules.util';

@ApiTags('Requirements')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.COMPANY)
@Controller('requirements')
export class RequirementController {
  constructor(private readonly requirementService: RequirementService) {}

  @Post()
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Assign a requirement to an active supplier' })
  @ApiResponse({ status: 201, description: 'Requirement assigned' })
  @ApiResponse({ status: 409, description: 'Relationship cannot receive requirements' })
  async create(@Body() dto: CreateRequirementDto, @Req() req: AuthenticatedRequest) {
    const requirement = await this.requirementService.create(
      req.user.organizationId,
      { userId: req.user.userId, email: req.user.email, requestId: req.requestId },
      dto,
    );
    return { success: true, message: 'Requirement created successfully', data: toRequirementView(requirement) };
  }

  @Get()
  @ApiOperation({ summary: 'List requirements assigned by the current company' })
  async list(@Query() query: RequirementQueryDto, @Req() req: AuthenticatedRequest) {
    const { status, type, priority, relationshipId, overdue, ...pagination } = query;
    const data = await this.requirementService.listForCompany(
      req.user.organizationId,
      { status, type, priority, relationshipId, overdue },
      pagination,
    );
    return { success: true, message: 'Requirements retrieved successfully', data };
  }

  @Get('stats')
  @ApiOperation({ summary: 'Requirement counts by status, plus overdue' })
  async stats(@Req() req: AuthenticatedRequest) {
    const data = await this.requirementService.getStats(req.user.organizationId);
    return { success: true, message: 'Requirement stats retrieved successfully', data };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a requirement' })
  @ApiResponse({ status: 404, description: 'Requirement not found' })
  async get(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const requirement = await this.requirementService.get(id, req.user.organizationId);
    return { success: true, message: 'Requirement retrieved successfully', data: toRequirementView(requirement) };
  }

  @Patch(':id')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Edit a requirement that has not been started' })
  @ApiResponse({ status: 409, description: 'Requirement is no longer pending' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateRequirementDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const requirement = await this.requirementService.update(id, req.user.organizationId, dto);
    return { success: true, message: 'Requirement updated successfully', data: toRequirementView(requirement) };
  }
}
