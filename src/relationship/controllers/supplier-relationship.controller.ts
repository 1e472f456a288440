import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/jwt-auth.guard';
import { OrgTypes, Roles } from '../../auth/roles.decorator';
import { OrgTypeGuard, RolesGuard } from '../../auth/roles.guard';
import { AuthenticatedRequest, requestMeta } from '../../common/types/request.types';
import { OrganizationType } from '../../organization/model/organization.model';
import { UserRole } from '../../user/model/user.model';
import {
  InviteSupplierDto,
  RelationshipQueryDto,
  RelationshipStatusChangeDto,
  UpdateClassificationDto,
  UpdateRelationshipDto,
} from '../dto/relationship.dto';
import { RelationshipActor, RelationshipService } from '../relationship.service';

const actorOf = (req: AuthenticatedRequest): RelationshipActor => ({
  userId: req.user.userId,
  email: req.user.email,
  requestId: req.requestId,
});

@ApiTags('Suppliers')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.COMPANY)
@Controller('suppliers')
export class SupplierRelationshipController {
  constructor(private readonly relationshipService: RelationshipService) {}

  @Post('invite')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Invite a supplier by email' })
  @ApiResponse({ status: 201, description: 'Invitation created and sent' })
  @ApiResponse({ status: 409, description: 'A relationship with this email already exists' })
  async invite(@Body() dto: InviteSupplierDto, @Req() req: AuthenticatedRequest) {
    const data = await this.relationshipService.invite(req.user.organizationId, actorOf(req), dto, requestMeta(req));
    return { success: true, message: 'Invitation sent successfully', data };
  }

  @Get()
  @ApiOperation({ summary: 'List suppliers of the current company' })
  async list(@Query() query: RelationshipQueryDto, @Req() req: AuthenticatedRequest) {
    const { status, classification, search, ...pagination } = query;
    const data = await this.relationshipService.listForCompany(
      req.user.organizationId,
      { status, classification, search },
      pagination,
    );
    return { success: true, message: 'Suppliers retrieved successfully', data };
  }

  @Get('stats')
  @ApiOperation({ summary: 'Supplier counts by status and classification' })
  async stats(@Req() req: AuthenticatedRequest) {
    const data = await this.relationshipService.getStats(req.user.organizationId);
    return { success: true, message: 'Supplier stats retrieved successfully', data };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a supplier relationship' })
  @ApiResponse({ status: 404, description: 'Relationship not found' })
  async get(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.relationshipService.get(id, req.user.organizationId);
    return { success: true, message: 'Supplier retrieved successfully', data };
  }

  @Patch(':id')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update notes, services or contract reference' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateRelationshipDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.relationshipService.updateDetails(id, req.user.organizationId, dto);
    return { success: true, message: 'Supplier updated successfully', data };
  }

  @Patch(':id/classification')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Change the supplier classification' })
  async classify(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateClassificationDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.relationshipService.updateClassification(id, req.user.organizationId, dto.classification);
    return { success: true, message: 'Classification updated successfully', data };
  }

  @Post(':id/suspend')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Suspend an active supplier' })
  @ApiResponse({ status: 409, description: 'Transition not allowed from the current status' })
  async suspend(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RelationshipStatusChangeDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.relationshipService.suspend(id, req.user.organizationId, actorOf(req), dto.reason);
    return { success: true, message: 'Supplier suspended successfully', data };
  }

  @Post(':id/reactivate')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reactivate a suspended supplier' })
  async reactivate(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RelationshipStatusChangeDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.relationshipService.reactivate(id, req.user.organizationId, actorOf(req), dto.reason);
    return { success: true, message: 'Supplier reactivated successfully', data };
  }

  @Post(':id/terminate')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'End the relationship permanently' })
  async terminate(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RelationshipStatusChangeDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.relationshipService.terminate(id, req.user.organizationId, actorOf(req), dto.reason);
    return { success: true, message: 'Relationship terminated successfully', data };
  }
}
