import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/jwt-auth.guard';
import { OrgTypes, Roles } from '../../auth/roles.decorator';
import { OrgTypeGuard, RolesGuard } from '../../auth/roles.guard';
import { AuthenticatedRequest } from '../../common/types/request.types';
import { OrganizationType } from '../../organization/model/organization.model';
import { UserRole } from '../../user/model/user.model';
import { AcceptInvitationDto } from '../dto/relationship.dto';
import { RelationshipService } from '../relationship.service';

@ApiTags('Supplier Portal')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.SUPPLIER)
@Controller('supplier')
export class SupplierInvitationController {
  constructor(private readonly relationshipService: RelationshipService) {}

  @Get('invitations')
  @ApiOperation({ summary: 'Pending invitations addressed to the current user' })
  async listInvitations(@Req() req: AuthenticatedRequest) {
    const data = await this.relationshipService.listPendingInvitations(req.user.email);
    return { success: true, message: 'Invitations retrieved successfully', data };
  }

  @Post('invitations/:id/accept')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Accept an invitation on behalf of the current organization' })
  @ApiResponse({ status: 404, description: 'No invitation for this user and token' })
  @ApiResponse({ status: 409, description: 'Invitation is no longer pending or the token was used' })
  @ApiResponse({ status: 410, description: 'Invitation link has expired' })
  async acceptInvitation(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AcceptInvitationDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.relationshipService.accept(
      id,
      req.user.organizationId,
      { userId: req.user.userId, email: req.user.email },
      dto.token,
    );
    return { success: true, message: 'Invitation accepted successfully', data };
  }

  @Get('companies')
  @ApiOperation({ summary: 'Companies the current supplier works with' })
  async listCompanies(@Req() req: AuthenticatedRequest) {
    const data = await this.relationshipService.listCompaniesForSupplier(req.user.organizationId);
    return { success: true, message: 'Companies retrieved successfully', data };
  }
}
