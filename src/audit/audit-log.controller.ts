import { Controller, Get, Query, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { AuthenticatedRequest } from '../common/types/request.types';
import { UserRole } from '../user/model/user.model';
import { AuditLogService } from './audit-log.service';
import { AuditLogQueryDto } from './dto/audit-log-query.dto';

@ApiTags('Audit Logs')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(UserRole.ADMIN)
@Controller('audit-logs')
export class AuditLogController {
  constructor(private readonly auditLogService: AuditLogService) {}

  @Get()
  @ApiOperation({ summary: 'List audit entries for the current organization' })
  @ApiResponse({ status: 200, description: 'Paginated audit entries' })
  async list(@Query() query: AuditLogQueryDto, @Req() req: AuthenticatedRequest) {
    const { resourceType, resourceId, ...pagination } = query;
    const data = await this.auditLogService.listForOrganization(
      req.user.organizationId,
      { resourceType, resourceId },
      pagination,
    );

    return {
      success: true,
      message: 'Audit entries retrieved successfully',
      data,
    };
  }
}
