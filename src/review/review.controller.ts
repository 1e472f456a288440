import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { OrgTypes, Roles } from '../auth/roles.decorator';
import { OrgTypeGuard, RolesGuard } from '../auth/roles.guard';
import { AuthenticatedRequest } from '../common/types/request.types';
import { OrganizationType } from '../organization/model/organization.model';
import { toRequirementView } from '../requirement/utils/requirement-rules.util';
import { UserRole } from '../user/model/user.model';
import { ApproveRequirementDto, RejectRequirementDto, RequestRevisionDto } from './dto/review.dto';
import { ReviewActor, ReviewResult, ReviewService } from './review.service';

const actorOf = (req: AuthenticatedRequest): ReviewActor => ({
  userId: req.user.userId,
  email: req.user.email,
  requestId: req.requestId,
});

const toResult = (result: ReviewResult) => ({ ...result, requirement: toRequirementView(result.requirement) });

@ApiTags('Review')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.COMPANY)
@Controller('requirements')
export class ReviewController {
  constructor(private readonly reviewService: ReviewService) {}

  @Get(':id/review')
  @ApiOperation({ summary: 'Latest submitted response and its scored submission' })
  @ApiResponse({ status: 404, description: 'Requirement not found' })
  async getForReview(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.reviewService.getSubmissionForReview(id, req.user.organizationId);
    return { success: true, message: 'Submission retrieved successfully', data };
  }

  @Post(':id/approve')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Approve a submitted requirement' })
  @ApiResponse({ status: 409, description: 'Requirement is not awaiting review' })
  async approve(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ApproveRequirementDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const result = await this.reviewService.approve(id, req.user.organizationId, actorOf(req), dto);
    return { success: true, message: 'Requirement approved successfully', data: toResult(result) };
  }

  @Post(':id/reject')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reject a submitted requirement' })
  @ApiResponse({ status: 409, description: 'Requirement is not awaiting review' })
  async reject(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RejectRequirementDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const result = await this.reviewService.reject(id, req.user.organizationId, actorOf(req), dto);
    return { success: true, message: 'Requirement rejected successfully', data: toResult(result) };
  }

  @Post(':id/request-revision')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a submitted requirement back to the supplier' })
  @ApiResponse({ status: 409, description: 'Requirement is not awaiting review' })
  async requestRevision(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RequestRevisionDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const result = await this.reviewService.requestRevision(id, req.user.organizationId, actorOf(req), dto);
    return { success: true, message: 'Revision requested successfully', data: toResult(result) };
  }
}
