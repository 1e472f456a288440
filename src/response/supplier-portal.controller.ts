import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { OrgTypes } from '../auth/roles.decorator';
import { OrgTypeGuard, RolesGuard } from '../auth/roles.guard';
import { AuthenticatedRequest } from '../common/types/request.types';
import { OrganizationType } from '../organization/model/organization.model';
import { SupplierRequirementQueryDto } from '../requirement/dto/requirement.dto';
import { RequirementService } from '../requirement/requirement.service';
import { toRequirementView } from '../requirement/utils/requirement-rules.util';
import { SaveDraftDto, SubmitDocumentDto, SubmitQuestionnaireDto } from './dto/response.dto';
import { ResponseActor, ResponseService } from './response.service';

const actorOf = (req: AuthenticatedRequest): ResponseActor => ({
  userId: req.user.userId,
  email: req.user.email,
  requestId: req.requestId,
});

@ApiTags('Supplier Portal')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.SUPPLIER)
@Controller('supplier')
export class SupplierPortalController {
  constructor(
    private readonly requirementService: RequirementService,
    private readonly responseService: ResponseService,
  ) {}

  @Get('requirements')
  @ApiOperation({ summary: 'Requirements assigned to the current supplier' })
  async listRequirements(@Query() query: SupplierRequirementQueryDto, @Req() req: AuthenticatedRequest) {
    const { status, companyId, ...pagination } = query;
    const data = await this.requirementService.listForSupplier(
      req.user.organizationId,
      { status, companyId },
      pagination,
    );
    return { success: true, message: 'Requirements retrieved successfully', data };
  }

  @Get('requirements/:id')
  @ApiOperation({ summary: 'Requirement with its latest response and questions' })
  @ApiResponse({ status: 404, description: 'Requirement not found' })
  async getRequirement(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.responseService.getRequirementDetail(id, req.user.organizationId);
    return { success: true, message: 'Requirement retrieved successfully', data };
  }

  @Post('requirements/:id/start')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Start (or resume) a response' })
  @ApiResponse({ status: 409, description: 'Requirement cannot be started' })
  async startResponse(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.responseService.startResponse(id, req.user.organizationId, actorOf(req));
    return { success: true, message: 'Response started successfully', data };
  }

  @Get('responses/:id')
  @ApiOperation({ summary: 'Get a response' })
  async getResponse(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.responseService.getResponse(id, req.user.organizationId);
    return { success: true, message: 'Response retrieved successfully', data };
  }

  @Put('responses/:id/draft')
  @ApiOperation({ summary: 'Save draft answers' })
  @ApiResponse({ status: 409, description: 'Response already submitted' })
  async saveDraft(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SaveDraftDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.responseService.saveDraft(id, req.user.organizationId, dto.answers);
    return { success: true, message: 'Draft saved successfully', data };
  }

  @Post('responses/:id/submit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Submit a questionnaire response for scoring' })
  @ApiResponse({ status: 409, description: 'Response already submitted' })
  async submitQuestionnaire(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SubmitQuestionnaireDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const result = await this.responseService.submitQuestionnaire(
      id,
      req.user.organizationId,
      actorOf(req),
      dto.answers,
    );
    return {
      success: true,
      message: 'Response submitted successfully',
      data: { ...result, requirement: toRequirementView(result.requirement) },
    };
  }

  @Post('responses/:id/submit-document')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Submit document evidence' })
  @ApiResponse({ status: 400, description: 'Grade or report age outside the requirement limits' })
  async submitDocument(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SubmitDocumentDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const result = await this.responseService.submitDocument(id, req.user.organizationId, actorOf(req), dto);
    return {
      success: true,
      message: 'Document submitted successfully',
      data: { ...result, requirement: toRequirementView(result.requirement) },
    };
  }
}
