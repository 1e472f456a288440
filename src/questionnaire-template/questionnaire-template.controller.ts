import {
  Body,
  Controller,
  Delete,
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
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { OrgTypes, Roles } from '../auth/roles.decorator';
import { OrgTypeGuard, RolesGuard } from '../auth/roles.guard';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { AuthenticatedRequest } from '../common/types/request.types';
import { OrganizationType } from '../organization/model/organization.model';
import { UserRole } from '../user/model/user.model';
import {
  CreateQuestionnaireTemplateDto,
  ImportQuestionnaireTemplateDto,
  PublishQuestionnaireTemplateDto,
  SystemTemplateQueryDto,
  TemplateQueryDto,
  UpdateQuestionnaireTemplateDto,
} from './dto/questionnaire-template.dto';
import { QuestionnaireTemplateService, TemplateActor } from './questionnaire-template.service';

const actorOf = (req: AuthenticatedRequest): TemplateActor => ({
  userId: req.user.userId,
  email: req.user.email,
  requestId: req.requestId,
});

@ApiTags('Questionnaire Templates')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.COMPANY)
@Controller('templates')
export class QuestionnaireTemplateController {
  constructor(private readonly templateService: QuestionnaireTemplateService) {}

  @Get()
  @ApiOperation({ summary: 'List the built-in system templates' })
  async listSystem(@Query() query: SystemTemplateQueryDto) {
    const data = await this.templateService.listSystem(query.category);
    return { success: true, message: 'Templates retrieved successfully', data };
  }

  @Get('available')
  @ApiOperation({ summary: 'List system, global and own templates' })
  async listAvailable(@Query() query: TemplateQueryDto, @Req() req: AuthenticatedRequest) {
    const { category, search, ...pagination } = query;
    const data = await this.templateService.listAvailable(req.user.organizationId, { category, search }, pagination);
    return { success: true, message: 'Templates retrieved successfully', data };
  }

  @Get('organization')
  @ApiOperation({ summary: "List the organization's own templates" })
  async listOwn(@Query() query: PaginationQueryDto, @Req() req: AuthenticatedRequest) {
    const data = await this.templateService.listForOrganization(req.user.organizationId, query);
    return { success: true, message: 'Templates retrieved successfully', data };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a template' })
  async get(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.templateService.get(id, req.user.organizationId);
    return { success: true, message: 'Template retrieved successfully', data };
  }

  @Post()
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Create a draft template' })
  @ApiResponse({ status: 201, description: 'Template created' })
  async create(@Body() dto: CreateQuestionnaireTemplateDto, @Req() req: AuthenticatedRequest) {
    const data = await this.templateService.create(req.user.organizationId, actorOf(req), dto);
    return { success: true, message: 'Template created successfully', data };
  }

  @Post('import')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Create a draft template from a JSON definition' })
  @ApiResponse({ status: 400, description: 'Definition is malformed or incomplete' })
  async import(@Body() dto: ImportQuestionnaireTemplateDto, @Req() req: AuthenticatedRequest) {
    const data = await this.templateService.import(req.user.organizationId, actorOf(req), dto.content);
    return { success: true, message: 'Template imported successfully', data };
  }

  @Patch(':id')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update a draft template' })
  @ApiResponse({ status: 409, description: 'Template is no longer a draft' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateQuestionnaireTemplateDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.templateService.update(id, req.user.organizationId, dto);
    return { success: true, message: 'Template updated successfully', data };
  }

  @Delete(':id')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an unused template' })
  async remove(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    await this.templateService.remove(id, req.user.organizationId, actorOf(req));
  }

  @Post(':id/publish')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Publish a draft template locally or globally' })
  async publish(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: PublishQuestionnaireTemplateDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.templateService.publish(id, req.user.organizationId, actorOf(req), dto.visibility);
    return { success: true, message: 'Template published successfully', data };
  }

  @Post(':id/unpublish')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Return an unused template to draft' })
  async unpublish(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.templateService.unpublish(id, req.user.organizationId, actorOf(req));
    return { success: true, message: 'Template unpublished successfully', data };
  }
}
