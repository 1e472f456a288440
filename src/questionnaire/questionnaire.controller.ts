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
import { AuthenticatedRequest } from '../common/types/request.types';
import { OrganizationType } from '../organization/model/organization.model';
import { UserRole } from '../user/model/user.model';
import {
  CreateFromTemplateDto,
  CreateQuestionDto,
  CreateQuestionnaireDto,
  QuestionnaireQueryDto,
  UpdateQuestionDto,
  UpdateQuestionnaireDto,
} from './dto/questionnaire.dto';
import { QuestionnaireActor, QuestionnaireService } from './questionnaire.service';

const actorOf = (req: AuthenticatedRequest): QuestionnaireActor => ({
  userId: req.user.userId,
  email: req.user.email,
  requestId: req.requestId,
});

@ApiTags('Questionnaires')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard, OrgTypeGuard)
@OrgTypes(OrganizationType.COMPANY)
@Controller('questionnaires')
export class QuestionnaireController {
  constructor(private readonly questionnaireService: QuestionnaireService) {}

  @Post()
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Create a draft questionnaire' })
  @ApiResponse({ status: 201, description: 'Questionnaire created' })
  async create(@Body() dto: CreateQuestionnaireDto, @Req() req: AuthenticatedRequest) {
    const data = await this.questionnaireService.create(req.user.organizationId, actorOf(req), dto);
    return { success: true, message: 'Questionnaire created successfully', data };
  }

  @Post('from-template')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Create a draft questionnaire from a template' })
  @ApiResponse({ status: 201, description: 'Questionnaire created' })
  @ApiResponse({ status: 404, description: 'Template not found' })
  async createFromTemplate(@Body() dto: CreateFromTemplateDto, @Req() req: AuthenticatedRequest) {
    const data = await this.questionnaireService.createFromTemplate(req.user.organizationId, actorOf(req), dto);
    return { success: true, message: 'Questionnaire created successfully', data };
  }

  @Get()
  @ApiOperation({ summary: 'List questionnaires' })
  async list(@Query() query: QuestionnaireQueryDto, @Req() req: AuthenticatedRequest) {
    const { status, ...pagination } = query;
    const data = await this.questionnaireService.list(req.user.organizationId, { status }, pagination);
    return { success: true, message: 'Questionnaires retrieved successfully', data };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a questionnaire with its questions' })
  async get(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.questionnaireService.getWithQuestions(id, req.user.organizationId);
    return { success: true, message: 'Questionnaire retrieved successfully', data };
  }

  @Patch(':id')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update a draft questionnaire' })
  @ApiResponse({ status: 409, description: 'Questionnaire is no longer a draft' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateQuestionnaireDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.questionnaireService.update(id, req.user.organizationId, dto);
    return { success: true, message: 'Questionnaire updated successfully', data };
  }

  @Delete(':id')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a draft questionnaire' })
  async remove(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    await this.questionnaireService.remove(id, req.user.organizationId, actorOf(req));
  }

  @Post(':id/publish')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Publish a draft so it can be assigned' })
  async publish(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.questionnaireService.publish(id, req.user.organizationId, actorOf(req));
    return { success: true, message: 'Questionnaire published successfully', data };
  }

  @Post(':id/archive')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Archive a published questionnaire' })
  async archive(@Param('id', ParseUUIDPipe) id: string, @Req() req: AuthenticatedRequest) {
    const data = await this.questionnaireService.archive(id, req.user.organizationId, actorOf(req));
    return { success: true, message: 'Questionnaire archived successfully', data };
  }

  @Post(':id/questions')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Add a question to a draft questionnaire' })
  async addQuestion(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CreateQuestionDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.questionnaireService.addQuestion(id, req.user.organizationId, dto);
    return { success: true, message: 'Question added successfully', data };
  }

  @Patch(':id/questions/:questionId')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update a question of a draft questionnaire' })
  async updateQuestion(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('questionId', ParseUUIDPipe) questionId: string,
    @Body() dto: UpdateQuestionDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const data = await this.questionnaireService.updateQuestion(id, questionId, req.user.organizationId, dto);
    return { success: true, message: 'Question updated successfully', data };
  }

  @Delete(':id/questions/:questionId')
  @Roles(UserRole.ADMIN)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Remove a question from a draft questionnaire' })
  async removeQuestion(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('questionId', ParseUUIDPipe) questionId: string,
    @Req() req: AuthenticatedRequest,
  ) {
    await this.questionnaireService.removeQuestion(id, questionId, req.user.organizationId);
  }
}
