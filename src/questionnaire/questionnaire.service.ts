import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { v4 as uuidv4 } from 'uuid';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError } from '../common/errors/domain.error';
import { PaginatedResult, PaginationOptions, resolvePagination, toPage } from '../common/utils/pagination.util';
import { QuestionnaireTemplateService } from '../questionnaire-template/questionnaire-template.service';
import {
  CreateFromTemplateDto,
  CreateQuestionDto,
  CreateQuestionnaireDto,
  QuestionOptionDto,
  TopicDto,
  UpdateQuestionDto,
  UpdateQuestionnaireDto,
} from './dto/questionnaire.dto';
import { Question, QuestionAttributes, QuestionOption, QuestionType } from './model/question.model';
import {
  DEFAULT_PASSING_SCORE,
  Questionnaire,
  QuestionnaireAttributes,
  QuestionnaireStatus,
  QuestionnaireTopic,
  ScoringMode,
} from './model/questionnaire.model';
import { maxPossibleScore, optionsProblem } from './utils/question-points.util';

export interface QuestionnaireActor {
  userId: string;
  email?: string;
  requestId?: string;
}

export interface QuestionnaireDetail {
  questionnaire: Questionnaire;
  questions: Question[];
}

const QUESTION_ORDER: [string, 'ASC' | 'DESC'][] = [
  ['order', 'ASC'],
  ['createdAt', 'ASC'],
];

const toTopics = (topics: TopicDto[]): QuestionnaireTopic[] =>
  topics.map((topic, index) => ({
    id: topic.id ?? uuidv4(),
    name: topic.name.trim(),
    description: topic.description ?? null,
    order: index,
  }));

const toOptions = (type: QuestionType, options: QuestionOptionDto[] | undefined): QuestionOption[] => {
  if (type === QuestionType.TEXT) return [];
  return (options ?? []).map((option) => ({
    id: option.id ?? uuidv4(),
    text: option.text.trim(),
    points: option.points,
    isCorrect: option.isCorrect ?? false,
  }));
};

@Injectable()
export class QuestionnaireService {
  private readonly logger = new Logger(QuestionnaireService.name);

  constructor(
    @InjectModel(Questionnaire)
    private readonly questionnaireModel: typeof Questionnaire,
    @InjectModel(Question)
    private readonly questionModel: typeof Question,
    private readonly auditLogService: AuditLogService,
    private readonly templateService: QuestionnaireTemplateService,
  ) {}

  async create(companyId: string, actor: QuestionnaireActor, dto: CreateQuestionnaireDto): Promise<Questionnaire> {
    const questionnaire = await this.questionnaireModel.create({
      companyId,
      name: dto.name.trim(),
      description: dto.description ?? null,
      status: QuestionnaireStatus.DRAFT,
      scoringMode: dto.scoringMode ?? ScoringMode.PERCENTAGE,
      passingScore: dto.passingScore ?? DEFAULT_PASSING_SCORE,
      topics: toTopics(dto.topics ?? []),
      questionCount: 0,
      maxPossibleScore: 0,
      templateId: null,
      createdById: actor.userId,
      publishedAt: null,
    });

    await this.audit(questionnaire, AuditAction.CREATE, actor);
    return questionnaire;
  }

  /** Starts a draft with the topics and passing score of a template the company can see. */
  async createFromTemplate(
    companyId: string,
    actor: QuestionnaireActor,
    dto: CreateFromTemplateDto,
  ): Promise<Questionnaire> {
    const template = await this.templateService.get(dto.templateId, companyId);

    const questionnaire = await this.questionnaireModel.create({
      companyId,
      name: dto.name?.trim() ?? template.name,
      description: dto.description ?? template.description,
      status: QuestionnaireStatus.DRAFT,
      scoringMode: ScoringMode.PERCENTAGE,
      passingScore: template.defaultPassingScore,
      topics: template.topics.map((topic, index) => ({ ...topic, order: index })),
      questionCount: 0,
      maxPossibleScore: 0,
      templateId: template.id,
      createdById: actor.userId,
      publishedAt: null,
    });

    await this.templateService.recordUsage(template.id);
    await this.audit(questionnaire, AuditAction.CREATE, actor);
    this.logger.log(`Questionnaire ${questionnaire.id} created from template ${template.id}`);
    return questionnaire;
  }

  async list(
    companyId: string,
    filters: { status?: QuestionnaireStatus } = {},
    pagination: PaginationOptions = {},
  ): Promise<PaginatedResult<Questionnaire>> {
    const page = resolvePagination(pagination, ['createdAt', 'name', 'publishedAt']);
    const { rows, count } = await this.questionnaireModel.findAndCountAll({
      where: { companyId, ...(filters.status ? { status: filters.status } : {}) },
      order: page.order,
      limit: page.limit,
      offset: page.offset,
    });
    return toPage(rows, count, page);
  }

  async get(id: string, companyId: string): Promise<Questionnaire> {
    const questionnaire = await this.questionnaireModel.findByPk(id);
    if (!questionnaire || questionnaire.companyId !== companyId) {
      throw DomainError.notFound('questionnaire');
    }
    return questionnaire;
  }

  async getWithQuestions(id: string, companyId: string): Promise<QuestionnaireDetail> {
    const questionnaire = await this.get(id, companyId);
    const questions = await this.listQuestions(id);
    return { questionnaire, questions };
  }

  /** A questionnaire that may be attached to a new requirement. */
  async getPublished(id: string, companyId: string): Promise<Questionnaire> {
    const questionnaire = await this.get(id, companyId);
    if (questionnaire.status !== QuestionnaireStatus.PUBLISHED) {
      throw DomainError.validation('questionnaire must be published', 'questionnaire_not_published');
    }
    return questionnaire;
  }

  /** Used for scoring, so no ownership check: the caller already holds the requirement. */
  async findById(id: string): Promise<Questionnaire | null> {
    return this.questionnaireModel.findByPk(id);
  }

  async listQuestions(questionnaireId: string): Promise<Question[]> {
    return this.questionModel.findAll({ where: { questionnaireId }, order: QUESTION_ORDER });
  }

  async update(id: string, companyId: string, dto: UpdateQuestionnaireDto): Promise<Questionnaire> {
    const questionnaire = await this.getDraft(id, companyId);

    const changes: Partial<
      Pick<QuestionnaireAttributes, 'name' | 'description' | 'scoringMode' | 'passingScore' | 'topics'>
    > = {};
    if (dto.name !== undefined) changes.name = dto.name.trim();
    if (dto.description !== undefined) changes.description = dto.description;
    if (dto.scoringMode !== undefined) changes.scoringMode = dto.scoringMode;
    if (dto.passingScore !== undefined) changes.passingScore = dto.passingScore;
    if (dto.topics !== undefined) {
      changes.topics = toTopics(dto.topics);
      await this.assertNoOrphanedQuestions(questionnaire.id, changes.topics);
    }

    if (Object.keys(changes).length > 0) {
      await this.writeDraft(id, changes);
    }
    return this.get(id, companyId);
  }

  async remove(id: string, companyId: string, actor: QuestionnaireActor): Promise<void> {
    const questionnaire = await this.getDraft(id, companyId);

    const removed = await this.questionnaireModel.destroy({ where: { id, status: QuestionnaireStatus.DRAFT } });
    if (removed === 0) {
      throw this.notEditable();
    }
    await this.questionModel.destroy({ where: { questionnaireId: id } });
    await this.audit(questionnaire, AuditAction.DELETE, actor);
  }

  async publish(id: string, companyId: string, actor: QuestionnaireActor): Promise<Questionnaire> {
    const questionnaire = await this.get(id, companyId);
    if (questionnaire.status !== QuestionnaireStatus.DRAFT) {
      throw DomainError.invalidTransition('cannot publish this questionnaire');
    }

    const questions = await this.listQuestions(id);
    if (questions.length === 0) {
      throw DomainError.validation('a questionnaire needs at least one question before publishing');
    }

    const [affected] = await this.questionnaireModel.update(
      {
        status: QuestionnaireStatus.PUBLISHED,
        publishedAt: new Date(),
        questionCount: questions.length,
        maxPossibleScore: maxPossibleScore(questions),
      },
      { where: { id, status: QuestionnaireStatus.DRAFT } },
    );
    if (affected === 0) {
      throw DomainError.invalidTransition('cannot publish this questionnaire');
    }

    const published = await this.get(id, companyId);
    await this.audit(published, AuditAction.PUBLISH, actor);
    this.logger.log(`Questionnaire ${id} published with ${questions.length} question(s)`);
    return published;
  }

  async archive(id: string, companyId: string, actor: QuestionnaireActor): Promise<Questionnaire> {
    const questionnaire = await this.get(id, companyId);
    if (questionnaire.status !== QuestionnaireStatus.PUBLISHED) {
      throw DomainError.invalidTransition('cannot archive this questionnaire');
    }

    const [affected] = await this.questionnaireModel.update(
      { status: QuestionnaireStatus.ARCHIVED },
      { where: { id, status: QuestionnaireStatus.PUBLISHED } },
    );
    if (affected === 0) {
      throw DomainError.invalidTransition('cannot archive this questionnaire');
    }

    const archived = await this.get(id, companyId);
    await this.audit(archived, AuditAction.ARCHIVE, actor);
    return archived;
  }

  // ─── questions ────────────────────────────────────────────────────────────

  async addQuestion(questionnaireId: string, companyId: string, dto: CreateQuestionDto): Promise<Question> {
    const questionnaire = await this.getDraft(questionnaireId, companyId);
    const options = toOptions(dto.type, dto.options);
    this.assertValidQuestion(questionnaire, dto.type, options, dto.topicId);

    const order = dto.order ?? (await this.questionModel.count({ where: { questionnaireId } }));
    const question = await this.questionModel.create({
      questionnaireId,
      topicId: dto.topicId ?? null,
      text: dto.text.trim(),
      description: dto.description ?? null,
      type: dto.type,
      options,
      isMustPass: dto.isMustPass ?? false,
      order,
    });

    await this.refreshTotals(questionnaireId);
    return question;
  }

  async updateQuestion(
    questionnaireId: string,
    questionId: string,
    companyId: string,
    dto: UpdateQuestionDto,
  ): Promise<Question> {
    const questionnaire = await this.getDraft(questionnaireId, companyId);
    const question = await this.getQuestion(questionnaireId, questionId);

    const type = dto.type ?? question.type;
    const options =
      dto.options !== undefined || type !== question.type ? toOptions(type, dto.options) : question.options;
    const topicId = dto.topicId !== undefined ? dto.topicId : question.topicId;
    this.assertValidQuestion(questionnaire, type, options, topicId ?? undefined);

    const changes: Partial<QuestionAttributes> = { type, options, topicId };
    if (dto.text !== undefined) changes.text = dto.text.trim();
    if (dto.description !== undefined) changes.description = dto.description;
    if (dto.isMustPass !== undefined) changes.isMustPass = dto.isMustPass;
    if (dto.order !== undefined) changes.order = dto.order;

    await this.questionModel.update(changes, { where: { id: questionId, questionnaireId } });
    await this.refreshTotals(questionnaireId);
    return this.getQuestion(questionnaireId, questionId);
  }

  async removeQuestion(questionnaireId: string, questionId: string, companyId: string): Promise<void> {
    await this.getDraft(questionnaireId, companyId);
    await this.getQuestion(questionnaireId, questionId);

    await this.questionModel.destroy({ where: { id: questionId, questionnaireId } });
    await this.refreshTotals(questionnaireId);
  }

  private async getQuestion(questionnaireId: string, questionId: string): Promise<Question> {
    const question = await this.questionModel.findByPk(questionId);
    if (!question || question.questionnaireId !== questionnaireId) {
      throw DomainError.notFound('question');
    }
    return question;
  }

  private async getDraft(id: string, companyId: string): Promise<Questionnaire> {
    const questionnaire = await this.get(id, companyId);
    if (questionnaire.status !== QuestionnaireStatus.DRAFT) {
      throw this.notEditable();
    }
    return questionnaire;
  }

  private async writeDraft(id: string, changes: Partial<QuestionnaireAttributes>): Promise<void> {
    const [affected] = await this.questionnaireModel.update(changes, {
      where: { id, status: QuestionnaireStatus.DRAFT },
    });
    if (affected === 0) {
      throw this.notEditable();
    }
  }

  private async refreshTotals(questionnaireId: string): Promise<void> {
    const questions = await this.listQuestions(questionnaireId);
    await this.writeDraft(questionnaireId, {
      questionCount: questions.length,
      maxPossibleScore: maxPossibleScore(questions),
    });
  }

  private assertValidQuestion(
    questionnaire: Questionnaire,
    type: QuestionType,
    options: QuestionOption[],
    topicId: string | undefined,
  ): void {
    const problem = optionsProblem(type, options.length);
    if (problem) {
      throw DomainError.validation(problem);
    }
    if (new Set(options.map((o) => o.id)).size !== options.length) {
      throw DomainError.validation('option ids must be unique');
    }
    if (topicId && !questionnaire.topics.some((topic) => topic.id === topicId)) {
      throw DomainError.validation('question refers to an unknown topic');
    }
  }

  private async assertNoOrphanedQuestions(questionnaireId: string, topics: QuestionnaireTopic[]): Promise<void> {
    const known = new Set(topics.map((topic) => topic.id));
    const questions = await this.listQuestions(questionnaireId);
    if (questions.some((question) => question.topicId !== null && !known.has(question.topicId))) {
      throw DomainError.validation('cannot remove a topic that still has questions');
    }
  }

  private notEditable(): DomainError {
    return DomainError.notEditable('questionnaire can only be changed while it is a draft');
  }

  private async audit(questionnaire: Questionnaire, action: AuditAction, actor: QuestionnaireActor): Promise<void> {
    await this.auditLogService.log({
      organizationId: questionnaire.companyId,
      action,
      resourceType: AuditResourceType.QUESTIONNAIRE,
      resourceId: questionnaire.id,
      actorUserId: actor.userId,
      actorEmail: actor.email ?? null,
      description: questionnaire.name,
      requestId: actor.requestId,
    });
  }
}
