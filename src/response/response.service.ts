import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import dayjs from 'dayjs';
import { Op } from 'sequelize';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError, DomainErrorKind } from '../common/errors/domain.error';
import { Question, QuestionType } from '../questionnaire/model/question.model';
import { Questionnaire, QuestionnaireTopic } from '../questionnaire/model/questionnaire.model';
import { QuestionnaireService } from '../questionnaire/questionnaire.service';
import { DocumentGrade, Requirement, RequirementStatus, RequirementType } from '../requirement/model/requirement.model';
import { RequirementService } from '../requirement/requirement.service';
import {
  DEFAULT_MAX_REPORT_AGE_DAYS,
  DEFAULT_MINIMUM_GRADE,
  RequirementView,
  meetsMinimumGrade,
  toRequirementView,
} from '../requirement/utils/requirement-rules.util';
import { QuestionnaireSubmission } from './model/questionnaire-submission.model';
import { DraftAnswer, SupplierResponse, SupplierResponseAttributes } from './model/supplier-response.model';
import { AnswerInput, mergeAnswers, scoreAnswers } from './utils/scoring.util';

export interface ResponseActor {
  userId: string;
  email?: string;
  requestId?: string;
}

export interface AnswerPayload {
  questionId: string;
  selectedOptionIds?: string[];
  textAnswer?: string | null;
}

export interface DocumentSubmission {
  reference: string;
  grade: DocumentGrade;
  reportDate: Date;
}

/** Question as shown to suppliers: no points and no correct answers. */
export interface SupplierQuestionView {
  id: string;
  topicId: string | null;
  text: string;
  description: string | null;
  type: QuestionType;
  isMustPass: boolean;
  order: number;
  options: { id: string; text: string }[];
}

export interface SupplierRequirementDetail {
  requirement: RequirementView;
  response: SupplierResponse | null;
  questionnaire: {
    id: string;
    name: string;
    description: string | null;
    topics: QuestionnaireTopic[];
    questions: SupplierQuestionView[];
  } | null;
}

export interface SubmissionResult {
  requirement: Requirement;
  response: SupplierResponse;
  submission: QuestionnaireSubmission | null;
}

export type ReviewAnnotations = Pick<
  SupplierResponseAttributes,
  'reviewedById' | 'reviewedAt' | 'reviewNotes' | 'overrideScore' | 'grade'
>;

const STARTABLE: readonly RequirementStatus[] = [RequirementStatus.PENDING, RequirementStatus.REVISION_REQUESTED];

const alreadySubmitted = () => new DomainError(DomainErrorKind.ALREADY_CONSUMED, 'response has already been submitted');

const toAnswerInput = (payload: AnswerPayload): AnswerInput => ({
  questionId: payload.questionId,
  selectedOptionIds: payload.selectedOptionIds ?? [],
  textAnswer: payload.textAnswer ?? null,
});

const toSupplierQuestion = (question: Question): SupplierQuestionView => ({
  id: question.id,
  topicId: question.topicId,
  text: question.text,
  description: question.description,
  type: question.type,
  isMustPass: question.isMustPass,
  order: question.order,
  options: question.options.map((o) => ({ id: o.id, text: o.text })),
});

@Injectable()
export class ResponseService {
  private readonly logger = new Logger(ResponseService.name);

  constructor(
    @InjectModel(SupplierResponse)
    private readonly responseModel: typeof SupplierResponse,
    @InjectModel(QuestionnaireSubmission)
    private readonly submissionModel: typeof QuestionnaireSubmission,
    private readonly requirementService: RequirementService,
    private readonly questionnaireService: QuestionnaireService,
    private readonly auditLogService: AuditLogService,
  ) {}

  async getRequirementDetail(requirementId: string, supplierId: string): Promise<SupplierRequirementDetail> {
    const requirement = await this.requirementService.getForSupplier(requirementId, supplierId);
    const response = await this.findLatest(requirement.id);

    let questionnaire: SupplierRequirementDetail['questionnaire'] = null;
    if (requirement.questionnaireId) {
      const found = await this.questionnaireService.findById(requirement.questionnaireId);
      if (found) {
        const questions = await this.questionnaireService.listQuestions(found.id);
        questionnaire = {
          id: found.id,
          name: found.name,
          description: found.description,
          topics: found.topics,
          questions: questions.map(toSupplierQuestion),
        };
      }
    }

    return { requirement: toRequirementView(requirement), response, questionnaire };
  }

  /**
   * Opens a response and moves the requirement to in_progress. An unsubmitted
   * response left over for the requirement is reused.
   */
  async startResponse(requirementId: string, supplierId: string, actor: ResponseActor): Promise<SupplierResponse> {
    const requirement = await this.requirementService.getForSupplier(requirementId, supplierId);
    if (!STARTABLE.includes(requirement.status)) {
      this.logger.warn(`Requirement ${requirement.id} cannot be started while ${requirement.status}`);
      throw DomainError.invalidTransition('cannot start this requirement');
    }

    const open = await this.responseModel.findOne({
      where: { requirementId, submittedAt: null },
      order: [['createdAt', 'DESC']],
    });
    const response =
      open ??
      (await this.responseModel.create({
        requirementId,
        supplierId,
        startedById: actor.userId,
        startedAt: new Date(),
        draftAnswers: [],
      }));

    const reason = requirement.status === RequirementStatus.REVISION_REQUESTED ? 'Revision started' : 'Response started';
    try {
      await this.requirementService.transition(requirement, RequirementStatus.IN_PROGRESS, reason, actor.userId);
    } catch (error) {
      if (!open) {
        await this.responseModel.destroy({ where: { id: response.id } });
      }
      throw error;
    }

    await this.audit(requirement, response.id, AuditAction.START, actor, reason);
    return response;
  }

  async getResponse(id: string, supplierId: string): Promise<SupplierResponse> {
    const response = await this.responseModel.findByPk(id);
    if (!response || response.supplierId !== supplierId) {
      throw DomainError.notFound('response');
    }
    return response;
  }

  async saveDraft(responseId: string, supplierId: string, answers: AnswerPayload[]): Promise<SupplierResponse> {
    const response = await this.getResponse(responseId, supplierId);
    if (response.submittedAt) {
      throw alreadySubmitted();
    }

    const savedAt = new Date().toISOString();
    const updates: DraftAnswer[] = answers.map((a) => ({ ...toAnswerInput(a), savedAt }));
    const [affected] = await this.responseModel.update(
      { draftAnswers: mergeAnswers(response.draftAnswers, updates) },
      { where: { id: response.id, submittedAt: null } },
    );
    if (affected === 0) {
      throw alreadySubmitted();
    }
    return this.reload(response.id);
  }

  /**
   * Scores the draft, overlaid with any answers sent along, and records the
   * immutable submission. The response is claimed by a conditional write
   * first, so of two concurrent submits only one creates a submission.
   */
  async submitQuestionnaire(
    responseId: string,
    supplierId: string,
    actor: ResponseActor,
    answers: AnswerPayload[] = [],
  ): Promise<SubmissionResult> {
    const response = await this.getResponse(responseId, supplierId);
    if (response.submittedAt) {
      throw alreadySubmitted();
    }
    const requirement = await this.requirementService.getForSupplier(response.requirementId, supplierId);
    if (requirement.type !== RequirementType.QUESTIONNAIRE || !requirement.questionnaireId) {
      throw DomainError.validation('requirement does not take a questionnaire response', 'wrong_requirement_type');
    }
    this.assertInProgress(requirement);

    const questionnaire = await this.loadQuestionnaire(requirement.questionnaireId);
    const questions = await this.questionnaireService.listQuestions(questionnaire.id);
    const passingScore = requirement.passingScore ?? questionnaire.passingScore;
    const finalAnswers = mergeAnswers(response.draftAnswers.map(toAnswerInput), answers.map(toAnswerInput));
    const result = scoreAnswers(questions, questionnaire.topics, finalAnswers, passingScore);

    const now = new Date();
    await this.claim(response.id, actor.userId, now);

    let submission: QuestionnaireSubmission | null = null;
    let submitted: Requirement;
    try {
      submission = await this.submissionModel.create({
        responseId: response.id,
        requirementId: requirement.id,
        questionnaireId: questionnaire.id,
        supplierId,
        answers: result.answers,
        topicScores: result.topicScores,
        totalScore: result.totalScore,
        maxPossibleScore: result.maxPossibleScore,
        percentageScore: result.percentageScore,
        passingScore,
        passed: result.passed,
        mustPassFailed: result.mustPassFailed,
        completionTimeMinutes: Math.max(dayjs(now).diff(response.startedAt, 'minute'), 0),
        submittedAt: now,
      });

      await this.responseModel.update(
        {
          submissionId: submission.id,
          score: result.totalScore,
          maxScore: result.maxPossibleScore,
          percentage: result.percentageScore,
          passed: result.passed,
          draftAnswers: [],
        },
        { where: { id: response.id } },
      );

      submitted = await this.requirementService.transition(
        requirement,
        RequirementStatus.SUBMITTED,
        'Response submitted',
        actor.userId,
      );
    } catch (error) {
      await this.releaseClaim(response, submission?.id ?? null);
      throw error;
    }
    this.logger.log(
      `Response ${response.id} scored ${result.totalScore}/${result.maxPossibleScore} (${
        result.passed ? 'passed' : 'failed'
      })`,
    );
    await this.audit(requirement, response.id, AuditAction.SUBMIT, actor, 'Questionnaire submitted', {
      submissionId: submission.id,
      percentageScore: result.percentageScore,
      passed: result.passed,
    });

    return { requirement: submitted, response: await this.reload(response.id), submission };
  }

  async submitDocument(
    responseId: string,
    supplierId: string,
    actor: ResponseActor,
    document: DocumentSubmission,
  ): Promise<SubmissionResult> {
    const response = await this.getResponse(responseId, supplierId);
    if (response.submittedAt) {
      throw alreadySubmitted();
    }
    const requirement = await this.requirementService.getForSupplier(response.requirementId, supplierId);
    if (requirement.type !== RequirementType.DOCUMENT) {
      throw DomainError.validation('requirement does not take a document', 'wrong_requirement_type');
    }
    this.assertInProgress(requirement);

    const minimumGrade = requirement.minimumGrade ?? DEFAULT_MINIMUM_GRADE;
    if (!meetsMinimumGrade(document.grade, minimumGrade)) {
      throw DomainError.validation(
        `grade ${document.grade} does not meet the minimum grade ${minimumGrade}`,
        'grade_not_met',
      );
    }

    const now = new Date();
    const ageDays = dayjs(now).diff(document.reportDate, 'day');
    if (ageDays < 0) {
      throw DomainError.validation('report date cannot be in the future', 'invalid_report_date');
    }
    const maxAge = requirement.maxReportAgeDays ?? DEFAULT_MAX_REPORT_AGE_DAYS;
    if (ageDays > maxAge) {
      throw DomainError.validation(`report is ${ageDays} days old; the limit is ${maxAge}`, 'report_too_old');
    }

    await this.claim(response.id, actor.userId, now, {
      documentEvidence: {
        reference: document.reference.trim(),
        grade: document.grade,
        reportDate: document.reportDate.toISOString(),
      },
      passed: true,
      draftAnswers: [],
    });

    let submitted: Requirement;
    try {
      submitted = await this.requirementService.transition(
        requirement,
        RequirementStatus.SUBMITTED,
        'Response submitted',
        actor.userId,
      );
    } catch (error) {
      await this.releaseClaim(response, null);
      throw error;
    }
    await this.audit(requirement, response.id, AuditAction.SUBMIT, actor, 'Document submitted', {
      grade: document.grade,
    });

    return { requirement: submitted, response: await this.reload(response.id), submission: null };
  }

  /** Most recent submitted response for a requirement, if any. */
  async findLatestSubmitted(requirementId: string): Promise<SupplierResponse | null> {
    return this.responseModel.findOne({
      where: { requirementId, submittedAt: { [Op.ne]: null } },
      order: [['submittedAt', 'DESC']],
    });
  }

  async findSubmission(id: string): Promise<QuestionnaireSubmission | null> {
    return this.submissionModel.findByPk(id);
  }

  async annotateReview(responseId: string, annotations: ReviewAnnotations): Promise<SupplierResponse> {
    await this.responseModel.update(annotations, { where: { id: responseId } });
    return this.reload(responseId);
  }

  private async findLatest(requirementId: string): Promise<SupplierResponse | null> {
    return this.responseModel.findOne({ where: { requirementId }, order: [['createdAt', 'DESC']] });
  }

  private async loadQuestionnaire(id: string): Promise<Questionnaire> {
    const questionnaire = await this.questionnaireService.findById(id);
    if (!questionnaire) {
      throw DomainError.notFound('questionnaire');
    }
    return questionnaire;
  }

  private assertInProgress(requirement: Requirement): void {
    if (requirement.status !== RequirementStatus.IN_PROGRESS) {
      this.logger.warn(`Requirement ${requirement.id} cannot be submitted while ${requirement.status}`);
      throw DomainError.invalidTransition('cannot submit this requirement');
    }
  }

  /**
   * Undoes a claim whose requirement could not be submitted: the response is
   * open again with its draft, and a submission written for it is removed.
   */
  private async releaseClaim(response: SupplierResponse, submissionId: string | null): Promise<void> {
    try {
      if (submissionId) {
        await this.submissionModel.destroy({ where: { id: submissionId } });
      }
      await this.responseModel.update(
        {
          submittedAt: null,
          submittedById: null,
          submissionId: null,
          score: null,
          maxScore: null,
          percentage: null,
          passed: null,
          documentEvidence: null,
          draftAnswers: response.draftAnswers,
        },
        { where: { id: response.id } },
      );
    } catch (error) {
      this.logger.error(
        `Failed to release the submit claim on response ${response.id}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private async claim(
    responseId: string,
    userId: string,
    at: Date,
    extra: Partial<SupplierResponseAttributes> = {},
  ): Promise<void> {
    const [affected] = await this.responseModel.update(
      { ...extra, submittedAt: at, submittedById: userId },
      { where: { id: responseId, submittedAt: null } },
    );
    if (affected === 0) {
      throw alreadySubmitted();
    }
  }

  private async reload(id: string): Promise<SupplierResponse> {
    const response = await this.responseModel.findByPk(id);
    if (!response) {
      throw DomainError.notFound('response');
    }
    return response;
  }

  private async audit(
    requirement: Requirement,
    responseId: string,
    action: AuditAction,
    actor: ResponseActor,
    description: string,
    changes?: Record<string, unknown>,
  ): Promise<void> {
    await this.auditLogService.log({
      organizationId: requirement.supplierId,
      action,
      resourceType: AuditResourceType.RESPONSE,
      resourceId: responseId,
      actorUserId: actor.userId,
      actorEmail: actor.email ?? null,
      description: `${description} for "${requirement.title}"`,
      changes,
      requestId: actor.requestId,
    });
  }
}
