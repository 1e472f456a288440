import { Injectable, Logger } from '@nestjs/common';
import { AuditLogService } from '../audit/audit-log.service';
import { AuditAction, AuditResourceType } from '../audit/model/audit-log.model';
import { DomainError } from '../common/errors/domain.error';
import { resolveSettings } from '../organization/model/organization.model';
import { OrganizationService } from '../organization/organization.service';
import { RelationshipService } from '../relationship/relationship.service';
import { DocumentGrade, Requirement, RequirementStatus } from '../requirement/model/requirement.model';
import { RequirementService } from '../requirement/requirement.service';
import { RequirementView, toRequirementView } from '../requirement/utils/requirement-rules.util';
import { QuestionnaireSubmission } from '../response/model/questionnaire-submission.model';
import { SupplierResponse } from '../response/model/supplier-response.model';
import { ResponseService } from '../response/response.service';
import { MailService, ReviewOutcome } from '../utils/mail.service';

export interface ReviewActor {
  userId: string;
  email?: string;
  requestId?: string;
}

export interface ReviewDetail {
  requirement: RequirementView;
  response: SupplierResponse | null;
  submission: QuestionnaireSubmission | null;
  /** Reviewer override when set, else the computed percentage. */
  effectiveScore: number | null;
}

export interface ReviewResult {
  requirement: Requirement;
  response: SupplierResponse | null;
}

interface Decision {
  outcome: ReviewOutcome;
  notes: string | null;
  overrideScore?: number;
  grade?: DocumentGrade;
}

const OUTCOMES: Record<
  ReviewOutcome,
  { status: RequirementStatus; action: AuditAction; verb: string; defaultReason: string }
> = {
  approved: {
    status: RequirementStatus.APPROVED,
    action: AuditAction.APPROVE,
    verb: 'approve',
    defaultReason: 'Approved',
  },
  rejected: {
    status: RequirementStatus.REJECTED,
    action: AuditAction.REJECT,
    verb: 'reject',
    defaultReason: 'Rejected',
  },
  revision_requested: {
    status: RequirementStatus.REVISION_REQUESTED,
    action: AuditAction.REQUEST_REVISION,
    verb: 'request a revision of',
    defaultReason: 'Revision requested',
  },
};

const requireReason = (reason: string | undefined, verb: string): string => {
  const trimmed = reason?.trim();
  if (!trimmed) {
    throw DomainError.validation(`a reason is required to ${verb} this requirement`, 'reason_required');
  }
  return trimmed;
};

@Injectable()
export class ReviewService {
  private readonly logger = new Logger(ReviewService.name);

  constructor(
    private readonly requirementService: RequirementService,
    private readonly responseService: ResponseService,
    private readonly relationshipService: RelationshipService,
    private readonly organizationService: OrganizationService,
    private readonly mailService: MailService,
    private readonly auditLogService: AuditLogService,
  ) {}

  async getSubmissionForReview(requirementId: string, companyId: string): Promise<ReviewDetail> {
    const requirement = await this.requirementService.get(requirementId, companyId);
    const response = await this.responseService.findLatestSubmitted(requirement.id);
    const submission = response?.submissionId ? await this.responseService.findSubmission(response.submissionId) : null;

    return {
      requirement: toRequirementView(requirement),
      response,
      submission,
      effectiveScore: response?.overrideScore ?? submission?.percentageScore ?? null,
    };
  }

  async approve(
    requirementId: string,
    companyId: string,
    reviewer: ReviewActor,
    input: { notes?: string; overrideScore?: number; grade?: DocumentGrade } = {},
  ): Promise<ReviewResult> {
    return this.decide(requirementId, companyId, reviewer, {
      outcome: 'approved',
      notes: input.notes?.trim() || null,
      overrideScore: input.overrideScore,
      grade: input.grade,
    });
  }

  async reject(
    requirementId: string,
    companyId: string,
    reviewer: ReviewActor,
    input: { reason?: string; overrideScore?: number; grade?: DocumentGrade },
  ): Promise<ReviewResult> {
    return this.decide(requirementId, companyId, reviewer, {
      outcome: 'rejected',
      notes: requireReason(input.reason, 'reject'),
      overrideScore: input.overrideScore,
      grade: input.grade,
    });
  }

  async requestRevision(
    requirementId: string,
    companyId: string,
    reviewer: ReviewActor,
    input: { reason?: string },
  ): Promise<ReviewResult> {
    return this.decide(requirementId, companyId, reviewer, {
      outcome: 'revision_requested',
      notes: requireReason(input.reason, 'request a revision of'),
    });
  }

  /**
   * Writes the transition first; the response annotation follows only once
   * the requirement has left `submitted`. The submission is never touched.
   */
  private async decide(
    requirementId: string,
    companyId: string,
    reviewer: ReviewActor,
    decision: Decision,
  ): Promise<ReviewResult> {
    const outcome = OUTCOMES[decision.outcome];
    const requirement = await this.requirementService.get(requirementId, companyId);
    if (requirement.status !== RequirementStatus.SUBMITTED) {
      throw DomainError.cannotReview(outcome.verb);
    }

    const reviewed = await this.requirementService.transition(
      requirement,
      outcome.status,
      decision.notes ?? outcome.defaultReason,
      reviewer.userId,
    );

    const latest = await this.responseService.findLatestSubmitted(requirement.id);
    const response = latest
      ? await this.responseService.annotateReview(latest.id, {
          reviewedById: reviewer.userId,
          reviewedAt: reviewed.reviewedAt ?? new Date(),
          reviewNotes: decision.notes,
          overrideScore: decision.overrideScore ?? null,
          grade: decision.grade ?? null,
        })
      : null;

    await this.notifySupplier(reviewed, decision);
    await this.auditLogService.log({
      organizationId: companyId,
      action: outcome.action,
      resourceType: AuditResourceType.REQUIREMENT,
      resourceId: requirement.id,
      actorUserId: reviewer.userId,
      actorEmail: reviewer.email ?? null,
      description: `${outcome.defaultReason}: "${requirement.title}"`,
      changes: {
        from: RequirementStatus.SUBMITTED,
        to: outcome.status,
        ...(decision.overrideScore !== undefined ? { overrideScore: decision.overrideScore } : {}),
        ...(decision.grade ? { grade: decision.grade } : {}),
      },
      requestId: reviewer.requestId,
    });

    return { requirement: reviewed, response };
  }

  /** Best-effort; a failed lookup or delivery is logged and the review stands. */
  private async notifySupplier(requirement: Requirement, decision: Decision): Promise<void> {
    try {
      const company = await this.organizationService.getOrganization(requirement.companyId);
      if (!resolveSettings(company.settings).notificationsEnabled) return;

      const relationship = await this.relationshipService.get(requirement.relationshipId, requirement.companyId);
      await this.mailService.sendReviewOutcome({
        to: relationship.invitedEmail,
        companyName: company.name,
        requirementTitle: requirement.title,
        outcome: decision.outcome,
        reason: decision.notes,
      });
    } catch (error) {
      this.logger.warn(
        `Failed to send review outcome for requirement ${requirement.id}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }
}
