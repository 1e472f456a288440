import dayjs from 'dayjs';
import {
  DocumentGrade,
  RequirementAttributes,
  RequirementStatus,
} from '../model/requirement.model';

export const REQUIREMENT_TRANSITIONS: Record<RequirementStatus, readonly RequirementStatus[]> = {
  [RequirementStatus.PENDING]: [RequirementStatus.IN_PROGRESS, RequirementStatus.EXPIRED],
  [RequirementStatus.IN_PROGRESS]: [RequirementStatus.SUBMITTED, RequirementStatus.EXPIRED],
  [RequirementStatus.SUBMITTED]: [
    RequirementStatus.APPROVED,
    RequirementStatus.REJECTED,
    RequirementStatus.REVISION_REQUESTED,
  ],
  [RequirementStatus.REVISION_REQUESTED]: [RequirementStatus.IN_PROGRESS],
  [RequirementStatus.APPROVED]: [],
  [RequirementStatus.REJECTED]: [],
  [RequirementStatus.EXPIRED]: [],
};

export const REQUIREMENT_ACTIONS: Record<RequirementStatus, string> = {
  [RequirementStatus.PENDING]: 'assign',
  [RequirementStatus.IN_PROGRESS]: 'start',
  [RequirementStatus.SUBMITTED]: 'submit',
  [RequirementStatus.APPROVED]: 'approve',
  [RequirementStatus.REJECTED]: 'reject',
  [RequirementStatus.REVISION_REQUESTED]: 'request a revision of',
  [RequirementStatus.EXPIRED]: 'expire',
};

/** Statuses in which the supplier still owes a response. */
export const OPEN_STATUSES: readonly RequirementStatus[] = [RequirementStatus.PENDING, RequirementStatus.IN_PROGRESS];

/** Statuses that still get due-date reminders. */
export const REMINDABLE_STATUSES: readonly RequirementStatus[] = [
  RequirementStatus.PENDING,
  RequirementStatus.IN_PROGRESS,
  RequirementStatus.REVISION_REQUESTED,
];

export const DEFAULT_MINIMUM_GRADE = DocumentGrade.C;
export const DEFAULT_MAX_REPORT_AGE_DAYS = 90;

export const canTransitionRequirement = (from: RequirementStatus, to: RequirementStatus): boolean =>
  REQUIREMENT_TRANSITIONS[from].includes(to);

type DueFields = Pick<RequirementAttributes, 'status' | 'dueDate'>;

export const isOverdue = (requirement: DueFields, now: Date = new Date()): boolean =>
  requirement.dueDate !== null &&
  requirement.dueDate.getTime() < now.getTime() &&
  OPEN_STATUSES.includes(requirement.status);

/** Whole days until the due date, truncated toward zero; negative once past. */
export const daysUntilDue = (requirement: Pick<RequirementAttributes, 'dueDate'>, now: Date = new Date()): number | null =>
  requirement.dueDate === null ? null : dayjs(requirement.dueDate).diff(now, 'day');

const GRADE_ORDER: readonly DocumentGrade[] = [
  DocumentGrade.A,
  DocumentGrade.B,
  DocumentGrade.C,
  DocumentGrade.D,
  DocumentGrade.E,
  DocumentGrade.F,
];

/** A is the best grade; a grade meets the minimum when it is the same or better. */
export const meetsMinimumGrade = (grade: DocumentGrade, minimum: DocumentGrade): boolean =>
  GRADE_ORDER.indexOf(grade) <= GRADE_ORDER.indexOf(minimum);

export type RequirementView = RequirementAttributes & {
  isOverdue: boolean;
  daysUntilDue: number | null;
};

export const toRequirementView = (requirement: RequirementAttributes, now: Date = new Date()): RequirementView => ({
  id: requirement.id,
  relationshipId: requirement.relationshipId,
  companyId: requirement.companyId,
  supplierId: requirement.supplierId,
  type: requirement.type,
  title: requirement.title,
  description: requirement.description,
  priority: requirement.priority,
  status: requirement.status,
  dueDate: requirement.dueDate,
  questionnaireId: requirement.questionnaireId,
  passingScore: requirement.passingScore,
  minimumGrade: requirement.minimumGrade,
  maxReportAgeDays: requirement.maxReportAgeDays,
  assignedAt: requirement.assignedAt,
  assignedById: requirement.assignedById,
  submittedAt: requirement.submittedAt,
  reviewedAt: requirement.reviewedAt,
  reminderSentAt: requirement.reminderSentAt,
  expiredAt: requirement.expiredAt,
  statusHistory: requirement.statusHistory,
  createdAt: requirement.createdAt,
  updatedAt: requirement.updatedAt,
  isOverdue: isOverdue(requirement, now),
  daysUntilDue: daysUntilDue(requirement, now),
});
