import { Optional } from 'sequelize';
import {
  BelongsTo,
  Column,
  DataType,
  Default,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
} from 'sequelize-typescript';
import { StatusHistoryEntry } from '../../common/types/status-history';
import { Organization } from '../../organization/model/organization.model';
import { Questionnaire } from '../../questionnaire/model/questionnaire.model';
import { Relationship } from '../../relationship/model/relationship.model';

export enum RequirementType {
  QUESTIONNAIRE = 'questionnaire',
  DOCUMENT = 'document',
}

export enum RequirementPriority {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum RequirementStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  SUBMITTED = 'submitted',
  APPROVED = 'approved',
  REJECTED = 'rejected',
  REVISION_REQUESTED = 'revision_requested',
  EXPIRED = 'expired',
}

export enum DocumentGrade {
  A = 'A',
  B = 'B',
  C = 'C',
  D = 'D',
  E = 'E',
  F = 'F',
}

export interface RequirementAttributes {
  id: string;
  relationshipId: string;
  companyId: string;
  supplierId: string;
  type: RequirementType;
  title: string;
  description: string | null;
  priority: RequirementPriority;
  status: RequirementStatus;
  dueDate: Date | null;
  questionnaireId: string | null;
  passingScore: number | null;
  minimumGrade: DocumentGrade | null;
  maxReportAgeDays: number | null;
  assignedAt: Date;
  assignedById: string;
  submittedAt: Date | null;
  reviewedAt: Date | null;
  reminderSentAt: Date | null;
  expiredAt: Date | null;
  statusHistory: StatusHistoryEntry<RequirementStatus>[];
  createdAt: Date;
  updatedAt: Date;
}

export type RequirementCreationAttributes = Optional<
  RequirementAttributes,
  | 'id'
  | 'description'
  | 'priority'
  | 'status'
  | 'dueDate'
  | 'questionnaireId'
  | 'passingScore'
  | 'minimumGrade'
  | 'maxReportAgeDays'
  | 'submittedAt'
  | 'reviewedAt'
  | 'reminderSentAt'
  | 'expiredAt'
  | 'createdAt'
  | 'updatedAt'
>;

@Table({
  tableName: 'requirements',
  indexes: [
    { fields: ['companyId', 'status'] },
    { fields: ['supplierId', 'status'] },
    { fields: ['relationshipId'] },
    { fields: ['status', 'dueDate'] },
  ],
})
export class Requirement
  extends Model<RequirementAttributes, RequirementCreationAttributes>
  implements RequirementAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @ForeignKey(() => Relationship)
  @Column({ type: DataType.UUID, allowNull: false })
  relationshipId!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  companyId!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  supplierId!: string;

  @Column({ type: DataType.STRING(20), allowNull: false })
  type!: RequirementType;

  @Column({ type: DataType.STRING, allowNull: false })
  title!: string;

  @Column({ type: DataType.TEXT, allowNull: true })
  description!: string | null;

  @Default(RequirementPriority.MEDIUM)
  @Column({ type: DataType.STRING(20), allowNull: false })
  priority!: RequirementPriority;

  @Default(RequirementStatus.PENDING)
  @Column({ type: DataType.STRING(30), allowNull: false })
  status!: RequirementStatus;

  @Column({ type: DataType.DATE, allowNull: true })
  dueDate!: Date | null;

  @ForeignKey(() => Questionnaire)
  @Column({ type: DataType.UUID, allowNull: true })
  questionnaireId!: string | null;

  @Column({ type: DataType.INTEGER, allowNull: true })
  passingScore!: number | null;

  @Column({ type: DataType.STRING(1), allowNull: true })
  minimumGrade!: DocumentGrade | null;

  @Column({ type: DataType.INTEGER, allowNull: true })
  maxReportAgeDays!: number | null;

  @Column({ type: DataType.DATE, allowNull: false })
  assignedAt!: Date;

  @Column({ type: DataType.UUID, allowNull: false })
  assignedById!: string;

  @Column({ type: DataType.DATE, allowNull: true })
  submittedAt!: Date | null;

  @Column({ type: DataType.DATE, allowNull: true })
  reviewedAt!: Date | null;

  @Column({ type: DataType.DATE, allowNull: true })
  reminderSentAt!: Date | null;

  @Column({ type: DataType.DATE, allowNull: true })
  expiredAt!: Date | null;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  statusHistory!: StatusHistoryEntry<RequirementStatus>[];

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @BelongsTo(() => Relationship)
  relationship?: Relationship;

  @BelongsTo(() => Questionnaire)
  questionnaire?: Questionnaire;
}
