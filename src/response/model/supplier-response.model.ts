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
import { Organization } from '../../organization/model/organization.model';
import { DocumentGrade, Requirement } from '../../requirement/model/requirement.model';

export interface DraftAnswer {
  questionId: string;
  selectedOptionIds: string[];
  textAnswer: string | null;
  savedAt: string;
}

export interface DocumentEvidence {
  reference: string;
  grade: DocumentGrade;
  /** ISO date the report was issued. */
  reportDate: string;
}

export interface SupplierResponseAttributes {
  id: string;
  requirementId: string;
  supplierId: string;
  startedById: string;
  startedAt: Date;
  draftAnswers: DraftAnswer[];
  submittedAt: Date | null;
  submittedById: string | null;
  submissionId: string | null;
  score: number | null;
  maxScore: number | null;
  percentage: number | null;
  passed: boolean | null;
  documentEvidence: DocumentEvidence | null;
  reviewedById: string | null;
  reviewedAt: Date | null;
  reviewNotes: string | null;
  overrideScore: number | null;
  grade: DocumentGrade | null;
  createdAt: Date;
  updatedAt: Date;
}

export type SupplierResponseCreationAttributes = Optional<
  SupplierResponseAttributes,
  | 'id'
  | 'draftAnswers'
  | 'submittedAt'
  | 'submittedById'
  | 'submissionId'
  | 'score'
  | 'maxScore'
  | 'percentage'
  | 'passed'
  | 'documentEvidence'
  | 'reviewedById'
  | 'reviewedAt'
  | 'reviewNotes'
  | 'overrideScore'
  | 'grade'
  | 'createdAt'
  | 'updatedAt'
>;

@Table({
  tableName: 'supplier_responses',
  indexes: [{ fields: ['requirementId', 'createdAt'] }, { fields: ['supplierId'] }],
})
export class SupplierResponse
  extends Model<SupplierResponseAttributes, SupplierResponseCreationAttributes>
  implements SupplierResponseAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @ForeignKey(() => Requirement)
  @Column({ type: DataType.UUID, allowNull: false })
  requirementId!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  supplierId!: string;

  @Column({ type: DataType.UUID, allowNull: false })
  startedById!: string;

  @Column({ type: DataType.DATE, allowNull: false })
  startedAt!: Date;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  draftAnswers!: DraftAnswer[];

  @Column({ type: DataType.DATE, allowNull: true })
  submittedAt!: Date | null;

  @Column({ type: DataType.UUID, allowNull: true })
  submittedById!: string | null;

  @Column({ type: DataType.UUID, allowNull: true })
  submissionId!: string | null;

  @Column({ type: DataType.INTEGER, allowNull: true })
  score!: number | null;

  @Column({ type: DataType.INTEGER, allowNull: true })
  maxScore!: number | null;

  @Column({ type: DataType.FLOAT, allowNull: true })
  percentage!: number | null;

  @Column({ type: DataType.BOOLEAN, allowNull: true })
  passed!: boolean | null;

  @Column({ type: DataType.JSONB, allowNull: true })
  documentEvidence!: DocumentEvidence | null;

  @Column({ type: DataType.UUID, allowNull: true })
  reviewedById!: string | null;

  @Column({ type: DataType.DATE, allowNull: true })
  reviewedAt!: Date | null;

  @Column({ type: DataType.TEXT, allowNull: true })
  reviewNotes!: string | null;

  @Column({ type: DataType.FLOAT, allowNull: true })
  overrideScore!: number | null;

  @Column({ type: DataType.STRING(1), allowNull: true })
  grade!: DocumentGrade | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @BelongsTo(() => Requirement)
  requirement?: Requirement;
}
