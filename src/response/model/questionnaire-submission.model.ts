import { Optional } from 'sequelize';
import { Column, DataType, Default, ForeignKey, Model, PrimaryKey, Table } from 'sequelize-typescript';
import { Organization } from '../../organization/model/organization.model';
import { Questionnaire } from '../../questionnaire/model/questionnaire.model';
import { Requirement } from '../../requirement/model/requirement.model';
import { ScoredAnswer, TopicScore } from '../utils/scoring.util';
import { SupplierResponse } from './supplier-response.model';

export interface QuestionnaireSubmissionAttributes {
  id: string;
  responseId: string;
  requirementId: string;
  questionnaireId: string;
  supplierId: string;
  answers: ScoredAnswer[];
  topicScores: TopicScore[];
  totalScore: number;
  maxPossibleScore: number;
  percentageScore: number;
  passingScore: number;
  passed: boolean;
  mustPassFailed: boolean;
  completionTimeMinutes: number;
  submittedAt: Date;
  createdAt: Date;
}

export type QuestionnaireSubmissionCreationAttributes = Optional<
  QuestionnaireSubmissionAttributes,
  'id' | 'createdAt'
>;

/** Scored snapshot of a questionnaire response. Rows are written once and never updated. */
@Table({
  tableName: 'questionnaire_submissions',
  updatedAt: false,
  indexes: [{ fields: ['requirementId'] }, { unique: true, fields: ['responseId'] }],
})
export class QuestionnaireSubmission
  extends Model<QuestionnaireSubmissionAttributes, QuestionnaireSubmissionCreationAttributes>
  implements QuestionnaireSubmissionAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @ForeignKey(() => SupplierResponse)
  @Column({ type: DataType.UUID, allowNull: false })
  responseId!: string;

  @ForeignKey(() => Requirement)
  @Column({ type: DataType.UUID, allowNull: false })
  requirementId!: string;

  @ForeignKey(() => Questionnaire)
  @Column({ type: DataType.UUID, allowNull: false })
  questionnaireId!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  supplierId!: string;

  @Column({ type: DataType.JSONB, allowNull: false })
  answers!: ScoredAnswer[];

  @Column({ type: DataType.JSONB, allowNull: false })
  topicScores!: TopicScore[];

  @Column({ type: DataType.INTEGER, allowNull: false })
  totalScore!: number;

  @Column({ type: DataType.INTEGER, allowNull: false })
  maxPossibleScore!: number;

  @Column({ type: DataType.FLOAT, allowNull: false })
  percentageScore!: number;

  @Column({ type: DataType.INTEGER, allowNull: false })
  passingScore!: number;

  @Column({ type: DataType.BOOLEAN, allowNull: false })
  passed!: boolean;

  @Column({ type: DataType.BOOLEAN, allowNull: false })
  mustPassFailed!: boolean;

  @Column({ type: DataType.INTEGER, allowNull: false })
  completionTimeMinutes!: number;

  @Column({ type: DataType.DATE, allowNull: false })
  submittedAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;
}
