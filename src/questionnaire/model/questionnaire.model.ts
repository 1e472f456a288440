import { Optional } from 'sequelize';
import {
  Column,
  DataType,
  Default,
  ForeignKey,
  HasMany,
  Model,
  PrimaryKey,
  Table,
} from 'sequelize-typescript';
import { Organization } from '../../organization/model/organization.model';
import { Question } from './question.model';

export enum QuestionnaireStatus {
  DRAFT = 'draft',
  PUBLISHED = 'published',
  ARCHIVED = 'archived',
}

export enum ScoringMode {
  PERCENTAGE = 'percentage',
  POINTS = 'points',
}

export interface QuestionnaireTopic {
  id: string;
  name: string;
  description: string | null;
  order: number;
}

export interface QuestionnaireAttributes {
  id: string;
  companyId: string;
  name: string;
  description: string | null;
  status: QuestionnaireStatus;
  scoringMode: ScoringMode;
  passingScore: number;
  topics: QuestionnaireTopic[];
  questionCount: number;
  maxPossibleScore: number;
  templateId: string | null;
  createdById: string | null;
  publishedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type QuestionnaireCreationAttributes = Optional<
  QuestionnaireAttributes,
  | 'id'
  | 'description'
  | 'status'
  | 'scoringMode'
  | 'passingScore'
  | 'topics'
  | 'questionCount'
  | 'maxPossibleScore'
  | 'templateId'
  | 'createdById'
  | 'publishedAt'
  | 'createdAt'
  | 'updatedAt'
>;

export const DEFAULT_PASSING_SCORE = 70;

@Table({
  tableName: 'questionnaires',
  indexes: [{ fields: ['companyId', 'status'] }],
})
export class Questionnaire
  extends Model<QuestionnaireAttributes, QuestionnaireCreationAttributes>
  implements QuestionnaireAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  companyId!: string;

  @Column({ type: DataType.STRING, allowNull: false })
  name!: string;

  @Column({ type: DataType.TEXT, allowNull: true })
  description!: string | null;

  @Default(QuestionnaireStatus.DRAFT)
  @Column({ type: DataType.STRING(20), allowNull: false })
  status!: QuestionnaireStatus;

  @Default(ScoringMode.PERCENTAGE)
  @Column({ type: DataType.STRING(20), allowNull: false })
  scoringMode!: ScoringMode;

  @Default(DEFAULT_PASSING_SCORE)
  @Column({ type: DataType.INTEGER, allowNull: false })
  passingScore!: number;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  topics!: QuestionnaireTopic[];

  @Default(0)
  @Column({ type: DataType.INTEGER, allowNull: false })
  questionCount!: number;

  @Default(0)
  @Column({ type: DataType.INTEGER, allowNull: false })
  maxPossibleScore!: number;

  /** Template the questionnaire was copied from, if any. */
  @Column({ type: DataType.UUID, allowNull: true })
  templateId!: string | null;

  @Column({ type: DataType.UUID, allowNull: true })
  createdById!: string | null;

  @Column({ type: DataType.DATE, allowNull: true })
  publishedAt!: Date | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @HasMany(() => Question)
  questions?: Question[];
}
