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
import { Questionnaire } from './questionnaire.model';

export enum QuestionType {
  SINGLE_CHOICE = 'single_choice',
  MULTIPLE_CHOICE = 'multiple_choice',
  YES_NO = 'yes_no',
  TEXT = 'text',
}

export interface QuestionOption {
  id: string;
  text: string;
  points: number;
  isCorrect: boolean;
}

export interface QuestionAttributes {
  id: string;
  questionnaireId: string;
  topicId: string | null;
  text: string;
  description: string | null;
  type: QuestionType;
  options: QuestionOption[];
  isMustPass: boolean;
  order: number;
  createdAt: Date;
  updatedAt: Date;
}

export type QuestionCreationAttributes = Optional<
  QuestionAttributes,
  'id' | 'topicId' | 'description' | 'options' | 'isMustPass' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'questions',
  indexes: [{ fields: ['questionnaireId', 'order'] }],
})
export class Question
  extends Model<QuestionAttributes, QuestionCreationAttributes>
  implements QuestionAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @ForeignKey(() => Questionnaire)
  @Column({ type: DataType.UUID, allowNull: false })
  questionnaireId!: string;

  @Column({ type: DataType.STRING(64), allowNull: true })
  topicId!: string | null;

  @Column({ type: DataType.TEXT, allowNull: false })
  text!: string;

  @Column({ type: DataType.TEXT, allowNull: true })
  description!: string | null;

  @Column({ type: DataType.STRING(20), allowNull: false })
  type!: QuestionType;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  options!: QuestionOption[];

  @Default(false)
  @Column({ type: DataType.BOOLEAN, allowNull: false })
  isMustPass!: boolean;

  @Column({ type: DataType.INTEGER, allowNull: false })
  order!: number;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @BelongsTo(() => Questionnaire)
  questionnaire?: Questionnaire;
}
