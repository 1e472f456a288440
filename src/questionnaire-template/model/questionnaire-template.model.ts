import { Optional } from 'sequelize';
import { Column, DataType, Default, ForeignKey, Model, PrimaryKey, Table } from 'sequelize-typescript';
import { Organization } from '../../organization/model/organization.model';
import { QuestionnaireTopic } from '../../questionnaire/model/questionnaire.model';

export enum TemplateCategory {
  ISO27001 = 'iso27001',
  GDPR = 'gdpr',
  NIS2 = 'nis2',
  CUSTOM = 'custom',
}

/**
 * Draft templates are visible to their organization only. Published ones are
 * either local (still only the owner) or global (every company).
 */
export enum TemplateVisibility {
  DRAFT = 'draft',
  LOCAL = 'local',
  GLOBAL = 'global',
}

export type TemplateTopic = QuestionnaireTopic;

export interface QuestionnaireTemplateAttributes {
  id: string;
  name: string;
  description: string | null;
  category: TemplateCategory;
  version: string;
  isSystem: boolean;
  organizationId: string | null;
  createdById: string | null;
  visibility: TemplateVisibility;
  defaultPassingScore: number;
  estimatedMinutes: number;
  topics: TemplateTopic[];
  tags: string[];
  usageCount: number;
  publishedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type QuestionnaireTemplateCreationAttributes = Optional<
  QuestionnaireTemplateAttributes,
  | 'id'
  | 'description'
  | 'version'
  | 'isSystem'
  | 'organizationId'
  | 'createdById'
  | 'visibility'
  | 'defaultPassingScore'
  | 'estimatedMinutes'
  | 'topics'
  | 'tags'
  | 'usageCount'
  | 'publishedAt'
  | 'createdAt'
  | 'updatedAt'
>;

export const DEFAULT_TEMPLATE_VERSION = '1.0';
export const DEFAULT_ESTIMATED_MINUTES = 30;

@Table({
  tableName: 'questionnaire_templates',
  indexes: [{ fields: ['isSystem', 'category'] }, { fields: ['organizationId'] }, { fields: ['visibility'] }],
})
export class QuestionnaireTemplate
  extends Model<QuestionnaireTemplateAttributes, QuestionnaireTemplateCreationAttributes>
  implements QuestionnaireTemplateAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @Column({ type: DataType.STRING(200), allowNull: false })
  name!: string;

  @Column({ type: DataType.TEXT, allowNull: true })
  description!: string | null;

  @Column({ type: DataType.STRING(20), allowNull: false })
  category!: TemplateCategory;

  @Default(DEFAULT_TEMPLATE_VERSION)
  @Column({ type: DataType.STRING(20), allowNull: false })
  version!: string;

  @Default(false)
  @Column({ type: DataType.BOOLEAN, allowNull: false })
  isSystem!: boolean;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: true })
  organizationId!: string | null;

  @Column({ type: DataType.UUID, allowNull: true })
  createdById!: string | null;

  @Default(TemplateVisibility.DRAFT)
  @Column({ type: DataType.STRING(20), allowNull: false })
  visibility!: TemplateVisibility;

  @Default(70)
  @Column({ type: DataType.INTEGER, allowNull: false })
  defaultPassingScore!: number;

  @Default(DEFAULT_ESTIMATED_MINUTES)
  @Column({ type: DataType.INTEGER, allowNull: false })
  estimatedMinutes!: number;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  topics!: TemplateTopic[];

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  tags!: string[];

  @Default(0)
  @Column({ type: DataType.INTEGER, allowNull: false })
  usageCount!: number;

  @Column({ type: DataType.DATE, allowNull: true })
  publishedAt!: Date | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;
}
