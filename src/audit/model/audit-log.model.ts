import { Optional } from 'sequelize';
import { Column, DataType, Default, Model, PrimaryKey, Table } from 'sequelize-typescript';

export enum AuditAction {
  CREATE = 'create',
  UPDATE = 'update',
  DELETE = 'delete',
  LOGIN = 'login',
  INVITE = 'invite',
  ACCEPT = 'accept',
  SUSPEND = 'suspend',
  ACTIVATE = 'activate',
  TERMINATE = 'terminate',
  START = 'start',
  SUBMIT = 'submit',
  APPROVE = 'approve',
  REJECT = 'reject',
  REQUEST_REVISION = 'request_revision',
  EXPIRE = 'expire',
  PUBLISH = 'publish',
  ARCHIVE = 'archive',
  UNPUBLISH = 'unpublish',
}

export enum AuditResourceType {
  ORGANIZATION = 'organization',
  USER = 'user',
  RELATIONSHIP = 'relationship',
  REQUIREMENT = 'requirement',
  QUESTIONNAIRE = 'questionnaire',
  QUESTION = 'question',
  RESPONSE = 'response',
  TEMPLATE = 'template',
}

export interface AuditLogAttributes {
  id: string;
  organizationId: string;
  actorUserId: string | null;
  actorEmail: string | null;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  description: string | null;
  changes: Record<string, unknown> | null;
  requestId: string | null;
  createdAt: Date;
}

export type AuditLogCreationAttributes = Optional<
  AuditLogAttributes,
  'id' | 'actorUserId' | 'actorEmail' | 'description' | 'changes' | 'requestId' | 'createdAt'
>;

@Table({
  tableName: 'audit_logs',
  timestamps: false,
  indexes: [{ fields: ['organizationId', 'createdAt'] }, { fields: ['resourceType', 'resourceId'] }],
})
export class AuditLog extends Model<AuditLogAttributes, AuditLogCreationAttributes> implements AuditLogAttributes {
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @Column({ type: DataType.UUID, allowNull: false })
  organizationId!: string;

  @Column({ type: DataType.UUID, allowNull: true })
  actorUserId!: string | null;

  @Column({ type: DataType.STRING, allowNull: true })
  actorEmail!: string | null;

  @Column({ type: DataType.STRING(50), allowNull: false })
  action!: AuditAction;

  @Column({ type: DataType.STRING(50), allowNull: false })
  resourceType!: AuditResourceType;

  @Column({ type: DataType.UUID, allowNull: false })
  resourceId!: string;

  @Column({ type: DataType.TEXT, allowNull: true })
  description!: string | null;

  @Column({ type: DataType.JSONB, allowNull: true })
  changes!: Record<string, unknown> | null;

  @Column({ type: DataType.STRING(128), allowNull: true })
  requestId!: string | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;
}
