import { Op, Optional } from 'sequelize';
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

export enum RelationshipStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  SUSPENDED = 'suspended',
  TERMINATED = 'terminated',
}

export enum SupplierClassification {
  CRITICAL = 'critical',
  IMPORTANT = 'important',
  STANDARD = 'standard',
}

export interface RelationshipAttributes {
  id: string;
  companyId: string;
  supplierId: string | null;
  invitedEmail: string;
  invitedById: string | null;
  status: RelationshipStatus;
  classification: SupplierClassification;
  notes: string | null;
  servicesProvided: string[];
  contractReference: string | null;
  invitedAt: Date;
  acceptedAt: Date | null;
  suspendedAt: Date | null;
  terminatedAt: Date | null;
  statusHistory: StatusHistoryEntry<RelationshipStatus>[];
  createdAt: Date;
  updatedAt: Date;
}

export type RelationshipCreationAttributes = Optional<
  RelationshipAttributes,
  | 'id'
  | 'supplierId'
  | 'invitedById'
  | 'classification'
  | 'notes'
  | 'servicesProvided'
  | 'contractReference'
  | 'acceptedAt'
  | 'suspendedAt'
  | 'terminatedAt'
  | 'createdAt'
  | 'updatedAt'
>;

@Table({
  tableName: 'supplier_relationships',
  indexes: [
    {
      name: 'unique_open_relationship_per_email',
      unique: true,
      fields: ['companyId', 'invitedEmail'],
      where: { status: { [Op.ne]: RelationshipStatus.TERMINATED } },
    },
    { fields: ['companyId', 'status'] },
    { fields: ['supplierId', 'status'] },
    { fields: ['invitedEmail', 'status'] },
  ],
})
export class Relationship
  extends Model<RelationshipAttributes, RelationshipCreationAttributes>
  implements RelationshipAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  companyId!: string;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: true })
  supplierId!: string | null;

  @Column({ type: DataType.STRING, allowNull: false })
  invitedEmail!: string;

  @Column({ type: DataType.UUID, allowNull: true })
  invitedById!: string | null;

  @Default(RelationshipStatus.PENDING)
  @Column({ type: DataType.STRING(20), allowNull: false })
  status!: RelationshipStatus;

  @Default(SupplierClassification.STANDARD)
  @Column({ type: DataType.STRING(20), allowNull: false })
  classification!: SupplierClassification;

  @Column({ type: DataType.TEXT, allowNull: true })
  notes!: string | null;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  servicesProvided!: string[];

  @Column({ type: DataType.STRING, allowNull: true })
  contractReference!: string | null;

  @Column({ type: DataType.DATE, allowNull: false })
  invitedAt!: Date;

  @Column({ type: DataType.DATE, allowNull: true })
  acceptedAt!: Date | null;

  @Column({ type: DataType.DATE, allowNull: true })
  suspendedAt!: Date | null;

  @Column({ type: DataType.DATE, allowNull: true })
  terminatedAt!: Date | null;

  @Default([])
  @Column({ type: DataType.JSONB, allowNull: false })
  statusHistory!: StatusHistoryEntry<RelationshipStatus>[];

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @BelongsTo(() => Organization, 'companyId')
  company?: Organization;

  @BelongsTo(() => Organization, 'supplierId')
  supplier?: Organization;
}
