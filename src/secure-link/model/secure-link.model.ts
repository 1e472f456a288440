import { Optional } from 'sequelize';
import { Column, DataType, Default, Model, PrimaryKey, Table } from 'sequelize-typescript';

export enum SecureLinkType {
  AUTH = 'auth',
  INVITATION = 'invitation',
}

export interface SecureLinkAttributes {
  id: string;
  identifier: string;
  type: SecureLinkType;
  email: string;
  userId: string | null;
  organizationId: string | null;
  relationshipId: string | null;
  expiresAt: Date;
  isValid: boolean;
  usedAt: Date | null;
  ipAddress: string | null;
  userAgent: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type SecureLinkCreationAttributes = Optional<
  SecureLinkAttributes,
  | 'id'
  | 'userId'
  | 'organizationId'
  | 'relationshipId'
  | 'isValid'
  | 'usedAt'
  | 'ipAddress'
  | 'userAgent'
  | 'createdAt'
  | 'updatedAt'
>;

@Table({
  tableName: 'secure_links',
  indexes: [
    { name: 'secure_links_identifier_unique', unique: true, fields: ['identifier'] },
    { fields: ['email', 'type', 'isValid'] },
    { fields: ['email', 'createdAt'] },
    { fields: ['expiresAt'] },
  ],
})
export class SecureLink
  extends Model<SecureLinkAttributes, SecureLinkCreationAttributes>
  implements SecureLinkAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @Column({ type: DataType.STRING(64), allowNull: false })
  identifier!: string;

  @Column({ type: DataType.STRING(20), allowNull: false })
  type!: SecureLinkType;

  @Column({ type: DataType.STRING, allowNull: false })
  email!: string;

  @Column({ type: DataType.UUID, allowNull: true })
  userId!: string | null;

  @Column({ type: DataType.UUID, allowNull: true })
  organizationId!: string | null;

  @Column({ type: DataType.UUID, allowNull: true })
  relationshipId!: string | null;

  @Column({ type: DataType.DATE, allowNull: false })
  expiresAt!: Date;

  @Default(true)
  @Column({ type: DataType.BOOLEAN, allowNull: false })
  isValid!: boolean;

  @Column({ type: DataType.DATE, allowNull: true })
  usedAt!: Date | null;

  @Column({ type: DataType.STRING(64), allowNull: true })
  ipAddress!: string | null;

  @Column({ type: DataType.TEXT, allowNull: true })
  userAgent!: string | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;
}
