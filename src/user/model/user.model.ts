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

export enum UserRole {
  ADMIN = 'admin',
  VIEWER = 'viewer',
}

export interface UserAttributes {
  id: string;
  email: string;
  name: string | null;
  organizationId: string;
  role: UserRole;
  isActive: boolean;
  lastLoginAt: Date | null;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type UserCreationAttributes = Optional<
  UserAttributes,
  'id' | 'name' | 'role' | 'isActive' | 'lastLoginAt' | 'deletedAt' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'users',
  indexes: [
    { name: 'users_email_unique', unique: true, fields: ['email'] },
    { fields: ['organizationId'] },
  ],
})
export class User extends Model<UserAttributes, UserCreationAttributes> implements UserAttributes {
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @Column({ type: DataType.STRING, allowNull: false })
  email!: string;

  @Column({ type: DataType.STRING, allowNull: true })
  name!: string | null;

  @ForeignKey(() => Organization)
  @Column({ type: DataType.UUID, allowNull: false })
  organizationId!: string;

  @Default(UserRole.VIEWER)
  @Column({ type: DataType.STRING(20), allowNull: false })
  role!: UserRole;

  @Default(true)
  @Column({ type: DataType.BOOLEAN, allowNull: false })
  isActive!: boolean;

  @Column({ type: DataType.DATE, allowNull: true })
  lastLoginAt!: Date | null;

  @Column({ type: DataType.DATE, allowNull: true })
  deletedAt!: Date | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @BelongsTo(() => Organization)
  organization?: Organization;
}

// Active means enabled and not soft-deleted.
export const isUserAvailable = <T extends Pick<UserAttributes, 'isActive' | 'deletedAt'>>(
  user: T | null,
): user is T => user !== null && user.isActive && user.deletedAt === null;
