import { Optional } from 'sequelize';
import { Column, DataType, Default, HasMany, Model, PrimaryKey, Table } from 'sequelize-typescript';
import { User } from '../../user/model/user.model';

export enum OrganizationType {
  COMPANY = 'company',
  SUPPLIER = 'supplier',
}

export interface OrganizationSettings {
  defaultDueDays: number;
  reminderDaysBefore: number;
  notificationsEnabled: boolean;
  defaultLanguage: string;
}

export const DEFAULT_ORGANIZATION_SETTINGS: OrganizationSettings = {
  defaultDueDays: 30,
  reminderDaysBefore: 7,
  notificationsEnabled: true,
  defaultLanguage: 'en',
};

export interface OrganizationAttributes {
  id: string;
  type: OrganizationType;
  name: string;
  slug: string;
  domain: string | null;
  contactEmail: string | null;
  settings: OrganizationSettings;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type OrganizationCreationAttributes = Optional<
  OrganizationAttributes,
  'id' | 'domain' | 'contactEmail' | 'settings' | 'deletedAt' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'organizations',
  indexes: [
    { name: 'organizations_slug_unique', unique: true, fields: ['slug'] },
    { fields: ['type'] },
  ],
})
export class Organization
  extends Model<OrganizationAttributes, OrganizationCreationAttributes>
  implements OrganizationAttributes
{
  @PrimaryKey
  @Default(DataType.UUIDV4)
  @Column(DataType.UUID)
  id!: string;

  @Column({ type: DataType.STRING(20), allowNull: false })
  type!: OrganizationType;

  @Column({ type: DataType.STRING(200), allowNull: false })
  name!: string;

  @Column({ type: DataType.STRING(100), allowNull: false })
  slug!: string;

  @Column({ type: DataType.STRING, allowNull: true })
  domain!: string | null;

  @Column({ type: DataType.STRING, allowNull: true })
  contactEmail!: string | null;

  @Default(DEFAULT_ORGANIZATION_SETTINGS)
  @Column({ type: DataType.JSONB, allowNull: false })
  settings!: OrganizationSettings;

  @Column({ type: DataType.DATE, allowNull: true })
  deletedAt!: Date | null;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  createdAt!: Date;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  updatedAt!: Date;

  @HasMany(() => User)
  users?: User[];
}

/** Upper bound for `reminderDaysBefore`; the reminder sweep looks no further ahead. */
export const MAX_REMINDER_DAYS_BEFORE = 60;

export const resolveSettings = (settings: Partial<OrganizationSettings> | null | undefined): OrganizationSettings => ({
  ...DEFAULT_ORGANIZATION_SETTINGS,
  ...(settings ?? {}),
});
