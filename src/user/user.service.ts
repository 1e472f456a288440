import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { DomainError } from '../common/errors/domain.error';
import { normalizeEmail } from '../common/utils/string.util';
import { isUserAvailable, User } from './model/user.model';

@Injectable()
export class UserService {
  constructor(
    @InjectModel(User)
    private readonly userModel: typeof User,
  ) {}

  async findById(id: string): Promise<User | null> {
    return this.userModel.findByPk(id);
  }

  /** Returns the user only while active and not soft-deleted. */
  async getAvailable(id: string): Promise<User> {
    const user = await this.userModel.findByPk(id);
    if (!isUserAvailable(user)) {
      throw DomainError.notFound('user');
    }
    return user;
  }

  async findActiveByEmail(email: string): Promise<User | null> {
    return this.userModel.findOne({
      where: { email: normalizeEmail(email), isActive: true, deletedAt: null },
    });
  }

  async listForOrganization(organizationId: string): Promise<User[]> {
    return this.userModel.findAll({
      where: { organizationId, deletedAt: null },
      order: [['createdAt', 'ASC']],
    });
  }

  async recordLogin(id: string, at: Date = new Date()): Promise<void> {
    await this.userModel.update({ lastLoginAt: at }, { where: { id } });
  }
}
