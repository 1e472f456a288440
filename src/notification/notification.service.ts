import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import dayjs from 'dayjs';
import { Op } from 'sequelize';
import { MAX_REMINDER_DAYS_BEFORE, resolveSettings } from '../organization/model/organization.model';
import { OrganizationService } from '../organization/organization.service';
import { Relationship } from '../relationship/model/relationship.model';
import { Requirement } from '../requirement/model/requirement.model';
import { daysUntilDue, REMINDABLE_STATUSES } from '../requirement/utils/requirement-rules.util';
import { MailService } from '../utils/mail.service';

export interface ReminderSweepResult {
  claimed: number;
  mailed: number;
}

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @InjectModel(Requirement)
    private readonly requirementModel: typeof Requirement,
    @InjectModel(Relationship)
    private readonly relationshipModel: typeof Relationship,
    private readonly organizationService: OrganizationService,
    private readonly mailService: MailService,
  ) {}

  /**
   * Reminds suppliers of requirements due within their company's reminder
   * window. A row is claimed by a conditional write before any mail goes out,
   * so each requirement is reminded at most once even with overlapping runs.
   */
  async sendDueReminders(now: Date = new Date()): Promise<ReminderSweepResult> {
    const horizon = dayjs(now).add(MAX_REMINDER_DAYS_BEFORE, 'day').toDate();
    const candidates = await this.requirementModel.findAll({
      where: {
        status: [...REMINDABLE_STATUSES],
        reminderSentAt: null,
        dueDate: { [Op.gte]: now, [Op.lte]: horizon },
      },
      order: [['dueDate', 'ASC']],
    });
    if (candidates.length === 0) {
      return { claimed: 0, mailed: 0 };
    }

    const companies = await this.organizationService.findByIds(candidates.map((r) => r.companyId));
    const companyById = new Map(companies.map((company) => [company.id, company]));
    const relationships = await this.relationshipModel.findAll({
      where: { id: [...new Set(candidates.map((r) => r.relationshipId))] },
    });
    const recipientByRelationship = new Map(relationships.map((r) => [r.id, r.invitedEmail]));

    const result: ReminderSweepResult = { claimed: 0, mailed: 0 };
    for (const requirement of candidates) {
      const company = companyById.get(requirement.companyId);
      const settings = resolveSettings(company?.settings);
      const windowEnd = dayjs(now).add(settings.reminderDaysBefore, 'day');
      if (requirement.dueDate === null || dayjs(requirement.dueDate).isAfter(windowEnd)) {
        continue;
      }

      const [affected] = await this.requirementModel.update(
        { reminderSentAt: now },
        { where: { id: requirement.id, reminderSentAt: null } },
      );
      if (affected === 0) continue;
      result.claimed += 1;

      if (!company || !settings.notificationsEnabled) continue;

      const to = recipientByRelationship.get(requirement.relationshipId);
      if (!to) {
        this.logger.warn(`No recipient for requirement ${requirement.id}; reminder skipped`);
        continue;
      }

      try {
        await this.mailService.sendDueReminder({
          to,
          companyName: company.name,
          requirementTitle: requirement.title,
          dueDate: requirement.dueDate,
          daysUntilDue: daysUntilDue(requirement, now) ?? 0,
        });
        result.mailed += 1;
      } catch (error) {
        this.logger.warn(
          `Failed to send reminder for requirement ${requirement.id}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }

    return result;
  }
}
