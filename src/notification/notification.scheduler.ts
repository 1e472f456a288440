import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { RequirementService } from '../requirement/requirement.service';
import { SecureLinkService } from '../secure-link/secure-link.service';
import { NotificationService, ReminderSweepResult } from './notification.service';

const errorText = (error: unknown) => (error instanceof Error ? error.stack ?? error.message : String(error));

@Injectable()
export class NotificationScheduler {
  private readonly logger = new Logger(NotificationScheduler.name);

  constructor(
    private readonly requirementService: RequirementService,
    private readonly notificationService: NotificationService,
    private readonly secureLinkService: SecureLinkService,
  ) {
    this.logger.log('✅ NotificationScheduler initialized - expiry, reminder and link cleanup jobs active');
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleExpireOverdueRequirements() {
    this.logger.log('🔄 Running scheduled job: Expire overdue requirements');
    try {
      const expired = await this.triggerExpireOverdue();
      this.logger.log(`✅ Expired ${expired} overdue requirement(s)`);
    } catch (error) {
      this.logger.error('❌ Error in scheduled expiry job', errorText(error));
    }
  }

  @Cron(CronExpression.EVERY_DAY_AT_9AM)
  async handleDueReminders() {
    this.logger.log('🔄 Running scheduled job: Due date reminders');
    try {
      const { claimed, mailed } = await this.triggerDueReminders();
      this.logger.log(`✅ Claimed ${claimed} reminder(s), mailed ${mailed}`);
    } catch (error) {
      this.logger.error('❌ Error in scheduled reminder job', errorText(error));
    }
  }

  @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT)
  async handleSecureLinkCleanup() {
    this.logger.log('🔄 Running scheduled job: Delete expired secure links');
    try {
      const deleted = await this.triggerSecureLinkCleanup();
      this.logger.log(`✅ Deleted ${deleted} expired secure link(s)`);
    } catch (error) {
      this.logger.error('❌ Error in scheduled secure link cleanup', errorText(error));
    }
  }

  // Manual triggers, also used by the tests.

  async triggerExpireOverdue(now: Date = new Date()): Promise<number> {
    return this.requirementService.expireOverdue(now);
  }

  async triggerDueReminders(now: Date = new Date()): Promise<ReminderSweepResult> {
    return this.notificationService.sendDueReminders(now);
  }

  async triggerSecureLinkCleanup(now: Date = new Date()): Promise<number> {
    return this.secureLinkService.deleteExpired(now);
  }
}
