import * as nodemailer from 'nodemailer';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { escapeHtml } from '../common/utils/string.util';

export interface InvitationMail {
  to: string;
  companyName: string;
  url: string;
  expiresAt: Date;
}

export interface ReminderMail {
  to: string;
  companyName: string;
  requirementTitle: string;
  dueDate: Date;
  daysUntilDue: number;
}

export type ReviewOutcome = 'approved' | 'rejected' | 'revision_requested';

export interface ReviewOutcomeMail {
  to: string;
  companyName: string;
  requirementTitle: string;
  outcome: ReviewOutcome;
  reason?: string | null;
}

const OUTCOME_LABELS: Record<ReviewOutcome, string> = {
  approved: 'approved',
  rejected: 'rejected',
  revision_requested: 'returned for revision',
};

@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);
  private readonly transporter: nodemailer.Transporter;
  private readonly appName: string;
  private readonly from: string;
  private readonly jsonTransport: boolean;

  constructor(configService: ConfigService<EnvironmentVariables, true>) {
    const host = configService.get('NODEMAILER_HOST', { infer: true });
    this.appName = configService.get('APP_NAME', { infer: true });
    this.from = configService.get('NODEMAILER_FROM', { infer: true });
    this.jsonTransport = !host;

    // Without an SMTP host, messages are rendered to JSON and logged.
    this.transporter = host
      ? nodemailer.createTransport({
          host,
          port: configService.get('NODEMAILER_PORT', { infer: true }),
          auth: {
            user: configService.get('NODEMAILER_USERNAME', { infer: true }),
            pass: configService.get('NODEMAILER_PASSWORD', { infer: true }),
          },
        })
      : nodemailer.createTransport({ jsonTransport: true });
  }

  private layout(title: string, body: string): string {
    return `
        <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
          <h2 style="color: #333;">${title}</h2>
          ${body}
          <hr style="border: none; border-top: 1px solid #eee; margin: 20px 0;">
          <p style="font-size: 12px; color: #777;">© ${new Date().getFullYear()} ${escapeHtml(this.appName)}. All rights reserved.</p>
        </div>
      `;
  }

  private button(url: string, label: string): string {
    return `
          <div style="text-align: center; margin: 24px 0;">
            <a href="${escapeHtml(url)}" style="background: #2c3e50; color: #fff; padding: 12px 24px; text-decoration: none; border-radius: 4px;">${label}</a>
          </div>
          <p style="font-size: 12px; color: #777;">If the button does not work, copy this link into your browser:<br>${escapeHtml(url)}</p>`;
  }

  private async send(to: string, subject: string, html: string): Promise<void> {
    const info = await this.transporter.sendMail({
      from: `"${this.appName}" <${this.from}>`,
      to,
      subject,
      html,
    });

    if (this.jsonTransport) {
      this.logger.log(`Mail transport not configured; rendered "${subject}" for ${to}`);
      this.logger.debug(String(info.message));
    }
  }

  async sendMagicLink(email: string, url: string, expiresInMinutes: number): Promise<void> {
    await this.send(
      email,
      `Your ${this.appName} sign-in link`,
      this.layout(
        'Sign in',
        `<p>Use the button below to sign in. The link can be used once.</p>
          ${this.button(url, 'Sign in')}
          <p>This link is valid for ${expiresInMinutes} minutes.</p>
          <p>If you didn't request this, please ignore this email.</p>`,
      ),
    );
  }

  async sendSupplierInvitation(mail: InvitationMail): Promise<void> {
    const company = escapeHtml(mail.companyName);
    await this.send(
      mail.to,
      `${mail.companyName} invited you to ${this.appName}`,
      this.layout(
        `${company} invited you as a supplier`,
        `<p>${company} would like to manage supplier compliance with you on ${escapeHtml(this.appName)}.</p>
          ${this.button(mail.url, 'View invitation')}
          <p>This invitation expires on ${mail.expiresAt.toUTCString()}.</p>`,
      ),
    );
  }

  async sendDueReminder(mail: ReminderMail): Promise<void> {
    const dayText = mail.daysUntilDue === 1 ? '1 day' : `${mail.daysUntilDue} days`;
    await this.send(
      mail.to,
      `Reminder: "${mail.requirementTitle}" is due in ${dayText}`,
      this.layout(
        'Compliance requirement due soon',
        `<p>${escapeHtml(mail.companyName)} is waiting for your response to
          <strong>${escapeHtml(mail.requirementTitle)}</strong>.</p>
          <p>Due date: ${mail.dueDate.toUTCString()} (${dayText} left).</p>`,
      ),
    );
  }

  async sendReviewOutcome(mail: ReviewOutcomeMail): Promise<void> {
    const label = OUTCOME_LABELS[mail.outcome];
    await this.send(
      mail.to,
      `"${mail.requirementTitle}" was ${label}`,
      this.layout(
        `Your response was ${label}`,
        `<p>${escapeHtml(mail.companyName)} reviewed your response to
          <strong>${escapeHtml(mail.requirementTitle)}</strong>.</p>
          ${mail.reason ? `<p><strong>Reviewer notes:</strong> ${escapeHtml(mail.reason)}</p>` : ''}`,
      ),
    );
  }
}
