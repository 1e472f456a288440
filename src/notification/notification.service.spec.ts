/**
 * Due-date reminder sweep: window selection per company, claim-once
 * semantics and mail handling.
 */
import { Logger } from '@nestjs/common';
import { historyEntry } from '../common/types/status-history';
import { RelationshipAttributes, RelationshipStatus } from '../relationship/model/relationship.model';
import {
  RequirementAttributes,
  RequirementPriority,
  RequirementStatus,
  RequirementType,
} from '../requirement/model/requirement.model';
import { InMemoryModel } from '../testing/in-memory-model';
import { freezeTime } from '../testing/test-config';
import { NotificationService } from './notification.service';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date('2026-03-02T10:00:00.000Z');
const inDays = (days: number) => new Date(NOW.getTime() + days * 24 * 60 * 60 * 1000);

const seedRequirement = (
  store: InMemoryModel<RequirementAttributes>,
  overrides: Partial<RequirementAttributes>,
): RequirementAttributes =>
  store.seed({
    relationshipId: 'rel-1',
    companyId: 'company-1',
    supplierId: 'supplier-1',
    type: RequirementType.DOCUMENT,
    title: 'Insurance certificate',
    description: null,
    priority: RequirementPriority.MEDIUM,
    status: RequirementStatus.PENDING,
    dueDate: inDays(3),
    questionnaireId: null,
    passingScore: null,
    minimumGrade: null,
    maxReportAgeDays: null,
    assignedAt: NOW,
    assignedById: 'admin-1',
    submittedAt: null,
    reviewedAt: null,
    reminderSentAt: null,
    expiredAt: null,
    statusHistory: [historyEntry(null, RequirementStatus.PENDING, 'Requirement assigned', 'admin-1', NOW)],
    ...overrides,
  });

const seedRelationship = (
  store: InMemoryModel<RelationshipAttributes>,
  id: string,
  companyId: string,
  invitedEmail: string,
) =>
  store.seed({
    id,
    companyId,
    supplierId: 'supplier-1',
    invitedEmail,
    invitedById: 'admin-1',
    status: RelationshipStatus.ACTIVE,
    invitedAt: NOW,
    statusHistory: [],
  });

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

function makeOrganizationService() {
  return {
    findByIds: jest.fn().mockResolvedValue([
      { id: 'company-1', name: 'Acme Manufacturing', settings: { reminderDaysBefore: 7, notificationsEnabled: true } },
      { id: 'company-2', name: 'Globex', settings: { reminderDaysBefore: 14, notificationsEnabled: false } },
    ]),
  };
}

function makeMailService() {
  return { sendDueReminder: jest.fn().mockResolvedValue(undefined) };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('NotificationService.sendDueReminders', () => {
  let requirements: InMemoryModel<RequirementAttributes>;
  let relationships: InMemoryModel<RelationshipAttributes>;
  let mail: ReturnType<typeof makeMailService>;
  let service: NotificationService;

  const reminderSentAt = async (id: string) => (await requirements.findByPk(id))?.reminderSentAt;

  beforeEach(() => {
    freezeTime(NOW.toISOString());
    requirements = new InMemoryModel<RequirementAttributes>();
    relationships = new InMemoryModel<RelationshipAttributes>();
    seedRelationship(relationships, 'rel-1', 'company-1', 'contact@supplier.example');
    seedRelationship(relationships, 'rel-2', 'company-2', 'ops@vendor.example');
    mail = makeMailService();
    service = new NotificationService(
      requirements as any,
      relationships as any,
      makeOrganizationService() as any,
      mail as any,
    );
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('mails the supplier contact for requirements inside the company window', async () => {
    const due = seedRequirement(requirements, {});

    await expect(service.sendDueReminders(NOW)).resolves.toEqual({ claimed: 1, mailed: 1 });

    expect(mail.sendDueReminder).toHaveBeenCalledWith({
      to: 'contact@supplier.example',
      companyName: 'Acme Manufacturing',
      requirementTitle: 'Insurance certificate',
      dueDate: inDays(3),
      daysUntilDue: 3,
    });
    expect(await reminderSentAt(due.id)).toEqual(NOW);
  });

  it('skips requirements outside the window, already reminded, closed or past due', async () => {
    const later = seedRequirement(requirements, { dueDate: inDays(10) });
    seedRequirement(requirements, { reminderSentAt: inDays(-1) });
    const submitted = seedRequirement(requirements, { status: RequirementStatus.SUBMITTED });
    const overdue = seedRequirement(requirements, { dueDate: inDays(-1) });

    await expect(service.sendDueReminders(NOW)).resolves.toEqual({ claimed: 0, mailed: 0 });

    expect(mail.sendDueReminder).not.toHaveBeenCalled();
    expect(await reminderSentAt(later.id)).toBeNull();
    expect(await reminderSentAt(submitted.id)).toBeNull();
    expect(await reminderSentAt(overdue.id)).toBeNull();
  });

  it('reminds revision requests too', async () => {
    seedRequirement(requirements, { status: RequirementStatus.REVISION_REQUESTED });

    await expect(service.sendDueReminders(NOW)).resolves.toEqual({ claimed: 1, mailed: 1 });
  });

  it('claims without mailing when the company turned notifications off', async () => {
    const quiet = seedRequirement(requirements, {
      companyId: 'company-2',
      relationshipId: 'rel-2',
      dueDate: inDays(10),
    });

    await expect(service.sendDueReminders(NOW)).resolves.toEqual({ claimed: 1, mailed: 0 });

    expect(mail.sendDueReminder).not.toHaveBeenCalled();
    expect(await reminderSentAt(quiet.id)).toEqual(NOW);
  });

  it('keeps the claim when delivery fails', async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    mail.sendDueReminder.mockRejectedValueOnce(new Error('smtp down'));
    const due = seedRequirement(requirements, {});

    await expect(service.sendDueReminders(NOW)).resolves.toEqual({ claimed: 1, mailed: 0 });

    expect(await reminderSentAt(due.id)).toEqual(NOW);
  });

  it('reminds each requirement once across repeated and overlapping runs', async () => {
    seedRequirement(requirements, {});

    const [first, second] = await Promise.all([service.sendDueReminders(NOW), service.sendDueReminders(NOW)]);
    const third = await service.sendDueReminders(NOW);

    expect(first.claimed + second.claimed + third.claimed).toBe(1);
    expect(mail.sendDueReminder).toHaveBeenCalledTimes(1);
  });
});
