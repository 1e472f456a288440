/**
 * RequirementService against an in-memory store: assignment, the pending-only
 * edit window, guarded transitions, the expiry sweep and read models.
 */
import { DomainError, DomainErrorKind } from '../common/errors/domain.error';
import { historyEntry } from '../common/types/status-history';
import { RelationshipStatus } from '../relationship/model/relationship.model';
import { InMemoryModel } from '../testing/in-memory-model';
import { freezeTime } from '../testing/test-config';
import {
  DocumentGrade,
  RequirementAttributes,
  RequirementPriority,
  RequirementStatus,
  RequirementType,
} from './model/requirement.model';
import { EXPIRY_REASON, RequirementService } from './requirement.service';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = '2026-03-02T10:00:00.000Z';
const COMPANY_ID = 'company-1';
const SUPPLIER_ID = 'supplier-1';
const ACTOR = { userId: 'admin-1', email: 'admin@acme.example' };
const ASSIGNED_AT = new Date('2026-02-01T00:00:00.000Z');

const expectKind = async (promise: Promise<unknown>, kind: DomainErrorKind) => {
  await expect(promise).rejects.toBeInstanceOf(DomainError);
  await expect(promise).rejects.toMatchObject({ kind });
};

const seedRequirement = (
  store: InMemoryModel<RequirementAttributes>,
  overrides: Partial<RequirementAttributes> = {},
): RequirementAttributes =>
  store.seed({
    relationshipId: 'rel-1',
    companyId: COMPANY_ID,
    supplierId: SUPPLIER_ID,
    type: RequirementType.DOCUMENT,
    title: 'Penetration test report',
    description: null,
    priority: RequirementPriority.MEDIUM,
    status: RequirementStatus.PENDING,
    dueDate: new Date('2026-03-20T00:00:00.000Z'),
    questionnaireId: null,
    passingScore: null,
    minimumGrade: DocumentGrade.C,
    maxReportAgeDays: 90,
    assignedAt: ASSIGNED_AT,
    assignedById: 'admin-1',
    submittedAt: null,
    reviewedAt: null,
    reminderSentAt: null,
    expiredAt: null,
    statusHistory: [historyEntry(null, RequirementStatus.PENDING, 'Requirement assigned', 'admin-1', ASSIGNED_AT)],
    ...overrides,
  });

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

function makeRelationshipService() {
  return {
    get: jest.fn().mockResolvedValue({
      id: 'rel-1',
      companyId: COMPANY_ID,
      supplierId: SUPPLIER_ID,
      status: RelationshipStatus.ACTIVE,
    }),
  };
}

function makeQuestionnaireService() {
  return { getPublished: jest.fn().mockResolvedValue({ id: 'questionnaire-1', passingScore: 70 }) };
}

function makeOrganizationService() {
  return {
    getSettings: jest.fn().mockResolvedValue({
      defaultDueDays: 30,
      reminderDaysBefore: 7,
      notificationsEnabled: true,
      defaultLanguage: 'en',
    }),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RequirementService', () => {
  let requirements: InMemoryModel<RequirementAttributes>;
  let relationshipService: ReturnType<typeof makeRelationshipService>;
  let questionnaireService: ReturnType<typeof makeQuestionnaireService>;
  let audit: { log: jest.Mock };
  let service: RequirementService;

  const load = async (id: string) => {
    const requirement = await requirements.findByPk(id);
    if (!requirement) throw new Error(`missing requirement ${id}`);
    return requirement;
  };

  beforeEach(() => {
    freezeTime(NOW);
    requirements = new InMemoryModel<RequirementAttributes>();
    relationshipService = makeRelationshipService();
    questionnaireService = makeQuestionnaireService();
    audit = { log: jest.fn().mockResolvedValue(undefined) };
    service = new RequirementService(
      requirements as any,
      relationshipService as any,
      questionnaireService as any,
      makeOrganizationService() as any,
      audit as any,
    );
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  // ─── create ───────────────────────────────────────────────────────────────

  describe('create', () => {
    it('assigns a questionnaire requirement with inherited passing score and default due date', async () => {
      const requirement = await service.create(COMPANY_ID, ACTOR, {
        relationshipId: 'rel-1',
        type: RequirementType.QUESTIONNAIRE,
        title: ' Security questionnaire ',
        questionnaireId: 'questionnaire-1',
      });

      expect(requirement).toMatchObject({
        companyId: COMPANY_ID,
        supplierId: SUPPLIER_ID,
        title: 'Security questionnaire',
        status: RequirementStatus.PENDING,
        priority: RequirementPriority.MEDIUM,
        questionnaireId: 'questionnaire-1',
        passingScore: 70,
        minimumGrade: null,
        maxReportAgeDays: null,
      });
      expect(requirement.dueDate).toEqual(new Date('2026-04-01T10:00:00.000Z'));
      expect(requirement.statusHistory).toEqual([
        { from: null, to: 'pending', reason: 'Requirement assigned', changedById: 'admin-1', changedAt: NOW },
      ]);
      expect(questionnaireService.getPublished).toHaveBeenCalledWith('questionnaire-1', COMPANY_ID);
    });

    it('keeps an explicit passing score and due date', async () => {
      const requirement = await service.create(COMPANY_ID, ACTOR, {
        relationshipId: 'rel-1',
        type: RequirementType.QUESTIONNAIRE,
        title: 'Privacy review',
        questionnaireId: 'questionnaire-1',
        passingScore: 85,
        dueDate: new Date('2026-03-15T00:00:00.000Z'),
      });

      expect(requirement.passingScore).toBe(85);
      expect(requirement.dueDate).toEqual(new Date('2026-03-15T00:00:00.000Z'));
    });

    it('defaults the document constraints', async () => {
      const requirement = await service.create(COMPANY_ID, ACTOR, {
        relationshipId: 'rel-1',
        type: RequirementType.DOCUMENT,
        title: 'External scan report',
      });

      expect(requirement.minimumGrade).toBe(DocumentGrade.C);
      expect(requirement.maxReportAgeDays).toBe(90);
      expect(requirement.questionnaireId).toBeNull();
      expect(questionnaireService.getPublished).not.toHaveBeenCalled();
    });

    it('requires a questionnaire id for questionnaire requirements', async () => {
      await expectKind(
        service.create(COMPANY_ID, ACTOR, {
          relationshipId: 'rel-1',
          type: RequirementType.QUESTIONNAIRE,
          title: 'Missing questionnaire',
        }),
        DomainErrorKind.VALIDATION_FAILED,
      );
    });

    it.each([
      ['suspended', { status: RelationshipStatus.SUSPENDED, supplierId: SUPPLIER_ID }],
      ['pending', { status: RelationshipStatus.PENDING, supplierId: null }],
    ])('refuses a %s relationship', async (_label, state) => {
      relationshipService.get.mockResolvedValueOnce({ id: 'rel-1', companyId: COMPANY_ID, ...state });

      const attempt = service.create(COMPANY_ID, ACTOR, {
        relationshipId: 'rel-1',
        type: RequirementType.DOCUMENT,
        title: 'Scan',
      });

      await expect(attempt).rejects.toMatchObject({
        kind: DomainErrorKind.INVALID_TRANSITION,
        message: 'cannot assign requirements to this relationship',
      });
      expect(requirements.all()).toHaveLength(0);
    });
  });

  // ─── update ───────────────────────────────────────────────────────────────

  describe('update', () => {
    it('edits a pending requirement and ignores constraints of the other type', async () => {
      const seeded = seedRequirement(requirements);

      const updated = await service.update(seeded.id, COMPANY_ID, {
        title: 'Updated title',
        priority: RequirementPriority.HIGH,
        minimumGrade: DocumentGrade.B,
        passingScore: 90,
      });

      expect(updated.title).toBe('Updated title');
      expect(updated.priority).toBe(RequirementPriority.HIGH);
      expect(updated.minimumGrade).toBe(DocumentGrade.B);
      expect(updated.passingScore).toBeNull();
    });

    it.each([
      RequirementStatus.IN_PROGRESS,
      RequirementStatus.SUBMITTED,
      RequirementStatus.APPROVED,
      RequirementStatus.EXPIRED,
    ])('rejects edits once %s', async (status) => {
      const seeded = seedRequirement(requirements, { status });

      await expectKind(service.update(seeded.id, COMPANY_ID, { title: 'Too late' }), DomainErrorKind.NOT_EDITABLE);
      expect((await load(seeded.id)).title).toBe('Penetration test report');
    });
  });

  // ─── transition ───────────────────────────────────────────────────────────

  describe('transition', () => {
    it('appends one history entry and stamps submission time', async () => {
      const seeded = seedRequirement(requirements);

      const pending = await load(seeded.id);
      const started = await service.transition(pending, RequirementStatus.IN_PROGRESS, 'Response started', 'sup-user');
      const submitted = await service.transition(
        started,
        RequirementStatus.SUBMITTED,
        'Response submitted',
        'sup-user',
      );

      expect(submitted.status).toBe(RequirementStatus.SUBMITTED);
      expect(submitted.submittedAt).toEqual(new Date(NOW));
      expect(submitted.statusHistory.slice(1)).toEqual([
        { from: 'pending', to: 'in_progress', reason: 'Response started', changedById: 'sup-user', changedAt: NOW },
        { from: 'in_progress', to: 'submitted', reason: 'Response submitted', changedById: 'sup-user', changedAt: NOW },
      ]);
    });

    it('stamps the review time on a review outcome', async () => {
      const seeded = seedRequirement(requirements, { status: RequirementStatus.SUBMITTED });

      const approved = await service.transition(await load(seeded.id), RequirementStatus.APPROVED, null, 'admin-1');

      expect(approved.reviewedAt).toEqual(new Date(NOW));
    });

    it('rejects moves outside the table', async () => {
      const seeded = seedRequirement(requirements);

      await expect(
        service.transition(await load(seeded.id), RequirementStatus.SUBMITTED, null, 'x'),
      ).rejects.toMatchObject({ kind: DomainErrorKind.INVALID_TRANSITION, message: 'cannot submit this requirement' });
      await expectKind(
        service.transition(await load(seeded.id), RequirementStatus.APPROVED, null, 'x'),
        DomainErrorKind.INVALID_TRANSITION,
      );
    });

    it('never expires on request', async () => {
      const seeded = seedRequirement(requirements);

      await expectKind(
        service.transition(await load(seeded.id), RequirementStatus.EXPIRED, null, 'admin-1'),
        DomainErrorKind.INVALID_TRANSITION,
      );
      expect((await load(seeded.id)).status).toBe(RequirementStatus.PENDING);
    });

    it('fails when the status changed after it was read', async () => {
      const seeded = seedRequirement(requirements);
      const stale = await load(seeded.id);
      await service.transition(stale, RequirementStatus.IN_PROGRESS, null, 'a');

      await expect(service.transition(stale, RequirementStatus.IN_PROGRESS, null, 'b')).rejects.toMatchObject({
        kind: DomainErrorKind.INVALID_TRANSITION,
        message: 'cannot start this requirement',
      });
      expect((await load(seeded.id)).statusHistory).toHaveLength(2);
    });
  });

  // ─── expiry sweep ─────────────────────────────────────────────────────────

  describe('expireOverdue', () => {
    const past = new Date('2026-03-01T00:00:00.000Z');

    it('expires open requirements past due and nothing else', async () => {
      const pending = seedRequirement(requirements, { dueDate: past });
      const inProgress = seedRequirement(requirements, { dueDate: past, status: RequirementStatus.IN_PROGRESS });
      const submitted = seedRequirement(requirements, { dueDate: past, status: RequirementStatus.SUBMITTED });
      const future = seedRequirement(requirements);
      const undated = seedRequirement(requirements, { dueDate: null });

      await expect(service.expireOverdue(new Date(NOW))).resolves.toBe(2);

      expect((await load(pending.id)).status).toBe(RequirementStatus.EXPIRED);
      expect((await load(inProgress.id)).status).toBe(RequirementStatus.EXPIRED);
      expect((await load(submitted.id)).status).toBe(RequirementStatus.SUBMITTED);
      expect((await load(future.id)).status).toBe(RequirementStatus.PENDING);
      expect((await load(undated.id)).status).toBe(RequirementStatus.PENDING);
    });

    it('records the sweep as the actor-less cause', async () => {
      const pending = seedRequirement(requirements, { dueDate: past });

      await service.expireOverdue(new Date(NOW));

      const expired = await load(pending.id);
      expect(expired.expiredAt).toEqual(new Date(NOW));
      expect(expired.statusHistory[expired.statusHistory.length - 1]).toEqual({
        from: 'pending',
        to: 'expired',
        reason: EXPIRY_REASON,
        changedById: null,
        changedAt: NOW,
      });
      expect(audit.log).toHaveBeenCalledWith(
        expect.objectContaining({ action: 'expire', resourceId: pending.id, organizationId: COMPANY_ID }),
      );
    });

    it('changes nothing on a second run', async () => {
      const pending = seedRequirement(requirements, { dueDate: past });
      await service.expireOverdue(new Date(NOW));
      const afterFirst = await load(pending.id);

      await expect(service.expireOverdue(new Date(NOW))).resolves.toBe(0);

      expect(await load(pending.id)).toEqual(afterFirst);
    });
  });

  // ─── reads ────────────────────────────────────────────────────────────────

  describe('reads', () => {
    it('adds overdue flags to listed requirements', async () => {
      seedRequirement(requirements, { dueDate: new Date('2026-02-27T10:00:00.000Z') });
      seedRequirement(requirements, { status: RequirementStatus.APPROVED });

      const page = await service.listForCompany(COMPANY_ID, { overdue: true });

      expect(page.total).toBe(1);
      expect(page.data[0].isOverdue).toBe(true);
      expect(page.data[0].daysUntilDue).toBe(-3);
    });

    it('lists only the supplier\'s own requirements', async () => {
      seedRequirement(requirements);
      seedRequirement(requirements, { supplierId: 'supplier-2' });

      const page = await service.listForSupplier(SUPPLIER_ID);

      expect(page.total).toBe(1);
      expect(page.data[0].supplierId).toBe(SUPPLIER_ID);
    });

    it('hides requirements from other companies and suppliers', async () => {
      const seeded = seedRequirement(requirements);

      await expectKind(service.get(seeded.id, 'company-2'), DomainErrorKind.NOT_FOUND);
      await expectKind(service.getForSupplier(seeded.id, 'supplier-2'), DomainErrorKind.NOT_FOUND);
    });

    it('sorts by due date on request and ignores priority as a sort key', async () => {
      const query = jest.spyOn(requirements, 'findAndCountAll');

      await service.listForCompany(COMPANY_ID, {}, { sortBy: 'dueDate', sortOrder: 'ASC' });
      await service.listForCompany(COMPANY_ID, {}, { sortBy: 'priority', sortOrder: 'ASC' });

      expect(query.mock.calls.map(([options]) => options?.order)).toEqual([
        [
          ['dueDate', 'ASC'],
          ['id', 'ASC'],
        ],
        [
          ['createdAt', 'ASC'],
          ['id', 'ASC'],
        ],
      ]);
    });

    it('counts statuses and overdue work', async () => {
      seedRequirement(requirements, { dueDate: new Date('2026-03-01T00:00:00.000Z') });
      seedRequirement(requirements, { status: RequirementStatus.IN_PROGRESS });
      seedRequirement(requirements, { status: RequirementStatus.REVISION_REQUESTED });
      seedRequirement(requirements, { status: RequirementStatus.APPROVED });
      seedRequirement(requirements, { companyId: 'company-2' });

      await expect(service.getStats(COMPANY_ID)).resolves.toEqual({
        total: 4,
        pending: 1,
        inProgress: 1,
        submitted: 0,
        approved: 1,
        rejected: 0,
        revisionRequested: 1,
        expired: 0,
        overdue: 1,
      });
    });
  });
});
