/**
 * QuestionnaireService against in-memory stores: authoring, the draft-only
 * edit window, publishing and archiving.
 */
import { DomainError, DomainErrorKind } from '../common/errors/domain.error';
import {
  QuestionnaireTemplateAttributes,
  TemplateCategory,
  TemplateVisibility,
} from '../questionnaire-template/model/questionnaire-template.model';
import { QuestionnaireTemplateService } from '../questionnaire-template/questionnaire-template.service';
import { InMemoryModel } from '../testing/in-memory-model';
import { freezeTime } from '../testing/test-config';
import { CreateQuestionDto } from './dto/questionnaire.dto';
import { QuestionAttributes, QuestionType } from './model/question.model';
import { QuestionnaireAttributes, QuestionnaireStatus, ScoringMode } from './model/questionnaire.model';
import { QuestionnaireService } from './questionnaire.service';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = '2026-03-02T10:00:00.000Z';
const COMPANY_ID = 'company-1';
const ACTOR = { userId: 'admin-1', email: 'admin@acme.example' };

const expectKind = async (promise: Promise<unknown>, kind: DomainErrorKind) => {
  await expect(promise).rejects.toBeInstanceOf(DomainError);
  await expect(promise).rejects.toMatchObject({ kind });
};

const singleChoice = (): CreateQuestionDto => ({
  text: 'Do you encrypt data at rest?',
  type: QuestionType.SINGLE_CHOICE,
  options: [
    { id: 'yes', text: 'Yes', points: 10, isCorrect: true },
    { id: 'no', text: 'No', points: 0 },
  ],
});

const multipleChoice = (): CreateQuestionDto => ({
  text: 'Which controls are in place?',
  type: QuestionType.MULTIPLE_CHOICE,
  options: [
    { id: 'mfa', text: 'MFA', points: 5, isCorrect: true },
    { id: 'sso', text: 'SSO', points: 5, isCorrect: true },
    { id: 'none', text: 'None', points: 3 },
  ],
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('QuestionnaireService', () => {
  let questionnaires: InMemoryModel<QuestionnaireAttributes>;
  let questions: InMemoryModel<QuestionAttributes>;
  let templates: InMemoryModel<QuestionnaireTemplateAttributes>;
  let audit: { log: jest.Mock };
  let service: QuestionnaireService;

  const createDraft = () =>
    service.create(COMPANY_ID, ACTOR, {
      name: ' Security baseline ',
      topics: [{ id: 'topic-sec', name: 'Security' }, { name: 'Privacy' }],
    });

  beforeEach(() => {
    freezeTime(NOW);
    questionnaires = new InMemoryModel<QuestionnaireAttributes>();
    questions = new InMemoryModel<QuestionAttributes>();
    templates = new InMemoryModel<QuestionnaireTemplateAttributes>();
    audit = { log: jest.fn().mockResolvedValue(undefined) };
    service = new QuestionnaireService(
      questionnaires as any,
      questions as any,
      audit as any,
      new QuestionnaireTemplateService(templates as any, audit as any),
    );
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  // ─── create ───────────────────────────────────────────────────────────────

  describe('create', () => {
    it('creates a draft with defaults and ordered topics', async () => {
      const questionnaire = await createDraft();

      expect(questionnaire.name).toBe('Security baseline');
      expect(questionnaire.status).toBe(QuestionnaireStatus.DRAFT);
      expect(questionnaire.scoringMode).toBe(ScoringMode.PERCENTAGE);
      expect(questionnaire.passingScore).toBe(70);
      expect(questionnaire.topics.map((t) => [t.name, t.order])).toEqual([
        ['Security', 0],
        ['Privacy', 1],
      ]);
      expect(questionnaire.topics[0].id).toBe('topic-sec');
      expect(audit.log).toHaveBeenCalledWith(expect.objectContaining({ action: 'create', resourceId: questionnaire.id }));
    });
  });

  // ─── createFromTemplate ───────────────────────────────────────────────────

  describe('createFromTemplate', () => {
    const seedTemplate = (overrides: Partial<QuestionnaireTemplateAttributes> = {}) =>
      templates.seed({
        name: 'Hosting baseline',
        description: 'Checks for hosting providers',
        category: TemplateCategory.CUSTOM,
        version: '1.0',
        isSystem: false,
        organizationId: 'company-2',
        createdById: 'admin-2',
        visibility: TemplateVisibility.GLOBAL,
        defaultPassingScore: 85,
        estimatedMinutes: 20,
        topics: [
          { id: 'backups', name: 'Backups', description: null, order: 0 },
          { id: 'patching', name: 'Patching', description: 'OS updates', order: 1 },
        ],
        tags: [],
        usageCount: 2,
        publishedAt: new Date(NOW),
        ...overrides,
      });

    it('copies the template topics and passing score into a new draft', async () => {
      const template = seedTemplate();

      const questionnaire = await service.createFromTemplate(COMPANY_ID, ACTOR, { templateId: template.id });

      expect(questionnaire.companyId).toBe(COMPANY_ID);
      expect(questionnaire.name).toBe('Hosting baseline');
      expect(questionnaire.description).toBe('Checks for hosting providers');
      expect(questionnaire.status).toBe(QuestionnaireStatus.DRAFT);
      expect(questionnaire.passingScore).toBe(85);
      expect(questionnaire.templateId).toBe(template.id);
      expect(questionnaire.topics.map((t) => [t.id, t.order])).toEqual([
        ['backups', 0],
        ['patching', 1],
      ]);
      expect(templates.all()[0].usageCount).toBe(3);
    });

    it('takes the name and description given by the caller', async () => {
      const template = seedTemplate();

      const questionnaire = await service.createFromTemplate(COMPANY_ID, ACTOR, {
        templateId: template.id,
        name: ' Hosting 2026 ',
        description: 'Annual review',
      });

      expect(questionnaire.name).toBe('Hosting 2026');
      expect(questionnaire.description).toBe('Annual review');
    });

    it("refuses another organization's local template", async () => {
      const template = seedTemplate({ visibility: TemplateVisibility.LOCAL });

      await expectKind(service.createFromTemplate(COMPANY_ID, ACTOR, { templateId: template.id }), DomainErrorKind.NOT_FOUND);
      expect(questionnaires.all()).toHaveLength(0);
      expect(templates.all()[0].usageCount).toBe(2);
    });
  });

  // ─── questions ────────────────────────────────────────────────────────────

  describe('questions', () => {
    it('appends questions in order and keeps the totals current', async () => {
      const draft = await createDraft();

      const first = await service.addQuestion(draft.id, COMPANY_ID, singleChoice());
      const second = await service.addQuestion(draft.id, COMPANY_ID, multipleChoice());

      expect([first.order, second.order]).toEqual([0, 1]);
      const stored = await service.get(draft.id, COMPANY_ID);
      expect(stored.questionCount).toBe(2);
      expect(stored.maxPossibleScore).toBe(20);
    });

    it('generates ids for options that have none and drops options from text questions', async () => {
      const draft = await createDraft();

      const choice = await service.addQuestion(draft.id, COMPANY_ID, {
        text: 'Pick one',
        type: QuestionType.YES_NO,
        options: [
          { text: 'Yes', points: 1, isCorrect: true },
          { text: 'No', points: 0 },
        ],
      });
      const text = await service.addQuestion(draft.id, COMPANY_ID, {
        text: 'Describe your backup policy',
        type: QuestionType.TEXT,
        options: [{ text: 'ignored', points: 4 }],
      });

      expect(choice.options.every((o) => o.id.length > 0)).toBe(true);
      expect(choice.options[1].isCorrect).toBe(false);
      expect(text.options).toEqual([]);
    });

    it.each([
      ['a single choice question with one option', { type: QuestionType.SINGLE_CHOICE, options: [{ text: 'A', points: 1 }] }],
      [
        'a yes/no question with three options',
        {
          type: QuestionType.YES_NO,
          options: [
            { text: 'Yes', points: 1 },
            { text: 'No', points: 0 },
            { text: 'Maybe', points: 0 },
          ],
        },
      ],
    ])('rejects %s', async (_label, shape) => {
      const draft = await createDraft();

      await expectKind(
        service.addQuestion(draft.id, COMPANY_ID, { text: 'Q', ...shape }),
        DomainErrorKind.VALIDATION_FAILED,
      );
    });

    it('rejects a question for a topic the questionnaire does not have', async () => {
      const draft = await createDraft();

      await expectKind(
        service.addQuestion(draft.id, COMPANY_ID, { ...singleChoice(), topicId: 'topic-missing' }),
        DomainErrorKind.VALIDATION_FAILED,
      );
    });

    it('updates and removes questions of a draft', async () => {
      const draft = await createDraft();
      const question = await service.addQuestion(draft.id, COMPANY_ID, singleChoice());

      const updated = await service.updateQuestion(draft.id, question.id, COMPANY_ID, {
        isMustPass: true,
        topicId: 'topic-sec',
      });
      expect(updated.isMustPass).toBe(true);
      expect(updated.topicId).toBe('topic-sec');
      expect(updated.options.map((o) => o.id)).toEqual(['yes', 'no']);

      await service.removeQuestion(draft.id, question.id, COMPANY_ID);
      expect(questions.all()).toHaveLength(0);
      expect((await service.get(draft.id, COMPANY_ID)).questionCount).toBe(0);
    });

    it('will not drop a topic that still has questions', async () => {
      const draft = await createDraft();
      await service.addQuestion(draft.id, COMPANY_ID, { ...singleChoice(), topicId: 'topic-sec' });

      await expectKind(
        service.update(draft.id, COMPANY_ID, { topics: [{ name: 'Privacy' }] }),
        DomainErrorKind.VALIDATION_FAILED,
      );
    });
  });

  // ─── publish / archive ────────────────────────────────────────────────────

  describe('publish / archive', () => {
    it('publishes a draft with questions and records the totals', async () => {
      const draft = await createDraft();
      await service.addQuestion(draft.id, COMPANY_ID, singleChoice());
      await service.addQuestion(draft.id, COMPANY_ID, { text: 'Explain', type: QuestionType.TEXT });

      const published = await service.publish(draft.id, COMPANY_ID, ACTOR);

      expect(published.status).toBe(QuestionnaireStatus.PUBLISHED);
      expect(published.publishedAt).toEqual(new Date(NOW));
      expect(published.questionCount).toBe(2);
      expect(published.maxPossibleScore).toBe(11);
      await expect(service.getPublished(draft.id, COMPANY_ID)).resolves.toMatchObject({ id: draft.id });
    });

    it('refuses to publish an empty questionnaire', async () => {
      const draft = await createDraft();

      await expectKind(service.publish(draft.id, COMPANY_ID, ACTOR), DomainErrorKind.VALIDATION_FAILED);
    });

    it('closes the edit window once published', async () => {
      const draft = await createDraft();
      const question = await service.addQuestion(draft.id, COMPANY_ID, singleChoice());
      await service.publish(draft.id, COMPANY_ID, ACTOR);

      await expectKind(service.update(draft.id, COMPANY_ID, { name: 'Renamed' }), DomainErrorKind.NOT_EDITABLE);
      await expectKind(service.addQuestion(draft.id, COMPANY_ID, singleChoice()), DomainErrorKind.NOT_EDITABLE);
      await expectKind(
        service.updateQuestion(draft.id, question.id, COMPANY_ID, { text: 'Changed' }),
        DomainErrorKind.NOT_EDITABLE,
      );
      await expectKind(service.removeQuestion(draft.id, question.id, COMPANY_ID), DomainErrorKind.NOT_EDITABLE);
      await expectKind(service.remove(draft.id, COMPANY_ID, ACTOR), DomainErrorKind.NOT_EDITABLE);
      await expectKind(service.publish(draft.id, COMPANY_ID, ACTOR), DomainErrorKind.INVALID_TRANSITION);
    });

    it('archives only published questionnaires', async () => {
      const draft = await createDraft();
      await expect(service.archive(draft.id, COMPANY_ID, ACTOR)).rejects.toMatchObject({
        kind: DomainErrorKind.INVALID_TRANSITION,
        message: 'cannot archive this questionnaire',
      });

      await service.addQuestion(draft.id, COMPANY_ID, singleChoice());
      await service.publish(draft.id, COMPANY_ID, ACTOR);
      const archived = await service.archive(draft.id, COMPANY_ID, ACTOR);

      expect(archived.status).toBe(QuestionnaireStatus.ARCHIVED);
      await expectKind(service.getPublished(draft.id, COMPANY_ID), DomainErrorKind.VALIDATION_FAILED);
    });

    it('deletes a draft together with its questions', async () => {
      const draft = await createDraft();
      await service.addQuestion(draft.id, COMPANY_ID, singleChoice());

      await service.remove(draft.id, COMPANY_ID, ACTOR);

      expect(questionnaires.all()).toHaveLength(0);
      expect(questions.all()).toHaveLength(0);
    });

    it('hides questionnaires of other companies', async () => {
      const draft = await createDraft();

      await expectKind(service.get(draft.id, 'company-2'), DomainErrorKind.NOT_FOUND);
    });
  });
});
