import { DocumentGrade, RequirementStatus } from '../model/requirement.model';
import {
  canTransitionRequirement,
  daysUntilDue,
  isOverdue,
  meetsMinimumGrade,
} from './requirement-rules.util';

const NOW = new Date('2026-03-02T10:00:00.000Z');
const ALL = Object.values(RequirementStatus);

describe('requirement rules', () => {
  // ─── transitions ──────────────────────────────────────────────────────────

  describe('transitions', () => {
    it('allows exactly the documented moves', () => {
      const allowed = ALL.flatMap((from) =>
        ALL.filter((to) => canTransitionRequirement(from, to)).map((to) => `${from}->${to}`),
      );

      expect(allowed.sort()).toEqual(
        [
          'in_progress->expired',
          'in_progress->submitted',
          'pending->expired',
          'pending->in_progress',
          'revision_requested->in_progress',
          'submitted->approved',
          'submitted->rejected',
          'submitted->revision_requested',
        ].sort(),
      );
    });
  });

  // ─── due dates ────────────────────────────────────────────────────────────

  describe('daysUntilDue', () => {
    it('truncates toward zero on both sides of the due date', () => {
      expect(daysUntilDue({ dueDate: new Date('2026-03-05T09:00:00.000Z') }, NOW)).toBe(2);
      expect(daysUntilDue({ dueDate: new Date('2026-03-01T09:00:00.000Z') }, NOW)).toBe(-1);
      expect(daysUntilDue({ dueDate: new Date('2026-03-02T04:00:00.000Z') }, NOW)).toBe(0);
    });

    it('is null without a due date', () => {
      expect(daysUntilDue({ dueDate: null }, NOW)).toBeNull();
    });
  });

  describe('isOverdue', () => {
    const past = new Date('2026-03-01T00:00:00.000Z');

    it('flags open requirements past their due date', () => {
      expect(isOverdue({ status: RequirementStatus.PENDING, dueDate: past }, NOW)).toBe(true);
      expect(isOverdue({ status: RequirementStatus.IN_PROGRESS, dueDate: past }, NOW)).toBe(true);
    });

    it('ignores submitted work, future dates and missing dates', () => {
      expect(isOverdue({ status: RequirementStatus.SUBMITTED, dueDate: past }, NOW)).toBe(false);
      expect(isOverdue({ status: RequirementStatus.PENDING, dueDate: new Date('2026-03-03T00:00:00.000Z') }, NOW)).toBe(
        false,
      );
      expect(isOverdue({ status: RequirementStatus.PENDING, dueDate: null }, NOW)).toBe(false);
    });
  });

  // ─── grades ───────────────────────────────────────────────────────────────

  describe('meetsMinimumGrade', () => {
    it.each([
      [DocumentGrade.A, DocumentGrade.C, true],
      [DocumentGrade.C, DocumentGrade.C, true],
      [DocumentGrade.D, DocumentGrade.C, false],
      [DocumentGrade.F, DocumentGrade.E, false],
    ])('%s against minimum %s -> %p', (grade, minimum, expected) => {
      expect(meetsMinimumGrade(grade, minimum)).toBe(expected);
    });
  });
});
