import { QuestionAttributes, QuestionType } from '../model/question.model';

type ScorableQuestion = Pick<QuestionAttributes, 'type' | 'options'>;

export const isChoiceQuestion = (type: QuestionType): boolean => type !== QuestionType.TEXT;

/**
 * Highest score a question can contribute. Choice questions never count for
 * less than one point, so a question whose options are all worth zero still
 * carries weight.
 */
export const maxPointsForQuestion = (question: ScorableQuestion): number => {
  switch (question.type) {
    case QuestionType.TEXT:
      return 1;
    case QuestionType.MULTIPLE_CHOICE: {
      const total = question.options
        .filter((o) => o.isCorrect && o.points > 0)
        .reduce((sum, o) => sum + o.points, 0);
      return Math.max(total, 1);
    }
    case QuestionType.SINGLE_CHOICE:
    case QuestionType.YES_NO: {
      const best = question.options.reduce((max, o) => Math.max(max, o.points), 0);
      return Math.max(best, 1);
    }
  }
};

export const maxPossibleScore = (questions: readonly ScorableQuestion[]): number =>
  questions.reduce((sum, question) => sum + maxPointsForQuestion(question), 0);

/** Returns the validation message for a bad option set, or null when valid. */
export const optionsProblem = (type: QuestionType, optionCount: number): string | null => {
  if (type === QuestionType.TEXT) return null;
  if (type === QuestionType.YES_NO) {
    return optionCount === 2 ? null : 'yes/no questions need exactly 2 options';
  }
  return optionCount >= 2 ? null : 'choice questions need at least 2 options';
};
