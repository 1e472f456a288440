import { QuestionAttributes, QuestionType } from '../../questionnaire/model/question.model';
import { QuestionnaireTopic } from '../../questionnaire/model/questionnaire.model';
import { maxPointsForQuestion } from '../../questionnaire/utils/question-points.util';

export interface AnswerInput {
  questionId: string;
  selectedOptionIds: string[];
  textAnswer: string | null;
}

export interface ScoredAnswer extends AnswerInput {
  pointsEarned: number;
  maxPoints: number;
  /** Set only for must-pass questions. */
  isMustPassMet: boolean | null;
}

export interface TopicScore {
  topicId: string;
  topicName: string;
  score: number;
  maxScore: number;
  percentage: number;
}

export interface ScoreResult {
  answers: ScoredAnswer[];
  topicScores: TopicScore[];
  totalScore: number;
  maxPossibleScore: number;
  percentageScore: number;
  mustPassFailed: boolean;
  passed: boolean;
}

type ScorableQuestion = Pick<QuestionAttributes, 'id' | 'type' | 'options' | 'isMustPass' | 'topicId'>;

export const percentageOf = (score: number, max: number): number => (max > 0 ? (score / max) * 100 : 0);

export const pointsForAnswer = (
  question: Pick<QuestionAttributes, 'type' | 'options'>,
  answer: Pick<AnswerInput, 'selectedOptionIds' | 'textAnswer'> | undefined,
): number => {
  if (!answer) return 0;

  switch (question.type) {
    case QuestionType.TEXT:
      return answer.textAnswer && answer.textAnswer.trim() !== '' ? maxPointsForQuestion(question) : 0;
    case QuestionType.SINGLE_CHOICE:
    case QuestionType.YES_NO: {
      if (answer.selectedOptionIds.length !== 1) return 0;
      const selected = question.options.find((o) => o.id === answer.selectedOptionIds[0]);
      return selected?.points ?? 0;
    }
    case QuestionType.MULTIPLE_CHOICE: {
      const selected = new Set(answer.selectedOptionIds);
      return question.options
        .filter((o) => o.isCorrect && selected.has(o.id))
        .reduce((sum, o) => sum + o.points, 0);
    }
  }
};

export const isPassing = (percentageScore: number, passingScore: number, mustPassFailed: boolean): boolean =>
  percentageScore >= passingScore && !mustPassFailed;

/**
 * Scores a set of answers against every question of a questionnaire.
 * Unanswered questions earn nothing but still count toward the maximum, and
 * an unanswered must-pass question is unmet.
 */
export const scoreAnswers = (
  questions: readonly ScorableQuestion[],
  topics: readonly QuestionnaireTopic[],
  answers: readonly AnswerInput[],
  passingScore: number,
): ScoreResult => {
  const answerByQuestion = new Map(answers.map((a) => [a.questionId, a]));
  const totalsByTopic = new Map<string, { score: number; maxScore: number }>();

  const scored = questions.map((question): ScoredAnswer => {
    const answer = answerByQuestion.get(question.id);
    const maxPoints = maxPointsForQuestion(question);
    const pointsEarned = pointsForAnswer(question, answer);

    if (question.topicId) {
      const totals = totalsByTopic.get(question.topicId) ?? { score: 0, maxScore: 0 };
      totals.score += pointsEarned;
      totals.maxScore += maxPoints;
      totalsByTopic.set(question.topicId, totals);
    }

    return {
      questionId: question.id,
      selectedOptionIds: answer?.selectedOptionIds ?? [],
      textAnswer: answer?.textAnswer ?? null,
      pointsEarned,
      maxPoints,
      isMustPassMet: question.isMustPass ? pointsEarned >= maxPoints : null,
    };
  });

  const topicScores = [...topics]
    .sort((a, b) => a.order - b.order)
    .flatMap((topic): TopicScore[] => {
      const totals = totalsByTopic.get(topic.id);
      if (!totals || totals.maxScore === 0) return [];
      return [
        {
          topicId: topic.id,
          topicName: topic.name,
          score: totals.score,
          maxScore: totals.maxScore,
          percentage: percentageOf(totals.score, totals.maxScore),
        },
      ];
    });

  const totalScore = scored.reduce((sum, a) => sum + a.pointsEarned, 0);
  const maxPossibleScore = scored.reduce((sum, a) => sum + a.maxPoints, 0);
  const percentageScore = percentageOf(totalScore, maxPossibleScore);
  const mustPassFailed = scored.some((a) => a.isMustPassMet === false);

  return {
    answers: scored,
    topicScores,
    totalScore,
    maxPossibleScore,
    percentageScore,
    mustPassFailed,
    passed: isPassing(percentageScore, passingScore, mustPassFailed),
  };
};

/** Upserts answers by question id; later entries replace earlier ones. */
export const mergeAnswers = <T extends AnswerInput>(existing: readonly T[], updates: readonly T[]): T[] => {
  const merged = new Map<string, T>();
  existing.forEach((answer) => merged.set(answer.questionId, answer));
  updates.forEach((answer) => merged.set(answer.questionId, answer));
  return [...merged.values()];
};
