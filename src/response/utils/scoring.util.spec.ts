import { QuestionAttributes, QuestionOption, QuestionType } from '../../questionnaire/model/question.model';
import { QuestionnaireTopic } from '../../questionnaire/model/questionnaire.model';
import { AnswerInput, mergeAnswers, percentageOf, pointsForAnswer, scoreAnswers } from './scoring.util';

type TestQuestion = Pick<QuestionAttributes, 'id' | 'type' | 'options' | 'isMustPass' | 'topicId'>;

const option = (id: string, points: number, isCorrect = false): QuestionOption => ({
  id,
  text: id,
  points,
  isCorrect,
});

const question = (id: string, type: QuestionType, options: QuestionOption[], extra: Partial<TestQuestion> = {}): TestQuestion => ({
  id,
  type,
  options,
  isMustPass: false,
  topicId: null,
  ...extra,
});

const answer = (questionId: string, selectedOptionIds: string[], textAnswer: string | null = null): AnswerInput => ({
  questionId,
  selectedOptionIds,
  textAnswer,
});

const topic = (id: string, name: string, order: number): QuestionnaireTopic => ({ id, name, description: null, order });

const singleChoice = question('q1', QuestionType.SINGLE_CHOICE, [option('a', 5, true), option('b', 2), option('c', 0)], {
  topicId: 'access',
});
const multipleChoice = question(
  'q2',
  QuestionType.MULTIPLE_CHOICE,
  [option('x', 3, true), option('y', 2, true), option('z', 4)],
  { topicId: 'data' },
);
const yesNo = question('q3', QuestionType.YES_NO, [option('yes', 1, true), option('no', 0)], {
  topicId: 'access',
  isMustPass: true,
});
const text = question('q4', QuestionType.TEXT, []);

describe('pointsForAnswer', () => {
  it('gives a single choice question the points of the one selected option', () => {
    expect(pointsForAnswer(singleChoice, answer('q1', ['b']))).toBe(2);
    expect(pointsForAnswer(singleChoice, answer('q1', ['a', 'b']))).toBe(0);
    expect(pointsForAnswer(singleChoice, answer('q1', ['unknown']))).toBe(0);
  });

  it('sums only the correct selections of a multiple choice question', () => {
    expect(pointsForAnswer(multipleChoice, answer('q2', ['x', 'z']))).toBe(3);
    expect(pointsForAnswer(multipleChoice, answer('q2', ['x', 'y']))).toBe(5);
  });

  it('gives a text question full points only when answered', () => {
    expect(pointsForAnswer(text, answer('q4', [], 'Encrypted at rest'))).toBe(1);
    expect(pointsForAnswer(text, answer('q4', [], '   '))).toBe(0);
    expect(pointsForAnswer(text, answer('q4', []))).toBe(0);
  });

  it('gives nothing for an unanswered question', () => {
    expect(pointsForAnswer(singleChoice, undefined)).toBe(0);
  });
});

describe('percentageOf', () => {
  it('treats an empty maximum as zero percent', () => {
    expect(percentageOf(0, 0)).toBe(0);
    expect(percentageOf(3, 4)).toBe(75);
  });
});

describe('scoreAnswers', () => {
  const topics = [topic('data', 'Data protection', 2), topic('access', 'Access control', 1), topic('unused', 'Unused', 3)];

  it('totals answers and passes at or above the passing score', () => {
    const result = scoreAnswers(
      [singleChoice, multipleChoice, yesNo, text],
      topics,
      [answer('q1', ['b']), answer('q2', ['x', 'y']), answer('q3', ['yes']), answer('q4', [], 'Policy v2')],
      70,
    );

    expect(result.totalScore).toBe(9);
    expect(result.maxPossibleScore).toBe(12);
    expect(result.percentageScore).toBe(75);
    expect(result.mustPassFailed).toBe(false);
    expect(result.passed).toBe(true);
    expect(result.answers.map((a) => [a.questionId, a.pointsEarned, a.maxPoints, a.isMustPassMet])).toEqual([
      ['q1', 2, 5, null],
      ['q2', 5, 5, null],
      ['q3', 1, 1, true],
      ['q4', 1, 1, null],
    ]);
  });

  it('reports topic scores in topic order and leaves out empty topics', () => {
    const result = scoreAnswers(
      [singleChoice, multipleChoice, yesNo],
      topics,
      [answer('q1', ['b']), answer('q2', ['x', 'y']), answer('q3', ['yes'])],
      70,
    );

    expect(result.topicScores).toEqual([
      { topicId: 'access', topicName: 'Access control', score: 3, maxScore: 6, percentage: 50 },
      { topicId: 'data', topicName: 'Data protection', score: 5, maxScore: 5, percentage: 100 },
    ]);
  });

  it('fails a 95% submission that misses a must-pass question', () => {
    const heavy = question('big', QuestionType.SINGLE_CHOICE, [option('best', 19, true), option('worst', 0)]);
    const result = scoreAnswers([heavy, yesNo], [], [answer('big', ['best']), answer('q3', ['no'])], 70);

    expect(result.percentageScore).toBe(95);
    expect(result.mustPassFailed).toBe(true);
    expect(result.passed).toBe(false);
  });

  it('counts unanswered questions toward the maximum and fails an unanswered must-pass', () => {
    const result = scoreAnswers([singleChoice, yesNo], [], [answer('q1', ['a'])], 50);

    expect(result.totalScore).toBe(5);
    expect(result.maxPossibleScore).toBe(6);
    expect(result.answers[1]).toEqual({
      questionId: 'q3',
      selectedOptionIds: [],
      textAnswer: null,
      pointsEarned: 0,
      maxPoints: 1,
      isMustPassMet: false,
    });
    expect(result.passed).toBe(false);
  });

  it('ignores answers to questions outside the questionnaire', () => {
    const result = scoreAnswers([text], [], [answer('q4', [], 'yes'), answer('stray', ['a'])], 70);

    expect(result.answers).toHaveLength(1);
    expect(result.passed).toBe(true);
  });
});

describe('mergeAnswers', () => {
  it('replaces answers per question and keeps first-seen order', () => {
    const merged = mergeAnswers(
      [answer('q1', ['a']), answer('q2', ['x'])],
      [answer('q3', ['yes']), answer('q1', ['b'])],
    );

    expect(merged).toEqual([answer('q1', ['b']), answer('q2', ['x']), answer('q3', ['yes'])]);
  });
});
