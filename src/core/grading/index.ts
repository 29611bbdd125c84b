export { AnswerRecorder } from './answer-recorder';
export type { AnswerRecorderOptions, GradeResult } from './answer-recorder';
export { normalizeAnswer, isCorrectAnswer } from './answer-matching';
