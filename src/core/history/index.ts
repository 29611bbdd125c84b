export { AnswerHistory, createTaskResolver, DEFAULT_ANSWER_LIMIT } from './answer-history';
export type { AnswerWithTask, AssignmentWithTask } from './answer-history';
export { buildTaskHistory, readSessionTaskHistory } from './task-history';
