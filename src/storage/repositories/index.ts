/**
 * Repository Module - Barrel Export
 *
 * Usage:
 *   import { createRepositories } from './storage/repositories';
 *
 *   const repos = createRepositories(db);
 *   const task = repos.tasks.findById(1);
 */

import type { StoreExecutor } from '../db';
import { AnswerRepository } from './answer.repository';
import { AssignmentRepository } from './assignment.repository';
import { SessionStateRepository } from './session-state.repository';
import { TaskRepository } from './task.repository';
import { UserRepository } from './user.repository';

export type { Repository } from './base';
export { TaskRepository } from './task.repository';
export type { CreateTaskInput } from './task.repository';
export { SessionStateRepository } from './session-state.repository';
export { UserRepository } from './user.repository';
export { AssignmentRepository } from './assignment.repository';
export type { CreateAssignmentInput } from './assignment.repository';
export { AnswerRepository } from './answer.repository';
export type { CreateAnswerInput } from './answer.repository';

/**
 * Every repository, bound to one executor.
 */
export interface Repositories {
  tasks: TaskRepository;
  sessions: SessionStateRepository;
  users: UserRepository;
  assignments: AssignmentRepository;
  answers: AnswerRepository;
}

/**
 * Binds all repositories to the database or to an open transaction.
 */
export function createRepositories(executor: StoreExecutor): Repositories {
  return {
    tasks: new TaskRepository(executor),
    sessions: new SessionStateRepository(executor),
    users: new UserRepository(executor),
    assignments: new AssignmentRepository(executor),
    answers: new AnswerRepository(executor),
  };
}
