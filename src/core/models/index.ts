/**
 * Core Domain Models - Barrel Export
 *
 * Pure types shared by the catalog, scheduler, grading and API layers.
 * No runtime dependencies.
 */

export type {
  FilterTags,
  Hint,
  ExercisePayload,
  TaskContent,
  Task,
  TaskRef,
  FilterGroup,
  FilterPredicate,
  FilterInfo,
} from './task';

export type { User, UserProfile } from './user';

export type {
  SessionState,
  AssignmentStatus,
  Assignment,
  GradedAnswer,
  TaskHistoryEntry,
  AnswerStats,
} from './session';
