/**
 * Drill Engine Event and Reply Types
 *
 * A transport feeds the engine one InboundEvent per user action and renders
 * the EngineReply it gets back. Notifications are extra messages the
 * transport should send to other chats (currently the operator chat).
 */

import type { FilterInfo, User, UserProfile } from '../models';
import type { ExerciseView } from '../presentation/exercise-view';

export type SessionEvent =
  | { type: 'request-next' }
  | { type: 'filter-change'; filter: string | null }
  | { type: 'answer-submitted'; answer: string }
  | { type: 'describe-filters' };

export type SessionEventType = SessionEvent['type'];

export interface InboundEvent {
  sessionId: number;
  user: UserProfile;
  event: SessionEvent;
}

export type ExerciseReply = {
  type: 'exercise';
  status: 'assigned' | 'redelivered';
  assignmentId: number;
  taskId: number;
  view: ExerciseView;
};

export type ExhaustedReply = {
  type: 'exhausted';
  /** Current filter in textual form (`-` for none) */
  filter: string;
};

export type NextReply = ExerciseReply | ExhaustedReply;

export type EngineReply =
  | NextReply
  | { type: 'filter-updated'; filter: string; matchingTasks: number }
  | { type: 'filter-rejected'; filter: string; current: string; reason: string }
  | {
      type: 'graded';
      answerId: number;
      correct: boolean | null;
      expected: string | null;
      /** Present when the engine advanced to the next exercise */
      next?: NextReply;
    }
  | { type: 'filters'; current: string; available: FilterInfo[] };

export interface OutboundNotification {
  chatId: number;
  text: string;
}

export interface EngineResult {
  user: User;
  isNewUser: boolean;
  reply: EngineReply;
  notifications: OutboundNotification[];
}

export interface DrillEngineOptions {
  /** Schedule the next exercise right after grading (default true) */
  autoAdvance?: boolean;
  /** Chat notified about new users */
  operatorChatId?: number | null;
  /** Randomness for answer-option order */
  random?: () => number;
}
