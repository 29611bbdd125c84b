/**
 * DrillEngine - Session Event Dispatcher
 *
 * Entry point for transports. Every event first touches the user, then is
 * routed to the component that owns it:
 *
 * | Event              | Handled by                           |
 * |--------------------|--------------------------------------|
 * | request-next       | Scheduler                            |
 * | filter-change      | TaskCatalog + SessionFilterStore     |
 * | answer-submitted   | AnswerRecorder (+ Scheduler)         |
 * | describe-filters   | SessionFilterStore + TaskCatalog     |
 */

import type { TaskCatalog } from '../catalog/task-catalog';
import { formatFilter, parseFilter } from '../catalog/filter';
import type { AnswerRecorder } from '../grading/answer-recorder';
import { buildExerciseView } from '../presentation/exercise-view';
import type { Scheduler } from '../scheduling/scheduler';
import type { NextOutcome } from '../scheduling/types';
import type { SessionFilterStore } from '../sessions/session-filter-store';
import type { UserDirectory } from '../sessions/user-directory';
import type { User } from '../models';
import { createLogger } from '../../logger';
import type {
  DrillEngineOptions,
  EngineReply,
  EngineResult,
  InboundEvent,
  NextReply,
  OutboundNotification,
} from './types';

const log = createLogger('Engine');

export interface DrillEngineDeps {
  catalog: TaskCatalog;
  filters: SessionFilterStore;
  users: UserDirectory;
  scheduler: Scheduler;
  recorder: AnswerRecorder;
}

export class DrillEngine {
  private readonly autoAdvance: boolean;
  private readonly operatorChatId: number | null;
  private readonly random: () => number;

  constructor(
    private readonly deps: DrillEngineDeps,
    options: DrillEngineOptions = {}
  ) {
    this.autoAdvance = options.autoAdvance ?? true;
    this.operatorChatId = options.operatorChatId ?? null;
    this.random = options.random ?? Math.random;
  }

  async handle(inbound: InboundEvent): Promise<EngineResult> {
    const { user, isNew } = await this.deps.users.touch(inbound.user);
    const reply = await this.dispatch(inbound);

    return {
      user,
      isNewUser: isNew,
      reply,
      notifications: isNew ? this.newUserNotifications(user) : [],
    };
  }

  private async dispatch({ sessionId, user, event }: InboundEvent): Promise<EngineReply> {
    log.debug(`Session ${sessionId}: ${event.type}`);

    switch (event.type) {
      case 'request-next':
        return this.toNextReply(await this.deps.scheduler.next(sessionId));

      case 'filter-change':
        return this.changeFilter(sessionId, event.filter);

      case 'answer-submitted': {
        const graded = await this.deps.recorder.grade(sessionId, user.uid, event.answer);
        const next = this.autoAdvance ? await this.advanceAfterGrade(sessionId) : undefined;
        return {
          type: 'graded',
          answerId: graded.answer.id,
          correct: graded.answer.correct,
          expected: graded.expected,
          ...(next && { next }),
        };
      }

      case 'describe-filters': {
        const [current, available] = await Promise.all([
          this.deps.filters.getFilter(sessionId),
          this.deps.catalog.collectFilterInfo(),
        ]);
        return { type: 'filters', current: formatFilter(current), available };
      }
    }
  }

  /**
   * Stores a new filter unless it would leave the session with nothing to do.
   */
  private async changeFilter(sessionId: number, text: string | null): Promise<EngineReply> {
    const predicate = parseFilter(text);
    const matching = await this.deps.catalog.query(predicate);

    if (predicate && matching.length === 0) {
      const current = await this.deps.filters.getFilter(sessionId);
      return {
        type: 'filter-rejected',
        filter: formatFilter(predicate),
        current: formatFilter(current),
        reason: 'No active task matches this filter',
      };
    }

    await this.deps.filters.setFilter(sessionId, predicate);
    log.info(`Session ${sessionId} filter set to "${formatFilter(predicate)}"`);

    return {
      type: 'filter-updated',
      filter: formatFilter(predicate),
      matchingTasks: matching.length,
    };
  }

  /**
   * The grade is already committed; a failed follow-up leaves the session
   * idle and the next request-next retries it.
   */
  private async advanceAfterGrade(sessionId: number): Promise<NextReply | undefined> {
    try {
      return this.toNextReply(await this.deps.scheduler.next(sessionId));
    } catch (error) {
      log.error(`Session ${sessionId}: next exercise after grading failed`, error);
      return undefined;
    }
  }

  private toNextReply(outcome: NextOutcome): NextReply {
    if (outcome.status === 'exhausted') {
      return { type: 'exhausted', filter: formatFilter(outcome.filter) };
    }
    return {
      type: 'exercise',
      status: outcome.status,
      assignmentId: outcome.assignment.id,
      taskId: outcome.exercise.taskId,
      view: buildExerciseView(outcome.exercise.payload, this.random),
    };
  }

  private newUserNotifications(user: User): OutboundNotification[] {
    if (this.operatorChatId === null) {
      return [];
    }
    const handle = user.username ? ` (@${user.username})` : '';
    return [{ chatId: this.operatorChatId, text: `New user: ${user.fullName}${handle}, id ${user.uid}` }];
  }
}
