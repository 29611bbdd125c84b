/**
 * Domain Errors for the Drill Engine
 *
 * Every controlled failure raised by the catalog, scheduler and grading layers
 * is a DrillError carrying a machine-readable code. The API error handler maps
 * these codes onto HTTP statuses; the CLI prints the message.
 *
 * Outcomes that are not failures stay out of this hierarchy:
 * - duplicate content: `upsert` returns the existing id
 * - exhausted catalog: `Scheduler.next` returns `{ status: 'exhausted' }`
 * - dangling task references: reads return `{ kind: 'unknown' }`
 */

export const DrillErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_AWAITING: 'ALREADY_AWAITING',
  NO_OUTSTANDING_ASSIGNMENT: 'NO_OUTSTANDING_ASSIGNMENT',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INVALID_TASK_FILE: 'INVALID_TASK_FILE',
} as const;

export type DrillErrorCode = (typeof DrillErrorCodes)[keyof typeof DrillErrorCodes];

/**
 * Base class for all domain errors.
 */
export class DrillError extends Error {
  public readonly code: DrillErrorCode;
  public readonly details?: unknown;

  constructor(code: DrillErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DrillError';
    this.code = code;
    this.details = details;
  }
}

/**
 * A task, user or assignment id that does not exist.
 */
export class NotFoundError extends DrillError {
  constructor(
    public readonly entity: 'task' | 'user' | 'assignment',
    public readonly id: number
  ) {
    super(DrillErrorCodes.NOT_FOUND, `${entity} ${id} not found`, { entity, id });
    this.name = 'NotFoundError';
  }
}

/**
 * `next()` was called while the session still has an outstanding assignment
 * and re-delivery is disabled.
 */
export class AlreadyAwaitingError extends DrillError {
  constructor(
    public readonly sessionId: number,
    public readonly assignmentId: number | null
  ) {
    super(
      DrillErrorCodes.ALREADY_AWAITING,
      `Session ${sessionId} is already awaiting an answer`,
      { sessionId, assignmentId }
    );
    this.name = 'AlreadyAwaitingError';
  }
}

export class NoOutstandingAssignmentError extends DrillError {
  constructor(public readonly sessionId: number) {
    super(
      DrillErrorCodes.NO_OUTSTANDING_ASSIGNMENT,
      `Session ${sessionId} has no exercise awaiting an answer`,
      { sessionId }
    );
    this.name = 'NoOutstandingAssignmentError';
  }
}

/**
 * The store kept failing with transient errors after every retry.
 * The original failure is kept as `cause`.
 */
export class StoreUnavailableError extends DrillError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      DrillErrorCodes.SERVICE_UNAVAILABLE,
      `Store unavailable during ${operation} after ${attempts} attempt(s)`,
      { operation, attempts }
    );
    this.name = 'StoreUnavailableError';
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}

export class InvalidTaskFileError extends DrillError {
  constructor(
    public readonly file: string,
    public readonly issues: string[]
  ) {
    super(
      DrillErrorCodes.INVALID_TASK_FILE,
      `Invalid task file ${file}: ${issues.join('; ')}`,
      { file, issues }
    );
    this.name = 'InvalidTaskFileError';
  }
}
