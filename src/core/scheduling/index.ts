export { Scheduler, isOverdue, resolveExercise } from './scheduler';
export { rankCandidates, pickNext, bucketCandidates, isCoolingDown } from './ranking';
export type { RankingOptions } from './ranking';
export { DEFAULT_SCHEDULER_OPTIONS } from './types';
export type { Exercise, NextOutcome, SchedulerOptions } from './types';
