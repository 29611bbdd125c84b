export { DrillEngine } from './drill-engine';
export type { DrillEngineDeps } from './drill-engine';
export type {
  SessionEvent,
  SessionEventType,
  InboundEvent,
  EngineReply,
  ExerciseReply,
  ExhaustedReply,
  NextReply,
  EngineResult,
  OutboundNotification,
  DrillEngineOptions,
} from './types';
