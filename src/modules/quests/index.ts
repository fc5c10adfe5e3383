export { QuestEngine, systemClock } from './quests.service';
export type {
  QuestEngineDeps,
  NewCharacterInput,
  PhotoCaptureInput,
  NewRoutineInput,
  HabitFailure,
  SweepResult,
} from './quests.service';
export { default as questRoutes } from './routes';
export type { EngineRouteOptions } from './routes';
