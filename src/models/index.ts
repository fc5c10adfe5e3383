// Export all models
export { Task } from './Task';
export { Character } from './Character';
export { Bond } from './Bond';
export { RoutineBundle } from './RoutineBundle';
export { Confirmation } from './Confirmation';
