export { InMemoryEventLog, createEventLog, type EventLogConfig, type EventQueryOptions } from './event-log.js';
export {
  reduceRunState,
  replayRunState,
  accumulatedReasons,
  INITIAL_RUN_STATE,
  type RunState,
  type ItemState,
  type ItemStatus,
  type AttemptRecord,
  type ConflictRecord,
} from './run-state.js';
