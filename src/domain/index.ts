export { EventState, EVENT_STATE_LABELS, EVENT_TYPE_PATTERN, toEventView, parseEventState } from './event.js';
export type {
  Event,
  ActiveEvent,
  FinishedEvent,
  EventView,
  EventStateLabel,
  ListEventsQuery,
} from './event.js';
export type { EventRepository } from './event-repository.js';
export {
  EventServiceError,
  ValidationError,
  NotFoundError,
  ActiveEventConflictError,
  StorageError,
} from './errors.js';
export type { EventErrorCode, ValidationIssue } from './errors.js';
