import type { Event, ListEventsQuery } from './event.js';

/**
 * Storage capability the lifecycle use cases are given.
 *
 * Implementations own the physical representation. Every operation
 * accepts an optional AbortSignal; an aborted call rejects with a
 * StorageError.
 */
export interface EventRepository {
  /** The single active event of `type`, or undefined when there is none. */
  findActive(type: string, signal?: AbortSignal): Promise<Event | undefined>;

  /**
   * Inserts a new active event. Does not look for an existing one first;
   * rejects with ActiveEventConflictError if the store already holds an
   * active row for `type`.
   */
  create(type: string, signal?: AbortSignal): Promise<Event>;

  /**
   * Atomically transitions the active event of `type` to finished and
   * returns the updated row. Rejects with NotFoundError when none matched.
   */
  finishActive(type: string, signal?: AbortSignal): Promise<Event>;

  /** Newest `startedAt` first. Every call re-queries. */
  list(query: ListEventsQuery, signal?: AbortSignal): Promise<Event[]>;

  /** Resolves when the store is reachable. */
  ping(signal?: AbortSignal): Promise<void>;
}
