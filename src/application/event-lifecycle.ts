import { ActiveEventConflictError } from '../domain/index.js';
import type { Event, EventRepository, ListEventsQuery } from '../domain/index.js';

/**
 * Use case: start an event of `type`.
 *
 * Returns the existing active event unchanged when there is one.
 * Otherwise inserts a new one. If the insert loses a race against a
 * concurrent start, the winner's row is returned instead; when the winner
 * has already been finished, the insert is tried once more.
 */
export async function startEvent(
  repo: EventRepository,
  type: string,
  signal?: AbortSignal,
): Promise<Event> {
  const active = await repo.findActive(type, signal);
  if (active !== undefined) {
    return active;
  }

  try {
    return await repo.create(type, signal);
  } catch (err: unknown) {
    if (!(err instanceof ActiveEventConflictError)) {
      throw err;
    }
    const winner = await repo.findActive(type, signal);
    if (winner !== undefined) {
      return winner;
    }
    // Winner already finished; a second conflict propagates.
    return repo.create(type, signal);
  }
}

/**
 * Use case: finish the active event of `type`.
 * NotFoundError and storage errors propagate unchanged.
 */
export async function finishEvent(
  repo: EventRepository,
  type: string,
  signal?: AbortSignal,
): Promise<Event> {
  return repo.finishActive(type, signal);
}

/** Use case: list events, newest first. */
export async function listEvents(
  repo: EventRepository,
  query: ListEventsQuery,
  signal?: AbortSignal,
): Promise<Event[]> {
  return repo.list(query, signal);
}
