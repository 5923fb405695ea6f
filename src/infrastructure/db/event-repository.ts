import { randomUUID } from 'node:crypto';
import { and, desc, eq, sql } from 'drizzle-orm';
import {
  ActiveEventConflictError,
  EventState,
  NotFoundError,
  StorageError,
  parseEventState,
} from '../../domain/index.js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { Event, EventRepository, ListEventsQuery } from '../../domain/index.js';
import { abortable } from './abortable.js';
import { ACTIVE_ROW_PREDICATE, events } from './schema.js';
import type { EventRow } from './schema.js';
import type * as schema from './schema.js';

export interface EventRepositoryOptions {
  /** Clock used for `startedAt` / `finishedAt`. */
  now?: () => Date;
  /** Id generator for new rows; random UUIDs by default. */
  newId?: () => string;
}

/**
 * Maps a stored row to the domain type.
 * Rows violating the state/finished_at pairing are reported as StorageError.
 */
export function toEvent(row: EventRow): Event {
  const state = parseEventState(row.state);
  if (state === null) {
    throw new StorageError(`Event ${row.id} has unknown state ${row.state}`);
  }

  if (state === EventState.Active) {
    if (row.finished_at !== null) {
      throw new StorageError(`Active event ${row.id} has a finish time`);
    }
    return { id: row.id, type: row.type, state, startedAt: row.started_at };
  }

  if (row.finished_at === null) {
    throw new StorageError(`Finished event ${row.id} has no finish time`);
  }
  return {
    id: row.id,
    type: row.type,
    state,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

function isActiveOfType(type: string) {
  return and(eq(events.type, type), eq(events.state, EventState.Active));
}

/**
 * PostgreSQL-backed EventRepository.
 *
 * Each operation is a single statement: the finish transition is one
 * `UPDATE … RETURNING`, and create relies on the partial unique index
 * over active rows instead of a separate lookup.
 *
 * Accepts any pg-core drizzle database over the events schema: postgres.js
 * in production, the pg-proxy driver in tests.
 */
export function createEventRepository<TQueryResult extends PgQueryResultHKT>(
  db: PgDatabase<TQueryResult, typeof schema>,
  options: EventRepositoryOptions = {},
): EventRepository {
  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? randomUUID;

  return {
    async findActive(type, signal) {
      const rows = await abortable(signal, () =>
        db.select().from(events).where(isActiveOfType(type)).limit(1),
      );
      const row = rows[0];
      return row === undefined ? undefined : toEvent(row);
    },

    async create(type, signal) {
      const rows = await abortable(signal, () =>
        db
          .insert(events)
          .values({
            id: newId(),
            type,
            state: EventState.Active,
            started_at: now(),
          })
          .onConflictDoNothing({ target: events.type, where: ACTIVE_ROW_PREDICATE })
          .returning(),
      );
      const row = rows[0];
      if (row === undefined) {
        throw new ActiveEventConflictError(type);
      }
      return toEvent(row);
    },

    async finishActive(type, signal) {
      const rows = await abortable(signal, () =>
        db
          .update(events)
          .set({ state: EventState.Finished, finished_at: now() })
          .where(isActiveOfType(type))
          .returning(),
      );
      const row = rows[0];
      if (row === undefined) {
        throw new NotFoundError(type);
      }
      return toEvent(row);
    },

    async list(query: ListEventsQuery, signal) {
      const filter = query.type !== undefined && query.type !== ''
        ? eq(events.type, query.type)
        : undefined;

      const rows = await abortable(signal, () => {
        let q = db
          .select()
          .from(events)
          .where(filter)
          .orderBy(desc(events.started_at))
          .$dynamic();
        if (query.limit > 0) {
          q = q.limit(query.limit);
        }
        if (query.offset > 0) {
          q = q.offset(query.offset);
        }
        return q;
      });
      return rows.map(toEvent);
    },

    async ping(signal) {
      await abortable(signal, () => db.execute(sql`select 1`));
    },
  };
}
