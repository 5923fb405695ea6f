import { sql } from 'drizzle-orm';
import { pgTable, uuid, varchar, smallint, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { EventState } from '../../domain/index.js';

/** Predicate selecting the active rows; shared by the partial index and ON CONFLICT. */
export const ACTIVE_ROW_PREDICATE = sql.raw(`state = ${EventState.Active}`);

/**
 * Drizzle schema for the `events` table.
 *
 * `state` stores the EventState ordinal. The partial unique index on
 * `type` over active rows is what keeps a type to a single active event
 * when two starts race: the losing INSERT hits ON CONFLICT DO NOTHING.
 */
export const events = pgTable('events', {
  id: uuid('id').primaryKey(),
  type: varchar('type', { length: 255 }).notNull(),
  state: smallint('state').notNull().default(EventState.Active),
  started_at: timestamp('started_at', { withTimezone: true }).notNull(),
  finished_at: timestamp('finished_at', { withTimezone: true }),
}, (table) => [
  index('idx_events_type').on(table.type),
  index('idx_events_started_at').on(table.started_at),
  uniqueIndex('uniq_events_active_type').on(table.type).where(ACTIVE_ROW_PREDICATE),
]);

export type EventRow = typeof events.$inferSelect;
