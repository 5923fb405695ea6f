import { randomUUID } from 'node:crypto';
import {
  ActiveEventConflictError,
  EventState,
  NotFoundError,
  StorageError,
} from '../../domain/index.js';
import type { Event, EventRepository, ListEventsQuery } from '../../domain/index.js';

export interface InMemoryEventRepositoryOptions {
  now?: () => Date;
  newId?: () => string;
}

interface StoredEvent {
  readonly seq: number;
  event: Event;
}

function assertLive(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    throw new StorageError('Storage operation aborted', { cause: signal.reason });
  }
}

/**
 * In-memory EventRepository.
 *
 * Mirrors the PostgreSQL adapter: a second active row for a type is
 * rejected the way the partial unique index rejects it, and finish is
 * a single synchronous step, so it is atomic on the event loop.
 */
export class InMemoryEventRepository implements EventRepository {
  private readonly rows: StoredEvent[] = [];
  private readonly now: () => Date;
  private readonly newId: () => string;
  private seq = 0;

  constructor(options: InMemoryEventRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async findActive(type: string, signal?: AbortSignal): Promise<Event | undefined> {
    assertLive(signal);
    return this.activeRow(type)?.event;
  }

  async create(type: string, signal?: AbortSignal): Promise<Event> {
    assertLive(signal);
    if (this.activeRow(type) !== undefined) {
      throw new ActiveEventConflictError(type);
    }
    const event: Event = {
      id: this.newId(),
      type,
      state: EventState.Active,
      startedAt: this.now(),
    };
    this.seq++;
    this.rows.push({ seq: this.seq, event });
    return event;
  }

  async finishActive(type: string, signal?: AbortSignal): Promise<Event> {
    assertLive(signal);
    const row = this.activeRow(type);
    if (row === undefined) {
      throw new NotFoundError(type);
    }
    const finished: Event = {
      id: row.event.id,
      type: row.event.type,
      state: EventState.Finished,
      startedAt: row.event.startedAt,
      finishedAt: this.now(),
    };
    row.event = finished;
    return finished;
  }

  async list(query: ListEventsQuery, signal?: AbortSignal): Promise<Event[]> {
    assertLive(signal);
    const filter = query.type ?? '';
    const ordered = this.rows
      .filter((row) => filter === '' || row.event.type === filter)
      .sort((a, b) =>
        b.event.startedAt.getTime() - a.event.startedAt.getTime() || b.seq - a.seq,
      )
      .map((row) => row.event);

    const end = query.limit > 0 ? query.offset + query.limit : undefined;
    return ordered.slice(query.offset, end);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    assertLive(signal);
  }

  /** Removes every event. Administrative/test cleanup only. */
  clear(): void {
    this.rows.length = 0;
  }

  private activeRow(type: string): StoredEvent | undefined {
    return this.rows.find(
      (row) => row.event.type === type && row.event.state === EventState.Active,
    );
  }
}
