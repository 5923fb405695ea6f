/**
 * Core domain types for the event lifecycle model.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

/** Stored ordinal of an event's lifecycle state. */
export const EventState = {
  Active: 0,
  Finished: 1,
} as const;

export type EventState = (typeof EventState)[keyof typeof EventState];

/** Labels used on the wire in place of the stored ordinals. */
export type EventStateLabel = 'started' | 'finished';

export const EVENT_STATE_LABELS: Readonly<Record<EventState, EventStateLabel>> = {
  [EventState.Active]: 'started',
  [EventState.Finished]: 'finished',
};

/** Lowercase ASCII letters and digits, at least one character. */
export const EVENT_TYPE_PATTERN = /^[a-z0-9]+$/;

interface EventBase {
  readonly id: string;
  readonly type: string;
  readonly startedAt: Date;
}

/** Started and not yet finished. At most one per type. */
export interface ActiveEvent extends EventBase {
  readonly state: typeof EventState.Active;
  readonly finishedAt?: undefined;
}

/** Terminal state. `finishedAt` is set exactly once, at the transition. */
export interface FinishedEvent extends EventBase {
  readonly state: typeof EventState.Finished;
  readonly finishedAt: Date;
}

export type Event = ActiveEvent | FinishedEvent;

/** JSON shape returned to API clients. */
export interface EventView {
  readonly id: string;
  readonly type: string;
  readonly state: EventStateLabel;
  readonly startedAt: string;
  readonly finishedAt?: string;
}

export function toEventView(event: Event): EventView {
  const view: EventView = {
    id: event.id,
    type: event.type,
    state: EVENT_STATE_LABELS[event.state],
    startedAt: event.startedAt.toISOString(),
  };
  if (event.state === EventState.Finished) {
    return { ...view, finishedAt: event.finishedAt.toISOString() };
  }
  return view;
}

/** Narrows a raw stored ordinal. Returns null for anything unknown. */
export function parseEventState(value: number): EventState | null {
  if (value === EventState.Active || value === EventState.Finished) {
    return value;
  }
  return null;
}

/** Pagination and filter accepted by list operations. */
export interface ListEventsQuery {
  readonly offset: number;
  /** 0 means unbounded. */
  readonly limit: number;
  /** Exact type to match; empty or absent means all types. */
  readonly type?: string | undefined;
}
