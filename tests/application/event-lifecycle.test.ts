import { describe, it, expect, vi, beforeEach } from 'vitest';
import { startEvent, finishEvent, listEvents } from '../../src/application/event-lifecycle.js';
import {
  ActiveEventConflictError,
  EventState,
  NotFoundError,
  StorageError,
} from '../../src/domain/index.js';
import type { Event, EventRepository } from '../../src/domain/index.js';
import { InMemoryEventRepository } from '../../src/infrastructure/memory/index.js';
import { makeClock, makeIds, T0 } from '../helpers.js';

const ACTIVE: Event = {
  id: 'evt-1',
  type: 'meeting',
  state: EventState.Active,
  startedAt: new Date('2026-03-01T09:00:00.000Z'),
};

const FINISHED: Event = {
  id: 'evt-1',
  type: 'meeting',
  state: EventState.Finished,
  startedAt: new Date('2026-03-01T09:00:00.000Z'),
  finishedAt: new Date('2026-03-01T09:05:00.000Z'),
};

/** Repository whose every method is a vi.fn stub. */
function mockRepository() {
  return {
    findActive: vi.fn<EventRepository['findActive']>(),
    create: vi.fn<EventRepository['create']>(),
    finishActive: vi.fn<EventRepository['finishActive']>(),
    list: vi.fn<EventRepository['list']>(),
    ping: vi.fn<EventRepository['ping']>(),
  } satisfies EventRepository;
}

// ─── startEvent (stubbed repository) ─────────────────────────

describe('startEvent', () => {
  let repo: ReturnType<typeof mockRepository>;

  beforeEach(() => {
    repo = mockRepository();
  });

  it('returns the existing active event without creating', async () => {
    repo.findActive.mockResolvedValue(ACTIVE);

    const result = await startEvent(repo, 'meeting');

    expect(result).toBe(ACTIVE);
    expect(repo.create).not.toHaveBeenCalled();
  });

  it('creates an event when none is active', async () => {
    repo.findActive.mockResolvedValue(undefined);
    repo.create.mockResolvedValue(ACTIVE);

    const result = await startEvent(repo, 'meeting');

    expect(repo.create).toHaveBeenCalledWith('meeting', undefined);
    expect(result).toBe(ACTIVE);
  });

  it('passes the abort signal to every storage call', async () => {
    const signal = new AbortController().signal;
    repo.findActive.mockResolvedValue(undefined);
    repo.create.mockResolvedValue(ACTIVE);

    await startEvent(repo, 'meeting', signal);

    expect(repo.findActive).toHaveBeenCalledWith('meeting', signal);
    expect(repo.create).toHaveBeenCalledWith('meeting', signal);
  });

  it('returns the concurrent winner when create hits the active-row constraint', async () => {
    const winner: Event = { ...ACTIVE, id: 'evt-winner' };
    repo.findActive.mockResolvedValueOnce(undefined).mockResolvedValueOnce(winner);
    repo.create.mockRejectedValue(new ActiveEventConflictError('meeting'));

    const result = await startEvent(repo, 'meeting');

    expect(result).toBe(winner);
    expect(repo.findActive).toHaveBeenCalledTimes(2);
  });

  it('retries create once when the winner is already finished', async () => {
    repo.findActive.mockResolvedValue(undefined);
    repo.create
      .mockRejectedValueOnce(new ActiveEventConflictError('meeting'))
      .mockResolvedValueOnce(ACTIVE);

    const result = await startEvent(repo, 'meeting');

    expect(result).toBe(ACTIVE);
    expect(repo.findActive).toHaveBeenCalledTimes(2);
    expect(repo.create).toHaveBeenCalledTimes(2);
  });

  it('rethrows the conflict when the retry loses a race too', async () => {
    const second = new ActiveEventConflictError('meeting');
    repo.findActive.mockResolvedValue(undefined);
    repo.create
      .mockRejectedValueOnce(new ActiveEventConflictError('meeting'))
      .mockRejectedValueOnce(second);

    await expect(startEvent(repo, 'meeting')).rejects.toBe(second);
    expect(repo.create).toHaveBeenCalledTimes(2);
  });

  it('propagates storage errors from the lookup unchanged', async () => {
    const failure = new StorageError('Storage operation failed');
    repo.findActive.mockRejectedValue(failure);

    await expect(startEvent(repo, 'meeting')).rejects.toBe(failure);
    expect(repo.create).not.toHaveBeenCalled();
  });

  it('propagates storage errors from create unchanged', async () => {
    const failure = new StorageError('Storage operation aborted');
    repo.findActive.mockResolvedValue(undefined);
    repo.create.mockRejectedValue(failure);

    await expect(startEvent(repo, 'meeting')).rejects.toBe(failure);
    expect(repo.findActive).toHaveBeenCalledTimes(1);
  });
});

// ─── finishEvent / listEvents (stubbed repository) ───────────

describe('finishEvent', () => {
  it('delegates to finishActive and returns its row', async () => {
    const repo = mockRepository();
    repo.finishActive.mockResolvedValue(FINISHED);

    const result = await finishEvent(repo, 'meeting');

    expect(repo.finishActive).toHaveBeenCalledWith('meeting', undefined);
    expect(result).toBe(FINISHED);
  });

  it('propagates NotFoundError verbatim', async () => {
    const repo = mockRepository();
    const notFound = new NotFoundError('meeting');
    repo.finishActive.mockRejectedValue(notFound);

    await expect(finishEvent(repo, 'meeting')).rejects.toBe(notFound);
  });
});

describe('listEvents', () => {
  it('passes the query through and returns rows untouched', async () => {
    const repo = mockRepository();
    repo.list.mockResolvedValue([FINISHED]);

    const result = await listEvents(repo, { offset: 2, limit: 10, type: 'meeting' });

    expect(repo.list).toHaveBeenCalledWith({ offset: 2, limit: 10, type: 'meeting' }, undefined);
    expect(result).toEqual([FINISHED]);
  });
});

// ─── Lifecycle against the in-memory store ───────────────────

describe('event lifecycle', () => {
  let repo: InMemoryEventRepository;

  beforeEach(() => {
    repo = new InMemoryEventRepository({ now: makeClock(T0), newId: makeIds() });
  });

  it('start is idempotent while the event is active', async () => {
    const first = await startEvent(repo, 'meeting');
    const second = await startEvent(repo, 'meeting');

    expect(second.id).toBe(first.id);
    expect(second.startedAt).toEqual(first.startedAt);
    expect(await repo.list({ offset: 0, limit: 0 })).toHaveLength(1);
  });

  it('finish requires an active event', async () => {
    await expect(finishEvent(repo, 'meeting')).rejects.toBeInstanceOf(NotFoundError);

    await startEvent(repo, 'meeting');
    await finishEvent(repo, 'meeting');

    await expect(finishEvent(repo, 'meeting')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('finish sets finishedAt after startedAt and list reflects it', async () => {
    const started = await startEvent(repo, 'meeting');
    const finished = await finishEvent(repo, 'meeting');

    expect(finished.id).toBe(started.id);
    expect(finished.state).toBe(EventState.Finished);
    expect(finished.finishedAt).toEqual(new Date('2026-03-01T09:00:01.000Z'));
    expect(finished.startedAt).toEqual(started.startedAt);

    const [listed] = await listEvents(repo, { offset: 0, limit: 0 });
    expect(listed).toEqual(finished);
  });

  it('types have independent lifecycles', async () => {
    const meeting = await startEvent(repo, 'meeting');
    const call = await startEvent(repo, 'call');

    expect(meeting.id).not.toBe(call.id);

    await finishEvent(repo, 'meeting');

    const active = await repo.findActive('call');
    expect(active).toEqual(call);
  });

  it('start after finish creates a new event', async () => {
    const first = await startEvent(repo, 'meeting');
    await finishEvent(repo, 'meeting');
    const second = await startEvent(repo, 'meeting');

    expect(second.id).not.toBe(first.id);
    expect(second.state).toBe(EventState.Active);
    expect(await repo.list({ offset: 0, limit: 0, type: 'meeting' })).toHaveLength(2);
  });

  it('concurrent starts of a fresh type converge on one active event', async () => {
    const [a, b] = await Promise.all([
      startEvent(repo, 'deploy'),
      startEvent(repo, 'deploy'),
    ]);

    expect(a.id).toBe(b.id);
    expect(await repo.list({ offset: 0, limit: 0, type: 'deploy' })).toHaveLength(1);
  });

  it('exactly one of several concurrent finishes succeeds', async () => {
    await startEvent(repo, 'deploy');

    const results = await Promise.allSettled([
      finishEvent(repo, 'deploy'),
      finishEvent(repo, 'deploy'),
      finishEvent(repo, 'deploy'),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(2);
    for (const r of rejected) {
      expect(r.reason).toBeInstanceOf(NotFoundError);
    }
  });
});
