import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SqliteDatabase } from '@/backend/db';
import {
  ForbiddenError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  ThreadClosedError,
} from '@/backend/lib/errors';
import { type SeededUser, seedJob, seedMarketplace, seedUser } from '@/backend/testing/factories';
import { createTestDatabase, frozenClock } from '@/backend/testing/test-db';
import { SqliteThreadAccessor } from './thread.accessor';

describe('SqliteThreadAccessor', () => {
  let db: SqliteDatabase;
  let accessor: SqliteThreadAccessor;
  let client: SeededUser;
  let worker: SeededUser;
  let outsider: SeededUser;

  const countRows = (table: string): number =>
    db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get()?.total ?? 0;

  beforeEach(() => {
    db = createTestDatabase();
    accessor = new SqliteThreadAccessor(() => db, { now: frozenClock() });
    ({ client, worker } = seedMarketplace(db));
    outsider = seedUser(db, { firstName: 'Olive' });
  });

  afterEach(() => {
    db.close();
  });

  describe('createThread', () => {
    it('persists the thread and one participant row per distinct user', async () => {
      const thread = await accessor.createThread([client.id, worker.id, client.id]);

      expect(thread.isClosed).toBe(false);
      expect(thread.jobId).toBeNull();
      expect(thread.createdAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
      expect(countRows('thread_participants')).toBe(2);
    });

    it('rejects fewer than two distinct participants', async () => {
      await expect(accessor.createThread([client.id, client.id])).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      expect(countRows('threads')).toBe(0);
    });

    it('rejects unknown users without leaving rows behind', async () => {
      await expect(accessor.createThread([client.id, 'ghost'])).rejects.toThrow(
        'Unknown participant.'
      );
      expect(countRows('threads')).toBe(0);
      expect(countRows('thread_participants')).toBe(0);
    });

    it('refuses a second thread for the same job', async () => {
      const job = seedJob(db, client.id, worker.id);
      await accessor.createThread([client.id, worker.id], job.id);

      await expect(accessor.createThread([client.id, worker.id], job.id)).rejects.toBeInstanceOf(
        InvalidStateError
      );
    });
  });

  describe('appendMessage', () => {
    it('assigns strictly increasing timestamps under a frozen clock', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);

      const first = await accessor.appendMessage(thread.id, client.id, 'Hello');
      const second = await accessor.appendMessage(thread.id, worker.id, 'Hi there');
      const third = await accessor.appendMessage(thread.id, client.id, 'Tuesday works');

      expect(first.timestamp.toISOString()).toBe('2026-03-01T12:00:00.000Z');
      expect(second.timestamp.toISOString()).toBe('2026-03-01T12:00:00.001Z');
      expect(third.timestamp.toISOString()).toBe('2026-03-01T12:00:00.002Z');
      expect([first.sequence, second.sequence, third.sequence]).toEqual([1, 2, 3]);
    });

    it('returns the message with denormalized sender identity', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);

      const message = await accessor.appendMessage(thread.id, worker.id, 'On my way');

      expect(message.threadId).toBe(thread.id);
      expect(message.content).toBe('On my way');
      expect(message.sender).toEqual({
        id: worker.id,
        firstName: 'Wren',
        lastName: worker.lastName,
        profilePicture: null,
      });
    });

    it('fails NotFound for an unknown thread', async () => {
      await expect(accessor.appendMessage('missing', client.id, 'x')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('fails Forbidden for a non-participant', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);

      await expect(accessor.appendMessage(thread.id, outsider.id, 'x')).rejects.toBeInstanceOf(
        ForbiddenError
      );
    });

    it('fails ThreadClosed for every caller once closed', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);
      await accessor.closeThread(thread.id);

      for (const senderId of [client.id, worker.id, outsider.id]) {
        await expect(accessor.appendMessage(thread.id, senderId, 'x')).rejects.toBeInstanceOf(
          ThreadClosedError
        );
      }
      expect(countRows('messages')).toBe(0);
    });
  });

  describe('createThreadWithFirstMessage', () => {
    it('creates thread and message together', async () => {
      const { thread, message } = await accessor.createThreadWithFirstMessage(
        [client.id, worker.id],
        client.id,
        'Is Saturday free?'
      );

      expect(message.threadId).toBe(thread.id);
      expect(countRows('threads')).toBe(1);
      expect(countRows('messages')).toBe(1);
    });

    it('rolls back the thread when the first message cannot be stored', async () => {
      await expect(
        accessor.createThreadWithFirstMessage([client.id, worker.id], outsider.id, 'hi')
      ).rejects.toBeInstanceOf(ForbiddenError);

      expect(countRows('threads')).toBe(0);
      expect(countRows('thread_participants')).toBe(0);
      expect(countRows('messages')).toBe(0);
    });
  });

  describe('closeThread', () => {
    it('is idempotent', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);

      await accessor.closeThread(thread.id);
      await accessor.closeThread(thread.id);

      expect((await accessor.findById(thread.id))?.isClosed).toBe(true);
    });

    it('fails NotFound for an unknown thread', async () => {
      await expect(accessor.closeThread('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getThreadForUser', () => {
    it('returns participants, linked job and ordered messages to a participant', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);
      const job = seedJob(db, client.id, worker.id, { threadId: thread.id });
      await accessor.appendMessage(thread.id, client.id, 'one');
      await accessor.appendMessage(thread.id, worker.id, 'two');

      const view = await accessor.getThreadForUser(thread.id, worker.id);

      expect(view.id).toBe(thread.id);
      expect(view.job).toEqual({ id: job.id, status: 'NEGOTIATING' });
      expect(view.participants.map((p) => p.id)).toEqual([client.id, worker.id]);
      expect(view.participants.map((p) => p.role)).toEqual(['CLIENT', 'WORKER']);
      expect(view.messages.map((m) => m.content)).toEqual(['one', 'two']);
    });

    it('hides the thread from non-participants', async () => {
      const thread = await accessor.createThread([client.id, worker.id]);

      await expect(accessor.getThreadForUser(thread.id, outsider.id)).rejects.toThrow(
        'Thread not found or access denied.'
      );
      expect(await accessor.findThreadForUser(thread.id, outsider.id)).toBeNull();
      expect(await accessor.isParticipant(thread.id, outsider.id)).toBe(false);
      expect(await accessor.isParticipant(thread.id, client.id)).toBe(true);
    });
  });

  describe('listThreadsForUser', () => {
    it('orders by latest message, puts empty threads last and paginates', async () => {
      let clock = Date.parse('2026-03-01T12:00:00.000Z');
      const ticking = new SqliteThreadAccessor(() => db, {
        now: () => {
          clock += 1000;
          return new Date(clock);
        },
      });

      const quiet = await ticking.createThread([client.id, worker.id]);
      const older = await ticking.createThread([client.id, worker.id]);
      const newer = await ticking.createThread([client.id, outsider.id]);
      await ticking.appendMessage(newer.id, client.id, 'first');
      await ticking.appendMessage(older.id, worker.id, 'latest');

      const firstPage = await ticking.listThreadsForUser(client.id, { skip: 0, limit: 2 });
      const secondPage = await ticking.listThreadsForUser(client.id, { skip: 2, limit: 2 });

      expect(firstPage.items.map((t) => t.id)).toEqual([older.id, newer.id]);
      expect(firstPage.items[0]?.lastMessage?.content).toBe('latest');
      expect(firstPage.totalCount).toBe(3);
      expect(firstPage.hasNextPage).toBe(true);
      expect(secondPage.items.map((t) => t.id)).toEqual([quiet.id]);
      expect(secondPage.items[0]?.lastMessage).toBeNull();
      expect(secondPage.hasNextPage).toBe(false);
    });

    it('only lists threads the user participates in', async () => {
      await accessor.createThread([client.id, worker.id]);

      const page = await accessor.listThreadsForUser(outsider.id, { skip: 0, limit: 20 });

      expect(page).toEqual({ items: [], totalCount: 0, hasNextPage: false });
    });
  });
});
