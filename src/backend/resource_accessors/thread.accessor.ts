import { randomUUID } from 'node:crypto';
import { getDatabase, type SqliteDatabase } from '@/backend/db';
import {
  ForbiddenError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  ThreadClosedError,
} from '@/backend/lib/errors';
import { isJobStatus, type JobStatus, type UserRole } from '@/shared/core';
import { type Page, type PageRequest, placeholders, toPage } from './pagination';
import { toUserRole } from './user.accessor';

export interface ThreadRecord {
  id: string;
  createdAt: Date;
  isClosed: boolean;
  jobId: string | null;
}

export interface SenderInfo {
  id: string;
  firstName: string;
  lastName: string;
  profilePicture: string | null;
}

export interface ParticipantInfo extends SenderInfo {
  role: UserRole;
}

export interface MessageView {
  id: string;
  threadId: string;
  content: string;
  timestamp: Date;
  sequence: number;
  sender: SenderInfo;
}

export interface ThreadJobInfo {
  id: string;
  status: JobStatus;
}

export interface ThreadView {
  id: string;
  createdAt: Date;
  isClosed: boolean;
  job: ThreadJobInfo | null;
  participants: ParticipantInfo[];
  messages: MessageView[];
}

export interface ThreadSummary {
  id: string;
  createdAt: Date;
  isClosed: boolean;
  job: ThreadJobInfo | null;
  participants: ParticipantInfo[];
  lastMessage: MessageView | null;
}

export interface CreatedThread {
  thread: ThreadRecord;
  message: MessageView;
}

export interface ThreadAccessorOptions {
  now?: () => Date;
}

/**
 * Durable store for threads, participants and messages.
 *
 * Every mutation runs in a single SQLite transaction. Message timestamps are
 * strictly increasing within a thread: each one is the later of the clock and
 * the previous message's timestamp plus one millisecond.
 */
export interface ThreadAccessor {
  createThread(participantIds: Iterable<string>, jobId?: string | null): Promise<ThreadRecord>;
  createThreadWithFirstMessage(
    participantIds: Iterable<string>,
    senderId: string,
    content: string,
    jobId?: string | null
  ): Promise<CreatedThread>;
  appendMessage(threadId: string, senderId: string, content: string): Promise<MessageView>;
  closeThread(threadId: string): Promise<void>;
  findById(threadId: string): Promise<ThreadRecord | null>;
  findThreadForUser(threadId: string, userId: string): Promise<ThreadRecord | null>;
  isParticipant(threadId: string, userId: string): Promise<boolean>;
  getThreadForUser(threadId: string, userId: string): Promise<ThreadView>;
  listThreadsForUser(userId: string, page: PageRequest): Promise<Page<ThreadSummary>>;
}

interface ThreadRow {
  id: string;
  created_at: string;
  is_closed: number;
  job_id: string | null;
}

interface ThreadWithJobRow extends ThreadRow {
  job_status: string | null;
}

interface ThreadSummaryRow extends ThreadWithJobRow {
  last_message_id: string | null;
}

interface MessageRow {
  id: string;
  thread_id: string;
  content: string;
  timestamp: string;
  sequence: number;
  sender_id: string;
  first_name: string;
  last_name: string;
  profile_picture: string | null;
}

interface ParticipantRow {
  thread_id: string;
  id: string;
  role: string;
  first_name: string;
  last_name: string;
  profile_picture: string | null;
}

const MESSAGE_SELECT = `
  SELECT m.id, m.thread_id, m.content, m.timestamp, m.sequence, m.sender_id,
         u.first_name, u.last_name, u.profile_picture
  FROM messages m
  JOIN users u ON u.id = m.sender_id`;

function toThreadRecord(row: ThreadRow): ThreadRecord {
  return {
    id: row.id,
    createdAt: new Date(row.created_at),
    isClosed: row.is_closed === 1,
    jobId: row.job_id,
  };
}

function toJobInfo(row: ThreadWithJobRow): ThreadJobInfo | null {
  if (row.job_id === null || row.job_status === null || !isJobStatus(row.job_status)) {
    return null;
  }
  return { id: row.job_id, status: row.job_status };
}

function toMessageView(row: MessageRow): MessageView {
  return {
    id: row.id,
    threadId: row.thread_id,
    content: row.content,
    timestamp: new Date(row.timestamp),
    sequence: row.sequence,
    sender: {
      id: row.sender_id,
      firstName: row.first_name,
      lastName: row.last_name,
      profilePicture: row.profile_picture,
    },
  };
}

function toParticipantInfo(row: ParticipantRow): ParticipantInfo {
  return {
    id: row.id,
    role: toUserRole(row.role),
    firstName: row.first_name,
    lastName: row.last_name,
    profilePicture: row.profile_picture,
  };
}

export class SqliteThreadAccessor implements ThreadAccessor {
  private readonly now: () => Date;

  constructor(
    private readonly getDb: () => SqliteDatabase = getDatabase,
    options: ThreadAccessorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createThread(
    participantIds: Iterable<string>,
    jobId: string | null = null
  ): Promise<ThreadRecord> {
    const db = this.getDb();
    return db.transaction(() => this.insertThread(db, participantIds, jobId))();
  }

  async createThreadWithFirstMessage(
    participantIds: Iterable<string>,
    senderId: string,
    content: string,
    jobId: string | null = null
  ): Promise<CreatedThread> {
    const db = this.getDb();
    return db.transaction(() => {
      const thread = this.insertThread(db, participantIds, jobId);
      const message = this.insertMessage(db, thread.id, senderId, content);
      return { thread, message };
    })();
  }

  async appendMessage(threadId: string, senderId: string, content: string): Promise<MessageView> {
    const db = this.getDb();
    return db.transaction(() => this.insertMessage(db, threadId, senderId, content))();
  }

  async closeThread(threadId: string): Promise<void> {
    const result = this.getDb()
      .prepare('UPDATE threads SET is_closed = 1 WHERE id = ?')
      .run(threadId);
    if (result.changes === 0) {
      throw new NotFoundError('Thread not found.');
    }
  }

  async findById(threadId: string): Promise<ThreadRecord | null> {
    const row = this.getDb()
      .prepare<[string], ThreadRow>('SELECT id, created_at, is_closed, job_id FROM threads WHERE id = ?')
      .get(threadId);
    return row ? toThreadRecord(row) : null;
  }

  async findThreadForUser(threadId: string, userId: string): Promise<ThreadRecord | null> {
    const row = this.getDb()
      .prepare<[string, string], ThreadRow>(
        `SELECT t.id, t.created_at, t.is_closed, t.job_id
         FROM threads t
         JOIN thread_participants p ON p.thread_id = t.id
         WHERE t.id = ? AND p.user_id = ?`
      )
      .get(threadId, userId);
    return row ? toThreadRecord(row) : null;
  }

  async isParticipant(threadId: string, userId: string): Promise<boolean> {
    return this.isParticipantSync(this.getDb(), threadId, userId);
  }

  async getThreadForUser(threadId: string, userId: string): Promise<ThreadView> {
    const db = this.getDb();
    return db.transaction(() => {
      const row = db
        .prepare<[string, string], ThreadWithJobRow>(
          `SELECT t.id, t.created_at, t.is_closed, t.job_id, j.status AS job_status
           FROM threads t
           JOIN thread_participants p ON p.thread_id = t.id AND p.user_id = ?
           LEFT JOIN jobs j ON j.id = t.job_id
           WHERE t.id = ?`
        )
        .get(userId, threadId);
      if (!row) {
        throw new NotFoundError('Thread not found or access denied.');
      }

      const messages = db
        .prepare<[string], MessageRow>(
          `${MESSAGE_SELECT} WHERE m.thread_id = ? ORDER BY m.timestamp ASC, m.sequence ASC`
        )
        .all(threadId)
        .map(toMessageView);

      return {
        ...toThreadRecord(row),
        job: toJobInfo(row),
        participants: this.loadParticipants(db, [threadId]).get(threadId) ?? [],
        messages,
      };
    })();
  }

  async listThreadsForUser(userId: string, page: PageRequest): Promise<Page<ThreadSummary>> {
    const db = this.getDb();
    return db.transaction(() => {
      const countRow = db
        .prepare<[string], { total: number }>(
          'SELECT COUNT(*) AS total FROM thread_participants WHERE user_id = ?'
        )
        .get(userId);
      const totalCount = countRow?.total ?? 0;

      const rows = db
        .prepare<[string, number, number], ThreadSummaryRow>(
          `SELECT t.id, t.created_at, t.is_closed, t.job_id, j.status AS job_status,
                  lm.id AS last_message_id
           FROM threads t
           JOIN thread_participants p ON p.thread_id = t.id AND p.user_id = ?
           LEFT JOIN jobs j ON j.id = t.job_id
           LEFT JOIN messages lm ON lm.thread_id = t.id
             AND lm.sequence = (SELECT MAX(sequence) FROM messages WHERE thread_id = t.id)
           ORDER BY (lm.timestamp IS NULL) ASC, lm.timestamp DESC, t.created_at DESC, t.id DESC
           LIMIT ? OFFSET ?`
        )
        .all(userId, page.limit, page.skip);

      const threadIds = rows.map((row) => row.id);
      const participants = this.loadParticipants(db, threadIds);
      const lastMessages = this.loadMessagesById(
        db,
        rows.flatMap((row) => (row.last_message_id === null ? [] : [row.last_message_id]))
      );

      const items = rows.map((row) => ({
        ...toThreadRecord(row),
        job: toJobInfo(row),
        participants: participants.get(row.id) ?? [],
        lastMessage:
          row.last_message_id === null ? null : (lastMessages.get(row.last_message_id) ?? null),
      }));

      return toPage(items, totalCount, page);
    })();
  }

  private insertThread(
    db: SqliteDatabase,
    participantIds: Iterable<string>,
    jobId: string | null
  ): ThreadRecord {
    const uniqueIds = [...new Set(participantIds)];
    if (uniqueIds.length < 2) {
      throw new InvalidArgumentError('A thread needs at least two distinct participants.');
    }

    const known = db
      .prepare<string[], { id: string }>(
        `SELECT id FROM users WHERE id IN (${placeholders(uniqueIds.length)})`
      )
      .all(...uniqueIds);
    if (known.length !== uniqueIds.length) {
      throw new InvalidArgumentError('Unknown participant.');
    }

    if (jobId !== null) {
      const linked = db
        .prepare<[string], { id: string }>('SELECT id FROM threads WHERE job_id = ?')
        .get(jobId);
      if (linked) {
        throw new InvalidStateError('Job already has a conversation thread.');
      }
    }

    const thread: ThreadRecord = {
      id: randomUUID(),
      createdAt: this.now(),
      isClosed: false,
      jobId,
    };
    db.prepare('INSERT INTO threads (id, created_at, is_closed, job_id) VALUES (?, ?, 0, ?)').run(
      thread.id,
      thread.createdAt.toISOString(),
      thread.jobId
    );

    const insertParticipant = db.prepare(
      'INSERT INTO thread_participants (id, thread_id, user_id) VALUES (?, ?, ?)'
    );
    for (const userId of uniqueIds) {
      insertParticipant.run(randomUUID(), thread.id, userId);
    }

    return thread;
  }

  private insertMessage(
    db: SqliteDatabase,
    threadId: string,
    senderId: string,
    content: string
  ): MessageView {
    const thread = db
      .prepare<[string], { is_closed: number }>('SELECT is_closed FROM threads WHERE id = ?')
      .get(threadId);
    if (!thread) {
      throw new NotFoundError('Thread not found.');
    }
    if (thread.is_closed === 1) {
      throw new ThreadClosedError();
    }
    if (!this.isParticipantSync(db, threadId, senderId)) {
      throw new ForbiddenError('You are not a participant of this thread.');
    }

    const last = db
      .prepare<[string], { timestamp: string; sequence: number }>(
        'SELECT timestamp, sequence FROM messages WHERE thread_id = ? ORDER BY sequence DESC LIMIT 1'
      )
      .get(threadId);

    const nowMs = this.now().getTime();
    const timestampMs = last ? Math.max(nowMs, Date.parse(last.timestamp) + 1) : nowMs;
    const id = randomUUID();
    const sequence = last ? last.sequence + 1 : 1;

    db.prepare(
      `INSERT INTO messages (id, thread_id, sender_id, content, timestamp, sequence)
       VALUES (?, ?, ?, ?, ?, ?)`
    ).run(id, threadId, senderId, content, new Date(timestampMs).toISOString(), sequence);

    const row = db.prepare<[string], MessageRow>(`${MESSAGE_SELECT} WHERE m.id = ?`).get(id);
    if (!row) {
      throw new Error(`Message ${id} vanished after insert`);
    }
    return toMessageView(row);
  }

  private isParticipantSync(db: SqliteDatabase, threadId: string, userId: string): boolean {
    const row = db
      .prepare<[string, string], { id: string }>(
        'SELECT id FROM thread_participants WHERE thread_id = ? AND user_id = ?'
      )
      .get(threadId, userId);
    return row !== undefined;
  }

  private loadParticipants(
    db: SqliteDatabase,
    threadIds: string[]
  ): Map<string, ParticipantInfo[]> {
    const byThread = new Map<string, ParticipantInfo[]>();
    if (threadIds.length === 0) {
      return byThread;
    }
    const rows = db
      .prepare<string[], ParticipantRow>(
        `SELECT p.thread_id, u.id, u.role, u.first_name, u.last_name, u.profile_picture
         FROM thread_participants p
         JOIN users u ON u.id = p.user_id
         WHERE p.thread_id IN (${placeholders(threadIds.length)})
         ORDER BY p.rowid ASC`
      )
      .all(...threadIds);
    for (const row of rows) {
      const list = byThread.get(row.thread_id) ?? [];
      list.push(toParticipantInfo(row));
      byThread.set(row.thread_id, list);
    }
    return byThread;
  }

  private loadMessagesById(db: SqliteDatabase, messageIds: string[]): Map<string, MessageView> {
    const byId = new Map<string, MessageView>();
    if (messageIds.length === 0) {
      return byId;
    }
    const rows = db
      .prepare<string[], MessageRow>(
        `${MESSAGE_SELECT} WHERE m.id IN (${placeholders(messageIds.length)})`
      )
      .all(...messageIds);
    for (const row of rows) {
      byId.set(row.id, toMessageView(row));
    }
    return byId;
  }
}

export const threadAccessor: ThreadAccessor = new SqliteThreadAccessor();
