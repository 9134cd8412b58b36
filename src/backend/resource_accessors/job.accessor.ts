import { randomUUID } from 'node:crypto';
import { getDatabase, type SqliteDatabase } from '@/backend/db';
import { InvalidStateError } from '@/backend/lib/errors';
import { isJobStatus, JobStatus } from '@/shared/core';
import { type Page, type PageRequest, toPage } from './pagination';

export interface JobRecord {
  id: string;
  clientId: string;
  workerId: string;
  serviceId: string | null;
  status: JobStatus;
  startedAt: Date | null;
  completedAt: Date | null;
  cancelledAt: Date | null;
  cancelReason: string | null;
  createdAt: Date;
  updatedAt: Date;
  /** Conversation thread linked to this job, resolved through threads.job_id. */
  threadId: string | null;
}

export interface CreateLinkedJobInput {
  clientId: string;
  workerId: string;
  serviceId: string | null;
  threadId: string;
}

export interface JobTransitionData {
  status: JobStatus;
  startedAt?: Date;
  completedAt?: Date;
  cancelledAt?: Date;
  cancelReason?: string;
}

export interface JobTransitionOptions {
  /** Close the job's linked thread in the same transaction as the status write. */
  closeLinkedThread?: boolean;
}

export interface JobAccessorOptions {
  now?: () => Date;
}

export interface JobAccessor {
  createLinkedToThread(input: CreateLinkedJobInput): Promise<JobRecord>;
  findById(id: string): Promise<JobRecord | null>;
  listForUser(userId: string, page: PageRequest): Promise<Page<JobRecord>>;
  /**
   * Compare-and-set status write: applies only while the job is still in
   * `fromStatus`. Returns the number of rows updated (0 or 1).
   */
  transitionWithCas(
    id: string,
    fromStatus: JobStatus,
    data: JobTransitionData,
    options?: JobTransitionOptions
  ): Promise<{ count: number }>;
}

interface JobRow {
  id: string;
  client_id: string;
  worker_id: string;
  service_id: string | null;
  status: string;
  started_at: string | null;
  completed_at: string | null;
  cancelled_at: string | null;
  cancel_reason: string | null;
  created_at: string;
  updated_at: string;
  thread_id: string | null;
}

const JOB_SELECT = `
  SELECT j.*, t.id AS thread_id
  FROM jobs j
  LEFT JOIN threads t ON t.job_id = j.id`;

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toJobRecord(row: JobRow): JobRecord {
  if (!isJobStatus(row.status)) {
    throw new Error(`Unknown job status in storage: ${row.status}`);
  }
  return {
    id: row.id,
    clientId: row.client_id,
    workerId: row.worker_id,
    serviceId: row.service_id,
    status: row.status,
    startedAt: toDate(row.started_at),
    completedAt: toDate(row.completed_at),
    cancelledAt: toDate(row.cancelled_at),
    cancelReason: row.cancel_reason,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    threadId: row.thread_id,
  };
}

export class SqliteJobAccessor implements JobAccessor {
  private readonly now: () => Date;

  constructor(
    private readonly getDb: () => SqliteDatabase = getDatabase,
    options: JobAccessorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createLinkedToThread(input: CreateLinkedJobInput): Promise<JobRecord> {
    const db = this.getDb();
    const id = randomUUID();
    const timestamp = this.now().toISOString();

    db.transaction(() => {
      db.prepare(
        `INSERT INTO jobs (id, client_id, worker_id, service_id, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      ).run(
        id,
        input.clientId,
        input.workerId,
        input.serviceId,
        JobStatus.NEGOTIATING,
        timestamp,
        timestamp
      );

      const linked = db
        .prepare(
          'UPDATE threads SET job_id = ? WHERE id = ? AND job_id IS NULL AND is_closed = 0'
        )
        .run(id, input.threadId);
      if (linked.changes === 0) {
        throw new InvalidStateError('Thread is already linked to a job or closed.');
      }
    })();

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`Job ${id} vanished after insert`);
    }
    return created;
  }

  async findById(id: string): Promise<JobRecord | null> {
    const row = this.getDb().prepare<[string], JobRow>(`${JOB_SELECT} WHERE j.id = ?`).get(id);
    return row ? toJobRecord(row) : null;
  }

  async listForUser(userId: string, page: PageRequest): Promise<Page<JobRecord>> {
    const db = this.getDb();
    return db.transaction(() => {
      const countRow = db
        .prepare<[string, string], { total: number }>(
          'SELECT COUNT(*) AS total FROM jobs WHERE client_id = ? OR worker_id = ?'
        )
        .get(userId, userId);
      const rows = db
        .prepare<[string, string, number, number], JobRow>(
          `${JOB_SELECT}
           WHERE j.client_id = ? OR j.worker_id = ?
           ORDER BY j.created_at DESC, j.id DESC
           LIMIT ? OFFSET ?`
        )
        .all(userId, userId, page.limit, page.skip);
      return toPage(rows.map(toJobRecord), countRow?.total ?? 0, page);
    })();
  }

  async transitionWithCas(
    id: string,
    fromStatus: JobStatus,
    data: JobTransitionData,
    options: JobTransitionOptions = {}
  ): Promise<{ count: number }> {
    const db = this.getDb();
    return db.transaction(() => {
      const result = db
        .prepare(
          `UPDATE jobs SET
             status = @status,
             started_at = COALESCE(@startedAt, started_at),
             completed_at = COALESCE(@completedAt, completed_at),
             cancelled_at = COALESCE(@cancelledAt, cancelled_at),
             cancel_reason = COALESCE(@cancelReason, cancel_reason),
             updated_at = @updatedAt
           WHERE id = @id AND status = @fromStatus`
        )
        .run({
          id,
          fromStatus,
          status: data.status,
          startedAt: data.startedAt?.toISOString() ?? null,
          completedAt: data.completedAt?.toISOString() ?? null,
          cancelledAt: data.cancelledAt?.toISOString() ?? null,
          cancelReason: data.cancelReason ?? null,
          updatedAt: this.now().toISOString(),
        });

      if (result.changes === 1 && options.closeLinkedThread) {
        db.prepare('UPDATE threads SET is_closed = 1 WHERE job_id = ?').run(id);
      }

      return { count: result.changes };
    })();
  }
}

export const jobAccessor: JobAccessor = new SqliteJobAccessor();
