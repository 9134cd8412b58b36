import { randomUUID } from 'node:crypto';
import { getDatabase, type SqliteDatabase } from '@/backend/db';

export interface ServiceListingRecord {
  id: string;
  workerId: string;
  title: string;
  description: string | null;
  location: string | null;
  createdAt: Date;
}

export interface CreateServiceListingInput {
  id?: string;
  workerId: string;
  title: string;
  description?: string | null;
  location?: string | null;
}

interface ServiceRow {
  id: string;
  worker_id: string;
  title: string;
  description: string | null;
  location: string | null;
  created_at: string;
}

/**
 * Read side of the service listings owned by the listing module. The
 * messaging core resolves a listing to the worker offering it.
 */
export interface ServiceListingAccessor {
  findById(id: string): Promise<ServiceListingRecord | null>;
  create(input: CreateServiceListingInput): Promise<ServiceListingRecord>;
}

export class SqliteServiceListingAccessor implements ServiceListingAccessor {
  constructor(private readonly getDb: () => SqliteDatabase = getDatabase) {}

  async findById(id: string): Promise<ServiceListingRecord | null> {
    const row = this.getDb()
      .prepare<[string], ServiceRow>('SELECT * FROM services WHERE id = ?')
      .get(id);
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      workerId: row.worker_id,
      title: row.title,
      description: row.description,
      location: row.location,
      createdAt: new Date(row.created_at),
    };
  }

  async create(input: CreateServiceListingInput): Promise<ServiceListingRecord> {
    const record: ServiceListingRecord = {
      id: input.id ?? randomUUID(),
      workerId: input.workerId,
      title: input.title,
      description: input.description ?? null,
      location: input.location ?? null,
      createdAt: new Date(),
    };
    this.getDb()
      .prepare(
        `INSERT INTO services (id, worker_id, title, description, location, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.id,
        record.workerId,
        record.title,
        record.description,
        record.location,
        record.createdAt.toISOString()
      );
    return record;
  }
}

export const serviceListingAccessor: ServiceListingAccessor = new SqliteServiceListingAccessor();
