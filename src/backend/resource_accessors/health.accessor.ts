import { getDatabase, type SqliteDatabase } from '@/backend/db';

export class HealthAccessor {
  constructor(private readonly getDb: () => SqliteDatabase = getDatabase) {}

  async checkDatabaseConnection(): Promise<void> {
    this.getDb().prepare('SELECT 1').get();
  }
}

export const healthAccessor = new HealthAccessor();
