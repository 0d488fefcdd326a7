import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';

let pool: pg.Pool | null = null;
let dbInstance: NodePgDatabase | null = null;

export function getDb(databaseUrl?: string): NodePgDatabase {
  if (!dbInstance) {
    const connectionString = databaseUrl ?? process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL is not set');
    }
    pool = new pg.Pool({ connectionString });
    dbInstance = drizzle(pool);
  }
  return dbInstance;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    dbInstance = null;
  }
}
