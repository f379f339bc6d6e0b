/**
 * Database Connection
 * PostgreSQL pool shared by every repository
 */

import { Pool } from 'pg';

export function createDatabasePool(databaseUrl: string): Pool {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  return new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
}
