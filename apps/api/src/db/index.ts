import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close: () => Promise<void>;
}

export const createDatabase = (connectionString: string): DatabaseHandle => {
  const client = postgres(connectionString, { max: 10 });
  const db = drizzle(client, { schema });
  return {
    db,
    close: () => client.end(),
  };
};
