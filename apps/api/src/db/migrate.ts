import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { sql } from 'drizzle-orm';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { loadConfig } from '../lib/config.js';
import { createDatabase } from './index.js';

// drizzle-kit writes here (see drizzle.config.ts)
const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

const applyMigrations = async () => {
  const { databaseUrl } = loadConfig();
  if (!databaseUrl) throw new Error('DATABASE_URL is not set');

  const { db, close } = createDatabase(databaseUrl);
  try {
    // document_chunks.embedding needs the type before its table is created
    console.log('[Migrate] Ensuring the pgvector extension');
    await db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);

    console.log(`[Migrate] Applying migrations from ${MIGRATIONS_FOLDER}`);
    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
    console.log('[Migrate] Schema is up to date');
  } finally {
    await close();
  }
};

applyMigrations().catch((err) => {
  console.error('[Migrate] Failed:', err);
  process.exit(1);
});
