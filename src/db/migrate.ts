/**
 * Creates the inventory table ahead of the first scheduled run
 * Usage: DATABASE_URL=postgres://... npm run db:migrate
 */

import 'dotenv/config';
import { createPool } from '../lib/db.js';
import { ensureSchema } from '../services/snapshot.service.js';

async function migrate(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error('DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const pool = createPool({ connectionString: databaseUrl });

  try {
    await ensureSchema(pool);
    console.log('Migration complete.');
  } catch (err) {
    console.error('Migration failed:', err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
