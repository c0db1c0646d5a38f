/**
 * BNPL Credit Protocol - Database Migration Runner
 * Executes schema.sql against PostgreSQL
 */

import { Pool } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config();

/**
 * schema.sql sits beside this file in src/, and is not copied by tsc
 */
export function resolveSchemaPath(baseDir: string = __dirname): string {
  const candidates = [
    path.join(baseDir, 'schema.sql'),
    path.join(baseDir, '..', '..', '..', 'src', 'database', 'schema.sql'),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

async function migrate(): Promise<void> {
  if (!process.env.DATABASE_URL) {
    console.error('[Migrate] DATABASE_URL not set');
    process.exit(1);
  }

  const pool = new Pool({
    connectionString: process.env.DATABASE_URL,
  });

  console.log('[Migrate] Connecting to database...');

  try {
    const schema = fs.readFileSync(resolveSchemaPath(), 'utf-8');

    console.log('[Migrate] Executing schema...');
    await pool.query(schema);
    console.log('[Migrate] Schema applied successfully');

    const result = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public' AND table_name LIKE 'bnpl_%'
      ORDER BY table_name
    `);

    console.log('[Migrate] Tables:');
    for (const row of result.rows) {
      console.log(`  - ${row.table_name}`);
    }
  } catch (error) {
    console.error('[Migrate] Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }

  console.log('[Migrate] Migration complete');
}

if (require.main === module) {
  migrate().catch((error: unknown) => {
    console.error('[Migrate] Fatal error:', error);
    process.exit(1);
  });
}
