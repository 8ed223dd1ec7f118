/**
 * Apply database migrations to Supabase
 * Usage: npm run db:migrate
 *
 * Statements go through an `exec_sql` RPC; projects without it should run
 * the files in supabase/migrations from the dashboard SQL editor instead.
 */

import 'dotenv/config';
import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';

import { createSupabaseAdmin } from '../src/lib/supabase.js';
import { createLogger } from '../src/lib/logger.js';

const logger = createLogger({ component: 'migrations' });

const SUPABASE_URL = process.env.SUPABASE_URL;
const SUPABASE_SERVICE_KEY = process.env.SUPABASE_SERVICE_KEY;

if (!SUPABASE_URL || !SUPABASE_SERVICE_KEY) {
  logger.fatal('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY');
  process.exit(1);
}

const supabase = createSupabaseAdmin({
  url: SUPABASE_URL,
  serviceKey: SUPABASE_SERVICE_KEY,
});

const MIGRATIONS_DIR = join(process.cwd(), 'supabase/migrations');

/**
 * Split a migration file on statement boundaries, dropping comment-only chunks
 */
function splitStatements(sql: string): string[] {
  return sql
    .split(/;\s*(?:\n|$)/)
    .map((statement) =>
      statement
        .split('\n')
        .filter((line) => !line.trim().startsWith('--'))
        .join('\n')
        .trim()
    )
    .filter((statement) => statement.length > 0);
}

async function applyMigration(filename: string): Promise<void> {
  const sql = readFileSync(join(MIGRATIONS_DIR, filename), 'utf-8');
  logger.info({ filename }, 'Applying migration');

  for (const statement of splitStatements(sql)) {
    const { error } = await supabase.rpc('exec_sql', { sql: statement });
    if (error) {
      throw new Error(`${filename}: ${error.message}`);
    }
  }

  logger.info({ filename }, 'Migration completed');
}

async function main(): Promise<void> {
  const files = readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    await applyMigration(file);
  }
  logger.info({ count: files.length }, 'All migrations applied');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Migration failed');
  process.exit(1);
});
