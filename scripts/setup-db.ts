#!/usr/bin/env tsx
/**
 * Database migration runner. Applies every SQL file in /migrations/ in order,
 * skipping the ones already recorded in the `_migrations` table.
 * Run: npm run setup-db
 *
 * Requires an `exec_sql(sql text)` RPC on the Supabase project; without it,
 * apply the files with the Supabase CLI instead.
 *
 * Exit codes:
 *   0 — all migrations applied (or already up-to-date)
 *   1 — one or more migrations failed
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { readFileSync, readdirSync, existsSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Config ────────────────────────────────────────────────────────────────────

const SUPABASE_URL         = process.env['SUPABASE_URL'];
const SUPABASE_SERVICE_KEY = process.env['SUPABASE_SERVICE_KEY'];

if (!SUPABASE_URL || !SUPABASE_SERVICE_KEY) {
  console.error(`${RED}SUPABASE_URL and SUPABASE_SERVICE_KEY must be set in .env${RESET}`);
  console.error(`Run ${YELLOW}npm run check-env${RESET} first to validate all required variables.`);
  process.exit(1);
}

const sb: SupabaseClient = createClient(SUPABASE_URL, SUPABASE_SERVICE_KEY);

const migrationsDir = fileURLToPath(new URL('../migrations/', import.meta.url));

// ── Migration tracking ────────────────────────────────────────────────────────

async function executeSql(sql: string): Promise<void> {
  const { error } = await sb.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

async function ensureMigrationsTable(): Promise<void> {
  const { error } = await sb.from('_migrations').select('name').limit(1);
  if (!error || !error.message.includes('does not exist')) return;

  console.log(`  Creating ${CYAN}_migrations${RESET} tracking table…`);
  try {
    await executeSql(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id         SERIAL PRIMARY KEY,
        name       TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  } catch (err) {
    console.warn(`${YELLOW}  Could not create _migrations via exec_sql: ${err instanceof Error ? err.message : String(err)}`);
    console.warn(`  Tip: apply migrations with the Supabase CLI instead:  supabase db push${RESET}`);
  }
}

const MigrationRowSchema = z.object({ name: z.string() });

async function getAppliedMigrations(): Promise<Set<string>> {
  const { data, error } = await sb.from('_migrations').select('name');
  if (error) {
    if (error.message.includes('does not exist')) return new Set<string>();
    throw new Error(`Could not query _migrations: ${error.message}`);
  }
  return new Set(z.array(MigrationRowSchema).parse(data ?? []).map(r => r.name));
}

async function markApplied(name: string): Promise<void> {
  const { error } = await sb.from('_migrations').insert({ name });
  if (error && !error.message.includes('duplicate')) {
    console.warn(`  ${YELLOW}Warning: could not record migration ${name}: ${error.message}${RESET}`);
  }
}

// ── Main ──────────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== cutplan — Database Migration Runner ===${RESET}\n`);

if (!existsSync(migrationsDir)) {
  console.error(`${RED}migrations/ directory not found at ${migrationsDir}${RESET}`);
  process.exit(1);
}

const migrationFiles = readdirSync(migrationsDir)
  .filter(f => f.endsWith('.sql'))
  .sort();

if (migrationFiles.length === 0) {
  console.warn(`${YELLOW}No .sql files found in ${migrationsDir}${RESET}`);
  process.exit(0);
}

console.log(`Found ${migrationFiles.length} migration file(s):\n`);
migrationFiles.forEach(f => console.log(`  ${CYAN}${f}${RESET}`));
console.log('');

await ensureMigrationsTable();
const applied = await getAppliedMigrations();

let ranCount     = 0;
let skippedCount = 0;
let failedCount  = 0;

for (const file of migrationFiles) {
  process.stdout.write(`  ${file.replace('.sql', '')}… `);

  if (applied.has(file)) {
    console.log(`${YELLOW}skipped${RESET}  (already applied)`);
    skippedCount++;
    continue;
  }

  try {
    await executeSql(readFileSync(join(migrationsDir, file), 'utf-8'));
    await markApplied(file);
    console.log(`${GREEN}✓ applied${RESET}`);
    ranCount++;
  } catch (err) {
    console.error(`${RED}✗ FAILED${RESET}`);
    console.error(`    Error: ${err instanceof Error ? err.message : String(err)}`);
    // Keep going so every failure is reported in one run
    failedCount++;
  }
}

console.log('');
console.log(`${BOLD}Migration summary:${RESET}`);
console.log(`  ${GREEN}Applied:  ${ranCount}${RESET}`);
console.log(`  ${YELLOW}Skipped:  ${skippedCount}${RESET}  (already up-to-date)`);
if (failedCount > 0) {
  console.log(`  ${RED}Failed:   ${failedCount}${RESET}`);
  console.error(`\n${RED}${BOLD}Migration run had failures. Fix errors above, then re-run.${RESET}\n`);
  process.exit(1);
}

console.log(`\n${GREEN}${BOLD}All migrations complete.${RESET}\n`);
