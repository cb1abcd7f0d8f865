/**
 * Database client — Supabase primary, SQLite local fallback.
 *
 * Writes that fail because Supabase is unreachable are queued in SQLite and
 * replayed by syncPendingToSupabase() once a later write succeeds, or by
 * syncPendingOnce() when a later invocation first touches the database.
 */
import * as fs from 'fs';
import * as path from 'path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type FilterValue = string | number | boolean;
export type DbRow = Record<string, unknown>;

// ─── Supabase singleton ───────────────────────────────────────────────────────

let _supabase: SupabaseClient | null = null;
let supabaseDown = false;

export function getSupabase(): SupabaseClient {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY must be set to use the scene index or run history');
  }
  if (!_supabase) {
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY);
  }
  return _supabase;
}

export function isSupabaseConfigured(): boolean {
  return Boolean(env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY);
}

// ─── Connection error detection ───────────────────────────────────────────────

export function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('fetch failed') ||
      err.message.includes('network timeout') ||
      err.message.includes('ETIMEDOUT'))
  );
}

function markRecovered(): void {
  if (!supabaseDown) return;
  supabaseDown = false;
  void syncPendingToSupabase().catch((err) => {
    logger.warn('SQLite sync after recovery failed', { err });
  });
}

// ─── Generic CRUD helpers ─────────────────────────────────────────────────────

export async function dbInsert(table: string, data: DbRow): Promise<DbRow> {
  try {
    const { data: result, error } = await getSupabase()
      .from(table)
      .insert(data)
      .select()
      .single();
    if (error) throw new Error(error.message);
    markRecovered();
    const row: DbRow = result;
    return row;
  } catch (err) {
    if (isConnError(err)) {
      if (!supabaseDown) {
        supabaseDown = true;
        logger.warn('Supabase down — queueing writes in SQLite fallback', { table });
      }
      return localInsert(table, data);
    }
    throw err;
  }
}

export async function dbSelect(
  table: string,
  filters: Record<string, FilterValue> = {},
  order?: { column: string; ascending?: boolean },
): Promise<DbRow[]> {
  let q = getSupabase().from(table).select('*');
  for (const [k, v] of Object.entries(filters)) {
    q = q.eq(k, v);
  }
  const { data, error } = order
    ? await q.order(order.column, { ascending: order.ascending ?? true })
    : await q;
  if (error) throw new Error(`Supabase SELECT ${table} failed: ${error.message}`);
  const rows: DbRow[] = data ?? [];
  return rows;
}

// ─── SQLite fallback ──────────────────────────────────────────────────────────

let _localDb: BetterSqlite3.Database | null = null;
let pendingChecked = false;

export function localDbPath(): string {
  return env.LOCAL_DB_PATH ?? path.join(env.TEMP_DIR, 'history_fallback.db');
}

export async function getDb(): Promise<BetterSqlite3.Database> {
  if (!_localDb) {
    const { default: Database } = await import('better-sqlite3');
    const dbPath = localDbPath();
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    _localDb = new Database(dbPath);
    _localDb.exec(`
      CREATE TABLE IF NOT EXISTS pending_sync (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        table_name  TEXT    NOT NULL,
        record_data TEXT    NOT NULL,
        created_at  TEXT    NOT NULL DEFAULT (datetime('now'))
      )
    `);
  }
  return _localDb;
}

async function localInsert(table: string, data: DbRow): Promise<DbRow> {
  logger.warn('Writing INSERT to SQLite fallback', { table });
  const db = await getDb();
  db.prepare('INSERT INTO pending_sync (table_name, record_data) VALUES (?, ?)')
    .run(table, JSON.stringify(data));
  return { ...data, _fallback: true };
}

// ─── Sync recovery ────────────────────────────────────────────────────────────

const PendingRowSchema = z.object({
  id:          z.number(),
  table_name:  z.string(),
  record_data: z.string(),
});

const CountSchema = z.object({ cnt: z.number() });

/** Replays rows queued by an earlier invocation; checks at most once per process. */
export async function syncPendingOnce(): Promise<void> {
  if (pendingChecked) return;
  pendingChecked = true;
  if (!fs.existsSync(localDbPath())) return;
  await syncPendingToSupabase();
}

export async function syncPendingToSupabase(): Promise<void> {
  const db = await getDb();
  const pending = z.array(PendingRowSchema).parse(
    db.prepare('SELECT id, table_name, record_data FROM pending_sync ORDER BY id ASC').all(),
  );

  if (!pending.length) return;

  logger.info(`Syncing ${pending.length} local SQLite record(s) to Supabase`);

  for (const row of pending) {
    try {
      const payload = z.record(z.unknown()).parse(JSON.parse(row.record_data));
      const { error } = await getSupabase().from(row.table_name).upsert(payload);
      if (error) throw new Error(error.message);
      db.prepare('DELETE FROM pending_sync WHERE id = ?').run(row.id);
    } catch (err) {
      // Left in the queue for the next recovery cycle
      logger.warn('Sync retry failed — will retry on next recovery', {
        id: row.id,
        table: row.table_name,
        err,
      });
    }
  }

  const { cnt } = CountSchema.parse(db.prepare('SELECT COUNT(*) as cnt FROM pending_sync').get());
  if (cnt === 0) {
    logger.info('SQLite sync queue fully drained — Supabase is current');
  } else {
    logger.warn(`${cnt} record(s) still pending sync`);
  }
}
