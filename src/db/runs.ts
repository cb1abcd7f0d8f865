/**
 * Run history — one edit_runs row per pipeline run plus one execution_results
 * row per operation. Writes go through dbInsert, so they queue in SQLite while
 * Supabase is unreachable; the queue is replayed on the next call that reaches it.
 */
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { EditPlan, ExecutionResult } from '../plan/types.js';
import { hashString } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import { dbInsert, dbSelect, syncPendingOnce } from './client.js';

export type ExitCode = 0 | 1 | 2;

export interface RunRecord {
  videoId: string;
  instruction: string;
  exitCode: ExitCode;
  plan: EditPlan | null;
  results: readonly ExecutionResult[];
  error?: string;
  startedAt: Date;
  finishedAt: Date;
}

export interface RunSummary {
  id: string;
  videoId: string;
  instruction: string;
  exitCode: number;
  operations: number;
  planFingerprint: string | null;
  error: string | null;
  startedAt: string;
}

export interface RunHistory {
  recordRun(run: RunRecord): Promise<void>;
  listRuns(videoId: string): Promise<RunSummary[]>;
}

/** Stable across runs that produce the same plan, whatever the instruction wording. */
export function planFingerprint(plan: EditPlan): string {
  return hashString(JSON.stringify(plan.operations));
}

// ─── Supabase ─────────────────────────────────────────────────────────────────

const EditRunRowSchema = z.object({
  id:               z.string(),
  video_id:         z.string(),
  instruction:      z.string(),
  exit_code:        z.coerce.number(),
  operation_count:  z.coerce.number().default(0),
  plan_fingerprint: z.string().nullable().default(null),
  error:            z.string().nullable().default(null),
  started_at:       z.string(),
});

export class SupabaseRunHistory implements RunHistory {
  async recordRun(run: RunRecord): Promise<void> {
    await syncPendingOnce();
    const id = randomUUID();
    await dbInsert('edit_runs', {
      id,
      video_id:         run.videoId,
      instruction:      run.instruction,
      exit_code:        run.exitCode,
      operation_count:  run.plan?.operations.length ?? 0,
      plan:             run.plan,
      plan_fingerprint: run.plan ? planFingerprint(run.plan) : null,
      error:            run.error ?? null,
      started_at:       run.startedAt.toISOString(),
      finished_at:      run.finishedAt.toISOString(),
    });

    for (const result of run.results) {
      await dbInsert('execution_results', {
        run_id:       id,
        operation_id: result.operationId,
        status:       result.status,
        attempts:     result.attempts,
        error_detail: result.errorDetail ?? null,
        output_path:  result.outputPath ?? null,
        duration_ms:  result.durationMs,
      });
    }
    logger.info('Run recorded', { runId: id, videoId: run.videoId, exitCode: run.exitCode });
  }

  async listRuns(videoId: string): Promise<RunSummary[]> {
    await syncPendingOnce();
    const rows = await dbSelect('edit_runs', { video_id: videoId }, { column: 'started_at', ascending: false });
    return rows.map((row) => {
      const r = EditRunRowSchema.parse(row);
      return {
        id:              r.id,
        videoId:         r.video_id,
        instruction:     r.instruction,
        exitCode:        r.exit_code,
        operations:      r.operation_count,
        planFingerprint: r.plan_fingerprint,
        error:           r.error,
        startedAt:       r.started_at,
      };
    });
  }
}
