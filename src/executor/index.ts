/**
 * Executor — runs compiled commands against the transcoding tool.
 *
 * Per operation: pending → running → ok | failed; `skipped` when a dependency
 * did not reach ok or the run was cancelled before the operation started.
 * At most `workerLimit` operations run at once. Transient tool failures are
 * retried with backoff; output is written to a scratch file and only moved to
 * its final path on success.
 */
import * as path from 'path';
import { mkdir, rm } from 'fs/promises';
import { TRANSIENT_FAILURE, type PipelineConfig } from '../config.js';
import { ExecutionFailure } from '../errors.js';
import { createScratchDir, discardArtifact, partialPathFor, promoteArtifact } from '../media/artifacts.js';
import { stderrTail, type ToolOutcome, type ToolRunner } from '../media/ffmpeg.js';
import { outputPathFor, renderCommand, type CompiledPlan } from '../plan/compiler.js';
import type {
  CompiledCommand,
  EditOperation,
  ExecutionResult,
  OperationStatus,
  ValidatedPlan,
} from '../plan/types.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

export interface ExecutorOptions {
  config: PipelineConfig;
  runner: ToolRunner;
  /** The original video; never written to. */
  sourcePath: string;
  signal?: AbortSignal;
}

export interface ExecutionReport {
  /** One result per operation, in plan order. */
  results: ExecutionResult[];
  ok: boolean;
}

export function isTransientFailure(outcome: ToolOutcome): boolean {
  if (outcome.exitStatus !== null && TRANSIENT_FAILURE.exitStatuses.some(s => s === outcome.exitStatus)) {
    return true;
  }
  return TRANSIENT_FAILURE.stderrPatterns.some(p => p.test(outcome.stderr));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Single operation ──────────────────────────────────────────────────────────

async function runOperation(
  command: CompiledCommand,
  scratchDir: string,
  opts: ExecutorOptions,
  signal: AbortSignal,
): Promise<ExecutionResult> {
  const op = command.operation;
  const started = Date.now();
  const partial = partialPathFor(scratchDir, op.id);
  let attempts = 0;

  try {
    if (path.resolve(command.outputPath) === path.resolve(opts.sourcePath)) {
      throw new ExecutionFailure(op.id, `output ${command.outputPath} would overwrite the source video`, false);
    }

    await withRetry(async (attempt) => {
      attempts = attempt;
      if (signal.aborted) throw new ExecutionFailure(op.id, 'cancelled', false);

      const argv = renderCommand(command, { output: partial });
      logger.info('Executor: running operation', { operation: op.id, kind: op.kind, attempt });
      const outcome = await opts.runner.run(argv, signal);

      if (outcome.exitStatus === 0) {
        await promoteArtifact(partial, command.outputPath);
        return;
      }
      await discardArtifact(partial);
      if (signal.aborted) {
        throw new ExecutionFailure(op.id, 'cancelled while running', false, outcome.exitStatus);
      }
      throw new ExecutionFailure(
        op.id,
        `${op.kind} exited with status ${outcome.exitStatus ?? 'killed'}: ${stderrTail(outcome.stderr)}`,
        isTransientFailure(outcome),
        outcome.exitStatus,
      );
    }, {
      maxAttempts: opts.config.maxRetries + 1,
      baseDelayMs: opts.config.retryBaseDelayMs,
      isRetryable: (err) => err instanceof ExecutionFailure && err.transient,
      signal,
      label: op.id,
    });

    logger.info('Executor: operation ok', { operation: op.id, attempts, output: command.outputPath });
    return {
      operationId: op.id,
      status: 'ok',
      attempts,
      outputPath: command.outputPath,
      durationMs: Date.now() - started,
    };
  } catch (err) {
    await discardArtifact(partial);
    logger.error('Executor: operation failed', { operation: op.id, attempts, error: errorMessage(err) });
    return {
      operationId: op.id,
      status: 'failed',
      errorDetail: errorMessage(err),
      attempts,
      durationMs: Date.now() - started,
    };
  }
}

// ── Plan ──────────────────────────────────────────────────────────────────────

/** Outputs left by an earlier run must not outlive a failed or skipped rerun. */
async function clearStaleOutputs(
  ops: readonly EditOperation[],
  commands: ReadonlyMap<string, CompiledCommand>,
  opts: ExecutorOptions,
): Promise<void> {
  const source = path.resolve(opts.sourcePath);
  for (const op of ops) {
    const output = commands.get(op.id)?.outputPath ?? outputPathFor(opts.config.outputDir, op.id);
    if (path.resolve(output) !== source) await discardArtifact(output);
  }
}

function blockedReason(op: EditOperation, status: ReadonlyMap<string, OperationStatus>): string | null {
  for (const dep of op.dependsOn) {
    const state = status.get(dep);
    if (state === undefined) return `dependency ${dep} does not exist`;
    if (state === 'failed' || state === 'skipped') return `dependency ${dep} ${state}`;
  }
  return null;
}

export async function executePlan(
  plan: ValidatedPlan,
  compiled: CompiledPlan,
  opts: ExecutorOptions,
): Promise<ExecutionReport> {
  const signal = opts.signal ?? new AbortController().signal;
  const ops = plan.operations;
  const commands = new Map(compiled.commands.map(c => [c.operation.id, c]));
  const compileErrors = new Map(compiled.failures.map(f => [f.operationId ?? '', f]));
  const status = new Map<string, OperationStatus>(ops.map(op => [op.id, 'pending']));
  const results = new Map<string, ExecutionResult>();

  const finish = (result: ExecutionResult) => {
    status.set(result.operationId, result.status);
    results.set(result.operationId, result);
  };
  const skip = (op: EditOperation, reason: string) => {
    logger.warn('Executor: operation skipped', { operation: op.id, reason });
    finish({ operationId: op.id, status: 'skipped', errorDetail: reason, attempts: 0, durationMs: 0 });
  };

  logger.info('Executor: starting plan', { operations: ops.length, workerLimit: opts.config.workerLimit });
  await mkdir(opts.config.outputDir, { recursive: true });
  await clearStaleOutputs(ops, commands, opts);
  const scratchDir = await createScratchDir(opts.config.tempDir);

  try {
    await new Promise<void>((resolve) => {
      let running = 0;

      const schedule = () => {
        // Plan order: dependencies precede dependents, so one pass settles cascades
        for (const op of ops) {
          if (status.get(op.id) !== 'pending') continue;

          const compileError = compileErrors.get(op.id);
          if (compileError) {
            finish({ operationId: op.id, status: 'failed', errorDetail: compileError.message, attempts: 0, durationMs: 0 });
            continue;
          }
          const blocked = blockedReason(op, status);
          if (blocked) { skip(op, blocked); continue; }
          if (signal.aborted) { skip(op, 'cancelled before start'); continue; }
          if (!op.dependsOn.every(dep => status.get(dep) === 'ok')) continue;
          if (running >= opts.config.workerLimit) continue;

          const command = commands.get(op.id);
          if (!command) {
            finish({ operationId: op.id, status: 'failed', errorDetail: 'no compiled command', attempts: 0, durationMs: 0 });
            continue;
          }

          status.set(op.id, 'running');
          running++;
          void runOperation(command, scratchDir, opts, signal)
            .catch((err: unknown): ExecutionResult => ({
              operationId: op.id,
              status: 'failed',
              errorDetail: errorMessage(err),
              attempts: 0,
              durationMs: 0,
            }))
            .then((result) => {
              running--;
              finish(result);
              schedule();
            });
        }
        if (running === 0) resolve();
      };

      schedule();
    });
  } finally {
    await rm(scratchDir, { recursive: true, force: true });
  }

  for (const op of ops) {
    if (status.get(op.id) === 'pending') skip(op, 'dependency never completed');
  }

  const ordered = ops.flatMap(op => results.get(op.id) ?? []);
  const ok = ordered.every(r => r.status === 'ok');
  logger.info('Executor: plan finished', {
    ok,
    succeeded: ordered.filter(r => r.status === 'ok').length,
    failed: ordered.filter(r => r.status === 'failed').length,
    skipped: ordered.filter(r => r.status === 'skipped').length,
  });
  return { results: ordered, ok };
}
