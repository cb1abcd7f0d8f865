/**
 * Pipeline orchestrator: scene index → interpretation → validation →
 * compilation → execution → run history.
 *
 * Exit codes: 0 every operation ok, 1 some operation failed or was skipped,
 * 2 the instruction could not be turned into a valid plan.
 */
import * as path from 'path';
import type { PipelineConfig } from '../config.js';
import type { RunHistory, ExitCode } from '../db/runs.js';
import type { SceneIndex } from '../db/scenes.js';
import { InterpretationFailed, NoMatchingContent, ValidationViolation } from '../errors.js';
import { executePlan } from '../executor/index.js';
import { fullVideoPlan, interpret, type ReasoningService } from '../interpreter/index.js';
import type { ToolRunner } from '../media/ffmpeg.js';
import { compilePlan, type CompiledPlan } from '../plan/compiler.js';
import type { EditPlan, ExecutionResult, SceneDescriptor, ValidatedPlan } from '../plan/types.js';
import { validatePlan } from '../plan/validator.js';
import { hashString } from '../utils/hash.js';
import { logger } from '../utils/logger.js';

export interface EditRequest {
  videoId: string;
  instruction: string;
  /** Overrides the path the scene index knows for this video. */
  sourcePath?: string;
  /** Stop after compilation. */
  dryRun?: boolean;
  /** When nothing matches, keep the whole covered video instead of failing. */
  fallbackToFullVideo?: boolean;
}

export interface PipelineDeps {
  sceneIndex: SceneIndex;
  reasoning: ReasoningService;
  runner: ToolRunner;
  config: PipelineConfig;
  history?: RunHistory | null;
}

export interface RunReport {
  exitCode: ExitCode;
  plan: ValidatedPlan | null;
  compiled: CompiledPlan | null;
  results: ExecutionResult[];
  /** Output of the plan's last operation when it finished ok. */
  finalOutput: string | null;
  error?: string;
}

/**
 * Per-video output directory; reruns for the same video replace earlier outputs.
 * Ids that had to be sanitized get a hash suffix so `a/b` and `a_b` stay apart.
 */
export function runOutputDir(outputDir: string, videoId: string): string {
  const safe = videoId.replace(/[^\w.-]+/g, '_');
  return path.join(outputDir, safe === videoId ? safe : `${safe}-${hashString(videoId).slice(0, 8)}`);
}

export async function resolveSourcePath(request: EditRequest, sceneIndex: SceneIndex): Promise<string> {
  const sourcePath = request.sourcePath ?? await sceneIndex.getSourcePath(request.videoId);
  if (!sourcePath) {
    throw new Error(`No source video known for ${request.videoId}; pass one explicitly`);
  }
  return path.resolve(sourcePath);
}

// ── Planning ──────────────────────────────────────────────────────────────────

export type Planned =
  | { ok: true; plan: ValidatedPlan }
  | { ok: false; error: Error };

async function draftPlan(
  request: EditRequest,
  scenes: readonly SceneDescriptor[],
  reasoning: ReasoningService,
  feedback?: readonly string[],
): Promise<EditPlan> {
  try {
    return (await interpret(request.instruction, scenes, reasoning, feedback)).plan;
  } catch (err) {
    if (err instanceof NoMatchingContent && request.fallbackToFullVideo) {
      logger.warn('Pipeline: nothing matched — falling back to the full video', { videoId: request.videoId });
      return fullVideoPlan(scenes);
    }
    throw err;
  }
}

/** Interpret and validate; a plan with violations gets one re-prompt carrying them. */
export async function planEdit(
  request: EditRequest,
  scenes: readonly SceneDescriptor[],
  reasoning: ReasoningService,
): Promise<Planned> {
  let feedback: string[] | undefined;

  for (let round = 1; ; round++) {
    let plan: EditPlan;
    try {
      plan = await draftPlan(request, scenes, reasoning, feedback);
    } catch (err) {
      if (err instanceof InterpretationFailed || err instanceof NoMatchingContent) return { ok: false, error: err };
      throw err;
    }

    const validation = validatePlan(plan, scenes);
    if (validation.ok) return { ok: true, plan: validation.plan };

    logger.warn('Pipeline: plan failed validation', { round, violations: validation.violations.length });
    if (round === 2) return { ok: false, error: new ValidationViolation(validation.violations) };
    feedback = validation.violations.map(v => `operation ${v.operationId} (#${v.operationIndex}): ${v.message}`);
  }
}

// ── Run ───────────────────────────────────────────────────────────────────────

export async function interpretAndRun(
  request: EditRequest,
  deps: PipelineDeps,
  signal?: AbortSignal,
): Promise<RunReport> {
  const startedAt = new Date();
  logger.info('Pipeline: starting', { videoId: request.videoId, dryRun: Boolean(request.dryRun) });

  const finish = async (report: RunReport): Promise<RunReport> => {
    if (deps.history && !request.dryRun) {
      try {
        await deps.history.recordRun({
          videoId:     request.videoId,
          instruction: request.instruction,
          exitCode:    report.exitCode,
          plan:        report.plan,
          results:     report.results,
          error:       report.error,
          startedAt,
          finishedAt:  new Date(),
        });
      } catch (err) {
        logger.warn('Pipeline: could not record run history', { err });
      }
    }
    logger.info('Pipeline: finished', { videoId: request.videoId, exitCode: report.exitCode });
    return report;
  };

  const sourcePath = await resolveSourcePath(request, deps.sceneIndex);
  const scenes = await deps.sceneIndex.getScenes(request.videoId);
  logger.info('Pipeline: scene index loaded', { scenes: scenes.length });

  const planned = await planEdit(request, scenes, deps.reasoning);
  if (!planned.ok) {
    logger.error('Pipeline: no valid plan', { error: planned.error.message });
    return finish({
      exitCode: 2,
      plan: null,
      compiled: null,
      results: [],
      finalOutput: null,
      error: planned.error.message,
    });
  }

  const plan = planned.plan;
  const config: PipelineConfig = {
    ...deps.config,
    outputDir: runOutputDir(deps.config.outputDir, request.videoId),
  };
  const compiled = compilePlan(plan, {
    sourcePath,
    outputDir: config.outputDir,
    ffmpegPath: config.ffmpegPath,
    disabledOperations: config.disabledOperations,
  });
  for (const failure of compiled.failures) {
    logger.warn('Pipeline: operation cannot be compiled', { operation: failure.operationId, kind: failure.kind });
  }

  if (request.dryRun) {
    return finish({
      exitCode: compiled.failures.length > 0 ? 1 : 0,
      plan,
      compiled,
      results: [],
      finalOutput: null,
    });
  }

  const execution = await executePlan(plan, compiled, { config, runner: deps.runner, sourcePath, signal });
  const last = execution.results[execution.results.length - 1];
  return finish({
    exitCode: execution.ok ? 0 : 1,
    plan,
    compiled,
    results: execution.results,
    finalOutput: last?.status === 'ok' ? last.outputPath ?? null : null,
  });
}
