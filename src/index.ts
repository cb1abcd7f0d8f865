#!/usr/bin/env node
/**
 * cutplan — turn a plain-language edit instruction into ffmpeg operations on a
 * pre-segmented video.
 *
 *   cutplan run <videoId> "<instruction>"    interpret, validate, compile, execute
 *   cutplan plan <videoId> "<instruction>"   same, but only print the commands
 *   cutplan scenes <videoId>                 print the scene index
 *   cutplan videos                           list videos in the scene index
 *   cutplan history <videoId>                print recorded runs
 */
import { Command, InvalidArgumentError } from 'commander';
import { loadPipelineConfig, type PipelineConfig } from './config.js';
import { isSupabaseConfigured } from './db/client.js';
import { SupabaseRunHistory } from './db/runs.js';
import { FileSceneIndex } from './db/scene-file.js';
import { SupabaseSceneIndex, listVideos, type SceneIndex } from './db/scenes.js';
import { ClaudeReasoningService } from './interpreter/index.js';
import { ffmpegRunner } from './media/ffmpeg.js';
import { formatCommandLine, formatSeconds, renderCommand } from './plan/compiler.js';
import { interpretAndRun, type RunReport } from './pipeline/index.js';
import { logger } from './utils/logger.js';

interface RunOptions {
  scenes?: string;
  source?: string;
  output?: string;
  workers?: number;
  fallbackFull?: boolean;
  history: boolean;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function sceneIndexFor(scenesFile: string | undefined): SceneIndex {
  return scenesFile ? new FileSceneIndex(scenesFile) : new SupabaseSceneIndex();
}

function pipelineConfig(opts: RunOptions): PipelineConfig {
  const overrides: Partial<PipelineConfig> = {};
  if (opts.output !== undefined) overrides.outputDir = opts.output;
  if (opts.workers !== undefined) overrides.workerLimit = opts.workers;
  return loadPipelineConfig(overrides);
}

// ── Output ────────────────────────────────────────────────────────────────────

function printPlan(report: RunReport): void {
  if (!report.plan) return;
  console.log(`Plan (${report.plan.operations.length} operation(s), ${report.plan.totalDurationSec.toFixed(3)}s of source):`);
  for (const op of report.plan.operations) {
    const deps = op.dependsOn.length ? ` ← ${op.dependsOn.join(', ')}` : '';
    const params = Object.keys(op.parameters).length ? ` ${JSON.stringify(op.parameters)}` : '';
    console.log(`  ${op.id}  ${op.kind.padEnd(7)} ${formatSeconds(op.sourceRange.start)}–${formatSeconds(op.sourceRange.end)}${params}${deps}`);
  }
}

function printCommands(report: RunReport): void {
  if (!report.compiled) return;
  console.log('\nCommands:');
  for (const command of report.compiled.commands) {
    console.log(`  # ${command.operation.id}`);
    console.log(`  ${formatCommandLine(renderCommand(command))}`);
  }
  for (const failure of report.compiled.failures) {
    console.log(`  # ${failure.operationId ?? '?'}: ${failure.message}`);
  }
}

function printResults(report: RunReport): void {
  if (!report.results.length) return;
  console.log('\nResults:');
  for (const r of report.results) {
    const detail = r.status === 'ok' ? r.outputPath ?? '' : r.errorDetail ?? '';
    console.log(`  ${r.operationId}  ${r.status.padEnd(7)} attempts=${r.attempts}  ${detail}`);
  }
  if (report.finalOutput) console.log(`\nEdited video: ${report.finalOutput}`);
}

// ── Commands ──────────────────────────────────────────────────────────────────

async function runCommand(videoId: string, instruction: string, opts: RunOptions, dryRun: boolean): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted — cancelling run (in-flight operations are signalled)');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const report = await interpretAndRun(
      {
        videoId,
        instruction,
        sourcePath: opts.source,
        dryRun,
        fallbackToFullVideo: Boolean(opts.fallbackFull),
      },
      {
        sceneIndex: sceneIndexFor(opts.scenes),
        reasoning: new ClaudeReasoningService(),
        runner: ffmpegRunner,
        config: pipelineConfig(opts),
        history: opts.history && isSupabaseConfigured() ? new SupabaseRunHistory() : null,
      },
      controller.signal,
    );

    printPlan(report);
    if (dryRun) printCommands(report);
    printResults(report);
    if (report.error) console.error(`\nError: ${report.error}`);
    process.exitCode = report.exitCode;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

const program = new Command();

program
  .name('cutplan')
  .description('Plan and run video edits from plain-language instructions');

const withRunOptions = (cmd: Command): Command => cmd
  .argument('<videoId>', 'video whose scene index to use')
  .argument('<instruction>', 'what the edited video should contain')
  .option('-s, --scenes <file>', 'read the scene index from a JSON file instead of Supabase')
  .option('--source <path>', 'original video (defaults to the path the scene index records)')
  .option('-o, --output <dir>', 'output directory (default: OUTPUT_DIR)')
  .option('-w, --workers <n>', 'operations to run at once (default: WORKER_LIMIT)', positiveInt)
  .option('--fallback-full', 'keep the whole video when nothing matches the instruction')
  .option('--no-history', 'do not record the run');

withRunOptions(program.command('run'))
  .alias('interpret-and-run')
  .description('Interpret the instruction and execute the resulting edit plan')
  .action(async (videoId: string, instruction: string, opts: RunOptions) => {
    await runCommand(videoId, instruction, opts, false);
  });

withRunOptions(program.command('plan'))
  .description('Interpret and compile the instruction without running anything')
  .action(async (videoId: string, instruction: string, opts: RunOptions) => {
    await runCommand(videoId, instruction, opts, true);
  });

program.command('scenes')
  .description('Print the scene index of a video')
  .argument('<videoId>')
  .option('-s, --scenes <file>', 'read the scene index from a JSON file instead of Supabase')
  .action(async (videoId: string, opts: { scenes?: string }) => {
    const index = sceneIndexFor(opts.scenes);
    const [scenes, sourcePath] = await Promise.all([index.getScenes(videoId), index.getSourcePath(videoId)]);
    console.log(`Source: ${sourcePath ?? '(unknown)'}`);
    for (const s of scenes) {
      console.log(`  ${formatSeconds(s.startTime)}–${formatSeconds(s.endTime)}  ${s.contentLabel.padEnd(14)} ${s.summary}`);
    }
    if (!scenes.length) console.log('  (no scenes)');
  });

program.command('videos')
  .description('List the videos the scene index knows')
  .action(async () => {
    const videos = await listVideos();
    for (const v of videos) {
      console.log(`  ${v.id.padEnd(24)} ${v.createdAt}  ${v.originalPath ?? '(no source path)'}`);
    }
    if (!videos.length) console.log('  (no videos)');
  });

program.command('history')
  .description('Print recorded runs of a video, newest first')
  .argument('<videoId>')
  .action(async (videoId: string) => {
    const runs = await new SupabaseRunHistory().listRuns(videoId);
    for (const run of runs) {
      console.log(`  ${run.startedAt}  exit=${run.exitCode}  ops=${run.operations}  ${JSON.stringify(run.instruction)}`);
      if (run.error) console.log(`      ${run.error}`);
    }
    if (!runs.length) console.log('  (no runs recorded)');
  });

program.parseAsync().catch((err: unknown) => {
  logger.error('Fatal error', { err });
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
