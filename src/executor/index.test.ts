import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import type { PipelineConfig } from '../config.js';
import type { ToolOutcome, ToolRunner } from '../media/ffmpeg.js';
import { compilePlan } from '../plan/compiler.js';
import type { EditOperation, ValidatedPlan } from '../plan/types.js';
import { executePlan, isTransientFailure } from './index.js';

let tmp: string;
let config: PipelineConfig;
let sourcePath: string;

beforeEach(async () => {
  tmp = await mkdtemp(path.join(tmpdir(), 'cutplan-exec-'));
  sourcePath = path.join(tmp, 'talk.mp4');
  config = {
    outputDir: path.join(tmp, 'out'),
    tempDir: path.join(tmp, 'scratch'),
    maxRetries: 2,
    workerLimit: 2,
    retryBaseDelayMs: 0,
    ffmpegPath: 'ffmpeg',
    disabledOperations: [],
  };
});

afterEach(async () => {
  await rm(tmp, { recursive: true, force: true });
});

const trim = (id: string, start: number, end: number): EditOperation => ({
  id, kind: 'trim', sourceRange: { start, end }, parameters: {}, dependsOn: [],
});

const mute = (id: string, dep: string): EditOperation => ({
  id, kind: 'mute', sourceRange: { start: 10, end: 20 }, parameters: {}, dependsOn: [dep],
});

const validated = (...operations: EditOperation[]): ValidatedPlan => ({
  operations, coverage: [{ start: 0, end: 40 }], totalDurationSec: 0,
});

/** Writes the output file (last argv entry) whenever it reports success. */
function fakeRunner(outcome: (argv: readonly string[], call: number) => ToolOutcome | Promise<ToolOutcome>) {
  let calls = 0;
  const run = vi.fn<ToolRunner['run']>(async (argv) => {
    const result = await outcome(argv, ++calls);
    const output = argv[argv.length - 1];
    if (result.exitStatus === 0 && output) await writeFile(output, `frames for ${argv.join(' ')}`);
    return result;
  });
  const runner: ToolRunner = { run };
  return { runner, run };
}

const ok: ToolOutcome = { exitStatus: 0, stderr: '' };

async function execute(plan: ValidatedPlan, runner: ToolRunner, signal?: AbortSignal, cfg = config) {
  const compiled = compilePlan(plan, { sourcePath, outputDir: cfg.outputDir, ffmpegPath: 'ffmpeg', disabledOperations: cfg.disabledOperations });
  return executePlan(plan, compiled, { config: cfg, runner, sourcePath, signal });
}

describe('executePlan', () => {
  it('runs dependent operations in order and promotes their outputs', async () => {
    const { runner, run } = fakeRunner(() => ok);

    const report = await execute(validated(trim('op-1', 10, 20), mute('op-2', 'op-1')), runner);

    expect(report.ok).toBe(true);
    expect(report.results.map(r => [r.operationId, r.status, r.attempts])).toEqual([
      ['op-1', 'ok', 1],
      ['op-2', 'ok', 1],
    ]);
    expect(report.results[1]?.outputPath).toBe(path.join(config.outputDir, 'op-2.mp4'));
    expect(existsSync(path.join(config.outputDir, 'op-2.mp4'))).toBe(true);
    // the mute reads the trim's final output
    expect(run.mock.calls[1]?.[0]).toContain(path.join(config.outputDir, 'op-1.mp4'));
    expect(await readdir(config.tempDir)).toEqual([]);
  });

  it('trims the source to 10.000–20.000', async () => {
    const { runner, run } = fakeRunner(() => ok);

    await execute(validated(trim('op-1', 10, 20)), runner);

    const argv = run.mock.calls[0]?.[0] ?? [];
    expect(argv.slice(0, 8)).toEqual(['ffmpeg', '-y', '-ss', '10.000', '-to', '20.000', '-i', sourcePath]);
  });

  it('skips dependents of a permanently failed operation', async () => {
    const { runner, run } = fakeRunner(() => ({ exitStatus: 1, stderr: 'Invalid data found when processing input\n' }));

    const report = await execute(validated(trim('op-1', 10, 20), mute('op-2', 'op-1')), runner);

    expect(report.ok).toBe(false);
    expect(report.results).toEqual([
      {
        operationId: 'op-1',
        status: 'failed',
        errorDetail: 'trim exited with status 1: Invalid data found when processing input',
        attempts: 1,
        durationMs: expect.any(Number),
      },
      { operationId: 'op-2', status: 'skipped', errorDetail: 'dependency op-1 failed', attempts: 0, durationMs: 0 },
    ]);
    expect(run).toHaveBeenCalledTimes(1);
    expect(existsSync(path.join(config.outputDir, 'op-1.mp4'))).toBe(false);
  });

  it('retries transient failures', async () => {
    const { runner } = fakeRunner((_argv, call) =>
      call === 1 ? { exitStatus: 75, stderr: '' }
      : call === 2 ? { exitStatus: 1, stderr: 'Resource temporarily unavailable' }
      : ok);

    const report = await execute(validated(trim('op-1', 10, 20)), runner);

    expect(report.results[0]).toMatchObject({ status: 'ok', attempts: 3 });
  });

  it('gives up after maxRetries transient failures', async () => {
    const { runner, run } = fakeRunner(() => ({ exitStatus: 75, stderr: '' }));

    const report = await execute(validated(trim('op-1', 10, 20)), runner);

    expect(report.results[0]).toMatchObject({ status: 'failed', attempts: 3 });
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('fails an operation whose tool reported success without output', async () => {
    const runner: ToolRunner = { run: async () => ok };

    const report = await execute(validated(trim('op-1', 10, 20)), runner);

    expect(report.results[0]?.status).toBe('failed');
    expect(report.results[0]?.errorDetail).toMatch(/^tool reported success but wrote no output to /);
  });

  it('never runs more operations than workerLimit', async () => {
    let active = 0;
    let maxActive = 0;
    const { runner } = fakeRunner(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 10));
      active--;
      return ok;
    });

    const report = await execute(
      validated(trim('op-1', 0, 10), trim('op-2', 20, 30)),
      runner,
      undefined,
      { ...config, workerLimit: 1 },
    );

    expect(maxActive).toBe(1);
    expect(report.results.map(r => r.status)).toEqual(['ok', 'ok']);
  });

  it('runs independent operations concurrently up to the limit', async () => {
    let active = 0;
    let maxActive = 0;
    const { runner } = fakeRunner(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 10));
      active--;
      return ok;
    });

    await execute(validated(trim('op-1', 0, 10), trim('op-2', 20, 30)), runner);

    expect(maxActive).toBe(2);
  });

  it('starts nothing new after cancellation and keeps finished outputs', async () => {
    const controller = new AbortController();
    const { runner, run } = fakeRunner(() => {
      controller.abort();
      return ok;
    });

    const report = await execute(validated(trim('op-1', 10, 20), mute('op-2', 'op-1')), runner, controller.signal);

    expect(run).toHaveBeenCalledTimes(1);
    expect(report.results.map(r => [r.status, r.errorDetail])).toEqual([
      ['ok', undefined],
      ['skipped', 'cancelled before start'],
    ]);
    expect(await readFile(path.join(config.outputDir, 'op-1.mp4'), 'utf-8')).toMatch(/^frames for ffmpeg/);
  });

  it('removes outputs an earlier run left behind when the rerun fails', async () => {
    const { runner } = fakeRunner(() => ({ exitStatus: 1, stderr: 'Conversion failed!' }));
    await mkdir(config.outputDir, { recursive: true });
    await writeFile(path.join(config.outputDir, 'op-1.mp4'), 'earlier run');
    await writeFile(path.join(config.outputDir, 'op-2.mp4'), 'earlier run');

    const report = await execute(validated(trim('op-1', 10, 20), mute('op-2', 'op-1')), runner);

    expect(report.results.map(r => r.status)).toEqual(['failed', 'skipped']);
    expect(existsSync(path.join(config.outputDir, 'op-1.mp4'))).toBe(false);
    expect(existsSync(path.join(config.outputDir, 'op-2.mp4'))).toBe(false);
  });

  it('never overwrites the source video', async () => {
    const { runner, run } = fakeRunner(() => ok);
    sourcePath = path.join(config.outputDir, 'op-1.mp4');

    const report = await execute(validated(trim('op-1', 10, 20)), runner);

    expect(run).not.toHaveBeenCalled();
    expect(report.results[0]).toMatchObject({
      status: 'failed',
      errorDetail: `output ${sourcePath} would overwrite the source video`,
      attempts: 0,
    });
  });

  it('fails operations that could not be compiled and skips their dependents', async () => {
    const { runner } = fakeRunner(() => ok);

    const report = await execute(
      validated(
        trim('op-1', 10, 20),
        mute('op-2', 'op-1'),
        { id: 'op-3', kind: 'blur', sourceRange: { start: 10, end: 20 }, parameters: {}, dependsOn: ['op-2'] },
      ),
      runner,
      undefined,
      { ...config, disabledOperations: ['mute'] },
    );

    expect(report.results.map(r => [r.operationId, r.status, r.errorDetail])).toEqual([
      ['op-1', 'ok', undefined],
      ['op-2', 'failed', 'Unsupported operation kind "mute" (op-2)'],
      ['op-3', 'skipped', 'dependency op-2 failed'],
    ]);
  });
});

describe('isTransientFailure', () => {
  it('recognises EX_TEMPFAIL and busy resources', () => {
    expect(isTransientFailure({ exitStatus: 75, stderr: '' })).toBe(true);
    expect(isTransientFailure({ exitStatus: 1, stderr: 'Device or resource busy' })).toBe(true);
    expect(isTransientFailure({ exitStatus: 1, stderr: 'No such file or directory' })).toBe(false);
    expect(isTransientFailure({ exitStatus: null, stderr: '' })).toBe(false);
  });
});
