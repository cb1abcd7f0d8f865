/**
 * Operation Compiler — maps one validated EditOperation to one CompiledCommand.
 *
 * Pure and deterministic: identical operations and context always produce
 * identical templates and arguments. Numbers are formatted with fixed precision
 * (timestamps to the millisecond) so command lines are reproducible.
 */
import * as path from 'path';
import type { OperationKind } from '../config.js';
import { UnsupportedOperation } from '../errors.js';
import { numberParam, stringParam } from './operations.js';
import type { CompiledCommand, EditOperation, ResolvedArg, ValidatedPlan } from './types.js';

export interface CompileContext {
  sourcePath: string;
  outputDir: string;
  ffmpegPath: string;
  /** Kinds the local transcoder cannot run; compiling one raises UnsupportedOperation. */
  disabledOperations?: readonly OperationKind[];
}

interface CommandTemplate {
  template: string;
  resolve(op: EditOperation, inputs: readonly string[]): Record<string, ResolvedArg>;
}

const MAX_BLUR_RADIUS = 20;
const VIDEO_ENCODE = '-c:v libx264 -preset fast -crf 23';
const AUDIO_ENCODE = '-c:a aac -b:a 128k';

// ── Formatting ────────────────────────────────────────────────────────────────

export const formatSeconds = (seconds: number): string => seconds.toFixed(3);
const formatScale = (scale: number): string => scale.toFixed(3);
const formatInt = (value: number): string => String(Math.round(value));

/** Escape text for a single-quoted drawtext value. */
export function escapeDrawtext(text: string): string {
  return text
    .replace(/\r?\n/g, ' ')
    .replace(/[\\:%]/g, ch => `\\${ch}`)
    .replace(/'/g, '’');
}

function firstInput(op: EditOperation, inputs: readonly string[]): string {
  const input = inputs[0];
  if (input === undefined) throw new Error(`${op.id}: no input resolved`);
  return input;
}

/** Input arguments for a single-input effect; reading the source seeks to the operation's range. */
function sourceInput(op: EditOperation, inputs: readonly string[]): string[] {
  const input = firstInput(op, inputs);
  if (op.dependsOn.length > 0) return ['-i', input];
  return ['-ss', formatSeconds(op.sourceRange.start), '-to', formatSeconds(op.sourceRange.end), '-i', input];
}

// ── Templates ─────────────────────────────────────────────────────────────────

const COMMAND_TEMPLATES: Record<OperationKind, CommandTemplate> = {
  trim: {
    template: `{ffmpeg} -y -ss {start} -to {end} -i {input} ${VIDEO_ENCODE} ${AUDIO_ENCODE} {output}`,
    resolve: (op, inputs) => ({
      input: firstInput(op, inputs),
      start: formatSeconds(op.sourceRange.start),
      end:   formatSeconds(op.sourceRange.end),
    }),
  },

  concat: {
    template: `{ffmpeg} -y {inputs} -filter_complex {graph} -map [v] -map [a] ${VIDEO_ENCODE} ${AUDIO_ENCODE} {output}`,
    resolve: (_op, inputs) => ({
      inputs: inputs.flatMap(input => ['-i', input]),
      graph:  inputs.map((_, i) => `[${i}:v][${i}:a]`).join('') + `concat=n=${inputs.length}:v=1:a=1[v][a]`,
    }),
  },

  mute: {
    template: `{ffmpeg} -y {source} -c:v copy -af volume=0 ${AUDIO_ENCODE} {output}`,
    resolve: (op, inputs) => ({ source: sourceInput(op, inputs) }),
  },

  blur: {
    template: `{ffmpeg} -y {source} -vf boxblur={radius} ${VIDEO_ENCODE} -c:a copy {output}`,
    resolve: (op, inputs) => ({
      source: sourceInput(op, inputs),
      radius: formatInt(numberParam('blur', op.parameters, 'strength') * MAX_BLUR_RADIUS),
    }),
  },

  zoom: {
    // Scale up, then centre-crop back to the original frame (even dimensions for yuv420p)
    template: `{ffmpeg} -y {source} -vf scale=iw*{scale}:ih*{scale},crop=trunc(iw/{scale}/2)*2:trunc(ih/{scale}/2)*2 ${VIDEO_ENCODE} -c:a copy {output}`,
    resolve: (op, inputs) => ({
      source: sourceInput(op, inputs),
      scale: formatScale(numberParam('zoom', op.parameters, 'scale')),
    }),
  },

  crop: {
    template: `{ffmpeg} -y {source} -vf crop={width}:{height}:{x}:{y} ${VIDEO_ENCODE} -c:a copy {output}`,
    resolve: (op, inputs) => ({
      source: sourceInput(op, inputs),
      width:  formatInt(numberParam('crop', op.parameters, 'width')),
      height: formatInt(numberParam('crop', op.parameters, 'height')),
      x:      formatInt(numberParam('crop', op.parameters, 'x')),
      y:      formatInt(numberParam('crop', op.parameters, 'y')),
    }),
  },

  overlay: {
    template: `{ffmpeg} -y {source} -i {overlay} -filter_complex [0:v][1:v]overlay={x}:{y} ${VIDEO_ENCODE} -c:a copy {output}`,
    resolve: (op, inputs) => ({
      source:  sourceInput(op, inputs),
      overlay: stringParam('overlay', op.parameters, 'path'),
      x:       formatInt(numberParam('overlay', op.parameters, 'x')),
      y:       formatInt(numberParam('overlay', op.parameters, 'y')),
    }),
  },

  caption: {
    template: `{ffmpeg} -y {source} -vf drawtext=text='{text}':fontsize=24:fontcolor=white:box=1:boxcolor=black@0.5:x=(w-text_w)/2:y={y} ${VIDEO_ENCODE} -c:a copy {output}`,
    resolve: (op, inputs) => ({
      source: sourceInput(op, inputs),
      text:  escapeDrawtext(stringParam('caption', op.parameters, 'text')),
      y:     stringParam('caption', op.parameters, 'position') === 'top' ? '10' : 'h-th-10',
    }),
  },
};

// ── Public API ────────────────────────────────────────────────────────────────

export function outputPathFor(outputDir: string, operationId: string): string {
  return path.join(outputDir, `${operationId}.mp4`);
}

export function compileOperation(op: EditOperation, ctx: CompileContext): CompiledCommand {
  const templates: Partial<Record<string, CommandTemplate>> = COMMAND_TEMPLATES;
  const template = ctx.disabledOperations?.includes(op.kind) ? undefined : templates[op.kind];
  if (!template) throw new UnsupportedOperation(op.kind, op.id);

  const inputs = op.dependsOn.length > 0
    ? op.dependsOn.map(dep => outputPathFor(ctx.outputDir, dep))
    : [ctx.sourcePath];
  const outputPath = outputPathFor(ctx.outputDir, op.id);

  return {
    operation: op,
    commandTemplate: template.template,
    resolvedArgs: {
      ffmpeg: ctx.ffmpegPath,
      ...template.resolve(op, inputs),
      output: outputPath,
    },
    outputPath,
  };
}

export interface CompiledPlan {
  commands: CompiledCommand[];
  /** Per-operation compile failures; the rest of the plan still compiles. */
  failures: UnsupportedOperation[];
}

export function compilePlan(plan: ValidatedPlan, ctx: CompileContext): CompiledPlan {
  const commands: CompiledCommand[] = [];
  const failures: UnsupportedOperation[] = [];
  for (const op of plan.operations) {
    try {
      commands.push(compileOperation(op, ctx));
    } catch (err) {
      if (!(err instanceof UnsupportedOperation)) throw err;
      failures.push(err);
    }
  }
  return { commands, failures };
}

// ── Rendering ─────────────────────────────────────────────────────────────────

/**
 * Expand a compiled command into argv. A token that is exactly `{name}` and
 * resolves to a list becomes several arguments.
 */
export function renderCommand(
  command: CompiledCommand,
  overrides: Readonly<Record<string, ResolvedArg>> = {},
): string[] {
  const args: Readonly<Record<string, ResolvedArg>> = { ...command.resolvedArgs, ...overrides };
  const lookup = (name: string): ResolvedArg => {
    const value = args[name];
    if (value === undefined) {
      throw new Error(`${command.operation.id}: unresolved placeholder {${name}}`);
    }
    return value;
  };

  const argv: string[] = [];
  for (const token of command.commandTemplate.split(/\s+/).filter(Boolean)) {
    const whole = /^\{(\w+)\}$/.exec(token)?.[1];
    if (whole !== undefined) {
      const value = lookup(whole);
      if (typeof value === 'string') argv.push(value);
      else argv.push(...value);
      continue;
    }
    argv.push(token.replace(/\{(\w+)\}/g, (_match, name: string) => {
      const value = lookup(name);
      if (typeof value !== 'string') {
        throw new Error(`${command.operation.id}: list placeholder {${name}} must be a whole token`);
      }
      return value;
    }));
  }
  return argv;
}

export function formatCommandLine(argv: readonly string[]): string {
  return argv
    .map(arg => (/^[\w@%+=:,./[\]-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
