import { describe, it, expect } from 'vitest';
import { UnsupportedOperation } from '../errors.js';
import {
  compileOperation,
  compilePlan,
  escapeDrawtext,
  formatCommandLine,
  renderCommand,
  type CompileContext,
} from './compiler.js';
import type { CompiledCommand, EditOperation, ValidatedPlan } from './types.js';

const ctx: CompileContext = { sourcePath: '/videos/talk.mp4', outputDir: '/out', ffmpegPath: 'ffmpeg' };

const VIDEO = ['-c:v', 'libx264', '-preset', 'fast', '-crf', '23'];
const AUDIO = ['-c:a', 'aac', '-b:a', '128k'];

const trim: EditOperation = {
  id: 'op-1', kind: 'trim', sourceRange: { start: 10, end: 20 }, parameters: {}, dependsOn: [],
};

const effect = (kind: EditOperation['kind'], parameters: EditOperation['parameters'] = {}): EditOperation => ({
  id: 'op-2', kind, sourceRange: { start: 10, end: 20 }, parameters, dependsOn: ['op-1'],
});

const argvOf = (op: EditOperation, context: CompileContext = ctx) => renderCommand(compileOperation(op, context));

describe('compileOperation', () => {
  it('trims the source with millisecond timestamps', () => {
    const command = compileOperation(trim, ctx);

    expect(command.outputPath).toBe('/out/op-1.mp4');
    expect(command.resolvedArgs).toEqual({
      ffmpeg: 'ffmpeg',
      input: '/videos/talk.mp4',
      start: '10.000',
      end: '20.000',
      output: '/out/op-1.mp4',
    });
    expect(renderCommand(command)).toEqual([
      'ffmpeg', '-y', '-ss', '10.000', '-to', '20.000', '-i', '/videos/talk.mp4', ...VIDEO, ...AUDIO, '/out/op-1.mp4',
    ]);
  });

  it('concatenates dependency outputs in order', () => {
    const concat: EditOperation = {
      id: 'op-3', kind: 'concat', sourceRange: { start: 0, end: 40 }, parameters: {}, dependsOn: ['op-1', 'op-2'],
    };

    expect(argvOf(concat)).toEqual([
      'ffmpeg', '-y', '-i', '/out/op-1.mp4', '-i', '/out/op-2.mp4',
      '-filter_complex', '[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[v][a]',
      '-map', '[v]', '-map', '[a]', ...VIDEO, ...AUDIO, '/out/op-3.mp4',
    ]);
  });

  it('reads effect input from the dependency output', () => {
    expect(argvOf(effect('mute'))).toEqual([
      'ffmpeg', '-y', '-i', '/out/op-1.mp4', '-c:v', 'copy', '-af', 'volume=0', ...AUDIO, '/out/op-2.mp4',
    ]);
  });

  it('seeks to the operation range when an effect reads the source', () => {
    const mute: EditOperation = { ...effect('mute'), id: 'op-1', dependsOn: [] };

    expect(argvOf(mute)).toEqual([
      'ffmpeg', '-y', '-ss', '10.000', '-to', '20.000', '-i', '/videos/talk.mp4',
      '-c:v', 'copy', '-af', 'volume=0', ...AUDIO, '/out/op-1.mp4',
    ]);
    expect(argvOf({ ...effect('overlay', { path: '/assets/logo.png' }), dependsOn: [] }).slice(0, 10)).toEqual([
      'ffmpeg', '-y', '-ss', '10.000', '-to', '20.000', '-i', '/videos/talk.mp4', '-i', '/assets/logo.png',
    ]);
  });

  it('maps blur strength to a box radius, with a default', () => {
    expect(argvOf(effect('blur', { strength: 0.4 }))).toContain('boxblur=8');
    expect(argvOf(effect('blur'))).toContain('boxblur=10');
  });

  it('zooms by scaling then cropping back', () => {
    expect(argvOf(effect('zoom', { scale: 2 }))).toContain(
      'scale=iw*2.000:ih*2.000,crop=trunc(iw/2.000/2)*2:trunc(ih/2.000/2)*2',
    );
  });

  it('crops with default offsets', () => {
    expect(argvOf(effect('crop', { width: 640, height: 360 }))).toContain('crop=640:360:0:0');
  });

  it('overlays an image as a second input', () => {
    expect(argvOf(effect('overlay', { path: '/assets/logo.png', x: 10 }))).toEqual([
      'ffmpeg', '-y', '-i', '/out/op-1.mp4', '-i', '/assets/logo.png',
      '-filter_complex', '[0:v][1:v]overlay=10:0', ...VIDEO, '-c:a', 'copy', '/out/op-2.mp4',
    ]);
  });

  it('keeps caption text with spaces in one argument', () => {
    expect(argvOf(effect('caption', { text: 'Demo: v2', position: 'top' }))).toContain(
      "drawtext=text='Demo\\: v2':fontsize=24:fontcolor=white:box=1:boxcolor=black@0.5:x=(w-text_w)/2:y=10",
    );
    expect(argvOf(effect('caption', { text: 'Hi' })).find(arg => arg.startsWith('drawtext='))).toMatch(/:y=h-th-10$/);
  });

  it('is deterministic', () => {
    expect(compileOperation(trim, ctx)).toEqual(compileOperation(trim, ctx));
  });

  it('raises UnsupportedOperation for a disabled kind', () => {
    expect(() => compileOperation(effect('caption', { text: 'Hi' }), { ...ctx, disabledOperations: ['caption'] }))
      .toThrow(new UnsupportedOperation('caption', 'op-2'));
  });
});

describe('compilePlan', () => {
  it('collects unsupported operations without failing the rest', () => {
    const plan: ValidatedPlan = {
      operations: [trim, effect('caption', { text: 'Hi' })],
      coverage: [{ start: 0, end: 20 }],
      totalDurationSec: 10,
    };

    const compiled = compilePlan(plan, { ...ctx, disabledOperations: ['caption'] });

    expect(compiled.commands.map(c => c.operation.id)).toEqual(['op-1']);
    expect(compiled.failures.map(f => [f.operationId, f.kind])).toEqual([['op-2', 'caption']]);
  });
});

describe('renderCommand', () => {
  it('applies overrides', () => {
    const argv = renderCommand(compileOperation(trim, ctx), { output: '/tmp/op-1.partial.mp4' });

    expect(argv[argv.length - 1]).toBe('/tmp/op-1.partial.mp4');
  });

  it('throws on an unresolved placeholder', () => {
    const command: CompiledCommand = {
      operation: trim,
      commandTemplate: '{ffmpeg} -i {missing}',
      resolvedArgs: { ffmpeg: 'ffmpeg' },
      outputPath: '/out/op-1.mp4',
    };

    expect(() => renderCommand(command)).toThrow('op-1: unresolved placeholder {missing}');
  });
});

describe('escapeDrawtext', () => {
  it('escapes filter metacharacters', () => {
    expect(escapeDrawtext('Demo: v2')).toBe('Demo\\: v2');
    expect(escapeDrawtext('100%')).toBe('100\\%');
    expect(escapeDrawtext("it's\nnew")).toBe('it’s new');
  });
});

describe('formatCommandLine', () => {
  it('quotes arguments that need it', () => {
    expect(formatCommandLine(['ffmpeg', '-i', 'my clip.mp4', '-y'])).toBe("ffmpeg -i 'my clip.mp4' -y");
  });
});
