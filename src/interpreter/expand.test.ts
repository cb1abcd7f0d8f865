import { describe, it, expect } from 'vitest';
import { NoMatchingContent } from '../errors.js';
import type { SceneDescriptor } from '../plan/types.js';
import { expandIntent, fullVideoPlan, resolveOverlaps, scoreScenes, tokenize } from './expand.js';
import type { StructuredIntent } from './intent.js';

const intent = (fields: Partial<StructuredIntent>): StructuredIntent => ({
  themes: [], include: [], exclude: [], labels: [], effects: [], ...fields,
});

const scene = (startTime: number, endTime: number, summary: string, contentLabel: SceneDescriptor['contentLabel'] = 'other'): SceneDescriptor =>
  ({ startTime, endTime, summary, contentLabel });

const talkAndDemo: SceneDescriptor[] = [
  scene(0, 10, 'intro', 'person_talking'),
  scene(10, 20, 'demo', 'interface'),
];

describe('tokenize', () => {
  it('lowercases and splits on punctuation', () => {
    expect(tokenize('Demo: the NEW-UI, v2')).toEqual(['demo', 'the', 'new', 'ui', 'v2']);
  });

  it('keeps letters outside the Latin alphabet', () => {
    expect(tokenize('Демо продукта, ΝΈΟ')).toEqual(['демо', 'продукта', 'νέο']);
  });
});

describe('expandIntent', () => {
  it('keeps only the scenes that match the include keywords', () => {
    const plan = expandIntent(intent({ include: ['demo'] }), talkAndDemo, 'keep only the demo');

    expect(plan.operations).toEqual([
      { id: 'op-1', kind: 'trim', sourceRange: { start: 10, end: 20 }, parameters: {}, dependsOn: [] },
    ]);
  });

  it('throws NoMatchingContent when nothing matches', () => {
    expect(() => expandIntent(intent({ include: ['outro'] }), talkAndDemo, 'keep the outro'))
      .toThrow(new NoMatchingContent('keep the outro'));
  });

  it('returns an empty plan for an empty scene index', () => {
    expect(expandIntent(intent({ include: ['demo'] }), [])).toEqual({ operations: [] });
  });

  it('drops excluded scenes and keeps the rest when nothing is included', () => {
    const plan = expandIntent(intent({ exclude: ['intro'] }), talkAndDemo);

    expect(plan.operations.map(op => op.sourceRange)).toEqual([{ start: 10, end: 20 }]);
  });

  describe('non-Latin keywords', () => {
    const russian: SceneDescriptor[] = [
      scene(0, 10, 'вступление', 'person_talking'),
      scene(10, 20, 'демо продукта', 'interface'),
    ];

    it('includes matching scenes', () => {
      const plan = expandIntent(intent({ include: ['Демо'] }), russian, 'оставь только демо');

      expect(plan.operations.map(op => op.sourceRange)).toEqual([{ start: 10, end: 20 }]);
    });

    it('excludes matching scenes', () => {
      const plan = expandIntent(intent({ exclude: ['вступление'] }), russian);

      expect(plan.operations.map(op => op.sourceRange)).toEqual([{ start: 10, end: 20 }]);
    });
  });

  it('matches content labels as words and filters by label', () => {
    expect(expandIntent(intent({ include: ['person talking'] }), talkAndDemo).operations[0]?.sourceRange)
      .toEqual({ start: 0, end: 10 });
    expect(expandIntent(intent({ labels: ['person_talking'] }), talkAndDemo).operations[0]?.sourceRange)
      .toEqual({ start: 0, end: 10 });
  });

  it('merges touching segments into one trim', () => {
    const scenes = [scene(0, 10, 'demo start'), scene(10, 20, 'demo end')];

    const plan = expandIntent(intent({ include: ['demo'] }), scenes);

    expect(plan.operations).toEqual([
      { id: 'op-1', kind: 'trim', sourceRange: { start: 0, end: 20 }, parameters: {}, dependsOn: [] },
    ]);
  });

  it('concatenates separate segments', () => {
    const scenes = [scene(0, 10, 'demo one'), scene(15, 20, 'break'), scene(30, 40, 'demo two')];

    const plan = expandIntent(intent({ include: ['demo'] }), scenes);

    expect(plan.operations).toEqual([
      { id: 'op-1', kind: 'trim', sourceRange: { start: 0, end: 10 }, parameters: {}, dependsOn: [] },
      { id: 'op-2', kind: 'trim', sourceRange: { start: 30, end: 40 }, parameters: {}, dependsOn: [] },
      { id: 'op-3', kind: 'concat', sourceRange: { start: 0, end: 40 }, parameters: {}, dependsOn: ['op-1', 'op-2'] },
    ]);
  });

  it('chains effects on each segment in request order', () => {
    const plan = expandIntent(
      intent({ include: ['demo'], effects: [{ kind: 'blur', strength: 0.4 }, { kind: 'mute' }] }),
      talkAndDemo,
    );

    expect(plan.operations).toEqual([
      { id: 'op-1', kind: 'trim', sourceRange: { start: 10, end: 20 }, parameters: {}, dependsOn: [] },
      { id: 'op-2', kind: 'blur', sourceRange: { start: 10, end: 20 }, parameters: { strength: 0.4 }, dependsOn: ['op-1'] },
      { id: 'op-3', kind: 'mute', sourceRange: { start: 10, end: 20 }, parameters: {}, dependsOn: ['op-2'] },
    ]);
  });

  it('leaves unset effect parameters out of the operation', () => {
    const plan = expandIntent(intent({ include: ['demo'], effects: [{ kind: 'caption', text: 'Hi' }] }), talkAndDemo);

    expect(plan.operations[1]?.parameters).toEqual({ text: 'Hi' });
  });

  describe('duration bound', () => {
    it('drops the shortest of equally relevant segments first', () => {
      const scenes = [scene(0, 10, 'demo one'), scene(20, 25, 'demo two'), scene(30, 40, 'demo three')];

      const plan = expandIntent(intent({ include: ['demo'], maxDurationSec: 20 }), scenes);

      expect(plan.operations.filter(op => op.kind === 'trim').map(op => op.sourceRange)).toEqual([
        { start: 0, end: 10 },
        { start: 30, end: 40 },
      ]);
    });

    it('drops less relevant segments before more relevant ones', () => {
      const scenes = [scene(0, 10, 'demo checkout'), scene(20, 30, 'demo')];

      const plan = expandIntent(intent({ include: ['demo', 'checkout'], maxDurationSec: 10 }), scenes);

      expect(plan.operations.map(op => op.sourceRange)).toEqual([{ start: 0, end: 10 }]);
    });

    it('clips the last remaining segment instead of dropping it', () => {
      const scenes = [scene(0, 10, 'demo a'), scene(10, 40, 'demo b')];

      const plan = expandIntent(intent({ include: ['demo'], maxDurationSec: 12 }), scenes);

      expect(plan.operations.map(op => op.sourceRange)).toEqual([{ start: 10, end: 22 }]);
    });
  });
});

describe('resolveOverlaps', () => {
  const scenes = [scene(0, 10, 'demo setup'), scene(5, 15, 'demo setup details')];

  it('prefers the earlier scene when relevance ties', () => {
    const selected = resolveOverlaps(scoreScenes(intent({ include: ['demo'] }), scenes));

    expect(selected.map(s => s.range)).toEqual([{ start: 0, end: 10 }]);
  });

  it('prefers the more relevant scene', () => {
    const selected = resolveOverlaps(scoreScenes(intent({ include: ['demo', 'details'] }), scenes));

    expect(selected.map(s => s.range)).toEqual([{ start: 5, end: 15 }]);
  });
});

describe('fullVideoPlan', () => {
  it('trims to the covered range of the video', () => {
    expect(fullVideoPlan(talkAndDemo).operations).toEqual([
      { id: 'op-1', kind: 'trim', sourceRange: { start: 0, end: 20 }, parameters: {}, dependsOn: [] },
    ]);
  });
});
