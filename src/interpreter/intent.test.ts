import { describe, it, expect, vi } from 'vitest';
import { InterpretationFailed } from '../errors.js';
import type { SceneDescriptor } from '../plan/types.js';
import { foldIntentFields, resolveIntent, type ReasoningService } from './intent.js';

const scenes: SceneDescriptor[] = [
  { startTime: 0, endTime: 10, contentLabel: 'person_talking', summary: 'intro' },
  { startTime: 10, endTime: 20, contentLabel: 'interface', summary: 'demo' },
];

function serviceAnswering(...answers: unknown[]) {
  const interpret = vi.fn<ReasoningService['interpret']>();
  for (const answer of answers) {
    if (answer instanceof Error) interpret.mockRejectedValueOnce(answer);
    else interpret.mockResolvedValueOnce(answer);
  }
  const service: ReasoningService = { interpret };
  return { service, interpret };
}

describe('foldIntentFields', () => {
  it('collects every field into one structured intent', () => {
    const intent = foldIntentFields([
      { field: 'include', keywords: ['demo'] },
      { field: 'theme', value: 'upbeat' },
      { field: 'exclude', keywords: ['outro'] },
      { field: 'labels', labels: ['interface', 'interface'] },
      { field: 'effect', effect: { kind: 'mute' } },
      { field: 'max_duration', seconds: 30 },
      { field: 'max_duration', seconds: 15 },
    ]);

    expect(intent).toEqual({
      themes: ['upbeat'],
      include: ['demo'],
      exclude: ['outro'],
      labels: ['interface'],
      effects: [{ kind: 'mute' }],
      maxDurationSec: 15,
    });
  });

  it('returns an empty intent for no fields', () => {
    expect(foldIntentFields([])).toEqual({ themes: [], include: [], exclude: [], labels: [], effects: [] });
  });
});

describe('resolveIntent', () => {
  it('parses a well-formed answer', async () => {
    const { service, interpret } = serviceAnswering({ intent: [{ field: 'include', keywords: ['demo'] }] });

    const intent = await resolveIntent('keep only the demo', scenes, service);

    expect(intent.include).toEqual(['demo']);
    expect(interpret).toHaveBeenCalledTimes(1);
    expect(interpret).toHaveBeenCalledWith('keep only the demo', scenes, undefined);
  });

  it('retries once when the answer does not match the schema', async () => {
    const { service, interpret } = serviceAnswering(
      { intent: [{ field: 'include', keywords: [] }] },
      { intent: [{ field: 'include', keywords: ['demo'] }] },
    );

    const intent = await resolveIntent('keep only the demo', scenes, service);

    expect(intent.include).toEqual(['demo']);
    expect(interpret).toHaveBeenCalledTimes(2);
  });

  it('fails with InterpretationFailed after two malformed answers', async () => {
    const { service, interpret } = serviceAnswering({ plan: 'trim it' }, 'not json');

    const promise = resolveIntent('keep only the demo', scenes, service);

    await expect(promise).rejects.toBeInstanceOf(InterpretationFailed);
    await expect(promise).rejects.toThrow(/^Could not interpret instruction: Schema violation/);
    expect(interpret).toHaveBeenCalledTimes(2);
  });

  it('wraps service errors', async () => {
    const { service } = serviceAnswering(new Error('overloaded'), new Error('overloaded'));

    await expect(resolveIntent('keep only the demo', scenes, service))
      .rejects.toThrow('Could not interpret instruction: overloaded');
  });

  it('rejects an empty instruction without calling the service', async () => {
    const { service, interpret } = serviceAnswering();

    await expect(resolveIntent('   ', scenes, service)).rejects.toBeInstanceOf(InterpretationFailed);
    expect(interpret).not.toHaveBeenCalled();
  });

  it('passes validator feedback to the service', async () => {
    const { service, interpret } = serviceAnswering({ intent: [] });

    await resolveIntent('keep only the demo', scenes, service, ['op-1: bad range']);

    expect(interpret).toHaveBeenCalledWith('keep only the demo', scenes, ['op-1: bad range']);
  });
});
