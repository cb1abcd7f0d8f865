/**
 * Intent Interpreter — instruction + scene index → EditPlan.
 *
 * Stage 1 (resolveIntent) asks the reasoning service for a StructuredIntent;
 * stage 2 (expandIntent) turns it into operations without any external calls.
 */
import { generateCompletion } from '../ai/claude.js';
import { INTERPRETATION } from '../config.js';
import { InterpretationFailed } from '../errors.js';
import type { EditPlan, SceneDescriptor } from '../plan/types.js';
import { logger } from '../utils/logger.js';
import { expandIntent } from './expand.js';
import { resolveIntent, type ReasoningService, type StructuredIntent } from './intent.js';
import { INTENT_SYSTEM_PROMPT, buildIntentPrompt, extractJson } from './prompt.js';

export { expandIntent, fullVideoPlan } from './expand.js';
export { resolveIntent, foldIntentFields } from './intent.js';
export type { ReasoningService, StructuredIntent, EffectRequest, IntentField } from './intent.js';

export class ClaudeReasoningService implements ReasoningService {
  async interpret(
    instruction: string,
    scenes: readonly SceneDescriptor[],
    feedback?: readonly string[],
  ): Promise<unknown> {
    const res = await generateCompletion(
      buildIntentPrompt(instruction, scenes, feedback),
      INTENT_SYSTEM_PROMPT,
      INTERPRETATION.maxTokens,
    );
    logger.debug('Interpreter: model answered', { provider: res.provider, outputTokens: res.outputTokens });
    return extractJson(res.text);
  }
}

export interface Interpretation {
  intent: StructuredIntent | null;
  plan: EditPlan;
}

export async function interpret(
  instruction: string,
  scenes: readonly SceneDescriptor[],
  service: ReasoningService,
  feedback?: readonly string[],
): Promise<Interpretation> {
  if (instruction.trim().length === 0) {
    throw new InterpretationFailed('Instruction must not be empty');
  }
  if (scenes.length === 0) {
    logger.warn('Interpreter: scene index is empty — nothing to edit');
    return { intent: null, plan: { operations: [] } };
  }

  const intent = await resolveIntent(instruction, scenes, service, feedback);
  logger.info('Interpreter: structured intent resolved', {
    include: intent.include,
    exclude: intent.exclude,
    themes: intent.themes,
    labels: intent.labels,
    maxDurationSec: intent.maxDurationSec,
    effects: intent.effects.map(e => e.kind),
  });

  const plan = expandIntent(intent, scenes, instruction);
  logger.info('Interpreter: edit plan expanded', { operations: plan.operations.length });
  return { intent, plan };
}
