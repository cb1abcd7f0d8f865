/**
 * Stage 1 of interpretation — resolve a free-form instruction into a
 * StructuredIntent through the reasoning service.
 *
 * The service answers with `{ intent: IntentField[] }`; each field is a tagged
 * variant so the model can only express what stage 2 knows how to expand.
 */
import { z } from 'zod';
import { CONTENT_LABELS, INTERPRETATION, type ContentLabel } from '../config.js';
import { InterpretationFailed } from '../errors.js';
import type { SceneDescriptor } from '../plan/types.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

// ── Schema ────────────────────────────────────────────────────────────────────

const Keywords = z.array(z.string().trim().min(1)).min(1);

export const EffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('mute') }),
  z.object({ kind: z.literal('blur'), strength: z.number().optional() }),
  z.object({ kind: z.literal('zoom'), scale: z.number().optional() }),
  z.object({
    kind:   z.literal('crop'),
    width:  z.number(),
    height: z.number(),
    x:      z.number().optional(),
    y:      z.number().optional(),
  }),
  z.object({
    kind: z.literal('overlay'),
    path: z.string(),
    x:    z.number().optional(),
    y:    z.number().optional(),
  }),
  z.object({
    kind:     z.literal('caption'),
    text:     z.string(),
    position: z.enum(['top', 'bottom']).optional(),
  }),
]);

export type EffectRequest = z.infer<typeof EffectSchema>;

export const IntentFieldSchema = z.discriminatedUnion('field', [
  z.object({ field: z.literal('theme'),        value: z.string().trim().min(1) }),
  z.object({ field: z.literal('max_duration'), seconds: z.number().positive() }),
  z.object({ field: z.literal('include'),      keywords: Keywords }),
  z.object({ field: z.literal('exclude'),      keywords: Keywords }),
  z.object({ field: z.literal('labels'),       labels: z.array(z.enum(CONTENT_LABELS)).min(1) }),
  z.object({ field: z.literal('effect'),       effect: EffectSchema }),
]);

export type IntentField = z.infer<typeof IntentFieldSchema>;

export const IntentResponseSchema = z.object({
  intent: z.array(IntentFieldSchema),
});

export interface StructuredIntent {
  themes: string[];
  maxDurationSec?: number;
  include: string[];
  exclude: string[];
  labels: ContentLabel[];
  effects: EffectRequest[];
}

/** Fold the tagged fields into one record. Later duration bounds win. */
export function foldIntentFields(fields: readonly IntentField[]): StructuredIntent {
  const intent: StructuredIntent = { themes: [], include: [], exclude: [], labels: [], effects: [] };
  for (const f of fields) {
    switch (f.field) {
      case 'theme':        intent.themes.push(f.value); break;
      case 'max_duration': intent.maxDurationSec = f.seconds; break;
      case 'include':      intent.include.push(...f.keywords); break;
      case 'exclude':      intent.exclude.push(...f.keywords); break;
      case 'labels':
        for (const label of f.labels) if (!intent.labels.includes(label)) intent.labels.push(label);
        break;
      case 'effect':       intent.effects.push(f.effect); break;
    }
  }
  return intent;
}

// ── Reasoning service ─────────────────────────────────────────────────────────

export interface ReasoningService {
  /**
   * Returns structured data expected to match IntentResponseSchema.
   * `feedback` carries problems found with a previous answer.
   */
  interpret(
    instruction: string,
    scenes: readonly SceneDescriptor[],
    feedback?: readonly string[],
  ): Promise<unknown>;
}

export async function resolveIntent(
  instruction: string,
  scenes: readonly SceneDescriptor[],
  service: ReasoningService,
  feedback?: readonly string[],
): Promise<StructuredIntent> {
  if (instruction.trim().length === 0) {
    throw new InterpretationFailed('Instruction must not be empty');
  }

  try {
    return await withRetry(async (attempt) => {
      const raw = await service.interpret(instruction, scenes, feedback);
      const parsed = IntentResponseSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        logger.warn('Interpreter: response does not match intent schema', { attempt, issues });
        throw new Error(`Schema violation — ${issues.join('; ')}`);
      }
      return foldIntentFields(parsed.data.intent);
    }, {
      maxAttempts: INTERPRETATION.maxAttempts,
      baseDelayMs: 0,
      label: 'interpretation',
    });
  } catch (err) {
    throw new InterpretationFailed(
      `Could not interpret instruction: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}
