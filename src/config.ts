import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

// Keys copied from .env.example arrive as empty strings
const unset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(v => (v === '' ? undefined : v), schema);

const optionalKey = unset(z.string().min(1).optional());

const EnvSchema = z.object({
  // Generative reasoning: only required when an instruction is interpreted
  ANTHROPIC_API_KEY:    optionalKey,
  ANTHROPIC_MODEL:      z.string().min(1).default('claude-sonnet-4-6'),
  OPENAI_API_KEY:       optionalKey,
  OPENAI_MODEL:         z.string().min(1).default('gpt-4o'),

  // Scene index + run history
  SUPABASE_URL:         unset(z.string().url().optional()),
  SUPABASE_SERVICE_KEY: optionalKey,

  // Local storage
  OUTPUT_DIR:           z.string().default('./edited'),
  TEMP_DIR:             z.string().default('/tmp/cutplan'),
  LOCAL_DB_PATH:        optionalKey,

  // Execution
  MAX_RETRIES:          z.coerce.number().int().min(0).default(2),
  RETRY_BASE_DELAY_MS:  z.coerce.number().int().min(0).default(1_000),
  WORKER_LIMIT:         z.coerce.number().int().min(1).default(2),
  FFMPEG_PATH:          z.string().min(1).default('ffmpeg'),
  // Comma-separated operation kinds the local ffmpeg build cannot run (e.g. "caption")
  DISABLED_OPERATIONS:  z.string().default(''),

  // Logging
  LOG_LEVEL:            z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:           z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Domain constants ──────────────────────────────────────────────────────────

export const CONTENT_LABELS = [
  'person_talking',
  'interface',
  'silence',
  'other',
] as const;

export type ContentLabel = typeof CONTENT_LABELS[number];

export const OPERATION_KINDS = [
  'trim',
  'concat',
  'overlay',
  'crop',
  'mute',
  'blur',
  'zoom',
  'caption',
] as const;

export type OperationKind = typeof OPERATION_KINDS[number];

// ── Interpretation policy ─────────────────────────────────────────────────────

export const INTERPRETATION = {
  maxAttempts:     2,      // one retry on a malformed model response
  maxTokens:       1_024,
  mergeEpsilonSec: 1e-6,   // segments closer than this are treated as touching
} as const;

// ── Transient tool failures ───────────────────────────────────────────────────

export const TRANSIENT_FAILURE = {
  exitStatuses:   [75],    // EX_TEMPFAIL
  stderrPatterns: [
    /resource busy/i,
    /resource temporarily unavailable/i,
    /\bEAGAIN\b/,
    /\bEBUSY\b/,
  ],
} as const;

// ── Pipeline config ───────────────────────────────────────────────────────────

export interface PipelineConfig {
  outputDir: string;
  tempDir: string;
  maxRetries: number;
  workerLimit: number;
  retryBaseDelayMs: number;
  ffmpegPath: string;
  disabledOperations: OperationKind[];
}

function parseDisabledOperations(raw: string): OperationKind[] {
  const kinds: OperationKind[] = [];
  for (const entry of raw.split(',').map(s => s.trim()).filter(Boolean)) {
    const kind = OPERATION_KINDS.find(k => k === entry);
    if (!kind) throw new Error(`DISABLED_OPERATIONS: unknown operation kind "${entry}"`);
    kinds.push(kind);
  }
  return kinds;
}

/**
 * Build the explicit config threaded through the pipeline. Values come from the
 * environment unless overridden (CLI flags, tests).
 */
export function loadPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    outputDir:          path.resolve(overrides.outputDir ?? env.OUTPUT_DIR),
    tempDir:            path.resolve(overrides.tempDir ?? env.TEMP_DIR),
    maxRetries:         overrides.maxRetries ?? env.MAX_RETRIES,
    workerLimit:        overrides.workerLimit ?? env.WORKER_LIMIT,
    retryBaseDelayMs:   overrides.retryBaseDelayMs ?? env.RETRY_BASE_DELAY_MS,
    ffmpegPath:         overrides.ffmpegPath ?? env.FFMPEG_PATH,
    disabledOperations: overrides.disabledOperations ?? parseDisabledOperations(env.DISABLED_OPERATIONS),
  };
}
