import type { ContentLabel, OperationKind } from '../config.js';

// ── Scene index ───────────────────────────────────────────────────────────────

export interface SceneDescriptor {
  readonly startTime: number;
  readonly endTime: number;
  readonly contentLabel: ContentLabel;
  readonly summary: string;
}

// ── Edit plan ─────────────────────────────────────────────────────────────────

export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

export type ParamValue = string | number | boolean;

export interface EditOperation {
  readonly id: string;
  readonly kind: OperationKind;
  readonly sourceRange: TimeRange;
  readonly parameters: Readonly<Record<string, ParamValue>>;
  /** Operations whose output feeds this one. Empty means the source video. */
  readonly dependsOn: readonly string[];
}

export interface EditPlan {
  readonly operations: readonly EditOperation[];
}

export type ViolationCode =
  | 'invalid_range'
  | 'out_of_coverage'
  | 'duplicate_id'
  | 'unknown_dependency'
  | 'dependency_order'
  | 'too_many_inputs'
  | 'unknown_parameter'
  | 'missing_parameter'
  | 'parameter_domain'
  | 'concat_inputs'
  | 'negative_duration';

export interface PlanViolation {
  operationIndex: number;
  operationId: string;
  code: ViolationCode;
  message: string;
}

export interface ValidatedPlan {
  readonly operations: readonly EditOperation[];
  /** Merged scene coverage the plan was checked against. */
  readonly coverage: readonly TimeRange[];
  /** Sum of the ranges read from the source video. */
  readonly totalDurationSec: number;
}

export type ValidationResult =
  | { ok: true; plan: ValidatedPlan }
  | { ok: false; violations: PlanViolation[] };

// ── Compilation / execution ───────────────────────────────────────────────────

export type ResolvedArg = string | readonly string[];

export interface CompiledCommand {
  readonly operation: EditOperation;
  /** Whitespace-separated tokens with `{name}` placeholders. */
  readonly commandTemplate: string;
  readonly resolvedArgs: Readonly<Record<string, ResolvedArg>>;
  readonly outputPath: string;
}

export type OperationStatus = 'pending' | 'running' | 'ok' | 'failed' | 'skipped';

export type TerminalStatus = Extract<OperationStatus, 'ok' | 'failed' | 'skipped'>;

export interface ExecutionResult {
  operationId: string;
  status: TerminalStatus;
  errorDetail?: string;
  attempts: number;
  outputPath?: string;
  durationMs: number;
}

export function rangeDuration(range: TimeRange): number {
  return range.end - range.start;
}
