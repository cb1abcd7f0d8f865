/**
 * Plan Validator — referential, temporal and parameter-domain checks of an
 * EditPlan against the scene index it was derived from.
 *
 * Never drops an operation: every violation is reported with the index of the
 * offending operation so the caller can re-prompt or abort.
 */
import { PARAM_SPECS, checkParamValue } from './operations.js';
import {
  rangeDuration,
  type EditOperation,
  type EditPlan,
  type PlanViolation,
  type SceneDescriptor,
  type TimeRange,
  type ValidationResult,
  type ViolationCode,
} from './types.js';

const EPSILON = 1e-9;

// ── Coverage ──────────────────────────────────────────────────────────────────

/** Union of scene ranges as sorted, non-overlapping blocks. */
export function sceneCoverage(scenes: readonly SceneDescriptor[]): TimeRange[] {
  const ranges = scenes
    .filter(s => Number.isFinite(s.startTime) && Number.isFinite(s.endTime) && s.endTime > s.startTime)
    .map(s => ({ start: s.startTime, end: s.endTime }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: TimeRange[] = [];
  for (const range of ranges) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + EPSILON) {
      merged[merged.length - 1] = { start: last.start, end: Math.max(last.end, range.end) };
    } else {
      merged.push(range);
    }
  }
  return merged;
}

export function isCovered(range: TimeRange, coverage: readonly TimeRange[]): boolean {
  return coverage.some(c => range.start >= c.start - EPSILON && range.end <= c.end + EPSILON);
}

function formatRange(range: TimeRange): string {
  return `[${range.start}, ${range.end}]`;
}

function isValidRange(range: TimeRange): boolean {
  return Number.isFinite(range.start) && Number.isFinite(range.end) &&
    range.start >= 0 && range.start < range.end;
}

function sameRange(a: TimeRange, b: TimeRange): boolean {
  return Math.abs(a.start - b.start) <= EPSILON && Math.abs(a.end - b.end) <= EPSILON;
}

// ── Per-operation checks ──────────────────────────────────────────────────────

type Report = (code: ViolationCode, message: string) => void;

function checkParameters(op: EditOperation, report: Report): void {
  const specs = PARAM_SPECS[op.kind];
  for (const [name, value] of Object.entries(op.parameters)) {
    const spec = specs[name];
    if (!spec) {
      report('unknown_parameter', `${op.kind} does not take parameter "${name}"`);
      continue;
    }
    const problem = checkParamValue(spec, value);
    if (problem) report('parameter_domain', `${op.kind}.${name} ${problem} (got ${JSON.stringify(value)})`);
  }
  for (const [name, spec] of Object.entries(specs)) {
    if (spec.required && !(name in op.parameters)) {
      report('missing_parameter', `${op.kind} requires parameter "${name}"`);
    }
  }
}

function checkConcat(
  op: EditOperation,
  earlier: ReadonlyMap<string, EditOperation>,
  coverage: readonly TimeRange[],
  report: Report,
): void {
  if (op.dependsOn.length < 2) {
    report('concat_inputs', `concat needs at least two inputs, got ${op.dependsOn.length}`);
  }
  const inputs = op.dependsOn
    .map(id => earlier.get(id))
    .filter((input): input is EditOperation => input !== undefined);

  for (let i = 0; i < inputs.length; i++) {
    const a = inputs[i];
    if (!a) continue;
    if (a.kind !== 'concat' && isValidRange(a.sourceRange) && !isCovered(a.sourceRange, coverage)) {
      report('out_of_coverage', `concat input ${a.id} range ${formatRange(a.sourceRange)} is outside scene coverage`);
    }
    for (let j = i + 1; j < inputs.length; j++) {
      const b = inputs[j];
      if (b && sameRange(a.sourceRange, b.sourceRange)) {
        report('concat_inputs', `concat inputs ${a.id} and ${b.id} reference the identical range ${formatRange(a.sourceRange)}`);
      }
    }
  }
}

// ── Public API ────────────────────────────────────────────────────────────────

export function validatePlan(plan: EditPlan, scenes: readonly SceneDescriptor[]): ValidationResult {
  const coverage = sceneCoverage(scenes);
  const violations: PlanViolation[] = [];
  const earlier = new Map<string, EditOperation>();
  const allIds = new Set(plan.operations.map(op => op.id));
  let totalDurationSec = 0;

  plan.operations.forEach((op, operationIndex) => {
    const report: Report = (code, message) =>
      violations.push({ operationIndex, operationId: op.id, code, message });

    if (earlier.has(op.id)) report('duplicate_id', `operation id "${op.id}" is used more than once`);

    const rangeOk = isValidRange(op.sourceRange);
    if (!rangeOk) {
      report('invalid_range', `source range ${formatRange(op.sourceRange)} must satisfy 0 <= start < end`);
    } else if (op.kind !== 'concat' && !isCovered(op.sourceRange, coverage)) {
      report('out_of_coverage', `source range ${formatRange(op.sourceRange)} is outside scene coverage`);
    }

    for (const dep of op.dependsOn) {
      if (earlier.has(dep)) continue;
      if (allIds.has(dep)) report('dependency_order', `dependency "${dep}" must come before ${op.id}`);
      else report('unknown_dependency', `dependency "${dep}" does not exist`);
    }

    if (op.kind === 'concat') checkConcat(op, earlier, coverage, report);
    else if (op.dependsOn.length > 1) {
      report('too_many_inputs', `${op.kind} takes one input, got ${op.dependsOn.length}`);
    }

    checkParameters(op, report);

    if (op.dependsOn.length === 0 && Number.isFinite(rangeDuration(op.sourceRange))) {
      totalDurationSec += rangeDuration(op.sourceRange);
    }
    if (!earlier.has(op.id)) earlier.set(op.id, op);
  });

  if (totalDurationSec < 0) {
    violations.push({
      operationIndex: -1,
      operationId: '*',
      code: 'negative_duration',
      message: `total plan duration is negative (${totalDurationSec}s)`,
    });
  }

  if (violations.length > 0) return { ok: false, violations };
  return { ok: true, plan: { operations: plan.operations, coverage, totalDurationSec } };
}
