/**
 * Error taxonomy for the edit pipeline.
 *
 * Interpretation and validation errors are recoverable by the caller (broaden
 * the query, re-prompt). UnsupportedOperation is fatal for one operation only.
 * ExecutionFailure is either transient (retried) or permanent (halts dependents).
 */
import type { PlanViolation } from './plan/types.js';

export class CutplanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InterpretationFailed extends CutplanError {}

export class NoMatchingContent extends CutplanError {
  constructor(public readonly instruction: string) {
    super(`No scene matches the instruction "${instruction}"`);
  }
}

export class ValidationViolation extends CutplanError {
  constructor(public readonly violations: readonly PlanViolation[]) {
    super(
      `Edit plan has ${violations.length} violation(s): ` +
      violations.map(v => `[#${v.operationIndex} ${v.operationId}] ${v.message}`).join('; '),
    );
  }
}

export class UnsupportedOperation extends CutplanError {
  constructor(public readonly kind: string, public readonly operationId?: string) {
    super(`Unsupported operation kind "${kind}"${operationId ? ` (${operationId})` : ''}`);
  }
}

export class ExecutionFailure extends CutplanError {
  constructor(
    public readonly operationId: string,
    message: string,
    public readonly transient: boolean,
    public readonly exitStatus: number | null = null,
  ) {
    super(message);
  }
}
