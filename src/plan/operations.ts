/**
 * Declared parameter domains per operation kind. Shared by the validator (domain
 * checks) and the compiler (defaults).
 */
import type { OperationKind } from '../config.js';
import type { ParamValue } from './types.js';

export type ParamSpec =
  | { type: 'number'; min: number; max?: number; integer?: boolean; required?: boolean; default?: number }
  | { type: 'string'; oneOf?: readonly string[]; required?: boolean; default?: string };

export const PARAM_SPECS: Record<OperationKind, Readonly<Record<string, ParamSpec>>> = {
  trim:   {},
  concat: {},
  mute:   {},
  blur: {
    strength: { type: 'number', min: 0, max: 1, default: 0.5 },
  },
  zoom: {
    scale: { type: 'number', min: 1, max: 4, default: 1.5 },
  },
  crop: {
    width:  { type: 'number', min: 1, integer: true, required: true },
    height: { type: 'number', min: 1, integer: true, required: true },
    x:      { type: 'number', min: 0, integer: true, default: 0 },
    y:      { type: 'number', min: 0, integer: true, default: 0 },
  },
  overlay: {
    path: { type: 'string', required: true },
    x:    { type: 'number', min: 0, integer: true, default: 0 },
    y:    { type: 'number', min: 0, integer: true, default: 0 },
  },
  caption: {
    text:     { type: 'string', required: true },
    position: { type: 'string', oneOf: ['top', 'bottom'], default: 'bottom' },
  },
};

/** Returns a description of the domain error, or null when the value fits. */
export function checkParamValue(spec: ParamSpec, value: ParamValue): string | null {
  if (spec.type === 'number') {
    if (typeof value !== 'number' || !Number.isFinite(value)) return 'must be a finite number';
    if (spec.integer && !Number.isInteger(value)) return 'must be an integer';
    if (value < spec.min) return `must be >= ${spec.min}`;
    if (spec.max !== undefined && value > spec.max) return `must be <= ${spec.max}`;
    return null;
  }
  if (typeof value !== 'string' || value.trim().length === 0) return 'must be a non-empty string';
  if (spec.oneOf && !spec.oneOf.includes(value)) return `must be one of ${spec.oneOf.join(', ')}`;
  return null;
}

export function numberParam(
  kind: OperationKind,
  params: Readonly<Record<string, ParamValue>>,
  name: string,
): number {
  const value = params[name];
  if (typeof value === 'number') return value;
  const spec = PARAM_SPECS[kind][name];
  if (spec?.type === 'number' && spec.default !== undefined) return spec.default;
  throw new Error(`${kind}: numeric parameter "${name}" is missing`);
}

export function stringParam(
  kind: OperationKind,
  params: Readonly<Record<string, ParamValue>>,
  name: string,
): string {
  const value = params[name];
  if (typeof value === 'string') return value;
  const spec = PARAM_SPECS[kind][name];
  if (spec?.type === 'string' && spec.default !== undefined) return spec.default;
  throw new Error(`${kind}: string parameter "${name}" is missing`);
}
