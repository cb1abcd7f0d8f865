/**
 * Stage 2 of interpretation — deterministic expansion of a StructuredIntent into
 * an EditPlan. All editing policy lives here:
 *
 *   - relevance = number of include/theme keywords found in a scene
 *   - overlapping matches: higher relevance wins, then earliest start
 *   - over the duration bound: drop lowest relevance, then shortest, then latest
 *   - touching segments merge into one continuous trim
 */
import { INTERPRETATION } from '../config.js';
import { NoMatchingContent } from '../errors.js';
import type { EditOperation, EditPlan, ParamValue, SceneDescriptor, TimeRange } from '../plan/types.js';
import { rangeDuration } from '../plan/types.js';
import { sceneCoverage } from '../plan/validator.js';
import type { EffectRequest, StructuredIntent } from './intent.js';

const EPSILON = INTERPRETATION.mergeEpsilonSec;

export interface ScoredScene {
  scene: SceneDescriptor;
  range: TimeRange;
  relevance: number;
}

// ── Matching ──────────────────────────────────────────────────────────────────

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

function sceneTokens(scene: SceneDescriptor): Set<string> {
  return new Set(tokenize(`${scene.summary} ${scene.contentLabel.replace(/_/g, ' ')}`));
}

/** A keyword matches when every one of its words appears in the scene. */
function keywordMatches(keyword: string, tokens: ReadonlySet<string>): boolean {
  const words = tokenize(keyword);
  return words.length > 0 && words.every(w => tokens.has(w));
}

export function scoreScenes(intent: StructuredIntent, scenes: readonly SceneDescriptor[]): ScoredScene[] {
  const positive = [...intent.include, ...intent.themes];
  const scored: ScoredScene[] = [];

  for (const scene of scenes) {
    if (!(scene.endTime > scene.startTime)) continue;
    const tokens = sceneTokens(scene);
    if (intent.exclude.some(k => keywordMatches(k, tokens))) continue;
    if (intent.labels.length > 0 && !intent.labels.includes(scene.contentLabel)) continue;

    const relevance = positive.filter(k => keywordMatches(k, tokens)).length;
    if (positive.length > 0 && relevance === 0) continue;

    scored.push({ scene, range: { start: scene.startTime, end: scene.endTime }, relevance });
  }
  return scored;
}

// ── Selection policy ──────────────────────────────────────────────────────────

function overlaps(a: TimeRange, b: TimeRange): boolean {
  return a.start < b.end - EPSILON && b.start < a.end - EPSILON;
}

export function resolveOverlaps(candidates: readonly ScoredScene[]): ScoredScene[] {
  const ranked = [...candidates].sort(
    (a, b) => b.relevance - a.relevance || a.range.start - b.range.start,
  );
  const selected: ScoredScene[] = [];
  for (const candidate of ranked) {
    if (!selected.some(s => overlaps(s.range, candidate.range))) selected.push(candidate);
  }
  return selected;
}

export function applyDurationBound(selected: readonly ScoredScene[], maxDurationSec?: number): ScoredScene[] {
  if (maxDurationSec === undefined) return [...selected];

  const dropOrder = [...selected].sort(
    (a, b) =>
      a.relevance - b.relevance ||
      rangeDuration(a.range) - rangeDuration(b.range) ||
      b.range.start - a.range.start,
  );

  let total = selected.reduce((sum, s) => sum + rangeDuration(s.range), 0);
  const dropped = new Set<ScoredScene>();
  for (const candidate of dropOrder) {
    if (total <= maxDurationSec + EPSILON || selected.length - dropped.size <= 1) break;
    dropped.add(candidate);
    total -= rangeDuration(candidate.range);
  }

  const kept = selected.filter(s => !dropped.has(s));
  const only = kept[0];
  if (kept.length === 1 && only && total > maxDurationSec + EPSILON) {
    return [{ ...only, range: { start: only.range.start, end: only.range.start + maxDurationSec } }];
  }
  return kept;
}

export function mergeTouching(ranges: readonly TimeRange[]): TimeRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  const merged: TimeRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + EPSILON) {
      merged[merged.length - 1] = { start: last.start, end: Math.max(last.end, range.end) };
    } else {
      merged.push(range);
    }
  }
  return merged;
}

// ── Plan emission ─────────────────────────────────────────────────────────────

function compact(params: Record<string, ParamValue | undefined>): Record<string, ParamValue> {
  const out: Record<string, ParamValue> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) out[name] = value;
  }
  return out;
}

function effectParameters(effect: EffectRequest): Record<string, ParamValue> {
  switch (effect.kind) {
    case 'mute':    return {};
    case 'blur':    return compact({ strength: effect.strength });
    case 'zoom':    return compact({ scale: effect.scale });
    case 'crop':    return compact({ width: effect.width, height: effect.height, x: effect.x, y: effect.y });
    case 'overlay': return compact({ path: effect.path, x: effect.x, y: effect.y });
    case 'caption': return compact({ text: effect.text, position: effect.position });
  }
}

/**
 * One trim per segment with the requested effects chained on it, then a
 * concat of every segment's last operation when there is more than one.
 */
export function buildPlan(segments: readonly TimeRange[], effects: readonly EffectRequest[] = []): EditPlan {
  const operations: EditOperation[] = [];
  let counter = 0;
  const nextId = () => `op-${++counter}`;
  const tails: string[] = [];

  for (const segment of segments) {
    let tail = nextId();
    operations.push({ id: tail, kind: 'trim', sourceRange: segment, parameters: {}, dependsOn: [] });
    for (const effect of effects) {
      const id = nextId();
      operations.push({
        id,
        kind: effect.kind,
        sourceRange: segment,
        parameters: effectParameters(effect),
        dependsOn: [tail],
      });
      tail = id;
    }
    tails.push(tail);
  }

  const first = segments[0];
  const last = segments[segments.length - 1];
  if (tails.length > 1 && first && last) {
    operations.push({
      id: nextId(),
      kind: 'concat',
      sourceRange: { start: first.start, end: last.end },
      parameters: {},
      dependsOn: tails,
    });
  }
  return { operations };
}

export function expandIntent(
  intent: StructuredIntent,
  scenes: readonly SceneDescriptor[],
  instruction = '',
): EditPlan {
  if (scenes.length === 0) return { operations: [] };

  const matched = scoreScenes(intent, scenes);
  if (matched.length === 0) throw new NoMatchingContent(instruction);

  const selected = applyDurationBound(resolveOverlaps(matched), intent.maxDurationSec);
  const segments = mergeTouching(selected.map(s => s.range));
  return buildPlan(segments, intent.effects);
}

/** Unfiltered fallback: keep everything the scene index covers. */
export function fullVideoPlan(scenes: readonly SceneDescriptor[]): EditPlan {
  return buildPlan(sceneCoverage(scenes));
}
