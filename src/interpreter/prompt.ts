import { CONTENT_LABELS } from '../config.js';
import type { SceneDescriptor } from '../plan/types.js';

export const INTENT_SYSTEM_PROMPT =
  'You turn video editing requests into a fixed JSON schema. ' +
  'You never write prose, code or commands — only the JSON object requested.';

function describeScenes(scenes: readonly SceneDescriptor[]): string {
  return scenes
    .map(s => `- ${s.startTime.toFixed(3)}s–${s.endTime.toFixed(3)}s [${s.contentLabel}] ${s.summary}`)
    .join('\n');
}

export function buildIntentPrompt(
  instruction: string,
  scenes: readonly SceneDescriptor[],
  feedback: readonly string[] = [],
): string {
  const retryNotes = feedback.length > 0
    ? `\nYour previous answer produced an invalid edit. Fix these problems:\n${feedback.map(f => `- ${f}`).join('\n')}\n`
    : '';

  return `The user wants to edit a video. Their request is:
"${instruction}"

The video has been split into these scenes:
${describeScenes(scenes)}

Describe what the user wants as a JSON object {"intent": [...]} where every element is one of:
  {"field": "theme", "value": "<mood or theme words>"}
  {"field": "max_duration", "seconds": <number>}
  {"field": "include", "keywords": ["<word or phrase found in the scenes to keep>"]}
  {"field": "exclude", "keywords": ["<word or phrase found in the scenes to drop>"]}
  {"field": "labels", "labels": [${CONTENT_LABELS.map(l => `"${l}"`).join(', ')}]}
  {"field": "effect", "effect": <effect>}

<effect> is one of:
  {"kind": "mute"}
  {"kind": "blur", "strength": <0..1>}
  {"kind": "zoom", "scale": <1..4>}
  {"kind": "crop", "width": <px>, "height": <px>, "x": <px>, "y": <px>}
  {"kind": "overlay", "path": "<image file>", "x": <px>, "y": <px>}
  {"kind": "caption", "text": "<text>", "position": "top" | "bottom"}

Prefer keywords that literally appear in the scene descriptions. Omit fields the request does not mention.
${retryNotes}
Answer with the JSON object only.`;
}

/** Pull the JSON object out of a model answer, tolerating code fences and chatter. */
export function extractJson(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text)?.[1];
  const candidate = fenced ?? text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) throw new Error('Response contains no JSON object');
  const parsed: unknown = JSON.parse(candidate.slice(start, end + 1));
  return parsed;
}
