/**
 * Scene index access. The pipeline only sees the SceneIndex interface; the
 * Supabase implementation reads rows written by the upstream scene detector.
 */
import { z } from 'zod';
import { CONTENT_LABELS } from '../config.js';
import type { SceneDescriptor } from '../plan/types.js';
import { logger } from '../utils/logger.js';
import { dbSelect } from './client.js';

export interface SceneIndex {
  /** Scenes ordered by start time. Empty when the video has none. */
  getScenes(videoId: string): Promise<SceneDescriptor[]>;
  /** Path of the original video, or null when the index does not know it. */
  getSourcePath(videoId: string): Promise<string | null>;
}

// ─── Row schemas ──────────────────────────────────────────────────────────────

const SceneRowSchema = z.object({
  id:            z.union([z.string(), z.number()]).optional(),
  start_time:    z.coerce.number(),
  end_time:      z.coerce.number(),
  content_label: z.enum(CONTENT_LABELS),
  summary:       z.string().default(''),
});

const VideoRowSchema = z.object({
  original_path: z.string().min(1).nullable(),
});

const VideoListRowSchema = VideoRowSchema.extend({
  id:         z.string(),
  created_at: z.string(),
});

export interface VideoSummary {
  id: string;
  originalPath: string | null;
  createdAt: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export function parseSceneRow(row: unknown, position: number): SceneDescriptor {
  const parsed = SceneRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new Error(`Malformed scene row #${position}: ${describeIssues(parsed.error)}`);
  }
  const { start_time, end_time, content_label, summary } = parsed.data;
  return { startTime: start_time, endTime: end_time, contentLabel: content_label, summary };
}

// ─── Supabase ─────────────────────────────────────────────────────────────────

export class SupabaseSceneIndex implements SceneIndex {
  async getScenes(videoId: string): Promise<SceneDescriptor[]> {
    const rows = await dbSelect('scenes', { video_id: videoId }, { column: 'start_time' });
    const scenes = rows.map((row, i) => {
      const id = row['id'];
      try {
        return parseSceneRow(row, i);
      } catch (err) {
        throw new Error(
          `${err instanceof Error ? err.message : String(err)} (video ${videoId}${id !== undefined ? `, scene ${String(id)}` : ''})`,
        );
      }
    });
    logger.debug('Scene index loaded', { videoId, scenes: scenes.length });
    return scenes;
  }

  async getSourcePath(videoId: string): Promise<string | null> {
    const [row] = await dbSelect('videos', { id: videoId });
    if (!row) return null;
    const parsed = VideoRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Malformed video row ${videoId}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.original_path;
  }
}

/** Every video the scene index knows, oldest first. */
export async function listVideos(): Promise<VideoSummary[]> {
  const rows = await dbSelect('videos', {}, { column: 'created_at' });
  return rows.map((row) => {
    const parsed = VideoListRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Malformed video row: ${describeIssues(parsed.error)}`);
    }
    const { id, original_path, created_at } = parsed.data;
    return { id, originalPath: original_path, createdAt: created_at };
  });
}
