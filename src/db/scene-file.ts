import { readFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CONTENT_LABELS } from '../config.js';
import type { SceneDescriptor } from '../plan/types.js';
import type { SceneIndex } from './scenes.js';

const SceneSchema = z.object({
  startTime:    z.number(),
  endTime:      z.number(),
  contentLabel: z.enum(CONTENT_LABELS),
  summary:      z.string().default(''),
});

const SceneFileSchema = z.object({
  sourcePath: z.string().min(1).optional(),
  scenes:     z.array(z.unknown()),
});

/**
 * Scene index kept in a JSON file next to the footage:
 * `{ "sourcePath": "talk.mp4", "scenes": [{ "startTime": 0, ... }] }`.
 * One file describes one video, so the videoId is only used in messages.
 * A relative sourcePath is resolved against the file's directory.
 */
export class FileSceneIndex implements SceneIndex {
  private loaded: Promise<{ sourcePath: string | null; scenes: SceneDescriptor[] }> | null = null;

  constructor(private readonly filePath: string) {}

  private load() {
    this.loaded ??= this.read();
    return this.loaded;
  }

  private async read(): Promise<{ sourcePath: string | null; scenes: SceneDescriptor[] }> {
    const text = await readFile(this.filePath, 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new Error(`Scene file ${this.filePath} is not valid JSON`, { cause: err });
    }

    const file = SceneFileSchema.safeParse(json);
    if (!file.success) {
      throw new Error(`Scene file ${this.filePath} must contain a "scenes" array`);
    }

    const scenes = file.data.scenes.map((entry, i) => {
      const scene = SceneSchema.safeParse(entry);
      if (!scene.success) {
        const issues = scene.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Malformed scene #${i} in ${this.filePath}: ${issues}`);
      }
      return scene.data;
    });
    scenes.sort((a, b) => a.startTime - b.startTime);

    const sourcePath = file.data.sourcePath
      ? path.resolve(path.dirname(this.filePath), file.data.sourcePath)
      : null;
    return { sourcePath, scenes };
  }

  async getScenes(_videoId: string): Promise<SceneDescriptor[]> {
    const { scenes } = await this.load();
    return [...scenes];
  }

  async getSourcePath(_videoId: string): Promise<string | null> {
    return (await this.load()).sourcePath;
  }
}
