import { copyFile, mkdir, mkdtemp, rename, rm, stat } from 'fs/promises';
import * as path from 'path';

/** Per-run scratch directory for partial outputs, so concurrent runs never share files. */
export async function createScratchDir(tempDir: string): Promise<string> {
  await mkdir(tempDir, { recursive: true });
  return mkdtemp(path.join(tempDir, 'run-'));
}

export function partialPathFor(scratchDir: string, operationId: string): string {
  return path.join(scratchDir, `${operationId}.partial.mp4`);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * Move a finished partial file to its final location. Falls back to
 * copy + delete when the scratch and output directories are on different devices.
 */
export async function promoteArtifact(partialPath: string, finalPath: string): Promise<void> {
  const info = await stat(partialPath).catch(() => null);
  if (!info || info.size === 0) {
    throw new Error(`tool reported success but wrote no output to ${partialPath}`);
  }

  await mkdir(path.dirname(finalPath), { recursive: true });
  try {
    await rename(partialPath, finalPath);
  } catch (err) {
    if (errorCode(err) !== 'EXDEV') throw err;
    await copyFile(partialPath, finalPath);
    await rm(partialPath, { force: true });
  }
}

export async function discardArtifact(partialPath: string): Promise<void> {
  await rm(partialPath, { force: true });
}
