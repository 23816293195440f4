import { stat } from 'fs/promises';

async function modifiedTime(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Decide whether a file-backed artifact has to be regenerated.
 *
 * A missing artifact is always stale. So is an artifact whose source cannot be
 * stat'ed: the regeneration attempt will report the real problem. Otherwise the
 * artifact is stale only when the source is strictly newer.
 */
export async function isStale(
  sourcePath: string,
  artifactPath: string,
): Promise<boolean> {
  const artifactTime = await modifiedTime(artifactPath);
  if (artifactTime === null) return true;

  const sourceTime = await modifiedTime(sourcePath);
  if (sourceTime === null) return true;

  return sourceTime > artifactTime;
}

/**
 * Check if a path exists
 */
export async function fileExists(path: string): Promise<boolean> {
  return (await modifiedTime(path)) !== null;
}
