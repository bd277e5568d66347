import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Writes JSON to a sibling temp file, then renames it over `filePath` so
 * readers never see a partial file.
 */
export function writeJsonAtomic(filePath: string, value: unknown, indent?: number): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  mkdirSync(dirname(filePath), { recursive: true });
  try {
    writeFileSync(tmpPath, JSON.stringify(value, null, indent));
    renameSync(tmpPath, filePath);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}
