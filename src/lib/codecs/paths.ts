import { access } from 'node:fs/promises';
import path from 'node:path';
import { EXPORTS_DIR_NAME } from '../constants';

/** File name without its last extension */
export function imageStem(filename: string): string {
  return path.parse(filename).name;
}

/** `exports/` beside the project file */
export function getExportsDir(projectPath: string): string {
  return path.join(path.dirname(projectPath), EXPORTS_DIR_NAME);
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}
