import type { ImportPolicy, Project } from '@/types';
import { IMPORT_PRECEDENCE } from './codecs';
import { fileExists, getExportsDir } from './codecs/paths';
import { errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('import');

/**
 * Pull annotations for unannotated images from `exports/` next to the
 * project file. Formats are tried COCO, VOC, YOLO.
 *
 * With `first-match` the first format that imports anything wins and the
 * rest are never read, even for images it did not cover. With `merge` every
 * format runs; each one still skips images that already have annotations,
 * so earlier formats take precedence per image.
 */
export async function importExistingAnnotations(
  project: Project,
  projectPath: string,
  policy: ImportPolicy = 'first-match'
): Promise<boolean> {
  const exportsDir = getExportsDir(projectPath);
  if (!(await fileExists(exportsDir))) return false;

  let imported = false;
  for (const codec of IMPORT_PRECEDENCE) {
    let found = false;
    try {
      found = await codec.import(project, exportsDir);
    } catch (err) {
      log.warn(`${codec.name} import failed: ${errorMessage(err, 'unknown error')}`);
    }
    if (!found) continue;

    log.info(`Imported annotations from ${codec.name}`);
    imported = true;
    if (policy === 'first-match') break;
  }
  return imported;
}
