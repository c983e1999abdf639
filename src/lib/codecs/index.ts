import type { ExportFormat, Project } from '@/types';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { exportCoco, importCoco } from './coco';
import { getExportsDir } from './paths';
import { exportVoc, importVoc } from './voc';
import { exportYolo, importYolo } from './yolo';

const log = createLogger('export');

export interface FormatCodec {
  id: ExportFormat;
  name: string;
  description: string;
  /** Location under `exports/` */
  location: string;
  export: (project: Project, exportsDir: string) => Promise<void>;
  import: (project: Project, exportsDir: string) => Promise<boolean>;
}

export const VOC_CODEC: FormatCodec = {
  id: 'pascal-voc',
  name: 'Pascal VOC',
  description: 'XML annotations per image (ImageNet style)',
  location: 'voc/Annotations/<stem>.xml',
  export: exportVoc,
  import: importVoc,
};

export const YOLO_CODEC: FormatCodec = {
  id: 'yolo',
  name: 'YOLO',
  description: 'Normalized center/size label file per image plus classes.txt',
  location: 'yolo/labels/<stem>.txt',
  export: exportYolo,
  import: importYolo,
};

export const COCO_CODEC: FormatCodec = {
  id: 'coco',
  name: 'COCO JSON',
  description: 'Common Objects in Context format (single JSON)',
  location: 'coco/annotations.json',
  export: exportCoco,
  import: importCoco,
};

/** Codecs in the order exports are written */
export const EXPORT_FORMATS: readonly FormatCodec[] = [VOC_CODEC, YOLO_CODEC, COCO_CODEC];

/** Codecs in the order existing exports are imported */
export const IMPORT_PRECEDENCE: readonly FormatCodec[] = [COCO_CODEC, VOC_CODEC, YOLO_CODEC];

/**
 * Regenerate every export under `<project dir>/exports`. The first failing
 * codec stops the run; files already written by earlier codecs are kept.
 */
export async function exportAll(project: Project, projectPath: string): Promise<boolean> {
  const exportsDir = getExportsDir(projectPath);
  const total = project.images.reduce((sum, img) => sum + img.annotations.length, 0);
  log.info(`Exporting ${total} annotations across ${project.images.length} images`);

  for (const codec of EXPORT_FORMATS) {
    try {
      await codec.export(project, exportsDir);
    } catch (err) {
      log.error(`${codec.name} export failed: ${errorMessage(err, 'unknown error')}`);
      return false;
    }
  }
  log.info(`Export completed to ${exportsDir}`);
  return true;
}

export { getExportsDir, imageStem } from './paths';
