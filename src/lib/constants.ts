/**
 * Shared constants for the annotation engine.
 */

/** Version string written to new project files */
export const PROJECT_VERSION = '1.0';

/** Default project file name, placed beside the image folder */
export const PROJECT_FILE_NAME = 'project.json';

export const BACKUP_SUFFIX = '.bak';
export const TEMP_SUFFIX = '.tmp';

/** Image file extensions picked up by folder discovery (lower case) */
export const IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.bmp',
  '.tiff',
  '.tif',
  '.webp',
];

/** Maximum number of entries kept by the undo/redo history */
export const MAX_HISTORY = 50;

export const DEFAULT_CLASS_NAME = 'object';
export const DEFAULT_CLASS_COLOR = '#FF0000';

/** Directory (relative to the project file) holding all exports */
export const EXPORTS_DIR_NAME = 'exports';

export const EXPORT_PATHS = {
  vocAnnotations: ['voc', 'Annotations'],
  yoloClasses: ['yolo', 'classes.txt'],
  yoloLabels: ['yolo', 'labels'],
  cocoFile: ['coco', 'annotations.json'],
} as const;

/** Value of `source/database` in exported VOC files */
export const VOC_DATABASE = 'AnnotationGUI';

/** Colour palette offered when adding classes */
export const CLASS_COLORS: readonly string[] = [
  '#FF0000',
  '#22C55E',
  '#3B82F6',
  '#F59E0B',
  '#EF4444',
  '#8B5CF6',
  '#06B6D4',
  '#EC4899',
];

/**
 * Pick a palette colour for the n-th class.
 *
 * @param index - Position of the class in the class list
 * @returns The hex color string for that position
 */
export function getPaletteColor(index: number): string {
  const size = CLASS_COLORS.length;
  return CLASS_COLORS[((index % size) + size) % size] ?? DEFAULT_CLASS_COLOR;
}
