export type * from './types';
export * from './lib/constants';
export * from './lib/models';
export * from './lib/classes';
export * from './lib/commands';
export * from './lib/images';
export * from './lib/importer';
export * from './lib/projectStore';
export * from './lib/session';
export { AnnotationError, errorMessage } from './lib/errors';
export type { ErrorKind } from './lib/errors';
export { createLogger, setLogLevel, getLogLevel } from './lib/logger';
export type { LogLevel, Logger } from './lib/logger';
export {
  EXPORT_FORMATS,
  IMPORT_PRECEDENCE,
  exportAll,
  getExportsDir,
  imageStem,
} from './lib/codecs';
export type { FormatCodec } from './lib/codecs';
export { buildVocXml, exportVoc, importVoc } from './lib/codecs/voc';
export { buildYoloLabels, exportYolo, importYolo, parseYoloLine, toYoloLine } from './lib/codecs/yolo';
export { buildCocoDataset, exportCoco, importCoco } from './lib/codecs/coco';
export type { CocoDataset, CocoAnnotation, CocoCategory, CocoImage } from './lib/codecs/coco';
export { useAnnotations } from './hooks/useAnnotations';
export { useImages } from './hooks/useImages';
