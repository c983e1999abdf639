import { copyFile, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ImageData, Project, ReconcileResult } from '@/types';
import { exportAll } from './codecs';
import { fileExists } from './codecs/paths';
import {
  BACKUP_SUFFIX,
  DEFAULT_CLASS_COLOR,
  DEFAULT_CLASS_NAME,
  PROJECT_FILE_NAME,
  TEMP_SUFFIX,
} from './constants';
import { AnnotationError, errorMessage, toAnnotationError } from './errors';
import type { ErrorKind } from './errors';
import { discoverImages, findImageFiles, loadImageData } from './images';
import { importExistingAnnotations } from './importer';
import { createLogger } from './logger';
import { createProject, isRecord, nowIso, projectFromJson, projectToJson } from './models';

const log = createLogger('project');

export interface SaveResult {
  saved: boolean;
  exported: boolean;
}

export function backupPath(projectPath: string): string {
  return `${projectPath}${BACKUP_SUFFIX}`;
}

export function tempPath(projectPath: string): string {
  return `${projectPath}${TEMP_SUFFIX}`;
}

/** Serialized project file contents: 2-space JSON with a trailing newline */
export function serializeProject(project: Project): string {
  return `${JSON.stringify(projectToJson(project), null, 2)}\n`;
}

async function readProjectFile(file: string): Promise<Project> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, 'utf-8'));
  } catch (err) {
    throw toAnnotationError(err, 'corrupt', `Cannot read ${file}`);
  }
  if (!isRecord(data)) {
    throw new AnnotationError('corrupt', `${file} does not contain a project object`);
  }
  return projectFromJson(data);
}

/**
 * Owns one project: its in-memory tree, its file path and the current image
 * cursor. Public operations report failure through their return value and
 * `lastError`; they never throw.
 */
export class ProjectStore {
  project: Project | null = null;
  projectPath: string | null = null;
  currentImageIndex = -1;
  lastError: AnnotationError | null = null;

  private writes: Promise<unknown> = Promise.resolve();

  private fail(kind: ErrorKind, err: unknown, fallback: string): false {
    this.lastError = toAnnotationError(err, kind, fallback);
    log.error(this.lastError.message);
    return false;
  }

  /** Run file writes one after another */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task, task);
    this.writes = run.catch(() => undefined);
    return run;
  }

  /**
   * Start a project from an image folder. The project file defaults to
   * `project.json` beside the folder.
   */
  async create(imageFolder: string, projectPath?: string): Promise<boolean> {
    this.lastError = null;
    const folder = path.resolve(imageFolder);
    if (!(await fileExists(folder))) {
      return this.fail('not-found', null, `Image folder not found: ${folder}`);
    }

    let images: ImageData[];
    try {
      images = await discoverImages(folder);
    } catch (err) {
      return this.fail('io-failure', err, `Cannot scan ${folder}`);
    }
    if (images.length === 0) {
      return this.fail('not-found', null, `No readable images in ${folder}`);
    }

    const project = createProject({
      image_folder: folder,
      classes: [{ id: 0, name: DEFAULT_CLASS_NAME, color: DEFAULT_CLASS_COLOR }],
      images,
    });
    const file = path.resolve(projectPath ?? path.join(path.dirname(folder), PROJECT_FILE_NAME));

    this.project = project;
    this.projectPath = file;
    this.currentImageIndex = 0;

    await importExistingAnnotations(project, file);
    return true;
  }

  /**
   * Open a project file, falling back to its `.bak` copy when the file is
   * corrupt. On failure the store keeps whatever it held before.
   */
  async load(projectPath: string): Promise<boolean> {
    this.lastError = null;
    const file = path.resolve(projectPath);
    if (!(await fileExists(file))) {
      return this.fail('not-found', null, `Project file not found: ${file}`);
    }

    let project: Project;
    try {
      project = await readProjectFile(file);
    } catch (err) {
      log.warn(`${errorMessage(err, 'Corrupt project file')}; trying backup`);
      try {
        project = await readProjectFile(backupPath(file));
      } catch (backupErr) {
        return this.fail('corrupt', backupErr, `Cannot load ${file} or its backup`);
      }
    }

    this.project = project;
    this.projectPath = file;
    this.currentImageIndex = project.images.length > 0 ? 0 : -1;

    await importExistingAnnotations(project, file);
    return true;
  }

  /**
   * Crash-safe save: back up the current file, write a temp sibling, then
   * rename it over the canonical path.
   */
  save(): Promise<boolean> {
    return this.enqueue(() => this.writeProject());
  }

  private async writeProject(): Promise<boolean> {
    const { project, projectPath } = this;
    if (!project || !projectPath) {
      return this.fail('not-found', null, 'No project to save');
    }

    try {
      if (await fileExists(projectPath)) {
        await copyFile(projectPath, backupPath(projectPath));
      }
      project.modified_at = nowIso();
      const temp = tempPath(projectPath);
      await writeFile(temp, serializeProject(project), 'utf-8');
      await rename(temp, projectPath);
      this.lastError = null;
      return true;
    } catch (err) {
      return this.fail('io-failure', err, `Error saving project to ${projectPath}`);
    }
  }

  /** Save, then regenerate the VOC/YOLO/COCO exports if the save succeeded */
  saveAndExport(): Promise<SaveResult> {
    return this.enqueue(async () => {
      const saved = await this.writeProject();
      if (!saved || !this.project || !this.projectPath) return { saved, exported: false };
      const exported = await exportAll(this.project, this.projectPath);
      if (!exported) this.lastError = new AnnotationError('io-failure', 'Export failed');
      return { saved, exported };
    });
  }

  /**
   * Sync the image list with the image folder: drop images whose file is
   * gone (with their annotations), append newly found files.
   */
  async reconcile(): Promise<ReconcileResult> {
    const project = this.project;
    if (!project || !project.image_folder) return { added: 0, removed: 0 };
    const folder = project.image_folder;
    if (!(await fileExists(folder))) return { added: 0, removed: 0 };

    const kept: ImageData[] = [];
    for (const image of project.images) {
      if (await fileExists(image.filepath)) kept.push(image);
    }
    const removed = project.images.length - kept.length;
    project.images = kept;

    if (this.currentImageIndex >= kept.length) {
      this.currentImageIndex = kept.length - 1;
    }

    const known = new Set(kept.map((img) => img.filename));
    let added = 0;
    try {
      for (const file of await findImageFiles(folder)) {
        if (known.has(path.basename(file))) continue;
        const image = await loadImageData(file);
        if (!image) continue;
        project.images.push(image);
        known.add(image.filename);
        added += 1;
      }
    } catch (err) {
      this.fail('io-failure', err, `Cannot scan ${folder}`);
    }

    if (this.currentImageIndex < 0 && project.images.length > 0) {
      this.currentImageIndex = 0;
    }
    if (added > 0 || removed > 0) log.info(`Reconciled images: +${added} -${removed}`);
    return { added, removed };
  }

  getCurrentImage(): ImageData | null {
    if (!this.project || this.currentImageIndex < 0) return null;
    return this.project.images[this.currentImageIndex] ?? null;
  }

  setCurrentImage(index: number): boolean {
    if (!this.project) return false;
    if (index < 0 || index >= this.project.images.length) return false;
    this.currentImageIndex = index;
    return true;
  }
}
