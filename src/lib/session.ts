import type {
  Annotation,
  BoxBounds,
  ClassDefinition,
  DeleteClassResult,
  ImageData,
  ImageSummary,
  Project,
  ReconcileResult,
} from '@/types';
import * as classes from './classes';
import {
  CommandHistory,
  changeClassCommand,
  createBoxCommand,
  deleteBoxCommand,
  deleteBoxesCommand,
  geometryTargets,
  moveBoxCommand,
  resizeBoxCommand,
} from './commands';
import type { Command } from './commands';
import { MAX_HISTORY, getPaletteColor } from './constants';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { clampBox, createAnnotation, isValidBox } from './models';
import type { ProjectStore, SaveResult } from './projectStore';

const log = createLogger('session');

export type BoxChangedListener = (annotation: Annotation) => void;
export type ChangeListener = () => void;

export interface SessionOptions {
  maxHistory?: number;
}

/**
 * Editing context over one project store: the undo/redo history, the
 * selection on the current image and change notifications for the UI.
 * Every annotation mutation goes through the history.
 */
export class AnnotationSession {
  readonly history: CommandHistory;
  private selection = new Set<string>();
  private boxListeners = new Set<BoxChangedListener>();
  private changeListeners = new Set<ChangeListener>();

  constructor(
    readonly store: ProjectStore,
    options: SessionOptions = {}
  ) {
    this.history = new CommandHistory(options.maxHistory ?? MAX_HISTORY);
  }

  // Queries

  get project(): Project | null {
    return this.store.project;
  }

  get currentImage(): ImageData | null {
    return this.store.getCurrentImage();
  }

  get currentImageIndex(): number {
    return this.store.currentImageIndex;
  }

  get classes(): readonly ClassDefinition[] {
    return this.project?.classes ?? [];
  }

  get selectedIds(): ReadonlySet<string> {
    return this.selection;
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  listImages(): ImageSummary[] {
    return (this.project?.images ?? []).map((img) => ({
      filename: img.filename,
      width: img.width,
      height: img.height,
      annotationCount: img.annotations.length,
      hasAnnotations: img.annotations.length > 0,
    }));
  }

  getSelectedAnnotations(): Annotation[] {
    return (this.currentImage?.annotations ?? []).filter((a) => this.selection.has(a.id));
  }

  /** Class id to colour, rebuilt per call; fetch once per redraw */
  classColors(): Map<number, string> {
    return classes.buildClassColorMap(this.classes);
  }

  // Notifications

  onBoxChanged(listener: BoxChangedListener): () => void {
    this.boxListeners.add(listener);
    return () => this.boxListeners.delete(listener);
  }

  subscribe(listener: ChangeListener): () => void {
    this.changeListeners.add(listener);
    return () => this.changeListeners.delete(listener);
  }

  private notify(changedBoxes: readonly Annotation[] = []): void {
    for (const annotation of changedBoxes) {
      for (const listener of this.boxListeners) {
        try {
          listener(annotation);
        } catch (err) {
          log.error(`Box listener failed: ${errorMessage(err, 'unknown error')}`);
        }
      }
    }
    for (const listener of this.changeListeners) {
      try {
        listener();
      } catch (err) {
        log.error(`Change listener failed: ${errorMessage(err, 'unknown error')}`);
      }
    }
  }

  private run(command: Command): void {
    this.history.execute(command);
    this.notify(geometryTargets(command));
  }

  // Navigation and selection

  selectImage(index: number): boolean {
    if (!this.store.setCurrentImage(index)) return false;
    this.selection.clear();
    this.notify();
    return true;
  }

  nextImage(): boolean {
    const count = this.project?.images.length ?? 0;
    if (count === 0) return false;
    return this.selectImage((this.currentImageIndex + 1) % count);
  }

  prevImage(): boolean {
    const count = this.project?.images.length ?? 0;
    if (count === 0) return false;
    return this.selectImage((this.currentImageIndex - 1 + count) % count);
  }

  select(ids: Iterable<string>): void {
    const present = new Set((this.currentImage?.annotations ?? []).map((a) => a.id));
    this.selection = new Set([...ids].filter((id) => present.has(id)));
    this.notify();
  }

  toggleSelection(id: string): void {
    const next = new Set(this.selection);
    if (next.has(id)) next.delete(id);
    else next.add(id);
    this.select(next);
  }

  selectAll(): void {
    this.select((this.currentImage?.annotations ?? []).map((a) => a.id));
  }

  clearSelection(): void {
    this.select([]);
  }

  private findAnnotation(id: string): { image: ImageData; annotation: Annotation } | null {
    const image = this.currentImage;
    const annotation = image?.annotations.find((a) => a.id === id);
    return image && annotation ? { image, annotation } : null;
  }

  // Mutations

  /**
   * Add a box to the current image. Bounds are clamped to the image; the
   * class defaults to the first one.
   */
  createBox(bounds: BoxBounds, classId = 0): Annotation | null {
    const image = this.currentImage;
    const project = this.project;
    if (!image || !project) return null;
    const cls = classes.getClass(project, classId);
    if (!cls) return null;

    const normalized: BoxBounds = {
      x_min: Math.round(Math.min(bounds.x_min, bounds.x_max)),
      y_min: Math.round(Math.min(bounds.y_min, bounds.y_max)),
      x_max: Math.round(Math.max(bounds.x_min, bounds.x_max)),
      y_max: Math.round(Math.max(bounds.y_min, bounds.y_max)),
    };
    if (!isValidBox(normalized)) return null;

    const annotation = createAnnotation({
      class_id: cls.id,
      class_name: cls.name,
      ...clampBox(normalized, image.width, image.height),
    });
    this.run(createBoxCommand(image, annotation));
    return annotation;
  }

  deleteBox(id: string): boolean {
    const found = this.findAnnotation(id);
    if (!found) return false;
    this.selection.delete(id);
    this.run(deleteBoxCommand(found.image, found.annotation));
    return true;
  }

  /** Delete the selected boxes as a single undoable step */
  deleteSelected(): boolean {
    const image = this.currentImage;
    const selected = this.getSelectedAnnotations();
    if (!image || selected.length === 0) return false;
    this.selection.clear();
    const [only] = selected;
    this.run(
      selected.length === 1 && only
        ? deleteBoxCommand(image, only)
        : deleteBoxesCommand(image, selected)
    );
    return true;
  }

  moveBox(id: string, dx: number, dy: number): boolean {
    const found = this.findAnnotation(id);
    if (!found || (dx === 0 && dy === 0)) return false;
    const { image, annotation } = found;
    this.run(moveBoxCommand(annotation, Math.round(dx), Math.round(dy), image.width, image.height));
    return true;
  }

  resizeBox(id: string, bounds: BoxBounds): boolean {
    const found = this.findAnnotation(id);
    if (!found) return false;
    const { image, annotation } = found;
    this.run(resizeBoxCommand(annotation, bounds, image.width, image.height));
    return true;
  }

  /**
   * Reclassify the given boxes, else the selection, else the last box
   * drawn on the current image.
   */
  assignClass(classId: number, ids?: readonly string[]): boolean {
    const project = this.project;
    const image = this.currentImage;
    if (!project || !image) return false;
    const cls = classes.getClass(project, classId);
    if (!cls) return false;

    let targets = ids
      ? image.annotations.filter((a) => ids.includes(a.id))
      : this.getSelectedAnnotations();
    if (targets.length === 0 && !ids) {
      const last = image.annotations[image.annotations.length - 1];
      targets = last ? [last] : [];
    }
    if (targets.length === 0) return false;

    this.run(changeClassCommand(targets, cls.id, cls.name));
    return true;
  }

  undo(): boolean {
    const command = this.history.undo();
    if (!command) return false;
    this.pruneSelection();
    this.notify(geometryTargets(command));
    return true;
  }

  redo(): boolean {
    const command = this.history.redo();
    if (!command) return false;
    this.pruneSelection();
    this.notify(geometryTargets(command));
    return true;
  }

  private pruneSelection(): void {
    const present = new Set((this.currentImage?.annotations ?? []).map((a) => a.id));
    for (const id of this.selection) {
      if (!present.has(id)) this.selection.delete(id);
    }
  }

  // Classes

  addClass(name: string, color?: string): number {
    const project = this.project;
    const trimmed = name.trim();
    if (!project || !trimmed) return -1;
    const id = classes.addClass(project, trimmed, color ?? getPaletteColor(project.classes.length));
    this.notify();
    return id;
  }

  updateClass(classId: number, update: Partial<Pick<ClassDefinition, 'name' | 'color'>>): boolean {
    const project = this.project;
    if (!project || !classes.updateClass(project, classId, update)) return false;
    this.notify();
    return true;
  }

  /**
   * Delete a class no box uses, counting boxes that undo or redo could
   * restore. Ids held by the history follow the reindex.
   */
  deleteClass(classId: number): DeleteClassResult {
    const project = this.project;
    if (!project) return { ok: false, reason: 'not-found' };
    if (classes.getClass(project, classId) && this.history.referencesClass(classId)) {
      return { ok: false, reason: 'in-use' };
    }
    const result = classes.deleteClass(project, classId);
    if (!result.ok) return result;

    const live = new Set(project.images.flatMap((image) => image.annotations));
    this.history.remapClassIds((id) => (id > classId ? id - 1 : id), live);
    this.notify();
    return result;
  }

  // Persistence

  async save(): Promise<SaveResult> {
    const result = await this.store.saveAndExport();
    this.notify();
    return result;
  }

  /**
   * Re-scan the image folder. History is dropped when images disappear,
   * since its commands may point at removed images.
   */
  async reconcile(): Promise<ReconcileResult> {
    const result = await this.store.reconcile();
    this.selection.clear();
    if (result.removed > 0) this.history.clear();
    this.notify();
    return result;
  }
}
