import type { Annotation, BoxBounds, ImageData } from '@/types';
import { MAX_HISTORY } from './constants';
import { clampBox, getBounds, nowIso, setBounds } from './models';

/*
 * Reversible edits on an image's annotation list. Every command captures the
 * state needed to invert itself when it is built, before it first executes.
 */

export interface CreateBoxCommand {
  kind: 'create-box';
  image: ImageData;
  annotation: Annotation;
}

export interface DeleteBoxCommand {
  kind: 'delete-box';
  image: ImageData;
  annotation: Annotation;
  index: number;
}

interface IndexedAnnotation {
  index: number;
  annotation: Annotation;
}

export interface DeleteBoxesCommand {
  kind: 'delete-boxes';
  image: ImageData;
  /** Ascending by original index */
  removed: IndexedAnnotation[];
}

interface GeometryEdit {
  annotation: Annotation;
  before: BoxBounds;
  after: BoxBounds;
  previousModifiedAt: string;
  modifiedAt: string;
}

export interface MoveBoxCommand extends GeometryEdit {
  kind: 'move-box';
  dx: number;
  dy: number;
}

export interface ResizeBoxCommand extends GeometryEdit {
  kind: 'resize-box';
}

interface ClassAssignment {
  annotation: Annotation;
  class_id: number;
  class_name: string;
  modified_at: string;
}

export interface ChangeClassCommand {
  kind: 'change-class';
  class_id: number;
  class_name: string;
  modifiedAt: string;
  previous: ClassAssignment[];
}

export type Command =
  | CreateBoxCommand
  | DeleteBoxCommand
  | DeleteBoxesCommand
  | MoveBoxCommand
  | ResizeBoxCommand
  | ChangeClassCommand;

export type CommandKind = Command['kind'];

// Factories

export function createBoxCommand(image: ImageData, annotation: Annotation): CreateBoxCommand {
  return { kind: 'create-box', image, annotation };
}

export function deleteBoxCommand(image: ImageData, annotation: Annotation): DeleteBoxCommand {
  return { kind: 'delete-box', image, annotation, index: image.annotations.indexOf(annotation) };
}

export function deleteBoxesCommand(
  image: ImageData,
  annotations: readonly Annotation[]
): DeleteBoxesCommand {
  const removed = annotations
    .map((annotation) => ({ index: image.annotations.indexOf(annotation), annotation }))
    .filter((entry) => entry.index >= 0)
    .sort((a, b) => a.index - b.index);
  return { kind: 'delete-boxes', image, removed };
}

/**
 * Shift a box by (dx, dy). The clamped target is computed now, so undo
 * restores the exact original bounds even when the move hit an edge.
 */
export function moveBoxCommand(
  annotation: Annotation,
  dx: number,
  dy: number,
  width: number,
  height: number
): MoveBoxCommand {
  const before = getBounds(annotation);
  const after = clampBox(
    {
      x_min: before.x_min + dx,
      y_min: before.y_min + dy,
      x_max: before.x_max + dx,
      y_max: before.y_max + dy,
    },
    width,
    height
  );
  return {
    kind: 'move-box',
    annotation,
    dx,
    dy,
    before,
    after,
    previousModifiedAt: annotation.modified_at,
    modifiedAt: nowIso(),
  };
}

export function resizeBoxCommand(
  annotation: Annotation,
  bounds: BoxBounds,
  width: number,
  height: number
): ResizeBoxCommand {
  return {
    kind: 'resize-box',
    annotation,
    before: getBounds(annotation),
    after: clampBox(bounds, width, height),
    previousModifiedAt: annotation.modified_at,
    modifiedAt: nowIso(),
  };
}

export function changeClassCommand(
  annotations: readonly Annotation[],
  classId: number,
  className: string
): ChangeClassCommand {
  return {
    kind: 'change-class',
    class_id: classId,
    class_name: className,
    modifiedAt: nowIso(),
    previous: annotations.map((annotation) => ({
      annotation,
      class_id: annotation.class_id,
      class_name: annotation.class_name,
      modified_at: annotation.modified_at,
    })),
  };
}

// Execution

function insertAt(list: Annotation[], index: number, annotation: Annotation): void {
  if (list.includes(annotation)) return;
  list.splice(Math.min(Math.max(index, 0), list.length), 0, annotation);
}

function remove(list: Annotation[], annotation: Annotation): void {
  const index = list.indexOf(annotation);
  if (index >= 0) list.splice(index, 1);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

export function executeCommand(command: Command): void {
  switch (command.kind) {
    case 'create-box':
      if (!command.image.annotations.includes(command.annotation)) {
        command.image.annotations.push(command.annotation);
      }
      return;
    case 'delete-box':
      remove(command.image.annotations, command.annotation);
      return;
    case 'delete-boxes':
      // Descending, so earlier recorded indices stay valid while the list shrinks
      for (let i = command.removed.length - 1; i >= 0; i--) {
        const entry = command.removed[i];
        if (entry) remove(command.image.annotations, entry.annotation);
      }
      return;
    case 'move-box':
    case 'resize-box':
      setBounds(command.annotation, command.after);
      command.annotation.modified_at = command.modifiedAt;
      return;
    case 'change-class':
      for (const { annotation } of command.previous) {
        annotation.class_id = command.class_id;
        annotation.class_name = command.class_name;
        annotation.modified_at = command.modifiedAt;
      }
      return;
    default:
      assertNever(command);
  }
}

export function undoCommand(command: Command): void {
  switch (command.kind) {
    case 'create-box':
      remove(command.image.annotations, command.annotation);
      return;
    case 'delete-box':
      if (command.index >= 0) insertAt(command.image.annotations, command.index, command.annotation);
      return;
    case 'delete-boxes':
      for (const entry of command.removed) {
        insertAt(command.image.annotations, entry.index, entry.annotation);
      }
      return;
    case 'move-box':
    case 'resize-box':
      setBounds(command.annotation, command.before);
      command.annotation.modified_at = command.previousModifiedAt;
      return;
    case 'change-class':
      for (const entry of command.previous) {
        entry.annotation.class_id = entry.class_id;
        entry.annotation.class_name = entry.class_name;
        entry.annotation.modified_at = entry.modified_at;
      }
      return;
    default:
      assertNever(command);
  }
}

/** Annotations whose geometry a command changes */
export function geometryTargets(command: Command): Annotation[] {
  switch (command.kind) {
    case 'create-box':
    case 'move-box':
    case 'resize-box':
      return [command.annotation];
    default:
      return [];
  }
}

/** Every annotation a command holds on to */
export function commandAnnotations(command: Command): Annotation[] {
  switch (command.kind) {
    case 'create-box':
    case 'delete-box':
    case 'move-box':
    case 'resize-box':
      return [command.annotation];
    case 'delete-boxes':
      return command.removed.map((entry) => entry.annotation);
    case 'change-class':
      return command.previous.map((entry) => entry.annotation);
    default:
      return assertNever(command);
  }
}

/** Class ids that undoing or redoing a command can write into an annotation */
export function commandClassIds(command: Command): number[] {
  const ids = commandAnnotations(command).map((annotation) => annotation.class_id);
  if (command.kind === 'change-class') {
    ids.push(command.class_id, ...command.previous.map((entry) => entry.class_id));
  }
  return ids;
}

/**
 * Linear undo/redo log with a single cursor. `cursor` is the index of the
 * last executed command, -1 when there is nothing to undo.
 */
export class CommandHistory {
  private history: Command[] = [];
  private index = -1;

  constructor(readonly maxHistory: number = MAX_HISTORY) {}

  get size(): number {
    return this.history.length;
  }

  get cursor(): number {
    return this.index;
  }

  get canUndo(): boolean {
    return this.index >= 0;
  }

  get canRedo(): boolean {
    return this.index < this.history.length - 1;
  }

  execute(command: Command): void {
    executeCommand(command);
    this.history = this.history.slice(0, this.index + 1);
    this.history.push(command);
    this.index += 1;
    if (this.history.length > this.maxHistory) {
      this.history.shift();
      this.index -= 1;
    }
  }

  /** Undo the command at the cursor; returns the command, or null at the start */
  undo(): Command | null {
    const command = this.history[this.index];
    if (!command) return null;
    undoCommand(command);
    this.index -= 1;
    return command;
  }

  /** Re-execute the next undone command; returns it, or null at the end */
  redo(): Command | null {
    const command = this.history[this.index + 1];
    if (!command) return null;
    executeCommand(command);
    this.index += 1;
    return command;
  }

  clear(): void {
    this.history = [];
    this.index = -1;
  }

  /** True when any undoable or redoable command can bring `classId` back */
  referencesClass(classId: number): boolean {
    return this.history.some((command) => commandClassIds(command).includes(classId));
  }

  /**
   * Rewrite the class ids stored in the log after the class list was
   * reindexed. Annotations in `live` were already remapped with the project
   * and are left alone.
   */
  remapClassIds(remap: (classId: number) => number, live: ReadonlySet<Annotation>): void {
    const seen = new Set<Annotation>(live);
    for (const command of this.history) {
      for (const annotation of commandAnnotations(command)) {
        if (seen.has(annotation)) continue;
        seen.add(annotation);
        annotation.class_id = remap(annotation.class_id);
      }
      if (command.kind === 'change-class') {
        command.class_id = remap(command.class_id);
        for (const entry of command.previous) {
          entry.class_id = remap(entry.class_id);
        }
      }
    }
  }
}
