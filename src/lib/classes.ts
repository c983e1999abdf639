import type { Annotation, ClassDefinition, DeleteClassResult, Project } from '@/types';
import { DEFAULT_CLASS_COLOR } from './constants';

export function getClass(project: Project, classId: number): ClassDefinition | undefined {
  return project.classes.find((c) => c.id === classId);
}

export function findClassByName(project: Project, name: string): ClassDefinition | undefined {
  return project.classes.find((c) => c.name === name);
}

/**
 * Append a class and return its id (the next index in the list).
 */
export function addClass(project: Project, name: string, color: string = DEFAULT_CLASS_COLOR): number {
  const id = project.classes.length;
  project.classes.push({ id, name, color });
  return id;
}

/**
 * Return the id of the class with this exact name, creating it with the
 * default colour if the project has none.
 */
export function getOrCreateClass(project: Project, name: string): number {
  return findClassByName(project, name)?.id ?? addClass(project, name);
}

/**
 * Rename and/or recolour a class. Existing annotations keep their cached
 * `class_name`.
 */
export function updateClass(
  project: Project,
  classId: number,
  update: Partial<Pick<ClassDefinition, 'name' | 'color'>>
): boolean {
  const cls = getClass(project, classId);
  if (!cls) return false;
  if (update.name !== undefined && update.name.trim() !== '') cls.name = update.name;
  if (update.color !== undefined) cls.color = update.color;
  return true;
}

export function isClassInUse(project: Project, classId: number): boolean {
  return project.images.some((img) => img.annotations.some((a) => a.class_id === classId));
}

/**
 * Delete an unreferenced class. Remaining classes are reindexed so that
 * `classes[i].id === i`, and annotations pointing past the removed id are
 * shifted down with them.
 */
export function deleteClass(project: Project, classId: number): DeleteClassResult {
  if (!getClass(project, classId)) return { ok: false, reason: 'not-found' };
  if (isClassInUse(project, classId)) return { ok: false, reason: 'in-use' };
  if (project.classes.length <= 1) return { ok: false, reason: 'last-class' };

  project.classes = project.classes.filter((c) => c.id !== classId);
  project.classes.forEach((cls, index) => {
    cls.id = index;
  });
  for (const image of project.images) {
    for (const annotation of image.annotations) {
      if (annotation.class_id > classId) annotation.class_id -= 1;
    }
  }
  return { ok: true };
}

/** Build the class id to colour lookup once per redraw */
export function buildClassColorMap(classes: readonly ClassDefinition[]): Map<number, string> {
  return new Map(classes.map((c) => [c.id, c.color]));
}

export function resolveClassColor(colors: ReadonlyMap<number, string>, classId: number): string {
  return colors.get(classId) ?? DEFAULT_CLASS_COLOR;
}

/** Display name resolved through `class_id`; the cached name is only a fallback */
export function resolveClassName(project: Project, annotation: Annotation): string {
  return getClass(project, annotation.class_id)?.name ?? annotation.class_name;
}
