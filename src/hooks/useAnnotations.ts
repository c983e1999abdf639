import { useState, useCallback, useEffect } from 'react';
import type { Annotation, BoxBounds, ClassDefinition } from '@/types';
import type { AnnotationSession } from '@/lib/session';
import type { SaveResult } from '@/lib/projectStore';

interface UseAnnotationsResult {
  annotations: Annotation[];
  selectedIds: string[];
  classes: ClassDefinition[];
  canUndo: boolean;
  canRedo: boolean;
  saving: boolean;
  error: string | null;
  createBox: (bounds: BoxBounds, classId?: number) => Annotation | null;
  deleteSelected: () => boolean;
  moveBox: (annotationId: string, dx: number, dy: number) => boolean;
  resizeBox: (annotationId: string, bounds: BoxBounds) => boolean;
  assignClass: (classId: number) => boolean;
  select: (ids: string[]) => void;
  undo: () => boolean;
  redo: () => boolean;
  save: () => Promise<SaveResult>;
}

interface Snapshot {
  annotations: Annotation[];
  selectedIds: string[];
  classes: ClassDefinition[];
  canUndo: boolean;
  canRedo: boolean;
}

function takeSnapshot(session: AnnotationSession): Snapshot {
  return {
    // Copies, so React sees new references after in-place edits
    annotations: (session.currentImage?.annotations ?? []).map((a) => ({ ...a })),
    selectedIds: [...session.selectedIds],
    classes: session.classes.map((c) => ({ ...c })),
    canUndo: session.canUndo,
    canRedo: session.canRedo,
  };
}

/**
 * Hook exposing the current image's annotations and the undoable edits of
 * an annotation session.
 */
export function useAnnotations(session: AnnotationSession): UseAnnotationsResult {
  const [snapshot, setSnapshot] = useState<Snapshot>(() => takeSnapshot(session));
  const [saving, setSaving] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    setSnapshot(takeSnapshot(session));
    return session.subscribe(() => setSnapshot(takeSnapshot(session)));
  }, [session]);

  const createBox = useCallback(
    (bounds: BoxBounds, classId?: number) => {
      const created = session.createBox(bounds, classId);
      if (created) {
        session.select([created.id]);
      }
      return created;
    },
    [session]
  );

  const deleteSelected = useCallback(() => session.deleteSelected(), [session]);

  const moveBox = useCallback(
    (annotationId: string, dx: number, dy: number) => session.moveBox(annotationId, dx, dy),
    [session]
  );

  const resizeBox = useCallback(
    (annotationId: string, bounds: BoxBounds) => session.resizeBox(annotationId, bounds),
    [session]
  );

  const assignClass = useCallback((classId: number) => session.assignClass(classId), [session]);

  const select = useCallback((ids: string[]) => session.select(ids), [session]);

  const undo = useCallback(() => session.undo(), [session]);

  const redo = useCallback(() => session.redo(), [session]);

  const save = useCallback(async () => {
    setSaving(true);
    setError(null);
    try {
      const result = await session.save();
      if (!result.saved || !result.exported) {
        setError(session.store.lastError?.message ?? 'Failed to save project');
      }
      return result;
    } finally {
      setSaving(false);
    }
  }, [session]);

  return {
    ...snapshot,
    saving,
    error,
    createBox,
    deleteSelected,
    moveBox,
    resizeBox,
    assignClass,
    select,
    undo,
    redo,
    save,
  };
}
