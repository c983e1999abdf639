import { rm } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ProjectStore } from '@/lib/projectStore';
import { AnnotationSession } from '@/lib/session';
import { boxTuples, createWorkspace, makeAnnotation, makeSampleProject } from '@/test/fixtures';
import type { TempWorkspace } from '@/test/fixtures';

function createSession(): AnnotationSession {
  const store = new ProjectStore();
  store.project = makeSampleProject();
  store.projectPath = '/data/project.json';
  store.currentImageIndex = 0;
  return new AnnotationSession(store);
}

describe('AnnotationSession', () => {
  let session: AnnotationSession;

  beforeEach(() => {
    session = createSession();
  });

  describe('createBox', () => {
    it('should normalize, round and clamp the drawn box', () => {
      const created = session.createBox({ x_min: 380.4, y_min: 250, x_max: 350, y_max: 320 });

      expect(created).toMatchObject({
        class_id: 0,
        class_name: 'cat',
        x_min: 350,
        y_min: 250,
        x_max: 380,
        y_max: 300,
      });
      expect(session.currentImage?.annotations).toHaveLength(2);
      expect(session.canUndo).toBe(true);
    });

    it('should reject empty boxes and unknown classes', () => {
      expect(session.createBox({ x_min: 5, y_min: 5, x_max: 5, y_max: 40 })).toBeNull();
      expect(session.createBox({ x_min: 5, y_min: 5, x_max: 50, y_max: 40 }, 9)).toBeNull();
      expect(session.canUndo).toBe(false);
    });

    it('should notify box and change listeners', () => {
      const onBox = vi.fn();
      const onChange = vi.fn();
      session.onBoxChanged(onBox);
      session.subscribe(onChange);

      const created = session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 });

      expect(onBox).toHaveBeenCalledWith(created);
      expect(onChange).toHaveBeenCalledTimes(1);
    });

    it('should keep notifying when a listener throws', () => {
      const onChange = vi.fn();
      session.subscribe(() => {
        throw new Error('boom');
      });
      session.subscribe(onChange);

      session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 });
      expect(onChange).toHaveBeenCalledTimes(1);
    });

    it('should stop notifying after unsubscribe', () => {
      const onChange = vi.fn();
      const unsubscribe = session.subscribe(onChange);
      unsubscribe();

      session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 });
      expect(onChange).not.toHaveBeenCalled();
    });
  });

  describe('selection', () => {
    it('should only keep ids present on the current image', () => {
      session.select(['ann-1', 'nope']);
      expect([...session.selectedIds]).toEqual(['ann-1']);
    });

    it('should toggle ids and clear on image change', () => {
      session.toggleSelection('ann-1');
      expect(session.getSelectedAnnotations().map((a) => a.id)).toEqual(['ann-1']);
      session.toggleSelection('ann-1');
      expect(session.selectedIds.size).toBe(0);

      session.selectAll();
      expect(session.selectImage(1)).toBe(true);
      expect(session.selectedIds.size).toBe(0);
    });
  });

  describe('navigation', () => {
    it('should wrap around in both directions', () => {
      expect(session.nextImage()).toBe(true);
      expect(session.currentImageIndex).toBe(1);
      expect(session.nextImage()).toBe(true);
      expect(session.currentImageIndex).toBe(0);
      expect(session.prevImage()).toBe(true);
      expect(session.currentImageIndex).toBe(1);
    });

    it('should refuse indices outside the list', () => {
      expect(session.selectImage(5)).toBe(false);
      expect(session.currentImageIndex).toBe(0);
    });

    it('should summarize every image', () => {
      expect(session.listImages()).toEqual([
        { filename: 'a.png', width: 400, height: 300, annotationCount: 1, hasAnnotations: true },
        { filename: 'b.png', width: 200, height: 200, annotationCount: 0, hasAnnotations: false },
      ]);
    });
  });

  describe('deleteSelected', () => {
    it('should remove several boxes in one undoable step', () => {
      const second = session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 });
      const third = session.createBox({ x_min: 30, y_min: 30, x_max: 60, y_max: 60 });
      const order = session.currentImage?.annotations.map((a) => a.id);
      session.select(['ann-1', third?.id ?? '']);

      expect(session.deleteSelected()).toBe(true);
      expect(session.currentImage?.annotations.map((a) => a.id)).toEqual([second?.id]);
      expect(session.selectedIds.size).toBe(0);

      expect(session.undo()).toBe(true);
      expect(session.currentImage?.annotations.map((a) => a.id)).toEqual(order);
    });

    it('should do nothing without a selection', () => {
      expect(session.deleteSelected()).toBe(false);
    });

    it('should delete a single box by id', () => {
      session.select(['ann-1']);
      expect(session.deleteBox('ann-1')).toBe(true);
      expect(session.currentImage?.annotations).toEqual([]);
      expect(session.selectedIds.size).toBe(0);
      expect(session.deleteBox('ann-1')).toBe(false);
    });
  });

  describe('moveBox and resizeBox', () => {
    it('should clamp moves at the image edge and undo exactly', () => {
      const onBox = vi.fn();
      session.onBoxChanged(onBox);

      expect(session.moveBox('ann-1', -20, 5)).toBe(true);
      const box = session.currentImage?.annotations[0];
      expect(box).toMatchObject({ x_min: 0, y_min: 15, x_max: 90, y_max: 65 });
      expect(onBox).toHaveBeenCalledWith(box);

      expect(session.undo()).toBe(true);
      expect(box).toEqual(makeAnnotation());
      expect(onBox).toHaveBeenCalledTimes(2);
    });

    it('should ignore a zero move and unknown ids', () => {
      expect(session.moveBox('ann-1', 0, 0)).toBe(false);
      expect(session.moveBox('nope', 5, 5)).toBe(false);
      expect(session.resizeBox('nope', { x_min: 0, y_min: 0, x_max: 5, y_max: 5 })).toBe(false);
    });

    it('should clamp resized bounds and redo them', () => {
      expect(session.resizeBox('ann-1', { x_min: 0, y_min: 0, x_max: 500, y_max: 100 })).toBe(true);
      const box = session.currentImage?.annotations[0];
      expect(box).toMatchObject({ x_min: 0, y_min: 0, x_max: 400, y_max: 100 });

      session.undo();
      expect(box).toMatchObject({ x_min: 10, y_min: 10, x_max: 110, y_max: 60 });
      expect(session.canRedo).toBe(true);
      expect(session.redo()).toBe(true);
      expect(box).toMatchObject({ x_min: 0, y_min: 0, x_max: 400, y_max: 100 });
    });
  });

  describe('classes', () => {
    it('should add classes with palette colours', () => {
      expect(session.addClass('  dog ')).toBe(1);
      expect(session.classes[1]).toEqual({ id: 1, name: 'dog', color: '#22C55E' });
      expect(session.addClass('   ')).toBe(-1);
      expect(session.addClass('bird', '#123456')).toBe(2);
      expect(session.classColors().get(2)).toBe('#123456');
    });

    it('should assign the last box when nothing is selected', () => {
      session.addClass('dog');

      expect(session.assignClass(1)).toBe(true);
      expect(session.currentImage?.annotations[0]).toMatchObject({ class_id: 1, class_name: 'dog' });

      session.undo();
      expect(session.currentImage?.annotations[0]).toEqual(makeAnnotation());
    });

    it('should only assign listed ids when given', () => {
      session.addClass('dog');
      expect(session.assignClass(1, ['nope'])).toBe(false);
      expect(session.assignClass(7)).toBe(false);
    });

    it('should refuse to delete a class in use', () => {
      session.addClass('dog');
      expect(session.deleteClass(0)).toEqual({ ok: false, reason: 'in-use' });
      expect(session.deleteClass(1)).toEqual({ ok: true });
      expect(session.classes.map((c) => c.name)).toEqual(['cat']);
    });

    it('should count boxes that undo or redo can restore as using a class', () => {
      session.addClass('dog');
      const created = session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 }, 1);
      expect(session.deleteBox(created?.id ?? '')).toBe(true);

      expect(session.deleteClass(1)).toEqual({ ok: false, reason: 'in-use' });
      expect(session.classes.map((c) => c.name)).toEqual(['cat', 'dog']);

      session.undo();
      expect(session.currentImage?.annotations[1]).toMatchObject({ class_id: 1, class_name: 'dog' });
      session.undo();
      expect(session.deleteClass(1)).toEqual({ ok: false, reason: 'in-use' });
    });

    it('should shift class ids kept by the history when a class is deleted', () => {
      session.addClass('b');
      session.addClass('c');
      session.addClass('d');
      const boxC = session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 }, 2);
      const boxD = session.createBox({ x_min: 30, y_min: 30, x_max: 60, y_max: 60 }, 3);
      expect(session.assignClass(0, [boxC?.id ?? ''])).toBe(true);

      expect(session.deleteClass(1)).toEqual({ ok: true });
      expect(session.classes.map((c) => [c.id, c.name])).toEqual([
        [0, 'cat'],
        [1, 'c'],
        [2, 'd'],
      ]);
      expect(boxD?.class_id).toBe(2);

      session.undo();
      expect(boxC).toMatchObject({ class_id: 1, class_name: 'c' });
      expect(session.classes.find((c) => c.id === boxC?.class_id)?.name).toBe('c');
      session.redo();
      expect(boxC).toMatchObject({ class_id: 0, class_name: 'cat' });
    });

    it('should shift the class of an undone box before it is redone', () => {
      session.addClass('b');
      session.addClass('d');
      const boxD = session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 }, 2);
      session.undo();

      expect(session.deleteClass(1)).toEqual({ ok: true });
      session.redo();
      expect(session.currentImage?.annotations[1]).toBe(boxD);
      expect(boxD).toMatchObject({ class_id: 1, class_name: 'd' });
      expect(session.classes[1]?.name).toBe('d');
    });

    it('should rename a class', () => {
      expect(session.updateClass(0, { name: 'kitten' })).toBe(true);
      expect(session.classes[0]?.name).toBe('kitten');
      expect(session.updateClass(4, { name: 'x' })).toBe(false);
    });
  });

  it('should prune the selection when undo removes a box', () => {
    const created = session.createBox({ x_min: 0, y_min: 0, x_max: 20, y_max: 20 });
    session.select([created?.id ?? '']);

    session.undo();
    expect(session.selectedIds.size).toBe(0);
    expect(session.undo()).toBe(false);
  });
});

describe('AnnotationSession on disk', () => {
  let ws: TempWorkspace;
  let session: AnnotationSession;

  beforeEach(async () => {
    ws = await createWorkspace();
    await ws.writeImage('a.png', 400, 300);
    await ws.writeImage('b.png', 200, 200);
    const store = new ProjectStore();
    expect(await store.create(ws.imageDir)).toBe(true);
    session = new AnnotationSession(store);
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('should save and export', async () => {
    session.createBox({ x_min: 10, y_min: 10, x_max: 110, y_max: 60 });

    expect(await session.save()).toEqual({ saved: true, exported: true });
    expect(boxTuples(session.project!)).toEqual({
      'a.png': ['object:10,10,110,60'],
      'b.png': [],
    });
  });

  it('should keep history when images are only added', async () => {
    session.createBox({ x_min: 10, y_min: 10, x_max: 110, y_max: 60 });
    await ws.writeImage('c.png', 10, 10);

    expect(await session.reconcile()).toEqual({ added: 1, removed: 0 });
    expect(session.canUndo).toBe(true);
  });

  it('should clear history when images disappear', async () => {
    session.createBox({ x_min: 10, y_min: 10, x_max: 110, y_max: 60 });
    await rm(path.join(ws.imageDir, 'b.png'));

    expect(await session.reconcile()).toEqual({ added: 0, removed: 1 });
    expect(session.canUndo).toBe(false);
    expect(session.listImages().map((img) => img.filename)).toEqual(['a.png']);
  });
});
