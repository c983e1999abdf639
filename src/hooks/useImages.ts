import { useState, useCallback, useEffect } from 'react';
import type { ImageSummary, ReconcileResult } from '@/types';
import type { AnnotationSession } from '@/lib/session';
import { errorMessage } from '@/lib/errors';

interface UseImagesResult {
  images: ImageSummary[];
  currentImage: ImageSummary | null;
  currentIndex: number;
  loading: boolean;
  error: string | null;
  selectImage: (index: number) => void;
  nextImage: () => void;
  prevImage: () => void;
  reconcile: () => Promise<ReconcileResult | null>;
}

/**
 * Hook for the image list and navigation of an annotation session.
 */
export function useImages(session: AnnotationSession): UseImagesResult {
  const [images, setImages] = useState<ImageSummary[]>(() => session.listImages());
  const [currentIndex, setCurrentIndex] = useState(session.currentImageIndex);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const sync = (): void => {
      setImages(session.listImages());
      setCurrentIndex(session.currentImageIndex);
    };
    sync();
    return session.subscribe(sync);
  }, [session]);

  const selectImage = useCallback(
    (index: number) => {
      if (session.selectImage(index)) {
        setError(null);
      } else {
        setError(`No image at index ${index}`);
      }
    },
    [session]
  );

  const nextImage = useCallback(() => {
    if (session.nextImage()) setError(null);
  }, [session]);

  const prevImage = useCallback(() => {
    if (session.prevImage()) setError(null);
  }, [session]);

  // Pick up files added to or removed from the image folder
  const reconcile = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      return await session.reconcile();
    } catch (err) {
      setError(errorMessage(err, 'Failed to refresh images'));
      return null;
    } finally {
      setLoading(false);
    }
  }, [session]);

  return {
    images,
    currentImage: images[currentIndex] ?? null,
    currentIndex,
    loading,
    error,
    selectImage,
    nextImage,
    prevImage,
    reconcile,
  };
}
