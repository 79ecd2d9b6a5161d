/**
 * Browser entry for the preview grid
 * Loads <video data-video-src> previews as they approach the viewport,
 * a few at a time
 */

import { DEFAULT_MAX_ACTIVE_LOADS, LazyLoadScheduler } from './LazyLoadScheduler';
import { PreviewElement } from './PreviewElement';

export { LazyLoadScheduler, DEFAULT_MAX_ACTIVE_LOADS } from './LazyLoadScheduler';
export type { SchedulableLoad } from './LazyLoadScheduler';
export { PreviewElement, sourceUrlFor, READY_CLASS, HIDDEN_CLASS, PLACEHOLDER_SELECTOR } from './PreviewElement';
export { IllegalTransitionError, canTransition, transition } from './loadingState';
export type { LoadingState } from './loadingState';

export interface PreviewGridOptions {
  maxActiveLoads?: number;
  rootMargin?: string;
  threshold?: number;
}

export interface PreviewGrid {
  readonly scheduler: LazyLoadScheduler<PreviewElement>;
  readonly previews: readonly PreviewElement[];
  /** Stops watching elements that have not come into view yet */
  disconnect(): void;
}

export function initPreviewGrid(root: ParentNode, options: PreviewGridOptions = {}): PreviewGrid {
  const scheduler = new LazyLoadScheduler<PreviewElement>(options.maxActiveLoads ?? DEFAULT_MAX_ACTIVE_LOADS);
  const byElement = new Map<Element, PreviewElement>();

  for (const element of Array.from(root.querySelectorAll('[data-video-src]'))) {
    if (element instanceof HTMLVideoElement && element.dataset.videoSrc) {
      byElement.set(element, new PreviewElement(element));
    }
  }
  const previews = Array.from(byElement.values());

  if (typeof IntersectionObserver === 'undefined') {
    for (const preview of previews) {
      scheduler.register(preview);
    }
    return { scheduler, previews, disconnect: () => undefined };
  }

  const observer = new IntersectionObserver(
    (entries, watcher) => {
      for (const entry of entries) {
        if (!entry.isIntersecting) {
          continue;
        }
        // Fires once per element; a failed load is not retried on scroll
        watcher.unobserve(entry.target);
        const preview = byElement.get(entry.target);
        if (preview) {
          scheduler.register(preview);
        }
      }
    },
    { rootMargin: options.rootMargin ?? '150px', threshold: options.threshold ?? 0.15 }
  );

  for (const preview of previews) {
    observer.observe(preview.video);
  }

  return { scheduler, previews, disconnect: () => observer.disconnect() };
}
