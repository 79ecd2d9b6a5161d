import { type LoadingState, canTransition, transition } from './loadingState';
import type { SchedulableLoad } from './LazyLoadScheduler';

export const READY_CLASS = 'is-ready';
export const HIDDEN_CLASS = 'is-hidden';
export const PLACEHOLDER_SELECTOR = '.video-thumb-placeholder';

// Leaving a preview only rewinds once playback has visibly moved
const REWIND_THRESHOLD_SECONDS = 0.1;

/**
 * Builds the <source> URL from data-video-src and data-preview-time
 */
export function sourceUrlFor(video: HTMLVideoElement): string | null {
  const src = video.dataset.videoSrc;
  if (!src) {
    return null;
  }
  const previewTime = Number(video.dataset.previewTime);
  if (video.dataset.previewTime && Number.isFinite(previewTime) && previewTime >= 0) {
    return `${src}#t=${previewTime}`;
  }
  return src;
}

/**
 * One <video> preview in the grid
 *
 * The element carries the DOM contract:
 * - data-video-src: URL of the stream (required)
 * - data-video-type: MIME hint for the <source>
 * - data-preview-time: seconds to show as the poster frame
 *
 * State is mirrored into data-loading-state / data-loaded for CSS.
 */
export class PreviewElement implements SchedulableLoad {
  private _state: LoadingState = 'idle';
  private _loaded = false;
  private _isReady = false;
  private source: HTMLSourceElement | null = null;
  private onSettled: (() => void) | null = null;

  constructor(readonly video: HTMLVideoElement) {
    this.syncDataset();
    this.attachMediaEvents();
    this.attachPlaybackEvents();
  }

  get state(): LoadingState {
    return this._state;
  }

  get loaded(): boolean {
    return this._loaded;
  }

  /** The first frame has been decoded */
  get isReady(): boolean {
    return this._isReady;
  }

  enqueue(): void {
    this.setState('pending');
  }

  begin(onSettled: () => void): void {
    const src = sourceUrlFor(this.video);
    this.setState('active');
    this.onSettled = onSettled;

    if (!src) {
      this.finish(false);
      return;
    }

    this.source?.remove();
    const source = this.video.ownerDocument.createElement('source');
    source.src = src;
    const type = this.video.dataset.videoType;
    if (type) {
      source.type = type;
    }
    // A failing <source> reports on itself, not on the <video>
    source.addEventListener('error', () => this.finish(false));
    this.source = source;

    this.video.appendChild(source);
    this.video.load();
  }

  // ========== Media events ==========

  private attachMediaEvents(): void {
    this.video.addEventListener('loadedmetadata', () => this.finish(true));
    this.video.addEventListener('loadeddata', () => {
      this.markReady();
      this.finish(true);
    });

    const fail = (): void => this.finish(false);
    this.video.addEventListener('error', fail);
    this.video.addEventListener('stalled', fail);
    this.video.addEventListener('abort', fail);
  }

  /**
   * Ends the active load; late or repeated events are ignored
   */
  private finish(success: boolean): void {
    const next: LoadingState = success ? 'done' : 'idle';
    if (!canTransition(this._state, next)) {
      return;
    }
    if (success) {
      this._loaded = true;
    }
    this.setState(next);

    const settled = this.onSettled;
    this.onSettled = null;
    settled?.();
  }

  private markReady(): void {
    this._isReady = true;
    this.video.pause();
    this.video.classList.add(READY_CLASS);
    this.video.parentElement?.querySelector(PLACEHOLDER_SELECTOR)?.classList.add(HIDDEN_CLASS);
  }

  // ========== Hover / focus playback ==========

  private attachPlaybackEvents(): void {
    const start = (): void => this.play();
    const stop = (): void => this.stop();
    this.video.addEventListener('mouseenter', start);
    this.video.addEventListener('focus', start);
    this.video.addEventListener('mouseleave', stop);
    this.video.addEventListener('blur', stop);
  }

  private play(): void {
    if (!this._isReady) {
      return;
    }
    // Autoplay policy may refuse; the preview just stays on its poster frame
    this.video.play().catch(() => undefined);
  }

  private stop(): void {
    if (!this._isReady) {
      return;
    }
    this.video.pause();
    if (this.video.currentTime > REWIND_THRESHOLD_SECONDS) {
      this.video.currentTime = 0;
    }
  }

  // ========== Helpers ==========

  private setState(next: LoadingState): void {
    this._state = transition(this._state, next);
    this.syncDataset();
  }

  private syncDataset(): void {
    this.video.dataset.loadingState = this._state;
    this.video.dataset.loaded = String(this._loaded);
  }
}
