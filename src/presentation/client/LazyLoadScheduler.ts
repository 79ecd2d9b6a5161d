import type { LoadingState } from './loadingState';

export const DEFAULT_MAX_ACTIVE_LOADS = 2;

/**
 * Something the scheduler can admit: a preview whose media load
 * starts in begin() and reports back exactly once through onSettled
 */
export interface SchedulableLoad {
  readonly state: LoadingState;
  /** idle -> pending */
  enqueue(): void;
  /** pending -> active; starts the network load */
  begin(onSettled: () => void): void;
}

/**
 * Admission control for media loads
 * At most `capacity` loads run at once; the rest wait in FIFO order
 */
export class LazyLoadScheduler<T extends SchedulableLoad = SchedulableLoad> {
  private readonly active = new Set<T>();
  private readonly queue: T[] = [];

  constructor(readonly capacity: number = DEFAULT_MAX_ACTIVE_LOADS) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`LazyLoadScheduler: capacity must be a positive integer, got ${capacity}`);
    }
  }

  get activeCount(): number {
    return this.active.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Registers an idle item for loading. Returns false when the item is
   * already pending, loading or loaded.
   */
  register(item: T): boolean {
    if (item.state !== 'idle') {
      return false;
    }
    item.enqueue();
    this.queue.push(item);
    this.pump();
    return true;
  }

  private pump(): void {
    while (this.active.size < this.capacity) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      this.active.add(next);
      next.begin(() => this.release(next));
    }
  }

  private release(item: T): void {
    if (!this.active.delete(item)) {
      return;
    }
    this.pump();
  }
}
