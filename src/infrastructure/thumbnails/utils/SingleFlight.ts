/**
 * Collapses concurrent calls for the same key into one execution.
 *
 * The registry holds a key only while its work is running; callers that arrive
 * in that window share the promise, later callers start a new flight. Lookup and
 * insert happen in the same synchronous turn, so no other caller can slip in
 * between them.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, work: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const flight = Promise.resolve()
      .then(work)
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, flight);
    return flight;
  }
}
