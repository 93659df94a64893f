/**
 * Serialises async critical sections. Callers queue in arrival order; a
 * rejected section does not block the ones waiting behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
