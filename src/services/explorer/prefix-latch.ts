/**
 * Latches the mount prefix observed on the first request.
 *
 * The prefix is chosen by the embedding application when it registers the
 * route, so it is only known once a request arrives; afterwards it never
 * changes. `bind()` is synchronous and runs before the handler awaits
 * anything, so on the event loop no two requests can both see an unbound
 * latch.
 */
export class PrefixLatch {
  private value: string | null = null;

  /** The latched prefix, or null before the first request. */
  get bound(): string | null {
    return this.value;
  }

  /**
   * Latch `prefix` if nothing is latched yet and hand it to `apply`.
   * Later calls ignore their argument and return the first prefix.
   */
  bind(prefix: string, apply: (prefix: string) => void): string {
    if (this.value === null) {
      this.value = prefix;
      apply(prefix);
    }
    return this.value;
  }
}
