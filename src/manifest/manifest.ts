import { reportDuplicateSlot } from '../report';

/**
 * Ordered list of storage slot identifiers accumulated by one builder
 * session.
 *
 * Invariants:
 * - Order is declaration order.
 * - An identifier appears at most once; a second `append` throws.
 */
export class StorageLayoutManifest implements Iterable<string> {
  private readonly slots: string[] = [];
  private readonly seen = new Set<string>();

  /**
   * Number of slots recorded so far.
   */
  get size(): number {
    return this.slots.length;
  }

  /**
   * Checks whether a slot has been recorded.
   */
  has(slot: string): boolean {
    return this.seen.has(slot);
  }

  /**
   * Records a slot at the end of the manifest.
   *
   * @param slot - Slot identifier (e.g. `"_speed"`).
   * @throws {ConfigurationError} If `slot` is already recorded.
   */
  append(slot: string): void {
    if (this.seen.has(slot)) {
      reportDuplicateSlot(slot);
    }
    this.seen.add(slot);
    this.slots.push(slot);
  }

  /**
   * Returns a frozen snapshot of the recorded slots.
   */
  toArray(): readonly string[] {
    return Object.freeze([...this.slots]);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.slots[Symbol.iterator]();
  }
}
