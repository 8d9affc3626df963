import type { ClassNamespace, StorageLayoutDeclaration } from '../types';
import { kSlots } from '../constants';
import { isMutableLayout, isStorageLayoutDeclaration } from '../guards';
import { reportDuplicateSlot, reportInvalidLayout } from '../report';

/**
 * Reads the storage layout declaration of a namespace.
 *
 * @param namespace - The class namespace under construction.
 * @returns The declaration, or `undefined` when none exists.
 * @throws {ConfigurationError} If the declaration is not an array of strings.
 */
export function readStorageLayout(
  namespace: ClassNamespace
): StorageLayoutDeclaration | undefined {
  const declared: unknown = namespace[kSlots];
  if (declared === undefined) return undefined;

  if (!isStorageLayoutDeclaration(declared)) {
    return reportInvalidLayout('expected an array of slot names');
  }
  return declared;
}

/**
 * Merges a builder's slots into the namespace's storage layout declaration.
 *
 * Cases:
 * 1. No declaration: the namespace receives a fresh mutable copy of `slots`.
 * 2. Mutable array: `slots` are pushed onto it in place.
 * 3. Frozen array: it is replaced by a frozen concatenation.
 *
 * In every case each slot is appended exactly once, after the slots already
 * declared, so the resulting order is declaration order.
 *
 * @param namespace - The class namespace under construction.
 * @param slots - Slots recorded by one builder session, in order.
 * @returns The namespace's layout declaration after the merge.
 * @throws {ConfigurationError} If a slot is already declared in the namespace.
 */
export function mergeStorageLayout(
  namespace: ClassNamespace,
  slots: readonly string[]
): StorageLayoutDeclaration {
  const existing = readStorageLayout(namespace);

  if (existing === undefined) {
    const created = [...slots];
    namespace[kSlots] = created;
    return created;
  }

  const declared = new Set(existing);
  for (const slot of slots) {
    if (declared.has(slot)) reportDuplicateSlot(slot);
  }

  if (isMutableLayout(existing)) {
    existing.push(...slots);
    return existing;
  }

  const merged = Object.freeze([...existing, ...slots]);
  namespace[kSlots] = merged;
  return merged;
}

/**
 * Validates a namespace's final layout and returns the frozen list used by
 * every instance of the class.
 *
 * @param namespace - The evaluated class namespace.
 * @returns The finalized layout (empty when nothing was declared).
 * @throws {ConfigurationError} If the declaration is malformed or repeats a slot.
 */
export function finalizeStorageLayout(
  namespace: ClassNamespace
): readonly string[] {
  const declared = readStorageLayout(namespace) ?? [];
  const seen = new Set<string>();

  for (const slot of declared) {
    if (slot.length === 0) reportInvalidLayout('slot names must not be empty');
    if (seen.has(slot)) reportDuplicateSlot(slot);
    seen.add(slot);
  }

  return Object.freeze([...declared]);
}
