// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/membership/set-index`
 * Purpose: Keyed set table used for every reverse lookup of the membership index.
 * Scope: Set insert/remove with empty-key cleanup. Does not decide when a removal is allowed (the caller does).
 * Invariants: A key is present iff its set is non-empty; enumeration returns copies in insertion order.
 * Side-effects: none
 * @internal
 */

export class SetIndex<V> {
  private readonly table = new Map<string, Set<V>>();

  /** @returns true when the value was not present before */
  add(key: string, value: V): boolean {
    let set = this.table.get(key);
    if (!set) {
      set = new Set<V>();
      this.table.set(key, set);
    }
    if (set.has(value)) return false;
    set.add(value);
    return true;
  }

  /** @returns true when the set for `key` became empty (and the key was dropped) */
  remove(key: string, value: V): boolean {
    const set = this.table.get(key);
    if (!set) return false;
    set.delete(value);
    if (set.size > 0) return false;
    this.table.delete(key);
    return true;
  }

  has(key: string, value: V): boolean {
    return this.table.get(key)?.has(value) ?? false;
  }

  values(key: string): V[] {
    const set = this.table.get(key);
    return set ? [...set] : [];
  }

  count(key: string): number {
    return this.table.get(key)?.size ?? 0;
  }

  /** Number of keys with a non-empty set */
  get keyCount(): number {
    return this.table.size;
  }
}
