/**
 * Field deltas on a spec tree.
 *
 * - replace: set the value at the path, creating trees on the way
 * - merge: append to the list at the path; a scalar already there is
 *   promoted to a one-element list, a tree merged into a tree merges
 *   key by key, duplicates (structural equality) are skipped
 */

import { deepClone, deepEqual, getPath, isAttributeTree, isReservedKey, setPath, splitPath } from '@snowmatch/core';
import type { AttributeTree, AttributeValue, FieldDelta } from '@snowmatch/core';

function mergeValue(existing: AttributeValue | undefined, incoming: AttributeValue): AttributeValue {
  if (existing === undefined || existing === null) {
    return Array.isArray(incoming) ? deepClone(incoming) : [deepClone(incoming)];
  }

  if (isAttributeTree(existing) && isAttributeTree(incoming)) {
    const merged: AttributeTree = { ...existing };
    for (const [key, value] of Object.entries(incoming)) {
      if (isReservedKey(key)) {
        throw new Error(`Reserved field name "${key}" in merged value`);
      }
      merged[key] = Object.hasOwn(existing, key) ? mergeValue(existing[key], value) : deepClone(value);
    }
    return merged;
  }

  const list: AttributeValue[] = Array.isArray(existing) ? [...existing] : [existing];
  const additions = Array.isArray(incoming) ? incoming : [incoming];
  for (const item of additions) {
    if (!list.some((present) => deepEqual(present, item))) {
      list.push(deepClone(item));
    }
  }
  return list;
}

/**
 * Apply deltas in order, all or nothing: they run against a copy and
 * `spec` only changes once every delta has applied.
 * @returns the paths whose value actually changed, in first-change order
 */
export function applyDeltas(spec: AttributeTree, deltas: readonly FieldDelta[]): string[] {
  const draft = deepClone(spec);
  const changed: string[] = [];

  for (const delta of deltas) {
    const before = getPath(draft, delta.path);
    const after = delta.op === 'replace' ? deepClone(delta.value) : mergeValue(before, delta.value);

    if (before !== undefined && deepEqual(before, after)) continue;

    setPath(draft, delta.path, after);
    if (!changed.includes(delta.path)) {
      changed.push(delta.path);
    }
  }

  for (const path of changed) {
    const [root] = splitPath(path);
    const value = root === undefined ? undefined : draft[root];
    if (root !== undefined && value !== undefined) {
      spec[root] = value;
    }
  }

  return changed;
}
