/**
 * Helpers for attribute trees: structural copy, equality and dotted-path access.
 */

import type { AttributeTree, AttributeValue } from '../types/index.js';

export function isAttributeTree(value: unknown): value is AttributeTree {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Structural copy; the result shares no mutable references with the input.
 */
export function deepClone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * JSON serialization with object keys sorted, so equal trees
 * produce equal strings regardless of insertion order.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isAttributeTree(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key]);
    }
    return out;
  }
  return value;
}

export function deepEqual(a: unknown, b: unknown): boolean {
  return stableStringify(a) === stableStringify(b);
}

const RESERVED_KEYS: ReadonlySet<string> = new Set(['__proto__', 'prototype', 'constructor']);

/** Keys that reach an object's prototype chain when written by name */
export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.has(key);
}

export function splitPath(path: string): string[] {
  return path
    .split('.')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

/**
 * Read a dotted path ("engine.displacement").
 * @returns undefined when any segment is missing or not a tree
 */
export function getPath(tree: AttributeTree, path: string): AttributeValue | undefined {
  let current: AttributeValue | undefined = tree;
  for (const segment of splitPath(path)) {
    if (!isAttributeTree(current) || !Object.hasOwn(current, segment)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Write a dotted path, creating intermediate trees. A non-tree value
 * sitting on the way is replaced by a tree.
 *
 * @throws Error on an empty path or a reserved segment (`__proto__`,
 *   `prototype`, `constructor`)
 */
export function setPath(tree: AttributeTree, path: string, value: AttributeValue): void {
  const segments = splitPath(path);
  const reserved = segments.find(isReservedKey);
  if (reserved !== undefined) {
    throw new Error(`Reserved field name "${reserved}" in path "${path}"`);
  }
  const last = segments.pop();
  if (last === undefined) {
    throw new Error(`Empty field path: "${path}"`);
  }

  let current = tree;
  for (const segment of segments) {
    const next = Object.hasOwn(current, segment) ? current[segment] : undefined;
    if (isAttributeTree(next)) {
      current = next;
    } else {
      const created: AttributeTree = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Every leaf path in a tree, sorted. Arrays count as leaves.
 */
export function leafPaths(tree: AttributeTree, prefix = ''): string[] {
  const paths: string[] = [];
  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isAttributeTree(value) && Object.keys(value).length > 0) {
      paths.push(...leafPaths(value, path));
    } else {
      paths.push(path);
    }
  }
  return paths.sort();
}
