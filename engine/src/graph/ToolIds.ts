/**
 * Tool id ordering and selection helpers
 *
 * Every ordering decision in the engine goes through compareToolIds so
 * that results are reproducible across runs.
 */

import type { ToolId } from '../types/graph-types.js';

const CANONICAL_INTEGER = /^(0|[1-9]\d*)$/;

/**
 * Ascending tool id order: canonical integers numerically ("9" < "10"),
 * integers before anything else, everything else by code unit order.
 */
export function compareToolIds(a: ToolId, b: ToolId): number {
  const aNumeric = CANONICAL_INTEGER.test(a);
  const bNumeric = CANONICAL_INTEGER.test(b);

  if (aNumeric && bNumeric) {
    if (a.length !== b.length) {
      return a.length - b.length;
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortToolIds(ids: Iterable<ToolId>): ToolId[] {
  return [...ids].sort(compareToolIds);
}

/**
 * Order a selection of tool ids by their position in an execution
 * sequence. Ids missing from the sequence go last in their input order;
 * repeated ids keep their first occurrence.
 *
 * @example
 * ```typescript
 * adjustOrder(['7', '2', '99'], ['2', '5', '7']); // ['2', '7', '99']
 * ```
 */
export function adjustOrder(toolIds: Iterable<ToolId>, sequence: readonly ToolId[]): ToolId[] {
  const position = new Map<ToolId, number>();
  sequence.forEach((id, index) => {
    if (!position.has(id)) {
      position.set(id, index);
    }
  });

  const unique = [...new Set(toolIds)];
  const known = unique.filter((id) => position.has(id));
  const unknown = unique.filter((id) => !position.has(id));

  known.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
  return [...known, ...unknown];
}

/**
 * Parse a user-typed list of tool ids such as `[644, '645', "646"]`.
 * Quotes and brackets are stripped, entries split on commas and trimmed,
 * empty entries dropped.
 */
export function parseToolIdList(text: string): ToolId[] {
  return text
    .replace(/["'[\]]/g, '')
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
