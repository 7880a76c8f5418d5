
import { assert } from "../core/assert";

const excluded = new WeakSet<object>();

/**
 * Excludes a node globally, for as long as the node lives.
 * Once the search meets an excluded node that is pressed or pre-pressed,
 * the whole search ends without a result.
 */
export function exclude(node: object) {
  assert(typeof node === "object" && node !== null, "exclude(node) requires an object");
  excluded.add(node);
}

export function isExcluded(node: object): boolean {
  return excluded.has(node);
}
