
import { assertPressFlag } from "../core/assert";
import { isExcluded } from "./exclusion";
import type { PressFlags, PressMatch, PressTree } from "./types";

type Step<N> =
  | { kind: "found"; match: PressMatch<N> }
  | { kind: "none" }
  // an excluded node was pressed: stop everything, ancestors included
  | { kind: "abort" };

const NONE = { kind: "none" } as const;
const ABORT = { kind: "abort" } as const;

export function readPressFlags<N extends object>(tree: PressTree<N>, node: N): PressFlags {
  const prePressed = tree.isPrePressed(node);
  const pressed = tree.isPressed(node);

  // a tree that can't answer these is a broken integration, not a runtime condition
  assertPressFlag(prePressed, "PressTree.isPrePressed()");
  assertPressFlag(pressed, "PressTree.isPressed()");

  return { prePressed, pressed };
}

export function hasPressFlag(flags: PressFlags): boolean {
  return flags.prePressed || flags.pressed;
}

function walk<N extends object>(tree: PressTree<N>, parent: N): Step<N> {
  for (const child of tree.children(parent)) {
    if (!tree.isVisible(child)) continue;

    const flags = readPressFlags(tree, child);
    if (hasPressFlag(flags)) {
      if (isExcluded(child)) return ABORT;
      return { kind: "found", match: { node: child, flags } };
    }

    if (tree.children(child).length > 0) {
      const step = walk(tree, child);
      if (step.kind !== "none") return step;
    }
  }
  return NONE;
}

/**
 * First visible descendant of `root` (depth-first, pre-order) that is pressed
 * or pre-pressed, along with the flags read for it. The root is never a
 * candidate.
 */
export function searchPressed<N extends object>(tree: PressTree<N>, root: N): PressMatch<N> | null {
  const step = walk(tree, root);
  return step.kind === "found" ? step.match : null;
}

export function findPressed<N extends object>(tree: PressTree<N>, root: N): N | null {
  return searchPressed(tree, root)?.node ?? null;
}
