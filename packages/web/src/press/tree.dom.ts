import type { PressTree } from "@pressdetect/core";

export const PRESSED_ATTR = "data-pressed";
export const PREPRESSED_ATTR = "data-prepressed";

function isVisible(el: Element): boolean {
  if (el.hasAttribute("hidden")) return false;

  const view = el.ownerDocument.defaultView;
  if (!view) return true;

  const style = view.getComputedStyle(el);
  return style.display !== "none" && style.visibility !== "hidden";
}

/** Element tree as the detector sees it. Press flags live in data attributes. */
export const domPressTree: PressTree<Element> = {
  children: (el) => Array.from(el.children),
  isVisible,
  isPrePressed: (el) => el.hasAttribute(PREPRESSED_ATTR),
  isPressed: (el) => el.hasAttribute(PRESSED_ATTR),
};

export function setPressFlags(el: Element, flags: { prePressed: boolean; pressed: boolean }) {
  el.toggleAttribute(PREPRESSED_ATTR, flags.prePressed);
  el.toggleAttribute(PRESSED_ATTR, flags.pressed);
}

export function clearPressFlags(el: Element) {
  setPressFlags(el, { prePressed: false, pressed: false });
}
