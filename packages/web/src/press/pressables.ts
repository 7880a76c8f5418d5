import { createDeferredTask, resolvePressConfig, type PressConfig } from "@pressdetect/core";
import { PREPRESSED_ATTR, clearPressFlags, setPressFlags } from "./tree.dom";

const PRESSABLE_SELECTOR = "[data-pressable]";
const SCROLL_CONTAINER_SELECTOR = "[data-press-scroll]";
const DEFAULT_TOUCH_SLOP_PX = 8;

export type PressableOptions = {
  config?: Partial<PressConfig>;
  /** how far (px) the pointer may leave the element before the press is dropped */
  touchSlop?: number;
};

export type PressablesHandle = {
  /** Drop the current press and any pending release without unbinding. */
  reset: () => void;
  dispose: () => void;
};

function pressableAt(root: HTMLElement, target: EventTarget | null): Element | null {
  if (!(target instanceof Element)) return null;

  const el = target.closest(PRESSABLE_SELECTOR);
  if (!el || !root.contains(el)) return null;
  if (el.matches(":disabled, [aria-disabled='true']")) return null;
  return el;
}

function inScrollContainer(root: HTMLElement, el: Element) {
  const container = el.parentElement?.closest(SCROLL_CONTAINER_SELECTOR);
  return container != null && root.contains(container);
}

function pointInside(el: Element, x: number, y: number, slop: number) {
  const r = el.getBoundingClientRect();
  return x >= r.left - slop && x < r.right + slop && y >= r.top - slop && y < r.bottom + slop;
}

/**
 * Maintains the press flags of `[data-pressable]` elements under `root`,
 * the way a touch platform does for its views:
 * - inside a `[data-press-scroll]` container a press starts as pre-pressed
 *   and becomes pressed after the tap timeout (the user might be scrolling)
 * - elsewhere it is pressed right away
 * - a quick tap stays pressed for the pressed-state duration after release
 * - leaving the element (plus slop) or a cancel drops the press
 *
 * Listeners run in the capture phase so flags are current before any
 * bubble-phase listener looks at them.
 */
export function bindPressables(root: HTMLElement, opts: PressableOptions = {}): PressablesHandle {
  const cfg = resolvePressConfig(opts.config);
  const slop = opts.touchSlop ?? DEFAULT_TOUCH_SLOP_PX;
  const doc = root.ownerDocument;

  let active: Element | null = null;
  let released: Element | null = null;

  const confirmTap = createDeferredTask("bindPressables.confirmTap", () => {
    if (active) setPressFlags(active, { prePressed: false, pressed: true });
  });

  const unsetPressed = createDeferredTask("bindPressables.unsetPressed", () => {
    if (released) clearPressFlags(released);
    released = null;
  });

  function flushReleased() {
    unsetPressed.cancel();
    if (released) clearPressFlags(released);
    released = null;
  }

  function drop() {
    confirmTap.cancel();
    if (active) clearPressFlags(active);
    active = null;
  }

  function onDown(e: PointerEvent) {
    if (e.isPrimary === false) return;

    flushReleased();
    drop();

    const el = pressableAt(root, e.target);
    if (!el) return;

    active = el;
    if (inScrollContainer(root, el)) {
      setPressFlags(el, { prePressed: true, pressed: false });
      confirmTap.schedule(cfg.tapTimeout);
    } else {
      setPressFlags(el, { prePressed: false, pressed: true });
    }
  }

  function onMove(e: PointerEvent) {
    if (!active || e.isPrimary === false) return;
    if (!pointInside(active, e.clientX, e.clientY, slop)) drop();
  }

  function onUp(e: PointerEvent) {
    if (!active || e.isPrimary === false) return;

    const el = active;
    active = null;
    confirmTap.cancel();

    if (el.hasAttribute(PREPRESSED_ATTR)) {
      // quick tap: show the press briefly even though it was never confirmed
      setPressFlags(el, { prePressed: false, pressed: true });
      released = el;
      unsetPressed.schedule(cfg.pressedStateDuration);
    } else {
      clearPressFlags(el);
    }
  }

  function onCancel() {
    drop();
  }

  root.addEventListener("pointerdown", onDown, true);
  doc.addEventListener("pointermove", onMove, true);
  doc.addEventListener("pointerup", onUp, true);
  doc.addEventListener("pointercancel", onCancel, true);

  function reset() {
    drop();
    flushReleased();
  }

  return {
    reset,
    dispose: () => {
      root.removeEventListener("pointerdown", onDown, true);
      doc.removeEventListener("pointermove", onMove, true);
      doc.removeEventListener("pointerup", onUp, true);
      doc.removeEventListener("pointercancel", onCancel, true);
      reset();
    },
  };
}
