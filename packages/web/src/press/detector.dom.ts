import { PressDetector, type PressCallback, type PressConfig } from "@pressdetect/core";
import { classifyPointerEvent } from "./classify";
import { bindPressables } from "./pressables";
import { domPressTree } from "./tree.dom";

export type AttachOptions = {
  config?: Partial<PressConfig>;
  /**
   * Maintain press flags for `[data-pressable]` elements (default true).
   * Turn off when something else already writes `data-pressed` / `data-prepressed`.
   */
  emulatePress?: boolean;
  touchSlop?: number;
  callbacks?: PressCallback<Element>[];
};

export type PressDetectorHandle = {
  detector: PressDetector<Element>;
  dispose: () => void;
};

/**
 * Watches pointer sequences that start inside `root` and reports which
 * descendant holds the pressed state.
 *
 * Down is taken from `root`; move/up/cancel from the document so a gesture
 * that leaves `root` still ends. With `emulatePress` on, these listeners run
 * in the capture phase right after the pressables' own, so a descendant that
 * stops propagation cannot hide an event from the detector. With it off they
 * run in the bubble phase, after whatever writes the flags has seen the event.
 */
export function attachPressDetector(root: HTMLElement, opts: AttachOptions = {}): PressDetectorHandle {
  const doc = root.ownerDocument;
  const detector = new PressDetector<Element>(domPressTree, root, { config: opts.config });
  for (const cb of opts.callbacks ?? []) detector.addCallback(cb);

  const pressables =
    opts.emulatePress === false ? null : bindPressables(root, { config: opts.config, touchSlop: opts.touchSlop });
  // same target and phase: listeners fire in registration order, pressables first
  const capture = pressables != null;

  let tracking = false;

  function onPointer(e: PointerEvent) {
    if (e.isPrimary === false) return;

    const action = classifyPointerEvent(e.type);
    if (action == null) return;

    if (action === "down") {
      tracking = true;
    } else if (!tracking) {
      return;
    } else if (action === "up" || action === "cancel") {
      tracking = false;
    }

    detector.handle(action);
  }

  function onVisibilityChange() {
    if (doc.visibilityState !== "hidden") return;
    tracking = false;
    pressables?.reset();
    detector.onTemporaryDetach();
  }

  // removal from the document counts as detach
  let connected = root.isConnected;
  const observer = new MutationObserver(() => {
    if (connected && !root.isConnected) {
      tracking = false;
      pressables?.reset();
      detector.onDetach();
    }
    connected = root.isConnected;
  });
  observer.observe(doc, { childList: true, subtree: true });

  root.addEventListener("pointerdown", onPointer, capture);
  doc.addEventListener("pointermove", onPointer, capture);
  doc.addEventListener("pointerup", onPointer, capture);
  doc.addEventListener("pointercancel", onPointer, capture);
  doc.addEventListener("visibilitychange", onVisibilityChange);

  function dispose() {
    observer.disconnect();
    root.removeEventListener("pointerdown", onPointer, capture);
    doc.removeEventListener("pointermove", onPointer, capture);
    doc.removeEventListener("pointerup", onPointer, capture);
    doc.removeEventListener("pointercancel", onPointer, capture);
    doc.removeEventListener("visibilitychange", onVisibilityChange);
    tracking = false;
    detector.onDetach();
    pressables?.dispose();
  }

  return { detector, dispose };
}
