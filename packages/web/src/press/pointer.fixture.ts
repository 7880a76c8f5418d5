type PointerType = "pointerdown" | "pointermove" | "pointerup" | "pointercancel";

/** Not every jsdom release has PointerEvent; a MouseEvent carries every field the bridge reads. */
export function pointer(target: EventTarget, type: PointerType, x = 0, y = 0) {
  target.dispatchEvent(new MouseEvent(type, { bubbles: true, cancelable: true, clientX: x, clientY: y }));
}

export function byId(id: string): HTMLElement {
  const el = document.getElementById(id);
  if (!el) throw new Error(`missing #${id}`);
  return el;
}

export const FIXTURE_HTML = `
  <div id="root">
    <div id="list" data-press-scroll>
      <button id="row" data-pressable><span id="rowLabel">Row</span></button>
    </div>
    <button id="plain" data-pressable><span id="label">Go</span></button>
    <button id="disabled" data-pressable disabled>No</button>
    <div id="ariaDisabled" data-pressable aria-disabled="true">No</div>
    <p id="text">Not pressable</p>
  </div>
  <div id="outside"></div>`;

export function rectAt(left: number, top: number, width: number, height: number): DOMRect {
  return {
    x: left,
    y: top,
    left,
    top,
    width,
    height,
    right: left + width,
    bottom: top + height,
    toJSON: () => ({}),
  };
}
