// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { exclude, type PressCallback } from "@pressdetect/core";
import { attachPressDetector, type AttachOptions, type PressDetectorHandle } from "./detector.dom";
import { FIXTURE_HTML, byId, pointer } from "./pointer.fixture";

function hideDocument() {
  Object.defineProperty(document, "visibilityState", { configurable: true, get: () => "hidden" });
  try {
    document.dispatchEvent(new Event("visibilitychange"));
  } finally {
    Reflect.deleteProperty(document, "visibilityState");
  }
}

describe("attachPressDetector", () => {
  let handle: PressDetectorHandle | null;
  let log: string[];
  let recorder: PressCallback<Element>;

  function attach(opts: AttachOptions = {}) {
    handle = attachPressDetector(byId("root"), { callbacks: [recorder], ...opts });
    return handle;
  }

  beforeEach(() => {
    document.body.innerHTML = FIXTURE_HTML;
    handle = null;
    log = [];
    recorder = {
      onPressed: (el) => log.push(`pressed:${el.id}`),
      onUnpressed: (el) => log.push(`unpressed:${el.id}`),
    };
  });

  afterEach(() => {
    handle?.dispose();
    vi.useRealTimers();
    document.body.innerHTML = "";
  });

  describe("with fake timers", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it("reports a plain button as pressed at down and unpressed at up", () => {
      attach();

      pointer(byId("label"), "pointerdown");
      expect(log).toEqual(["pressed:plain"]);

      pointer(byId("label"), "pointerup");
      expect(log).toEqual(["pressed:plain", "unpressed:plain"]);
    });

    it("keeps a quick tap in a scroll container pressed for the visible duration", () => {
      const { detector } = attach();

      pointer(byId("row"), "pointerdown");
      expect(log).toEqual([]);
      expect(detector.prePressed).toBe(byId("row"));

      vi.advanceTimersByTime(30);
      pointer(byId("row"), "pointerup");
      expect(log).toEqual(["pressed:row"]);

      vi.advanceTimersByTime(64);
      expect(log).toEqual(["pressed:row", "unpressed:row"]);
    });

    it("confirms a held press after the tap timeout and drops it when the pointer leaves", () => {
      attach();

      pointer(byId("row"), "pointerdown");
      vi.advanceTimersByTime(100);
      expect(log).toEqual(["pressed:row"]);

      pointer(byId("outside"), "pointermove", 300, 300);
      expect(log).toEqual(["pressed:row", "unpressed:row"]);
    });

    it("ends the gesture when the pointer is released outside the root", () => {
      attach();

      pointer(byId("plain"), "pointerdown");
      pointer(byId("outside"), "pointerup", 4, 4);

      expect(log).toEqual(["pressed:plain", "unpressed:plain"]);
    });

    it("sees a release whose propagation a child stopped", () => {
      const { detector } = attach();
      byId("plain").addEventListener("pointerup", (e) => e.stopPropagation());

      pointer(byId("plain"), "pointerdown");
      pointer(byId("plain"), "pointerup");

      expect(log).toEqual(["pressed:plain", "unpressed:plain"]);
      expect(detector.pressed).toBeNull();
      expect(byId("plain").hasAttribute("data-pressed")).toBe(false);
    });

    it("sees a press whose propagation a child stopped", () => {
      const { detector } = attach();
      byId("label").addEventListener("pointerdown", (e) => e.stopPropagation());

      pointer(byId("label"), "pointerdown");

      expect(log).toEqual(["pressed:plain"]);
      expect(detector.pressed).toBe(byId("plain"));
    });

    it("stays silent for excluded elements", () => {
      exclude(byId("plain"));
      attach();

      pointer(byId("plain"), "pointerdown");
      pointer(byId("plain"), "pointerup");

      expect(log).toEqual([]);
    });

    it("reads flags written by someone else when emulation is off", () => {
      attach({ emulatePress: false });

      pointer(byId("plain"), "pointerdown");
      expect(log).toEqual([]);

      byId("text").setAttribute("data-pressed", "");
      pointer(byId("text"), "pointerdown");
      expect(log).toEqual(["pressed:text"]);

      pointer(byId("text"), "pointercancel");
      expect(log).toEqual(["pressed:text", "unpressed:text"]);
    });

    it("ignores document events when no gesture started inside the root", () => {
      attach({ emulatePress: false });
      byId("text").setAttribute("data-pressed", "");

      pointer(byId("outside"), "pointerdown");
      pointer(byId("outside"), "pointerup");

      expect(log).toEqual([]);
    });

    it("treats a hidden document as a temporary detach", () => {
      attach();
      pointer(byId("plain"), "pointerdown");

      hideDocument();

      expect(log).toEqual(["pressed:plain", "unpressed:plain"]);
      expect(byId("plain").hasAttribute("data-pressed")).toBe(false);
    });

    it("drops a pending pre-press when the document is hidden", () => {
      const { detector } = attach();
      pointer(byId("row"), "pointerdown");

      hideDocument();
      vi.advanceTimersByTime(100);

      expect(log).toEqual([]);
      expect(detector.prePressed).toBeNull();
      expect(byId("row").hasAttribute("data-prepressed")).toBe(false);
      expect(byId("row").hasAttribute("data-pressed")).toBe(false);
    });

    it("clears a quick tap still shown as pressed when the document is hidden", () => {
      attach();
      pointer(byId("row"), "pointerdown");
      pointer(byId("row"), "pointerup");

      hideDocument();

      expect(log).toEqual(["pressed:row", "unpressed:row"]);
      expect(byId("row").hasAttribute("data-pressed")).toBe(false);
    });

    it("unpresses and stops listening on dispose", () => {
      const h = attach();
      pointer(byId("plain"), "pointerdown");

      h.dispose();
      handle = null;
      expect(log).toEqual(["pressed:plain", "unpressed:plain"]);

      pointer(byId("plain"), "pointerdown");
      expect(log).toEqual(["pressed:plain", "unpressed:plain"]);
    });
  });

  it("detaches when the root leaves the document", async () => {
    attach();
    const plain = byId("plain");
    pointer(plain, "pointerdown");

    byId("root").remove();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(log).toEqual(["pressed:plain", "unpressed:plain"]);
    expect(plain.hasAttribute("data-pressed")).toBe(false);
  });
});
