import type { PressAction } from "@pressdetect/core";

export function classifyPointerEvent(type: string): PressAction | null {
  switch (type) {
    case "pointerdown":
      return "down";
    case "pointermove":
      return "move";
    case "pointerup":
      return "up";
    case "pointercancel":
      return "cancel";
    default:
      return null;
  }
}
