import { useEffect, useRef, useState, type RefObject } from "react";
import { attachPressDetector, type PressConfig } from "@pressdetect/web";

export type UsePressDetectorOptions = {
  tapTimeout?: number;
  pressedStateDuration?: number;
  emulatePress?: boolean;
  onPressed?: (el: Element) => void;
  onUnpressed?: (el: Element) => void;
};

/**
 * Attaches a press detector to `ref.current` while the component is mounted
 * and returns the element currently pressed inside it.
 */
export function usePressDetector(
  ref: RefObject<HTMLElement>,
  opts: UsePressDetectorOptions = {}
): Element | null {
  const [pressed, setPressed] = useState<Element | null>(null);

  // latest handlers, without re-attaching on every render
  const handlers = useRef(opts);
  handlers.current = opts;

  const { tapTimeout, pressedStateDuration, emulatePress } = opts;

  useEffect(() => {
    const root = ref.current;
    if (!root) return;

    const config: Partial<PressConfig> = {};
    if (tapTimeout != null) config.tapTimeout = tapTimeout;
    if (pressedStateDuration != null) config.pressedStateDuration = pressedStateDuration;

    const { dispose } = attachPressDetector(root, {
      config,
      emulatePress,
      callbacks: [
        {
          onPressed: (el) => {
            setPressed(el);
            handlers.current.onPressed?.(el);
          },
          onUnpressed: (el) => {
            setPressed(null);
            handlers.current.onUnpressed?.(el);
          },
        },
      ],
    });

    return () => {
      dispose();
      setPressed(null);
    };
  }, [ref, tapTimeout, pressedStateDuration, emulatePress]);

  return pressed;
}
