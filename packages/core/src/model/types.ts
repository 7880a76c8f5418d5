
/**
 * Read-only view of the element tree the detector inspects.
 * The host owns the elements and their press state; the core only asks.
 */
export interface PressTree<N extends object> {
  children(node: N): readonly N[];
  isVisible(node: N): boolean;
  /** Pointer is down on the node but the tap has not been confirmed yet. */
  isPrePressed(node: N): boolean;
  isPressed(node: N): boolean;
}

export type PressFlags = { prePressed: boolean; pressed: boolean };

export type PressMatch<N> = { node: N; flags: PressFlags };

export interface PressCallback<N> {
  /** A descendant (direct or indirect) became the pressed element. */
  onPressed(node: N): void;
  /** The previously pressed descendant is no longer pressed. */
  onUnpressed(node: N): void;
}

export type PressAction = "down" | "move" | "up" | "cancel";

export type PressConfig = {
  /** ms between down and tap confirmation */
  tapTimeout: number;
  /** ms a confirmed press stays visible after up */
  pressedStateDuration: number;
};
