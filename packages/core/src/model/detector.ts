
import { assertNever } from "../core/assert";
import { CallbackList } from "../core/callbacks";
import { createDeferredTask, type DeferredTask } from "../core/timer";
import { resolvePressConfig } from "./config";
import { hasPressFlag, readPressFlags, searchPressed } from "./search";
import type { PressAction, PressCallback, PressConfig, PressTree } from "./types";

export type PressDetectorOptions = {
  config?: Partial<PressConfig>;
};

/**
 * Tracks which descendant of `root` holds the pressed state during a
 * pointer sequence and tells registered callbacks when that changes.
 *
 * Feed it one action per pointer event, after the host has updated the
 * press flags of the tree for that event.
 */
export class PressDetector<N extends object> {
  readonly config: Readonly<PressConfig>;

  private callbacks = new CallbackList<PressCallback<N>>();

  private prePressedNode: N | null = null;
  private pressedNode: N | null = null;

  private tapConfirm: DeferredTask;
  private clearPress: DeferredTask;

  constructor(
    private readonly tree: PressTree<N>,
    private readonly root: N,
    opts: PressDetectorOptions = {}
  ) {
    this.config = resolvePressConfig(opts.config);
    this.tapConfirm = createDeferredTask("PressDetector.tapConfirm", () => this.confirmTap());
    this.clearPress = createDeferredTask("PressDetector.clearPress", () => this.reset());
  }

  // ---------- Observers ----------
  addCallback(cb: PressCallback<N>) {
    this.callbacks.add(cb);
  }

  removeCallback(cb: PressCallback<N>) {
    this.callbacks.remove(cb);
  }

  // ---------- State ----------
  /** Element observers were last told is pressed. */
  get pressed(): N | null {
    return this.pressedNode;
  }

  /** Element waiting for tap confirmation. */
  get prePressed(): N | null {
    return this.prePressedNode;
  }

  get hasPendingTap() {
    return this.tapConfirm.pending;
  }

  get hasPendingClear() {
    return this.clearPress.pending;
  }

  // ---------- Pointer intake ----------
  handle(action: PressAction) {
    switch (action) {
      case "down":
        return this.down();
      case "move":
        return this.move();
      case "up":
        return this.up();
      case "cancel":
        return this.cancel();
      default:
        return assertNever(action, "PressDetector.handle: unknown PressAction");
    }
  }

  down() {
    this.reset();
    // the previous gesture's clear is meaningless now that reset() unpressed it
    this.clearPress.cancel();

    const match = searchPressed(this.tree, this.root);
    if (!match) return;

    if (match.flags.pressed) {
      this.setPressedAndNotify(match.node);
    } else if (match.flags.prePressed) {
      this.prePressedNode = match.node;
      this.tapConfirm.schedule(this.config.tapTimeout);
    }
  }

  move() {
    const node = this.pressedNode;
    if (node != null && !readPressFlags(this.tree, node).pressed) {
      this.reset();
    }
  }

  cancel() {
    this.clearPress.cancel();
    this.reset();
  }

  up() {
    this.tapConfirm.cancel();

    const candidate = this.prePressedNode;
    if (candidate == null) {
      // also unpresses an element confirmed at down, without the visible duration
      this.reset();
      return;
    }

    this.prePressedNode = null;
    if (hasPressFlag(readPressFlags(this.tree, candidate))) {
      this.setPressedAndNotify(candidate);
      this.clearPress.schedule(this.config.pressedStateDuration);
    } else {
      this.reset();
    }
  }

  // ---------- Lifecycle ----------
  onDetach() {
    this.clearPress.cancel();
    this.reset();
  }

  onTemporaryDetach() {
    this.clearPress.cancel();
    this.reset();
  }

  // ---------- Internals ----------
  private confirmTap() {
    const candidate = this.prePressedNode;
    this.prePressedNode = null;
    if (candidate == null) return;

    if (hasPressFlag(readPressFlags(this.tree, candidate))) {
      this.setPressedAndNotify(candidate);
    }
  }

  private reset() {
    this.tapConfirm.cancel();
    this.prePressedNode = null;

    const node = this.pressedNode;
    if (node == null) return;

    try {
      this.callbacks.emit((cb) => cb.onUnpressed(node));
    } finally {
      this.pressedNode = null;
    }
  }

  private setPressedAndNotify(node: N) {
    this.pressedNode = node;
    this.callbacks.emit((cb) => cb.onPressed(node));
  }
}
