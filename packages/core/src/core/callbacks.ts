
import { Immer, castDraft } from "immer";
import { getRuntime } from "./runtime";

// observers are caller-owned objects; never freeze them
const immer = new Immer({ autoFreeze: false });

/**
 * Ordered observer list.
 *
 * Every mutation produces a new array, so a notification that is already
 * running keeps iterating the list it started with, even if an observer
 * adds or removes callbacks while being notified.
 */
export class CallbackList<C extends object> {
  private items: readonly C[] = [];

  add(cb: C) {
    this.items = immer.produce(this.items, (draft) => {
      draft.push(castDraft(cb));
    });
  }

  /** Removes the first registration of `cb`. Returns false if it was not registered. */
  remove(cb: C): boolean {
    const index = this.items.indexOf(cb);
    if (index < 0) return false;

    this.items = immer.produce(this.items, (draft) => {
      draft.splice(index, 1);
    });
    return true;
  }

  /**
   * Calls `fn` for each observer registered when the call starts. A throwing
   * observer does not stop the others; failures are logged and rethrown
   * together after the last one ran.
   */
  emit(fn: (cb: C) => void) {
    const observers = this.items;
    const failures: unknown[] = [];

    observers.forEach((cb) => {
      try {
        fn(cb);
      } catch (err) {
        failures.push(err);
      }
    });
    if (failures.length === 0) return;

    getRuntime().logError("press observer failures:", failures);
    throw new AggregateError(failures, `${failures.length} of ${observers.length} press observers failed`);
  }

  snapshot(): readonly C[] {
    return this.items;
  }

  clear() {
    this.items = [];
  }

  get size() {
    return this.items.length;
  }
}
